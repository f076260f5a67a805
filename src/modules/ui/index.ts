export * from "./sessions";
export * from "./design-system";
