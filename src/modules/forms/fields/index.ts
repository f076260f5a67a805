export * from "./field";
export * from "./text";
export * from "./number";
export * from "./emoji";
export * from "./select";
export * from "./refs";
export * from "./infos";
export * from "./list-editor";
export * from "./access-rules";
export * from "./stat-amounts";
export * from "./reward-pack";
