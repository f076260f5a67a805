/**
 * Multi-step interactive forms: a paginated set of fields rendered as an
 * embed with navigation controls, each field asking its own sub-dialog.
 *
 * The engine knows nothing about Discord; it talks to a {@link FormSession}.
 * `host/` implements that session over seyfert interactions.
 */
export * from "./choice";
export * from "./context";
export * from "./emoji";
export * from "./errors";
export * from "./fields";
export * from "./form";
export * from "./i18n";
export * from "./logger";
export * from "./outcome";
export * from "./predicates";
export * from "./session";
export * from "./types";
export * from "./validators";
