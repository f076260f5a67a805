import { Logger } from "seyfert";

/** The subset of seyfert's logger the engine writes to. */
export type FormsLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export const formsLogger: FormsLogger = new Logger({ name: "[forms]" });
