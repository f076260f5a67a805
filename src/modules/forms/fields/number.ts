import { ValidationError } from "../errors";
import type { FormSession } from "../session";
import { isNumber } from "../validators";
import { Field, type AskResult, type FieldOptions } from "./field";

export interface NumberFieldOptions extends FieldOptions<number> {
  placeholder?: string;
}

/** `-1` is the conventional "no limit" value. */
export const INFINITE = -1;

/**
 * Parses user input the way the number field does: decimal comma allowed,
 * surrounding spaces ignored.
 */
export async function parseNumber(raw: string): Promise<number> {
  const normalized = raw.trim().replace(",", ".");
  await isNumber(normalized);
  return Number(normalized);
}

export class NumberField extends Field<number> {
  readonly placeholderText: string;

  constructor(options: NumberFieldOptions) {
    super(options);
    this.placeholderText = options.placeholder ?? "Enter a number";
  }

  protected async collect(session: FormSession): Promise<AskResult> {
    const outcome = await session.prompt({
      kind: "text",
      title: this.label,
      label: this.label,
      placeholder: this.t(this.placeholderText),
      style: "short",
      defaultValue: this.value === null ? undefined : String(this.value),
      required: this.required,
    });
    if (outcome.status !== "submitted") return false;

    let parsed: number;
    try {
      parsed = await parseNumber(outcome.text);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      await this.reject(error, session);
      return;
    }
    await this.setValue(parsed, session);
  }

  protected formatValue(value: number): string {
    return value === INFINITE ? this.t("Infinite") : String(value);
  }
}
