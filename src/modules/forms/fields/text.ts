import type { FormSession } from "../session";
import { Field, type AskResult, type FieldOptions } from "./field";

export interface TextFieldOptions extends FieldOptions<string> {
  placeholder?: string;
  /** Length hints passed to the input; use validators to enforce them. */
  minLength?: number;
  maxLength?: number;
  style?: "short" | "paragraph";
}

export class TextField extends Field<string> {
  readonly placeholderText: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly style: "short" | "paragraph";

  constructor(options: TextFieldOptions) {
    super(options);
    this.placeholderText = options.placeholder ?? "Enter a value";
    this.minLength = options.minLength;
    this.maxLength = options.maxLength;
    this.style =
      options.style ??
      (options.maxLength !== undefined && options.maxLength < 50 ? "short" : "paragraph");
  }

  protected async collect(session: FormSession): Promise<AskResult> {
    const outcome = await session.prompt({
      kind: "text",
      title: this.label,
      label: this.label,
      placeholder: this.t(this.placeholderText),
      style: this.style,
      defaultValue: this.value ?? undefined,
      required: this.required,
      minLength: this.minLength,
      maxLength: this.maxLength,
    });
    if (outcome.status !== "submitted") return false;
    // A blank answer clears the field.
    await this.setValue(outcome.text.trim() === "" ? null : outcome.text, session);
  }
}
