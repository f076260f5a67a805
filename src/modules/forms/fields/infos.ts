import { FormConstructionError } from "../errors";
import { Form } from "../form";
import type { FormSession } from "../session";
import { Field, type AskResult, type FieldOptions, type FormField } from "./field";

export interface InfoEntry {
  key: string;
  value: unknown;
}

export interface InfosFieldOptions extends FieldOptions<InfoEntry[]> {
  /** Fields of the nested form; their names become the entry keys. */
  fields: readonly FormField[];
  timeoutMs?: number;
}

/**
 * Groups free-form info fields into a nested form. The child fields keep their
 * own answers between asks, so reopening the dialog shows what was entered.
 */
export class InfosField extends Field<InfoEntry[]> {
  readonly fields: readonly FormField[];
  readonly timeoutMs?: number;

  constructor(options: InfosFieldOptions) {
    super(options);
    if (options.fields.length === 0) {
      throw new FormConstructionError(`Info field "${options.name}" has no fields.`);
    }
    this.fields = options.fields;
    this.timeoutMs = options.timeoutMs;
  }

  protected async collect(session: FormSession): Promise<AskResult> {
    const child = new Form({
      title: this.label,
      fields: this.fields,
      context: this.context,
      timeoutMs: this.timeoutMs,
    });
    if ((await this.runNested(child, session)) === "canceled") {
      if (this.hostSettled()) return false;
      await session.notify(
        this.t("The field **{field}** has not been updated.", { field: this.label }),
        "info",
      );
      return false;
    }

    const entries = this.fields
      .filter((field) => field.value !== null && field.value !== "")
      .map((field) => ({ key: field.name, value: field.value }));
    await this.setValue(entries, session);
  }

  isCompleted(): boolean {
    return (
      (this.required && this.fields.every((field) => field.isCompleted())) ||
      !this.required ||
      !this.mustAppear()
    );
  }

  protected formatValue(entries: InfoEntry[]): string {
    const lines = this.fields
      .filter((field) => entries.some((entry) => entry.key === field.name))
      .map((field) => `**${field.label}**: ${field.displayValue}`);
    return lines.length > 0 ? lines.join("\n") : this.placeholder();
  }
}
