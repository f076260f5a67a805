import {
  MAX_CHOICES,
  buildWireMap,
  chunkChoices,
  resolveWireIds,
  type Choice,
} from "../choice";
import { FormConstructionError, ValidationError } from "../errors";
import type { FormSession, PromptOption } from "../session";
import { Field, type AskResult, type FieldOptions } from "./field";

export interface SelectFieldOptions<T> extends FieldOptions<T | T[]> {
  choices?: readonly Choice<T>[];
  /** Defaults to 1. */
  minValues?: number;
  /** Defaults to 1; `-1` allows every choice. */
  maxValues?: number;
  description?: string;
}

export function toPromptOption<T>(choice: Choice<T>): PromptOption {
  return {
    label: choice.label,
    value: choice.wireId,
    description: choice.description,
    emoji: choice.emoji,
    selected: choice.selected,
  };
}

/**
 * Single or multiple choice. With `maxValues` of 1 the value is the chosen
 * item itself, otherwise the list of chosen items.
 */
export class SelectField<T> extends Field<T | T[]> {
  readonly minValues: number;
  readonly maxValues: number;
  readonly description?: string;
  protected choices: readonly Choice<T>[];

  constructor(options: SelectFieldOptions<T>) {
    super(options);
    this.choices = options.choices ?? [];
    if (this.choices.length > MAX_CHOICES) {
      throw new FormConstructionError(
        `Select field "${options.name}" has ${this.choices.length} choices; the limit is ${MAX_CHOICES}.`,
      );
    }
    this.minValues = options.minValues ?? 1;
    this.maxValues = options.maxValues ?? 1;
  }

  get multiple(): boolean {
    return this.maxValues !== 1;
  }

  /** Current value as a list. */
  selected(): T[] {
    const value = this.value;
    if (value === null) return [];
    return Array.isArray(value) ? value : [value];
  }

  /** Choices offered by the next dialog. Overridden by lookup-backed fields. */
  protected async loadChoices(): Promise<readonly Choice<T>[]> {
    return this.choices;
  }

  protected isSameValue(a: T, b: T): boolean {
    return a === b;
  }

  /** Label for a value that no known choice carries. */
  protected describeValue(value: T): string {
    return String(value);
  }

  protected async collect(session: FormSession): Promise<AskResult> {
    let choices = await this.loadChoices();
    if (choices.length === 0) {
      await session.notify(this.t("No choices available."), "error");
      return false;
    }
    if (choices.length > MAX_CHOICES) {
      this.context.logger.warn(
        `Select field "${this.name}" loaded ${choices.length} choices; keeping the first ${MAX_CHOICES}.`,
      );
      choices = choices.slice(0, MAX_CHOICES);
    }
    this.choices = choices;

    const max = this.maxValues === -1 ? choices.length : Math.min(this.maxValues, choices.length);
    const min = Math.min(this.minValues, max);
    const current = this.selected();
    const marked = choices.map((choice) =>
      choice.withSelected(current.some((value) => this.isSameValue(value, choice.value))),
    );
    const wireMap = buildWireMap(marked);

    const outcome = await session.prompt({
      kind: "select",
      description:
        this.description ?? this.t("Select between {min} and {max} values.", { min, max }),
      groups: chunkChoices(marked.map(toPromptOption)),
      minValues: min,
      maxValues: max,
    });
    if (outcome.status !== "selected") return false;

    const values = resolveWireIds(wireMap, outcome.values);
    if (values.length < min || values.length > max) {
      await this.reject(
        new ValidationError("Select between {min} and {max} values.", { min, max }),
        session,
      );
      return;
    }
    await this.setValue(this.multiple ? values : values[0] ?? null, session);
  }

  protected formatValue(value: T | T[]): string {
    const values: T[] = Array.isArray(value) ? value : [value];
    if (values.length === 0) return this.placeholder();
    return values
      .map((item) => {
        const choice = this.choices.find((c) => this.isSameValue(c.value, item));
        return choice ? choice.label : this.describeValue(item);
      })
      .join(", ");
  }
}
