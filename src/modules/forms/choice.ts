import { v4 as uuidv4 } from "uuid";
import { FormConstructionError } from "./errors";

/** Options per select control; Discord's hard limit. */
export const OPTIONS_PER_MENU = 25;
/** Options across all controls of a single select dialog. */
export const MAX_CHOICES = 100;

export interface ChoiceOptions {
  description?: string;
  emoji?: string;
  selected?: boolean;
  /**
   * Marks `value` as an enum member: its scalar becomes the wire id instead of
   * a random token.
   */
  enumValue?: boolean;
  /** Reuses a known wire id; used when copying a choice. */
  wireId?: string;
}

/** A label/value pair that can travel through a select control. */
export class Choice<T> {
  readonly wireId: string;
  readonly description?: string;
  readonly emoji?: string;
  readonly selected: boolean;

  constructor(
    readonly label: string,
    readonly value: T,
    options: ChoiceOptions = {},
  ) {
    this.description = options.description;
    this.emoji = options.emoji;
    this.selected = options.selected ?? false;
    this.wireId =
      options.wireId ??
      (options.enumValue && (typeof value === "string" || typeof value === "number")
        ? String(value)
        : uuidv4());
  }

  /** Choice for a string or numeric enum member. */
  static ofEnum<E extends string | number>(
    label: string,
    member: E,
    options: Omit<ChoiceOptions, "enumValue"> = {},
  ): Choice<E> {
    return new Choice(label, member, { ...options, enumValue: true });
  }

  /** Copy of this choice with another `selected` flag and the same wire id. */
  withSelected(selected: boolean): Choice<T> {
    if (selected === this.selected) return this;
    return new Choice(this.label, this.value, {
      description: this.description,
      emoji: this.emoji,
      selected,
      wireId: this.wireId,
    });
  }
}

/** Reverse map kept by the caller for one control's lifetime. */
export function buildWireMap<T>(choices: readonly Choice<T>[]): Map<string, T> {
  const map = new Map<string, T>();
  for (const choice of choices) {
    if (map.has(choice.wireId)) {
      throw new FormConstructionError(`Duplicate choice wire id "${choice.wireId}".`);
    }
    map.set(choice.wireId, choice.value);
  }
  return map;
}

/** Maps submitted wire ids back to values, dropping ids the map does not know. */
export function resolveWireIds<T>(map: ReadonlyMap<string, T>, ids: readonly string[]): T[] {
  const values: T[] = [];
  for (const id of ids) {
    const value = map.get(id);
    if (value !== undefined) values.push(value);
  }
  return values;
}

export function chunkChoices<T>(choices: readonly T[], size = OPTIONS_PER_MENU): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < choices.length; i += size) {
    chunks.push(choices.slice(i, i + size));
  }
  return chunks;
}
