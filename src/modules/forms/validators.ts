/**
 * Field validators.
 *
 * Each validator resolves `true` or throws {@link ValidationError}. A missing
 * value (`null` / `undefined`) passes everything except {@link required}, so
 * optional fields skip the remaining checks while unanswered. Validators never
 * mutate what they are given.
 */
import { parseEmoji } from "./emoji";
import { ValidationError } from "./errors";

/** A validator bound to its parameters, as held by a field. */
export type Validator<T = unknown> = (value: T | null) => Promise<true>;

const isMissing = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

function lengthOf(value: unknown): number | null {
  if (typeof value === "string") return [...value].length;
  if (Array.isArray(value)) return value.length;
  return null;
}

/** Plain decimal notation only; no hex, binary or octal prefixes. */
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

function numericOf(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const normalized = value.trim().replace(",", ".");
  if (!DECIMAL.test(normalized)) return null;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

export async function required(value: unknown): Promise<true> {
  if (isMissing(value)) throw new ValidationError("The value is required.");
  return true;
}

export async function minLength(value: unknown, min: number): Promise<true> {
  const length = lengthOf(value);
  if (length !== null && length < min) {
    throw new ValidationError(
      "The value must be at least {min} characters long.",
      { min },
    );
  }
  return true;
}

export async function maxLength(value: unknown, max: number): Promise<true> {
  const length = lengthOf(value);
  if (length !== null && length > max) {
    throw new ValidationError(
      "The value must be at most {max} characters long.",
      { max },
    );
  }
  return true;
}

export async function minValue(value: unknown, min: number): Promise<true> {
  const n = numericOf(value);
  if (n !== null && n < min) {
    throw new ValidationError("The value must be at least {min}.", { min });
  }
  return true;
}

export async function maxValue(value: unknown, max: number): Promise<true> {
  const n = numericOf(value);
  if (n !== null && n > max) {
    throw new ValidationError("The value must be at most {max}.", { max });
  }
  return true;
}

export async function isNumber(value: unknown): Promise<true> {
  if (isMissing(value)) return true;
  if (numericOf(value) === null) {
    throw new ValidationError("The value must be a number.");
  }
  return true;
}

const INTEGER = /^[+-]?\d+$/;

export async function isInt(value: unknown): Promise<true> {
  if (isMissing(value)) return true;
  const ok =
    typeof value === "number"
      ? Number.isInteger(value)
      : typeof value === "string" && INTEGER.test(value.trim());
  if (!ok) throw new ValidationError("The value must be an integer.");
  return true;
}

export async function forbiddenValue(
  value: unknown,
  ...forbidden: readonly unknown[]
): Promise<true> {
  if (isMissing(value)) return true;
  if (forbidden.includes(value)) {
    throw new ValidationError("The value {value} is forbidden.", {
      value: String(value),
    });
  }
  return true;
}

export async function isEmoji(value: unknown): Promise<true> {
  if (isMissing(value)) return true;
  if (typeof value !== "string" || parseEmoji(value).isErr()) {
    throw new ValidationError("The value must be a valid emoji.");
  }
  return true;
}

/**
 * Bound validator factories, e.g. `rules.minLength(3)`.
 */
export const rules = {
  required: (): Validator => required,
  minLength: (min: number): Validator => (value) => minLength(value, min),
  maxLength: (max: number): Validator => (value) => maxLength(value, max),
  minValue: (min: number): Validator => (value) => minValue(value, min),
  maxValue: (max: number): Validator => (value) => maxValue(value, max),
  isNumber: (): Validator => isNumber,
  isInt: (): Validator => isInt,
  forbidden: (...values: readonly unknown[]): Validator => (value) =>
    forbiddenValue(value, ...values),
  isEmoji: (): Validator => isEmoji,
} as const;
