import { createFormContext, type FormContext } from "../context";
import { ValidationError } from "../errors";
import type { Form } from "../form";
import type { MessageVars } from "../i18n";
import type { SettledStatus } from "../outcome";
import type { AppearPredicate, FormSnapshot } from "../predicates";
import type { FormSession } from "../session";
import type { Validator } from "../validators";

export type FieldState = "unanswered" | "pending" | "answered";

/**
 * `false` keeps the form where it is (the dialog was dismissed or needs
 * another round-trip); anything else lets it refresh or auto-advance.
 */
export type AskResult = boolean | void;

/** What a field sees of the form that owns it. */
export interface FieldHost {
  readonly context: FormContext;
  snapshot(): FormSnapshot;
  isSettled(): boolean;
}

/**
 * The capability a form drives. Every field kind implements all of it, so the
 * form never inspects which kind it holds.
 */
export interface FormField {
  readonly name: string;
  readonly label: string;
  readonly required: boolean;
  readonly value: unknown;
  readonly displayValue: string;
  readonly state: FieldState;
  isCurrent: boolean;
  attach(host: FieldHost): void;
  ask(session: FormSession): Promise<AskResult>;
  mustAppear(): boolean;
  isCompleted(): boolean;
  display(): string;
  /** Called once the owning form is finished or canceled. */
  onSettle(): Promise<void>;
}

export interface FieldOptions<T> {
  name: string;
  label: string;
  required?: boolean;
  validators?: readonly Validator<T>[];
  appear?: readonly AppearPredicate[];
  /** Edit-mode prefill. */
  defaultValue?: T | null;
}

let fallbackContext: FormContext | null = null;

export abstract class Field<T> implements FormField {
  readonly name: string;
  readonly label: string;
  readonly required: boolean;
  readonly validators: readonly Validator<T>[];
  readonly appear: readonly AppearPredicate[];
  isCurrent = false;

  private _value: T | null;
  private _display: string | null = null;
  private asking = false;
  private host: FieldHost | null = null;
  private nested: Form | null = null;

  constructor(options: FieldOptions<T>) {
    this.name = options.name;
    this.label = options.label;
    this.required = options.required ?? false;
    this.validators = options.validators ?? [];
    this.appear = options.appear ?? [];
    this._value = options.defaultValue ?? null;
  }

  /** Set only through `setValue`; the value of a hidden field is kept. */
  get value(): T | null {
    return this._value;
  }

  get displayValue(): string {
    if (this._display === null) this._display = this.display();
    return this._display;
  }

  get state(): FieldState {
    if (this.asking) return "pending";
    return this._value === null ? "unanswered" : "answered";
  }

  get context(): FormContext {
    if (this.host) return this.host.context;
    fallbackContext ??= createFormContext();
    return fallbackContext;
  }

  attach(host: FieldHost): void {
    this.host = host;
  }

  protected t(text: string, vars?: MessageVars): string {
    return this.context.translate(text, vars);
  }

  async ask(session: FormSession): Promise<AskResult> {
    if (this.asking) {
      await session.notify(this.t("This field is already waiting for an answer."), "error");
      return false;
    }
    this.asking = true;
    try {
      return await this.collect(session);
    } catch (error) {
      this.context.logger.error(`Field "${this.name}" failed while asking`, error);
      await session.notify(this.t("Something went wrong while answering this field."), "error");
      return false;
    } finally {
      this.asking = false;
    }
  }

  /**
   * Shows `form` as a nested dialog and waits for it. The nested form is
   * canceled if the owning form settles first.
   */
  protected async runNested(form: Form, session: FormSession): Promise<SettledStatus> {
    this.nested = form;
    try {
      await session.openChild(form);
      return await form.wait();
    } finally {
      if (this.nested === form) this.nested = null;
    }
  }

  /** Whether the owning form is already finished or canceled. */
  protected hostSettled(): boolean {
    return this.host?.isSettled() ?? false;
  }

  async onSettle(): Promise<void> {
    await this.nested?.cancel();
  }

  /** Runs the field's dialog and feeds the answer to `setValue`. */
  protected abstract collect(session: FormSession): Promise<AskResult>;

  /**
   * Stores `value` and runs the validators in order. The first failure resets
   * the value to `null` and is reported through `session`.
   */
  async setValue(value: T | null, session?: FormSession): Promise<boolean> {
    this._value = value;
    for (const validator of this.validators) {
      try {
        await validator(value);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        await this.reject(error, session);
        return false;
      }
    }
    this._display = this.display();
    await session?.notify(
      this.t("Successfully set {field} to: {value}", {
        field: this.label,
        value: this.displayValue,
      }),
      "success",
    );
    return true;
  }

  /** Clears the value and reports why. */
  protected async reject(error: ValidationError, session?: FormSession): Promise<void> {
    this._value = null;
    this._display = this.display();
    await session?.notify(error.translate(this.context.translate), "error");
  }

  /** Drops the value without running validators. */
  protected clear(): void {
    this._value = null;
    this._display = this.display();
  }

  mustAppear(): boolean {
    const snapshot = this.host?.snapshot() ?? {};
    return this.appear.every((predicate) => predicate.test(snapshot));
  }

  isCompleted(): boolean {
    return (this.required && this._value !== null) || !this.required || !this.mustAppear();
  }

  display(): string {
    return this._value === null ? this.placeholder() : this.formatValue(this._value);
  }

  protected placeholder(): string {
    return this.t("*Unanswered*");
  }

  protected formatValue(value: T): string {
    return String(value);
  }
}
