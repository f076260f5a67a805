import { createFormContext, type FormContext } from "./context";
import { FormConstructionError } from "./errors";
import type { FieldHost, FormField } from "./fields/field";
import type { MessageVars } from "./i18n";
import { FormOutcome, type FormStatus, type SettledStatus } from "./outcome";
import type { FormSnapshot } from "./predicates";
import type { FormSession, FormView, NoticeSeverity } from "./session";

export const DEFAULT_FORM_TIMEOUT_MS = 180_000;

export const DEFAULT_DESCRIPTION =
  "Please fill out the form below.\n" +
  "You can use the buttons below to navigate the form.\n" +
  "A title with `*` indicates a required field.";

export interface FormOptions {
  title: string;
  fields: readonly FormField[];
  description?: string;
  context?: FormContext;
  /** Inactivity window; the form cancels itself when it elapses. */
  timeoutMs?: number;
}

export interface FieldPosition {
  field: FormField;
  index: number;
}

/**
 * Ordered, navigable set of fields resolving to a `name -> value` record.
 *
 * A form is driven by one session: every button press maps to one action
 * method. Actions are serialized; one arriving while another is still running
 * is refused with a notice. `cancel` and the inactivity timeout bypass that
 * and settle the outcome directly.
 */
export class Form implements FieldHost {
  readonly title: string;
  readonly description: string;
  readonly fields: readonly FormField[];
  readonly context: FormContext;
  readonly timeoutMs: number;

  private readonly outcome = new FormOutcome();
  private session: FormSession | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private busy = false;

  constructor(options: FormOptions) {
    const [first] = options.fields;
    if (!first) throw new FormConstructionError(`Form "${options.title}" has no fields.`);

    const names = new Set<string>();
    for (const field of options.fields) {
      if (names.has(field.name)) {
        throw new FormConstructionError(
          `Form "${options.title}" declares the field "${field.name}" twice.`,
        );
      }
      names.add(field.name);
    }

    this.title = options.title;
    this.fields = options.fields;
    this.context = options.context ?? createFormContext();
    this.description = options.description ?? this.context.translate(DEFAULT_DESCRIPTION);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FORM_TIMEOUT_MS;

    for (const field of this.fields) {
      field.isCurrent = false;
      field.attach(this);
    }
    first.isCurrent = true;
  }

  get status(): FormStatus {
    return this.outcome.status;
  }

  private t(text: string, vars?: MessageVars): string {
    return this.context.translate(text, vars);
  }

  snapshot(): FormSnapshot {
    return Object.freeze(this.toDict());
  }

  toDict(): Record<string, unknown> {
    return Object.fromEntries(this.fields.map((field) => [field.name, field.value]));
  }

  getCurrentField(): FormField {
    return this.fields[this.currentIndex()];
  }

  private currentIndex(): number {
    const index = this.fields.findIndex((field) => field.isCurrent);
    return index === -1 ? 0 : index;
  }

  /** Nearest visible field after the current one. */
  getNextField(): FieldPosition | null {
    for (let index = this.currentIndex() + 1; index < this.fields.length; index++) {
      const field = this.fields[index];
      if (field.mustAppear()) return { field, index };
    }
    return null;
  }

  /** Nearest visible field before the current one. */
  getPreviousField(): FieldPosition | null {
    for (let index = this.currentIndex() - 1; index >= 0; index--) {
      const field = this.fields[index];
      if (field.mustAppear()) return { field, index };
    }
    return null;
  }

  isSettled(): boolean {
    return this.outcome.isSettled();
  }

  isCompleted(): boolean {
    return this.fields.every((field) => field.isCompleted());
  }

  isCanceled(): boolean {
    return this.outcome.status === "canceled";
  }

  isFinished(): boolean {
    return this.outcome.status === "finished";
  }

  wait(): Promise<SettledStatus> {
    return this.outcome.wait();
  }

  async start(session: FormSession): Promise<void> {
    this.session = session;
    await this.refresh();
    if (!this.outcome.isSettled()) this.armTimer();
  }

  previous(): Promise<void> {
    return this.runAction(() => this.paginate(this.getPreviousField()));
  }

  next(): Promise<void> {
    return this.runAction(() => this.paginate(this.getNextField()));
  }

  respond(): Promise<void> {
    return this.runAction(() => this.respondCurrent());
  }

  /** Jumps to a visible field and asks it right away. */
  goTo(name: string): Promise<void> {
    return this.runAction(async () => {
      const target = this.fields.find((field) => field.name === name && field.mustAppear());
      if (!target) {
        await this.notify(this.t("This field can't be selected right now."), "error");
        return;
      }
      this.moveTo(target);
      await this.respondCurrent();
    });
  }

  finish(): Promise<void> {
    return this.runAction(async () => {
      if (!this.isCompleted()) {
        await this.notify(this.t("Please fill out every required field first."), "error");
        return;
      }
      await this.stop("finished");
    });
  }

  async cancel(): Promise<void> {
    await this.stop("canceled");
  }

  async onTimeout(): Promise<void> {
    if (await this.stop("canceled")) {
      this.context.logger.debug(`Form "${this.title}" timed out`);
    }
  }

  /**
   * Settles the outcome and renders the terminal view. Only the first call
   * has an effect; it reports whether it was that call.
   */
  async stop(status: SettledStatus): Promise<boolean> {
    if (!this.outcome.resolve(status)) return false;
    this.clearTimer();
    this.context.logger.debug(`Form "${this.title}" ${status}`);
    for (const field of this.fields) await field.onSettle();
    await this.refresh();
    return true;
  }

  /** Snapshot of what the session should display. */
  view(): FormView {
    const active = !this.outcome.isSettled();
    const visible = this.fields.filter((field) => field.mustAppear());
    const current = this.getCurrentField();

    return {
      title: this.title,
      description: this.description,
      state: active ? "active" : this.outcome.status === "finished" ? "finished" : "canceled",
      fields: visible.map((field) => ({
        name: field.name,
        label: field.label,
        value: field.displayValue,
        current: active && field.isCurrent,
        required: field.required,
      })),
      controls: {
        previous: active && this.getPreviousField() !== null,
        next: active && this.getNextField() !== null,
        respond: active && current.mustAppear(),
        finish: active && this.isCompleted(),
        cancel: active,
      },
      goTo:
        active && visible.length > 2
          ? visible.map((field) => ({
              label: field.label,
              value: field.name,
              selected: field.isCurrent,
            }))
          : [],
      labels: {
        respond: this.t("Respond"),
        finish: this.t("Finish"),
        cancel: this.t("Cancel"),
        goTo: this.t("Go to a field"),
      },
    };
  }

  private async runAction(action: () => Promise<void>): Promise<void> {
    if (this.outcome.isSettled()) return;
    if (this.busy) {
      await this.notify(this.t("Please finish the current step first."), "info");
      return;
    }
    this.busy = true;
    this.clearTimer();
    try {
      await action();
    } finally {
      this.busy = false;
      if (!this.outcome.isSettled()) this.armTimer();
    }
  }

  private async respondCurrent(): Promise<void> {
    const field = this.getCurrentField();
    const result = await field.ask(this.requireSession());
    if (result === false) return;

    // Auto-advance looks at the raw next field, hidden or not.
    const following = this.fields[this.fields.indexOf(field) + 1];
    if (field.value !== null && following !== undefined && following.value === null) {
      await this.paginate(this.getNextField());
      return;
    }
    await this.refresh();
  }

  private async paginate(position: FieldPosition | null): Promise<void> {
    if (position) this.moveTo(position.field);
    await this.refresh();
  }

  private moveTo(target: FormField): void {
    for (const field of this.fields) field.isCurrent = field === target;
  }

  private async refresh(): Promise<void> {
    await this.session?.render(this.view());
  }

  private async notify(message: string, severity: NoticeSeverity): Promise<void> {
    await this.session?.notify(message, severity);
  }

  private requireSession(): FormSession {
    if (!this.session) throw new Error(`Form "${this.title}" has not been started.`);
    return this.session;
  }

  private armTimer(): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.onTimeout().catch((error: unknown) =>
        this.context.logger.error(`Form "${this.title}" failed to time out cleanly`, error),
      );
    }, this.timeoutMs);
  }

  private clearTimer(): void {
    if (this.timer !== null) clearTimeout(this.timer);
    this.timer = null;
  }
}
