/**
 * In-process FormSession for tests: records what the form renders and
 * notifies, and answers prompts from a queue.
 */
import type {
  Form,
  FormSession,
  FormView,
  NoticeSeverity,
  PromptOutcome,
  PromptRequest,
} from "@/modules/forms";

export type Answer = PromptOutcome | ((request: PromptRequest) => PromptOutcome);

export interface Notice {
  message: string;
  severity: NoticeSeverity;
}

export class ScriptedSession implements FormSession {
  readonly renders: FormView[] = [];
  readonly notices: Notice[] = [];
  readonly prompts: PromptRequest[] = [];
  readonly children: Form[] = [];
  /** Runs right after a nested form is shown, usually to fill and finish it. */
  onChild: ((form: Form) => Promise<void>) | null = null;

  private readonly answers: Answer[];

  constructor(...answers: Answer[]) {
    this.answers = answers;
  }

  queue(...answers: Answer[]): this {
    this.answers.push(...answers);
    return this;
  }

  get lastView(): FormView | undefined {
    return this.renders[this.renders.length - 1];
  }

  get messages(): string[] {
    return this.notices.map((notice) => notice.message);
  }

  async render(view: FormView): Promise<void> {
    this.renders.push(view);
  }

  async prompt(request: PromptRequest): Promise<PromptOutcome> {
    this.prompts.push(request);
    const next = this.answers.shift();
    if (next === undefined) return { status: "timeout" };
    return typeof next === "function" ? next(request) : next;
  }

  async notify(message: string, severity: NoticeSeverity): Promise<void> {
    this.notices.push({ message, severity });
  }

  async openChild(form: Form): Promise<void> {
    this.children.push(form);
    await form.start(this);
    if (this.onChild) await this.onChild(form);
  }
}

export const typed = (text: string): PromptOutcome => ({ status: "submitted", text });

export const action = (value: string): PromptOutcome => ({ status: "selected", values: [value] });

export const dismissed: PromptOutcome = { status: "canceled" };

/** Picks options of a select prompt by label. */
export function pick(...labels: string[]): (request: PromptRequest) => PromptOutcome {
  return (request) => {
    if (request.kind === "text") return { status: "canceled" };
    const options = request.kind === "select" ? request.groups.flat() : request.actions;
    const values = labels.flatMap((label) =>
      options.filter((option) => option.label === label).map((option) => option.value),
    );
    return { status: "selected", values };
  };
}
