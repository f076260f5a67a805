import type { Form } from "./form";
import type { FormStatus } from "./outcome";

export type NoticeSeverity = "info" | "success" | "error";

export interface PromptOption {
  label: string;
  value: string;
  description?: string;
  emoji?: string;
  selected?: boolean;
}

export interface TextPrompt {
  kind: "text";
  title: string;
  label: string;
  placeholder?: string;
  style: "short" | "paragraph";
  defaultValue?: string;
  required: boolean;
  minLength?: number;
  maxLength?: number;
}

export interface SelectPrompt {
  kind: "select";
  description: string;
  /** At most 25 options per group; one control per group. */
  groups: PromptOption[][];
  minValues: number;
  maxValues: number;
}

/** Single-choice menu of labelled actions. */
export interface ActionPrompt {
  kind: "action";
  description: string;
  placeholder: string;
  actions: PromptOption[];
}

export type PromptRequest = TextPrompt | SelectPrompt | ActionPrompt;

export type PromptOutcome =
  | { status: "submitted"; text: string }
  | { status: "selected"; values: string[] }
  | { status: "canceled" }
  | { status: "timeout" };

export interface FieldLine {
  name: string;
  label: string;
  value: string;
  current: boolean;
  required: boolean;
}

export interface FormView {
  title: string;
  description: string;
  state: Exclude<FormStatus, "pending"> | "active";
  fields: FieldLine[];
  controls: {
    previous: boolean;
    next: boolean;
    respond: boolean;
    finish: boolean;
    cancel: boolean;
  };
  goTo: PromptOption[];
  labels: {
    respond: string;
    finish: string;
    cancel: string;
    goTo: string;
  };
}

/**
 * What a form needs from the UI host. Implemented over Discord interactions in
 * `host/`, and by an in-process double in tests.
 */
export interface FormSession {
  render(view: FormView): Promise<void>;
  prompt(request: PromptRequest): Promise<PromptOutcome>;
  notify(message: string, severity: NoticeSeverity): Promise<void>;
  /** Shows a nested form in its own dialog. Resolves once it is displayed. */
  openChild(form: Form): Promise<void>;
}
