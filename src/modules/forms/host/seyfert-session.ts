import type { ComponentContext, Embed, Modal, ModalContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import {
  buttonSessions,
  makeID,
  modalSessions,
  selectSessions,
} from "@/modules/ui/sessions";
import { withSeverity } from "@/modules/ui/design-system";
import { attempt } from "@/utils/result";
import type { Form } from "../form";
import type { FormsLogger } from "../logger";
import type {
  ActionPrompt,
  FormSession,
  FormView,
  NoticeSeverity,
  PromptOutcome,
  PromptRequest,
  SelectPrompt,
  TextPrompt,
} from "../session";
import {
  TEXT_INPUT_ID,
  buildFormComponents,
  buildFormEmbed,
  buildPromptModal,
  buildSelectRows,
  buildSubmitRow,
  type ControlIds,
  type FormRow,
} from "./render";

export const DEFAULT_PROMPT_TIMEOUT_MS = 120_000;

export interface MessageBody {
  content?: string;
  embeds?: Embed[];
  components?: FormRow[];
  flags?: MessageFlags;
}

/**
 * The interaction that answers the next notice or prompt. Built from the
 * seyfert context of the latest button, select or modal the owner used.
 */
export interface Responder {
  readonly userId: string;
  write(body: MessageBody): Promise<unknown>;
  followup?(body: MessageBody): Promise<unknown>;
  editResponse?(body: Omit<MessageBody, "flags">): Promise<unknown>;
  deferUpdate?(): Promise<unknown>;
  modal?(modal: Modal): Promise<unknown>;
}

/** Where the form embed itself is displayed. */
export interface FormSurface {
  show(body: MessageBody): Promise<void>;
}

export function fromButton(ctx: ComponentContext<"Button">): Responder {
  return {
    userId: ctx.author.id,
    write: (body) => ctx.write(body),
    followup: (body) => ctx.followup(body),
    editResponse: (body) => ctx.editResponse(body),
    deferUpdate: () => ctx.deferUpdate(),
    modal: (modal) => ctx.interaction.modal(modal),
  };
}

export function fromSelect(ctx: ComponentContext<"StringSelect">): Responder {
  return {
    userId: ctx.author.id,
    write: (body) => ctx.write(body),
    followup: (body) => ctx.followup(body),
    editResponse: (body) => ctx.editResponse(body),
    deferUpdate: () => ctx.deferUpdate(),
    modal: (modal) => ctx.interaction.modal(modal),
  };
}

export function fromModal(ctx: ModalContext): Responder {
  return {
    userId: ctx.author.id,
    write: (body) => ctx.write(body),
    editResponse: (body) => ctx.editResponse(body),
  };
}

/** Modal submissions come back as action rows; walk them to find the input. */
export function getTextInputValue(ctx: ModalContext, customId: string): string | null {
  for (const row of ctx.components ?? []) {
    for (const component of row.components ?? []) {
      if (component.customId === customId) {
        return component.value ?? null;
      }
    }
  }
  return null;
}

/** Shows a nested form on the ephemeral reply of the interaction that opened it. */
export class ResponseSurface implements FormSurface {
  private shown = false;

  constructor(private readonly responder: Responder) {}

  async show(body: MessageBody): Promise<void> {
    if (!this.shown) {
      this.shown = true;
      await this.responder.write({ ...body, flags: MessageFlags.Ephemeral });
      return;
    }
    const { flags: _flags, ...update } = body;
    await this.responder.editResponse?.(update);
  }
}

interface ResponderState {
  responder: Responder;
  replied: boolean;
}

export interface SeyfertFormSessionOptions {
  form: Form;
  ownerId: string;
  surface: FormSurface;
  promptTimeoutMs?: number;
}

/**
 * Drives one form from Discord. Navigation buttons defer and act; "respond"
 * and "go to" keep the interaction open so the field can answer it with a
 * modal or a menu. Only `ownerId` may use the controls.
 */
export class SeyfertFormSession implements FormSession {
  readonly ids: ControlIds;
  private readonly form: Form;
  private readonly ownerId: string;
  private readonly surface: FormSurface;
  private readonly promptTimeoutMs: number;
  private readonly logger: FormsLogger;

  private current: ResponderState | null = null;
  private inflight: Promise<void> | null = null;
  private readonly pending = new Set<() => void>();
  private pendingModal: (() => void) | null = null;
  private released = false;

  constructor(options: SeyfertFormSessionOptions) {
    this.form = options.form;
    this.ownerId = options.ownerId;
    this.surface = options.surface;
    this.promptTimeoutMs = options.promptTimeoutMs ?? DEFAULT_PROMPT_TIMEOUT_MS;
    this.logger = options.form.context.logger;

    const base = makeID("form");
    this.ids = {
      previous: `${base}:prev`,
      next: `${base}:next`,
      respond: `${base}:respond`,
      finish: `${base}:finish`,
      cancel: `${base}:cancel`,
      goTo: `${base}:goto`,
    };

    const form = this.form;
    buttonSessions.register(this.ids.previous, (ctx) =>
      this.dispatch(fromButton(ctx), "navigate", () => form.previous()),
    );
    buttonSessions.register(this.ids.next, (ctx) =>
      this.dispatch(fromButton(ctx), "navigate", () => form.next()),
    );
    buttonSessions.register(this.ids.finish, (ctx) =>
      this.dispatch(fromButton(ctx), "navigate", () => form.finish()),
    );
    buttonSessions.register(this.ids.cancel, (ctx) =>
      this.dispatch(fromButton(ctx), "navigate", () => form.cancel()),
    );
    buttonSessions.register(this.ids.respond, (ctx) =>
      this.dispatch(fromButton(ctx), "ask", () => form.respond()),
    );
    selectSessions.register(this.ids.goTo, (ctx) => {
      const [name] = ctx.interaction.values ?? [];
      if (name === undefined) return;
      return this.dispatch(fromSelect(ctx), "ask", () => form.goTo(name));
    });
  }

  private t(text: string): string {
    return this.form.context.translate(text);
  }

  private async ownedBy(responder: Responder): Promise<boolean> {
    if (responder.userId === this.ownerId) return true;
    await attempt(() =>
      responder.write({
        content: withSeverity(this.t("Only the person who opened this form can use it."), "error"),
        flags: MessageFlags.Ephemeral,
      }),
    );
    return false;
  }

  /**
   * Runs one control press: refuses anyone but the owner, acknowledges
   * navigation right away and keeps "ask" interactions open for the field.
   */
  async dispatch(
    responder: Responder,
    kind: "navigate" | "ask",
    action: () => Promise<void>,
  ): Promise<void> {
    if (!(await this.ownedBy(responder))) return;

    // A dismissed modal never reports back; a new ask abandons it.
    if (kind === "ask" && this.pendingModal) {
      this.pendingModal();
      await this.inflight;
    }

    const state: ResponderState = { responder, replied: false };
    if (kind === "navigate") {
      await this.acknowledge(state);
    }
    this.current = state;

    const run = action().catch((error: unknown) =>
      this.logger.error(`Form "${this.form.title}" action failed`, error),
    );
    this.inflight = run;
    await run;
    if (this.inflight === run) this.inflight = null;
    await this.acknowledge(state);
  }

  private async acknowledge(state: ResponderState): Promise<void> {
    if (state.replied) return;
    state.replied = true;
    const deferUpdate = state.responder.deferUpdate;
    if (!deferUpdate) return;
    const res = await attempt(() => deferUpdate());
    res.inspectErr((error) => this.logger.warn("Could not acknowledge interaction", error));
  }

  /** Sends a new message through the current responder. */
  private async send(body: MessageBody): Promise<"write" | "followup" | null> {
    const state = this.current;
    if (!state) return null;
    const { responder } = state;

    if (!state.replied) {
      state.replied = true;
      const res = await attempt(() => responder.write(body));
      if (res.isOk()) return "write";
      this.logger.warn("Could not reply to interaction", res.error);
      return null;
    }
    const followup = responder.followup;
    if (!followup) {
      this.logger.warn("Interaction already answered; dropping message");
      return null;
    }
    const res = await attempt(() => followup(body));
    if (res.isOk()) return "followup";
    this.logger.warn("Could not send followup", res.error);
    return null;
  }

  async render(view: FormView): Promise<void> {
    if (this.released) return;
    const body: MessageBody = {
      embeds: [buildFormEmbed(view)],
      components: buildFormComponents(view, this.ids),
    };
    const res = await attempt(() => this.surface.show(body));
    res.inspectErr((error) => this.logger.warn(`Could not render form "${view.title}"`, error));
    if (view.state !== "active") this.release();
  }

  async notify(message: string, severity: NoticeSeverity): Promise<void> {
    await this.send({ content: withSeverity(message, severity), flags: MessageFlags.Ephemeral });
  }

  prompt(request: PromptRequest): Promise<PromptOutcome> {
    switch (request.kind) {
      case "text":
        return this.promptText(request);
      case "select":
        return this.promptSelect(request);
      case "action":
        return this.promptAction(request);
    }
  }

  async openChild(form: Form): Promise<void> {
    const state = this.current;
    if (!state || state.replied) {
      await this.notify(this.t("Press the button again to open this dialog."), "info");
      await form.cancel();
      return;
    }
    state.replied = true;
    const child = new SeyfertFormSession({
      form,
      ownerId: this.ownerId,
      surface: new ResponseSurface(state.responder),
      promptTimeoutMs: this.promptTimeoutMs,
    });
    await form.start(child);
  }

  /**
   * Registers callbacks through `arm` and waits for one of them to settle the
   * outcome, for the prompt timeout, or for the form to close.
   */
  private waitFor(
    arm: (settle: (outcome: PromptOutcome) => void) => Array<() => void>,
  ): { outcome: Promise<PromptOutcome>; cancel: () => void } {
    let cancel: () => void = () => undefined;
    const outcome = new Promise<PromptOutcome>((resolve) => {
      let done = false;
      let releasers: Array<() => void> = [];
      const settle = (result: PromptOutcome) => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        this.pending.delete(cancel);
        for (const release of releasers) release();
        resolve(result);
      };
      const timer = setTimeout(() => settle({ status: "timeout" }), this.promptTimeoutMs);
      cancel = () => settle({ status: "canceled" });
      this.pending.add(cancel);
      releasers = arm(settle);
    });
    return { outcome, cancel };
  }

  private async promptText(request: TextPrompt): Promise<PromptOutcome> {
    const state = this.current;
    const showModal = state?.responder.modal;
    if (!state || state.replied || !showModal) {
      await this.notify(this.t("Press the button again to answer this field."), "info");
      return { status: "canceled" };
    }

    const id = makeID("form:modal");
    const { outcome, cancel } = this.waitFor((settle) => {
      modalSessions.register(id, async (ctx) => {
        const responder = fromModal(ctx);
        if (!(await this.ownedBy(responder))) return;
        this.current = { responder, replied: false };
        settle({ status: "submitted", text: getTextInputValue(ctx, TEXT_INPUT_ID) ?? "" });
      });
      return [() => modalSessions.release(id)];
    });

    state.replied = true;
    const shown = await attempt(() => showModal(buildPromptModal(id, request)));
    if (shown.isErr()) {
      this.logger.warn("Could not open modal", shown.error);
      cancel();
      return outcome;
    }

    this.pendingModal = cancel;
    try {
      return await outcome;
    } finally {
      if (this.pendingModal === cancel) this.pendingModal = null;
    }
  }

  private promptSelect(request: SelectPrompt): Promise<PromptOutcome> {
    return this.showMenu(
      request.description,
      request.groups,
      this.t("Make a selection"),
      request.minValues,
      request.maxValues,
    );
  }

  private promptAction(request: ActionPrompt): Promise<PromptOutcome> {
    return this.showMenu(request.description, [request.actions], request.placeholder, 1, 1);
  }

  private async showMenu(
    content: string,
    groups: SelectPrompt["groups"],
    placeholder: string,
    minValues: number,
    maxValues: number,
  ): Promise<PromptOutcome> {
    const groupIds = groups.map(() => makeID("form:select"));
    const submitId = groups.length > 1 ? makeID("form:submit") : null;
    const picked = new Map<string, string[]>();

    const { outcome, cancel } = this.waitFor((settle) => {
      for (const id of groupIds) {
        selectSessions.register(id, async (ctx) => {
          const responder = fromSelect(ctx);
          if (!(await this.ownedBy(responder))) return;
          const values = ctx.interaction.values ?? [];
          if (!submitId) {
            this.current = { responder, replied: false };
            settle({ status: "selected", values });
            return;
          }
          picked.set(id, values);
          await this.acknowledge({ responder, replied: false });
        });
      }
      if (submitId) {
        buttonSessions.register(submitId, async (ctx) => {
          const responder = fromButton(ctx);
          if (!(await this.ownedBy(responder))) return;
          this.current = { responder, replied: false };
          settle({ status: "selected", values: [...picked.values()].flat() });
        });
      }
      return [
        () => selectSessions.release(...groupIds),
        () => {
          if (submitId) buttonSessions.release(submitId);
        },
      ];
    });

    const prompter = this.current?.responder;
    const components: FormRow[] = buildSelectRows(groupIds, groups, placeholder, minValues, maxValues);
    if (submitId) components.push(buildSubmitRow(submitId, this.t("Submit")));
    const sent = await this.send({ content, components, flags: MessageFlags.Ephemeral });
    if (sent === null) cancel();

    const result = await outcome;
    if (sent === "write" && prompter?.editResponse) {
      const editResponse = prompter.editResponse;
      await attempt(() => editResponse({ content, components: [] }));
    }
    return result;
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    buttonSessions.release(
      this.ids.previous,
      this.ids.next,
      this.ids.respond,
      this.ids.finish,
      this.ids.cancel,
    );
    selectSessions.release(this.ids.goTo);
    for (const cancel of [...this.pending]) cancel();
  }
}
