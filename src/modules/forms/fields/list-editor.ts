import { MAX_CHOICES, chunkChoices } from "../choice";
import { ValidationError } from "../errors";
import type { Form } from "../form";
import type { FormSession, PromptOption } from "../session";
import { Field, type AskResult } from "./field";

/** Display limit of an embed field value. */
export const ENTRY_DISPLAY_LIMIT = 1024;

/** A nested form plus how to turn its answers into entries. */
export interface EntryDraft<E> {
  form: Form;
  collect(): E[] | ValidationError;
}

export function truncate(text: string, limit = ENTRY_DISPLAY_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit - 1)}…` : text;
}

/**
 * Field whose value is a list of small aggregates edited through an action
 * menu: `add` runs a nested form, `remove` a multi-select over the current
 * entries, `finish` commits. The field value only changes on `finish`.
 */
export abstract class ListEditorField<E, V> extends Field<V> {
  protected abstract entriesOf(value: V | null): E[];
  protected abstract valueOf(entries: E[]): V;
  protected abstract describeEntry(entry: E): string;

  /** Builds the add dialog, or returns `null` after notifying why nothing can be added. */
  protected abstract createDraft(entries: readonly E[], session: FormSession): Promise<EntryDraft<E> | null>;

  /** Extra actions offered after the built-in ones. */
  protected extraActions(_entries: readonly E[]): PromptOption[] {
    return [];
  }

  /** Handles an extra action; resolving `true` ends the dialog. */
  protected async onExtraAction(_action: string, _session: FormSession): Promise<boolean> {
    return false;
  }

  protected emptyText(): string {
    return this.t("*No entries*");
  }

  protected async collect(session: FormSession): Promise<AskResult> {
    let entries = this.entriesOf(this.value);

    for (;;) {
      if (this.hostSettled()) return false;
      const actions: PromptOption[] = [{ label: this.t("Add"), value: "add" }];
      if (entries.length > 0) actions.push({ label: this.t("Remove"), value: "remove" });
      actions.push(...this.extraActions(entries), { label: this.t("Finish"), value: "finish" });

      const outcome = await session.prompt({
        kind: "action",
        description: this.describeEntries(entries),
        placeholder: this.t("What do you want to do?"),
        actions,
      });
      if (outcome.status !== "selected") return false;

      const [action] = outcome.values;
      if (action === "finish") {
        await this.setValue(this.valueOf(entries), session);
        return;
      }
      if (action === "add") {
        entries = [...entries, ...(await this.addEntries(entries, session))];
      } else if (action === "remove") {
        entries = await this.removeEntries(entries, session);
      } else if (action !== undefined && (await this.onExtraAction(action, session))) {
        return;
      }
    }
  }

  private async addEntries(entries: readonly E[], session: FormSession): Promise<E[]> {
    const draft = await this.createDraft(entries, session);
    if (!draft) return [];

    if ((await this.runNested(draft.form, session)) !== "finished") return [];

    const added = draft.collect();
    if (added instanceof ValidationError) {
      await session.notify(added.translate(this.context.translate), "error");
      return [];
    }
    return added;
  }

  private async removeEntries(entries: E[], session: FormSession): Promise<E[]> {
    const options = entries.slice(0, MAX_CHOICES).map((entry, index) => ({
      label: truncate(this.describeEntry(entry), 100),
      value: String(index),
    }));
    const outcome = await session.prompt({
      kind: "select",
      description: this.t("Select the entries to remove."),
      groups: chunkChoices(options),
      minValues: 1,
      maxValues: options.length,
    });
    if (outcome.status !== "selected") return entries;

    const removed = new Set(outcome.values);
    return entries.filter((_, index) => !removed.has(String(index)));
  }

  protected describeEntries(entries: readonly E[]): string {
    if (entries.length === 0) return this.emptyText();
    return truncate(entries.map((entry) => this.describeEntry(entry)).join("\n"));
  }

  protected formatValue(value: V): string {
    return this.describeEntries(this.entriesOf(value));
  }
}
