import { formatEmoji, parseEmoji } from "../emoji";
import { ValidationError } from "../errors";
import type { FormSession } from "../session";
import { Field, type AskResult } from "./field";

/** Stores the emoji as Discord renders it (`<:name:id>` or the unicode glyph). */
export class EmojiField extends Field<string> {
  protected async collect(session: FormSession): Promise<AskResult> {
    const outcome = await session.prompt({
      kind: "text",
      title: this.label,
      label: this.label,
      placeholder: this.t("An emoji, like :fire: or 🔥"),
      style: "short",
      defaultValue: this.value ?? undefined,
      required: this.required,
      maxLength: 100,
    });
    if (outcome.status !== "submitted") return false;

    const parsed = parseEmoji(outcome.text);
    if (parsed.isErr()) {
      await this.reject(new ValidationError("The value must be a valid emoji."), session);
      return;
    }
    await this.setValue(formatEmoji(parsed.value), session);
  }
}
