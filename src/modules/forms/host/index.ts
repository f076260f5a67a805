import type { CommandContext } from "seyfert";
import type { Form } from "../form";
import type { SettledStatus } from "../outcome";
import { SeyfertFormSession, type FormSurface } from "./seyfert-session";

export * from "./render";
export * from "./seyfert-session";

export interface RunFormOptions {
  promptTimeoutMs?: number;
}

/**
 * Shows `form` as the reply of a slash command and resolves once it is
 * finished or canceled. Only the command author can drive it.
 */
export async function runForm(
  ctx: CommandContext,
  form: Form,
  options: RunFormOptions = {},
): Promise<SettledStatus> {
  const surface: FormSurface = {
    show: async (body) => {
      await ctx.editOrReply(body);
    },
  };
  const session = new SeyfertFormSession({
    form,
    ownerId: ctx.author.id,
    surface,
    promptTimeoutMs: options.promptTimeoutMs,
  });
  await form.start(session);
  return form.wait();
}
