import type { CommandContext } from "seyfert";
import { Command, Declare } from "seyfert";
import { formTimeouts } from "@/configuration/env";
import { runForm } from "@/modules/forms/host";
import { buildSandboxForm, createSandboxContext, summarizeSandbox } from "./shared";

@Declare({
  name: "form-sandbox",
  description: "Open a form that uses every field kind",
})
export default class FormSandboxCommand extends Command {
  async run(ctx: CommandContext) {
    const timeouts = formTimeouts();
    const form = buildSandboxForm(
      createSandboxContext(ctx.author.id, ctx.guildId),
      timeouts.formMs,
    );

    const status = await runForm(ctx, form, { promptTimeoutMs: timeouts.promptMs });
    if (status !== "finished") return;

    const result = form.toDict();
    await ctx.editOrReply({
      content: `${summarizeSandbox(result)}\n\`\`\`json\n${JSON.stringify(result, null, 2).slice(0, 1800)}\n\`\`\``,
    });
  }
}
