/**
 * Routes button presses to the session callback registered for their custom
 * id (form navigation, multi-menu submit).
 */
import { buttonSessions } from "@/modules/ui";
import { ComponentCommand, type ComponentContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

export default class UIButtonHandler extends ComponentCommand {
    componentType = "Button" as const;

    filter(ctx: ComponentContext<"Button">) {
        return buttonSessions.has(ctx.customId);
    }

    async run(ctx: ComponentContext<"Button">) {
        const ok = await buttonSessions.invoke(ctx.customId, ctx);
        if (!ok) {
            await ctx.write({
                content: "This button is no longer active.",
                flags: MessageFlags.Ephemeral,
            });
        }
    }
}
