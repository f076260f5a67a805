/**
 * Routes string select submissions to the session callback registered for
 * their custom id (field choices, list editor actions, "go to").
 */
import { selectSessions } from "@/modules/ui";
import { ComponentCommand, type ComponentContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";

export default class UIStringSelectHandler extends ComponentCommand {
    componentType = "StringSelect" as const;

    filter(ctx: ComponentContext<"StringSelect">) {
        return selectSessions.has(ctx.customId);
    }

    async run(ctx: ComponentContext<"StringSelect">) {
        const ok = await selectSessions.invoke(ctx.customId, ctx);
        if (!ok) {
            await ctx.write({
                content: "This menu is no longer active.",
                flags: MessageFlags.Ephemeral,
            });
        }
    }
}
