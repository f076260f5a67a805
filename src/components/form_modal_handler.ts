import { ModalCommand, type ModalContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { modalSessions } from "@/modules/ui";

/** Delivers field modals back to the form waiting on them. */
export default class FormModalHandler extends ModalCommand {
    filter(ctx: ModalContext) {
        return ctx.customId.startsWith("form:modal:");
    }

    async run(ctx: ModalContext) {
        const ok = await modalSessions.invoke(ctx.customId, ctx);
        if (!ok) {
            await ctx.write({
                content: "This dialog has expired. Press the button again.",
                flags: MessageFlags.Ephemeral,
            });
        }
    }
}
