import {
  AccessRulesField,
  Choice,
  EmojiField,
  Form,
  InfosField,
  ItemType,
  NumberField,
  RewardPackField,
  RewardType,
  SelectField,
  TextField,
  createFormContext,
  rules,
  when,
  type ClusterLookup,
  type FormContext,
} from "@/modules/forms";
import { z } from "zod";

/** Fixed entities for the sandbox, which has no game database behind it. */
export const sandboxCluster: ClusterLookup = {
  currencies: async () => [{ id: 1, name: "Gold", symbol: "g", emoji: "🪙" }],
  items: async () => [
    { id: 1, name: "Iron ore", type: ItemType.Resource, emoji: "⛏️" },
    { id: 2, name: "Healing potion", type: ItemType.Consumable, emoji: "🧪" },
  ],
  roles: async () => [
    { id: "100", name: "Citizen" },
    { id: "101", name: "Merchant" },
    { id: "102", name: "Outlaw" },
  ],
  stats: async () => [
    { id: 1, name: "Strength", emoji: "💪" },
    { id: 2, name: "Charisma", emoji: "🗣️" },
  ],
};

export function buildSandboxForm(context: FormContext, timeoutMs?: number): Form {
  return new Form({
    title: "Form sandbox",
    context,
    timeoutMs,
    fields: [
      new TextField({
        name: "name",
        label: "Name",
        required: true,
        maxLength: 32,
        validators: [rules.minLength(3), rules.maxLength(32), rules.forbidden("Admin")],
      }),
      new EmojiField({ name: "emoji", label: "Emoji" }),
      new SelectField<boolean>({
        name: "allow_exchange",
        label: "Allow exchange",
        required: true,
        choices: [new Choice("Yes", true), new Choice("No", false)],
      }),
      new NumberField({
        name: "exchange_rate",
        label: "Exchange rate",
        required: true,
        appear: [when("allow_exchange").equals(true)],
        validators: [rules.isNumber(), rules.minValue(0), rules.maxValue(100)],
      }),
      new InfosField({
        name: "infos",
        label: "Details",
        fields: [
          new TextField({ name: "motto", label: "Motto", maxLength: 100 }),
          new TextField({ name: "history", label: "History", maxLength: 1000 }),
        ],
      }),
      new AccessRulesField({ name: "access", label: "Access rules" }),
      new RewardPackField({
        name: "rewards",
        label: "Daily rewards",
        packType: RewardType.Passive,
      }),
    ],
  });
}

export function createSandboxContext(userId: string, guildId?: string): FormContext {
  return createFormContext({ cluster: sandboxCluster, origin: { userId, guildId } });
}

export const SandboxResultSchema = z.object({
  name: z.string(),
  emoji: z.string().nullable(),
  allow_exchange: z.boolean(),
  exchange_rate: z.number().nullable(),
});

/** One line per core answer, for the reply once the form is finished. */
export function summarizeSandbox(result: Record<string, unknown>): string {
  const parsed = SandboxResultSchema.safeParse(result);
  if (!parsed.success) return "The form returned an unexpected result.";
  const { name, emoji, allow_exchange, exchange_rate } = parsed.data;
  const lines = [`**${emoji ? `${emoji} ` : ""}${name}**`];
  lines.push(
    allow_exchange ? `Exchange rate: ${exchange_rate ?? "?"}` : "Exchange disabled",
  );
  return lines.join("\n");
}
