import { Choice } from "../choice";
import { ValidationError } from "../errors";
import { Form } from "../form";
import { when } from "../predicates";
import { rules } from "../validators";
import type { FormSession, PromptOption } from "../session";
import {
  REWARD_TYPE_TEXT,
  RewardType,
  type ItemRef,
  type Reward,
  type RewardKind,
  type RewardPack,
  type RoleRef,
  type StatRef,
} from "../types";
import type { AskResult, FieldOptions, FormField } from "./field";
import { ListEditorField, truncate, type EntryDraft } from "./list-editor";
import { NumberField } from "./number";
import { SelectField } from "./select";

export interface RewardPackFieldOptions extends FieldOptions<RewardPack> {
  /** Used when the field starts empty. */
  packType?: RewardType | null;
  /** Used when the field starts empty. Defaults to 100. */
  luck?: number;
  /** Types the member may pick from; every type when omitted, none when empty. */
  types?: readonly RewardType[];
}

type PackSettings = Pick<RewardPack, "type" | "luck">;

const ALL_TYPES: readonly RewardType[] = [RewardType.Passive, RewardType.Active, RewardType.Equip];

/** `"{luck} %"`, followed by the pack type when it has one. */
export function packName(pack: PackSettings): string {
  const name = `${pack.luck} %`;
  return pack.type === null ? name : `${name} - ${REWARD_TYPE_TEXT[pack.type]}`;
}

function amountText({ minAmount, maxAmount }: Reward): string {
  return maxAmount === null ? String(minAmount) : `${minAmount}-${maxAmount}`;
}

function targetText(reward: Reward): string {
  if (reward.kind === "role") return `@${reward.target.name}`;
  const { emoji, name } = reward.target;
  return emoji ? `${emoji} ${name}` : name;
}

const MISSING = "The value is required.";
const MIN_ABOVE_MAX = "Minimum amount can't be greater than maximum amount.";

export class RewardPackField extends ListEditorField<Reward, RewardPack> {
  readonly packType: RewardType | null;
  readonly luck: number;
  readonly types: readonly RewardType[];

  /** Luck and type being edited; committed with the rewards on finish. */
  private draft: PackSettings | null = null;

  constructor(options: RewardPackFieldOptions) {
    super(options);
    this.packType = options.packType ?? null;
    this.luck = options.luck ?? 100;
    this.types = options.types ?? ALL_TYPES;
  }

  private currentPack(): PackSettings {
    if (this.draft) return this.draft;
    const { type, luck } = this.value ?? { type: this.packType, luck: this.luck };
    return { type, luck };
  }

  protected async collect(session: FormSession): Promise<AskResult> {
    this.draft = this.currentPack();
    try {
      return await super.collect(session);
    } finally {
      this.draft = null;
    }
  }

  protected entriesOf(value: RewardPack | null): Reward[] {
    return value ? [...value.rewards] : [];
  }

  protected valueOf(rewards: Reward[]): RewardPack {
    return { ...this.currentPack(), rewards };
  }

  protected describeEntry(reward: Reward): string {
    return `x${amountText(reward)} ${targetText(reward)}`;
  }

  protected emptyText(): string {
    return this.t("*No rewards*");
  }

  protected describeEntries(rewards: readonly Reward[]): string {
    return truncate(`**${packName(this.currentPack())}**\n${super.describeEntries(rewards)}`);
  }

  protected extraActions(): PromptOption[] {
    return [
      { label: this.t("Set luck and type"), value: "settings" },
      { label: this.t("Delete the pack"), value: "delete" },
    ];
  }

  protected async onExtraAction(action: string, session: FormSession): Promise<boolean> {
    if (action === "settings") {
      await this.editSettings(session);
      return false;
    }
    if (action !== "delete") return false;
    this.clear();
    await session.notify(this.t("The reward pack has been deleted."), "success");
    return true;
  }

  private async editSettings(session: FormSession): Promise<void> {
    const current = this.currentPack();
    const luck = new NumberField({
      name: "luck",
      label: this.t("Luck (%)"),
      required: true,
      placeholder: "Between 0 and 100",
      defaultValue: current.luck,
      validators: [rules.minValue(0), rules.maxValue(100)],
    });
    const fields: FormField[] = [luck];
    const type =
      this.types.length > 0
        ? new SelectField<RewardType>({
            name: "type",
            label: this.t("Type"),
            required: true,
            defaultValue:
              current.type !== null && this.types.includes(current.type) ? current.type : null,
            choices: this.types.map((t) => Choice.ofEnum(this.t(REWARD_TYPE_TEXT[t]), t)),
          })
        : null;
    if (type) fields.push(type);

    const form = new Form({ title: this.t("Reward pack"), fields, context: this.context });
    if ((await this.runNested(form, session)) !== "finished" || luck.value === null) return;

    const [picked] = type ? type.selected() : [];
    this.draft = {
      luck: Math.round(luck.value * 100) / 100,
      type: picked ?? null,
    };
  }

  protected async createDraft(
    _entries: readonly Reward[],
    session: FormSession,
  ): Promise<EntryDraft<Reward> | null> {
    const { cluster, origin } = this.context;
    const [items, stats, roles] = await Promise.all([
      cluster.items(origin),
      cluster.stats(origin),
      cluster.roles(origin),
    ]);

    const kinds: Choice<RewardKind>[] = [];
    if (items.length > 0) kinds.push(Choice.ofEnum(this.t("Item (or currency)"), "item"));
    if (roles.length > 0) kinds.push(Choice.ofEnum(this.t("RP Role"), "role"));
    if (stats.length > 0) kinds.push(Choice.ofEnum(this.t("Stat"), "stat"));
    if (kinds.length === 0) {
      await session.notify(
        this.t("There are no rewards available to add (role, item or stat)."),
        "info",
      );
      return null;
    }

    const kind = new SelectField<RewardKind>({
      name: "kind",
      label: this.t("Reward type"),
      required: true,
      choices: kinds,
    });
    const item = new SelectField<ItemRef>({
      name: "item",
      label: this.t("Item"),
      required: true,
      appear: [when("kind").equals("item")],
      choices: items.slice(0, 100).map((i) => new Choice(i.name, i, { emoji: i.emoji })),
    });
    const stat = new SelectField<StatRef>({
      name: "stat",
      label: this.t("Stat"),
      required: true,
      appear: [when("kind").equals("stat")],
      choices: stats.slice(0, 100).map((s) => new Choice(s.name, s, { emoji: s.emoji })),
    });
    const role = new SelectField<RoleRef>({
      name: "role",
      label: this.t("RP Role"),
      required: true,
      appear: [when("kind").equals("role")],
      choices: roles.slice(0, 100).map((r) => new Choice(r.name, r)),
    });
    const minAmount = new NumberField({
      name: "min_amount",
      label: this.t("Minimum amount"),
      required: true,
      placeholder: "Minimum amount, can be negative.",
      appear: [when("kind").notEquals("role")],
    });
    const maxAmount = new NumberField({
      name: "max_amount",
      label: this.t("Maximum amount"),
      placeholder: "Maximum amount, can be negative. Keep empty for fix amount.",
      appear: [when("kind").notEquals("role")],
    });

    return {
      form: new Form({
        title: this.t("Add a reward"),
        fields: [kind, item, stat, role, minAmount, maxAmount],
        context: this.context,
      }),
      collect: () => {
        const [picked] = kind.selected();
        if (picked === "role") {
          const [target] = role.selected();
          if (!target) return new ValidationError(MISSING);
          return [{ kind: "role", target, minAmount: 1, maxAmount: null }];
        }

        const min = minAmount.value;
        const max = maxAmount.value;
        if (min === null) return new ValidationError(MISSING);
        if (max !== null && min > max) return new ValidationError(MIN_ABOVE_MAX);

        if (picked === "item") {
          const [target] = item.selected();
          if (!target) return new ValidationError(MISSING);
          return [{ kind: "item", target, minAmount: min, maxAmount: max }];
        }
        if (picked === "stat") {
          const [target] = stat.selected();
          if (!target) return new ValidationError(MISSING);
          return [{ kind: "stat", target, minAmount: min, maxAmount: max }];
        }
        return new ValidationError(MISSING);
      },
    };
  }
}
