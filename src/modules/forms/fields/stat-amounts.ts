import { Choice } from "../choice";
import { ValidationError } from "../errors";
import { Form } from "../form";
import type { FormSession } from "../session";
import type { StatAmount, StatRef } from "../types";
import { ListEditorField, type EntryDraft } from "./list-editor";
import { NumberField } from "./number";
import { SelectField } from "./select";

function signed(amount: number): string {
  return amount > 0 ? `+${amount}` : String(amount);
}

export class StatAmountsField extends ListEditorField<StatAmount, StatAmount[]> {
  protected entriesOf(value: StatAmount[] | null): StatAmount[] {
    return value ? [...value] : [];
  }

  protected valueOf(entries: StatAmount[]): StatAmount[] {
    return entries;
  }

  protected describeEntry({ stat, amount }: StatAmount): string {
    const name = stat.emoji ? `${stat.emoji} ${stat.name}` : stat.name;
    return `${name}: ${signed(amount)}`;
  }

  protected emptyText(): string {
    return this.t("*No stats*");
  }

  protected async createDraft(
    entries: readonly StatAmount[],
    session: FormSession,
  ): Promise<EntryDraft<StatAmount> | null> {
    const stats = await this.context.cluster.stats(this.context.origin);
    const available = stats.filter((stat) => !entries.some((entry) => entry.stat.id === stat.id));
    if (available.length === 0) {
      await session.notify(this.t("Every stat is already listed."), "info");
      return null;
    }

    const statField = new SelectField<StatRef>({
      name: "stat",
      label: this.t("Stat"),
      required: true,
      choices: available
        .slice(0, 100)
        .map((stat) => new Choice(stat.name, stat, { emoji: stat.emoji })),
    });
    const amountField = new NumberField({
      name: "amount",
      label: this.t("Amount"),
      required: true,
      placeholder: "Amount, can be negative.",
    });

    return {
      form: new Form({
        title: this.t("Add a stat"),
        fields: [statField, amountField],
        context: this.context,
      }),
      collect: () => {
        const [stat] = statField.selected();
        const amount = amountField.value;
        if (stat === undefined || amount === null) {
          return new ValidationError("The value is required.");
        }
        return [{ stat, amount }];
      },
    };
  }
}
