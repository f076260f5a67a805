import { Emoji } from "@/modules/ui/design-system";
import { Choice } from "../choice";
import { ValidationError } from "../errors";
import { Form } from "../form";
import type { FormSession } from "../session";
import type { AccessRule, RoleRef } from "../types";
import { ListEditorField, type EntryDraft } from "./list-editor";
import { SelectField } from "./select";

/** Which roles may (or may not) use something. One rule per role. */
export class AccessRulesField extends ListEditorField<AccessRule, AccessRule[]> {
  protected entriesOf(value: AccessRule[] | null): AccessRule[] {
    return value ? [...value] : [];
  }

  protected valueOf(entries: AccessRule[]): AccessRule[] {
    return entries;
  }

  protected describeEntry(rule: AccessRule): string {
    return `${rule.haveAccess ? Emoji.success : Emoji.error} ${rule.role.name}`;
  }

  protected emptyText(): string {
    return this.t("*No access rules*");
  }

  protected async createDraft(
    entries: readonly AccessRule[],
    session: FormSession,
  ): Promise<EntryDraft<AccessRule> | null> {
    const roles = await this.context.cluster.roles(this.context.origin);
    const available = roles.filter((role) => !entries.some((rule) => rule.role.id === role.id));
    if (available.length === 0) {
      await session.notify(this.t("Every role already has a rule."), "info");
      return null;
    }

    const access = new SelectField<boolean>({
      name: "have_access",
      label: this.t("Access"),
      required: true,
      choices: [
        new Choice(this.t("Have access"), true),
        new Choice(this.t("Don't have access"), false),
      ],
    });
    const targets = new SelectField<RoleRef>({
      name: "roles",
      label: this.t("Roles"),
      required: true,
      maxValues: -1,
      choices: available.slice(0, 100).map((role) => new Choice(role.name, role)),
    });

    return {
      form: new Form({
        title: this.t("Add an access rule"),
        fields: [access, targets],
        context: this.context,
      }),
      collect: () => {
        const [haveAccess] = access.selected();
        const picked = targets.selected();
        if (haveAccess === undefined || picked.length === 0) {
          return new ValidationError("The value is required.");
        }
        return picked.map((role) => ({ role, haveAccess }));
      },
    };
  }
}
