import { Choice } from "../choice";
import type { CurrencyRef, ItemRef, ItemType } from "../types";
import { SelectField, type SelectFieldOptions } from "./select";

type RefFieldOptions<T> = Omit<SelectFieldOptions<T>, "choices">;

/**
 * Select over entities identified by numeric id. Choices are looked up on
 * every ask; a previously chosen entity missing from the lookup stays
 * selectable.
 */
abstract class EntitySelectField<T extends { id: number; name: string; emoji?: string }>
  extends SelectField<T> {
  protected abstract lookup(): Promise<T[]>;

  protected isSameValue(a: T, b: T): boolean {
    return a.id === b.id;
  }

  protected describeValue(value: T): string {
    return value.emoji ? `${value.emoji} ${value.name}` : value.name;
  }

  protected async loadChoices(): Promise<readonly Choice<T>[]> {
    const found = await this.lookup();
    const missing = this.selected().filter(
      (chosen) => !found.some((entity) => this.isSameValue(entity, chosen)),
    );
    return [...found, ...missing].map(
      (entity) => new Choice(entity.name, entity, { emoji: entity.emoji }),
    );
  }
}

export class CurrencyField extends EntitySelectField<CurrencyRef> {
  constructor(options: RefFieldOptions<CurrencyRef>) {
    super(options);
  }

  protected lookup(): Promise<CurrencyRef[]> {
    return this.context.cluster.currencies(this.context.origin);
  }
}

export interface ItemFieldOptions extends RefFieldOptions<ItemRef> {
  /** Restricts the offered items; every type when omitted. */
  types?: readonly ItemType[];
}

export class ItemField extends EntitySelectField<ItemRef> {
  readonly types?: readonly ItemType[];

  constructor(options: ItemFieldOptions) {
    super(options);
    this.types = options.types;
  }

  protected async lookup(): Promise<ItemRef[]> {
    const items = await this.context.cluster.items(this.context.origin, this.types);
    const types = this.types;
    return types ? items.filter((item) => types.includes(item.type)) : items;
  }
}
