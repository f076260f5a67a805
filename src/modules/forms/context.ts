import { formatMessage, type Translate } from "./i18n";
import { formsLogger, type FormsLogger } from "./logger";
import type { CurrencyRef, ItemRef, ItemType, RoleRef, StatRef } from "./types";

/** Where the interaction that opened a form came from. */
export interface FormOrigin {
  userId: string;
  guildId?: string;
  channelId?: string;
}

/**
 * Scoping lookup for selection fields: the entities of the game cluster the
 * origin belongs to.
 */
export interface ClusterLookup {
  currencies(origin: FormOrigin): Promise<CurrencyRef[]>;
  items(origin: FormOrigin, types?: readonly ItemType[]): Promise<ItemRef[]>;
  roles(origin: FormOrigin): Promise<RoleRef[]>;
  stats(origin: FormOrigin): Promise<StatRef[]>;
}

/** Collaborators injected into forms and their fields. */
export interface FormContext {
  translate: Translate;
  logger: FormsLogger;
  cluster: ClusterLookup;
  origin: FormOrigin;
}

export const emptyCluster: ClusterLookup = {
  currencies: async () => [],
  items: async () => [],
  roles: async () => [],
  stats: async () => [],
};

export function createFormContext(overrides: Partial<FormContext> = {}): FormContext {
  return {
    translate: overrides.translate ?? formatMessage,
    logger: overrides.logger ?? formsLogger,
    cluster: overrides.cluster ?? emptyCluster,
    origin: overrides.origin ?? { userId: "0" },
  };
}
