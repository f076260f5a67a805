/**
 * References to game entities that selection fields offer. The engine never
 * loads or stores them; the cluster lookup supplies them and collaborators
 * persist whatever the form resolves to.
 */

export interface RoleRef {
  id: string;
  name: string;
}

export interface CurrencyRef {
  id: number;
  name: string;
  symbol: string;
  emoji?: string;
}

export enum ItemType {
  Resource = 0,
  Consumable = 1,
  Currency = 2,
}

export interface ItemRef {
  id: number;
  name: string;
  type: ItemType;
  emoji?: string;
}

export interface StatRef {
  id: number;
  name: string;
  emoji?: string;
}

export interface AccessRule {
  role: RoleRef;
  haveAccess: boolean;
}

export interface StatAmount {
  stat: StatRef;
  amount: number;
}

export enum RewardType {
  Passive = 0,
  Active = 1,
  Equip = 2,
}

export const REWARD_TYPE_TEXT: Readonly<Record<RewardType, string>> = {
  [RewardType.Passive]: "Passive (when owned)",
  [RewardType.Active]: "Active (when used)",
  [RewardType.Equip]: "Equip (when equipped to the hotbar)",
};

export type Reward =
  | { kind: "item"; target: ItemRef; minAmount: number; maxAmount: number | null }
  | { kind: "stat"; target: StatRef; minAmount: number; maxAmount: number | null }
  | { kind: "role"; target: RoleRef; minAmount: number; maxAmount: number | null };

export type RewardKind = Reward["kind"];

export interface RewardPack {
  type: RewardType | null;
  luck: number;
  rewards: Reward[];
}
