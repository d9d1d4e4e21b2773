/**
 * Identifier of a kind of benefit, drawn from the `perkTypes` list of the
 * tier configuration (e.g. 'storage', 'guestPass').
 */
export type PerkType = string;

/**
 * Balance per perk type. A perk with no entry has a balance of 0.
 */
export type PerkBalances = Record<PerkType, number>;

/**
 * Perk type names that cannot be stored as plain object keys.
 */
export const RESERVED_PERK_TYPES: readonly PerkType[] = ['__proto__'];

export function isReservedPerkType(perkType: PerkType): boolean {
  return RESERVED_PERK_TYPES.includes(perkType);
}

/**
 * Balance held for `perkType`. Only own entries count, so names such as
 * 'constructor' or 'toString' read as 0 until granted.
 */
export function balanceIn(
  balances: Readonly<PerkBalances>,
  perkType: PerkType,
): number {
  return Object.hasOwn(balances, perkType) ? balances[perkType] : 0;
}
