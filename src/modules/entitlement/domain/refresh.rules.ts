import {
  balanceIn,
  type PerkBalances,
  type PerkType,
} from '../../../shared/domain/perk.types';
import {
  comparePeriodKeys,
  monthsBetween,
  type PeriodKey,
} from '../../../shared/domain/period.utils';
import {
  isUnbounded,
  type RolloverCap,
  type TierPerks,
} from '../../tier/domain/tier.entity';

/**
 * Domain rules for monthly refreshes.
 * Pure functions: no clock, no ports, no mutation of their arguments.
 */

// ============ DUE-NESS ============

export type NoRefreshReason = 'CURRENT_PERIOD' | 'CLOCK_BEHIND_LEDGER';

export type RefreshDecision =
  | { due: true; monthsElapsed: number | null }
  | { due: false; reason: NoRefreshReason };

/**
 * A refresh is due when the ledger was never refreshed or the current period
 * is later than the last refreshed one. However many months were skipped, the
 * answer is a single refresh; `monthsElapsed` only reports the gap.
 *
 * A current period earlier than the ledger's means the clock went backwards.
 * That is never a refresh, so `lastRefreshed` cannot decrease.
 */
export function decideRefresh(
  lastRefreshed: PeriodKey | null,
  current: PeriodKey,
): RefreshDecision {
  if (lastRefreshed === null) {
    return { due: true, monthsElapsed: null };
  }

  const order = comparePeriodKeys(current, lastRefreshed);
  if (order === 0) {
    return { due: false, reason: 'CURRENT_PERIOD' };
  }
  if (order < 0) {
    return { due: false, reason: 'CLOCK_BEHIND_LEDGER' };
  }

  return { due: true, monthsElapsed: monthsBetween(lastRefreshed, current) };
}

// ============ ROLLOVER MATH ============

/**
 * Unused units carried into the next period. The cap applies to the carried
 * portion only; the fresh allotment is added on top of it.
 */
export function rolloverAmount(balance: number, cap: RolloverCap): number {
  const carried = Math.max(balance, 0);
  return isUnbounded(cap) ? carried : Math.min(carried, cap);
}

export interface RefreshPlan {
  /** Balances after the refresh, stale perks included unchanged */
  balances: PerkBalances;
  /** Units carried over per declared perk */
  rolledOver: PerkBalances;
  /** Perks with a positive balance that the tier does not declare */
  stalePerks: PerkType[];
}

/**
 * Compute post-refresh balances for one ledger under one tier.
 *
 * For every perk the tier declares: min(balance, cap) + allotment.
 * Perks the ledger holds but the tier does not declare are copied through
 * untouched (never capped, never dropped).
 */
export function planRefresh(
  balances: Readonly<PerkBalances>,
  perks: TierPerks,
): RefreshPlan {
  const next: PerkBalances = {};
  const rolledOver: PerkBalances = {};

  for (const [perkType, allowance] of Object.entries(perks)) {
    const carried = rolloverAmount(
      balanceIn(balances, perkType),
      allowance.rolloverCap,
    );
    rolledOver[perkType] = carried;
    next[perkType] = carried + allowance.allotment;
  }

  const stalePerks: PerkType[] = [];
  for (const [perkType, balance] of Object.entries(balances)) {
    if (Object.hasOwn(perks, perkType)) {
      continue;
    }
    next[perkType] = balance;
    if (balance > 0) {
      stalePerks.push(perkType);
    }
  }

  return { balances: next, rolledOver, stalePerks };
}
