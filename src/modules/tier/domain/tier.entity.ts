import type { PerkType } from '../../../shared/domain/perk.types';

/**
 * Rollover cap sentinel: every unused unit carries into the next period.
 */
export const UNBOUNDED = 'unbounded' as const;

export type RolloverCap = number | typeof UNBOUNDED;

/**
 * What one tier grants for one perk type each period.
 */
export interface PerkAllowance {
  /** Fresh units added on every refresh */
  readonly allotment: number;
  /** Most unused units that may carry over from the previous period */
  readonly rolloverCap: RolloverCap;
}

export type TierPerks = Readonly<Record<PerkType, PerkAllowance>>;

export interface TierDefinition {
  readonly id: string;
  readonly perks: TierPerks;
}

/**
 * Tier configuration data interface (what the loader hands to the domain)
 */
export interface TierConfigurationData {
  perkTypes: PerkType[];
  tiers: TierDefinition[];
}

export function isUnbounded(cap: RolloverCap): cap is typeof UNBOUNDED {
  return cap === UNBOUNDED;
}
