import {
  InvalidTierConfigurationError,
  UnknownTierError,
} from '../../../shared/domain/errors';
import {
  isReservedPerkType,
  type PerkType,
} from '../../../shared/domain/perk.types';
import {
  isUnbounded,
  type PerkAllowance,
  type TierConfigurationData,
  type TierPerks,
} from './tier.entity';

export const TIER_CONFIGURATION = Symbol('TIER_CONFIGURATION');

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Immutable table of tiers, keyed by tier id.
 *
 * Every tier is a plain data record consumed by the same refresh algorithm;
 * there is no per-tier behaviour. Built once at startup and never mutated,
 * so it can be shared by every evaluation in the process.
 */
export class TierConfiguration {
  readonly perkTypes: readonly PerkType[];
  private readonly tiers: ReadonlyMap<string, TierPerks>;

  private constructor(
    perkTypes: readonly PerkType[],
    tiers: ReadonlyMap<string, TierPerks>,
  ) {
    this.perkTypes = perkTypes;
    this.tiers = tiers;
  }

  /**
   * Validate and freeze a configuration.
   * @throws InvalidTierConfigurationError listing every problem found
   */
  static create(data: TierConfigurationData): TierConfiguration {
    const problems: string[] = [];
    const declared = new Set<PerkType>();

    for (const perkType of data.perkTypes) {
      if (perkType.trim() === '') {
        problems.push('perk types must be non-empty strings');
      } else if (isReservedPerkType(perkType)) {
        problems.push(`perk type "${perkType}" is reserved`);
      } else if (declared.has(perkType)) {
        problems.push(`perk type "${perkType}" is declared more than once`);
      } else {
        declared.add(perkType);
      }
    }

    const tiers = new Map<string, TierPerks>();

    for (const tier of data.tiers) {
      if (tier.id.trim() === '') {
        problems.push('tier ids must be non-empty strings');
        continue;
      }
      if (tiers.has(tier.id)) {
        problems.push(`tier "${tier.id}" is defined more than once`);
        continue;
      }

      const perks: Record<PerkType, PerkAllowance> = {};
      for (const [perkType, allowance] of Object.entries(tier.perks)) {
        const where = `tier "${tier.id}" perk "${perkType}"`;

        if (isReservedPerkType(perkType)) {
          problems.push(`${where} uses a reserved name`);
          continue;
        }

        if (!declared.has(perkType)) {
          problems.push(`${where} is not a declared perk type`);
        }
        if (!isNonNegativeInteger(allowance.allotment)) {
          problems.push(`${where} allotment must be a non-negative integer`);
        }
        if (
          !isUnbounded(allowance.rolloverCap) &&
          !isNonNegativeInteger(allowance.rolloverCap)
        ) {
          problems.push(
            `${where} rolloverCap must be a non-negative integer or "unbounded"`,
          );
        }

        perks[perkType] = Object.freeze({
          allotment: allowance.allotment,
          rolloverCap: allowance.rolloverCap,
        });
      }

      tiers.set(tier.id, Object.freeze(perks));
    }

    if (problems.length > 0) {
      throw new InvalidTierConfigurationError(problems);
    }

    return new TierConfiguration(Object.freeze([...declared]), tiers);
  }

  /**
   * Allotment and rollover cap for every perk the tier grants.
   * @throws UnknownTierError if the tier is not configured
   */
  perksFor(tierId: string): TierPerks {
    const perks = this.tiers.get(tierId);
    if (!perks) {
      throw new UnknownTierError(tierId);
    }
    return perks;
  }

  hasTier(tierId: string): boolean {
    return this.tiers.has(tierId);
  }

  tierIds(): string[] {
    return Array.from(this.tiers.keys());
  }

  isPerkType(value: string): boolean {
    return this.perkTypes.includes(value);
  }
}
