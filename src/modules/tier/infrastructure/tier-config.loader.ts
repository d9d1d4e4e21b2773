import { readFileSync } from 'fs';
import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import { InvalidTierConfigurationError } from '../../../shared/domain/errors';
import type { PerkType } from '../../../shared/domain/perk.types';
import { TierConfigDto } from '../application/dto/tier-config.dto';
import { TierConfiguration } from '../domain/tier-configuration';
import type {
  PerkAllowance,
  TierDefinition,
} from '../domain/tier.entity';

function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

function toTierDefinitions(dto: TierConfigDto): TierDefinition[] {
  const problems: string[] = [];

  const tiers = dto.tiers.map((tier) => {
    const perks: Record<PerkType, PerkAllowance> = {};
    const seen = new Set<PerkType>();
    for (const allowance of tier.perks) {
      if (seen.has(allowance.perkType)) {
        problems.push(
          `tier "${tier.id}" lists perk "${allowance.perkType}" more than once`,
        );
        continue;
      }
      seen.add(allowance.perkType);
      perks[allowance.perkType] = {
        allotment: allowance.allotment,
        rolloverCap: allowance.rolloverCap,
      };
    }
    return { id: tier.id, perks };
  });

  if (problems.length > 0) {
    throw new InvalidTierConfigurationError(problems);
  }
  return tiers;
}

/**
 * Validate raw (already JSON-parsed) configuration and build the tier table.
 *
 * Shape is checked by the DTO decorators; cross-references (declared perk
 * types, duplicate ids) are checked by TierConfiguration.create.
 *
 * @throws InvalidTierConfigurationError
 */
export function parseTierConfig(raw: unknown): TierConfiguration {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new InvalidTierConfigurationError([
      'configuration root must be an object',
    ]);
  }

  const dto = plainToInstance(TierConfigDto, raw);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    throw new InvalidTierConfigurationError(flattenValidationErrors(errors));
  }

  return TierConfiguration.create({
    perkTypes: dto.perkTypes,
    tiers: toTierDefinitions(dto),
  });
}

/**
 * Read and parse a tier configuration JSON file.
 * @throws InvalidTierConfigurationError when the file is unreadable or invalid
 */
export function loadTierConfigFile(path: string): TierConfiguration {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new InvalidTierConfigurationError([
      `cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  return parseTierConfig(raw);
}
