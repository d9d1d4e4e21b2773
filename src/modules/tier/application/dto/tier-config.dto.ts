import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNotIn,
  IsString,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { RESERVED_PERK_TYPES } from '../../../../shared/domain/perk.types';
import { UNBOUNDED, type RolloverCap } from '../../domain/tier.entity';

export class PerkAllowanceDto {
  @IsString()
  @IsNotEmpty()
  @IsNotIn([...RESERVED_PERK_TYPES], { message: '$property must not be "__proto__"' })
  perkType!: string;

  @IsInt()
  @Min(0)
  allotment!: number;

  @ValidateIf((allowance: PerkAllowanceDto) => allowance.rolloverCap !== UNBOUNDED)
  @IsInt({ message: 'rolloverCap must be a non-negative integer or "unbounded"' })
  @Min(0)
  rolloverCap!: RolloverCap;
}

export class TierDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PerkAllowanceDto)
  perks!: PerkAllowanceDto[];
}

export class TierConfigDto {
  @IsArray()
  @ArrayMinSize(1)
  @IsString({ each: true })
  @IsNotIn([...RESERVED_PERK_TYPES], {
    each: true,
    message: '$property must not contain "__proto__"',
  })
  perkTypes!: string[];

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => TierDto)
  tiers!: TierDto[];
}
