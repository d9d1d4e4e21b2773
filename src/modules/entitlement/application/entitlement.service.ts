import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Clock } from '../../../shared/domain/clock.port';
import { CLOCK } from '../../../shared/domain/clock.port';
import {
  InactiveSubscriberError,
  InsufficientBalanceError,
  InvalidAmountError,
  SubscriberAlreadyEnrolledError,
  SubscriberNotFoundError,
} from '../../../shared/domain/errors';
import type { PerkType } from '../../../shared/domain/perk.types';
import {
  TIER_CONFIGURATION,
  type TierConfiguration,
} from '../../tier/domain/tier-configuration';
import {
  EntitlementLedgerEntity,
  type LedgerData,
} from '../domain/entitlement-ledger.entity';
import {
  RefreshEngine,
  type ConsumeResult,
  type RefreshResult,
} from './refresh-engine';

/**
 * Result type using discriminated union for explicit error handling
 */
export type ConsumePerkResult =
  | { success: true; consumed: ConsumeResult }
  | { success: false; error: ConsumePerkError };

export type ConsumePerkError =
  | { code: 'SUBSCRIBER_NOT_FOUND'; message: string }
  | { code: 'SUBSCRIBER_INACTIVE'; message: string }
  | { code: 'INSUFFICIENT_BALANCE'; message: string }
  | { code: 'INVALID_AMOUNT'; message: string };

export interface RefreshAllResult {
  processedCount: number;
  refreshedCount: number;
  noOpCount: number;
  warningCount: number;
  errors: Array<{ subscriberId: string; error: string }>;
}

/**
 * EntitlementService
 *
 * Keeps one ledger per subscriber in process memory and runs every
 * operation through the RefreshEngine with the injected clock and tier
 * configuration. Nothing here survives a restart.
 *
 * All methods are synchronous, so two calls never interleave on the same
 * ledger.
 */
@Injectable()
export class EntitlementService {
  private readonly logger = new Logger(EntitlementService.name);
  private readonly ledgers = new Map<string, EntitlementLedgerEntity>();

  constructor(
    private readonly engine: RefreshEngine,
    @Inject(TIER_CONFIGURATION)
    private readonly config: TierConfiguration,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * Open a ledger and grant the first month's allotment.
   * @throws UnknownTierError | SubscriberAlreadyEnrolledError
   */
  enroll(subscriberId: string, tierId: string): RefreshResult {
    if (this.ledgers.has(subscriberId)) {
      throw new SubscriberAlreadyEnrolledError(subscriberId);
    }

    const perks = this.config.perksFor(tierId);
    const ledger = EntitlementLedgerEntity.open({
      subscriberId,
      tierId,
      perkTypes: Object.keys(perks),
      now: this.clock.now(),
    });

    const result = this.engine.evaluate(ledger, this.config, this.clock);
    this.ledgers.set(subscriberId, ledger);

    this.logger.log(`Enrolled subscriber ${subscriberId} on tier ${tierId}`);
    return result;
  }

  getLedger(subscriberId: string): LedgerData {
    return this.find(subscriberId).toData();
  }

  refresh(subscriberId: string): RefreshResult {
    return this.engine.evaluate(this.find(subscriberId), this.config, this.clock);
  }

  /**
   * Debit a perk after bringing the ledger up to the current period, so a
   * subscriber never spends last month's balance in a new month.
   */
  consume(
    subscriberId: string,
    perkType: PerkType,
    amount: number,
  ): ConsumePerkResult {
    const ledger = this.ledgers.get(subscriberId);

    if (!ledger) {
      return {
        success: false,
        error: {
          code: 'SUBSCRIBER_NOT_FOUND',
          message: new SubscriberNotFoundError(subscriberId).message,
        },
      };
    }

    try {
      this.engine.evaluate(ledger, this.config, this.clock);
      const consumed = this.engine.consume(ledger, perkType, amount, this.clock);
      return { success: true, consumed };
    } catch (error) {
      return this.mapDomainError(error);
    }
  }

  /**
   * Switch tiers. Balances are left alone; the new tier's allotments and
   * caps apply from the next refresh.
   * @throws SubscriberNotFoundError | UnknownTierError
   */
  changeTier(subscriberId: string, tierId: string): LedgerData {
    const ledger = this.find(subscriberId);

    // throws UnknownTierError before anything changes
    this.config.perksFor(tierId);

    const previousTierId = ledger.tierId;
    ledger.changeTier(tierId, this.clock.now());

    if (previousTierId !== tierId) {
      this.logger.log(
        `Subscriber ${subscriberId} moved from ${previousTierId} to ${tierId}`,
      );
    }
    return ledger.toData();
  }

  setActive(subscriberId: string, active: boolean): LedgerData {
    const ledger = this.find(subscriberId);
    ledger.setActive(active, this.clock.now());
    return ledger.toData();
  }

  /**
   * Drop the ledger and hand back its final state.
   */
  unenroll(subscriberId: string): LedgerData {
    const ledger = this.find(subscriberId);
    this.ledgers.delete(subscriberId);

    this.logger.log(`Unenrolled subscriber ${subscriberId}`);
    return ledger.toData();
  }

  /**
   * Evaluate every ledger in turn. A failing ledger is recorded and skipped.
   */
  refreshAll(): RefreshAllResult {
    const result: RefreshAllResult = {
      processedCount: 0,
      refreshedCount: 0,
      noOpCount: 0,
      warningCount: 0,
      errors: [],
    };

    for (const [subscriberId, ledger] of this.ledgers) {
      result.processedCount++;

      try {
        const outcome = this.engine.evaluate(ledger, this.config, this.clock);

        if (outcome.kind === 'REFRESHED') {
          result.refreshedCount++;
        } else {
          result.noOpCount++;
        }
        result.warningCount += outcome.warnings.length;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.errors.push({ subscriberId, error: message });
        this.logger.error(
          `Failed to refresh subscriber ${subscriberId}: ${message}`,
        );
      }
    }

    return result;
  }

  private find(subscriberId: string): EntitlementLedgerEntity {
    const ledger = this.ledgers.get(subscriberId);
    if (!ledger) {
      throw new SubscriberNotFoundError(subscriberId);
    }
    return ledger;
  }

  private mapDomainError(error: unknown): {
    success: false;
    error: ConsumePerkError;
  } {
    if (error instanceof InactiveSubscriberError) {
      return {
        success: false,
        error: { code: 'SUBSCRIBER_INACTIVE', message: error.message },
      };
    }

    if (error instanceof InsufficientBalanceError) {
      return {
        success: false,
        error: { code: 'INSUFFICIENT_BALANCE', message: error.message },
      };
    }

    if (error instanceof InvalidAmountError) {
      return {
        success: false,
        error: { code: 'INVALID_AMOUNT', message: error.message },
      };
    }

    // Unknown error - rethrow
    throw error;
  }
}
