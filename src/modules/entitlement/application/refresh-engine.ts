import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { Clock } from '../../../shared/domain/clock.port';
import {
  PortFailureError,
  UnknownPerkError,
  type PortName,
} from '../../../shared/domain/errors';
import type { PerkBalances, PerkType } from '../../../shared/domain/perk.types';
import {
  formatPeriodKey,
  periodKeyOf,
  type PeriodKey,
} from '../../../shared/domain/period.utils';
import { BILLING_SYNC_PORT, NOTIFICATION_PORT } from '../../../shared/ports';
import type { BillingSyncPort, NotificationPort } from '../../../shared/ports';
import type { TierConfiguration } from '../../tier/domain/tier-configuration';
import type { EntitlementLedgerEntity } from '../domain/entitlement-ledger.entity';
import {
  decideRefresh,
  planRefresh,
  type NoRefreshReason,
} from '../domain/refresh.rules';

export type RefreshWarning = UnknownPerkError | PortFailureError;

/**
 * Outcome of one evaluation, discriminated on `kind`.
 */
export type RefreshResult =
  | {
      kind: 'NO_OP';
      reason: NoRefreshReason;
      period: PeriodKey;
      balances: PerkBalances;
      warnings: RefreshWarning[];
    }
  | {
      kind: 'REFRESHED';
      period: PeriodKey;
      previousPeriod: PeriodKey | null;
      /** null on the initial grant */
      monthsElapsed: number | null;
      balances: PerkBalances;
      rolledOver: PerkBalances;
      warnings: RefreshWarning[];
    };

export interface ConsumeResult {
  perkType: PerkType;
  amount: number;
  remaining: number;
}

/**
 * Refresh Engine
 *
 * Decides whether a ledger is due for its monthly refresh and applies it.
 * Everything runs synchronously: no awaits, no timers, no locks. A ledger
 * must not be evaluated by two callers at once.
 *
 * Order of operations in evaluate():
 * 1. Resolve the tier (UnknownTierError aborts before any mutation)
 * 2. Decide due-ness from the clock's period key
 * 3. Compute and commit the new balances
 * 4. Tell billing sync and notification ports (failures become warnings)
 *
 * Ports are optional so the engine can run with no outbound side effects.
 */
@Injectable()
export class RefreshEngine {
  private readonly logger = new Logger(RefreshEngine.name);

  constructor(
    @Optional()
    @Inject(BILLING_SYNC_PORT)
    private readonly billingSync?: BillingSyncPort,
    @Optional()
    @Inject(NOTIFICATION_PORT)
    private readonly notifications?: NotificationPort,
  ) {}

  /**
   * @throws UnknownTierError if the ledger's tier is not configured; the
   *   ledger is left untouched
   */
  evaluate(
    ledger: EntitlementLedgerEntity,
    config: TierConfiguration,
    clock: Clock,
  ): RefreshResult {
    const now = clock.now();
    const period = periodKeyOf(now);

    // 1. Resolve tier first: an unknown tier fails even when no refresh is due
    const perks = config.perksFor(ledger.tierId);

    // 2. Due-ness
    const previousPeriod = ledger.lastRefreshed;
    const decision = decideRefresh(previousPeriod, period);

    if (!decision.due) {
      if (decision.reason === 'CLOCK_BEHIND_LEDGER' && previousPeriod) {
        this.logger.warn(
          `Clock period ${formatPeriodKey(period)} is before last refresh ` +
            `${formatPeriodKey(previousPeriod)} for subscriber ${ledger.subscriberId}; skipping`,
        );
      } else {
        this.logger.debug(
          `No refresh due for subscriber ${ledger.subscriberId} in ${formatPeriodKey(period)}`,
        );
      }

      return {
        kind: 'NO_OP',
        reason: decision.reason,
        period,
        balances: ledger.balances,
        warnings: [],
      };
    }

    // 3. Compute and commit
    const plan = planRefresh(ledger.balances, perks);

    const warnings: RefreshWarning[] = plan.stalePerks.map(
      (perkType) =>
        new UnknownPerkError(ledger.tierId, perkType, ledger.balanceOf(perkType)),
    );
    for (const warning of warnings) {
      this.logger.warn(`Subscriber ${ledger.subscriberId}: ${warning.message}`);
    }

    ledger.applyRefresh(plan.balances, period, now, {
      tierId: ledger.tierId,
      rolledOver: plan.rolledOver,
    });

    this.logger.log(
      `Refreshed subscriber ${ledger.subscriberId} (${ledger.tierId}) for ${formatPeriodKey(period)}` +
        (decision.monthsElapsed !== null && decision.monthsElapsed > 1
          ? `, ${decision.monthsElapsed} months since last refresh`
          : ''),
    );

    // 4. Outbound ports. The ledger is already committed; failures are advisory.
    const billingSync = this.billingSync;
    if (billingSync) {
      this.callPort('billing-sync', ledger.subscriberId, warnings, () =>
        billingSync.onRefresh(ledger.subscriberId, { ...period }),
      );
    }

    const notifications = this.notifications;
    if (notifications) {
      this.callPort('notification', ledger.subscriberId, warnings, () =>
        notifications.onRefresh(ledger.subscriberId, ledger.balances),
      );
    }

    return {
      kind: 'REFRESHED',
      period,
      previousPeriod,
      monthsElapsed: decision.monthsElapsed,
      balances: ledger.balances,
      rolledOver: plan.rolledOver,
      warnings,
    };
  }

  /**
   * Debit a perk. The clock only timestamps the audit entry.
   * @throws InvalidAmountError | InactiveSubscriberError | InsufficientBalanceError
   *   with the ledger unchanged
   */
  consume(
    ledger: EntitlementLedgerEntity,
    perkType: PerkType,
    amount: number,
    clock: Clock,
  ): ConsumeResult {
    const remaining = ledger.consume(perkType, amount, clock.now());

    this.logger.debug(
      `Subscriber ${ledger.subscriberId} consumed ${amount} ${perkType}, ${remaining} left`,
    );

    return { perkType, amount, remaining };
  }

  private callPort(
    port: PortName,
    subscriberId: string,
    warnings: RefreshWarning[],
    call: () => void,
  ): void {
    try {
      call();
    } catch (error) {
      const failure = new PortFailureError(port, subscriberId, error);
      warnings.push(failure);
      this.logger.warn(failure.message);
    }
  }
}
