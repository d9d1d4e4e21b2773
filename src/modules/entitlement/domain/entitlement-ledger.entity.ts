import {
  InactiveSubscriberError,
  InsufficientBalanceError,
  InvalidAmountError,
  PeriodRegressionError,
} from '../../../shared/domain/errors';
import {
  balanceIn,
  isReservedPerkType,
  type PerkBalances,
  type PerkType,
} from '../../../shared/domain/perk.types';
import {
  formatPeriodKey,
  isPeriodBefore,
  type PeriodKey,
} from '../../../shared/domain/period.utils';

export type { PerkBalances } from '../../../shared/domain/perk.types';

export type AuditAction =
  | 'enrolled'
  | 'period_refreshed'
  | 'perk_consumed'
  | 'tier_changed'
  | 'status_changed';

export interface AuditEntry {
  at: Date;
  action: AuditAction;
  details: Record<string, unknown>;
}

/**
 * Ledger data interface (for persistence/transfer)
 */
export interface LedgerData {
  subscriberId: string;
  tierId: string;
  balances: PerkBalances;
  lastRefreshed: PeriodKey | null;
  active: boolean;
  auditLog: AuditEntry[];
}

function copyAuditLog(entries: readonly AuditEntry[]): AuditEntry[] {
  return entries.map((entry) => ({ ...entry, details: { ...entry.details } }));
}

/**
 * Own-key copy of `balances`.
 * @throws RangeError on a reserved perk type or a balance that is not a
 *   non-negative integer
 */
function checkedBalances(balances: Readonly<PerkBalances>): PerkBalances {
  const entries = Object.entries(balances);

  for (const [perkType, balance] of entries) {
    if (isReservedPerkType(perkType)) {
      throw new RangeError(`"${perkType}" cannot be used as a perk type`);
    }
    if (!Number.isInteger(balance) || balance < 0) {
      throw new RangeError(
        `Balance for "${perkType}" must be a non-negative integer, got ${balance}`,
      );
    }
  }

  return Object.fromEntries(entries);
}

export interface OpenLedgerInput {
  subscriberId: string;
  tierId: string;
  /** Perk types to start at an explicit 0 balance */
  perkTypes?: readonly PerkType[];
  now: Date;
}

/**
 * Entitlement Ledger Entity - per-subscriber balances and refresh history.
 *
 * Owned by the caller. The refresh engine mutates it for the duration of a
 * single call and keeps no reference afterwards.
 */
export class EntitlementLedgerEntity {
  readonly subscriberId: string;

  private _tierId: string;
  private _balances: PerkBalances;
  private _lastRefreshed: PeriodKey | null;
  private _active: boolean;
  private readonly _auditLog: AuditEntry[];

  /**
   * @throws RangeError if a balance is not a non-negative integer
   */
  constructor(data: LedgerData) {
    this.subscriberId = data.subscriberId;
    this._tierId = data.tierId;
    this._balances = checkedBalances(data.balances);
    this._lastRefreshed = data.lastRefreshed ? { ...data.lastRefreshed } : null;
    this._active = data.active;
    this._auditLog = copyAuditLog(data.auditLog);
  }

  /**
   * New subscription: zero balances, never refreshed.
   */
  static open(input: OpenLedgerInput): EntitlementLedgerEntity {
    const balances: PerkBalances = Object.fromEntries(
      (input.perkTypes ?? []).map((perkType) => [perkType, 0]),
    );

    return new EntitlementLedgerEntity({
      subscriberId: input.subscriberId,
      tierId: input.tierId,
      balances,
      lastRefreshed: null,
      active: true,
      auditLog: [
        {
          at: input.now,
          action: 'enrolled',
          details: { tierId: input.tierId },
        },
      ],
    });
  }

  // ============ GETTERS ============

  get tierId(): string {
    return this._tierId;
  }

  get lastRefreshed(): PeriodKey | null {
    return this._lastRefreshed;
  }

  get active(): boolean {
    return this._active;
  }

  /** Copy of the current balances */
  get balances(): PerkBalances {
    return { ...this._balances };
  }

  /** Copy of the audit trail */
  get auditLog(): readonly AuditEntry[] {
    return copyAuditLog(this._auditLog);
  }

  balanceOf(perkType: PerkType): number {
    return balanceIn(this._balances, perkType);
  }

  // ============ DOMAIN METHODS ============

  /**
   * Replace balances with the outcome of a refresh and move the ledger to
   * `period`.
   * @throws PeriodRegressionError if `period` is earlier than the last refresh
   * @throws RangeError if a balance is not a non-negative integer or a perk
   *   type is reserved
   */
  applyRefresh(
    balances: PerkBalances,
    period: PeriodKey,
    now: Date,
    details: Record<string, unknown> = {},
  ): void {
    if (this._lastRefreshed && isPeriodBefore(period, this._lastRefreshed)) {
      throw new PeriodRegressionError(
        formatPeriodKey(this._lastRefreshed),
        formatPeriodKey(period),
      );
    }

    const next = checkedBalances(balances);

    this._balances = next;
    this._lastRefreshed = { year: period.year, month: period.month };
    this.record(now, 'period_refreshed', {
      period: formatPeriodKey(period),
      balances: { ...next },
      ...details,
    });
  }

  /**
   * Debit `amount` units of a perk. All or nothing.
   * @throws InvalidAmountError if amount is not a positive integer
   * @throws InactiveSubscriberError if the ledger is inactive
   * @throws InsufficientBalanceError if amount exceeds the balance
   * @returns the remaining balance
   */
  consume(perkType: PerkType, amount: number, now: Date): number {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new InvalidAmountError(amount);
    }

    this.ensureActive();

    const available = this.balanceOf(perkType);
    if (amount > available) {
      throw new InsufficientBalanceError(perkType, amount, available);
    }

    // available > 0, so perkType is already an own key
    const remaining = available - amount;
    this._balances[perkType] = remaining;
    this.record(now, 'perk_consumed', { perkType, amount, remaining });

    return remaining;
  }

  /**
   * Point the ledger at another tier. Balances are left as they are; the
   * next refresh applies the new tier's allotments and caps.
   */
  changeTier(tierId: string, now: Date): void {
    if (tierId === this._tierId) {
      return;
    }

    const previousTierId = this._tierId;
    this._tierId = tierId;
    this.record(now, 'tier_changed', { previousTierId, tierId });
  }

  setActive(active: boolean, now: Date): void {
    if (active === this._active) {
      return;
    }

    this._active = active;
    this.record(now, 'status_changed', { active });
  }

  // ============ GUARD METHODS ============

  /**
   * @throws InactiveSubscriberError if the ledger is inactive
   */
  ensureActive(): void {
    if (!this._active) {
      throw new InactiveSubscriberError(this.subscriberId);
    }
  }

  private record(
    at: Date,
    action: AuditAction,
    details: Record<string, unknown>,
  ): void {
    this._auditLog.push({ at, action, details });
  }

  // ============ SERIALIZATION ============

  toData(): LedgerData {
    return {
      subscriberId: this.subscriberId,
      tierId: this._tierId,
      balances: { ...this._balances },
      lastRefreshed: this._lastRefreshed ? { ...this._lastRefreshed } : null,
      active: this._active,
      auditLog: copyAuditLog(this._auditLog),
    };
  }

  static fromData(data: LedgerData): EntitlementLedgerEntity {
    return new EntitlementLedgerEntity(data);
  }
}
