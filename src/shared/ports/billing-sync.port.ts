import type { PeriodKey } from '../domain/period.utils';

/**
 * Port for keeping the payment provider in step with entitlement refreshes.
 *
 * Implementations could be: an HTTP webhook, a Stripe metadata update, a
 * message on a queue. Called synchronously after the ledger is committed;
 * whatever I/O it does must happen in the background, with its own timeouts
 * and retries.
 */
export interface BillingSyncPort {
  onRefresh(subscriberId: string, period: PeriodKey): void;
}

export const BILLING_SYNC_PORT = Symbol('BILLING_SYNC_PORT');
