import type { PerkBalances } from '../domain/perk.types';

/**
 * Port for telling a subscriber about their refreshed balances.
 *
 * This is a PORT - the refresh engine depends on this interface, not on the
 * delivery channel. The e-mail adapter lives in infrastructure.
 *
 * `onRefresh` is called synchronously right after a refresh is committed.
 * Implementations must not block: start the delivery and return.
 */
export interface NotificationPort {
  onRefresh(subscriberId: string, balances: Readonly<PerkBalances>): void;
}

export const NOTIFICATION_PORT = Symbol('NOTIFICATION_PORT');
