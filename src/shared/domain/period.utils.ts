/**
 * Calendar-month period keys.
 *
 * All period math is done in UTC so that a refresh boundary does not move
 * with the server's timezone. A subscriber evaluated at 23:30 local time on
 * the last day of a month is in whatever month UTC says it is.
 */

export interface PeriodKey {
  readonly year: number;
  /** 1 = January, 12 = December */
  readonly month: number;
}


/**
 * Period key of the UTC calendar month containing `instant`.
 */
export function periodKeyOf(instant: Date): PeriodKey {
  return {
    year: instant.getUTCFullYear(),
    month: instant.getUTCMonth() + 1,
  };
}

/**
 * Negative if a is earlier, positive if a is later, 0 if same month.
 */
export function comparePeriodKeys(a: PeriodKey, b: PeriodKey): number {
  if (a.year !== b.year) {
    return a.year - b.year;
  }
  return a.month - b.month;
}

export function isPeriodBefore(a: PeriodKey, b: PeriodKey): boolean {
  return comparePeriodKeys(a, b) < 0;
}

/**
 * Number of month boundaries crossed going from `from` to `to`.
 * Negative when `to` is earlier.
 */
export function monthsBetween(from: PeriodKey, to: PeriodKey): number {
  return (to.year - from.year) * 12 + (to.month - from.month);
}

/**
 * Format as YYYY-MM
 */
export function formatPeriodKey(period: PeriodKey): string {
  return `${String(period.year).padStart(4, '0')}-${String(period.month).padStart(2, '0')}`;
}

/**
 * Add calendar months to an instant in UTC, clamping the day to the end of
 * the target month (Jan 31 + 1 month = Feb 28/29).
 */
export function addMonthsUTC(instant: Date, months: number): Date {
  const targetMonthStart = new Date(
    Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth() + months, 1),
  );
  const lastDay = new Date(
    Date.UTC(
      targetMonthStart.getUTCFullYear(),
      targetMonthStart.getUTCMonth() + 1,
      0,
    ),
  ).getUTCDate();

  return new Date(
    Date.UTC(
      targetMonthStart.getUTCFullYear(),
      targetMonthStart.getUTCMonth(),
      Math.min(instant.getUTCDate(), lastDay),
      instant.getUTCHours(),
      instant.getUTCMinutes(),
      instant.getUTCSeconds(),
      instant.getUTCMilliseconds(),
    ),
  );
}

/**
 * Add days to an instant (UTC, so DST never shifts the result)
 */
export function addDays(instant: Date, days: number): Date {
  const result = new Date(instant);
  result.setUTCDate(result.getUTCDate() + days);
  return result;
}
