/**
 * Base class for domain errors.
 * Domain errors represent business rule violations.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============ TIER CONFIGURATION ERRORS ============

export class UnknownTierError extends DomainError {
  readonly code = 'UNKNOWN_TIER';

  constructor(public readonly tierId: string) {
    super(`Tier "${tierId}" is not configured`);
  }
}

export class InvalidTierConfigurationError extends DomainError {
  readonly code = 'INVALID_TIER_CONFIGURATION';

  constructor(public readonly problems: string[]) {
    super(`Invalid tier configuration: ${problems.join('; ')}`);
  }
}

// ============ LEDGER ERRORS ============

/**
 * A ledger holds a balance for a perk its tier no longer declares.
 * Reported as a refresh warning; the balance itself is left alone.
 */
export class UnknownPerkError extends DomainError {
  readonly code = 'UNKNOWN_PERK';

  constructor(
    public readonly tierId: string,
    public readonly perkType: string,
    public readonly balance: number,
  ) {
    super(
      `Perk "${perkType}" is not granted by tier "${tierId}"; keeping stale balance of ${balance}`,
    );
  }
}

export class InsufficientBalanceError extends DomainError {
  readonly code = 'INSUFFICIENT_BALANCE';

  constructor(
    public readonly perkType: string,
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(
      `Insufficient "${perkType}" balance: requested ${requested}, available ${available}`,
    );
  }
}

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';

  constructor(public readonly amount: number) {
    super(`Amount must be a positive integer, got ${amount}`);
  }
}

export class InactiveSubscriberError extends DomainError {
  readonly code = 'SUBSCRIBER_INACTIVE';

  constructor(public readonly subscriberId: string) {
    super(`Subscriber ${subscriberId} is not active and cannot use perks`);
  }
}

export class PeriodRegressionError extends DomainError {
  readonly code = 'PERIOD_REGRESSION';

  constructor(
    public readonly lastRefreshed: string,
    public readonly attempted: string,
  ) {
    super(
      `Cannot refresh for ${attempted}: ledger was already refreshed for ${lastRefreshed}`,
    );
  }
}

// ============ PORT ERRORS ============

export type PortName = 'billing-sync' | 'notification';

/**
 * An outbound port threw while being told about a committed refresh.
 */
export class PortFailureError extends DomainError {
  readonly code = 'PORT_FAILURE';

  constructor(
    public readonly port: PortName,
    public readonly subscriberId: string,
    public readonly failure: unknown,
  ) {
    super(
      `${port} port failed for subscriber ${subscriberId}: ${
        failure instanceof Error ? failure.message : String(failure)
      }`,
    );
  }
}

// ============ REGISTRY ERRORS ============

export class SubscriberNotFoundError extends DomainError {
  readonly code = 'SUBSCRIBER_NOT_FOUND';

  constructor(public readonly subscriberId: string) {
    super(`Subscriber ${subscriberId} not found`);
  }
}

export class SubscriberAlreadyEnrolledError extends DomainError {
  readonly code = 'SUBSCRIBER_ALREADY_ENROLLED';

  constructor(public readonly subscriberId: string) {
    super(`Subscriber ${subscriberId} is already enrolled`);
  }
}
