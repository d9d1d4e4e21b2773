import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { EntitlementService } from './entitlement.service';
import { RefreshEngine } from './refresh-engine';
import { CLOCK } from '../../../shared/domain/clock.port';
import { BILLING_SYNC_PORT, NOTIFICATION_PORT } from '../../../shared/ports';
import {
  SubscriberAlreadyEnrolledError,
  SubscriberNotFoundError,
  UnknownTierError,
} from '../../../shared/domain/errors';
import { FakeClock } from '../../../shared/testing/fake-clock';
import {
  RecordingBillingSync,
  RecordingNotifier,
} from '../../../shared/testing/recording-ports';
import {
  TIER_CONFIGURATION,
  TierConfiguration,
} from '../../tier/domain/tier-configuration';

describe('EntitlementService', () => {
  let service: EntitlementService;
  let engine: RefreshEngine;
  let clock: FakeClock;
  let billing: RecordingBillingSync;
  let notifier: RecordingNotifier;

  const config = TierConfiguration.create({
    perkTypes: ['perk', 'storage'],
    tiers: [
      { id: 'Bronze', perks: { perk: { allotment: 1, rolloverCap: 0 } } },
      {
        id: 'Gold',
        perks: {
          perk: { allotment: 4, rolloverCap: 4 },
          storage: { allotment: 100, rolloverCap: 50 },
        },
      },
    ],
  });

  beforeEach(async () => {
    clock = new FakeClock('2024-01-15T10:00:00Z');
    billing = new RecordingBillingSync();
    notifier = new RecordingNotifier();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EntitlementService,
        RefreshEngine,
        { provide: TIER_CONFIGURATION, useValue: config },
        { provide: CLOCK, useValue: clock },
        { provide: BILLING_SYNC_PORT, useValue: billing },
        { provide: NOTIFICATION_PORT, useValue: notifier },
      ],
    }).compile();

    service = module.get<EntitlementService>(EntitlementService);
    engine = module.get<RefreshEngine>(RefreshEngine);
  });

  describe('enroll', () => {
    it('should open a ledger and grant the first allotment', () => {
      const result = service.enroll('sub-1', 'Gold');

      expect(result.kind).toBe('REFRESHED');
      expect(service.getLedger('sub-1')).toMatchObject({
        subscriberId: 'sub-1',
        tierId: 'Gold',
        balances: { perk: 4, storage: 100 },
        lastRefreshed: { year: 2024, month: 1 },
        active: true,
      });
      expect(billing.calls).toEqual([
        { subscriberId: 'sub-1', period: { year: 2024, month: 1 } },
      ]);
    });

    it('should record enrollment and the initial grant in the audit log', () => {
      service.enroll('sub-1', 'Bronze');

      expect(service.getLedger('sub-1').auditLog.map((e) => e.action)).toEqual([
        'enrolled',
        'period_refreshed',
      ]);
    });

    it('should reject an unknown tier without registering the subscriber', () => {
      expect(() => service.enroll('sub-1', 'Diamond')).toThrow(UnknownTierError);
      expect(() => service.getLedger('sub-1')).toThrow(SubscriberNotFoundError);
    });

    it('should reject a second enrollment', () => {
      service.enroll('sub-1', 'Gold');

      expect(() => service.enroll('sub-1', 'Bronze')).toThrow(
        SubscriberAlreadyEnrolledError,
      );
      expect(service.getLedger('sub-1').tierId).toBe('Gold');
    });
  });

  describe('getLedger', () => {
    it('should throw for an unknown subscriber', () => {
      expect(() => service.getLedger('nobody')).toThrow(SubscriberNotFoundError);
    });

    it('should return a snapshot that does not alias the ledger', () => {
      service.enroll('sub-1', 'Gold');

      service.getLedger('sub-1').balances.perk = 99;

      expect(service.getLedger('sub-1').balances.perk).toBe(4);
    });
  });

  describe('refresh', () => {
    it('should be a no-op within the enrollment month', () => {
      service.enroll('sub-1', 'Gold');

      expect(service.refresh('sub-1')).toMatchObject({
        kind: 'NO_OP',
        reason: 'CURRENT_PERIOD',
      });
    });

    it('should roll over into the next month', () => {
      service.enroll('sub-1', 'Gold');
      service.consume('sub-1', 'storage', 30);
      clock.advanceTo('2024-02-01T00:00:00Z');

      const result = service.refresh('sub-1');

      expect(result.kind).toBe('REFRESHED');
      expect(result.balances).toEqual({ perk: 8, storage: 150 });
    });
  });

  describe('consume', () => {
    it('should debit and return the remaining balance', () => {
      service.enroll('sub-1', 'Gold');

      expect(service.consume('sub-1', 'storage', 30)).toEqual({
        success: true,
        consumed: { perkType: 'storage', amount: 30, remaining: 70 },
      });
    });

    it('should refresh first when a new month has started', () => {
      service.enroll('sub-1', 'Bronze');
      service.consume('sub-1', 'perk', 1);
      clock.advanceTo('2024-02-02T00:00:00Z');

      const result = service.consume('sub-1', 'perk', 1);

      expect(result).toEqual({
        success: true,
        consumed: { perkType: 'perk', amount: 1, remaining: 0 },
      });
      expect(service.getLedger('sub-1').lastRefreshed).toEqual({
        year: 2024,
        month: 2,
      });
    });

    it('should return SUBSCRIBER_NOT_FOUND for an unknown subscriber', () => {
      expect(service.consume('nobody', 'perk', 1)).toEqual({
        success: false,
        error: {
          code: 'SUBSCRIBER_NOT_FOUND',
          message: 'Subscriber nobody not found',
        },
      });
    });

    it('should return INSUFFICIENT_BALANCE and leave the balance alone', () => {
      service.enroll('sub-1', 'Bronze');

      expect(service.consume('sub-1', 'perk', 2)).toEqual({
        success: false,
        error: {
          code: 'INSUFFICIENT_BALANCE',
          message: 'Insufficient "perk" balance: requested 2, available 1',
        },
      });
      expect(service.getLedger('sub-1').balances.perk).toBe(1);
    });

    it.each(['storage', 'constructor', 'toString'])(
      'should return INSUFFICIENT_BALANCE for %s, which the tier does not grant',
      (perkType) => {
        service.enroll('sub-1', 'Bronze');

        expect(service.consume('sub-1', perkType, 1)).toEqual({
          success: false,
          error: {
            code: 'INSUFFICIENT_BALANCE',
            message: `Insufficient "${perkType}" balance: requested 1, available 0`,
          },
        });
        expect(service.getLedger('sub-1').balances).toEqual({ perk: 1 });
      },
    );

    it('should keep the ledger refreshable after a refused perk', () => {
      service.enroll('sub-1', 'Bronze');
      service.consume('sub-1', 'constructor', 1);
      clock.advanceTo('2024-02-01T00:00:00Z');

      expect(service.refreshAll()).toMatchObject({
        refreshedCount: 1,
        errors: [],
      });
    });

    it('should return INVALID_AMOUNT for a non-positive amount', () => {
      service.enroll('sub-1', 'Bronze');

      const result = service.consume('sub-1', 'perk', 0);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_AMOUNT');
      }
    });

    it('should return SUBSCRIBER_INACTIVE for a deactivated subscriber', () => {
      service.enroll('sub-1', 'Bronze');
      service.setActive('sub-1', false);

      const result = service.consume('sub-1', 'perk', 1);

      expect(result).toEqual({
        success: false,
        error: {
          code: 'SUBSCRIBER_INACTIVE',
          message: 'Subscriber sub-1 is not active and cannot use perks',
        },
      });
    });
  });

  describe('changeTier', () => {
    it('should keep balances and apply the new tier at the next refresh', () => {
      service.enroll('sub-1', 'Gold');

      const ledger = service.changeTier('sub-1', 'Bronze');

      expect(ledger.tierId).toBe('Bronze');
      expect(ledger.balances).toEqual({ perk: 4, storage: 100 });

      clock.advanceTo('2024-02-01T00:00:00Z');
      const result = service.refresh('sub-1');

      expect(result.balances).toEqual({ perk: 1, storage: 100 });
      expect(result.warnings.map((w) => w.code)).toEqual(['UNKNOWN_PERK']);
    });

    it('should reject an unknown tier and keep the current one', () => {
      service.enroll('sub-1', 'Gold');

      expect(() => service.changeTier('sub-1', 'Diamond')).toThrow(
        UnknownTierError,
      );
      expect(service.getLedger('sub-1').tierId).toBe('Gold');
    });
  });

  describe('unenroll', () => {
    it('should remove the ledger and return its final state', () => {
      service.enroll('sub-1', 'Gold');

      const finalState = service.unenroll('sub-1');

      expect(finalState.balances).toEqual({ perk: 4, storage: 100 });
      expect(() => service.getLedger('sub-1')).toThrow(SubscriberNotFoundError);
    });
  });

  describe('refreshAll', () => {
    it('should count refreshed and current ledgers separately', () => {
      service.enroll('sub-1', 'Gold');
      clock.advanceTo('2024-02-01T00:00:00Z');
      service.enroll('sub-2', 'Bronze');

      expect(service.refreshAll()).toEqual({
        processedCount: 2,
        refreshedCount: 1,
        noOpCount: 1,
        warningCount: 0,
        errors: [],
      });
    });

    it('should record a failing ledger and keep going', () => {
      service.enroll('sub-1', 'Gold');
      service.enroll('sub-2', 'Bronze');
      clock.advanceTo('2024-02-01T00:00:00Z');
      vi.spyOn(engine, 'evaluate').mockImplementationOnce(() => {
        throw new Error('tier table unavailable');
      });

      const result = service.refreshAll();

      expect(result).toEqual({
        processedCount: 2,
        refreshedCount: 1,
        noOpCount: 0,
        warningCount: 0,
        errors: [{ subscriberId: 'sub-1', error: 'tier table unavailable' }],
      });
      expect(service.getLedger('sub-2').lastRefreshed).toEqual({
        year: 2024,
        month: 2,
      });
    });

    it('should count port failures as warnings, not errors', () => {
      service.enroll('sub-1', 'Gold');
      service.enroll('sub-2', 'Bronze');
      clock.advanceTo('2024-02-01T00:00:00Z');
      billing.failWith(new Error('billing down'));

      const result = service.refreshAll();

      expect(result.processedCount).toBe(2);
      expect(result.refreshedCount).toBe(2);
      expect(result.warningCount).toBe(2);
      expect(result.errors).toEqual([]);
    });

    it('should return an empty summary with no subscribers', () => {
      expect(service.refreshAll()).toEqual({
        processedCount: 0,
        refreshedCount: 0,
        noOpCount: 0,
        warningCount: 0,
        errors: [],
      });
    });
  });
});
