import { Test, TestingModule } from '@nestjs/testing';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AppModule } from './../src/app.module';
import { EntitlementService } from '../src/modules/entitlement/application/entitlement.service';
import { EntitlementScheduler } from '../src/modules/entitlement/application/entitlement.scheduler';
import { CLOCK } from '../src/shared/domain/clock.port';
import { BILLING_SYNC_PORT, NOTIFICATION_PORT } from '../src/shared/ports';
import { FakeClock } from '../src/shared/testing/fake-clock';
import {
  RecordingBillingSync,
  RecordingNotifier,
} from '../src/shared/testing/recording-ports';

describe('Entitlements worker (e2e)', () => {
  let app: TestingModule;
  let clock: FakeClock;
  let billing: RecordingBillingSync;
  let notifier: RecordingNotifier;
  let service: EntitlementService;
  let scheduler: EntitlementScheduler;

  beforeEach(async () => {
    clock = new FakeClock('2024-01-15T10:00:00Z');
    billing = new RecordingBillingSync();
    notifier = new RecordingNotifier();

    app = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(CLOCK)
      .useValue(clock)
      .overrideProvider(BILLING_SYNC_PORT)
      .useValue(billing)
      .overrideProvider(NOTIFICATION_PORT)
      .useValue(notifier)
      .compile();

    await app.init();

    service = app.get(EntitlementService);
    scheduler = app.get(EntitlementScheduler);
  });

  afterEach(async () => {
    await app.close();
  });

  it('should register the monthly refresh job', () => {
    const registry = app.get(SchedulerRegistry);

    expect(registry.getCronJob('refresh_entitlements')).toBeDefined();
  });

  it('should grant, consume and roll over with the shipped tier table', async () => {
    service.enroll('sub-gold', 'Gold');
    expect(service.getLedger('sub-gold').balances).toEqual({
      perk: 4,
      guestPass: 2,
      storage: 100,
    });

    expect(service.consume('sub-gold', 'storage', 30)).toEqual({
      success: true,
      consumed: { perkType: 'storage', amount: 30, remaining: 70 },
    });

    clock.advanceTo('2024-02-01T00:00:00Z');
    const metrics = await scheduler.refreshEntitlements();

    expect(metrics).toMatchObject({
      period: '2024-02',
      processedCount: 1,
      refreshedCount: 1,
      errorCount: 0,
    });
    expect(service.getLedger('sub-gold').balances).toEqual({
      perk: 8,
      guestPass: 4,
      storage: 150,
    });
    expect(billing.calls.map((call) => call.period)).toEqual([
      { year: 2024, month: 1 },
      { year: 2024, month: 2 },
    ]);
    expect(notifier.calls[1]).toEqual({
      subscriberId: 'sub-gold',
      balances: { perk: 8, guestPass: 4, storage: 150 },
    });
  });

  it('should carry everything over on Platinum storage', async () => {
    service.enroll('sub-platinum', 'Platinum');

    clock.advanceTo('2024-02-01T00:00:00Z');
    await scheduler.refreshEntitlements();
    clock.advanceTo('2024-03-01T00:00:00Z');
    await scheduler.refreshEntitlements();

    expect(service.getLedger('sub-platinum').balances.storage).toBe(750);
  });

  it('should not refresh twice in the same month', async () => {
    service.enroll('sub-bronze', 'Bronze');
    service.consume('sub-bronze', 'perk', 1);

    const metrics = await scheduler.refreshEntitlements();

    expect(metrics).toMatchObject({ refreshedCount: 0, noOpCount: 1 });
    expect(service.getLedger('sub-bronze').balances.perk).toBe(0);
  });
});
