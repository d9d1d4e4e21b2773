import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import type { Clock } from '../../../shared/domain/clock.port';
import { CLOCK } from '../../../shared/domain/clock.port';
import {
  formatPeriodKey,
  periodKeyOf,
} from '../../../shared/domain/period.utils';
import { EntitlementService } from './entitlement.service';

/**
 * Metrics emitted by the refresh sweep, for log aggregators.
 */
interface RefreshMetrics {
  job: 'refresh_entitlements';
  period: string;
  processedCount: number;
  refreshedCount: number;
  noOpCount: number;
  warningCount: number;
  errorCount: number;
  durationMs: number;
}

@Injectable()
export class EntitlementScheduler implements OnApplicationBootstrap {
  private readonly logger = new Logger(EntitlementScheduler.name);

  constructor(
    private readonly entitlementService: EntitlementService,
    private readonly configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Runs at 00:00 UTC on the first of every month. Ledgers that are
   * already current come back as no-ops, so a repeated run is harmless.
   */
  @Cron('0 0 1 * *', { name: 'refresh_entitlements', timeZone: 'UTC' })
  async refreshEntitlements(): Promise<RefreshMetrics> {
    const startTime = Date.now();
    const period = formatPeriodKey(periodKeyOf(this.clock.now()));

    this.logger.log(`Starting entitlement refresh for ${period}...`);

    // refreshAll is synchronous, so sweeps never overlap
    const result = this.entitlementService.refreshAll();

    const metrics: RefreshMetrics = {
      job: 'refresh_entitlements',
      period,
      processedCount: result.processedCount,
      refreshedCount: result.refreshedCount,
      noOpCount: result.noOpCount,
      warningCount: result.warningCount,
      errorCount: result.errors.length,
      durationMs: Date.now() - startTime,
    };

    if (result.errors.length > 0) {
      this.logger.warn({
        message: `Entitlement refresh finished with ${result.errors.length} failures`,
        ...metrics,
      });
    } else {
      this.logger.log({
        message: 'Entitlement refresh complete',
        ...metrics,
      });
    }

    return metrics;
  }

  /**
   * Catch up on startup in case the process was down on the first of the
   * month. Disabled with REFRESH_ON_BOOTSTRAP=false.
   */
  async onApplicationBootstrap(): Promise<void> {
    if (this.configService.get<string>('REFRESH_ON_BOOTSTRAP', 'true') === 'false') {
      this.logger.log('Startup refresh disabled by REFRESH_ON_BOOTSTRAP');
      return;
    }

    this.logger.log('Running entitlement refresh on startup...');
    await this.refreshEntitlements();
  }
}
