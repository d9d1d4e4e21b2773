import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { formatPeriodKey, type PeriodKey } from '../../domain/period.utils';
import type { BillingSyncPort } from '../../ports';

export const DEFAULT_BILLING_SYNC_TIMEOUT_MS = 5000;

export interface BillingSyncPayload {
  subscriberId: string;
  period: string;
}

/**
 * BillingSyncPort adapter that POSTs each refresh to the billing webhook at
 * BILLING_SYNC_URL. Without a URL it only logs.
 *
 * The request is fired in the background with its own timeout; the engine
 * never waits for it.
 */
@Injectable()
export class HttpBillingSyncAdapter implements BillingSyncPort {
  private readonly logger = new Logger(HttpBillingSyncAdapter.name);
  private readonly url: string | undefined;
  private readonly timeoutMs: number;

  constructor(configService: ConfigService) {
    this.url = configService.get<string>('BILLING_SYNC_URL');
    this.timeoutMs = Number(
      configService.get<string>(
        'BILLING_SYNC_TIMEOUT_MS',
        String(DEFAULT_BILLING_SYNC_TIMEOUT_MS),
      ),
    );
  }

  onRefresh(subscriberId: string, period: PeriodKey): void {
    const payload: BillingSyncPayload = {
      subscriberId,
      period: formatPeriodKey(period),
    };

    if (!this.url) {
      this.logger.debug(
        `BILLING_SYNC_URL not set; not syncing ${payload.subscriberId} for ${payload.period}`,
      );
      return;
    }

    void this.post(this.url, payload);
  }

  private async post(url: string, payload: BillingSyncPayload): Promise<void> {
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logger.error(
          `Billing sync for ${payload.subscriberId} (${payload.period}) rejected with HTTP ${response.status}`,
        );
        return;
      }

      this.logger.log(
        `Billing synced for ${payload.subscriberId} (${payload.period})`,
      );
    } catch (error) {
      this.logger.error(
        `Billing sync for ${payload.subscriberId} (${payload.period}) failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }
}
