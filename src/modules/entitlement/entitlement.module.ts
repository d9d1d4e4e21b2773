import { Module } from '@nestjs/common';
import { EntitlementService } from './application/entitlement.service';
import { EntitlementScheduler } from './application/entitlement.scheduler';
import { RefreshEngine } from './application/refresh-engine';

// Ports
import { BILLING_SYNC_PORT, NOTIFICATION_PORT } from '../../shared/ports';
import { HttpBillingSyncAdapter } from '../../shared/infrastructure/billing/http-billing-sync.adapter';
import { EmailNotificationAdapter } from '../../shared/infrastructure/notification/email-notification.adapter';
import { EmailService } from '../../shared/infrastructure/email/email.service';

// Clock
import { CLOCK } from '../../shared/domain/clock.port';
import { SystemClock } from '../../shared/infrastructure/system-clock';

@Module({
  providers: [
    // Clock (infrastructure adapter)
    {
      provide: CLOCK,
      useClass: SystemClock,
    },

    // Outbound ports (infrastructure adapters)
    EmailService,
    {
      provide: BILLING_SYNC_PORT,
      useClass: HttpBillingSyncAdapter,
    },
    {
      provide: NOTIFICATION_PORT,
      useClass: EmailNotificationAdapter,
    },

    RefreshEngine,
    EntitlementService,
    EntitlementScheduler,
  ],
  exports: [EntitlementService],
})
export class EntitlementModule {}
