import { Injectable, Logger } from '@nestjs/common';
import type { PerkBalances } from '../../domain/perk.types';
import type { NotificationPort } from '../../ports';
import { EmailService } from '../email/email.service';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderBalanceLines(balances: Readonly<PerkBalances>): string[] {
  return Object.entries(balances).map(
    ([perkType, balance]) => `${perkType}: ${balance}`,
  );
}

/**
 * NotificationPort adapter that e-mails the subscriber their new balances.
 *
 * Subscriber ids are used as the recipient address; ids that are not e-mail
 * addresses are skipped. Delivery runs in the background so the refresh
 * engine never waits on SMTP.
 */
@Injectable()
export class EmailNotificationAdapter implements NotificationPort {
  private readonly logger = new Logger(EmailNotificationAdapter.name);

  constructor(private readonly emailService: EmailService) {}

  onRefresh(subscriberId: string, balances: Readonly<PerkBalances>): void {
    if (!EMAIL_PATTERN.test(subscriberId)) {
      this.logger.debug(
        `Subscriber ${subscriberId} has no e-mail address; skipping refresh notice`,
      );
      return;
    }

    void this.deliver(subscriberId, renderBalanceLines(balances));
  }

  private async deliver(to: string, lines: string[]): Promise<void> {
    try {
      await this.emailService.sendEmail({
        to,
        subject: 'Your monthly perks have been refreshed',
        text: ['Your balances for this month:', ...lines].join('\n'),
        html: `<h2>Your monthly perks have been refreshed</h2><ul>${lines
          .map((line) => `<li>${escapeHtml(line)}</li>`)
          .join('')}</ul>`,
      });
    } catch (error) {
      this.logger.error(
        `Refresh notice to ${to} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
