/**
 * Email Notifier — best-effort secondary alert channel.
 *
 * `notify` only enqueues; a worker drains the queue and hands each
 * message to an SMTP transport. A slow or failing mail server therefore
 * never delays chat notifications or the sweep, and a failed delivery
 * is logged and dropped (no retry).
 */

import nodemailer from 'nodemailer';
import pino from 'pino';

import {
  GuardErrorCode,
  errorMessage,
  type SmtpSettings,
  type UserRecord,
} from '../shared/types.js';

const logger = pino({ name: 'guard:email', level: process.env['LOG_LEVEL'] ?? 'info' });

// ─── Configuration ───────────────────────────────────────────

export interface EmailNotifierConfig {
  /** Master switch. Default: false */
  enabled: boolean;
  /** Default SMTP settings; a user's override is merged over these. */
  smtp: SmtpSettings;
  /**
   * Domain used to derive an address from a numeric contact id
   * (`<contact>@<domain>`). Null disables derivation.
   */
  derivedDomain: string | null;
}

export const DEFAULT_CONFIG: EmailNotifierConfig = {
  enabled: false,
  smtp: {
    host: '',
    port: 465,
    secure: true,
    user: '',
    password: '',
    from: '',
  },
  derivedDomain: 'qq.com',
};

// ─── Types ───────────────────────────────────────────────────

export interface MailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type TransportFactory = (settings: SmtpSettings) => MailTransport;

export interface EmailIntent {
  userId: string;
  to: string;
  subject: string;
  text: string;
  smtp: SmtpSettings;
}

export interface EmailStats {
  queued: number;
  sent: number;
  failed: number;
}

/** What the escalation engine needs from an email channel. */
export interface EmailSink {
  notify(record: UserRecord, subject: string, text: string): boolean;
}

const smtpTransportFactory: TransportFactory = (settings) =>
  nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    auth: settings.user ? { user: settings.user, pass: settings.password } : undefined,
  });

// ─── Email Notifier ──────────────────────────────────────────

export class EmailNotifier implements EmailSink {
  private readonly config: EmailNotifierConfig;
  private readonly createTransport: TransportFactory;
  private readonly transports = new Map<string, MailTransport>();
  private queue: EmailIntent[] = [];
  private worker: Promise<void> | null = null;
  private sent = 0;
  private failed = 0;

  constructor(config: Partial<EmailNotifierConfig> = {}, createTransport: TransportFactory = smtpTransportFactory) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      smtp: { ...DEFAULT_CONFIG.smtp, ...config.smtp },
    };
    this.createTransport = createTransport;
  }

  /**
   * Picks the alert address: the bound email, else one derived from the
   * emergency contact, else none.
   */
  resolveAddress(record: UserRecord): string | null {
    if (record.email) return record.email;
    if (record.emergencyContact && this.config.derivedDomain) {
      return `${record.emergencyContact}@${this.config.derivedDomain}`;
    }
    return null;
  }

  /**
   * Queues a message for the user's alert address.
   * @returns true when something was queued
   */
  notify(record: UserRecord, subject: string, text: string): boolean {
    if (!this.config.enabled) {
      logger.debug({ userId: record.userId }, 'Email disabled, skipping');
      return false;
    }

    const to = this.resolveAddress(record);
    if (!to) {
      logger.debug({ userId: record.userId }, 'No email address resolvable, skipping');
      return false;
    }

    const smtp: SmtpSettings = { ...this.config.smtp, ...(record.smtp ?? {}) };
    if (!smtp.host) {
      logger.warn({ userId: record.userId }, 'No SMTP host configured, skipping email');
      return false;
    }

    this.queue.push({ userId: record.userId, to, subject, text, smtp });
    this.startWorker();
    return true;
  }

  /** Resolves once every queued message has been attempted. */
  async drain(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  getStats(): EmailStats {
    return { queued: this.queue.length, sent: this.sent, failed: this.failed };
  }

  // ─── Private ─────────────────────────────────────────────────

  private startWorker(): void {
    if (this.worker) return;
    this.worker = this.processQueue().finally(() => {
      this.worker = null;
      if (this.queue.length > 0) {
        this.startWorker();
      }
    });
  }

  private async processQueue(): Promise<void> {
    let intent = this.queue.shift();
    while (intent) {
      await this.deliver(intent);
      intent = this.queue.shift();
    }
  }

  private async deliver(intent: EmailIntent): Promise<void> {
    const from = intent.smtp.from || intent.smtp.user;
    try {
      const transport = this.transportFor(intent.smtp);
      await transport.sendMail({ from, to: intent.to, subject: intent.subject, text: intent.text });
      this.sent++;
      logger.info({ userId: intent.userId, to: intent.to }, 'Alert email sent');
    } catch (error) {
      this.failed++;
      logger.warn(
        { userId: intent.userId, to: intent.to, code: GuardErrorCode.TRANSPORT_FAILURE, error: errorMessage(error) },
        'Alert email failed'
      );
    }
  }

  private transportFor(settings: SmtpSettings): MailTransport {
    const key = JSON.stringify([settings.host, settings.port, settings.secure, settings.user, settings.password]);
    let transport = this.transports.get(key);
    if (!transport) {
      transport = this.createTransport(settings);
      this.transports.set(key, transport);
    }
    return transport;
  }
}

export default EmailNotifier;
