/**
 * Notify Module - Public API
 */

export { EmailNotifier, DEFAULT_CONFIG as DEFAULT_EMAIL_CONFIG, default } from './email-notifier.js';
export type {
  EmailNotifierConfig,
  EmailIntent,
  EmailSink,
  EmailStats,
  MailMessage,
  MailTransport,
  TransportFactory,
} from './email-notifier.js';
