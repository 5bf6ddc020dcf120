/**
 * Unit tests for EmailNotifier
 */

import { describe, it, expect, vi } from 'vitest';
import { EmailNotifier, type MailMessage, type MailTransport } from '../notify/email-notifier.js';
import { AlertLevel, type SmtpSettings, type UserRecord } from '../shared/types.js';

const SMTP: SmtpSettings = {
  host: 'smtp.example.com',
  port: 465,
  secure: true,
  user: 'alerts@example.com',
  password: 'test-secret',
  from: '',
};

function makeRecord(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    userId: '10001',
    binding: { botId: '900', groupId: null },
    emergencyContact: '20002',
    email: null,
    maxMissingDays: 3,
    lastActive: 0,
    alertLevel: AlertLevel.NORMAL,
    customWarnMessage: null,
    customEmergMessage: null,
    smtp: null,
    ...overrides,
  };
}

function recordingTransport(sent: MailMessage[]): MailTransport {
  return {
    sendMail: vi.fn(async (message: MailMessage) => {
      sent.push(message);
      return { messageId: 'test' };
    }),
  };
}

describe('EmailNotifier', () => {
  describe('resolveAddress', () => {
    const notifier = new EmailNotifier({ enabled: true, smtp: SMTP });

    it('should prefer the bound email', () => {
      expect(notifier.resolveAddress(makeRecord({ email: 'me@example.com' }))).toBe('me@example.com');
    });

    it('should derive an address from the contact', () => {
      expect(notifier.resolveAddress(makeRecord())).toBe('20002@qq.com');
    });

    it('should use the configured derivation domain', () => {
      const custom = new EmailNotifier({ enabled: true, smtp: SMTP, derivedDomain: 'mail.example.org' });
      expect(custom.resolveAddress(makeRecord())).toBe('20002@mail.example.org');
    });

    it('should resolve nothing when derivation is disabled', () => {
      const custom = new EmailNotifier({ enabled: true, smtp: SMTP, derivedDomain: null });
      expect(custom.resolveAddress(makeRecord())).toBeNull();
    });

    it('should resolve nothing without email or contact', () => {
      expect(notifier.resolveAddress(makeRecord({ emergencyContact: null }))).toBeNull();
    });
  });

  describe('notify', () => {
    it('should send through the transport in the background', async () => {
      const sent: MailMessage[] = [];
      const factory = vi.fn(() => recordingTransport(sent));
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, factory);

      expect(notifier.notify(makeRecord(), 'Subject', 'Body')).toBe(true);
      await notifier.drain();

      expect(sent).toEqual([{ from: 'alerts@example.com', to: '20002@qq.com', subject: 'Subject', text: 'Body' }]);
      expect(notifier.getStats()).toEqual({ queued: 0, sent: 1, failed: 0 });
    });

    it('should do nothing when disabled', () => {
      const factory = vi.fn(() => recordingTransport([]));
      const notifier = new EmailNotifier({ enabled: false, smtp: SMTP }, factory);

      expect(notifier.notify(makeRecord(), 'Subject', 'Body')).toBe(false);
      expect(factory).not.toHaveBeenCalled();
    });

    it('should do nothing without an address', () => {
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, () => recordingTransport([]));
      expect(notifier.notify(makeRecord({ emergencyContact: null }), 'Subject', 'Body')).toBe(false);
    });

    it('should do nothing without an SMTP host', () => {
      const notifier = new EmailNotifier({ enabled: true, smtp: { ...SMTP, host: '' } }, () => recordingTransport([]));
      expect(notifier.notify(makeRecord(), 'Subject', 'Body')).toBe(false);
    });

    it('should merge the per-user SMTP override', async () => {
      const factory = vi.fn((_settings: SmtpSettings) => recordingTransport([]));
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, factory);

      notifier.notify(makeRecord({ smtp: { host: 'smtp.other.example', port: 587, secure: false } }), 'S', 'B');
      await notifier.drain();

      expect(factory).toHaveBeenCalledWith({ ...SMTP, host: 'smtp.other.example', port: 587, secure: false });
    });

    it('should reuse one transport per SMTP settings', async () => {
      const factory = vi.fn(() => recordingTransport([]));
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, factory);

      notifier.notify(makeRecord(), 'A', 'a');
      notifier.notify(makeRecord({ userId: '10002' }), 'B', 'b');
      await notifier.drain();

      expect(factory).toHaveBeenCalledTimes(1);
      expect(notifier.getStats().sent).toBe(2);
    });

    it('should not share a transport across different passwords', async () => {
      const factory = vi.fn((_settings: SmtpSettings) => recordingTransport([]));
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, factory);

      notifier.notify(makeRecord(), 'A', 'a');
      notifier.notify(makeRecord({ userId: '10002', smtp: { password: 'other-secret' } }), 'B', 'b');
      await notifier.drain();

      expect(factory).toHaveBeenCalledTimes(2);
      expect(factory).toHaveBeenLastCalledWith({ ...SMTP, password: 'other-secret' });
    });

    it('should count failures without rejecting', async () => {
      const failing: MailTransport = { sendMail: vi.fn(async () => Promise.reject(new Error('535 auth failed'))) };
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, () => failing);

      notifier.notify(makeRecord(), 'Subject', 'Body');
      notifier.notify(makeRecord(), 'Subject', 'Body');
      await expect(notifier.drain()).resolves.toBeUndefined();

      expect(notifier.getStats()).toEqual({ queued: 0, sent: 0, failed: 2 });
    });

    it('should return before the transport finishes', async () => {
      let release: () => void = () => undefined;
      const slow: MailTransport = {
        sendMail: vi.fn(() => new Promise<void>((resolve) => { release = resolve; })),
      };
      const notifier = new EmailNotifier({ enabled: true, smtp: SMTP }, () => slow);

      expect(notifier.notify(makeRecord(), 'Subject', 'Body')).toBe(true);
      expect(notifier.getStats().sent).toBe(0);

      await Promise.resolve();
      release();
      await notifier.drain();
      expect(notifier.getStats().sent).toBe(1);
    });
  });
});
