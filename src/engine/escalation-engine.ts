/**
 * Escalation Engine — two-stage silence detection and notification fan-out.
 *
 * Each sweep walks a snapshot of user ids and moves every user at most
 * one step: NORMAL/WARNED → ESCALATED when their own deadline has
 * passed, otherwise NORMAL → WARNED after a day of silence (only for
 * deadlines longer than a day). A level is written back only when no
 * activity arrived while the notifications were being sent.
 */

import pino from 'pino';

import type { UserRegistry } from '../registry/user-registry.js';
import type { BotDirectory, ChatChannel, SendResult } from '../channels/chat-channel.js';
import { sendFailed } from '../channels/chat-channel.js';
import type { EmailSink } from '../notify/email-notifier.js';
import type { AlertChannel, AlertRecorder } from '../audit/alert-log.js';
import { NULL_RECORDER } from '../audit/alert-log.js';
import { formatDuration, renderTemplate, type TemplateVars } from '../shared/format.js';
import {
  AlertLevel,
  GuardError,
  GuardErrorCode,
  SECONDS_PER_DAY,
  WARN_THRESHOLD_SECONDS,
  errorMessage,
  type UserRecord,
} from '../shared/types.js';

const logger = pino({ name: 'guard:engine', level: process.env['LOG_LEVEL'] ?? 'info' });

// ─── Messages ────────────────────────────────────────────────

/** Notification texts. `{uid}` and `{time}` are substituted. */
export interface EscalationMessages {
  /** Stage-1 text to the user (DM, group mention and email). */
  warn: string;
  /** Stage-2 text to the emergency contact and the email body. */
  emerg: string;
  /** Stage-2 group mention of the contact. */
  contactGroupMention: string;
  /** Stage-2 DM to the user when a contact is being notified. */
  userEscalated: string;
  /** Stage-2 DM to the user when no contact is set. */
  noContact: string;
  contactInGroupSuffix: string;
  contactOutOfBandSuffix: string;
  warnSubject: string;
  emergSubject: string;
  test: string;
  testSubject: string;
}

export const DEFAULT_MESSAGES: EscalationMessages = {
  warn: '⚠️ [Safety check] {uid}, you have been silent for {time}. Reply with any message to let us know you are OK.',
  emerg: '🚨 [Emergency] User {uid} has been unreachable for {time}, past their deadline!',
  contactGroupMention: 'Warning: user {uid} is unreachable. Please try to reach them!',
  userEscalated: '🚨 [Final warning] You have been silent for {time}, past your deadline. Your emergency contact is being notified.',
  noContact: '🚨 [Final warning] Your deadline has passed, but no emergency contact is set.',
  contactInGroupSuffix: ' (also posted in the group)',
  contactOutOfBandSuffix: ' (please try to reach them by phone)',
  warnSubject: 'Safety check reminder',
  emergSubject: 'Emergency: {uid} unreachable',
  test: '🔔 [Test] This is a test alert for {uid}. No action is needed.',
  testSubject: 'Test alert for {uid}',
};

// ─── Types ───────────────────────────────────────────────────

export type Transition = 'warn' | 'escalate';

export interface SweepReport {
  evaluated: number;
  warned: string[];
  escalated: string[];
  /** Users notified but left at their level because they became active meanwhile. */
  skipped: string[];
  failed: string[];
  durationMs: number;
}

/** Per-channel outcome of a manual test; null when the channel does not apply. */
export interface TestAlertResult {
  userId: string;
  direct: boolean | null;
  group: boolean | null;
  contact: boolean | null;
  email: boolean;
}

export interface EscalationEngineDeps {
  registry: UserRegistry;
  bots: BotDirectory;
  email: EmailSink;
  auditLog?: AlertRecorder;
  messages?: Partial<EscalationMessages>;
  /** Clock, epoch ms. Default: Date.now */
  now?: () => number;
}

// ─── Transition rule ─────────────────────────────────────────

/**
 * Decides the single transition due for a record, if any.
 * Stage 2 takes precedence when both stages are due.
 */
export function decideTransition(record: UserRecord, nowMs: number): Transition | null {
  const elapsed = (nowMs - record.lastActive) / 1000;
  const maxSeconds = record.maxMissingDays * SECONDS_PER_DAY;

  if (elapsed > maxSeconds && record.alertLevel < AlertLevel.ESCALATED) {
    return 'escalate';
  }
  if (
    maxSeconds > WARN_THRESHOLD_SECONDS &&
    elapsed > WARN_THRESHOLD_SECONDS &&
    record.alertLevel < AlertLevel.WARNED
  ) {
    return 'warn';
  }
  return null;
}

// ─── Engine ──────────────────────────────────────────────────

export class EscalationEngine {
  private readonly registry: UserRegistry;
  private readonly bots: BotDirectory;
  private readonly email: EmailSink;
  private readonly auditLog: AlertRecorder;
  private readonly messages: EscalationMessages;
  private readonly now: () => number;

  constructor(deps: EscalationEngineDeps) {
    this.registry = deps.registry;
    this.bots = deps.bots;
    this.email = deps.email;
    this.auditLog = deps.auditLog ?? NULL_RECORDER;
    this.messages = { ...DEFAULT_MESSAGES, ...deps.messages };
    this.now = deps.now ?? (() => Date.now());
  }

  /**
   * Evaluates every registered user once.
   * A failure while handling one user is logged and the sweep moves on.
   */
  async sweep(): Promise<SweepReport> {
    const startedAt = this.now();
    const report: SweepReport = {
      evaluated: 0,
      warned: [],
      escalated: [],
      skipped: [],
      failed: [],
      durationMs: 0,
    };
    let levelsChanged = false;

    for (const userId of this.registry.snapshotIds()) {
      const record = this.registry.get(userId);
      if (!record) continue;
      report.evaluated++;

      try {
        const transition = decideTransition(record, startedAt);
        if (!transition) continue;

        const target = transition === 'escalate' ? AlertLevel.ESCALATED : AlertLevel.WARNED;
        if (transition === 'escalate') {
          await this.escalate(record, startedAt);
        } else {
          await this.warn(record, startedAt);
        }

        if (!this.registry.applyAlertLevel(userId, target, record.lastActive)) {
          logger.info({ userId, transition }, 'User became active during fan-out, level unchanged');
          report.skipped.push(userId);
          continue;
        }

        levelsChanged = true;
        (transition === 'escalate' ? report.escalated : report.warned).push(userId);
        this.auditLog.record({
          type: transition === 'escalate' ? 'stage2_escalation' : 'stage1_warning',
          userId,
          levelBefore: record.alertLevel,
          levelAfter: target,
        });
      } catch (error) {
        report.failed.push(userId);
        logger.error({ userId, error: errorMessage(error) }, 'Escalation failed for user');
      }
    }

    if (levelsChanged) {
      await this.registry.flush();
    }

    report.durationMs = this.now() - startedAt;
    this.auditLog.record({
      type: 'sweep_complete',
      detail: JSON.stringify({
        evaluated: report.evaluated,
        warned: report.warned.length,
        escalated: report.escalated.length,
        skipped: report.skipped.length,
        failed: report.failed.length,
      }),
    });
    logger.info(
      {
        evaluated: report.evaluated,
        warned: report.warned.length,
        escalated: report.escalated.length,
        failed: report.failed.length,
        durationMs: report.durationMs,
      },
      'Sweep complete'
    );
    return report;
  }

  /**
   * Sends a test message through every channel configured for a user.
   * Alert levels are not touched.
   */
  async sendTest(userId: string): Promise<TestAlertResult> {
    const record = this.registry.get(userId);
    if (!record) {
      throw new GuardError(GuardErrorCode.NOT_REGISTERED, `User ${userId} is not registered.`, { userId });
    }

    const vars = this.templateVars(record, this.now());
    const text = renderTemplate(this.messages.test, vars);
    const result: TestAlertResult = { userId, direct: null, group: null, contact: null, email: false };

    const channel = this.channelFor(record);
    if (channel) {
      result.direct = await this.deliver(record, 'direct', userId, () => channel.sendDirect(userId, text));

      const groupId = record.binding.groupId;
      if (groupId) {
        result.group = await this.deliver(record, 'group', groupId, () =>
          channel.sendGroupMention(groupId, userId, text)
        );
      }

      const contact = record.emergencyContact;
      if (contact) {
        result.contact = await this.deliver(record, 'direct', contact, () => channel.sendDirect(contact, text));
      }
    }

    result.email = this.sendEmail(record, renderTemplate(this.messages.testSubject, vars), text);

    this.auditLog.record({
      type: 'test_alert',
      userId,
      detail: JSON.stringify({
        direct: result.direct,
        group: result.group,
        contact: result.contact,
        email: result.email,
      }),
    });
    logger.info({ ...result }, 'Test alert sent');
    return result;
  }

  // ─── Fan-out ─────────────────────────────────────────────────

  private async warn(record: UserRecord, nowMs: number): Promise<void> {
    const text = renderTemplate(record.customWarnMessage ?? this.messages.warn, this.templateVars(record, nowMs));
    const userId = record.userId;
    logger.info({ userId }, 'Stage 1: sending warning');

    const channel = this.channelFor(record);
    if (channel) {
      await this.deliver(record, 'direct', userId, () => channel.sendDirect(userId, text));

      const groupId = record.binding.groupId;
      if (groupId) {
        await this.deliver(record, 'group', groupId, () => channel.sendGroupMention(groupId, userId, text));
      }
    }

    this.sendEmail(record, this.messages.warnSubject, text);
  }

  private async escalate(record: UserRecord, nowMs: number): Promise<void> {
    const vars = this.templateVars(record, nowMs);
    const contactText = renderTemplate(record.customEmergMessage ?? this.messages.emerg, vars);
    const userId = record.userId;
    const contact = record.emergencyContact;
    logger.warn({ userId, contact }, 'Stage 2: escalating');

    const channel = this.channelFor(record);
    if (channel) {
      if (contact) {
        const userText = renderTemplate(this.messages.userEscalated, vars);
        await this.deliver(record, 'direct', userId, () => channel.sendDirect(userId, userText));

        const groupId = record.binding.groupId;
        const inGroup = groupId ? await this.isMember(channel, groupId, contact) : false;

        if (groupId && inGroup) {
          const mention = renderTemplate(this.messages.contactGroupMention, vars);
          await this.deliver(record, 'group', groupId, () => channel.sendGroupMention(groupId, contact, mention));
          const dm = contactText + this.messages.contactInGroupSuffix;
          await this.deliver(record, 'direct', contact, () => channel.sendDirect(contact, dm));
        } else {
          const dm = contactText + this.messages.contactOutOfBandSuffix;
          await this.deliver(record, 'direct', contact, () => channel.sendDirect(contact, dm));
        }
      } else {
        const text = renderTemplate(this.messages.noContact, vars);
        await this.deliver(record, 'direct', userId, () => channel.sendDirect(userId, text));
      }
    }

    this.sendEmail(record, renderTemplate(this.messages.emergSubject, vars), contactText);
  }

  // ─── Helpers ─────────────────────────────────────────────────

  private channelFor(record: UserRecord): ChatChannel | null {
    const channel = this.bots.resolve(record.binding.botId);
    if (!channel) {
      logger.warn(
        { userId: record.userId, botId: record.binding.botId, code: GuardErrorCode.CHANNEL_UNAVAILABLE },
        'No channel for bot, skipping chat notifications'
      );
      this.auditLog.record({
        type: 'notification_failed',
        userId: record.userId,
        channel: 'chat',
        target: record.binding.botId,
        detail: 'no channel for bot',
      });
    }
    return channel;
  }

  /** Runs one send and records the outcome; never throws. */
  private async deliver(
    record: UserRecord,
    channel: AlertChannel,
    target: string,
    send: () => Promise<SendResult>
  ): Promise<boolean> {
    let result: SendResult;
    try {
      result = await send();
    } catch (error) {
      result = sendFailed(errorMessage(error));
    }

    if (result.ok) {
      this.auditLog.record({ type: 'notification_sent', userId: record.userId, channel, target });
      return true;
    }

    logger.warn({ userId: record.userId, channel, target, error: result.error }, 'Notification failed');
    this.auditLog.record({
      type: 'notification_failed',
      userId: record.userId,
      channel,
      target,
      detail: result.error,
    });
    return false;
  }

  private async isMember(channel: ChatChannel, groupId: string, userId: string): Promise<boolean> {
    try {
      return await channel.isMember(groupId, userId);
    } catch (error) {
      logger.warn({ groupId, userId, error: errorMessage(error) }, 'Membership lookup failed');
      return false;
    }
  }

  private sendEmail(record: UserRecord, subject: string, text: string): boolean {
    const queued = this.email.notify(record, subject, text);
    if (queued) {
      this.auditLog.record({ type: 'notification_sent', userId: record.userId, channel: 'email', detail: 'queued' });
    }
    return queued;
  }

  private templateVars(record: UserRecord, nowMs: number): TemplateVars {
    return {
      uid: record.userId,
      time: formatDuration((nowMs - record.lastActive) / 1000),
    };
  }
}

export default EscalationEngine;
