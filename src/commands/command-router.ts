/**
 * CommandRouter — chat command surface.
 *
 * Every inbound message is proof of life for its sender. Messages that
 * start with the command prefix are dispatched; everything else gets no
 * reply. Registry errors become reply text.
 */

import Fuse from 'fuse.js';
import pino from 'pino';

import type { UserRegistry } from '../registry/user-registry.js';
import type { EscalationEngine, TestAlertResult } from '../engine/escalation-engine.js';
import type { CheckinTracker } from '../checkin/checkin-tracker.js';
import type { CalendarService } from '../checkin/calendar-service.js';
import type { AlertEntry, AlertRecorder } from '../audit/alert-log.js';
import { NULL_RECORDER } from '../audit/alert-log.js';
import { buildStatusReport } from './status-report.js';
import { describeDays } from '../shared/format.js';
import { AlertLevel, GuardError, GuardErrorCode, errorMessage } from '../shared/types.js';

const logger = pino({ name: 'guard:commands', level: process.env['LOG_LEVEL'] ?? 'info' });

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface InboundMessage {
  userId: string;
  botId: string;
  groupId: string | null;
  text: string;
}

export interface CommandReply {
  text: string;
  /** PNG image attached to the reply. */
  image?: Buffer;
}

/** Audit access the router needs: recording plus the status report's "last alert". */
export interface AlertHistory extends AlertRecorder {
  lastTransition(userId: string): AlertEntry | null;
}

export interface CommandRouterDeps {
  registry: UserRegistry;
  engine: EscalationEngine;
  checkins: CheckinTracker;
  calendar: CalendarService;
  auditLog?: AlertHistory;
  /** Account ids allowed to run admin commands. */
  admins: string[];
  /** Default: "/" */
  prefix?: string;
  now?: () => Date;
}

interface CommandContext {
  message: InboundMessage;
  /** Text after the command name, trimmed. */
  args: string;
}

interface CommandDefinition {
  name: string;
  aliases: string[];
  usage: string;
  description: string;
  admin: boolean;
  run: (ctx: CommandContext) => CommandReply | Promise<CommandReply>;
}

export const NOT_REGISTERED_REPLY = '❌ You are not registered yet. Send /checkin first.';
export const PERMISSION_DENIED_REPLY = '❌ Permission denied. Admins only.';
export const INTERNAL_ERROR_REPLY = '❌ Something went wrong. Please try again later.';

// ═══════════════════════════════════════════════════════════════
// COMMAND ROUTER
// ═══════════════════════════════════════════════════════════════

export class CommandRouter {
  private readonly registry: UserRegistry;
  private readonly engine: EscalationEngine;
  private readonly checkins: CheckinTracker;
  private readonly calendar: CalendarService;
  private readonly auditLog: AlertHistory | null;
  private readonly recorder: AlertRecorder;
  private readonly admins: Set<string>;
  private readonly prefix: string;
  private readonly now: () => Date;

  private readonly commands: CommandDefinition[];
  private readonly lookup = new Map<string, CommandDefinition>();
  private readonly fuse: Fuse<string>;

  constructor(deps: CommandRouterDeps) {
    this.registry = deps.registry;
    this.engine = deps.engine;
    this.checkins = deps.checkins;
    this.calendar = deps.calendar;
    this.auditLog = deps.auditLog ?? null;
    this.recorder = deps.auditLog ?? NULL_RECORDER;
    this.admins = new Set(deps.admins);
    this.prefix = deps.prefix ?? '/';
    this.now = deps.now ?? (() => new Date());

    this.commands = this.buildCommands();
    for (const command of this.commands) {
      for (const name of [command.name, ...command.aliases]) {
        this.lookup.set(name, command);
      }
    }
    this.fuse = new Fuse(Array.from(this.lookup.keys()), { threshold: 0.4, includeScore: true });
  }

  /**
   * Handles one inbound message.
   * @returns the reply, or null when nothing should be sent back
   */
  async handle(message: InboundMessage): Promise<CommandReply | null> {
    this.trackActivity(message);

    const text = message.text.trim();
    if (!text.startsWith(this.prefix)) return null;

    const match = /^(\S+)\s*([\s\S]*)$/.exec(text.slice(this.prefix.length));
    if (!match) return null;

    const name = (match[1] ?? '').toLowerCase();
    const args = (match[2] ?? '').trim();
    const command = this.lookup.get(name);

    if (!command) {
      return { text: this.unknownCommandText(name) };
    }

    if (command.admin && !this.isAdmin(message.userId)) {
      logger.warn({ userId: message.userId, command: command.name }, 'Admin command refused');
      return { text: PERMISSION_DENIED_REPLY };
    }

    try {
      return await command.run({ message, args });
    } catch (error) {
      return { text: this.errorText(error, message.userId, command.name) };
    }
  }

  isAdmin(userId: string): boolean {
    return this.admins.has(userId);
  }

  /** Closest known command name, if any is close enough. */
  suggest(name: string): string | null {
    const [best] = this.fuse.search(name);
    return best ? best.item : null;
  }

  // ════════════════════════════════════════════════════════════
  // COMMANDS
  // ════════════════════════════════════════════════════════════

  private buildCommands(): CommandDefinition[] {
    return [
      {
        name: 'checkin',
        aliases: ['register'],
        usage: 'checkin',
        description: 'Register, or reset your timer',
        admin: false,
        run: ({ message }) => this.checkin(message),
      },
      {
        name: 'contact',
        aliases: [],
        usage: 'contact <account id>',
        description: 'Set your emergency contact',
        admin: false,
        run: ({ message, args }) => {
          if (!args) return this.usage('contact');
          const record = this.registry.setContact(message.userId, args);
          return { text: `✅ Emergency contact set to ${record.emergencyContact ?? args}.` };
        },
      },
      {
        name: 'threshold',
        aliases: ['days'],
        usage: 'threshold <days>',
        description: 'Set how long you may be silent (e.g. 3 or 0.5)',
        admin: false,
        run: ({ message, args }) => {
          if (!args) return this.usage('threshold');
          const record = this.registry.setThreshold(message.userId, args);
          return {
            text: `✅ Saved. If you are silent for ${describeDays(record.maxMissingDays)}, your emergency contact will be notified.`,
          };
        },
      },
      {
        name: 'email',
        aliases: [],
        usage: 'email [address]',
        description: 'Bind an alert email; without an address, remove it',
        admin: false,
        run: ({ message, args }) => {
          const record = this.registry.bindEmail(message.userId, args);
          return { text: record.email ? `✅ Alert email set to ${record.email}.` : '✅ Alert email removed.' };
        },
      },
      {
        name: 'warnmsg',
        aliases: [],
        usage: 'warnmsg [text]',
        description: 'Custom warning text ({uid}, {time}); empty resets',
        admin: false,
        run: ({ message, args }) => {
          const record = this.registry.setCustomMessage(message.userId, 'warn', args);
          return {
            text: record.customWarnMessage ? '✅ Custom warning message saved.' : '✅ Warning message reset to the default.',
          };
        },
      },
      {
        name: 'emergmsg',
        aliases: [],
        usage: 'emergmsg [text]',
        description: 'Custom emergency text ({uid}, {time}); empty resets',
        admin: false,
        run: ({ message, args }) => {
          const record = this.registry.setCustomMessage(message.userId, 'emerg', args);
          return {
            text: record.customEmergMessage
              ? '✅ Custom emergency message saved.'
              : '✅ Emergency message reset to the default.',
          };
        },
      },
      {
        name: 'sign',
        aliases: [],
        usage: 'sign',
        description: 'Daily sign-in',
        admin: false,
        run: async ({ message }) => {
          const result = await this.checkins.signIn(message.userId, this.now());
          if (!result.ok) {
            return { text: `ℹ️ ${result.message} Streak: ${result.streak} days.` };
          }
          return { text: `✅ ${result.message} Streak: ${result.streak} days. Total: ${result.total}.` };
        },
      },
      {
        name: 'calendar',
        aliases: [],
        usage: 'calendar',
        description: 'Show this month\'s sign-ins',
        admin: false,
        run: async ({ message }) => {
          const image = await this.calendar.renderPng(message.userId, this.now());
          return { text: '📅 Your sign-ins this month', image };
        },
      },
      {
        name: 'status',
        aliases: ['list'],
        usage: 'status',
        description: 'Report on every monitored user',
        admin: true,
        run: () => {
          const history = this.auditLog;
          return {
            text: buildStatusReport(
              this.registry.list(),
              this.now().getTime(),
              history ? (userId) => history.lastTransition(userId) : undefined
            ),
          };
        },
      },
      {
        name: 'testalert',
        aliases: [],
        usage: 'testalert <account id>',
        description: 'Send a test alert through every channel of a user',
        admin: true,
        run: async ({ args }) => {
          if (!args) return this.usage('testalert');
          const target = args.split(/\s+/)[0] ?? args;
          if (!this.registry.isRegistered(target)) {
            return { text: `❌ User ${target} is not registered.` };
          }
          return { text: formatTestResult(await this.engine.sendTest(target)) };
        },
      },
      {
        name: 'reload',
        aliases: [],
        usage: 'reload',
        description: 'Re-read the user table from disk',
        admin: true,
        run: () => ({ text: `🔄 Reloaded ${this.registry.reload()} users from disk.` }),
      },
      {
        name: 'help',
        aliases: [],
        usage: 'help',
        description: 'List commands',
        admin: false,
        run: ({ message }) => ({ text: this.helpText(this.isAdmin(message.userId)) }),
      },
    ];
  }

  private checkin(message: InboundMessage): CommandReply {
    const { created } = this.registry.registerOrCheckin(message.userId, {
      botId: message.botId,
      groupId: message.groupId,
    });
    if (created) {
      return {
        text: `✅ Registered. Monitoring is on.\nSet an emergency contact soon with ${this.prefix}contact <account id>.`,
      };
    }
    return { text: '✅ Checked in. Your timer has been reset.' };
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ════════════════════════════════════════════════════════════

  private trackActivity(message: InboundMessage): void {
    const before = this.registry.get(message.userId);
    if (!before) return;

    this.registry.recordActivity(message.userId, { botId: message.botId, groupId: message.groupId });

    if (before.alertLevel !== AlertLevel.NORMAL) {
      logger.info({ userId: message.userId, levelBefore: before.alertLevel }, 'User active again, alert cleared');
      this.recorder.record({
        type: 'activity_reset',
        userId: message.userId,
        levelBefore: before.alertLevel,
        levelAfter: AlertLevel.NORMAL,
      });
    }
  }

  private usage(name: string): CommandReply {
    const command = this.lookup.get(name);
    return { text: `Usage: ${this.prefix}${command ? command.usage : name}` };
  }

  private unknownCommandText(name: string): string {
    const suggestion = this.suggest(name);
    const hint = suggestion ? ` Did you mean ${this.prefix}${suggestion}?` : '';
    return `❓ Unknown command "${this.prefix}${name}".${hint} Send ${this.prefix}help for the list.`;
  }

  private helpText(admin: boolean): string {
    const lines = ['📖 Commands:'];
    for (const command of this.commands) {
      if (command.admin && !admin) continue;
      const tag = command.admin ? ' (admin)' : '';
      lines.push(`${this.prefix}${command.usage} - ${command.description}${tag}`);
    }
    return lines.join('\n');
  }

  private errorText(error: unknown, senderId: string, command: string): string {
    if (error instanceof GuardError) {
      if (error.code === GuardErrorCode.NOT_REGISTERED && error.details?.['userId'] === senderId) {
        return NOT_REGISTERED_REPLY;
      }
      return `❌ ${error.message}`;
    }

    logger.error({ userId: senderId, command, error: errorMessage(error) }, 'Command failed');
    return INTERNAL_ERROR_REPLY;
  }
}

function formatOutcome(outcome: boolean | null): string {
  if (outcome === null) return 'n/a';
  return outcome ? 'ok' : 'failed';
}

function formatTestResult(result: TestAlertResult): string {
  return [
    `🔔 Test alert for ${result.userId}:`,
    `   ├ Direct: ${formatOutcome(result.direct)}`,
    `   ├ Group: ${formatOutcome(result.group)}`,
    `   ├ Contact: ${formatOutcome(result.contact)}`,
    `   └ Email: ${result.email ? 'queued' : 'skipped'}`,
  ].join('\n');
}

export default CommandRouter;
