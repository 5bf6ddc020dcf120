/**
 * Composition root: builds every component from a validated config.
 */

import pino from 'pino';

import { dataPaths, type GuardConfig } from './config/config.js';
import { UserStore } from './storage/user-store.js';
import { UserRegistry } from './registry/user-registry.js';
import { BotRegistry } from './channels/chat-channel.js';
import { OneBotClient } from './channels/onebot-client.js';
import { EmailNotifier } from './notify/email-notifier.js';
import { AlertLog } from './audit/alert-log.js';
import { EscalationEngine } from './engine/escalation-engine.js';
import { MonitorDaemon } from './engine/monitor-daemon.js';
import { CheckinTracker } from './checkin/checkin-tracker.js';
import { HolidayClient } from './checkin/holiday-client.js';
import { CalendarService } from './checkin/calendar-service.js';
import { CommandRouter } from './commands/command-router.js';
import { GuardServer } from './server/server.js';

const logger = pino({ name: 'guard:bootstrap', level: process.env['LOG_LEVEL'] ?? 'info' });

export interface GuardApp {
  config: GuardConfig;
  registry: UserRegistry;
  bots: BotRegistry;
  email: EmailNotifier;
  auditLog: AlertLog | null;
  engine: EscalationEngine;
  daemon: MonitorDaemon;
  router: CommandRouter;
  server: GuardServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createApp(config: GuardConfig): GuardApp {
  const paths = dataPaths(config);

  const registry = new UserRegistry(new UserStore(paths.users), {
    defaultMaxMissingDays: config.defaultMaxMissingDays,
  });

  const bots = new BotRegistry();
  for (const bot of config.bots) {
    bots.register(
      new OneBotClient({
        botId: bot.botId,
        apiUrl: bot.apiUrl,
        accessToken: bot.accessToken,
        timeoutMs: bot.timeoutMs,
        retries: bot.retries,
      })
    );
  }
  if (config.bots.length === 0) {
    logger.warn('No bots configured; chat notifications will be skipped');
  }
  if (!config.server.onebotSecret) {
    logger.warn('No OneBot secret configured; event posts are accepted unsigned');
  }

  const email = new EmailNotifier({
    enabled: config.email.enabled,
    smtp: config.email.smtp,
    derivedDomain: config.email.derivedDomain,
  });

  const auditLog = config.audit.enabled
    ? new AlertLog({ databasePath: paths.auditDb, retentionDays: config.audit.retentionDays })
    : null;

  const engine = new EscalationEngine({
    registry,
    bots,
    email,
    auditLog: auditLog ?? undefined,
    messages: config.messages,
  });

  const daemon = new MonitorDaemon(engine, registry, {
    checkIntervalSeconds: config.checkIntervalSeconds,
  });

  const checkins = new CheckinTracker(paths.checkins);
  const calendar = new CalendarService(
    checkins,
    new HolidayClient({
      apiUrl: config.holidays.apiUrl,
      timeoutMs: config.holidays.timeoutMs,
      cachePath: paths.holidays,
    })
  );

  const router = new CommandRouter({
    registry,
    engine,
    checkins,
    calendar,
    auditLog: auditLog ?? undefined,
    admins: config.admins,
    prefix: config.commandPrefix,
  });

  const server = new GuardServer(
    { registry, router, engine, calendar, daemon, auditLog, bots, email },
    {
      port: config.server.port,
      adminToken: config.server.adminToken,
      corsOrigins: config.server.corsOrigins,
      onebotSecret: config.server.onebotSecret,
    }
  );

  return {
    config,
    registry,
    bots,
    email,
    auditLog,
    engine,
    daemon,
    router,
    server,

    async start() {
      if (auditLog) {
        const purged = auditLog.purgeOldEntries();
        if (purged > 0) logger.info({ purged }, 'Purged old audit entries');
      }
      await server.start();
      daemon.start();
    },

    async stop() {
      await server.stop();
      await daemon.stop();
      await email.drain();
      auditLog?.close();
    },
  };
}
