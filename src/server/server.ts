/**
 * Guard Server — chat event intake and admin API
 *
 * Provides:
 * - OneBot v11 HTTP event posts, answered with a quick-operation reply
 * - Health endpoint for probes
 * - Admin REST API (users, SMTP overrides, reload, test alerts, monitor
 *   and transport health, audit log, calendars)
 *
 * With `onebotSecret` set, event posts must carry
 * `X-Signature: sha1=<hex HMAC-SHA1 of the raw body>`.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { createHmac, timingSafeEqual } from 'crypto';
import type { IncomingMessage, Server } from 'http';
import pino from 'pino';
import { z } from 'zod';

import type { UserRegistry } from '../registry/user-registry.js';
import type { CommandRouter, CommandReply, InboundMessage } from '../commands/command-router.js';
import type { EscalationEngine } from '../engine/escalation-engine.js';
import type { MonitorDaemon } from '../engine/monitor-daemon.js';
import type { AlertLog, AlertEventType } from '../audit/alert-log.js';
import type { CalendarService } from '../checkin/calendar-service.js';
import type { BotRegistry } from '../channels/chat-channel.js';
import type { EmailStats } from '../notify/email-notifier.js';
import { errorMessage, GuardError, type SmtpSettings, type UserRecord } from '../shared/types.js';

const isProd = process.env['NODE_ENV'] === 'production';
const logger = pino({
  name: 'guard:server',
  level: process.env['LOG_LEVEL'] ?? (isProd ? 'info' : 'debug'),
});

// ─── Configuration ───────────────────────────────────────────

export interface GuardServerConfig {
  port: number;
  /** Required as a bearer token on /api routes when set. */
  adminToken: string | null;
  corsOrigins: string[];
  /** HMAC key for X-Signature on /onebot/event; null accepts unsigned posts. */
  onebotSecret: string | null;
  /** Enable request logging (default: true) */
  requestLogging?: boolean;
}

export const DEFAULT_CONFIG: GuardServerConfig = {
  port: 8080,
  adminToken: null,
  corsOrigins: ['*'],
  onebotSecret: null,
};

export interface GuardServerDeps {
  registry: UserRegistry;
  router: CommandRouter;
  engine: EscalationEngine;
  calendar: CalendarService;
  daemon?: MonitorDaemon;
  auditLog?: AlertLog | null;
  bots?: BotRegistry;
  email?: { getStats(): EmailStats };
}

// ─── Request schemas ─────────────────────────────────────────

const accountId = z.union([z.string(), z.number()]).transform(String);

const segmentSchema = z.object({
  type: z.string(),
  data: z.record(z.string(), z.unknown()).optional(),
});

const messageEventSchema = z.object({
  post_type: z.literal('message'),
  message_type: z.enum(['private', 'group']),
  self_id: accountId,
  user_id: accountId,
  group_id: accountId.optional(),
  raw_message: z.string().optional(),
  message: z.union([z.string(), z.array(segmentSchema)]).optional(),
});

type MessageEvent = z.infer<typeof messageEventSchema>;

const smtpUpdateSchema = z.object({
  smtp: z
    .object({
      host: z.string(),
      port: z.number().int().min(1).max(65535),
      secure: z.boolean(),
      user: z.string(),
      password: z.string(),
      from: z.string(),
    })
    .partial()
    .strict()
    .nullable(),
});

const ALERT_TYPES = [
  'stage1_warning',
  'stage2_escalation',
  'notification_sent',
  'notification_failed',
  'test_alert',
  'activity_reset',
  'sweep_complete',
  'system_startup',
  'system_shutdown',
] as const satisfies readonly AlertEventType[];

const calendarQuerySchema = z.object({
  format: z.enum(['png', 'svg']).default('png'),
});

const alertQuerySchema = z.object({
  userId: z.string().optional(),
  type: z.enum(ALERT_TYPES).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(50),
  offset: z.coerce.number().int().nonnegative().default(0),
});

/** Raw request bodies, kept for signature checks. */
const rawBodies = new WeakMap<IncomingMessage, Buffer>();

// ─── Guard Server Class ──────────────────────────────────────

export class GuardServer {
  private app: express.Application;
  private config: GuardServerConfig;
  private deps: GuardServerDeps;
  private server?: Server;
  private startedAt: number = 0;
  private requestCount: number = 0;
  private isShuttingDown: boolean = false;

  constructor(deps: GuardServerDeps, config: Partial<GuardServerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.deps = deps;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /** The express app, for mounting or in-process testing. */
  getApp(): express.Application {
    return this.app;
  }

  // ─── Middleware ────────────────────────────────────────────

  private setupMiddleware(): void {
    this.app.use(cors({ origin: this.config.corsOrigins }));
    this.app.use(
      express.json({
        verify: (req, _res, buf) => {
          rawBodies.set(req, buf);
        },
      })
    );

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.requestCount++;
      if (this.config.requestLogging !== false) {
        logger.debug({ method: req.method, path: req.path }, 'Request');
      }
      next();
    });

    this.app.use('/api', (req: Request, res: Response, next: NextFunction) => {
      const token = this.config.adminToken;
      if (token && req.get('authorization') !== `Bearer ${token}`) {
        res.status(401).json({ error: 'Unauthorized' });
        return;
      }
      next();
    });
  }

  // ─── Routes ────────────────────────────────────────────────

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      if (this.isShuttingDown) {
        res.status(503).json({ status: 'shutting_down' });
        return;
      }
      res.json({
        status: 'ok',
        uptime: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
        users: this.deps.registry.count(),
        requests: this.requestCount,
        timestamp: new Date().toISOString(),
      });
    });

    // ─── Chat Events ─────────────────────────────────────────

    this.app.post('/onebot/event', async (req, res) => {
      const signatureError = this.checkSignature(req);
      if (signatureError) {
        logger.warn({ ip: req.ip, reason: signatureError }, 'Rejected OneBot event');
        res.status(401).json({ error: signatureError });
        return;
      }

      const parsed = messageEventSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(204).end();
        return;
      }

      try {
        const reply = await this.deps.router.handle(toInboundMessage(parsed.data));
        if (!reply) {
          res.status(204).end();
          return;
        }
        res.json({ reply: toReplyMessage(reply) });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to handle chat event');
        res.status(500).json({ error: 'Failed to handle event' });
      }
    });

    // ─── Users ───────────────────────────────────────────────

    this.app.get('/api/users', (_req, res) => {
      const now = Date.now();
      const users = this.deps.registry.list().map((record) => toUserView(record, now));
      res.json({ users, total: users.length });
    });

    this.app.put('/api/users/:id/smtp', async (req, res) => {
      const userId = req.params['id'] ?? '';
      if (!this.deps.registry.isRegistered(userId)) {
        res.status(404).json({ error: 'User not found' });
        return;
      }

      const body = smtpUpdateSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({
          error: 'Invalid SMTP settings',
          issues: body.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
        return;
      }

      try {
        const record = this.deps.registry.setSmtpOverride(userId, body.data.smtp);
        await this.deps.registry.flush();
        logger.info({ userId, cleared: record.smtp === null }, 'SMTP override updated');
        res.json({ userId, smtp: redactSmtp(record.smtp) });
      } catch (error) {
        if (error instanceof GuardError) {
          res.status(400).json({ error: error.message });
          return;
        }
        logger.error({ userId, error: errorMessage(error) }, 'Failed to update SMTP override');
        res.status(500).json({ error: 'Failed to update SMTP override' });
      }
    });

    this.app.post('/api/reload', (_req, res) => {
      try {
        const users = this.deps.registry.reload();
        res.json({ users });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to reload users');
        res.status(500).json({ error: 'Failed to reload users' });
      }
    });

    this.app.post('/api/users/:id/test', async (req, res) => {
      const userId = req.params['id'] ?? '';
      if (!this.deps.registry.isRegistered(userId)) {
        res.status(404).json({ error: 'User not found' });
        return;
      }
      try {
        res.json(await this.deps.engine.sendTest(userId));
      } catch (error) {
        logger.error({ userId, error: errorMessage(error) }, 'Failed to send test alert');
        res.status(500).json({ error: 'Failed to send test alert' });
      }
    });

    // ─── Monitor ─────────────────────────────────────────────

    this.app.get('/api/monitor', (_req, res) => {
      const daemon = this.deps.daemon;
      if (!daemon) {
        res.status(503).json({ error: 'Monitor not running' });
        return;
      }
      try {
        res.json({
          ...daemon.getStatus(),
          bots: this.deps.bots?.health() ?? [],
          email: this.deps.email?.getStats() ?? null,
          audit: this.deps.auditLog?.getStats() ?? null,
        });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to collect monitor status');
        res.status(500).json({ error: 'Failed to collect monitor status' });
      }
    });

    this.app.post('/api/sweep', async (_req, res) => {
      const daemon = this.deps.daemon;
      if (!daemon) {
        res.status(503).json({ error: 'Monitor not running' });
        return;
      }
      const report = await daemon.tick();
      if (!report) {
        res.status(409).json({ error: 'A sweep is already running or failed' });
        return;
      }
      res.json(report);
    });

    // ─── Audit Log ───────────────────────────────────────────

    this.app.get('/api/alerts', (req, res) => {
      const auditLog = this.deps.auditLog;
      if (!auditLog) {
        res.status(503).json({ error: 'Audit log disabled' });
        return;
      }

      const query = alertQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'Invalid query', issues: query.error.issues.map((i) => i.message) });
        return;
      }

      try {
        const { limit, offset, userId, type } = query.data;
        const entries = auditLog.query({ limit, offset, userId, type });
        res.json({ entries, limit, offset });
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to query audit log');
        res.status(500).json({ error: 'Failed to query audit log' });
      }
    });

    // ─── Calendar ────────────────────────────────────────────

    this.app.get('/api/calendar/:id', async (req, res) => {
      const query = calendarQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'Invalid query', issues: query.error.issues.map((i) => i.message) });
        return;
      }

      const userId = req.params['id'] ?? '';
      try {
        if (query.data.format === 'svg') {
          res.type('svg').send(await this.deps.calendar.renderSvg(userId));
          return;
        }
        res.type('png').send(await this.deps.calendar.renderPng(userId));
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Failed to render calendar');
        res.status(500).json({ error: 'Failed to render calendar' });
      }
    });
  }

  /** Returns a rejection reason, or null when the post may proceed. */
  private checkSignature(req: Request): string | null {
    const secret = this.config.onebotSecret;
    if (!secret) return null;

    const header = req.get('x-signature');
    if (!header) return 'Missing signature';

    const raw = rawBodies.get(req) ?? Buffer.alloc(0);
    const expected = Buffer.from(`sha1=${createHmac('sha1', secret).update(raw).digest('hex')}`);
    const given = Buffer.from(header);
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      return 'Invalid signature';
    }
    return null;
  }

  // ─── Lifecycle ─────────────────────────────────────────────

  start(): Promise<void> {
    return new Promise((resolve) => {
      this.server = this.app.listen(this.config.port, '0.0.0.0', () => {
        this.startedAt = Date.now();
        logger.info({ port: this.config.port }, 'Guard server started');
        resolve();
      });
    });
  }

  /**
   * Gracefully stop the server.
   * Sets shutting down flag first, then closes connections.
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }

      logger.info('Initiating graceful shutdown...');
      this.isShuttingDown = true;

      // Give in-flight requests time to complete (5 seconds max)
      const forceShutdownTimeout = setTimeout(() => {
        logger.warn('Force closing server after timeout');
        resolve();
      }, 5000);

      server.close((err) => {
        clearTimeout(forceShutdownTimeout);
        if (err) {
          logger.error({ error: err.message }, 'Error during shutdown');
          reject(err);
        } else {
          logger.info('Server stopped gracefully');
          resolve();
        }
      });
    });
  }

  isRunning(): boolean {
    return this.server !== undefined && !this.isShuttingDown;
  }

  getPort(): number {
    return this.config.port;
  }
}

// ─── Helpers ─────────────────────────────────────────────────

export function toInboundMessage(event: MessageEvent): InboundMessage {
  return {
    userId: event.user_id,
    botId: event.self_id,
    groupId: event.message_type === 'group' ? event.group_id ?? null : null,
    text: eventText(event),
  };
}

function eventText(event: MessageEvent): string {
  if (event.raw_message !== undefined) return event.raw_message;
  if (typeof event.message === 'string') return event.message;
  if (!event.message) return '';

  return event.message
    .map((segment) => {
      const text = segment.data?.['text'];
      return segment.type === 'text' && typeof text === 'string' ? text : '';
    })
    .join('');
}

type ReplySegment =
  | { type: 'text'; data: { text: string } }
  | { type: 'image'; data: { file: string } };

function toReplyMessage(reply: CommandReply): ReplySegment[] {
  const segments: ReplySegment[] = [{ type: 'text', data: { text: reply.text } }];
  if (reply.image) {
    segments.push({ type: 'image', data: { file: `base64://${reply.image.toString('base64')}` } });
  }
  return segments;
}

function redactSmtp(smtp: Partial<SmtpSettings> | null): Partial<SmtpSettings> | null {
  if (!smtp) return null;
  return smtp.password ? { ...smtp, password: '********' } : { ...smtp };
}

function toUserView(record: UserRecord, now: number) {
  return {
    userId: record.userId,
    alertLevel: record.alertLevel,
    lastActive: new Date(record.lastActive).toISOString(),
    silentSeconds: Math.max(0, Math.floor((now - record.lastActive) / 1000)),
    maxMissingDays: record.maxMissingDays,
    emergencyContact: record.emergencyContact,
    email: record.email,
    botId: record.binding.botId,
    groupId: record.binding.groupId,
  };
}

export default GuardServer;
