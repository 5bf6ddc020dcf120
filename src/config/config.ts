/**
 * Configuration
 *
 * An optional JSON file validated with zod, then environment overrides.
 * Every option has a default, so an empty file (or none) is a valid
 * configuration.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { GuardError, GuardErrorCode, errorMessage } from '../shared/types.js';

// ─── Schema ──────────────────────────────────────────────────

const idString = z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]).transform(String);

const messagesSchema = z
  .object({
    warn: z.string().min(1),
    emerg: z.string().min(1),
    contactGroupMention: z.string().min(1),
    userEscalated: z.string().min(1),
    noContact: z.string().min(1),
    contactInGroupSuffix: z.string(),
    contactOutOfBandSuffix: z.string(),
    warnSubject: z.string().min(1),
    emergSubject: z.string().min(1),
    test: z.string().min(1),
    testSubject: z.string().min(1),
  })
  .partial()
  .default({});

const smtpSchema = z
  .object({
    host: z.string().default(''),
    port: z.number().int().positive().default(465),
    secure: z.boolean().default(true),
    user: z.string().default(''),
    password: z.string().default(''),
    from: z.string().default(''),
  })
  .default({});

const emailSchema = z
  .object({
    enabled: z.boolean().default(false),
    /** Domain for `<contact>@<domain>` addresses; null disables derivation. */
    derivedDomain: z.string().min(1).nullable().default('qq.com'),
    smtp: smtpSchema,
  })
  .default({});

export const MAX_INTERVAL_SECONDS = 2_147_483;

const botSchema = z.object({
  botId: idString,
  apiUrl: z.string().url().default('http://127.0.0.1:5700'),
  accessToken: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(5000),
  retries: z.number().int().min(0).default(1),
});

const serverSchema = z
  .object({
    port: z.number().int().min(0).max(65535).default(8080),
    /** Bearer token required on /api routes; null leaves them open. */
    adminToken: z.string().min(1).nullable().default(null),
    corsOrigins: z.array(z.string()).default(['*']),
    /** Shared secret for X-Signature on OneBot event posts; null accepts unsigned posts. */
    onebotSecret: z.string().min(1).nullable().default(null),
  })
  .default({});

const holidaysSchema = z
  .object({
    apiUrl: z.string().url().default('https://api.jiejiariapi.com/v1/holidays'),
    timeoutMs: z.number().int().positive().default(5000),
  })
  .default({});

const auditSchema = z
  .object({
    enabled: z.boolean().default(true),
    retentionDays: z.number().int().positive().default(90),
  })
  .default({});

export const configSchema = z.object({
  dataDir: z.string().min(1).default('./data'),
  /** Capped where setInterval still takes the delay (2^31 - 1 ms). */
  checkIntervalSeconds: z.number().int().positive().max(MAX_INTERVAL_SECONDS).default(3600),
  defaultMaxMissingDays: z.number().positive().default(3),
  admins: z.array(idString).default([]),
  commandPrefix: z.string().min(1).default('/'),
  messages: messagesSchema,
  email: emailSchema,
  bots: z.array(botSchema).default([]),
  server: serverSchema,
  holidays: holidaysSchema,
  audit: auditSchema,
});

export type GuardConfig = z.infer<typeof configSchema>;
export type BotConfig = z.infer<typeof botSchema>;

export interface DataPaths {
  users: string;
  checkins: string;
  holidays: string;
  auditDb: string;
}

export interface LoadConfigOptions {
  /** Explicit file path; falls back to GUARD_CONFIG. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

// ─── Loading ─────────────────────────────────────────────────

export function loadConfig(options: LoadConfigOptions = {}): GuardConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['GUARD_CONFIG'];

  const raw = configPath ? readConfigFile(configPath) : {};
  return applyEnvOverrides(parseConfig(raw), env);
}

/** Validates a raw config object. */
export function parseConfig(raw: unknown): GuardConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new GuardError(GuardErrorCode.CONFIG_ERROR, `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function applyEnvOverrides(config: GuardConfig, env: NodeJS.ProcessEnv): GuardConfig {
  const next: GuardConfig = {
    ...config,
    server: { ...config.server },
    email: { ...config.email, smtp: { ...config.email.smtp } },
  };

  const dataDir = env['GUARD_DATA_DIR'];
  if (dataDir) next.dataDir = dataDir;

  const port = env['GUARD_PORT'];
  if (port) next.server.port = parsePort('GUARD_PORT', port);

  const adminToken = env['GUARD_ADMIN_TOKEN'];
  if (adminToken) next.server.adminToken = adminToken;

  const onebotSecret = env['GUARD_ONEBOT_SECRET'];
  if (onebotSecret) next.server.onebotSecret = onebotSecret;

  const smtpHost = env['SMTP_HOST'];
  if (smtpHost) next.email.smtp.host = smtpHost;

  const smtpPort = env['SMTP_PORT'];
  if (smtpPort) next.email.smtp.port = parsePort('SMTP_PORT', smtpPort);

  const smtpUser = env['SMTP_USER'];
  if (smtpUser) next.email.smtp.user = smtpUser;

  const smtpPassword = env['SMTP_PASSWORD'];
  if (smtpPassword) next.email.smtp.password = smtpPassword;

  return next;
}

export function dataPaths(config: GuardConfig): DataPaths {
  return {
    users: path.join(config.dataDir, 'users.json'),
    checkins: path.join(config.dataDir, 'checkins.json'),
    holidays: path.join(config.dataDir, 'holidays.json'),
    auditDb: path.join(config.dataDir, 'alerts.db'),
  };
}

// ─── Helpers ─────────────────────────────────────────────────

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new GuardError(GuardErrorCode.CONFIG_ERROR, `Config file not found: ${configPath}`, { configPath });
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return parsed;
  } catch (error) {
    throw new GuardError(
      GuardErrorCode.CONFIG_ERROR,
      `Config file is not valid JSON: ${configPath}`,
      { configPath, error: errorMessage(error) }
    );
  }
}

function parsePort(name: string, value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new GuardError(GuardErrorCode.CONFIG_ERROR, `${name} must be a port number, got "${value}"`, { [name]: value });
  }
  return port;
}
