/**
 * Shared Types
 *
 * Domain model for the presence monitor: user records, alert levels,
 * and the error taxonomy used across modules.
 */

// ─── Constants ───────────────────────────────────────────────

export const SECONDS_PER_DAY = 86400;

/** Fixed stage-1 window. Users whose own deadline is shorter never get a stage-1 warning. */
export const WARN_THRESHOLD_SECONDS = SECONDS_PER_DAY;

// ─── Alert Levels ────────────────────────────────────────────

export enum AlertLevel {
  NORMAL = 0,
  WARNED = 1,
  ESCALATED = 2,
}

/** Narrows a stored number onto an alert level; anything unknown counts as NORMAL. */
export function toAlertLevel(value: number): AlertLevel {
  switch (value) {
    case 1:
      return AlertLevel.WARNED;
    case 2:
      return AlertLevel.ESCALATED;
    default:
      return AlertLevel.NORMAL;
  }
}

// ─── User Records ────────────────────────────────────────────

/** Where a user was last seen: the bot that received the message and the group, if any. */
export interface ChannelBinding {
  botId: string;
  groupId: string | null;
}

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from: string;
}

export interface UserRecord {
  userId: string;
  binding: ChannelBinding;
  emergencyContact: string | null;
  /** Explicit alert address; overrides the derived contact address. */
  email: string | null;
  /** Stage-2 deadline in days (fractions allowed). */
  maxMissingDays: number;
  /** Epoch milliseconds of the last message or check-in. */
  lastActive: number;
  alertLevel: AlertLevel;
  customWarnMessage: string | null;
  customEmergMessage: string | null;
  /** Per-user SMTP override merged over the configured defaults. */
  smtp: Partial<SmtpSettings> | null;
}

export type MessageStage = 'warn' | 'emerg';

export function cloneRecord(record: UserRecord): UserRecord {
  return {
    ...record,
    binding: { ...record.binding },
    smtp: record.smtp ? { ...record.smtp } : null,
  };
}

// ─── Errors ──────────────────────────────────────────────────

/** Base error class for all monitor operations. */
export class GuardError extends Error {
  public readonly code: GuardErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: GuardErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GuardError';
    this.code = code;
    this.details = details;
  }
}

export enum GuardErrorCode {
  VALIDATION_ERROR = 'GUARD_VALIDATION_ERROR',
  NOT_REGISTERED = 'GUARD_NOT_REGISTERED',
  CHANNEL_UNAVAILABLE = 'GUARD_CHANNEL_UNAVAILABLE',
  PERSISTENCE_CORRUPTION = 'GUARD_PERSISTENCE_CORRUPTION',
  TRANSPORT_FAILURE = 'GUARD_TRANSPORT_FAILURE',
  PERMISSION_DENIED = 'GUARD_PERMISSION_DENIED',
  CONFIG_ERROR = 'GUARD_CONFIG_ERROR',
  INTERNAL_ERROR = 'GUARD_INTERNAL_ERROR',
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
