/**
 * UserRegistry - Main public API facade for monitored users.
 *
 * Owns the in-memory UserTable, applies registration / activity /
 * configuration commands, and syncs the table to the UserStore.
 */

import pino from 'pino';

import { UserTable } from './user-table.js';
import type { UserStore } from '../storage/user-store.js';
import {
  AlertLevel,
  GuardError,
  GuardErrorCode,
  errorMessage,
  type ChannelBinding,
  type MessageStage,
  type SmtpSettings,
  type UserRecord,
} from '../shared/types.js';

const logger = pino({ name: 'guard:registry', level: process.env['LOG_LEVEL'] ?? 'info' });

const CONTACT_PATTERN = /^\d+$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface UserRegistryConfig {
  /** Stage-2 deadline given to new users. Default: 3 */
  defaultMaxMissingDays: number;
  /** Clock, epoch ms. Default: Date.now */
  now: () => number;
}

export const DEFAULT_CONFIG: UserRegistryConfig = {
  defaultMaxMissingDays: 3,
  now: () => Date.now(),
};

export interface RegistrationResult {
  created: boolean;
  record: UserRecord;
}

export class UserRegistry {
  private readonly table = new UserTable();
  private readonly store: UserStore;
  private readonly config: UserRegistryConfig;

  /**
   * Creates the registry and loads the stored table.
   * A corrupt store yields an empty table (see JsonStore).
   */
  constructor(store: UserStore, config: Partial<UserRegistryConfig> = {}) {
    this.store = store;
    this.config = { ...DEFAULT_CONFIG, ...config };

    const loaded = store.load(this.config.now());
    this.table.replaceAll(loaded);
    logger.info(
      { users: loaded.size, unreadable: store.unreadableKeys().length, filePath: store.filePath },
      'User table loaded'
    );
  }

  // ============================================================
  // ACTIVITY
  // ============================================================

  /** Registers a new user, or checks in a known one. */
  registerOrCheckin(userId: string, binding: ChannelBinding): RegistrationResult {
    const now = this.config.now();

    const updated = this.table.update(userId, (record) => {
      record.lastActive = now;
      record.alertLevel = AlertLevel.NORMAL;
      applyBinding(record, binding);
    });
    if (updated) {
      logger.info({ userId }, 'User checked in');
      return { created: false, record: updated };
    }

    const record: UserRecord = {
      userId,
      binding: { ...binding },
      emergencyContact: null,
      email: null,
      maxMissingDays: this.config.defaultMaxMissingDays,
      lastActive: now,
      alertLevel: AlertLevel.NORMAL,
      customWarnMessage: null,
      customEmergMessage: null,
      smtp: null,
    };
    this.table.upsert(record);
    logger.info({ userId, botId: binding.botId }, 'User registered');
    return { created: true, record };
  }

  /**
   * Proof of life from any inbound message. Unknown users are ignored.
   * @returns true when a registered user was updated
   */
  recordActivity(userId: string, binding?: ChannelBinding): boolean {
    const now = this.config.now();
    const updated = this.table.update(userId, (record) => {
      record.lastActive = now;
      record.alertLevel = AlertLevel.NORMAL;
      if (binding) applyBinding(record, binding);
    });
    return updated !== null;
  }

  // ============================================================
  // CONFIGURATION
  // ============================================================

  setContact(userId: string, contactId: string): UserRecord {
    const contact = contactId.trim();
    this.requireUser(userId);
    if (!CONTACT_PATTERN.test(contact)) {
      throw new GuardError(
        GuardErrorCode.VALIDATION_ERROR,
        'The contact must be a numeric account id.',
        { contactId }
      );
    }
    return this.mutate(userId, (record) => {
      record.emergencyContact = contact;
    });
  }

  /** Sets the stage-2 deadline in days; fractions are allowed (0.5 = 12 hours). */
  setThreshold(userId: string, days: number | string): UserRecord {
    this.requireUser(userId);
    const value = typeof days === 'number' ? days : parseDays(days);
    if (!Number.isFinite(value) || value <= 0) {
      throw new GuardError(
        GuardErrorCode.VALIDATION_ERROR,
        'Invalid value. Send a positive number of days, e.g. 3 or 0.5.',
        { days }
      );
    }
    return this.mutate(userId, (record) => {
      record.maxMissingDays = value;
    });
  }

  /** Binds an alert email address; an empty string removes the binding. */
  bindEmail(userId: string, email: string): UserRecord {
    const address = email.trim();
    this.requireUser(userId);
    if (address !== '' && !EMAIL_PATTERN.test(address)) {
      throw new GuardError(
        GuardErrorCode.VALIDATION_ERROR,
        'That does not look like an email address.',
        { email }
      );
    }
    return this.mutate(userId, (record) => {
      record.email = address === '' ? null : address;
    });
  }

  /** Sets the per-user text for a stage; blank text restores the default. */
  setCustomMessage(userId: string, stage: MessageStage, text: string): UserRecord {
    this.requireUser(userId);
    const value = text.trim() === '' ? null : text.trim();
    return this.mutate(userId, (record) => {
      if (stage === 'warn') {
        record.customWarnMessage = value;
      } else {
        record.customEmergMessage = value;
      }
    });
  }

  setSmtpOverride(userId: string, settings: Partial<SmtpSettings> | null): UserRecord {
    this.requireUser(userId);
    if (settings?.port !== undefined && (!Number.isInteger(settings.port) || settings.port <= 0)) {
      throw new GuardError(GuardErrorCode.VALIDATION_ERROR, 'SMTP port must be a positive integer.', { port: settings.port });
    }
    return this.mutate(userId, (record) => {
      record.smtp = settings && Object.keys(settings).length > 0 ? { ...settings } : null;
    });
  }

  // ============================================================
  // ESCALATION SUPPORT
  // ============================================================

  /**
   * Raises a user's alert level after a notification fan-out.
   * Skipped when activity arrived since `observedLastActive` was read,
   * or when the level would not increase.
   */
  applyAlertLevel(userId: string, level: AlertLevel, observedLastActive: number): boolean {
    const current = this.table.get(userId);
    if (!current) return false;
    if (current.lastActive !== observedLastActive || current.alertLevel >= level) {
      return false;
    }
    this.table.update(userId, (record) => {
      record.alertLevel = level;
    });
    return true;
  }

  // ============================================================
  // QUERIES
  // ============================================================

  get(userId: string): UserRecord | null {
    return this.table.get(userId);
  }

  isRegistered(userId: string): boolean {
    return this.table.has(userId);
  }

  list(): UserRecord[] {
    return this.table.values();
  }

  snapshotIds(): string[] {
    return this.table.snapshotIds();
  }

  count(): number {
    return this.table.size;
  }

  isDirty(): boolean {
    return this.table.isDirty();
  }

  // ============================================================
  // PERSISTENCE
  // ============================================================

  /**
   * Writes the table when it has unsaved changes.
   * Failures are logged and leave the table dirty for the next attempt.
   * @returns true when a write happened
   */
  async flush(): Promise<boolean> {
    if (!this.table.isDirty()) return false;

    const version = this.table.getVersion();
    const snapshot = this.table.values();
    try {
      await this.store.save(snapshot);
      this.table.markSaved(version);
      logger.debug({ users: snapshot.length }, 'User table flushed');
      return true;
    } catch (error) {
      logger.error({ filePath: this.store.filePath, error: errorMessage(error) }, 'Failed to flush user table');
      return false;
    }
  }

  /**
   * Re-reads the stored table, replacing the in-memory one.
   * Unflushed in-memory changes are discarded.
   */
  reload(): number {
    const loaded = this.store.load(this.config.now());
    this.table.replaceAll(loaded);
    logger.info({ users: loaded.size }, 'User table reloaded');
    return loaded.size;
  }

  // ============================================================
  // PRIVATE HELPERS
  // ============================================================

  private requireUser(userId: string): void {
    if (!this.table.has(userId)) {
      throw new GuardError(GuardErrorCode.NOT_REGISTERED, `User ${userId} is not registered.`, { userId });
    }
  }

  private mutate(userId: string, fn: (record: UserRecord) => void): UserRecord {
    const updated = this.table.update(userId, fn);
    if (!updated) {
      throw new GuardError(GuardErrorCode.NOT_REGISTERED, `User ${userId} is not registered.`, { userId });
    }
    return updated;
  }
}

function applyBinding(record: UserRecord, binding: ChannelBinding): void {
  record.binding.botId = binding.botId;
  if (binding.groupId) {
    record.binding.groupId = binding.groupId;
  }
}

function parseDays(input: string): number {
  const text = input.trim();
  if (!/^\+?(\d+\.?\d*|\.\d+)$/.test(text)) return Number.NaN;
  return Number(text);
}

export default UserRegistry;
