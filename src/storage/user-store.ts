/**
 * UserStore — the persisted user table.
 *
 * On disk: one JSON object keyed by user id, each value a snake_case
 * record. In memory: camelCase UserRecord values.
 */

import pino from 'pino';
import { z } from 'zod';

import { JsonStore, type LoadResult } from './json-store.js';
import { toAlertLevel, type UserRecord } from '../shared/types.js';

const logger = pino({ name: 'guard:user-store', level: process.env['LOG_LEVEL'] ?? 'info' });

/** Below this, a stored timestamp is taken to be epoch seconds. */
const LEGACY_SECONDS_CUTOFF = 1e11;

const idSchema = z.union([z.string(), z.number()]).transform(String);

/** Empty strings were written for unset fields by older versions. */
const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));

const smtpOverrideSchema = z
  .object({
    host: z.string(),
    port: z.number().int().positive(),
    secure: z.boolean(),
    user: z.string(),
    password: z.string(),
    from: z.string(),
  })
  .partial();

export const persistedUserSchema = z.object({
  user_id: idSchema.optional(),
  bot_id: idSchema.default(''),
  group_id: idSchema.nullish(),
  emergency_contact: idSchema.nullish(),
  email: optionalText,
  max_missing_days: z.coerce.number().positive().default(3),
  last_active: z.coerce.number().nonnegative().nullish(),
  alert_level: z.coerce.number().int().min(0).max(2).default(0),
  custom_warn_message: optionalText,
  custom_emerg_message: optionalText,
  smtp: smtpOverrideSchema.nullish(),
});

export type PersistedUser = z.input<typeof persistedUserSchema>;

const documentSchema = z.record(z.string(), z.unknown());

export type UserDocument = z.infer<typeof documentSchema>;

export class UserStore {
  private readonly store: JsonStore<UserDocument>;
  /** Entries that did not decode, written back untouched on save. */
  private readonly unreadable = new Map<string, unknown>();

  constructor(filePath: string) {
    this.store = new JsonStore<UserDocument>({
      filePath,
      empty: () => ({}),
      decode: (raw) => {
        const parsed = documentSchema.safeParse(raw);
        return parsed.success ? parsed.data : null;
      },
    });
  }

  get filePath(): string {
    return this.store.filePath;
  }

  load(now: number = Date.now()): Map<string, UserRecord> {
    return this.loadWithInfo(now).data;
  }

  loadWithInfo(now: number = Date.now()): LoadResult<Map<string, UserRecord>> {
    const result = this.store.loadWithInfo();
    const records = new Map<string, UserRecord>();
    this.unreadable.clear();

    for (const [key, value] of Object.entries(result.data)) {
      const record = fromPersisted(key, value, now);
      if (record === null) {
        this.unreadable.set(key, value);
        continue;
      }
      records.set(record.userId, record);
    }

    return { data: records, recovered: result.recovered, backupPath: result.backupPath };
  }

  /** Keys of entries kept as-is because they could not be decoded. */
  unreadableKeys(): string[] {
    return [...this.unreadable.keys()];
  }

  async save(records: Iterable<UserRecord>): Promise<void> {
    const doc: UserDocument = {};
    for (const record of records) {
      doc[record.userId] = toPersisted(record);
    }
    for (const [key, value] of this.unreadable) {
      if (!(key in doc)) doc[key] = value;
    }
    await this.store.save(doc);
  }
}

// ─── Mapping ─────────────────────────────────────────────────

/**
 * Decodes one stored entry. Numeric fields written as strings are
 * coerced; a missing last_active counts from `now`.
 */
export function fromPersisted(key: string, value: unknown, now: number = Date.now()): UserRecord | null {
  const parsed = persistedUserSchema.safeParse(value);
  if (!parsed.success) {
    logger.error(
      { userId: key, issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
      'Unreadable user record kept as-is, not monitored'
    );
    return null;
  }

  const row = parsed.data;
  const stored = row.last_active ?? now;
  const lastActive = stored < LEGACY_SECONDS_CUTOFF ? stored * 1000 : stored;

  return {
    userId: row.user_id ?? key,
    binding: {
      botId: row.bot_id,
      groupId: row.group_id ? row.group_id : null,
    },
    emergencyContact: row.emergency_contact ? row.emergency_contact : null,
    email: row.email,
    maxMissingDays: row.max_missing_days,
    lastActive,
    alertLevel: toAlertLevel(row.alert_level),
    customWarnMessage: row.custom_warn_message,
    customEmergMessage: row.custom_emerg_message,
    smtp: row.smtp ?? null,
  };
}

export function toPersisted(record: UserRecord): PersistedUser {
  const row: PersistedUser = {
    user_id: record.userId,
    bot_id: record.binding.botId,
    max_missing_days: record.maxMissingDays,
    last_active: record.lastActive,
    alert_level: record.alertLevel,
  };

  if (record.binding.groupId) row.group_id = record.binding.groupId;
  if (record.emergencyContact) row.emergency_contact = record.emergencyContact;
  if (record.email) row.email = record.email;
  if (record.customWarnMessage) row.custom_warn_message = record.customWarnMessage;
  if (record.customEmergMessage) row.custom_emerg_message = record.customEmergMessage;
  if (record.smtp) row.smtp = record.smtp;

  return row;
}

export default UserStore;
