/**
 * Alert Log - Audit trail for escalation decisions and notifications
 *
 * Records every stage transition, every notification attempt and every
 * sweep to SQLite so operators can answer "who was alerted, when, and
 * did it arrive". Writes are batched and flushed on size or on demand.
 */

import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** Alert log configuration. */
export interface AlertLogConfig {
  /** Path to the SQLite database (":memory:" allowed). */
  databasePath: string;
  /** Retention period in days (default: 90). */
  retentionDays?: number;
  /** Pending entries that trigger a flush (default: 50). */
  batchSize?: number;
}

/** Kinds of logged events. */
export type AlertEventType =
  | 'stage1_warning'
  | 'stage2_escalation'
  | 'notification_sent'
  | 'notification_failed'
  | 'test_alert'
  | 'activity_reset'
  | 'sweep_complete'
  | 'system_startup'
  | 'system_shutdown';

/** Channel a notification went through. */
export type AlertChannel = 'direct' | 'group' | 'email' | 'chat';

/** A logged event. */
export interface AlertEntry {
  id: string;
  type: AlertEventType;
  /** ISO timestamp. */
  timestamp: string;
  /** Monitored user the event concerns. */
  userId?: string;
  channel?: AlertChannel;
  /** Account or address that was notified. */
  target?: string;
  levelBefore?: number;
  levelAfter?: number;
  /** Error text or free-form note. */
  detail?: string;
}

export type AlertEventInput = Omit<AlertEntry, 'id' | 'timestamp'>;

/** Query filters. */
export interface AlertQuery {
  type?: AlertEventType;
  types?: AlertEventType[];
  userId?: string;
  channel?: AlertChannel;
  /** Start timestamp (inclusive). */
  startTime?: string;
  /** End timestamp (inclusive). */
  endTime?: string;
  limit?: number;
  offset?: number;
  orderDir?: 'asc' | 'desc';
}

export interface AlertStats {
  totalEvents: number;
  byType: Record<string, number>;
  byChannel: Record<string, number>;
  failedNotifications: number;
}

/** What producers need; lets tests and callers swap in a no-op. */
export interface AlertRecorder {
  record(event: AlertEventInput): void;
}

interface AlertRow {
  id: string;
  type: string;
  timestamp: string;
  user_id: string | null;
  channel: string | null;
  target: string | null;
  level_before: number | null;
  level_after: number | null;
  detail: string | null;
}

const EVENT_TYPES: readonly AlertEventType[] = [
  'stage1_warning',
  'stage2_escalation',
  'notification_sent',
  'notification_failed',
  'test_alert',
  'activity_reset',
  'sweep_complete',
  'system_startup',
  'system_shutdown',
];

const CHANNELS: readonly AlertChannel[] = ['direct', 'group', 'email', 'chat'];

// ═══════════════════════════════════════════════════════════════
// ALERT LOG
// ═══════════════════════════════════════════════════════════════

export class AlertLog implements AlertRecorder {
  private readonly config: Required<AlertLogConfig>;
  private db: Database.Database;
  private initialized = false;
  private pendingWrites: AlertEntry[] = [];

  constructor(config: AlertLogConfig) {
    this.config = {
      databasePath: config.databasePath,
      retentionDays: config.retentionDays ?? 90,
      batchSize: config.batchSize ?? 50,
    };

    if (this.config.databasePath !== ':memory:') {
      const dbDir = dirname(this.config.databasePath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(this.config.databasePath);
    this.initSchema();
    this.initialized = true;

    this.record({ type: 'system_startup', detail: 'Alert log initialized' });
  }

  /** Queue an event; flushed when the batch is full. */
  record(event: AlertEventInput): void {
    const entry: AlertEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...event,
    };

    this.pendingWrites.push(entry);

    if (this.pendingWrites.length >= this.config.batchSize) {
      this.flush();
    }
  }

  /**
   * Query the log. Pending entries are flushed first.
   */
  query(filters: AlertQuery = {}): AlertEntry[] {
    this.flush();

    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filters.type) {
      conditions.push('type = ?');
      params.push(filters.type);
    }

    if (filters.types && filters.types.length > 0) {
      conditions.push(`type IN (${filters.types.map(() => '?').join(', ')})`);
      params.push(...filters.types);
    }

    if (filters.userId) {
      conditions.push('user_id = ?');
      params.push(filters.userId);
    }

    if (filters.channel) {
      conditions.push('channel = ?');
      params.push(filters.channel);
    }

    if (filters.startTime) {
      conditions.push('timestamp >= ?');
      params.push(filters.startTime);
    }

    if (filters.endTime) {
      conditions.push('timestamp <= ?');
      params.push(filters.endTime);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const orderDir = filters.orderDir === 'asc' ? 'ASC' : 'DESC';
    const limit = filters.limit || 100;
    const offset = filters.offset || 0;

    const sql = `
      SELECT * FROM alert_log
      ${whereClause}
      ORDER BY timestamp ${orderDir}, seq ${orderDir}
      LIMIT ? OFFSET ?
    `;

    const rows = this.db.prepare<unknown[], AlertRow>(sql).all(...params, limit, offset);
    return rows.map(rowToEntry);
  }

  /** Latest stage transition for a user, if any. */
  lastTransition(userId: string): AlertEntry | null {
    const [latest] = this.query({
      userId,
      types: ['stage1_warning', 'stage2_escalation'],
      limit: 1,
    });
    return latest ?? null;
  }

  /** Aggregated counts over the whole log. */
  getStats(): AlertStats {
    this.flush();

    const countRow = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM alert_log')
      .get();

    const byTypeRows = this.db
      .prepare<[], { type: string; count: number }>('SELECT type, COUNT(*) as count FROM alert_log GROUP BY type')
      .all();

    const byChannelRows = this.db
      .prepare<[], { channel: string; count: number }>(
        'SELECT channel, COUNT(*) as count FROM alert_log WHERE channel IS NOT NULL GROUP BY channel'
      )
      .all();

    const byType = Object.fromEntries(byTypeRows.map(r => [r.type, r.count]));

    return {
      totalEvents: countRow?.count ?? 0,
      byType,
      byChannel: Object.fromEntries(byChannelRows.map(r => [r.channel, r.count])),
      failedNotifications: byType['notification_failed'] ?? 0,
    };
  }

  /**
   * Purge entries beyond the retention period.
   */
  purgeOldEntries(): number {
    this.flush();

    const cutoffDate = new Date();
    cutoffDate.setDate(cutoffDate.getDate() - this.config.retentionDays);

    const result = this.db
      .prepare('DELETE FROM alert_log WHERE timestamp < ?')
      .run(cutoffDate.toISOString());

    return result.changes;
  }

  /**
   * Flush any pending writes.
   */
  flush(): void {
    if (this.pendingWrites.length === 0 || !this.initialized) return;

    const stmt = this.db.prepare(`
      INSERT INTO alert_log (
        id, type, timestamp, user_id, channel, target, level_before, level_after, detail
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const insertMany = this.db.transaction((entries: AlertEntry[]) => {
      for (const entry of entries) {
        stmt.run(
          entry.id,
          entry.type,
          entry.timestamp,
          entry.userId ?? null,
          entry.channel ?? null,
          entry.target ?? null,
          entry.levelBefore ?? null,
          entry.levelAfter ?? null,
          entry.detail ?? null
        );
      }
    });

    insertMany(this.pendingWrites);
    this.pendingWrites = [];
  }

  getCount(): number {
    this.flush();
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM alert_log').get();
    return row?.count ?? 0;
  }

  /**
   * Close the log.
   */
  close(): void {
    if (!this.initialized) return;
    this.record({ type: 'system_shutdown', detail: 'Alert log closing' });
    this.flush();
    this.db.close();
    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS alert_log (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        type TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        user_id TEXT,
        channel TEXT,
        target TEXT,
        level_before INTEGER,
        level_after INTEGER,
        detail TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_alert_log_timestamp ON alert_log(timestamp);
      CREATE INDEX IF NOT EXISTS idx_alert_log_type ON alert_log(type);
      CREATE INDEX IF NOT EXISTS idx_alert_log_user ON alert_log(user_id);
    `);
  }
}

/** Convert a database row to an AlertEntry. */
function rowToEntry(row: AlertRow): AlertEntry {
  const type = EVENT_TYPES.find(t => t === row.type) ?? 'system_startup';
  const entry: AlertEntry = {
    id: row.id,
    type,
    timestamp: row.timestamp,
  };

  const channel = CHANNELS.find(c => c === row.channel);
  if (row.user_id) entry.userId = row.user_id;
  if (channel) entry.channel = channel;
  if (row.target) entry.target = row.target;
  if (row.level_before !== null) entry.levelBefore = row.level_before;
  if (row.level_after !== null) entry.levelAfter = row.level_after;
  if (row.detail) entry.detail = row.detail;

  return entry;
}

/** Discards events; used when no audit database is configured. */
export const NULL_RECORDER: AlertRecorder = {
  record: () => undefined,
};

export default AlertLog;
