/**
 * CheckinTracker — daily sign-in log.
 *
 * One JSON document maps user id to the sorted list of local dates
 * ("YYYY-MM-DD") the user signed in on. Independent of presence
 * monitoring: signing in does not reset the alert timer by itself.
 */

import pino from 'pino';
import { z } from 'zod';

import { JsonStore } from '../storage/json-store.js';
import { toIsoDate } from '../shared/format.js';
import { errorMessage } from '../shared/types.js';

const logger = pino({ name: 'guard:checkin', level: process.env['LOG_LEVEL'] ?? 'info' });

const checkinDocumentSchema = z.record(z.string(), z.array(z.string()));

export type CheckinDocument = z.infer<typeof checkinDocumentSchema>;

export interface SignInResult {
  ok: boolean;
  message: string;
  /** Consecutive days ending today. */
  streak: number;
  /** All-time sign-in count. */
  total: number;
}

export class CheckinTracker {
  private readonly store: JsonStore<CheckinDocument>;
  private data: CheckinDocument;

  constructor(filePath: string) {
    this.store = new JsonStore<CheckinDocument>({
      filePath,
      empty: () => ({}),
      decode: (raw) => {
        const parsed = checkinDocumentSchema.safeParse(raw);
        return parsed.success ? parsed.data : null;
      },
    });
    this.data = this.store.load();
  }

  /** Records today's sign-in; a second one on the same day is rejected. */
  async signIn(userId: string, today: Date = new Date()): Promise<SignInResult> {
    const date = toIsoDate(today);
    const dates = this.data[userId] ?? [];

    if (dates.includes(date)) {
      return {
        ok: false,
        message: 'You already signed in today.',
        streak: this.getStreak(userId, today),
        total: dates.length,
      };
    }

    this.data[userId] = [...dates, date].sort();
    try {
      await this.store.save(this.data);
    } catch (error) {
      logger.error({ userId, filePath: this.store.filePath, error: errorMessage(error) }, 'Failed to save check-ins');
    }

    const streak = this.getStreak(userId, today);
    logger.info({ userId, date, streak }, 'User signed in');
    return {
      ok: true,
      message: 'Signed in!',
      streak,
      total: dates.length + 1,
    };
  }

  /**
   * Consecutive signed days ending today, or ending yesterday when
   * today has no sign-in yet.
   */
  getStreak(userId: string, today: Date = new Date()): number {
    const signed = new Set(this.data[userId] ?? []);
    const cursor = new Date(today.getFullYear(), today.getMonth(), today.getDate());

    if (!signed.has(toIsoDate(cursor))) {
      cursor.setDate(cursor.getDate() - 1);
    }

    let streak = 0;
    while (signed.has(toIsoDate(cursor))) {
      streak++;
      cursor.setDate(cursor.getDate() - 1);
    }
    return streak;
  }

  getDates(userId: string): string[] {
    return [...(this.data[userId] ?? [])];
  }

  /** Dates signed within one month (1-12). */
  getMonthDates(userId: string, year: number, month: number): string[] {
    const prefix = `${year}-${String(month).padStart(2, '0')}-`;
    return this.getDates(userId).filter((date) => date.startsWith(prefix));
  }
}

export default CheckinTracker;
