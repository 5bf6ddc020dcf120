/**
 * Holiday Client - Public holiday lookup for the calendar
 *
 * Fetches `<apiUrl>/<year>`, a JSON map of date → { name, isOffDay }.
 * A non-empty year is cached on disk indefinitely; failures yield an
 * empty map and the calendar falls back to weekends.
 */

import pino from 'pino';
import { z } from 'zod';

import { JsonStore } from '../storage/json-store.js';
import { errorMessage } from '../shared/types.js';

const logger = pino({ name: 'guard:holidays', level: process.env['LOG_LEVEL'] ?? 'info' });

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface HolidayClientConfig {
  /** Base URL; the year is appended as a path segment. */
  apiUrl: string;
  /** Request timeout in milliseconds. Default: 5000 */
  timeoutMs: number;
  /** Cache document path. */
  cachePath: string;
}

export const DEFAULT_CONFIG: Omit<HolidayClientConfig, 'cachePath'> = {
  apiUrl: 'https://api.jiejiariapi.com/v1/holidays',
  timeoutMs: 5000,
};

const holidayInfoSchema = z.object({
  name: z.string().default(''),
  isOffDay: z.boolean().default(false),
});

const holidayMapSchema = z.record(z.string(), holidayInfoSchema);

const cacheDocumentSchema = z.record(z.string(), holidayMapSchema);

export type HolidayInfo = z.infer<typeof holidayInfoSchema>;

/** Date ("YYYY-MM-DD") → holiday info. */
export type HolidayMap = z.infer<typeof holidayMapSchema>;

type CacheDocument = z.infer<typeof cacheDocumentSchema>;

// ═══════════════════════════════════════════════════════════════
// HOLIDAY CLIENT
// ═══════════════════════════════════════════════════════════════

export class HolidayClient {
  private readonly config: HolidayClientConfig;
  private readonly store: JsonStore<CacheDocument>;
  private cache: CacheDocument;

  constructor(config: Partial<HolidayClientConfig> & { cachePath: string }) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      apiUrl: (config.apiUrl ?? DEFAULT_CONFIG.apiUrl).replace(/\/+$/, ''),
    };
    this.store = new JsonStore<CacheDocument>({
      filePath: this.config.cachePath,
      empty: () => ({}),
      decode: (raw) => {
        const parsed = cacheDocumentSchema.safeParse(raw);
        return parsed.success ? parsed.data : null;
      },
    });
    this.cache = this.store.load();
  }

  /**
   * Holiday map for a year. Never rejects.
   */
  async getHolidays(year: number): Promise<HolidayMap> {
    const key = String(year);
    const cached = this.cache[key];
    if (cached && Object.keys(cached).length > 0) {
      return cached;
    }

    const fetched = await this.fetchYear(year);
    if (Object.keys(fetched).length > 0) {
      this.cache[key] = fetched;
      try {
        await this.store.save(this.cache);
      } catch (error) {
        logger.warn({ year, error: errorMessage(error) }, 'Failed to cache holidays');
      }
    }
    return fetched;
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private async fetchYear(year: number): Promise<HolidayMap> {
    const url = `${this.config.apiUrl}/${year}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      logger.debug({ url }, 'Fetching holidays');
      const response = await fetch(url, { signal: controller.signal });

      if (!response.ok) {
        logger.warn({ url, status: response.status }, 'Holiday API returned an error');
        return {};
      }

      const parsed = holidayMapSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.warn({ url }, 'Holiday API returned an unexpected body');
        return {};
      }
      return parsed.data;
    } catch (error) {
      logger.warn({ url, error: errorMessage(error) }, 'Failed to fetch holidays');
      return {};
    } finally {
      clearTimeout(timeout);
    }
  }
}

export default HolidayClient;
