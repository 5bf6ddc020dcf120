/**
 * OneBot Client - ChatChannel over the OneBot v11 HTTP API
 *
 * Talks to a OneBot implementation (go-cqhttp, NapCat, Lagrange, ...)
 * running beside the monitor. Lookups are retried on network and HTTP
 * failures. Sends are retried only when the connection was never made,
 * so a timed-out send is not delivered twice. An API-level "failed"
 * reply is returned as-is.
 *
 * Endpoints used:
 *   POST /send_private_msg
 *   POST /send_group_msg
 *   POST /get_group_member_info
 */

import pino from 'pino';
import { z } from 'zod';

import { SEND_OK, sendFailed, type ChannelHealth, type ChatChannel, type SendResult } from './chat-channel.js';
import { errorMessage } from '../shared/types.js';

const logger = pino({ name: 'guard:onebot', level: process.env['LOG_LEVEL'] ?? 'info' });

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

/** OneBot client configuration. */
export interface OneBotConfig {
  /** Bot account id this client speaks as. */
  botId: string;
  /** Base URL of the OneBot HTTP API. Default: http://127.0.0.1:5700 */
  apiUrl?: string;
  /** Access token sent as a bearer token. */
  accessToken?: string;
  /** Request timeout in milliseconds. Default: 5000 */
  timeoutMs?: number;
  /** Retries on transport failure (sends: connect failures only). Default: 1 */
  retries?: number;
  /** Retry delay in milliseconds. Default: 200 */
  retryDelayMs?: number;
}

/** One message segment. */
export type MessageSegment =
  | { type: 'text'; data: { text: string } }
  | { type: 'at'; data: { qq: string } };

const apiResponseSchema = z.object({
  status: z.string(),
  retcode: z.number(),
  data: z.unknown().optional(),
  msg: z.string().optional(),
  wording: z.string().optional(),
});

type ApiResponse = z.infer<typeof apiResponseSchema>;

type CallResult = { ok: true; data: unknown } | { ok: false; error: string };

/** Connect-stage failures: the request never left this process. */
const CONNECT_FAILURES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH']);

// ═══════════════════════════════════════════════════════════════
// ONEBOT CLIENT
// ═══════════════════════════════════════════════════════════════

export class OneBotClient implements ChatChannel {
  readonly botId: string;
  private readonly config: Required<Omit<OneBotConfig, 'accessToken'>> & { accessToken: string | undefined };

  // Health tracking
  private lastSuccessAt = 0;
  private lastErrorAt = 0;
  private consecutiveErrors = 0;

  constructor(config: OneBotConfig) {
    this.botId = config.botId;
    this.config = {
      botId: config.botId,
      apiUrl: (config.apiUrl ?? 'http://127.0.0.1:5700').replace(/\/+$/, ''),
      accessToken: config.accessToken,
      timeoutMs: config.timeoutMs ?? 5000,
      retries: config.retries ?? 1,
      retryDelayMs: config.retryDelayMs ?? 200,
    };
  }

  async sendDirect(userId: string, text: string): Promise<SendResult> {
    const result = await this.call(
      'send_private_msg',
      { user_id: toAccountId(userId), message: [segmentText(text)] },
      false
    );
    return result.ok ? SEND_OK : sendFailed(result.error);
  }

  async sendGroupMention(groupId: string, userId: string, text: string): Promise<SendResult> {
    const result = await this.call(
      'send_group_msg',
      { group_id: toAccountId(groupId), message: [segmentAt(userId), segmentText(` ${text}`)] },
      false
    );
    return result.ok ? SEND_OK : sendFailed(result.error);
  }

  async isMember(groupId: string, userId: string): Promise<boolean> {
    if (!groupId) return false;
    const result = await this.call(
      'get_group_member_info',
      { group_id: toAccountId(groupId), user_id: toAccountId(userId), no_cache: true },
      true
    );
    return result.ok && result.data !== null && result.data !== undefined;
  }

  getHealth(): ChannelHealth {
    return {
      botId: this.botId,
      url: this.config.apiUrl,
      lastSuccessAt: this.lastSuccessAt,
      lastErrorAt: this.lastErrorAt,
      consecutiveErrors: this.consecutiveErrors,
    };
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  /**
   * Calls an API action. Transport failures are retried when the action
   * is idempotent, or when the connection itself could not be made.
   */
  private async call(action: string, params: Record<string, unknown>, idempotent: boolean): Promise<CallResult> {
    let lastError = 'Unknown error';

    for (let attempt = 0; attempt <= this.config.retries; attempt++) {
      let body: ApiResponse;
      try {
        body = await this.makeRequest(action, params);
      } catch (error) {
        lastError = errorMessage(error);
        if (!idempotent && !neverSent(error)) break;
        if (attempt < this.config.retries) {
          await this.delay(this.config.retryDelayMs * (attempt + 1));
        }
        continue;
      }

      this.lastSuccessAt = Date.now();
      this.consecutiveErrors = 0;

      if (body.status === 'failed' || body.retcode !== 0) {
        const error = body.wording ?? body.msg ?? `retcode ${body.retcode}`;
        logger.debug({ botId: this.botId, action, retcode: body.retcode, error }, 'OneBot action failed');
        return { ok: false, error };
      }
      return { ok: true, data: body.data };
    }

    this.lastErrorAt = Date.now();
    this.consecutiveErrors++;
    logger.warn({ botId: this.botId, action, error: lastError }, 'OneBot request failed');
    return { ok: false, error: lastError };
  }

  /** Makes one HTTP request to the OneBot API. */
  private async makeRequest(action: string, params: Record<string, unknown>): Promise<ApiResponse> {
    const url = `${this.config.apiUrl}/${action}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.accessToken) {
      headers['Authorization'] = `Bearer ${this.config.accessToken}`;
    }

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(params),
        signal: controller.signal,
      }).catch((error: unknown) => {
        if (controller.signal.aborted) {
          throw new Error(`OneBot did not answer within ${this.config.timeoutMs}ms`);
        }
        throw error;
      });

      if (!response.ok) {
        throw new Error(`OneBot returned ${response.status}`);
      }

      const parsed = apiResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('OneBot returned an unexpected body');
      }
      return parsed.data;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Delay helper for retries. */
  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

// ─── Helpers ─────────────────────────────────────────────────

function segmentText(text: string): MessageSegment {
  return { type: 'text', data: { text } };
}

function segmentAt(userId: string): MessageSegment {
  return { type: 'at', data: { qq: userId } };
}

function neverSent(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const cause = error.cause;
  const code = typeof cause === 'object' && cause !== null && 'code' in cause ? cause.code : undefined;
  return typeof code === 'string' && CONNECT_FAILURES.has(code);
}

/** Numeric ids go over the wire as numbers; anything else as given. */
function toAccountId(id: string): number | string {
  return /^\d{1,15}$/.test(id) ? Number(id) : id;
}

export default OneBotClient;
