/**
 * Chat channel abstraction.
 *
 * Sends report success or failure as a value; callers log failures and
 * carry on. A channel is reached through the bot that last saw the user.
 */

export type SendResult = { ok: true } | { ok: false; error: string };

/** Transport health a channel may report. */
export interface ChannelHealth {
  botId: string;
  url: string;
  lastSuccessAt: number;
  lastErrorAt: number;
  consecutiveErrors: number;
}

export interface ChatChannel {
  readonly botId: string;
  sendDirect(userId: string, text: string): Promise<SendResult>;
  sendGroupMention(groupId: string, userId: string, text: string): Promise<SendResult>;
  /** False on lookup errors as well as on non-membership. */
  isMember(groupId: string, userId: string): Promise<boolean>;
  getHealth?(): ChannelHealth;
}

export interface BotDirectory {
  resolve(botId: string): ChatChannel | null;
}

/** In-process directory of the bots this instance can speak through. */
export class BotRegistry implements BotDirectory {
  private readonly channels = new Map<string, ChatChannel>();

  register(channel: ChatChannel): void {
    this.channels.set(channel.botId, channel);
  }

  resolve(botId: string): ChatChannel | null {
    return this.channels.get(botId) ?? null;
  }

  list(): ChatChannel[] {
    return Array.from(this.channels.values());
  }

  /** Health of every channel that reports it. */
  health(): ChannelHealth[] {
    return this.list().flatMap((channel) => (channel.getHealth ? [channel.getHealth()] : []));
  }
}

export const SEND_OK: SendResult = { ok: true };

export function sendFailed(error: string): SendResult {
  return { ok: false, error };
}
