/**
 * Channels Module - Public API
 */

export { BotRegistry, SEND_OK, sendFailed } from './chat-channel.js';
export type { ChatChannel, ChannelHealth, BotDirectory, SendResult } from './chat-channel.js';

export { OneBotClient } from './onebot-client.js';
export type { OneBotConfig, MessageSegment } from './onebot-client.js';
