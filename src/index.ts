/**
 * Deadman Guard - Main Entry Point
 *
 * Exports all public APIs for embedding the monitor in other systems.
 */

// Registry Module
export { UserRegistry, UserTable } from './registry/index.js';
export type { UserRegistryConfig, RegistrationResult } from './registry/index.js';

// Storage Module
export { JsonStore } from './storage/json-store.js';
export type { JsonStoreOptions, LoadResult } from './storage/json-store.js';
export { UserStore, persistedUserSchema } from './storage/user-store.js';
export type { PersistedUser, UserDocument } from './storage/user-store.js';

// Channels Module
export { BotRegistry, OneBotClient, SEND_OK, sendFailed } from './channels/index.js';
export type { ChatChannel, ChannelHealth, BotDirectory, SendResult, OneBotConfig } from './channels/index.js';

// Notify Module
export { EmailNotifier } from './notify/index.js';
export type { EmailNotifierConfig, EmailSink, MailTransport, TransportFactory } from './notify/index.js';

// Engine Module
export { EscalationEngine, MonitorDaemon, DEFAULT_MESSAGES, decideTransition } from './engine/index.js';
export type {
  EscalationEngineDeps,
  EscalationMessages,
  SweepReport,
  TestAlertResult,
  Transition,
  MonitorDaemonConfig,
  DaemonStatus,
} from './engine/index.js';

// Audit Module
export { AlertLog, NULL_RECORDER } from './audit/index.js';
export type {
  AlertLogConfig,
  AlertEventType,
  AlertEntry,
  AlertQuery,
  AlertStats,
  AlertRecorder,
} from './audit/index.js';

// Commands Module
export { CommandRouter, buildStatusReport } from './commands/index.js';
export type { InboundMessage, CommandReply, CommandRouterDeps } from './commands/index.js';

// Check-in Module
export {
  CheckinTracker,
  HolidayClient,
  CalendarService,
  renderCalendarSvg,
  renderCalendarPng,
} from './checkin/index.js';
export type { SignInResult, HolidayMap, CalendarInput } from './checkin/index.js';

// Server and configuration
export { GuardServer } from './server/server.js';
export type { GuardServerConfig, GuardServerDeps } from './server/server.js';
export { loadConfig, parseConfig, dataPaths, configSchema, MAX_INTERVAL_SECONDS } from './config/config.js';
export type { GuardConfig, BotConfig, DataPaths } from './config/config.js';
export { createApp } from './bootstrap.js';
export type { GuardApp } from './bootstrap.js';

// Shared
export {
  AlertLevel,
  GuardError,
  GuardErrorCode,
  SECONDS_PER_DAY,
  WARN_THRESHOLD_SECONDS,
} from './shared/types.js';
export type { UserRecord, ChannelBinding, SmtpSettings, MessageStage } from './shared/types.js';
export { formatDuration, describeDays, renderTemplate } from './shared/format.js';

// Version
export const VERSION = '0.1.0';
