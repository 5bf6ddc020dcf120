/**
 * Audit Module - Public API
 *
 * Provides the alert audit trail for escalations and notifications.
 */

export { AlertLog, NULL_RECORDER, default } from './alert-log.js';
export type {
  AlertLogConfig,
  AlertEventType,
  AlertEventInput,
  AlertChannel,
  AlertEntry,
  AlertQuery,
  AlertStats,
  AlertRecorder,
} from './alert-log.js';
