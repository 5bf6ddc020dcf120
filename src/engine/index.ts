/**
 * Engine Module - Public API
 */

export { EscalationEngine, DEFAULT_MESSAGES, decideTransition } from './escalation-engine.js';
export type {
  EscalationEngineDeps,
  EscalationMessages,
  SweepReport,
  TestAlertResult,
  Transition,
} from './escalation-engine.js';

export { MonitorDaemon, DEFAULT_CONFIG as DEFAULT_DAEMON_CONFIG } from './monitor-daemon.js';
export type { MonitorDaemonConfig, DaemonStatus } from './monitor-daemon.js';
