/**
 * Commands Module - Public API
 */

export {
  CommandRouter,
  NOT_REGISTERED_REPLY,
  PERMISSION_DENIED_REPLY,
  INTERNAL_ERROR_REPLY,
} from './command-router.js';
export type { InboundMessage, CommandReply, CommandRouterDeps, AlertHistory } from './command-router.js';

export { buildStatusReport } from './status-report.js';
export type { LastAlertLookup } from './status-report.js';
