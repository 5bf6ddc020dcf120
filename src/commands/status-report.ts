/**
 * Admin status report: one block per monitored user.
 */

import type { AlertEntry } from '../audit/alert-log.js';
import { describeDays, formatDuration, formatTimestamp } from '../shared/format.js';
import { AlertLevel, type UserRecord } from '../shared/types.js';

const STATUS_LABELS: Record<AlertLevel, string> = {
  [AlertLevel.NORMAL]: '🟢 Normal',
  [AlertLevel.WARNED]: '🟡 Warned',
  [AlertLevel.ESCALATED]: '🔴 Unreachable',
};

export type LastAlertLookup = (userId: string) => AlertEntry | null;

export function buildStatusReport(users: UserRecord[], nowMs: number, lastAlert?: LastAlertLookup): string {
  if (users.length === 0) {
    return '📂 No users are being monitored.';
  }

  const lines = ['📋 [Admin] Presence monitor report', '----------------'];

  for (const user of users) {
    const silentFor = formatDuration((nowMs - user.lastActive) / 1000);
    const block = [
      `${STATUS_LABELS[user.alertLevel]} User: ${user.userId}`,
      `   ├ Silent for: ${silentFor}`,
      `   ├ Deadline: ${describeDays(user.maxMissingDays)}`,
    ];

    const alert = lastAlert?.(user.userId);
    if (alert) {
      block.push(`   ├ Last alert: ${formatTimestamp(Date.parse(alert.timestamp))} (${alert.type})`);
    }

    block.push(`   └ Contact: ${user.emergencyContact ?? 'not set'}`);
    lines.push(block.join('\n'));
  }

  return lines.join('\n');
}
