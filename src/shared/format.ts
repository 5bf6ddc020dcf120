/**
 * Text helpers shared by notifications and command replies.
 */

/** "2d 3h 15m"; anything under a minute reads "less than 1m". */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, seconds);
  const days = Math.floor(total / 86400);
  const hours = Math.floor((total % 86400) / 3600);
  const minutes = Math.floor((total % 3600) / 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);

  if (parts.length === 0) return 'less than 1m';
  return parts.join(' ');
}

/** Describes a fractional day count, e.g. 0.5 → "0.5 days (12h 0m)". */
export function describeDays(days: number): string {
  const totalMinutes = Math.floor(days * 24 * 60);
  const d = Math.floor(totalMinutes / 1440);
  const h = Math.floor((totalMinutes % 1440) / 60);
  const m = totalMinutes % 60;

  const parts: string[] = [];
  if (d > 0) parts.push(`${d}d`);
  if (h > 0) parts.push(`${h}h`);
  parts.push(`${m}m`);

  const unit = days === 1 ? 'day' : 'days';
  return `${days} ${unit} (${parts.join(' ')})`;
}

export interface TemplateVars {
  uid: string;
  time: string;
}

/** Substitutes {uid} and {time}; unknown placeholders are left as written. */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(/\{(uid|time)\}/g, (_match, key: string) =>
    key === 'uid' ? vars.uid : vars.time
  );
}

/** Local "YYYY-MM-DD". */
export function toIsoDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** Local "YYYY-MM-DD HH:mm:ss". */
export function formatTimestamp(epochMs: number): string {
  const date = new Date(epochMs);
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  const ss = String(date.getSeconds()).padStart(2, '0');
  return `${toIsoDate(date)} ${hh}:${mm}:${ss}`;
}
