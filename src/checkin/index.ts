/**
 * Check-in Module - Public API
 */

export { CheckinTracker } from './checkin-tracker.js';
export type { CheckinDocument, SignInResult } from './checkin-tracker.js';

export { HolidayClient, DEFAULT_CONFIG as DEFAULT_HOLIDAY_CONFIG } from './holiday-client.js';
export type { HolidayClientConfig, HolidayInfo, HolidayMap } from './holiday-client.js';

export {
  renderCalendarSvg,
  renderCalendarPng,
  monthGrid,
  isOffDay,
  CALENDAR_WIDTH,
  CALENDAR_HEIGHT,
} from './calendar-renderer.js';
export type { CalendarInput } from './calendar-renderer.js';

export { CalendarService } from './calendar-service.js';
