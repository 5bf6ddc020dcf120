/**
 * Builds a user's current-month calendar from their check-ins and the
 * year's holiday data.
 */

import type { CheckinTracker } from './checkin-tracker.js';
import type { HolidayClient } from './holiday-client.js';
import { renderCalendarPng, renderCalendarSvg, type CalendarInput } from './calendar-renderer.js';

export class CalendarService {
  constructor(
    private readonly tracker: CheckinTracker,
    private readonly holidays: HolidayClient
  ) {}

  async renderSvg(userId: string, now: Date = new Date()): Promise<string> {
    return renderCalendarSvg(await this.inputFor(userId, now));
  }

  async renderPng(userId: string, now: Date = new Date()): Promise<Buffer> {
    return renderCalendarPng(await this.inputFor(userId, now));
  }

  private async inputFor(userId: string, now: Date): Promise<CalendarInput> {
    const year = now.getFullYear();
    const month = now.getMonth() + 1;
    return {
      year,
      month,
      signedDates: this.tracker.getMonthDates(userId, year, month),
      holidays: await this.holidays.getHolidays(year),
    };
  }
}

export default CalendarService;
