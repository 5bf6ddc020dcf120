/**
 * Month calendar image: Sunday-first grid, off days in red, holiday
 * names under the day number, a green ring on every signed day.
 * Drawn as SVG and rasterized with sharp.
 */

import sharp from 'sharp';

import type { HolidayMap } from './holiday-client.js';

export const CELL_SIZE = 100;
export const PADDING = 10;
export const HEADER_HEIGHT = 80;
export const WEEKDAY_HEADER_HEIGHT = 60;
const COLS = 7;
const ROWS = 6;

export const CALENDAR_WIDTH = (CELL_SIZE + PADDING) * COLS + PADDING;
export const CALENDAR_HEIGHT = HEADER_HEIGHT + WEEKDAY_HEADER_HEIGHT + (CELL_SIZE + PADDING) * ROWS + PADDING;

const COLORS = {
  background: '#FFCC66',
  cell: '#FFFFF0',
  text: '#8B4513',
  signed: '#2EB82E',
  offDay: '#CD5C5C',
};

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export interface CalendarInput {
  year: number;
  /** 1-12 */
  month: number;
  signedDates: readonly string[];
  holidays: HolidayMap;
}

/**
 * Weeks of the month, Sunday first; days outside the month are null.
 */
export function monthGrid(year: number, month: number): (number | null)[][] {
  const firstWeekday = new Date(year, month - 1, 1).getDay();
  const daysInMonth = new Date(year, month, 0).getDate();

  const weeks: (number | null)[][] = [];
  let week: (number | null)[] = Array.from({ length: firstWeekday }, () => null);

  for (let day = 1; day <= daysInMonth; day++) {
    week.push(day);
    if (week.length === COLS) {
      weeks.push(week);
      week = [];
    }
  }
  if (week.length > 0) {
    while (week.length < COLS) week.push(null);
    weeks.push(week);
  }
  return weeks;
}

/** Holiday data decides when present; otherwise Saturday and Sunday are off. */
export function isOffDay(date: string, weekday: number, holidays: HolidayMap): boolean {
  const info = holidays[date];
  if (info) return info.isOffDay;
  return weekday === 0 || weekday === 6;
}

export function renderCalendarSvg(input: CalendarInput): string {
  const { year, month, holidays } = input;
  const signed = new Set(input.signedDates);
  const parts: string[] = [];

  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CALENDAR_WIDTH}" height="${CALENDAR_HEIGHT}" viewBox="0 0 ${CALENDAR_WIDTH} ${CALENDAR_HEIGHT}" font-family="sans-serif">`
  );
  parts.push(`<rect width="100%" height="100%" fill="${COLORS.background}"/>`);
  parts.push(
    `<text x="${CALENDAR_WIDTH / 2}" y="${HEADER_HEIGHT / 2}" class="title" font-size="48" fill="${COLORS.text}" text-anchor="middle" dominant-baseline="central">${MONTH_NAMES[month - 1]} ${year}</text>`
  );

  WEEKDAYS.forEach((name, col) => {
    const cx = PADDING + col * (CELL_SIZE + PADDING) + CELL_SIZE / 2;
    parts.push(
      `<text x="${cx}" y="${HEADER_HEIGHT + WEEKDAY_HEADER_HEIGHT / 2}" class="weekday" font-size="32" fill="${COLORS.text}" text-anchor="middle" dominant-baseline="central">${name}</text>`
    );
  });

  const top = HEADER_HEIGHT + WEEKDAY_HEADER_HEIGHT;
  monthGrid(year, month).forEach((week, row) => {
    week.forEach((day, col) => {
      if (day === null) return;

      const x = PADDING + col * (CELL_SIZE + PADDING);
      const y = top + row * (CELL_SIZE + PADDING);
      const cx = x + CELL_SIZE / 2;
      const date = `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
      const holidayName = holidays[date]?.name ?? '';
      const off = isOffDay(date, col, holidays);

      parts.push(`<rect x="${x}" y="${y}" width="${CELL_SIZE}" height="${CELL_SIZE}" rx="10" fill="${COLORS.cell}"/>`);

      const numberY = y + (holidayName ? 40 : CELL_SIZE / 2);
      parts.push(
        `<text x="${cx}" y="${numberY}" class="${off ? 'day off' : 'day'}" font-size="44" fill="${off ? COLORS.offDay : COLORS.text}" text-anchor="middle" dominant-baseline="central">${day}</text>`
      );

      if (holidayName) {
        parts.push(
          `<text x="${cx}" y="${y + CELL_SIZE - 15}" class="holiday" font-size="18" fill="${COLORS.offDay}" text-anchor="middle">${escapeXml(holidayName)}</text>`
        );
      }

      if (signed.has(date)) {
        parts.push(
          `<circle cx="${cx}" cy="${y + CELL_SIZE / 2}" r="${CELL_SIZE / 2 - 5}" class="signed" fill="none" stroke="${COLORS.signed}" stroke-width="3"/>`
        );
      }
    });
  });

  parts.push('</svg>');
  return parts.join('\n');
}

export async function renderCalendarPng(input: CalendarInput): Promise<Buffer> {
  return sharp(Buffer.from(renderCalendarSvg(input))).png().toBuffer();
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
