import { DateTime, IANAZone } from 'luxon';

export type AmbiguousPolicy = 'earlier' | 'later';

export type RolloverPolicy =
    | { kind: 'none' }
    | { kind: 'next-day-if-elapsed'; currentTime: number };

export interface ClockTime {
    hour: number; // 0-23
    minute: number;
}

export interface NormalizeOptions {
    rollover?: RolloverPolicy;
    ambiguous?: AmbiguousPolicy;
}

const DAY_MS = 24 * 3600 * 1000;

// "1:50 AM", "1 :50 am", "12: 00 p.m."
const CLOCK_PATTERN = /^(\d{1,2})\s*:\s*(\d{2})\s*([ap])\.?\s*m\.?$/i;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseClockTime(text: string | null | undefined): ClockTime | null {
    if (!text) return null;
    const m = text.trim().match(CLOCK_PATTERN);
    if (!m) return null;

    const hour12 = Number(m[1]);
    const minute = Number(m[2]);
    if (hour12 < 1 || hour12 > 12 || minute > 59) return null;

    const isPm = m[3].toLowerCase() === 'p';
    return { hour: (hour12 % 12) + (isPm ? 12 : 0), minute };
}

export function isValidTimeZone(zone: string): boolean {
    return IANAZone.isValidZone(zone);
}

/** Calendar date (`YYYY-MM-DD`) of an instant as seen in the given zone. */
export function localDateOf(instant: number, timeZone: string): string | null {
    const dt = DateTime.fromMillis(instant, { zone: timeZone });
    return dt.isValid ? dt.toISODate() : null;
}

interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

function parseCalendarDate(text: string): CalendarDate | null {
    const m = text.trim().match(DATE_PATTERN);
    if (!m) return null;
    const date = DateTime.fromObject(
        { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) },
        { zone: 'utc' }
    );
    return date.isValid ? { year: date.year, month: date.month, day: date.day } : null;
}

function nextDay(date: CalendarDate): CalendarDate {
    const d = DateTime.fromObject(date, { zone: 'utc' }).plus({ days: 1 });
    return { year: d.year, month: d.month, day: d.day };
}

/**
 * Wall-clock time in `zone` → UTC epoch ms.
 *
 * The zone's offset is sampled a day either side of the wall time; each
 * candidate offset is kept only if the zone actually uses it at the resulting
 * instant. Two survivors mean a fall-back repeat (resolved by `ambiguous`),
 * none means a spring-forward gap, which is read with the pre-transition offset.
 */
export function wallTimeToUtc(
    date: CalendarDate,
    clock: ClockTime,
    zone: IANAZone,
    ambiguous: AmbiguousPolicy = 'later'
): number {
    const wall = Date.UTC(date.year, date.month - 1, date.day, clock.hour, clock.minute);
    const before = zone.offset(wall - DAY_MS);
    const after = zone.offset(wall + DAY_MS);

    const candidates = [...new Set([before, after])]
        .map(offset => wall - offset * 60000)
        .filter(ts => zone.offset(ts) === (wall - ts) / 60000)
        .sort((a, b) => a - b);

    if (candidates.length === 0) {
        return wall - before * 60000;
    }
    return ambiguous === 'earlier' ? candidates[0] : candidates[candidates.length - 1];
}

/**
 * Normalizes a 12-hour clock string on `referenceDate` in `timeZone` to a UTC
 * instant. Returns null when the text, date or zone cannot be read.
 *
 * With the `next-day-if-elapsed` rollover, a time that is not strictly after
 * `currentTime` on the reference date is moved to the following calendar day:
 * hourly forecast listings start at the next hour and wrap past midnight.
 */
export function normalizeLocalTime(
    text: string | null | undefined,
    referenceDate: string,
    timeZone: string,
    options: NormalizeOptions = {}
): number | null {
    const clock = parseClockTime(text);
    if (!clock) return null;

    const date = parseCalendarDate(referenceDate);
    if (!date) return null;

    if (!isValidTimeZone(timeZone)) return null;
    const zone = IANAZone.create(timeZone);
    const ambiguous = options.ambiguous ?? 'later';

    let instant = wallTimeToUtc(date, clock, zone, ambiguous);

    const rollover = options.rollover ?? { kind: 'none' };
    if (rollover.kind === 'next-day-if-elapsed' && instant <= rollover.currentTime) {
        instant = wallTimeToUtc(nextDay(date), clock, zone, ambiguous);
    }

    return instant;
}
