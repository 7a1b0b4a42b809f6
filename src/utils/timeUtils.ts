import { WEEKDAYS, Weekday } from '../types';

/**
 * Time helpers for slot validation.
 * Every calculation runs on UTC: a timestamp without an offset is read as UTC.
 */

const OFFSET_SUFFIX = /(z|[+-]\d{2}(:?\d{2})?)$/i;

export const parseInstant = (value: string | Date): Date => {
    if (value instanceof Date) return new Date(value.getTime());
    const trimmed = value.trim();
    const hasTime = trimmed.includes('T') || trimmed.includes(' ');
    const iso = hasTime && !OFFSET_SUFFIX.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed;
    const parsed = new Date(iso);
    if (Number.isNaN(parsed.getTime())) {
        throw new RangeError(`Invalid timestamp: ${value}`);
    }
    return parsed;
};

export const weekdayKey = (date: Date): Weekday => WEEKDAYS[date.getUTCDay()];

/** "HH:MM" of the instant, in UTC. */
export const timeOfDay = (date: Date): string => {
    const h = date.getUTCHours().toString().padStart(2, '0');
    const m = date.getUTCMinutes().toString().padStart(2, '0');
    return `${h}:${m}`;
};

/**
 * Normalises "9:00" or "09:00:00" to "HH:MM" so values compare as strings.
 */
export const normalizeTime = (timeStr: string): string => {
    const [h = '0', m = '0'] = timeStr.trim().split(':');
    return `${h.padStart(2, '0')}:${m.padStart(2, '0').slice(0, 2)}`;
};

export const addMinutes = (date: Date, minutes: number): Date => new Date(date.getTime() + minutes * 60000);

export const minutesBetween = (from: Date, to: Date): number => (to.getTime() - from.getTime()) / 60000;

/**
 * Half-open interval overlap: [aStart, aEnd) against [bStart, bEnd).
 * Intervals that only touch at an endpoint do not overlap.
 */
export const intervalsOverlap = (aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean =>
    aStart.getTime() < bEnd.getTime() && aEnd.getTime() > bStart.getTime();

/** "YYYY-MM-DD" of the instant, in UTC. */
export const dateKey = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Inclusive calendar-day range check; the bounds may be dates or full timestamps.
 */
export const isDateWithin = (instant: Date, startDate: string, endDate: string): boolean => {
    const day = dateKey(instant);
    return day >= dateKey(parseInstant(startDate)) && day <= dateKey(parseInstant(endDate));
};

export const formatTime12 = (timeStr: string): string => {
    if (!timeStr) return '';
    const parts = timeStr.split(':');
    const h = parseInt(parts[0], 10);
    const minutes = parts[1] || '00';
    const ampm = h >= 12 ? 'PM' : 'AM';
    const h12 = h % 12 || 12;
    return `${h12}:${minutes} ${ampm}`;
};

export const isValidInstant = (value: string): boolean => {
    try {
        parseInstant(value);
        return true;
    } catch {
        return false;
    }
};
