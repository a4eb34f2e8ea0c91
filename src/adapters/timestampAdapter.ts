/**
 * Timestamp interop
 *
 * Converts Timestamp views into JavaScript Dates (local time) and back into
 * Org timestamp text. Pure functions, usable without a tree.
 */

import { addDays, addHours, addMonths, addWeeks, addYears, format, isAfter, startOfDay } from 'date-fns';
import type { Timestamp, TimestampDate, TimestampRepeater, TimeUnit } from '../ast';

// =============================================================================
// Timestamp -> Date
// =============================================================================

/**
 * Build a local Date from the parsed fields; a missing time is midnight.
 * Years 0-99 are kept as written, not mapped into 1900-1999.
 */
export function timestampDateToDate(date: TimestampDate): Date {
    const result = new Date(date.year, date.month - 1, date.day, date.hour ?? 0, date.minute ?? 0);
    result.setFullYear(date.year, date.month - 1, date.day);
    return result;
}

/**
 * Start of the timestamp, or null for diary sexps
 */
export function timestampStartToDate(timestamp: Timestamp): Date | null {
    const start = timestamp.startDate();
    return start ? timestampDateToDate(start) : null;
}

/**
 * End of the timestamp: the second date or time of a range, otherwise the
 * start. Null for diary sexps.
 */
export function timestampEndToDate(timestamp: Timestamp): Date | null {
    const end = timestamp.endDate();
    return end ? timestampDateToDate(end) : null;
}

// =============================================================================
// Date -> Org text
// =============================================================================

export interface FormatTimestampOptions {
    /** Angle brackets when true (default), square brackets otherwise */
    active?: boolean;
    /** Include HH:mm (default: false) */
    withTime?: boolean;
}

/**
 * Format a Date as an Org timestamp, e.g. `<2024-01-15 Mon 10:00>`
 */
export function formatTimestamp(date: Date, options: FormatTimestampOptions = {}): string {
    const active = options.active ?? true;
    const body = format(date, options.withTime ? 'yyyy-MM-dd EEE HH:mm' : 'yyyy-MM-dd EEE');
    return active ? `<${body}>` : `[${body}]`;
}

// =============================================================================
// Repeaters
// =============================================================================

/**
 * Shift `date` by `value` units
 */
export function shiftDate(date: Date, value: number, unit: TimeUnit): Date {
    switch (unit) {
        case 'h':
            return addHours(date, value);
        case 'd':
            return addDays(date, value);
        case 'w':
            return addWeeks(date, value);
        case 'm':
            return addMonths(date, value);
        case 'y':
            return addYears(date, value);
    }
}

/**
 * Date of the next occurrence after completing a repeating task:
 * - `+N`  shifts once from the original date
 * - `++N` shifts until the date is after `today`
 * - `.+N` shifts once from `today`
 */
export function nextOccurrence(date: Date, repeater: TimestampRepeater, today: Date = new Date()): Date {
    if (repeater.value <= 0) return date;
    const day = startOfDay(today);

    switch (repeater.mark) {
        case '+':
            return shiftDate(date, repeater.value, repeater.unit);
        case '.+':
            return shiftDate(day, repeater.value, repeater.unit);
        case '++': {
            let next = shiftDate(date, repeater.value, repeater.unit);
            while (!isAfter(next, day)) {
                next = shiftDate(next, repeater.value, repeater.unit);
            }
            return next;
        }
    }
}
