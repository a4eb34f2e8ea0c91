/**
 * Tests for timestamp conversion and repeaters
 */

import { describe, it, expect } from 'vitest';
import { Org } from '../../org';
import { Timestamp } from '../../ast';
import {
    formatTimestamp,
    nextOccurrence,
    shiftDate,
    timestampDateToDate,
    timestampEndToDate,
    timestampStartToDate,
} from '../timestampAdapter';

function stamp(text: string): Timestamp {
    const found = Org.parse(`${text}\n`).firstNode(Timestamp);
    if (!found) throw new Error(`no timestamp in ${text}`);
    return found;
}

describe('timestamp to Date', () => {
    it('converts the start in local time', () => {
        expect(timestampStartToDate(stamp('<2024-01-15 Mon 10:30>'))).toEqual(new Date(2024, 0, 15, 10, 30));
        expect(timestampDateToDate({ year: 2024, month: 2, day: 29 })).toEqual(new Date(2024, 1, 29));
    });

    it('keeps two-digit years', () => {
        const date = timestampStartToDate(stamp('<0024-01-01 Mon>'));
        expect(date?.getFullYear()).toBe(24);
        expect(date?.getMonth()).toBe(0);
        expect(date?.getDate()).toBe(1);
        expect(timestampDateToDate({ year: 99, month: 12, day: 31, hour: 8 }).getFullYear()).toBe(99);
    });

    it('converts the end of ranges', () => {
        expect(timestampEndToDate(stamp('<2024-01-15 Mon 10:00-12:00>'))).toEqual(new Date(2024, 0, 15, 12, 0));
        expect(timestampEndToDate(stamp('[2024-01-15 Mon]--[2024-01-17 Wed]'))).toEqual(new Date(2024, 0, 17));
        expect(timestampEndToDate(stamp('<2024-01-15 Mon>'))).toEqual(new Date(2024, 0, 15));
    });

    it('returns null for diary timestamps', () => {
        const diary = stamp('<%%(diary-float t 4 2)>');
        expect(timestampStartToDate(diary)).toBeNull();
        expect(timestampEndToDate(diary)).toBeNull();
    });
});

describe('formatTimestamp', () => {
    const date = new Date(2024, 0, 15, 9, 5);

    it('formats active dates by default', () => {
        expect(formatTimestamp(date)).toBe('<2024-01-15 Mon>');
    });

    it('formats inactive timestamps with a time', () => {
        expect(formatTimestamp(date, { active: false, withTime: true })).toBe('[2024-01-15 Mon 09:05]');
    });

    it('produces text that parses back to the same date', () => {
        const text = formatTimestamp(date, { withTime: true });
        expect(timestampStartToDate(stamp(text))).toEqual(date);
    });
});

describe('repeaters', () => {
    const start = new Date(2024, 0, 15);
    const today = new Date(2024, 2, 10, 14, 0);

    it('shifts by each unit', () => {
        expect(shiftDate(start, 3, 'h')).toEqual(new Date(2024, 0, 15, 3));
        expect(shiftDate(start, 2, 'd')).toEqual(new Date(2024, 0, 17));
        expect(shiftDate(new Date(2024, 0, 31), 1, 'm')).toEqual(new Date(2024, 1, 29));
        expect(shiftDate(start, 1, 'y')).toEqual(new Date(2025, 0, 15));
    });

    it('shifts once from the date with +', () => {
        expect(nextOccurrence(start, { mark: '+', value: 1, unit: 'w' }, today)).toEqual(new Date(2024, 0, 22));
    });

    it('shifts past today with ++', () => {
        expect(nextOccurrence(start, { mark: '++', value: 1, unit: 'w' }, today)).toEqual(new Date(2024, 2, 11));
    });

    it('shifts from today with .+', () => {
        expect(nextOccurrence(start, { mark: '.+', value: 1, unit: 'd' }, today)).toEqual(new Date(2024, 2, 11));
    });

    it('leaves the date alone for a zero repeater', () => {
        expect(nextOccurrence(start, { mark: '+', value: 0, unit: 'd' }, today)).toEqual(start);
    });

    it('reads the repeater from a parsed timestamp', () => {
        const repeater = stamp('<2024-01-15 Mon +2d>').repeater();
        expect(repeater).toEqual({ mark: '+', value: 2, unit: 'd' });
        if (repeater) {
            expect(nextOccurrence(start, repeater, today)).toEqual(new Date(2024, 0, 17));
        }
    });
});
