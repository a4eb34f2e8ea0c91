/**
 * Timestamp view
 *
 * One `timestamp` node covers a single timestamp, a time range
 * (`<2024-01-15 Mon 10:00-12:00>`), a date range (`<...>--<...>`) or a
 * diary sexp (`<%%(...)>`).
 */

import type { NodeKind, TokenKind } from '../parser/orgSyntaxKind';
import type { SyntaxToken } from '../parser/orgSyntaxTree';
import { AstNode } from './astNode';

// =============================================================================
// Types
// =============================================================================

export interface TimestampDate {
    year: number;
    month: number;
    day: number;
    dayName?: string;
    hour?: number;
    minute?: number;
}

export type RepeaterMark = '+' | '++' | '.+';
export type DelayMark = '-' | '--';
export type TimeUnit = 'h' | 'd' | 'w' | 'm' | 'y';

export interface TimestampRepeater {
    mark: RepeaterMark;
    value: number;
    unit: TimeUnit;
}

export interface TimestampDelay {
    mark: DelayMark;
    value: number;
    unit: TimeUnit;
}

// =============================================================================
// View
// =============================================================================

export class Timestamp extends AstNode {
    readonly kind = 'timestamp' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'timestamp';
    }

    isActive(): boolean {
        return this.syntax.firstToken()?.kind === 'l-angle';
    }

    isInactive(): boolean {
        return this.syntax.firstToken()?.kind === 'l-bracket';
    }

    isDiary(): boolean {
        return this.token('percent2') !== undefined;
    }

    /**
     * `<a>--<b>`
     */
    isDateRange(): boolean {
        return this.token('minus2') !== undefined;
    }

    /**
     * `<2024-01-15 Mon 10:00-12:00>`
     */
    isTimeRange(): boolean {
        return !this.isDateRange() && this.partTokens(0).filter(t => t.kind === 'timestamp-hour').length === 2;
    }

    isRange(): boolean {
        return this.isDateRange() || this.isTimeRange();
    }

    /**
     * Diary sexp including its parentheses, e.g. `(diary-float t 4 2)`
     */
    sexp(): string | undefined {
        if (!this.isDiary()) return undefined;
        return this.token('text')?.text;
    }

    /**
     * Start date and time; undefined for diary timestamps
     */
    startDate(): TimestampDate | undefined {
        return readDate(this.partTokens(0), 0);
    }

    /**
     * End date and time. Equals the start for a plain timestamp; for a time
     * range the date is shared and the time is the second one.
     */
    endDate(): TimestampDate | undefined {
        if (this.isDateRange()) {
            return readDate(this.partTokens(1), 0);
        }
        const tokens = this.partTokens(0);
        if (this.isTimeRange()) {
            return readDate(tokens, 1);
        }
        return readDate(tokens, 0);
    }

    /**
     * Repeater of the start part, e.g. `+1w`
     */
    repeater(): TimestampRepeater | undefined {
        const found = this.cookie('timestamp-repeater-mark');
        if (!found) return undefined;
        const mark = REPEATER_MARKS.find(m => m === found.mark);
        return mark ? { mark, value: found.value, unit: found.unit } : undefined;
    }

    /**
     * Warning delay of the start part, e.g. `-2d`
     */
    delay(): TimestampDelay | undefined {
        const found = this.cookie('timestamp-delay-mark');
        if (!found) return undefined;
        const mark = DELAY_MARKS.find(m => m === found.mark);
        return mark ? { mark, value: found.value, unit: found.unit } : undefined;
    }

    /**
     * Tokens of the first (0) or second (1) half of a date range
     */
    private partTokens(part: 0 | 1): SyntaxToken[] {
        const tokens = this.syntax.tokens();
        const split = tokens.findIndex(t => t.kind === 'minus2');
        if (split < 0) return part === 0 ? tokens : [];
        return part === 0 ? tokens.slice(0, split) : tokens.slice(split + 1);
    }

    private cookie(markKind: TokenKind): { mark: string; value: number; unit: TimeUnit } | undefined {
        const tokens = this.partTokens(0);
        const index = tokens.findIndex(t => t.kind === markKind);
        if (index < 0) return undefined;
        const value = tokens[index + 1];
        const unit = tokens[index + 2];
        if (!value || value.kind !== 'timestamp-value' || !unit || unit.kind !== 'timestamp-unit') return undefined;
        const parsedUnit = toTimeUnit(unit.text);
        if (!parsedUnit) return undefined;
        return { mark: tokens[index].text, value: Number(value.text), unit: parsedUnit };
    }
}

// =============================================================================
// Helpers
// =============================================================================

const TIME_UNITS: readonly TimeUnit[] = ['h', 'd', 'w', 'm', 'y'];
const REPEATER_MARKS: readonly RepeaterMark[] = ['+', '++', '.+'];
const DELAY_MARKS: readonly DelayMark[] = ['-', '--'];

function toTimeUnit(text: string): TimeUnit | undefined {
    return TIME_UNITS.find(unit => unit === text);
}

/**
 * Read a date from one part's tokens; `timeIndex` picks the first or
 * second `HH:MM` of a time range
 */
function readDate(tokens: readonly SyntaxToken[], timeIndex: 0 | 1): TimestampDate | undefined {
    const first = (kind: TokenKind): SyntaxToken | undefined => tokens.find(t => t.kind === kind);
    const year = first('timestamp-year');
    const month = first('timestamp-month');
    const day = first('timestamp-day');
    if (!year || !month || !day) return undefined;

    const date: TimestampDate = {
        year: Number(year.text),
        month: Number(month.text),
        day: Number(day.text),
    };
    const dayName = first('timestamp-dayname');
    if (dayName) date.dayName = dayName.text;

    const hours = tokens.filter(t => t.kind === 'timestamp-hour');
    const minutes = tokens.filter(t => t.kind === 'timestamp-minute');
    const hour = hours[timeIndex];
    const minute = minutes[timeIndex];
    if (hour && minute) {
        date.hour = Number(hour.text);
        date.minute = Number(minute.text);
    }
    return date;
}
