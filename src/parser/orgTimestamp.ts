/**
 * Timestamp grammar
 *
 * Active `<2024-01-15 Mon 10:00-11:30 +1w -2d>`, inactive `[...]`, date
 * ranges `<...>--<...>` and diary sexps `<%%(...)>` all produce a single
 * `timestamp` node. The first token tells active (`l-angle`) from inactive
 * (`l-bracket`).
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import type { TokenKind } from './orgSyntaxKind';

export interface TimestampParse {
    node: GreenNode;
    end: number;
}

// =============================================================================
// Patterns
// =============================================================================

// YYYY-MM-DD [DAYNAME] [HH:MM[-HH:MM]]
const RE_TS_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:([ \t]+)([^\s\d+\->\]]+))?(?:([ \t]+)(\d{1,2}):(\d{2})(?:-(\d{1,2}):(\d{2}))?)?/;

// Repeater (+1w, ++1d, .+1m) or warning delay (-2d, --2d)
const RE_TS_COOKIE = /^([ \t]+)(\+\+|\.\+|\+|--|-)(\d+)([hdwmy])/;

const REPEATER_MARKS = new Set(['+', '++', '.+']);

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a timestamp starting at `pos` (at `<` or `[`)
 */
export function tryParseTimestamp(text: string, pos: number): TimestampParse | null {
    const open = text[pos];
    if (open !== '<' && open !== '[') return null;

    if (open === '<' && text.startsWith('<%%(', pos)) {
        return tryParseDiary(text, pos);
    }

    const first = tryParsePart(text, pos);
    if (!first) return null;

    // Date range: <a>--<b>, both halves of the same activeness
    if (text.startsWith('--', first.end) && text[first.end + 2] === open) {
        const second = tryParsePart(text, first.end + 2);
        if (second) {
            return {
                node: new GreenNode('timestamp', [
                    ...first.children,
                    new GreenToken('minus2', '--'),
                    ...second.children,
                ]),
                end: second.end,
            };
        }
    }

    return { node: new GreenNode('timestamp', first.children), end: first.end };
}

function tryParsePart(text: string, pos: number): { children: GreenElement[]; end: number } | null {
    const open = text[pos];
    const close = open === '<' ? '>' : ']';
    const children: GreenElement[] = [new GreenToken(open === '<' ? 'l-angle' : 'l-bracket', open)];
    const push = (kind: TokenKind, value: string | undefined): void => {
        if (value) children.push(new GreenToken(kind, value));
    };

    let cursor = pos + 1;
    const m = RE_TS_DATE.exec(text.slice(cursor, cursor + 64));
    if (!m) return null;

    push('timestamp-year', m[1]);
    push('minus', '-');
    push('timestamp-month', m[2]);
    push('minus', '-');
    push('timestamp-day', m[3]);
    push('whitespace', m[4]);
    push('timestamp-dayname', m[5]);
    push('whitespace', m[6]);
    push('timestamp-hour', m[7]);
    if (m[8]) push('colon', ':');
    push('timestamp-minute', m[8]);
    if (m[9]) {
        push('minus', '-');
        push('timestamp-hour', m[9]);
        push('colon', ':');
        push('timestamp-minute', m[10]);
    }
    cursor += m[0].length;

    for (;;) {
        const c = RE_TS_COOKIE.exec(text.slice(cursor, cursor + 32));
        if (!c) break;
        push('whitespace', c[1]);
        push(REPEATER_MARKS.has(c[2]) ? 'timestamp-repeater-mark' : 'timestamp-delay-mark', c[2]);
        push('timestamp-value', c[3]);
        push('timestamp-unit', c[4]);
        cursor += c[0].length;
    }

    const trailing = /^[ \t]*/.exec(text.slice(cursor, cursor + 16));
    if (trailing && trailing[0]) {
        push('whitespace', trailing[0]);
        cursor += trailing[0].length;
    }

    if (text[cursor] !== close) return null;
    children.push(new GreenToken(open === '<' ? 'r-angle' : 'r-bracket', close));
    return { children, end: cursor + 1 };
}

function tryParseDiary(text: string, pos: number): TimestampParse | null {
    const sexpStart = pos + 3;
    let depth = 0;
    let i = sexpStart;
    for (; i < text.length; i++) {
        const ch = text[i];
        if (ch === '\n' || ch === '\r') return null;
        if (ch === '(') depth++;
        else if (ch === ')') {
            depth--;
            if (depth === 0) break;
        }
    }
    if (depth !== 0 || text[i + 1] !== '>') return null;
    return {
        node: new GreenNode('timestamp', [
            new GreenToken('l-angle', '<'),
            new GreenToken('percent2', '%%'),
            new GreenToken('text', text.slice(sexpStart, i + 1)),
            new GreenToken('r-angle', '>'),
        ]),
        end: i + 2,
    };
}
