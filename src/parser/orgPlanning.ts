/**
 * Timestamp-bearing lines: planning (`SCHEDULED:` / `DEADLINE:` /
 * `CLOSED:` right after a headline) and clocks (`CLOCK: [...]--[...] => 1:00`)
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import type { ElementKind } from './orgSyntaxKind';
import { readLine, takeBlankLines } from './orgLexer';
import type { ParseContext, ParseResult } from './orgLexer';
import { tryParseTimestamp } from './orgTimestamp';

const RE_PLANNING_KEYWORD = /^(SCHEDULED|DEADLINE|CLOSED)(:)([ \t]*)/;
const RE_CLOCK = /^([ \t]*)(CLOCK)(:)([ \t]*)/;
const RE_CLOCK_DURATION = /^([ \t]+)(=>)([ \t]+)(-?\d+:\d{2})/;
const RE_WS = /^[ \t]+/;

const PLANNING_KINDS: Record<string, ElementKind> = {
    'SCHEDULED': 'planning-scheduled',
    'DEADLINE': 'planning-deadline',
    'CLOSED': 'planning-closed',
};

// =============================================================================
// Planning
// =============================================================================

/**
 * Planning line. The whole line must be made of planning entries.
 */
export function tryParsePlanning(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const content = line.content;

    const children: GreenElement[] = [];
    let cursor = 0;
    const indent = RE_WS.exec(content);
    if (indent) {
        children.push(new GreenToken('whitespace', indent[0]));
        cursor = indent[0].length;
    }

    let entries = 0;
    while (cursor < content.length) {
        const m = RE_PLANNING_KEYWORD.exec(content.slice(cursor));
        if (!m) return null;
        const timestamp = tryParseTimestamp(content, cursor + m[0].length);
        if (!timestamp) return null;

        const entry: GreenElement[] = [
            new GreenToken('planning-keyword', m[1]),
            new GreenToken('colon', ':'),
        ];
        if (m[3]) entry.push(new GreenToken('whitespace', m[3]));
        entry.push(timestamp.node);
        children.push(new GreenNode(PLANNING_KINDS[m[1]], entry));
        entries++;
        cursor = timestamp.end;

        const gap = RE_WS.exec(content.slice(cursor));
        if (gap) {
            children.push(new GreenToken('whitespace', gap[0]));
            cursor += gap[0].length;
        }
    }
    if (entries === 0) return null;

    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
    return { node: new GreenNode('planning', children), end: line.next };
}

// =============================================================================
// Clock
// =============================================================================

export function tryParseClock(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const content = line.content;
    const m = RE_CLOCK.exec(content);
    if (!m) return null;

    const timestamp = tryParseTimestamp(content, m[0].length);
    if (!timestamp) return null;

    const children: GreenElement[] = [];
    if (m[1]) children.push(new GreenToken('whitespace', m[1]));
    children.push(new GreenToken('clock-keyword', m[2]), new GreenToken('colon', ':'));
    if (m[4]) children.push(new GreenToken('whitespace', m[4]));
    children.push(timestamp.node);

    let cursor = timestamp.end;
    const duration = RE_CLOCK_DURATION.exec(content.slice(cursor));
    if (duration) {
        children.push(
            new GreenToken('whitespace', duration[1]),
            new GreenToken('double-arrow', duration[2]),
            new GreenToken('whitespace', duration[3]),
            new GreenToken('text', duration[4])
        );
        cursor += duration[0].length;
    }

    const rest = content.slice(cursor);
    if (!/^[ \t]*$/.test(rest)) return null;
    if (rest) children.push(new GreenToken('whitespace', rest));
    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));

    const blanks = takeBlankLines(ctx.text, line.next, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('clock', children), end: blanks.end };
}
