/**
 * Line scanning helpers shared by the block-level grammar
 *
 * The block grammar works line by line over a region `[start, limit)` of
 * the source. A line's content never includes its terminator, which may be
 * `\n`, `\r\n` or a lone `\r` (or nothing for the final line).
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import type { ParseConfig } from './orgConfig';

// =============================================================================
// Types
// =============================================================================

export interface ParseContext {
    readonly text: string;
    readonly config: ParseConfig;
}

export interface Line {
    /** Offset of the first character */
    start: number;
    /** Offset just past the content (before the terminator) */
    end: number;
    /** Offset of the next line */
    next: number;
    /** Line content without terminator */
    content: string;
    /** '\n', '\r\n', '\r' or '' */
    terminator: string;
}

/**
 * Result of a successful element recognizer
 */
export interface ParseResult {
    node: GreenNode;
    end: number;
}

// =============================================================================
// Patterns
// =============================================================================

export const RE_BLANK = /^[ \t]*$/;
export const RE_HEADLINE_STARS = /^(\*+)[ \t]/;
export const RE_LEADING_WS = /^[ \t]*/;

// =============================================================================
// Line access
// =============================================================================

/**
 * Read the line starting at `pos`; returns null at or past `limit`
 */
export function readLine(text: string, pos: number, limit: number): Line | null {
    if (pos >= limit) return null;
    let end = pos;
    while (end < limit) {
        const ch = text.charCodeAt(end);
        if (ch === 10 || ch === 13) break;
        end++;
    }
    let next = end;
    if (end < limit) {
        next = text.charCodeAt(end) === 13 && end + 1 < limit && text.charCodeAt(end + 1) === 10 ? end + 2 : end + 1;
    }
    return {
        start: pos,
        end,
        next,
        content: text.slice(pos, end),
        terminator: text.slice(end, next),
    };
}

/**
 * All lines of the region, in order
 */
export function* linesFrom(text: string, pos: number, limit: number): Generator<Line> {
    let line = readLine(text, pos, limit);
    while (line) {
        yield line;
        line = readLine(text, line.next, limit);
    }
}

export function isBlank(line: Line): boolean {
    return RE_BLANK.test(line.content);
}

/**
 * Star count of a headline line, or 0 when the line is not a headline
 */
export function headlineLevel(content: string): number {
    const m = RE_HEADLINE_STARS.exec(content);
    return m ? m[1].length : 0;
}

/**
 * Offset of the next headline line at or after `pos` whose level is at most
 * `maxLevel`, or `limit` when there is none. `pos` must be at a line start.
 */
export function findHeadline(text: string, pos: number, limit: number, maxLevel: number = Infinity): number {
    for (const line of linesFrom(text, pos, limit)) {
        const level = headlineLevel(line.content);
        if (level > 0 && level <= maxLevel) {
            return line.start;
        }
    }
    return limit;
}

/**
 * Length of the leading indentation
 */
export function indentWidth(content: string): number {
    const m = RE_LEADING_WS.exec(content);
    return m ? m[0].length : 0;
}

// =============================================================================
// Token helpers
// =============================================================================

/**
 * Consume consecutive blank lines as `blank-line` tokens
 */
export function takeBlankLines(text: string, pos: number, limit: number): { tokens: GreenToken[]; end: number } {
    const tokens: GreenToken[] = [];
    let end = pos;
    for (const line of linesFrom(text, pos, limit)) {
        if (!isBlank(line)) break;
        tokens.push(new GreenToken('blank-line', text.slice(line.start, line.next)));
        end = line.next;
    }
    return { tokens, end };
}

/**
 * Number of consecutive blank lines starting at `pos`
 */
export function countBlankLines(text: string, pos: number, limit: number): number {
    let count = 0;
    for (const line of linesFrom(text, pos, limit)) {
        if (!isBlank(line)) break;
        count++;
    }
    return count;
}

/**
 * Push `[whitespace] text [whitespace] [new-line]` for a plain line
 */
export function pushLineTokens(children: GreenElement[], line: Line): void {
    const m = /^([ \t]*)(.*?)([ \t]*)$/.exec(line.content);
    if (m) {
        if (m[1]) children.push(new GreenToken('whitespace', m[1]));
        if (m[2]) children.push(new GreenToken('text', m[2]));
        if (m[3]) children.push(new GreenToken('whitespace', m[3]));
    }
    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
}

/**
 * Rebuild a node with extra leading children (used for affiliated keywords)
 */
export function withLeadingChildren(node: GreenNode, leading: readonly GreenElement[]): GreenNode {
    if (leading.length === 0) return node;
    return new GreenNode(node.kind, [...leading, ...node.children]);
}
