/**
 * Org tables (`| a | b |`) and table.el tables (`+---+`)
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { linesFrom, takeBlankLines } from './orgLexer';
import type { Line, ParseContext, ParseResult } from './orgLexer';
import { parseObjects } from './orgObjects';
import { tryParseTblfm } from './orgKeywords';
import type { ParseConfig } from './orgConfig';

const RE_TABLE_ROW = /^([ \t]*)\|/;
const RE_RULE_ROW = /^([ \t]*)(\|)(-.*?)([ \t]*)$/;
const RE_TABLE_EL_START = /^[ \t]*\+-/;
const RE_TABLE_EL_ROW = /^[ \t]*[|+]/;
const RE_CELL = /^([ \t]*)(.*?)([ \t]*)$/;

export function isTableLine(content: string): boolean {
    return RE_TABLE_ROW.test(content);
}

export function isTableElStart(content: string): boolean {
    return RE_TABLE_EL_START.test(content);
}

// =============================================================================
// Org table
// =============================================================================

export function tryParseOrgTable(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const rows: GreenElement[] = [];
    let cursor = pos;
    for (const line of linesFrom(ctx.text, pos, limit)) {
        if (!isTableLine(line.content)) break;
        rows.push(parseRow(line, ctx.config));
        cursor = line.next;
    }
    if (rows.length === 0) return null;

    for (;;) {
        const tblfm = tryParseTblfm(ctx, cursor, limit);
        if (!tblfm) break;
        rows.push(tblfm.node);
        cursor = tblfm.end;
    }

    const blanks = takeBlankLines(ctx.text, cursor, limit);
    return {
        node: new GreenNode('org-table', [...rows, ...blanks.tokens]),
        end: blanks.end,
    };
}

function parseRow(line: Line, config: ParseConfig): GreenNode {
    const children: GreenElement[] = [];
    const rule = RE_RULE_ROW.exec(line.content);
    if (rule) {
        if (rule[1]) children.push(new GreenToken('whitespace', rule[1]));
        children.push(new GreenToken('pipe', '|'), new GreenToken('text', rule[3]));
        if (rule[4]) children.push(new GreenToken('whitespace', rule[4]));
        if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
        return new GreenNode('org-table-rule-row', children);
    }

    const pipeAt = line.content.indexOf('|');
    if (pipeAt > 0) children.push(new GreenToken('whitespace', line.content.slice(0, pipeAt)));
    children.push(new GreenToken('pipe', '|'));

    const segments = line.content.slice(pipeAt + 1).split('|');
    segments.forEach((segment, index) => {
        const closed = index < segments.length - 1;
        if (!closed) {
            // Text after the last pipe: trailing whitespace or an unclosed cell
            if (!segment) return;
            if (/^[ \t]+$/.test(segment)) {
                children.push(new GreenToken('whitespace', segment));
                return;
            }
        }
        children.push(parseCell(segment, closed, config));
    });

    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
    return new GreenNode('org-table-standard-row', children);
}

function parseCell(segment: string, closed: boolean, config: ParseConfig): GreenNode {
    const children: GreenElement[] = [];
    const m = RE_CELL.exec(segment);
    if (m) {
        if (m[1]) children.push(new GreenToken('whitespace', m[1]));
        children.push(...parseObjects(m[2], config));
        if (m[3]) children.push(new GreenToken('whitespace', m[3]));
    }
    if (closed) children.push(new GreenToken('pipe', '|'));
    return new GreenNode('org-table-cell', children);
}

// =============================================================================
// table.el
// =============================================================================

export function tryParseTableEl(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const children: GreenElement[] = [];
    let cursor = pos;
    let first = true;
    for (const line of linesFrom(ctx.text, pos, limit)) {
        if (first ? !isTableElStart(line.content) : !RE_TABLE_EL_ROW.test(line.content)) break;
        first = false;
        children.push(new GreenToken('text', line.content));
        if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
        cursor = line.next;
    }
    if (children.length === 0) return null;

    const blanks = takeBlankLines(ctx.text, cursor, limit);
    return {
        node: new GreenNode('table-el', [...children, ...blanks.tokens]),
        end: blanks.end,
    };
}
