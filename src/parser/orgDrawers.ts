/**
 * Drawers (`:NAME:` ... `:END:`) and property drawers
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { linesFrom, readLine, takeBlankLines } from './orgLexer';
import type { Line, ParseContext, ParseResult } from './orgLexer';
import { parseElements } from './orgElements';

const RE_DRAWER_BEGIN = /^([ \t]*)(:)([\w-]+)(:)([ \t]*)$/;
const RE_DRAWER_END = /^([ \t]*)(:)(END)(:)([ \t]*)$/i;
const RE_PROPERTIES_BEGIN = /^([ \t]*)(:)(PROPERTIES)(:)([ \t]*)$/i;
// indent, key, plus, [gap, value], trailing
const RE_NODE_PROPERTY = /^([ \t]*):([^\s:]+?)(\+)?:(?:([ \t]+)(\S.*?))?([ \t]*)$/;

function delimiter(kind: 'drawer-begin' | 'drawer-end', m: RegExpExecArray, line: Line): GreenNode {
    const children: GreenElement[] = [];
    if (m[1]) children.push(new GreenToken('whitespace', m[1]));
    children.push(
        new GreenToken('colon', ':'),
        new GreenToken('text', m[3]),
        new GreenToken('colon', ':')
    );
    if (m[5]) children.push(new GreenToken('whitespace', m[5]));
    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
    return new GreenNode(kind, children);
}

function findDrawerEnd(text: string, pos: number, limit: number): Line | null {
    for (const line of linesFrom(text, pos, limit)) {
        if (RE_DRAWER_END.test(line.content)) return line;
    }
    return null;
}

export function startsDrawer(ctx: ParseContext, pos: number, limit: number): boolean {
    const line = readLine(ctx.text, pos, limit);
    if (!line || !RE_DRAWER_BEGIN.test(line.content) || RE_DRAWER_END.test(line.content)) return false;
    return findDrawerEnd(ctx.text, line.next, limit) !== null;
}

// =============================================================================
// Drawer
// =============================================================================

export function tryParseDrawer(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const begin = readLine(ctx.text, pos, limit);
    if (!begin) return null;
    const bm = RE_DRAWER_BEGIN.exec(begin.content);
    if (!bm || RE_DRAWER_END.test(begin.content)) return null;

    const end = findDrawerEnd(ctx.text, begin.next, limit);
    if (!end) return null;
    const em = RE_DRAWER_END.exec(end.content);
    if (!em) return null;

    const blanks = takeBlankLines(ctx.text, end.next, limit);
    return {
        node: new GreenNode('drawer', [
            delimiter('drawer-begin', bm, begin),
            new GreenNode('drawer-content', parseElements(ctx, begin.next, end.start)),
            delimiter('drawer-end', em, end),
            ...blanks.tokens,
        ]),
        end: blanks.end,
    };
}

// =============================================================================
// Property drawer
// =============================================================================

function nodeProperty(line: Line): GreenNode | null {
    const m = RE_NODE_PROPERTY.exec(line.content);
    if (!m) return null;
    const children: GreenElement[] = [];
    if (m[1]) children.push(new GreenToken('whitespace', m[1]));
    children.push(new GreenToken('colon', ':'), new GreenToken('text', m[2]));
    if (m[3]) children.push(new GreenToken('plus', '+'));
    children.push(new GreenToken('colon', ':'));
    if (m[4]) children.push(new GreenToken('whitespace', m[4]));
    if (m[5]) children.push(new GreenToken('text', m[5]));
    if (m[6]) children.push(new GreenToken('whitespace', m[6]));
    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
    return new GreenNode('node-property', children);
}

/**
 * `:PROPERTIES:` drawer whose every line is a node property
 */
export function tryParsePropertyDrawer(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const begin = readLine(ctx.text, pos, limit);
    if (!begin) return null;
    const bm = RE_PROPERTIES_BEGIN.exec(begin.content);
    if (!bm) return null;

    const properties: GreenNode[] = [];
    for (const line of linesFrom(ctx.text, begin.next, limit)) {
        const em = RE_DRAWER_END.exec(line.content);
        if (em) {
            const blanks = takeBlankLines(ctx.text, line.next, limit);
            return {
                node: new GreenNode('property-drawer', [
                    delimiter('drawer-begin', bm, begin),
                    ...properties,
                    delimiter('drawer-end', em, line),
                    ...blanks.tokens,
                ]),
                end: blanks.end,
            };
        }
        const property = nodeProperty(line);
        if (!property) return null;
        properties.push(property);
    }
    return null;
}
