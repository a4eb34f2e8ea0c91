/**
 * Headline grammar
 *
 * A headline owns its title line, an optional planning line and property
 * drawer, its section and every following headline with a deeper level.
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { todoKeywordType } from './orgConfig';
import { findHeadline, headlineLevel, linesFrom, isBlank, readLine, takeBlankLines } from './orgLexer';
import type { ParseContext, ParseResult } from './orgLexer';
import { parseObjects } from './orgObjects';
import { parseElements } from './orgElements';
import { tryParsePlanning } from './orgPlanning';
import { tryParsePropertyDrawer } from './orgDrawers';

// =============================================================================
// Pre-compiled Patterns
// =============================================================================

const RE_STARS = /^(\*+)([ \t]+)/;
const RE_FIRST_WORD = /^(\S+)([ \t]+|$)/;
const RE_PRIORITY = /^\[#([A-Z]|\d{1,2})\]([ \t]+|$)/;
const RE_TAGS = /(^|[ \t]+)(:(?:[\p{L}\p{N}_@#%]+:)+)([ \t]*)$/u;
const RE_TRAILING_WS = /^(.*?)([ \t]*)$/;

// =============================================================================
// Headline
// =============================================================================

/**
 * Parse the headline starting at `pos`, or null if `pos` is not at a
 * headline line
 */
export function tryParseHeadline(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const level = headlineLevel(line.content);
    if (level === 0) return null;

    const children = headlineLineChildren(ctx, line.content);
    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));

    const end = findHeadline(ctx.text, line.next, limit, level);
    const sectionEnd = findHeadline(ctx.text, line.next, end);
    let cursor = line.next;

    const planning = tryParsePlanning(ctx, cursor, sectionEnd);
    if (planning) {
        children.push(planning.node);
        cursor = planning.end;
    }
    const properties = tryParsePropertyDrawer(ctx, cursor, sectionEnd);
    if (properties) {
        children.push(properties.node);
        cursor = properties.end;
    }

    if (cursor < sectionEnd) {
        if (isBlankRegion(ctx.text, cursor, sectionEnd)) {
            children.push(...takeBlankLines(ctx.text, cursor, sectionEnd).tokens);
        } else {
            children.push(new GreenNode('section', parseElements(ctx, cursor, sectionEnd)));
        }
    }
    cursor = sectionEnd;

    while (cursor < end) {
        const child = tryParseHeadline(ctx, cursor, end);
        if (!child) break;
        children.push(child.node);
        cursor = child.end;
    }

    return { node: new GreenNode('headline', children), end: cursor };
}

function isBlankRegion(text: string, start: number, end: number): boolean {
    for (const line of linesFrom(text, start, end)) {
        if (!isBlank(line)) return false;
    }
    return true;
}

/**
 * Tokens of the title line, up to but excluding its terminator
 */
function headlineLineChildren(ctx: ParseContext, content: string): GreenElement[] {
    const children: GreenElement[] = [];
    const stars = RE_STARS.exec(content);
    if (!stars) return children;
    children.push(new GreenToken('headline-stars', stars[1]), new GreenToken('whitespace', stars[2]));
    let rest = content.slice(stars[0].length);

    // Keyword is matched before priority and tags
    const word = RE_FIRST_WORD.exec(rest);
    if (word) {
        const type = todoKeywordType(ctx.config, word[1]);
        if (type) {
            children.push(new GreenToken(type === 'todo' ? 'headline-keyword-todo' : 'headline-keyword-done', word[1]));
            if (word[2]) children.push(new GreenToken('whitespace', word[2]));
            rest = rest.slice(word[0].length);
        }
    }

    const priority = RE_PRIORITY.exec(rest);
    if (priority) {
        children.push(new GreenNode('headline-priority', [
            new GreenToken('l-bracket', '['),
            new GreenToken('hash', '#'),
            new GreenToken('text', priority[1]),
            new GreenToken('r-bracket', ']'),
        ]));
        if (priority[2]) children.push(new GreenToken('whitespace', priority[2]));
        rest = rest.slice(priority[0].length);
    }

    const tags = RE_TAGS.exec(rest);
    if (tags) {
        const title = rest.slice(0, tags.index);
        children.push(new GreenNode('headline-title', parseObjects(title, ctx.config)));
        if (tags[1]) children.push(new GreenToken('whitespace', tags[1]));
        const tagChildren: GreenElement[] = [];
        for (const part of tags[2].split(/(:)/)) {
            if (part === ':') tagChildren.push(new GreenToken('colon', ':'));
            else if (part) tagChildren.push(new GreenToken('text', part));
        }
        children.push(new GreenNode('headline-tags', tagChildren));
        if (tags[3]) children.push(new GreenToken('whitespace', tags[3]));
    } else {
        const m = RE_TRAILING_WS.exec(rest);
        const title = m ? m[1] : rest;
        children.push(new GreenNode('headline-title', parseObjects(title, ctx.config)));
        if (m && m[2]) children.push(new GreenToken('whitespace', m[2]));
    }

    return children;
}
