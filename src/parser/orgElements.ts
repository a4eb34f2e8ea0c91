/**
 * Element-level grammar
 *
 * parseElements() turns a region of lines into a sequence of elements
 * (paragraphs, lists, tables, blocks, ...). Every element owns the blank
 * lines that follow it; blank lines at the very start of a region become
 * `blank-line` tokens of the container.
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import {
    isBlank,
    linesFrom,
    pushLineTokens,
    readLine,
    takeBlankLines,
    withLeadingChildren,
} from './orgLexer';
import type { ParseContext, ParseResult } from './orgLexer';
import { parseObjects } from './orgObjects';
import { startsBlock, tryParseBlock, tryParseDynBlock } from './orgBlocks';
import { startsDrawer, tryParseDrawer } from './orgDrawers';
import { matchBullet, tryParseList } from './orgLists';
import { isTableElStart, isTableLine, tryParseOrgTable, tryParseTableEl } from './orgTables';
import { matchKeywordLine, tryParseAffiliatedKeyword, tryParseBabelCall, tryParseKeyword } from './orgKeywords';
import { tryParseClock } from './orgPlanning';

// =============================================================================
// Pre-compiled Patterns
// =============================================================================

const RE_COMMENT = /^([ \t]*)#([ \t].*)?$/;
const RE_FIXED_WIDTH = /^([ \t]*):([ \t].*)?$/;
const RE_RULE = /^([ \t]*)(-{5,})([ \t]*)$/;
const RE_FN_DEF = /^\[fn:([\w-]+)\]/;
const RE_LATEX_BEGIN = /^[ \t]*\\begin\{([A-Za-z0-9*]+)\}/;

// =============================================================================
// Element sequence
// =============================================================================

/**
 * Parse all elements in `[start, limit)`
 */
export function parseElements(ctx: ParseContext, start: number, limit: number): GreenElement[] {
    const out: GreenElement[] = [];
    let pos = start;

    while (pos < limit) {
        const line = readLine(ctx.text, pos, limit);
        if (!line) break;

        if (isBlank(line)) {
            const blanks = takeBlankLines(ctx.text, pos, limit);
            out.push(...blanks.tokens);
            pos = blanks.end;
            continue;
        }

        // Affiliated keywords attach to the element that follows them
        const affiliated: GreenNode[] = [];
        const affiliatedStarts: number[] = [];
        let cursor = pos;
        for (;;) {
            const kw = tryParseAffiliatedKeyword(ctx, cursor, limit);
            if (!kw) break;
            affiliated.push(kw.node);
            affiliatedStarts.push(cursor);
            cursor = kw.end;
        }

        if (affiliated.length > 0) {
            const next = readLine(ctx.text, cursor, limit);
            const element = next && !isBlank(next) ? parseElement(ctx, cursor, limit) : null;
            if (element && element.node.kind !== 'keyword') {
                out.push(withLeadingChildren(element.node, affiliated));
                pos = element.end;
                continue;
            }
            // Nothing to attach to: each line is an ordinary keyword
            for (const affStart of affiliatedStarts) {
                const keyword = tryParseKeyword(ctx, affStart, limit) ?? parseParagraph(ctx, affStart, limit);
                out.push(keyword.node);
                pos = keyword.end;
            }
            continue;
        }

        const element = parseElement(ctx, pos, limit);
        out.push(element.node);
        pos = element.end;
    }

    return out;
}

/**
 * Parse one element at `pos`; falls back to a paragraph
 */
export function parseElement(ctx: ParseContext, pos: number, limit: number): ParseResult {
    return tryParseElement(ctx, pos, limit) ?? parseParagraph(ctx, pos, limit);
}

/**
 * Try every recognizer except the paragraph fallback
 */
export function tryParseElement(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    return tryParseBlock(ctx, pos, limit)
        ?? tryParseDynBlock(ctx, pos, limit)
        ?? tryParseBabelCall(ctx, pos, limit)
        ?? tryParseKeyword(ctx, pos, limit)
        ?? tryParseComment(ctx, pos, limit)
        ?? tryParseDrawer(ctx, pos, limit)
        ?? tryParseFixedWidth(ctx, pos, limit)
        ?? tryParseOrgTable(ctx, pos, limit)
        ?? tryParseTableEl(ctx, pos, limit)
        ?? tryParseRule(ctx, pos, limit)
        ?? tryParseList(ctx, pos, limit)
        ?? tryParseClock(ctx, pos, limit)
        ?? tryParseFnDef(ctx, pos, limit)
        ?? tryParseLatexEnvironment(ctx, pos, limit);
}

/**
 * Whether the line at `pos` would start an element other than a paragraph.
 * Cheaper than tryParseElement since nothing is built.
 */
export function startsElement(ctx: ParseContext, pos: number, limit: number): boolean {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return false;
    const content = line.content;
    return RE_COMMENT.test(content)
        || RE_FIXED_WIDTH.test(content)
        || RE_RULE.test(content)
        || isTableLine(content)
        || isTableElStart(content)
        || matchBullet(content) !== null
        || RE_FN_DEF.test(content)
        || matchKeywordLine(content) !== null
        || startsBlock(ctx, pos, limit)
        || startsDrawer(ctx, pos, limit)
        || startsLatexEnvironment(ctx, pos, limit)
        || tryParseClock(ctx, pos, limit) !== null;
}

// =============================================================================
// Paragraph
// =============================================================================

export function parseParagraph(ctx: ParseContext, pos: number, limit: number): ParseResult {
    const first = readLine(ctx.text, pos, limit);
    if (!first) {
        return { node: new GreenNode('paragraph', []), end: pos };
    }
    let contentEnd = first.end;
    let terminator = first.terminator;
    let end = first.next;

    for (const line of linesFrom(ctx.text, first.next, limit)) {
        if (isBlank(line) || startsElement(ctx, line.start, limit)) break;
        contentEnd = line.end;
        terminator = line.terminator;
        end = line.next;
    }

    const children = parseObjects(ctx.text.slice(pos, contentEnd), ctx.config);
    if (terminator) children.push(new GreenToken('new-line', terminator));
    const blanks = takeBlankLines(ctx.text, end, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('paragraph', children), end: blanks.end };
}

// =============================================================================
// Line-prefixed elements: comments, fixed width, rules
// =============================================================================

function tryParsePrefixedLines(
    ctx: ParseContext,
    pos: number,
    limit: number,
    pattern: RegExp,
    marker: GreenToken,
    kind: 'comment' | 'fixed-width'
): ParseResult | null {
    const children: GreenElement[] = [];
    let cursor = pos;
    for (const line of linesFrom(ctx.text, pos, limit)) {
        const m = pattern.exec(line.content);
        if (!m) break;
        if (m[1]) children.push(new GreenToken('whitespace', m[1]));
        children.push(marker);
        if (m[2]) children.push(new GreenToken('text', m[2]));
        if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
        cursor = line.next;
    }
    if (children.length === 0) return null;
    const blanks = takeBlankLines(ctx.text, cursor, limit);
    return { node: new GreenNode(kind, [...children, ...blanks.tokens]), end: blanks.end };
}

function tryParseComment(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    return tryParsePrefixedLines(ctx, pos, limit, RE_COMMENT, new GreenToken('hash', '#'), 'comment');
}

function tryParseFixedWidth(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    return tryParsePrefixedLines(ctx, pos, limit, RE_FIXED_WIDTH, new GreenToken('colon', ':'), 'fixed-width');
}

function tryParseRule(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line || !RE_RULE.test(line.content)) return null;
    const children: GreenElement[] = [];
    pushLineTokens(children, line);
    const blanks = takeBlankLines(ctx.text, line.next, limit);
    return { node: new GreenNode('rule', [...children, ...blanks.tokens]), end: blanks.end };
}

// =============================================================================
// Footnote definitions
// =============================================================================

/**
 * `[fn:LABEL] contents` at column 0. Extends to the next definition or two
 * consecutive blank lines.
 */
function tryParseFnDef(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const first = readLine(ctx.text, pos, limit);
    if (!first) return null;
    const m = RE_FN_DEF.exec(first.content);
    if (!m) return null;

    let end = first.next;
    let pendingBlanks = 0;
    for (const line of linesFrom(ctx.text, first.next, limit)) {
        if (isBlank(line)) {
            pendingBlanks++;
            if (pendingBlanks >= 2) break;
            continue;
        }
        if (RE_FN_DEF.test(line.content)) break;
        pendingBlanks = 0;
        end = line.next;
    }

    const children: GreenElement[] = [
        new GreenToken('l-bracket', '['),
        new GreenToken('fn-prefix', 'fn'),
        new GreenToken('colon', ':'),
        new GreenToken('fn-label', m[1]),
        new GreenToken('r-bracket', ']'),
    ];
    let contentStart = pos + m[0].length;
    const gap = /^[ \t]+/.exec(first.content.slice(m[0].length));
    if (gap) {
        children.push(new GreenToken('whitespace', gap[0]));
        contentStart += gap[0].length;
    }
    children.push(new GreenNode('fn-content', parseElements(ctx, contentStart, end)));

    const blanks = takeBlankLines(ctx.text, end, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('fn-def', children), end: blanks.end };
}

// =============================================================================
// LaTeX environments
// =============================================================================

function findLatexEnd(ctx: ParseContext, pos: number, limit: number): { name: string; endLine: number; next: number } | null {
    const first = readLine(ctx.text, pos, limit);
    if (!first) return null;
    const m = RE_LATEX_BEGIN.exec(first.content);
    if (!m) return null;
    const name = m[1].replace(/\*/g, '\\*');
    const endPattern = new RegExp(`^[ \\t]*\\\\end\\{${name}\\}[ \\t]*$`);
    for (const line of linesFrom(ctx.text, pos, limit)) {
        if (endPattern.test(line.content)) {
            return { name: m[1], endLine: line.end, next: line.next };
        }
    }
    return null;
}

function startsLatexEnvironment(ctx: ParseContext, pos: number, limit: number): boolean {
    return findLatexEnd(ctx, pos, limit) !== null;
}

function tryParseLatexEnvironment(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const found = findLatexEnd(ctx, pos, limit);
    if (!found) return null;
    const children: GreenElement[] = [new GreenToken('text', ctx.text.slice(pos, found.endLine))];
    if (found.next > found.endLine) {
        children.push(new GreenToken('new-line', ctx.text.slice(found.endLine, found.next)));
    }
    const blanks = takeBlankLines(ctx.text, found.next, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('latex-environment', children), end: blanks.end };
}
