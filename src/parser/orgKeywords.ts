/**
 * Keyword lines: `#+KEY: value`, affiliated keywords, `#+CALL:` and
 * `#+TBLFM:`
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { isAffiliatedKeyword, isDualKeyword, isParsedKeyword } from './orgConfig';
import type { ParseConfig } from './orgConfig';
import { readLine, takeBlankLines } from './orgLexer';
import type { Line, ParseContext, ParseResult } from './orgLexer';
import { parseObjects } from './orgObjects';

// indent, key, [optional], ws-after-colon, value, trailing ws
const RE_KEYWORD_LINE = /^([ \t]*)#\+([^\s:[\]]+)(?:\[([^\]\n\r]*)\])?:([ \t]*)(.*?)([ \t]*)$/;

export interface KeywordLine {
    indent: string;
    key: string;
    optional: string | undefined;
    gap: string;
    value: string;
    trailing: string;
}

/**
 * Match a `#+KEY: value` line. Block and dynamic block delimiters
 * (`#+BEGIN_X`, `#+BEGIN:`, `#+END:`) are not keywords.
 */
export function matchKeywordLine(content: string): KeywordLine | null {
    const m = RE_KEYWORD_LINE.exec(content);
    if (!m) return null;
    const upper = m[2].toUpperCase();
    if (upper.startsWith('BEGIN_') || upper.startsWith('END_') || upper === 'BEGIN' || upper === 'END') {
        return null;
    }
    return { indent: m[1], key: m[2], optional: m[3], gap: m[4], value: m[5], trailing: m[6] };
}

/**
 * True when the line is an affiliated keyword under the given config
 */
export function isAffiliatedLine(config: ParseConfig, kw: KeywordLine): boolean {
    if (!isAffiliatedKeyword(config, kw.key)) return false;
    return kw.optional === undefined || isDualKeyword(config, kw.key);
}

function keywordChildren(
    kw: KeywordLine,
    line: Line,
    valueChildren: GreenElement[]
): GreenElement[] {
    const children: GreenElement[] = [];
    if (kw.indent) children.push(new GreenToken('whitespace', kw.indent));
    children.push(new GreenToken('hash-plus', '#+'), new GreenToken('text', kw.key));
    if (kw.optional !== undefined) {
        children.push(new GreenToken('l-bracket', '['));
        if (kw.optional) children.push(new GreenToken('text', kw.optional));
        children.push(new GreenToken('r-bracket', ']'));
    }
    children.push(new GreenToken('colon', ':'));
    if (kw.gap) children.push(new GreenToken('whitespace', kw.gap));
    children.push(...valueChildren);
    if (kw.trailing) children.push(new GreenToken('whitespace', kw.trailing));
    if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
    return children;
}

/**
 * `#+KEY: value` as a `keyword` element; the value is a single text token
 */
export function tryParseKeyword(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const kw = matchKeywordLine(line.content);
    if (!kw || kw.key.toUpperCase() === 'CALL') return null;
    if (kw.optional !== undefined && !isDualKeyword(ctx.config, kw.key)) return null;

    const children = keywordChildren(kw, line, kw.value ? [new GreenToken('text', kw.value)] : []);
    const blanks = takeBlankLines(ctx.text, line.next, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('keyword', children), end: blanks.end };
}

/**
 * Affiliated keyword line. Parsed keywords (CAPTION by default) hold inline
 * objects in both the value and the optional part.
 */
export function tryParseAffiliatedKeyword(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const kw = matchKeywordLine(line.content);
    if (!kw || !isAffiliatedLine(ctx.config, kw)) return null;

    const value = isParsedKeyword(ctx.config, kw.key)
        ? parseObjects(kw.value, ctx.config)
        : kw.value ? [new GreenToken('text', kw.value)] : [];
    return {
        node: new GreenNode('affiliated-keyword', keywordChildren(kw, line, value)),
        end: line.next,
    };
}

/**
 * `#+CALL: name(args)`
 */
export function tryParseBabelCall(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const kw = matchKeywordLine(line.content);
    if (!kw || kw.key.toUpperCase() !== 'CALL' || kw.optional !== undefined) return null;

    const children = keywordChildren(kw, line, kw.value ? [new GreenToken('text', kw.value)] : []);
    const blanks = takeBlankLines(ctx.text, line.next, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('babel-call', children), end: blanks.end };
}

/**
 * `#+TBLFM:` line directly after a table (no trailing blank lines)
 */
export function tryParseTblfm(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return null;
    const kw = matchKeywordLine(line.content);
    if (!kw || kw.key.toUpperCase() !== 'TBLFM' || kw.optional !== undefined) return null;
    return {
        node: new GreenNode('keyword', keywordChildren(kw, line, kw.value ? [new GreenToken('text', kw.value)] : [])),
        end: line.next,
    };
}
