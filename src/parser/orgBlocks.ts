/**
 * Greater and lesser blocks (`#+BEGIN_NAME` ... `#+END_NAME`) and dynamic
 * blocks (`#+BEGIN: name` ... `#+END:`)
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import type { NodeKind } from './orgSyntaxKind';
import { linesFrom, readLine, takeBlankLines } from './orgLexer';
import type { Line, ParseContext, ParseResult } from './orgLexer';
import { parseObjects } from './orgObjects';
import { parseElements } from './orgElements';

const RE_BLOCK_BEGIN = /^([ \t]*)(#\+begin_(\S+))(.*)$/i;
const RE_DYN_BEGIN = /^([ \t]*)(#\+begin:)([ \t]+)(\S+)(?:([ \t]+)(.*?))?([ \t]*)$/i;
const RE_DYN_END = /^([ \t]*)(#\+end:)([ \t]*)$/i;
const RE_COMMA_ESCAPE = /^([ \t]*)(,)((?:\*|#\+).*)$/;
const RE_TRIM = /^([ \t]*)(.*?)([ \t]*)$/;

const BLOCK_KIND_BY_NAME: Record<string, NodeKind> = {
    'SRC': 'source-block',
    'EXAMPLE': 'example-block',
    'EXPORT': 'export-block',
    'COMMENT': 'comment-block',
    'VERSE': 'verse-block',
    'QUOTE': 'quote-block',
    'CENTER': 'center-block',
};

/** Blocks whose content is kept verbatim, one text token per line */
const VERBATIM_BLOCKS: ReadonlySet<NodeKind> = new Set<NodeKind>([
    'source-block',
    'example-block',
    'export-block',
    'comment-block',
]);

export function blockKindFromName(name: string): NodeKind {
    return BLOCK_KIND_BY_NAME[name.toUpperCase()] ?? 'special-block';
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find the line closing a block, or null when the block is unterminated
 */
function findEndLine(text: string, pos: number, limit: number, pattern: RegExp): Line | null {
    for (const line of linesFrom(text, pos, limit)) {
        if (pattern.test(line.content)) return line;
    }
    return null;
}

/**
 * Check whether `pos` starts a terminated block, without building it
 */
export function startsBlock(ctx: ParseContext, pos: number, limit: number): boolean {
    const line = readLine(ctx.text, pos, limit);
    if (!line) return false;
    const dyn = RE_DYN_BEGIN.exec(line.content);
    if (dyn) return findEndLine(ctx.text, line.next, limit, RE_DYN_END) !== null;
    const m = RE_BLOCK_BEGIN.exec(line.content);
    if (!m) return false;
    const endPattern = new RegExp(`^[ \\t]*#\\+end_${escapeRegExp(m[3])}[ \\t]*$`, 'i');
    return findEndLine(ctx.text, line.next, limit, endPattern) !== null;
}

// =============================================================================
// Blocks
// =============================================================================

export function tryParseBlock(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const begin = readLine(ctx.text, pos, limit);
    if (!begin) return null;
    const m = RE_BLOCK_BEGIN.exec(begin.content);
    if (!m) return null;

    const name = m[3];
    const endPattern = new RegExp(`^([ \\t]*)(#\\+end_${escapeRegExp(name)})([ \\t]*)$`, 'i');
    const end = findEndLine(ctx.text, begin.next, limit, endPattern);
    if (!end) return null;

    const kind = blockKindFromName(name);

    const beginChildren: GreenElement[] = [];
    if (m[1]) beginChildren.push(new GreenToken('whitespace', m[1]));
    beginChildren.push(new GreenToken('text', m[2]));
    beginChildren.push(...beginParameters(kind, m[4]));
    if (begin.terminator) beginChildren.push(new GreenToken('new-line', begin.terminator));

    const content = new GreenNode('block-content', blockContent(ctx, kind, begin.next, end.start));

    const endMatch = endPattern.exec(end.content);
    const endChildren: GreenElement[] = [];
    if (endMatch) {
        if (endMatch[1]) endChildren.push(new GreenToken('whitespace', endMatch[1]));
        endChildren.push(new GreenToken('text', endMatch[2]));
        if (endMatch[3]) endChildren.push(new GreenToken('whitespace', endMatch[3]));
    }
    if (end.terminator) endChildren.push(new GreenToken('new-line', end.terminator));

    const blanks = takeBlankLines(ctx.text, end.next, limit);
    return {
        node: new GreenNode(kind, [
            new GreenNode('block-begin', beginChildren),
            content,
            new GreenNode('block-end', endChildren),
            ...blanks.tokens,
        ]),
        end: blanks.end,
    };
}

/**
 * Tokens for the text after `#+BEGIN_NAME`. Source blocks split it into
 * language, switches and `:header` parameters; export blocks into the
 * backend type.
 */
function beginParameters(kind: NodeKind, params: string): GreenElement[] {
    const out: GreenElement[] = [];
    const m = RE_TRIM.exec(params);
    if (!m) return out;
    const [, lead, body, trail] = m;
    if (lead) out.push(new GreenToken('whitespace', lead));

    if (body && kind === 'source-block') {
        const lm = /^(\S+)([ \t]*)(.*)$/.exec(body);
        if (lm) {
            out.push(new GreenToken('src-block-language', lm[1]));
            if (lm[2]) out.push(new GreenToken('whitespace', lm[2]));
            out.push(...sourceArguments(lm[3]));
        }
    } else if (body && kind === 'export-block') {
        const em = /^(\S+)([ \t]*)(.*)$/.exec(body);
        if (em) {
            out.push(new GreenToken('export-block-type', em[1]));
            if (em[2]) out.push(new GreenToken('whitespace', em[2]));
            if (em[3]) out.push(new GreenToken('text', em[3]));
        }
    } else if (body) {
        out.push(new GreenToken('text', body));
    }

    if (trail) out.push(new GreenToken('whitespace', trail));
    return out;
}

function sourceArguments(rest: string): GreenElement[] {
    if (!rest) return [];
    if (rest.startsWith(':')) {
        return [new GreenToken('src-block-parameters', rest)];
    }
    const m = /^(.*?)([ \t]+)(:.*)$/.exec(rest);
    if (!m) {
        return [new GreenToken('src-block-switches', rest)];
    }
    return [
        new GreenToken('src-block-switches', m[1]),
        new GreenToken('whitespace', m[2]),
        new GreenToken('src-block-parameters', m[3]),
    ];
}

function blockContent(ctx: ParseContext, kind: NodeKind, start: number, end: number): GreenElement[] {
    if (VERBATIM_BLOCKS.has(kind)) {
        const children: GreenElement[] = [];
        for (const line of linesFrom(ctx.text, start, end)) {
            const escape = RE_COMMA_ESCAPE.exec(line.content);
            if (escape) {
                if (escape[1]) children.push(new GreenToken('whitespace', escape[1]));
                children.push(new GreenToken('comma', ','), new GreenToken('text', escape[3]));
            } else if (line.content) {
                children.push(new GreenToken('text', line.content));
            }
            if (line.terminator) children.push(new GreenToken('new-line', line.terminator));
        }
        return children;
    }
    if (kind === 'verse-block') {
        return parseObjects(ctx.text.slice(start, end), ctx.config);
    }
    return parseElements(ctx, start, end);
}

// =============================================================================
// Dynamic blocks
// =============================================================================

export function tryParseDynBlock(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const begin = readLine(ctx.text, pos, limit);
    if (!begin) return null;
    const m = RE_DYN_BEGIN.exec(begin.content);
    if (!m) return null;
    const end = findEndLine(ctx.text, begin.next, limit, RE_DYN_END);
    if (!end) return null;

    const beginChildren: GreenElement[] = [];
    const push = (kind: 'whitespace' | 'text', value: string | undefined): void => {
        if (value) beginChildren.push(new GreenToken(kind, value));
    };
    push('whitespace', m[1]);
    push('text', m[2]);
    push('whitespace', m[3]);
    push('text', m[4]);
    push('whitespace', m[5]);
    push('text', m[6]);
    push('whitespace', m[7]);
    if (begin.terminator) beginChildren.push(new GreenToken('new-line', begin.terminator));

    const endChildren: GreenElement[] = [];
    const em = RE_DYN_END.exec(end.content);
    if (em) {
        if (em[1]) endChildren.push(new GreenToken('whitespace', em[1]));
        endChildren.push(new GreenToken('text', em[2]));
        if (em[3]) endChildren.push(new GreenToken('whitespace', em[3]));
    }
    if (end.terminator) endChildren.push(new GreenToken('new-line', end.terminator));

    const blanks = takeBlankLines(ctx.text, end.next, limit);
    return {
        node: new GreenNode('dyn-block', [
            new GreenNode('block-begin', beginChildren),
            new GreenNode('block-content', parseElements(ctx, begin.next, end.start)),
            new GreenNode('block-end', endChildren),
            ...blanks.tokens,
        ]),
        end: blanks.end,
    };
}
