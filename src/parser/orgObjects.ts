/**
 * Inline object grammar
 *
 * Scans a text run (headline title, paragraph, table cell, ...) and turns
 * recognized markup into object nodes. Everything between recognized
 * objects stays as plain `text` tokens, so the concatenated output always
 * equals the input.
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { EMPHASIS_TOKENS } from './orgSyntaxKind';
import type { ParseConfig } from './orgConfig';
import { tryParseTimestamp } from './orgTimestamp';
import { isValidEntity, RE_ENTITY_NAME } from './orgEntities';

interface ObjectParse {
    node: GreenNode;
    end: number;
}

// =============================================================================
// Pre-compiled Patterns
// =============================================================================

const RE_LINK = /^\[\[([^[\]]+)\](?:\[([\s\S]+?)\])?\]/;
const RE_COOKIE = /^\[(\d*%|\d*\/\d*)\]/;
const RE_FN_LABEL = /^\[fn:([\w-]*)/;
const RE_MACRO = /^\{\{\{([A-Za-z][\w-]*)(?:\(([\s\S]*?)\))?\}\}\}/;
const RE_RADIO_TARGET = /^<<<([^<>\s](?:[^<>\n\r]*[^<>\s])?)>>>/;
const RE_TARGET = /^<<([^<>\s](?:[^<>\n\r]*[^<>\s])?)>>/;
const RE_SNIPPET = /^@@([A-Za-z0-9-]+):([\s\S]*?)@@/;
const RE_INLINE_CALL = /^call_([^\s()[\]]+)(?:\[([^\]\n\r]*)\])?\(([^)\n\r]*)\)(?:\[([^\]\n\r]*)\])?/;
const RE_INLINE_SRC = /^src_([^\s[\]{}]+)(?:\[([^\]\n\r]*)\])?\{([^}\n\r]*)\}/;
const RE_LINE_BREAK = /^\\\\([ \t]*)(?=\r|\n|$)/;
const RE_LATEX_PAREN = /^\\\(([\s\S]*?)\\\)/;
const RE_LATEX_BRACKET = /^\\\[([\s\S]*?)\\\]/;
const RE_LATEX_DISPLAY = /^\$\$([\s\S]+?)\$\$/;
const RE_LATEX_INLINE_CHAR = /^\$([^\s.,;?"$])\$(?=[\s\-.,;:!?'")}\]]|$)/;
const RE_LATEX_INLINE = /^\$([^\s.,;$][^$]*?[^\s.,$\\])\$(?=[\s\-.,;:!?'")}\]]|$)/;
const RE_LATEX_COMMAND = /^\\[a-zA-Z]+\*?(?:\[[^[\]{}\n\r]*\]|\{[^{}\n\r]*\})+/;
const RE_SCRIPT_PLAIN = /^[+-]?[A-Za-z0-9,.\\]*[A-Za-z0-9]/;

// Characters allowed before an opening emphasis marker
const EMPHASIS_PRE = new Set([' ', '\t', '\n', '\r', '-', '(', '{', "'", '"']);
// Characters allowed after a closing emphasis marker
const EMPHASIS_POST = new Set([' ', '\t', '\n', '\r', '-', '.', ',', ';', ':', '!', '?', "'", ')', '}', '"', '[', '\\']);

const WS = new Set([' ', '\t', '\n', '\r']);

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Parse inline objects from a text run
 */
export function parseObjects(text: string, config: ParseConfig): GreenElement[] {
    const result: GreenElement[] = [];
    let textStart = 0;
    let pos = 0;

    while (pos < text.length) {
        const parsed = tryParseObject(text, pos, config);
        if (parsed) {
            if (pos > textStart) {
                result.push(new GreenToken('text', text.slice(textStart, pos)));
            }
            result.push(parsed.node);
            pos = parsed.end;
            textStart = pos;
        } else {
            pos++;
        }
    }

    if (textStart < text.length) {
        result.push(new GreenToken('text', text.slice(textStart)));
    }
    return result;
}

function tryParseObject(text: string, pos: number, config: ParseConfig): ObjectParse | null {
    const char = text[pos];
    const prevChar = pos > 0 ? text[pos - 1] : '';

    switch (char) {
        case '[':
            if (text[pos + 1] === '[') {
                return tryParseLink(text, pos, config);
            }
            if (text.startsWith('[fn:', pos)) {
                return tryParseFnRef(text, pos, config);
            }
            return tryParseCookie(text, pos) ?? tryParseTimestamp(text, pos);

        case '<':
            if (text.startsWith('<<<', pos)) {
                return tryParseTarget(text, pos, RE_RADIO_TARGET, 'radio-target');
            }
            if (text.startsWith('<<', pos)) {
                return tryParseTarget(text, pos, RE_TARGET, 'target');
            }
            return tryParseTimestamp(text, pos);

        case '{':
            if (text.startsWith('{{{', pos)) return tryParseMacro(text, pos);
            return text[pos + 1] === '{' && prevChar !== '{' ? tryParseCloze(text, pos, config) : null;

        case '@':
            return text[pos + 1] === '@' ? tryParseSnippet(text, pos) : null;

        case 'c':
            return text.startsWith('call_', pos) && !isAlnum(prevChar) ? tryParseInlineCall(text, pos) : null;

        case 's':
            return text.startsWith('src_', pos) && !isAlnum(prevChar) ? tryParseInlineSrc(text, pos) : null;

        case '\\':
            return tryParseBackslash(text, pos);

        case '$':
            return prevChar !== '$' ? tryParseDollarLatex(text, pos) : null;

        case '_':
            return tryParseEmphasis(text, pos, config) ?? tryParseScript(text, pos, config, 'subscript');

        case '^':
            return tryParseScript(text, pos, config, 'superscript');

        case '*':
        case '/':
        case '+':
        case '=':
        case '~':
            return tryParseEmphasis(text, pos, config);

        default:
            return null;
    }
}

// =============================================================================
// Emphasis
// =============================================================================

function tryParseEmphasis(text: string, pos: number, config: ParseConfig): ObjectParse | null {
    const marker = text[pos];
    const info = EMPHASIS_TOKENS[marker];
    if (!info) return null;

    if (pos > 0 && !EMPHASIS_PRE.has(text[pos - 1])) return null;
    const first = text[pos + 1];
    if (first === undefined || WS.has(first)) return null;

    const close = findEmphasisClose(text, pos + 1, marker);
    if (close < 0) return null;

    const content = text.slice(pos + 1, close);
    const inner: GreenElement[] =
        info.kind === 'verbatim' || info.kind === 'code'
            ? [new GreenToken('text', content)]
            : parseObjects(content, config);

    return {
        node: new GreenNode(info.kind, [
            new GreenToken(info.token, marker),
            ...inner,
            new GreenToken(info.token, marker),
        ]),
        end: close + 1,
    };
}

/**
 * Position of the closing marker, or -1. Contents may span at most one
 * line break.
 */
function findEmphasisClose(text: string, start: number, marker: string): number {
    let lineBreaks = 0;
    for (let i = start + 1; i < text.length; i++) {
        const ch = text[i];
        if (ch === '\n' || (ch === '\r' && text[i + 1] !== '\n')) {
            lineBreaks++;
            if (lineBreaks > 1) return -1;
            continue;
        }
        if (ch !== marker) continue;
        if (WS.has(text[i - 1])) continue;
        const post = text[i + 1];
        if (post === undefined || EMPHASIS_POST.has(post)) {
            return i;
        }
    }
    return -1;
}

// =============================================================================
// Links, footnotes, cookies
// =============================================================================

function tryParseLink(text: string, pos: number, config: ParseConfig): ObjectParse | null {
    const m = RE_LINK.exec(text.slice(pos));
    if (!m) return null;

    const children: GreenElement[] = [
        new GreenToken('l-bracket2', '[['),
        new GreenToken('link-path', m[1]),
    ];
    if (m[2] !== undefined) {
        children.push(
            new GreenToken('r-bracket', ']'),
            new GreenToken('l-bracket', '['),
            ...parseObjects(m[2], config)
        );
    }
    children.push(new GreenToken('r-bracket2', ']]'));
    return { node: new GreenNode('link', children), end: pos + m[0].length };
}

function tryParseFnRef(text: string, pos: number, config: ParseConfig): ObjectParse | null {
    const m = RE_FN_LABEL.exec(text.slice(pos));
    if (!m) return null;
    const label = m[1];
    let cursor = pos + m[0].length;

    const children: GreenElement[] = [
        new GreenToken('l-bracket', '['),
        new GreenToken('fn-prefix', 'fn'),
        new GreenToken('colon', ':'),
    ];
    if (label) children.push(new GreenToken('fn-label', label));

    if (text[cursor] === ']') {
        if (!label) return null;
        children.push(new GreenToken('r-bracket', ']'));
        return { node: new GreenNode('fn-ref', children), end: cursor + 1 };
    }
    if (text[cursor] !== ':') return null;

    // Inline definition: find the matching bracket
    const defStart = cursor + 1;
    let depth = 1;
    for (cursor = defStart; cursor < text.length; cursor++) {
        if (text[cursor] === '[') depth++;
        else if (text[cursor] === ']') {
            depth--;
            if (depth === 0) break;
        }
    }
    if (depth !== 0) return null;
    const definition = text.slice(defStart, cursor);
    if (!label && !definition) return null;

    children.push(new GreenToken('colon', ':'));
    if (definition) {
        children.push(new GreenNode('fn-content', parseObjects(definition, config)));
    }
    children.push(new GreenToken('r-bracket', ']'));
    return { node: new GreenNode('fn-ref', children), end: cursor + 1 };
}

function tryParseCookie(text: string, pos: number): ObjectParse | null {
    const m = RE_COOKIE.exec(text.slice(pos, pos + 24));
    if (!m) return null;
    return {
        node: new GreenNode('cookie', [
            new GreenToken('l-bracket', '['),
            ...(m[1] ? [new GreenToken('text', m[1])] : []),
            new GreenToken('r-bracket', ']'),
        ]),
        end: pos + m[0].length,
    };
}

// =============================================================================
// Targets, macros, snippets
// =============================================================================

function tryParseTarget(text: string, pos: number, pattern: RegExp, kind: 'radio-target' | 'target'): ObjectParse | null {
    const m = pattern.exec(text.slice(pos));
    if (!m) return null;
    const [open, close] = kind === 'radio-target'
        ? [new GreenToken('l-angle3', '<<<'), new GreenToken('r-angle3', '>>>')]
        : [new GreenToken('l-angle2', '<<'), new GreenToken('r-angle2', '>>')];
    return {
        node: new GreenNode(kind, [open, new GreenToken('text', m[1]), close]),
        end: pos + m[0].length,
    };
}

function tryParseMacro(text: string, pos: number): ObjectParse | null {
    const m = RE_MACRO.exec(text.slice(pos));
    if (!m) return null;
    const children: GreenElement[] = [
        new GreenToken('l-curly3', '{{{'),
        new GreenToken('text', m[1]),
    ];
    if (m[2] !== undefined) {
        children.push(new GreenToken('l-parens', '('));
        if (m[2]) children.push(new GreenToken('text', m[2]));
        children.push(new GreenToken('r-parens', ')'));
    }
    children.push(new GreenToken('r-curly3', '}}}'));
    return { node: new GreenNode('macros', children), end: pos + m[0].length };
}

/**
 * `{{text}}`, `{{text}{hint}}`, `{{text}@id}` or `{{text}{hint}@id}`.
 * A `}` between `$` signs does not close the text.
 */
function tryParseCloze(text: string, pos: number, config: ParseConfig): ObjectParse | null {
    const textStart = pos + 2;
    let inLatex = false;
    let textEnd = -1;
    for (let i = textStart; i < text.length; i++) {
        if (text[i] === '$') {
            inLatex = !inLatex;
        } else if (text[i] === '}' && !inLatex) {
            textEnd = i;
            break;
        }
    }
    if (textEnd <= textStart) return null;

    const children: GreenElement[] = [
        new GreenToken('l-curly2', '{{'),
        ...parseObjects(text.slice(textStart, textEnd), config),
        new GreenToken('r-curly', '}'),
    ];
    let cursor = textEnd + 1;

    if (text[cursor] === '{') {
        const close = text.indexOf('}', cursor + 1);
        if (close < 0) return null;
        children.push(new GreenToken('l-curly', '{'));
        if (close > cursor + 1) children.push(new GreenToken('text', text.slice(cursor + 1, close)));
        children.push(new GreenToken('r-curly', '}'));
        cursor = close + 1;
    }

    if (text[cursor] === '@') {
        const close = text.indexOf('}', cursor + 1);
        if (close < 0) return null;
        children.push(new GreenToken('at', '@'));
        if (close > cursor + 1) children.push(new GreenToken('text', text.slice(cursor + 1, close)));
        cursor = close;
    }

    if (text[cursor] !== '}') return null;
    children.push(new GreenToken('r-curly', '}'));
    return { node: new GreenNode('cloze', children), end: cursor + 1 };
}

function tryParseSnippet(text: string, pos: number): ObjectParse | null {
    const m = RE_SNIPPET.exec(text.slice(pos));
    if (!m) return null;
    const children: GreenElement[] = [
        new GreenToken('at2', '@@'),
        new GreenToken('text', m[1]),
        new GreenToken('colon', ':'),
    ];
    if (m[2]) children.push(new GreenToken('text', m[2]));
    children.push(new GreenToken('at2', '@@'));
    return { node: new GreenNode('snippet', children), end: pos + m[0].length };
}

// =============================================================================
// Inline babel calls and source
// =============================================================================

function bracketed(children: GreenElement[], value: string | undefined): void {
    if (value === undefined) return;
    children.push(new GreenToken('l-bracket', '['));
    if (value) children.push(new GreenToken('text', value));
    children.push(new GreenToken('r-bracket', ']'));
}

function tryParseInlineCall(text: string, pos: number): ObjectParse | null {
    const m = RE_INLINE_CALL.exec(text.slice(pos));
    if (!m) return null;
    const children: GreenElement[] = [
        new GreenToken('text', 'call_'),
        new GreenToken('text', m[1]),
    ];
    bracketed(children, m[2]);
    children.push(new GreenToken('l-parens', '('));
    if (m[3]) children.push(new GreenToken('text', m[3]));
    children.push(new GreenToken('r-parens', ')'));
    bracketed(children, m[4]);
    return { node: new GreenNode('inline-call', children), end: pos + m[0].length };
}

function tryParseInlineSrc(text: string, pos: number): ObjectParse | null {
    const m = RE_INLINE_SRC.exec(text.slice(pos));
    if (!m) return null;
    const children: GreenElement[] = [
        new GreenToken('text', 'src_'),
        new GreenToken('text', m[1]),
    ];
    bracketed(children, m[2]);
    children.push(new GreenToken('l-curly', '{'));
    if (m[3]) children.push(new GreenToken('text', m[3]));
    children.push(new GreenToken('r-curly', '}'));
    return { node: new GreenNode('inline-src', children), end: pos + m[0].length };
}

// =============================================================================
// Backslash constructs: line breaks, LaTeX, entities
// =============================================================================

function tryParseBackslash(text: string, pos: number): ObjectParse | null {
    const rest = text.slice(pos);

    const lineBreak = RE_LINE_BREAK.exec(rest);
    if (lineBreak) {
        const children: GreenElement[] = [new GreenToken('backslash2', '\\\\')];
        if (lineBreak[1]) children.push(new GreenToken('whitespace', lineBreak[1]));
        return { node: new GreenNode('line-break', children), end: pos + lineBreak[0].length };
    }

    const paren = RE_LATEX_PAREN.exec(rest);
    if (paren) {
        return latexDelimited(pos, paren, ['l-parens', '('], ['r-parens', ')']);
    }
    const bracket = RE_LATEX_BRACKET.exec(rest);
    if (bracket) {
        return latexDelimited(pos, bracket, ['l-bracket', '['], ['r-bracket', ']']);
    }

    const entity = tryParseEntity(text, pos);
    if (entity) return entity;

    const command = RE_LATEX_COMMAND.exec(rest);
    if (command) {
        return {
            node: new GreenNode('latex-fragment', [new GreenToken('text', command[0])]),
            end: pos + command[0].length,
        };
    }
    return null;
}

function latexDelimited(
    pos: number,
    m: RegExpExecArray,
    open: ['l-parens' | 'l-bracket', string],
    close: ['r-parens' | 'r-bracket', string]
): ObjectParse {
    const children: GreenElement[] = [
        new GreenToken('backslash', '\\'),
        new GreenToken(open[0], open[1]),
    ];
    if (m[1]) children.push(new GreenToken('text', m[1]));
    children.push(new GreenToken('backslash', '\\'), new GreenToken(close[0], close[1]));
    return { node: new GreenNode('latex-fragment', children), end: pos + m[0].length };
}

function tryParseEntity(text: string, pos: number): ObjectParse | null {
    const m = RE_ENTITY_NAME.exec(text.slice(pos + 1, pos + 40));
    if (!m || !isValidEntity(m[1])) return null;
    let end = pos + 1 + m[1].length;
    const children: GreenElement[] = [
        new GreenToken('backslash', '\\'),
        new GreenToken('text', m[1]),
    ];
    if (text.startsWith('{}', end)) {
        children.push(new GreenToken('l-curly', '{'), new GreenToken('r-curly', '}'));
        end += 2;
    } else if (end < text.length && /[a-zA-Z]/.test(text[end])) {
        return null;
    }
    return { node: new GreenNode('entity', children), end };
}

function tryParseDollarLatex(text: string, pos: number): ObjectParse | null {
    const rest = text.slice(pos);
    const display = RE_LATEX_DISPLAY.exec(rest);
    if (display) {
        return {
            node: new GreenNode('latex-fragment', [
                new GreenToken('dollar2', '$$'),
                new GreenToken('text', display[1]),
                new GreenToken('dollar2', '$$'),
            ]),
            end: pos + display[0].length,
        };
    }
    const inline = RE_LATEX_INLINE_CHAR.exec(rest) ?? RE_LATEX_INLINE.exec(rest);
    if (inline) {
        return {
            node: new GreenNode('latex-fragment', [
                new GreenToken('dollar', '$'),
                new GreenToken('text', inline[1]),
                new GreenToken('dollar', '$'),
            ]),
            end: pos + inline[0].length,
        };
    }
    return null;
}

// =============================================================================
// Subscript / superscript
// =============================================================================

function tryParseScript(
    text: string,
    pos: number,
    config: ParseConfig,
    kind: 'subscript' | 'superscript'
): ObjectParse | null {
    if (config.useSubSuperscript === false) return null;
    if (pos === 0 || WS.has(text[pos - 1])) return null;

    const marker = kind === 'subscript'
        ? new GreenToken('underscore', '_')
        : new GreenToken('caret', '^');

    if (text[pos + 1] === '{') {
        let depth = 0;
        for (let i = pos + 1; i < text.length; i++) {
            const ch = text[i];
            if (ch === '\n' || ch === '\r') return null;
            if (ch === '{') depth++;
            else if (ch === '}') {
                depth--;
                if (depth === 0) {
                    return {
                        node: new GreenNode(kind, [
                            marker,
                            new GreenToken('l-curly', '{'),
                            ...parseObjects(text.slice(pos + 2, i), config),
                            new GreenToken('r-curly', '}'),
                        ]),
                        end: i + 1,
                    };
                }
            }
        }
        return null;
    }

    if (config.useSubSuperscript === 'brace') return null;

    const m = RE_SCRIPT_PLAIN.exec(text.slice(pos + 1));
    if (!m) return null;
    return {
        node: new GreenNode(kind, [marker, new GreenToken('text', m[0])]),
        end: pos + 1 + m[0].length,
    };
}

function isAlnum(ch: string): boolean {
    return ch !== '' && /[A-Za-z0-9]/.test(ch);
}
