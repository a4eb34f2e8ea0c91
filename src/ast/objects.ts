/**
 * Views over inline objects
 */

import type { NodeKind, TokenKind } from '../parser/orgSyntaxKind';
import { SyntaxToken } from '../parser/orgSyntaxTree';
import type { SyntaxElement } from '../parser/orgSyntaxTree';
import { getEntity } from '../parser/orgEntities';
import type { EntityDefinition } from '../parser/orgEntities';
import { AstNode, joinText } from './astNode';
import type { AffiliatedKeyword } from './astNode';
import { Paragraph } from './element';

// =============================================================================
// Emphasis
// =============================================================================

/**
 * Text between the opening and closing markers
 */
export abstract class Emphasis extends AstNode {
    contents(): SyntaxElement[] {
        const children = this.syntax.childrenWithTokens();
        return children.slice(1, children.length - 1);
    }

    contentRaw(): string {
        return joinText(this.contents());
    }
}

export class Bold extends Emphasis {
    readonly kind = 'bold' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'bold';
    }
}

export class Italic extends Emphasis {
    readonly kind = 'italic' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'italic';
    }
}

export class Underline extends Emphasis {
    readonly kind = 'underline' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'underline';
    }
}

export class Strike extends Emphasis {
    readonly kind = 'strike' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'strike';
    }
}

export class Verbatim extends Emphasis {
    readonly kind = 'verbatim' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'verbatim';
    }

    value(): string {
        return this.contentRaw();
    }
}

export class Code extends Emphasis {
    readonly kind = 'code' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'code';
    }

    value(): string {
        return this.contentRaw();
    }
}

// =============================================================================
// Links
// =============================================================================

const IMAGE_SUFFIXES = [
    '.png', '.jpeg', '.jpg', '.gif', '.tiff', '.tif', '.xbm', '.xpm',
    '.pbm', '.pgm', '.ppm', '.webp', '.avif', '.svg',
];

export class Link extends AstNode {
    readonly kind = 'link' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'link';
    }

    path(): string {
        return this.token('link-path')?.text ?? '';
    }

    hasDescription(): boolean {
        return this.token('l-bracket') !== undefined;
    }

    /**
     * Elements between `][` and `]]`
     */
    description(): SyntaxElement[] {
        const children = this.syntax.childrenWithTokens();
        const open = children.findIndex(child => child.kind === 'l-bracket');
        if (open < 0) return [];
        return children.slice(open + 1).filter(child => child.kind !== 'r-bracket2');
    }

    descriptionRaw(): string {
        return joinText(this.description());
    }

    /**
     * A link without description whose path names an image file
     */
    isImage(): boolean {
        const path = this.path().toLowerCase();
        return !this.hasDescription() && IMAGE_SUFFIXES.some(suffix => path.endsWith(suffix));
    }

    /**
     * Caption of the paragraph holding this link
     */
    caption(): AffiliatedKeyword | undefined {
        const parent = this.syntax.parent;
        return parent ? Paragraph.cast(parent)?.caption() : undefined;
    }
}

// =============================================================================
// Macros, targets, cookies, snippets
// =============================================================================

export class Macros extends AstNode {
    readonly kind = 'macros' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'macros';
    }

    name(): string {
        return this.token('text')?.text ?? '';
    }

    /**
     * Raw text inside the parentheses, or undefined without them
     */
    args(): string | undefined {
        if (!this.token('l-parens')) return undefined;
        return this.syntax.tokens('text')[1]?.text ?? '';
    }

    /**
     * Arguments split on unescaped commas, `\,` unescaped
     */
    argumentList(): string[] {
        const args = this.args();
        if (args === undefined) return [];
        return args.split(/(?<!\\),/).map(arg => arg.replace(/\\,/g, ',').trim());
    }
}

/**
 * Fill-in-the-blank object: `{{text}{hint}@id}`, hint and id optional
 */
export class Cloze extends AstNode {
    readonly kind = 'cloze' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'cloze';
    }

    /**
     * Elements between `{{` and the first `}`
     */
    text(): SyntaxElement[] {
        const children = this.syntax.childrenWithTokens();
        const close = children.findIndex(child => child.kind === 'r-curly');
        return children.slice(1, close < 0 ? children.length : close);
    }

    textRaw(): string {
        return joinText(this.text());
    }

    /**
     * Text inside `{...}` after the cloze text; empty for `{}`, undefined without braces
     */
    hint(): string | undefined {
        return this.valueAfter('l-curly');
    }

    /**
     * Text after `@`; empty for a bare `@`, undefined without one
     */
    id(): string | undefined {
        return this.valueAfter('at');
    }

    private valueAfter(kind: TokenKind): string | undefined {
        const children = this.syntax.childrenWithTokens();
        const marker = children.findIndex(child => child.kind === kind);
        if (marker < 0) return undefined;
        const next = children[marker + 1];
        return next instanceof SyntaxToken && next.kind === 'text' ? next.text : '';
    }
}

export class RadioTarget extends AstNode {
    readonly kind = 'radio-target' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'radio-target';
    }

    value(): string {
        return this.token('text')?.text ?? '';
    }
}

export class Target extends AstNode {
    readonly kind = 'target' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'target';
    }

    value(): string {
        return this.token('text')?.text ?? '';
    }
}

/**
 * Statistics cookie: `[33%]` or `[1/3]`
 */
export class Cookie extends AstNode {
    readonly kind = 'cookie' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'cookie';
    }

    value(): string {
        return this.token('text')?.text ?? '';
    }

    isPercent(): boolean {
        return this.value().endsWith('%');
    }

    percent(): number | undefined {
        const m = /^(\d+)%$/.exec(this.value());
        return m ? Number(m[1]) : undefined;
    }

    fraction(): { done: number; total: number } | undefined {
        const m = /^(\d+)\/(\d+)$/.exec(this.value());
        return m ? { done: Number(m[1]), total: Number(m[2]) } : undefined;
    }
}

/**
 * Export snippet: `@@backend:value@@`
 */
export class Snippet extends AstNode {
    readonly kind = 'snippet' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'snippet';
    }

    backend(): string {
        return this.token('text')?.text ?? '';
    }

    value(): string {
        const children = this.syntax.childrenWithTokens();
        const colon = children.findIndex(child => child.kind === 'colon');
        const value = children[colon + 1];
        return value instanceof SyntaxToken && value.kind === 'text' ? value.text : '';
    }
}

// =============================================================================
// Inline babel
// =============================================================================

/**
 * Split a token list into groups delimited by open/close kinds
 */
function delimited(tokens: readonly SyntaxToken[], open: TokenKind, close: TokenKind): string[] {
    const groups: string[] = [];
    let current: string | null = null;
    for (const token of tokens) {
        if (token.kind === open) {
            current = '';
        } else if (token.kind === close) {
            if (current !== null) groups.push(current);
            current = null;
        } else if (current !== null) {
            current += token.text;
        }
    }
    return groups;
}

/**
 * `call_name[inside](args)[end]`
 */
export class InlineCall extends AstNode {
    readonly kind = 'inline-call' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'inline-call';
    }

    call(): string {
        return this.syntax.tokens('text')[1]?.text ?? '';
    }

    insideHeader(): string | undefined {
        const tokens = this.syntax.tokens();
        const parens = tokens.findIndex(t => t.kind === 'l-parens');
        return delimited(tokens.slice(0, parens), 'l-bracket', 'r-bracket')[0];
    }

    arguments(): string {
        return delimited(this.syntax.tokens(), 'l-parens', 'r-parens')[0] ?? '';
    }

    endHeader(): string | undefined {
        const tokens = this.syntax.tokens();
        const parens = tokens.findIndex(t => t.kind === 'r-parens');
        return delimited(tokens.slice(parens + 1), 'l-bracket', 'r-bracket')[0];
    }
}

/**
 * `src_lang[params]{body}`
 */
export class InlineSrc extends AstNode {
    readonly kind = 'inline-src' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'inline-src';
    }

    language(): string {
        return this.syntax.tokens('text')[1]?.text ?? '';
    }

    parameters(): string | undefined {
        return delimited(this.syntax.tokens(), 'l-bracket', 'r-bracket')[0];
    }

    value(): string {
        return delimited(this.syntax.tokens(), 'l-curly', 'r-curly')[0] ?? '';
    }
}

// =============================================================================
// LaTeX, entities, scripts, line breaks
// =============================================================================

export class LineBreak extends AstNode {
    readonly kind = 'line-break' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'line-break';
    }
}

export class LatexFragment extends AstNode {
    readonly kind = 'latex-fragment' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'latex-fragment';
    }

    /**
     * Fragment contents without delimiters; the whole command for
     * `\command{...}`
     */
    value(): string {
        return this.token('text')?.text ?? '';
    }
}

export class Entity extends AstNode {
    readonly kind = 'entity' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'entity';
    }

    name(): string {
        return this.token('text')?.text ?? '';
    }

    /**
     * Whether the entity is written `\name{}`
     */
    usesBrackets(): boolean {
        return this.token('l-curly') !== undefined;
    }

    definition(): EntityDefinition | undefined {
        return getEntity(this.name());
    }

    html(): string {
        return this.definition()?.html ?? '';
    }

    latex(): string {
        return this.definition()?.latex ?? '';
    }

    utf8(): string {
        return this.definition()?.utf8 ?? '';
    }
}

export abstract class Script extends AstNode {
    usesBraces(): boolean {
        return this.token('l-curly') !== undefined;
    }

    /**
     * Elements after the marker, without braces
     */
    contents(): SyntaxElement[] {
        const children = this.syntax.childrenWithTokens().slice(1);
        return this.usesBraces() ? children.slice(1, children.length - 1) : children;
    }

    contentRaw(): string {
        return joinText(this.contents());
    }
}

export class Subscript extends Script {
    readonly kind = 'subscript' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'subscript';
    }
}

export class Superscript extends Script {
    readonly kind = 'superscript' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'superscript';
    }
}
