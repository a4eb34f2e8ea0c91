/**
 * Typed views over syntax nodes
 *
 * A view wraps a SyntaxNode of a known kind and exposes typed accessors.
 * Views hold no state of their own: every accessor reads the underlying
 * tree, so a view stays valid for exactly the tree version it came from.
 */

import type { NodeKind, TokenKind } from '../parser/orgSyntaxKind';
import { SyntaxNode, SyntaxToken } from '../parser/orgSyntaxTree';
import type { SyntaxElement, TextRange } from '../parser/orgSyntaxTree';

// =============================================================================
// View Class Protocol
// =============================================================================

/**
 * Constructor side of a view: builds the view and tells which node kinds
 * it accepts
 */
export interface ViewClass<T extends AstNode> {
    new (syntax: SyntaxNode): T;
    canCast(kind: NodeKind): boolean;
}

/**
 * Wrap `node` in `View`, or undefined when the kind does not match
 */
export function castNode<T extends AstNode>(View: ViewClass<T>, node: SyntaxNode): T | undefined {
    return View.canCast(node.kind) ? new View(node) : undefined;
}

// =============================================================================
// Base Classes
// =============================================================================

export abstract class AstNode {
    constructor(public readonly syntax: SyntaxNode) {}

    static canCast(_kind: NodeKind): boolean {
        return false;
    }

    /**
     * `Headline.cast(node)` style narrowing
     */
    static cast<T extends AstNode>(this: ViewClass<T>, node: SyntaxNode): T | undefined {
        return castNode(this, node);
    }

    get start(): number {
        return this.syntax.start;
    }

    get end(): number {
        return this.syntax.end;
    }

    get textRange(): TextRange {
        return this.syntax.textRange;
    }

    /**
     * Source text of the node, unchanged
     */
    raw(): string {
        return this.syntax.text();
    }

    toString(): string {
        return this.syntax.text();
    }

    protected token(kind: TokenKind): SyntaxToken | undefined {
        return this.syntax.firstToken(kind);
    }

    protected child<T extends AstNode>(View: ViewClass<T>): T | undefined {
        for (const node of this.syntax.children()) {
            const view = castNode(View, node);
            if (view) return view;
        }
        return undefined;
    }

    protected childrenOf<T extends AstNode>(View: ViewClass<T>): T[] {
        const result: T[] = [];
        for (const node of this.syntax.children()) {
            const view = castNode(View, node);
            if (view) result.push(view);
        }
        return result;
    }
}

/**
 * Element that may carry affiliated keywords and trailing blank lines
 */
export abstract class ElementNode extends AstNode {
    affiliatedKeywords(): AffiliatedKeyword[] {
        return this.childrenOf(AffiliatedKeyword);
    }

    /**
     * Last `#+CAPTION:` attached to this element
     */
    caption(): AffiliatedKeyword | undefined {
        return this.affiliatedKeyword('CAPTION');
    }

    /**
     * Value of `#+NAME:`, if any
     */
    name(): string | undefined {
        return this.affiliatedKeyword('NAME')?.value();
    }

    affiliatedKeyword(key: string): AffiliatedKeyword | undefined {
        const upper = key.toUpperCase();
        let found: AffiliatedKeyword | undefined;
        for (const keyword of this.affiliatedKeywords()) {
            if (keyword.key().toUpperCase() === upper) found = keyword;
        }
        return found;
    }

    /**
     * Number of blank lines owned by this element
     */
    blankLines(): number {
        return this.syntax.tokens('blank-line').length;
    }
}

// =============================================================================
// Keyword-shaped nodes
// =============================================================================

/**
 * Shared accessors for `#+KEY[OPTIONAL]: VALUE` lines
 */
export abstract class KeywordLike extends AstNode {
    key(): string {
        return this.keyToken()?.text ?? '';
    }

    keyToken(): SyntaxToken | undefined {
        const children = this.syntax.childrenWithTokens();
        const hash = children.findIndex(child => child.kind === 'hash-plus');
        const key = children[hash + 1];
        return key instanceof SyntaxToken && key.kind === 'text' ? key : undefined;
    }

    /**
     * Elements inside `[...]` before the colon
     */
    optionalElements(): SyntaxElement[] {
        return this.between('l-bracket', 'r-bracket', 'colon');
    }

    optional(): string | undefined {
        if (!this.syntax.childrenWithTokens().some(child => child.kind === 'l-bracket')) return undefined;
        return this.optionalElements().map(element => element.toString()).join('');
    }

    /**
     * Value elements after the colon, without surrounding whitespace
     */
    valueElements(): SyntaxElement[] {
        const children = this.syntax.childrenWithTokens();
        const colon = children.findIndex(child => child.kind === 'colon');
        if (colon < 0) return [];
        return children.slice(colon + 1).filter(child =>
            child.kind !== 'whitespace' && child.kind !== 'new-line' && child.kind !== 'blank-line'
        );
    }

    value(): string {
        return this.valueElements().map(element => element.toString()).join('');
    }

    private between(open: TokenKind, close: TokenKind, stop: TokenKind): SyntaxElement[] {
        const result: SyntaxElement[] = [];
        let inside = false;
        for (const child of this.syntax.childrenWithTokens()) {
            if (child.kind === stop) break;
            if (child.kind === open) {
                inside = true;
            } else if (child.kind === close) {
                break;
            } else if (inside) {
                result.push(child);
            }
        }
        return result;
    }
}

export class AffiliatedKeyword extends KeywordLike {
    readonly kind = 'affiliated-keyword' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'affiliated-keyword';
    }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Concatenated text of the given elements
 */
export function joinText(elements: readonly SyntaxElement[]): string {
    return elements.map(element => element.toString()).join('');
}
