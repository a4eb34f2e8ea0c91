/**
 * Red tree: positioned, parent-linked views over green elements
 *
 * Red nodes are created lazily while walking down from the root. Each one
 * derives its absolute offset from its parent, so offsets are never stored
 * in the green tree.
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import type { NodeKind, TokenKind } from './orgSyntaxKind';

// =============================================================================
// Text Range
// =============================================================================

/**
 * Half-open range `[start, end)` of string offsets
 */
export interface TextRange {
    start: number;
    end: number;
}

export function textRange(start: number, end: number): TextRange {
    return { start, end };
}

export function rangeContains(range: TextRange, offset: number): boolean {
    return range.start <= offset && offset < range.end;
}

export function rangeContainsRange(outer: TextRange, inner: TextRange): boolean {
    return outer.start <= inner.start && inner.end <= outer.end;
}

// =============================================================================
// Syntax Token
// =============================================================================

export class SyntaxToken {
    constructor(
        public readonly green: GreenToken,
        public readonly parent: SyntaxNode,
        public readonly offset: number,
        public readonly index: number
    ) {}

    get kind(): TokenKind {
        return this.green.kind;
    }

    get text(): string {
        return this.green.text;
    }

    get start(): number {
        return this.offset;
    }

    get end(): number {
        return this.offset + this.green.textLength;
    }

    get textRange(): TextRange {
        return { start: this.start, end: this.end };
    }

    get isToken(): true {
        return true;
    }

    nextSibling(): SyntaxElement | undefined {
        return this.parent.childrenWithTokens()[this.index + 1];
    }

    prevSibling(): SyntaxElement | undefined {
        return this.index > 0 ? this.parent.childrenWithTokens()[this.index - 1] : undefined;
    }

    toString(): string {
        return this.green.text;
    }
}

// =============================================================================
// Syntax Node
// =============================================================================

export class SyntaxNode {
    private cachedChildren: SyntaxElement[] | null = null;

    private constructor(
        public readonly green: GreenNode,
        public readonly parent: SyntaxNode | null,
        public readonly offset: number,
        public readonly index: number
    ) {}

    /**
     * Create the root of a tree version
     */
    static newRoot(green: GreenNode): SyntaxNode {
        return new SyntaxNode(green, null, 0, 0);
    }

    get kind(): NodeKind {
        return this.green.kind;
    }

    get start(): number {
        return this.offset;
    }

    get end(): number {
        return this.offset + this.green.textLength;
    }

    get textRange(): TextRange {
        return { start: this.start, end: this.end };
    }

    get isToken(): false {
        return false;
    }

    /**
     * Child nodes and tokens in document order
     */
    childrenWithTokens(): readonly SyntaxElement[] {
        if (this.cachedChildren === null) {
            const children: SyntaxElement[] = [];
            let offset = this.offset;
            this.green.children.forEach((child, index) => {
                children.push(
                    child instanceof GreenToken
                        ? new SyntaxToken(child, this, offset, index)
                        : new SyntaxNode(child, this, offset, index)
                );
                offset += child.textLength;
            });
            this.cachedChildren = children;
        }
        return this.cachedChildren;
    }

    /**
     * Child nodes only
     */
    children(): SyntaxNode[] {
        return this.childrenWithTokens().filter(isSyntaxNode);
    }

    firstChild(kind?: NodeKind | ((kind: NodeKind) => boolean)): SyntaxNode | undefined {
        for (const child of this.childrenWithTokens()) {
            if (child instanceof SyntaxNode && matchesKind(child.kind, kind)) {
                return child;
            }
        }
        return undefined;
    }

    firstToken(kind?: TokenKind): SyntaxToken | undefined {
        for (const child of this.childrenWithTokens()) {
            if (child instanceof SyntaxToken && (kind === undefined || child.kind === kind)) {
                return child;
            }
        }
        return undefined;
    }

    tokens(kind?: TokenKind): SyntaxToken[] {
        const result: SyntaxToken[] = [];
        for (const child of this.childrenWithTokens()) {
            if (child instanceof SyntaxToken && (kind === undefined || child.kind === kind)) {
                result.push(child);
            }
        }
        return result;
    }

    nextSibling(): SyntaxElement | undefined {
        return this.parent?.childrenWithTokens()[this.index + 1];
    }

    prevSibling(): SyntaxElement | undefined {
        if (!this.parent || this.index === 0) return undefined;
        return this.parent.childrenWithTokens()[this.index - 1];
    }

    /**
     * This node followed by its parent, grandparent, ... up to the root
     */
    *ancestors(): Generator<SyntaxNode> {
        let current: SyntaxNode | null = this;
        while (current) {
            yield current;
            current = current.parent;
        }
    }

    root(): SyntaxNode {
        let current: SyntaxNode = this;
        while (current.parent) {
            current = current.parent;
        }
        return current;
    }

    /**
     * All descendant nodes in pre-order, starting with this node
     */
    *descendants(): Generator<SyntaxNode> {
        const stack: SyntaxNode[] = [this];
        while (stack.length > 0) {
            const current = stack.pop();
            if (!current) break;
            yield current;
            const children = current.children();
            for (let i = children.length - 1; i >= 0; i--) {
                stack.push(children[i]);
            }
        }
    }

    /**
     * All leaf tokens in document order
     */
    *descendantTokens(): Generator<SyntaxToken> {
        for (const child of this.childrenWithTokens()) {
            if (child instanceof SyntaxToken) {
                yield child;
            } else {
                yield* child.descendantTokens();
            }
        }
    }

    /**
     * Token covering `offset`. At a boundary between two tokens the one
     * starting at `offset` is returned; at the very end, the last token.
     */
    tokenAtOffset(offset: number): SyntaxToken | undefined {
        if (offset < this.start || offset > this.end) return undefined;
        let current: SyntaxNode = this;
        for (;;) {
            const children = current.childrenWithTokens();
            let next: SyntaxElement | undefined;
            for (const child of children) {
                if (child.start <= offset && offset < child.end) {
                    next = child;
                    break;
                }
            }
            if (!next && offset === current.end && children.length > 0) {
                next = children[children.length - 1];
            }
            if (!next) return undefined;
            if (next instanceof SyntaxToken) return next;
            current = next;
        }
    }

    /**
     * Source text of this subtree
     */
    text(): string {
        return this.green.toString();
    }

    toString(): string {
        return this.green.toString();
    }

    /**
     * Produce the green root of a new tree version in which this node is
     * replaced by `replacement`. Only the path from here to the root is
     * copied; every other subtree is shared with the current version.
     */
    replaceWith(replacement: GreenNode): GreenNode {
        let green = replacement;
        let current: SyntaxNode = this;
        while (current.parent) {
            green = current.parent.green.replaceChild(current.index, green);
            current = current.parent;
        }
        return green;
    }

    /**
     * Indented debug dump, one element per line: `KIND@start..end "text"`
     */
    debugDump(): string {
        const lines: string[] = [];
        const visit = (element: SyntaxElement, depth: number): void => {
            const indent = '  '.repeat(depth);
            if (element instanceof SyntaxToken) {
                lines.push(`${indent}${element.kind}@${element.start}..${element.end} ${JSON.stringify(element.text)}`);
            } else {
                lines.push(`${indent}${element.kind}@${element.start}..${element.end}`);
                for (const child of element.childrenWithTokens()) {
                    visit(child, depth + 1);
                }
            }
        };
        visit(this, 0);
        return lines.join('\n');
    }
}

export type SyntaxElement = SyntaxNode | SyntaxToken;

export function isSyntaxNode(element: SyntaxElement): element is SyntaxNode {
    return element instanceof SyntaxNode;
}

function matchesKind(kind: NodeKind, filter?: NodeKind | ((kind: NodeKind) => boolean)): boolean {
    if (filter === undefined) return true;
    if (typeof filter === 'function') return filter(kind);
    return kind === filter;
}

export type { GreenElement };
