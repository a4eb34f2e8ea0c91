/**
 * Green tree: the immutable, position-free half of the syntax tree
 *
 * Green elements know their kind, their children and their text length,
 * never their absolute offset. That is what lets an edit reuse untouched
 * subtrees as-is in the next tree version.
 */

import type { NodeKind, TokenKind } from './orgSyntaxKind';

export class GreenToken {
    constructor(
        public readonly kind: TokenKind,
        public readonly text: string
    ) {}

    get textLength(): number {
        return this.text.length;
    }

    toString(): string {
        return this.text;
    }
}

export class GreenNode {
    public readonly textLength: number;

    constructor(
        public readonly kind: NodeKind,
        public readonly children: readonly GreenElement[]
    ) {
        let length = 0;
        for (const child of children) {
            length += child.textLength;
        }
        this.textLength = length;
    }

    /**
     * Reconstructed source text of this subtree
     */
    toString(): string {
        const parts: string[] = [];
        collectText(this, parts);
        return parts.join('');
    }

    /**
     * Copy of this node with the child at `index` replaced
     */
    replaceChild(index: number, child: GreenElement): GreenNode {
        const children = this.children.slice();
        children[index] = child;
        return new GreenNode(this.kind, children);
    }
}

export type GreenElement = GreenNode | GreenToken;

function collectText(node: GreenNode, parts: string[]): void {
    for (const child of node.children) {
        if (child instanceof GreenToken) {
            parts.push(child.text);
        } else {
            collectText(child, parts);
        }
    }
}
