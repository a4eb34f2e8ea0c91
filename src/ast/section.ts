/**
 * Section view: the elements between a headline (or the document start)
 * and the next headline
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import type { SyntaxNode } from '../parser/orgSyntaxTree';
import { AstNode } from './astNode';

export class Section extends AstNode {
    readonly kind = 'section' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'section';
    }

    /**
     * Element nodes in order
     */
    elements(): SyntaxNode[] {
        return this.syntax.children();
    }
}
