/**
 * Footnote views: definitions `[fn:1] ...`, references `[fn:1]` and inline
 * definitions `[fn:label:contents]` / `[fn::contents]`
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import { AstNode, ElementNode } from './astNode';

/**
 * Contents of a footnote: elements in a definition, objects in a reference
 */
export class FnContent extends AstNode {
    readonly kind = 'fn-content' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'fn-content';
    }

    /**
     * Label of the enclosing definition or reference
     */
    label(): string | undefined {
        return this.syntax.parent?.firstToken('fn-label')?.text;
    }
}

export class FnDef extends ElementNode {
    readonly kind = 'fn-def' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'fn-def';
    }

    label(): string {
        return this.token('fn-label')?.text ?? '';
    }

    content(): FnContent | undefined {
        return this.child(FnContent);
    }
}

export class FnRef extends AstNode {
    readonly kind = 'fn-ref' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'fn-ref';
    }

    /**
     * Undefined for anonymous inline definitions `[fn::...]`
     */
    label(): string | undefined {
        return this.token('fn-label')?.text;
    }

    /**
     * Inline definition, if any
     */
    definition(): FnContent | undefined {
        return this.child(FnContent);
    }

    isInline(): boolean {
        return this.syntax.tokens('colon').length > 1;
    }
}
