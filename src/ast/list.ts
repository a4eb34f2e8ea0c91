/**
 * Plain list views
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import type { SyntaxElement, SyntaxNode } from '../parser/orgSyntaxTree';
import { AstNode, ElementNode, joinText } from './astNode';

export type CheckboxState = 'on' | 'off' | 'trans';

export class List extends ElementNode {
    readonly kind = 'list' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'list';
    }

    items(): ListItem[] {
        return this.childrenOf(ListItem);
    }

    /**
     * Numbered or lettered bullets
     */
    isOrdered(): boolean {
        const first = this.items()[0];
        return first !== undefined && !/^[-+*]$/.test(first.bullet());
    }

    /**
     * Unordered list whose first item has a `tag ::`
     */
    isDescriptive(): boolean {
        const first = this.items()[0];
        return first !== undefined && !this.isOrdered() && first.tag().length > 0;
    }
}

export class ListItem extends AstNode {
    readonly kind = 'list-item' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'list-item';
    }

    bullet(): string {
        return this.token('list-item-bullet')?.text ?? '';
    }

    /**
     * Indentation width before the bullet
     */
    indent(): number {
        const first = this.syntax.firstToken();
        return first && first.kind === 'whitespace' ? first.text.length : 0;
    }

    /**
     * `@3` of `[@3]`
     */
    counter(): string | undefined {
        return this.syntax.firstChild('list-item-counter')?.firstToken('text')?.text;
    }

    checkbox(): CheckboxState | undefined {
        const mark = this.syntax.firstChild('list-item-checkbox')?.firstToken('text')?.text;
        switch (mark) {
            case undefined:
                return undefined;
            case 'X':
            case 'x':
                return 'on';
            case '-':
                return 'trans';
            default:
                return 'off';
        }
    }

    /**
     * Inline elements of the description tag
     */
    tag(): SyntaxElement[] {
        const tag = this.syntax.firstChild('list-item-tag');
        return tag ? [...tag.childrenWithTokens()] : [];
    }

    tagRaw(): string {
        return joinText(this.tag());
    }

    content(): SyntaxNode | undefined {
        return this.syntax.firstChild('list-item-content');
    }

    contentRaw(): string {
        return this.content()?.text() ?? '';
    }
}
