/**
 * Drawer and property drawer views
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import type { SyntaxNode } from '../parser/orgSyntaxTree';
import { AstNode, ElementNode } from './astNode';

export class Drawer extends ElementNode {
    readonly kind = 'drawer' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'drawer';
    }

    /**
     * Name between the colons of `:NAME:`; `name()` stays the `#+NAME:` value
     */
    drawerName(): string {
        return this.syntax.firstChild('drawer-begin')?.firstToken('text')?.text ?? '';
    }

    content(): SyntaxNode | undefined {
        return this.syntax.firstChild('drawer-content');
    }

    contentStart(): number {
        return this.syntax.firstChild('drawer-begin')?.end ?? this.start;
    }

    contentEnd(): number {
        return this.syntax.firstChild('drawer-end')?.start ?? this.end;
    }

    contentRaw(): string {
        return this.content()?.text() ?? '';
    }
}

/**
 * `:KEY: value` or `:KEY+: value` inside a property drawer
 */
export class NodeProperty extends AstNode {
    readonly kind = 'node-property' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'node-property';
    }

    key(): string {
        return this.syntax.tokens('text')[0]?.text ?? '';
    }

    value(): string {
        return this.syntax.tokens('text')[1]?.text ?? '';
    }

    /**
     * `:KEY+:` appends to an earlier value of the same key
     */
    isAppend(): boolean {
        return this.token('plus') !== undefined;
    }
}

export class PropertyDrawer extends AstNode {
    readonly kind = 'property-drawer' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'property-drawer';
    }

    properties(): NodeProperty[] {
        return this.childrenOf(NodeProperty);
    }

    /**
     * Key/value pairs in document order, as written
     */
    entries(): Array<[string, string]> {
        return this.properties().map(property => [property.key(), property.value()]);
    }

    /**
     * Value of `key` (case-insensitive). `KEY+` lines extend the value
     * with a space.
     */
    get(key: string): string | undefined {
        return this.toMap().get(key.toUpperCase());
    }

    /**
     * Resolved properties keyed by upper-case name
     */
    toMap(): Map<string, string> {
        const map = new Map<string, string>();
        for (const property of this.properties()) {
            const key = property.key().toUpperCase();
            const previous = map.get(key);
            if (property.isAppend() && previous !== undefined) {
                map.set(key, previous ? `${previous} ${property.value()}` : property.value());
            } else {
                map.set(key, property.value());
            }
        }
        return map;
    }

    contentStart(): number {
        return this.syntax.firstChild('drawer-begin')?.end ?? this.start;
    }

    contentEnd(): number {
        return this.syntax.firstChild('drawer-end')?.start ?? this.end;
    }
}
