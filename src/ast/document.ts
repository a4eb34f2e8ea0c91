/**
 * Document view
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import { AstNode } from './astNode';
import { PropertyDrawer } from './drawer';
import { Keyword } from './element';
import { Headline } from './headline';
import { Section } from './section';

export class Document extends AstNode {
    readonly kind = 'document' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'document';
    }

    /**
     * Zeroth section: everything before the first headline
     */
    section(): Section | undefined {
        return this.child(Section);
    }

    /**
     * Top-level headlines
     */
    headlines(): Headline[] {
        return this.childrenOf(Headline);
    }

    /**
     * Document-level property drawer at the very start
     */
    properties(): PropertyDrawer | undefined {
        return this.child(PropertyDrawer);
    }

    /**
     * Keywords of the zeroth section
     */
    keywords(): Keyword[] {
        const section = this.section();
        if (!section) return [];
        return section.syntax.children().flatMap(node => Keyword.cast(node) ?? []);
    }

    /**
     * `#+TITLE:` values joined by a space; undefined without any
     */
    title(): string | undefined {
        const titles = this.keywords()
            .filter(keyword => keyword.key().toUpperCase() === 'TITLE')
            .map(keyword => keyword.value().trim());
        return titles.length > 0 ? titles.join(' ') : undefined;
    }
}
