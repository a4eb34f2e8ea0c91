/**
 * Table views: Org tables and table.el tables
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import type { SyntaxElement } from '../parser/orgSyntaxTree';
import { AstNode, ElementNode, joinText } from './astNode';
import { Keyword } from './element';

export class OrgTable extends ElementNode {
    readonly kind = 'org-table' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'org-table';
    }

    rows(): OrgTableRow[] {
        return this.childrenOf(OrgTableRow);
    }

    /**
     * Indices of rule rows (`|---+---|`)
     */
    ruleRowIndices(): number[] {
        const indices: number[] = [];
        this.rows().forEach((row, index) => {
            if (row.isRule()) indices.push(index);
        });
        return indices;
    }

    /**
     * A rule row separates a header from at least one following row
     */
    hasHeader(): boolean {
        const rows = this.rows();
        const firstRule = rows.findIndex(row => row.isRule());
        if (firstRule <= 0) return false;
        return rows.slice(firstRule + 1).some(row => !row.isRule());
    }

    columnCount(): number {
        return this.rows().reduce((max, row) => Math.max(max, row.cells().length), 0);
    }

    /**
     * Trimmed text of a cell, counting rule rows
     */
    cellText(row: number, column: number): string | undefined {
        return this.rows()[row]?.cells()[column]?.value();
    }

    /**
     * `#+TBLFM:` formulas attached to the table
     */
    tblfm(): string[] {
        return this.childrenOf(Keyword).map(keyword => keyword.value());
    }
}

export class OrgTableRow extends AstNode {
    static canCast(kind: NodeKind): boolean {
        return kind === 'org-table-standard-row' || kind === 'org-table-rule-row';
    }

    get kind(): 'org-table-standard-row' | 'org-table-rule-row' {
        return this.syntax.kind === 'org-table-rule-row' ? 'org-table-rule-row' : 'org-table-standard-row';
    }

    isRule(): boolean {
        return this.syntax.kind === 'org-table-rule-row';
    }

    cells(): OrgTableCell[] {
        return this.childrenOf(OrgTableCell);
    }
}

export class OrgTableCell extends AstNode {
    readonly kind = 'org-table-cell' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'org-table-cell';
    }

    /**
     * Inline elements without padding and the closing pipe
     */
    contents(): SyntaxElement[] {
        return this.syntax.childrenWithTokens().filter(child => child.kind !== 'whitespace' && child.kind !== 'pipe');
    }

    value(): string {
        return joinText(this.contents());
    }
}

/**
 * table.el table, kept as raw lines
 */
export class TableEl extends ElementNode {
    readonly kind = 'table-el' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'table-el';
    }

    value(): string {
        return this.syntax.tokens()
            .filter(t => t.kind === 'text' || t.kind === 'new-line')
            .map(t => t.text)
            .join('');
    }
}
