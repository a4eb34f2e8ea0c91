/**
 * Views over lesser elements: paragraphs, keywords, comments, clocks, ...
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import type { SyntaxElement } from '../parser/orgSyntaxTree';
import { ElementNode, KeywordLike } from './astNode';
import { Timestamp } from './timestamp';

export class Paragraph extends ElementNode {
    readonly kind = 'paragraph' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'paragraph';
    }

    /**
     * Inline elements, without affiliated keywords, the final line
     * terminator and trailing blank lines
     */
    contents(): SyntaxElement[] {
        return this.syntax.childrenWithTokens().filter(child =>
            child.kind !== 'affiliated-keyword' && child.kind !== 'new-line' && child.kind !== 'blank-line'
        );
    }
}

/**
 * `#+KEY: value`
 */
export class Keyword extends KeywordLike {
    readonly kind = 'keyword' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'keyword';
    }
}

/**
 * `#+CALL: name(args)`
 */
export class BabelCall extends KeywordLike {
    readonly kind = 'babel-call' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'babel-call';
    }

    /**
     * Name of the called block, before any header or argument list
     */
    call(): string {
        const m = /^[^[(\s]+/.exec(this.value());
        return m ? m[0] : '';
    }
}

/**
 * Join the text after each line's marker, dropping one separating space
 */
function prefixedLinesValue(element: ElementNode): string {
    const lines: string[] = [];
    let current: string | null = null;
    for (const child of element.syntax.childrenWithTokens()) {
        if (child.kind === 'hash' || child.kind === 'colon') {
            current = '';
        } else if (child.kind === 'text' && current !== null) {
            current += child.toString().replace(/^[ \t]/, '');
        } else if (child.kind === 'new-line' && current !== null) {
            lines.push(current);
            current = null;
        }
    }
    if (current !== null) lines.push(current);
    return lines.join('\n');
}

/**
 * Lines starting with `# `
 */
export class Comment extends ElementNode {
    readonly kind = 'comment' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'comment';
    }

    value(): string {
        return prefixedLinesValue(this);
    }
}

/**
 * Lines starting with `: `
 */
export class FixedWidth extends ElementNode {
    readonly kind = 'fixed-width' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'fixed-width';
    }

    value(): string {
        return prefixedLinesValue(this);
    }
}

/**
 * Horizontal rule, five or more dashes
 */
export class Rule extends ElementNode {
    readonly kind = 'rule' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'rule';
    }
}

/**
 * `CLOCK: [start]--[end] => 1:00`
 */
export class Clock extends ElementNode {
    readonly kind = 'clock' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'clock';
    }

    timestamp(): Timestamp | undefined {
        return this.child(Timestamp);
    }

    /**
     * `H:MM` after `=>`
     */
    duration(): string | undefined {
        if (!this.token('double-arrow')) return undefined;
        const texts = this.syntax.tokens('text');
        return texts[texts.length - 1]?.text;
    }

    isClosed(): boolean {
        return this.timestamp()?.isDateRange() ?? false;
    }

    isRunning(): boolean {
        return !this.isClosed();
    }
}

/**
 * `\begin{env}` ... `\end{env}`
 */
export class LatexEnvironment extends ElementNode {
    readonly kind = 'latex-environment' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'latex-environment';
    }

    value(): string {
        return this.token('text')?.text ?? '';
    }

    environmentName(): string {
        const m = /\\begin\{([^}]+)\}/.exec(this.value());
        return m ? m[1] : '';
    }
}
