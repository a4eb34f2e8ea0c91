/**
 * Headline and planning views
 */

import type { NodeKind } from '../parser/orgSyntaxKind';
import type { SyntaxElement } from '../parser/orgSyntaxTree';
import { AstNode, joinText } from './astNode';
import { PropertyDrawer } from './drawer';
import { Section } from './section';
import { Timestamp } from './timestamp';

// =============================================================================
// Planning
// =============================================================================

/**
 * `SCHEDULED:` / `DEADLINE:` / `CLOSED:` line right after a headline
 */
export class Planning extends AstNode {
    readonly kind = 'planning' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'planning';
    }

    scheduled(): Timestamp | undefined {
        return this.entry('planning-scheduled');
    }

    deadline(): Timestamp | undefined {
        return this.entry('planning-deadline');
    }

    closed(): Timestamp | undefined {
        return this.entry('planning-closed');
    }

    private entry(kind: NodeKind): Timestamp | undefined {
        const node = this.syntax.firstChild(kind)?.firstChild('timestamp');
        return node ? new Timestamp(node) : undefined;
    }
}

// =============================================================================
// Headline
// =============================================================================

export type TodoType = 'todo' | 'done';

export class Headline extends AstNode {
    readonly kind = 'headline' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'headline';
    }

    /**
     * Number of leading stars
     */
    level(): number {
        return this.token('headline-stars')?.text.length ?? 0;
    }

    keyword(): string | undefined {
        return (this.token('headline-keyword-todo') ?? this.token('headline-keyword-done'))?.text;
    }

    todoType(): TodoType | undefined {
        if (this.token('headline-keyword-todo')) return 'todo';
        if (this.token('headline-keyword-done')) return 'done';
        return undefined;
    }

    isTodo(): boolean {
        return this.todoType() === 'todo';
    }

    isDone(): boolean {
        return this.todoType() === 'done';
    }

    /**
     * `A` of `[#A]`
     */
    priority(): string | undefined {
        return this.syntax.firstChild('headline-priority')?.firstToken('text')?.text;
    }

    /**
     * Inline elements of the title
     */
    title(): SyntaxElement[] {
        const title = this.syntax.firstChild('headline-title');
        return title ? [...title.childrenWithTokens()] : [];
    }

    titleRaw(): string {
        return joinText(this.title());
    }

    tags(): string[] {
        const tags = this.syntax.firstChild('headline-tags');
        return tags ? tags.tokens('text').map(token => token.text) : [];
    }

    /**
     * Tag cluster as written, e.g. `:work:urgent:`
     */
    rawTags(): string {
        return this.syntax.firstChild('headline-tags')?.text() ?? '';
    }

    planning(): Planning | undefined {
        return this.child(Planning);
    }

    scheduled(): Timestamp | undefined {
        return this.planning()?.scheduled();
    }

    deadline(): Timestamp | undefined {
        return this.planning()?.deadline();
    }

    closed(): Timestamp | undefined {
        return this.planning()?.closed();
    }

    properties(): PropertyDrawer | undefined {
        return this.child(PropertyDrawer);
    }

    section(): Section | undefined {
        return this.child(Section);
    }

    /**
     * Direct child headlines
     */
    headlines(): Headline[] {
        return this.childrenOf(Headline);
    }

    /**
     * Enclosing headline, if any
     */
    parentHeadline(): Headline | undefined {
        const parent = this.syntax.parent;
        return parent ? Headline.cast(parent) : undefined;
    }

    /**
     * Title starts with the word `COMMENT`
     */
    isCommented(): boolean {
        return /^COMMENT(?:[ \t]|$)/.test(this.titleRaw());
    }

    isArchived(): boolean {
        return this.tags().includes('ARCHIVE');
    }

    /**
     * Blank lines held directly when the section is empty
     */
    blankLines(): number {
        return this.syntax.tokens('blank-line').length;
    }
}
