/**
 * Tree traversal
 *
 * Walks a subtree in document order with an explicit worklist, so deep
 * trees never grow the call stack. The traverser receives events and may
 * call `ctx.skip()` on an `enter` event to skip that container's contents
 * (and its `leave`), or `ctx.stop()` to end the walk.
 */

import { SyntaxToken } from '../parser/orgSyntaxTree';
import type { SyntaxElement, SyntaxNode } from '../parser/orgSyntaxTree';
import type { NodeKind } from '../parser/orgSyntaxKind';
import { containerFor, leafEventFor } from './orgEvent';
import type { Container, Event } from './orgEvent';
import { Cloze, CommentBlock, Comment, ExampleBlock, ExportBlock, FixedWidth, SourceBlock, TableEl } from '../ast';

// =============================================================================
// Context and Traverser
// =============================================================================

export class TraversalContext {
    private skipRequested = false;
    private stopRequested = false;

    /**
     * Skip the contents of the container just entered
     */
    skip(): void {
        this.skipRequested = true;
    }

    /**
     * End the walk; no further events are delivered
     */
    stop(): void {
        this.stopRequested = true;
    }

    get stopped(): boolean {
        return this.stopRequested;
    }

    /** @internal read and clear the skip request */
    takeSkip(): boolean {
        const skipped = this.skipRequested;
        this.skipRequested = false;
        return skipped;
    }
}

export interface Traverser {
    event(event: Event, ctx: TraversalContext): void;
    /**
     * Also report punctuation, whitespace and line-ending tokens. The walk
     * then descends into every part of the tree, including the parts read
     * through views (headline titles, keyword lines, block delimiters), and
     * the tokens of text, fn-label and token events concatenate back to
     * the source.
     */
    readonly tokens?: boolean;
}

/**
 * Traverser from a closure that ignores the context
 */
export function fromFn(fn: (event: Event) => void, options: { tokens?: boolean } = {}): Traverser {
    return {
        tokens: options.tokens,
        event: (event) => fn(event),
    };
}

/**
 * Traverser from a closure that may skip or stop
 */
export function fromFnWithCtx(
    fn: (event: Event, ctx: TraversalContext) => void,
    options: { tokens?: boolean } = {}
): Traverser {
    return {
        tokens: options.tokens,
        event: fn,
    };
}

// =============================================================================
// Walk
// =============================================================================

type WorkItem =
    | { type: 'visit'; element: SyntaxElement }
    | { type: 'leave'; container: Container }
    | { type: 'text'; text: string };

/**
 * Walk `root` (a node or a token), delivering events to `traverser`
 */
export function traverse(root: SyntaxElement, traverser: Traverser, ctx: TraversalContext = new TraversalContext()): void {
    const stack: WorkItem[] = [{ type: 'visit', element: root }];

    while (stack.length > 0 && !ctx.stopped) {
        const item = stack.pop();
        if (!item) break;

        if (item.type === 'leave') {
            traverser.event({ type: 'leave', container: item.container }, ctx);
            continue;
        }
        if (item.type === 'text') {
            traverser.event({ type: 'text', text: item.text }, ctx);
            continue;
        }

        const element = item.element;
        if (element instanceof SyntaxToken) {
            visitToken(element, traverser, ctx);
            continue;
        }

        const leaf = leafEventFor(element);
        if (leaf) {
            traverser.event(leaf, ctx);
            ctx.takeSkip();
            if (traverser.tokens) {
                for (const token of element.descendantTokens()) {
                    if (ctx.stopped) break;
                    traverser.event({ type: 'token', token }, ctx);
                    ctx.takeSkip();
                }
            }
            continue;
        }

        const container = containerFor(element);
        if (!container) {
            // Structural node with no event of its own
            pushChildren(stack, element.childrenWithTokens());
            continue;
        }

        traverser.event({ type: 'enter', container }, ctx);
        if (ctx.takeSkip() || ctx.stopped) continue;

        stack.push({ type: 'leave', container });
        if (traverser.tokens) {
            pushChildren(stack, element.childrenWithTokens());
            continue;
        }
        const value = verbatimValue(container);
        if (value !== undefined) {
            if (value) stack.push({ type: 'text', text: value });
            continue;
        }
        pushChildren(stack, walkedChildren(element));
    }
}

function visitToken(token: SyntaxToken, traverser: Traverser, ctx: TraversalContext): void {
    if (token.kind === 'text') {
        traverser.event({ type: 'text', text: token.text, token }, ctx);
    } else if (token.kind === 'fn-label') {
        traverser.event({ type: 'fn-label', token }, ctx);
    } else if (traverser.tokens) {
        traverser.event({ type: 'token', token }, ctx);
    }
    ctx.takeSkip();
}

function pushChildren(stack: WorkItem[], children: readonly SyntaxElement[]): void {
    for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ type: 'visit', element: children[i] });
    }
}

/**
 * Containers reported as a single text event holding their value
 */
function verbatimValue(container: Container): string | undefined {
    if (
        container instanceof SourceBlock
        || container instanceof ExampleBlock
        || container instanceof ExportBlock
        || container instanceof CommentBlock
        || container instanceof Comment
        || container instanceof FixedWidth
        || container instanceof TableEl
    ) {
        return container.value();
    }
    return undefined;
}

const CONTENT_CHILD: Partial<Record<NodeKind, NodeKind>> = {
    'list-item': 'list-item-content',
    'quote-block': 'block-content',
    'center-block': 'block-content',
    'verse-block': 'block-content',
    'special-block': 'block-content',
    'dyn-block': 'block-content',
    'drawer': 'drawer-content',
};

/**
 * Children a container's walk descends into when tokens are not requested
 */
function walkedChildren(node: SyntaxNode): readonly SyntaxElement[] {
    const contentKind = CONTENT_CHILD[node.kind];
    if (contentKind) {
        return node.firstChild(contentKind)?.childrenWithTokens() ?? [];
    }

    switch (node.kind) {
        case 'headline':
            // Title, planning and properties are read through the view
            return node.children().filter(child => child.kind === 'section' || child.kind === 'headline');
        case 'planning':
            return node.children().flatMap(entry => entry.children().filter(child => child.kind === 'timestamp'));
        case 'cloze':
            // Hint and id are read through the view
            return new Cloze(node).text();
        case 'property-drawer':
        case 'keyword':
        case 'babel-call':
            return [];
        default:
            return node.childrenWithTokens().filter(child => child.kind !== 'affiliated-keyword');
    }
}
