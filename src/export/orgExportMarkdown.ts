/**
 * Markdown export backend
 *
 * CommonMark output over the same event protocol as the HTML backend.
 * Nested structures (list items, quotes, footnote definitions) render into
 * a buffer of their own and are indented or prefixed when they close.
 */

import type { SyntaxElement } from '../parser/orgSyntaxTree';
import { escapeMarkdown, normalizeLineEndings } from '../utils/escapeUtils';
import type { Container, Event } from './orgEvent';
import { TraversalContext, traverse } from './orgTraverse';
import type { Traverser } from './orgTraverse';

interface ListState {
    ordered: boolean;
    next: number;
}

export class MarkdownExport implements Traverser {
    private readonly buffers: string[] = [''];
    private readonly lists: ListState[] = [];
    private codeDepth = 0;
    private pendingHeaderCells = 0;
    private tableHasHeader = false;
    private tableRowIndex = 0;

    push(markdown: string): void {
        this.buffers[this.buffers.length - 1] += markdown;
    }

    pushText(text: string): void {
        const normalized = normalizeLineEndings(text);
        this.push(this.codeDepth > 0 ? normalized : escapeMarkdown(normalized));
    }

    finish(): string {
        return this.buffers.join('').replace(/\n{3,}/g, '\n\n').trimEnd() + '\n';
    }

    render(element: SyntaxElement, ctx: TraversalContext = new TraversalContext()): void {
        traverse(element, this, ctx);
    }

    event(event: Event, ctx: TraversalContext): void {
        switch (event.type) {
            case 'enter':
                this.enter(event.container, ctx);
                return;
            case 'leave':
                this.leave(event.container);
                return;
            case 'text':
                this.pushText(event.text);
                return;
            case 'line-break':
                this.push('  \n');
                return;
            case 'rule':
                this.push('\n---\n\n');
                return;
            case 'timestamp':
                this.push(escapeMarkdown(event.node.raw()));
                return;
            case 'entity':
                this.push(event.node.utf8());
                return;
            case 'latex-fragment':
                this.push(event.node.raw());
                return;
            case 'latex-environment':
                this.push(`${normalizeLineEndings(event.node.value())}\n\n`);
                return;
            case 'snippet': {
                const backend = event.node.backend().toLowerCase();
                if (backend === 'md' || backend === 'markdown') {
                    this.push(event.node.value());
                }
                return;
            }
            case 'cookie':
                this.push(escapeMarkdown(event.node.raw()));
                return;
            case 'inline-src':
                this.push(`\`${event.node.value()}\``);
                return;
            default:
                return;
        }
    }

    private enter(container: Container, ctx: TraversalContext): void {
        switch (container.kind) {
            case 'headline': {
                this.push(`${'#'.repeat(Math.min(container.level(), 6))} `);
                for (const element of container.title()) {
                    this.render(element, ctx);
                    if (ctx.stopped) return;
                }
                this.push('\n\n');
                return;
            }
            case 'bold':
                this.push('**');
                return;
            case 'italic':
                this.push('*');
                return;
            case 'strike':
                this.push('~~');
                return;
            case 'verbatim':
            case 'code':
                this.codeDepth++;
                this.push('`');
                return;
            case 'source-block':
                this.codeDepth++;
                this.push(`\`\`\`${container.language() ?? ''}\n`);
                return;
            case 'example-block':
            case 'fixed-width':
                this.codeDepth++;
                this.push('```\n');
                return;
            case 'quote-block':
            case 'list-item':
            case 'fn-def':
                this.buffers.push('');
                return;
            case 'list':
                this.lists.push({ ordered: container.isOrdered(), next: 1 });
                return;
            case 'org-table':
                this.tableHasHeader = container.hasHeader();
                this.tableRowIndex = 0;
                return;
            case 'org-table-rule-row':
                ctx.skip();
                return;
            case 'org-table-standard-row':
                this.pendingHeaderCells = container.cells().length;
                this.push('|');
                return;
            case 'org-table-cell':
                this.push(' ');
                return;
            case 'link': {
                const path = container.path().replace(/^file:/, '');
                if (container.isImage()) {
                    this.push(`![](${path})`);
                    ctx.skip();
                } else if (!container.hasDescription()) {
                    this.push(`<${path}>`);
                    ctx.skip();
                } else {
                    this.push('[');
                }
                return;
            }
            case 'fn-ref': {
                const label = container.label();
                if (label !== undefined) this.push(`[^${label}]`);
                ctx.skip();
                return;
            }
            case 'keyword':
            case 'babel-call':
            case 'planning':
            case 'property-drawer':
            case 'comment':
            case 'comment-block':
            case 'export-block':
                ctx.skip();
                return;
            default:
                return;
        }
    }

    private leave(container: Container): void {
        switch (container.kind) {
            case 'paragraph':
            case 'verse-block':
                this.push('\n\n');
                return;
            case 'bold':
                this.push('**');
                return;
            case 'italic':
                this.push('*');
                return;
            case 'strike':
                this.push('~~');
                return;
            case 'verbatim':
            case 'code':
                this.codeDepth--;
                this.push('`');
                return;
            case 'source-block':
            case 'example-block':
            case 'fixed-width':
                this.codeDepth--;
                this.push(this.currentEndsWithNewline() ? '```\n\n' : '\n```\n\n');
                return;
            case 'quote-block': {
                const body = this.popBuffer().trimEnd();
                this.push(`${body.split('\n').map(line => (line ? `> ${line}` : '>')).join('\n')}\n\n`);
                return;
            }
            case 'list-item': {
                const list = this.lists[this.lists.length - 1];
                const marker = list && list.ordered ? `${list.next++}. ` : '- ';
                const body = this.popBuffer().trim();
                const indent = ' '.repeat(marker.length);
                const lines = body.split('\n').map((line, index) =>
                    index === 0 || line === '' ? line : indent + line
                );
                this.push(`${marker}${lines.join('\n')}\n`);
                return;
            }
            case 'list':
                this.lists.pop();
                if (this.lists.length === 0) this.push('\n');
                return;
            case 'org-table':
                this.push('\n');
                return;
            case 'org-table-standard-row':
                this.push('\n');
                if (this.tableRowIndex === 0 && this.tableHasHeader) {
                    this.push(`|${' --- |'.repeat(this.pendingHeaderCells)}\n`);
                }
                this.tableRowIndex++;
                return;
            case 'org-table-cell':
                this.push(' |');
                return;
            case 'link':
                this.push(`](${container.path().replace(/^file:/, '')})`);
                return;
            case 'fn-def': {
                const body = this.popBuffer().trim();
                this.push(`[^${container.label()}]: ${body}\n\n`);
                return;
            }
            default:
                return;
        }
    }

    private popBuffer(): string {
        return this.buffers.length > 1 ? this.buffers.pop() ?? '' : '';
    }

    private currentEndsWithNewline(): boolean {
        return this.buffers[this.buffers.length - 1].endsWith('\n');
    }
}
