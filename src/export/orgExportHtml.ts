/**
 * HTML export backend
 *
 * Renders traversal events into HTML. Any container or leaf-event kind can
 * be overridden through `overrides`; an override may fall back to the
 * built-in mapping with `html.defaultEvent(event, ctx)`.
 */

import type { SyntaxElement } from '../parser/orgSyntaxTree';
import { escapeHtml } from '../utils/escapeUtils';
import { eventKey } from './orgEvent';
import type { Container, ContainerKind, Event, EventType } from './orgEvent';
import { TraversalContext, traverse } from './orgTraverse';
import type { Traverser } from './orgTraverse';

// =============================================================================
// Options
// =============================================================================

export type HtmlEventKey = ContainerKind | Exclude<EventType, 'enter' | 'leave'>;

/**
 * Replacement for the default rendering of one kind of event. Called for
 * both `enter` and `leave` of a container kind.
 */
export type HtmlOverride = (event: Event, ctx: TraversalContext, html: HtmlExport) => void;

export type HtmlOverrides = Partial<Record<HtmlEventKey, HtmlOverride>>;

export interface HtmlExportOptions {
    overrides?: HtmlOverrides;
}

/**
 * Where the walk is inside an Org table: before/after a rule, or inside
 * `<thead>` / `<tbody>`
 */
type TableRowState = 'header-rule' | 'header' | 'body-rule' | 'body';

// =============================================================================
// Exporter
// =============================================================================

export class HtmlExport implements Traverser {
    private output = '';
    private readonly overrides: HtmlOverrides;
    private readonly inDescriptiveList: boolean[] = [];
    private tableRow: TableRowState = 'header-rule';

    constructor(options: HtmlExportOptions = {}) {
        this.overrides = options.overrides ?? {};
    }

    /**
     * Append raw HTML
     */
    push(html: string): void {
        this.output += html;
    }

    /**
     * Append text, escaped
     */
    pushText(text: string): void {
        this.output += escapeHtml(text);
    }

    finish(): string {
        return this.output;
    }

    /**
     * Render a subtree into the current output. Pass the enclosing walk's
     * context so that a stop inside the subtree ends that walk too.
     */
    render(element: SyntaxElement, ctx: TraversalContext = new TraversalContext()): void {
        traverse(element, this, ctx);
    }

    event(event: Event, ctx: TraversalContext): void {
        const override = this.overrides[eventKey(event)];
        if (override) {
            override(event, ctx, this);
        } else {
            this.defaultEvent(event, ctx);
        }
    }

    /**
     * Built-in mapping from events to HTML
     */
    defaultEvent(event: Event, ctx: TraversalContext): void {
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
                this.push('<br/>');
                return;
            case 'snippet':
                if (event.node.backend().toLowerCase() === 'html') {
                    this.push(event.node.value());
                }
                return;
            case 'rule':
                this.push('<hr/>');
                return;
            case 'timestamp': {
                this.push('<span class="timestamp-wrapper"><span class="timestamp">');
                for (const token of event.node.syntax.tokens()) {
                    this.push(token.kind === 'minus2' ? '&#x2013;' : escapeHtml(token.text));
                }
                this.push('</span></span>');
                return;
            }
            case 'latex-fragment':
            case 'latex-environment':
                this.pushText(event.node.raw());
                return;
            case 'entity':
                this.push(event.node.html());
                return;
            default:
                return;
        }
    }

    private enter(container: Container, ctx: TraversalContext): void {
        switch (container.kind) {
            case 'document':
                this.push('<main>');
                return;
            case 'headline': {
                const level = Math.min(container.level(), 6);
                this.push(`<h${level}>`);
                for (const element of container.title()) {
                    this.render(element, ctx);
                    if (ctx.stopped) return;
                }
                this.push(`</h${level}>`);
                return;
            }
            case 'fn-ref': {
                const label = container.label();
                if (label !== undefined) {
                    this.push(`<a href="#footnote_${escapeHtml(label)}" class="footnote-reference">[${escapeHtml(label)}]`);
                }
                this.push('</a>');
                return;
            }
            case 'fn-def': {
                this.push('<aside class="footnote-definition" >');
                const label = container.label();
                if (label) {
                    this.push(`<a href="#footnote_${escapeHtml(label)}" class="footnote-reference" >[${escapeHtml(label)}]</a>`);
                }
                return;
            }
            case 'fn-content': {
                this.push('<span class="footnote-content" ');
                const label = container.label();
                if (label !== undefined) {
                    this.push(`id="footnote_${escapeHtml(label)}" `);
                }
                this.push('>');
                return;
            }
            case 'paragraph':
                this.push('<p>');
                return;
            case 'section':
                this.push('<section>');
                return;
            case 'italic':
                this.push('<i>');
                return;
            case 'bold':
                this.push('<b>');
                return;
            case 'strike':
                this.push('<s>');
                return;
            case 'underline':
                this.push('<u>');
                return;
            case 'verbatim':
            case 'code':
                this.push('<code>');
                return;
            case 'source-block': {
                const language = container.language();
                this.push(language ? `<pre><code class="language-${escapeHtml(language)}">` : '<pre><code>');
                return;
            }
            case 'quote-block':
                this.push('<blockquote>');
                return;
            case 'verse-block':
                this.push('<p class="verse">');
                return;
            case 'example-block':
                this.push('<pre class="example">');
                return;
            case 'center-block':
                this.push('<div class="center">');
                return;
            case 'comment-block':
            case 'comment':
                this.push('<!--');
                return;
            case 'subscript':
                this.push('<sub>');
                return;
            case 'superscript':
                this.push('<sup>');
                return;
            case 'list':
                if (container.isOrdered()) {
                    this.inDescriptiveList.push(false);
                    this.push('<ol>');
                } else if (container.isDescriptive()) {
                    this.inDescriptiveList.push(true);
                    this.push('<dl>');
                } else {
                    this.inDescriptiveList.push(false);
                    this.push('<ul>');
                }
                return;
            case 'list-item':
                if (this.inDescriptiveList[this.inDescriptiveList.length - 1]) {
                    this.push('<dt>');
                    for (const element of container.tag()) {
                        this.render(element, ctx);
                        if (ctx.stopped) return;
                    }
                    this.push('</dt><dd>');
                } else {
                    this.push('<li>');
                }
                return;
            case 'org-table':
                this.push('<table>');
                this.tableRow = container.hasHeader() ? 'header-rule' : 'body-rule';
                return;
            case 'org-table-rule-row':
                this.closeTableSection();
                ctx.skip();
                return;
            case 'org-table-standard-row':
                if (this.tableRow === 'header-rule') {
                    this.tableRow = 'header';
                    this.push('<thead>');
                } else if (this.tableRow === 'body-rule') {
                    this.tableRow = 'body';
                    this.push('<tbody>');
                }
                this.push('<tr>');
                return;
            case 'org-table-cell':
                this.push('<td>');
                return;
            case 'link': {
                const path = container.path().replace(/^file:/, '');
                if (container.isImage()) {
                    this.push(`<img src="${escapeHtml(path)}">`);
                    ctx.skip();
                    return;
                }
                this.push(`<a href="${escapeHtml(path)}">`);
                if (!container.hasDescription()) {
                    this.push(`${escapeHtml(path)}</a>`);
                    ctx.skip();
                }
                return;
            }
            case 'cloze':
                this.push('<span class="cloze">');
                return;
            case 'keyword':
            case 'babel-call':
            case 'planning':
            case 'property-drawer':
                ctx.skip();
                return;
            default:
                return;
        }
    }

    private leave(container: Container): void {
        switch (container.kind) {
            case 'document':
                this.push('</main>');
                return;
            case 'fn-def':
                this.push('</aside>');
                return;
            case 'fn-content':
                this.push('</span>');
                return;
            case 'paragraph':
                this.push('</p>');
                return;
            case 'section':
                this.push('</section>');
                return;
            case 'italic':
                this.push('</i>');
                return;
            case 'bold':
                this.push('</b>');
                return;
            case 'strike':
                this.push('</s>');
                return;
            case 'underline':
                this.push('</u>');
                return;
            case 'verbatim':
            case 'code':
                this.push('</code>');
                return;
            case 'source-block':
                this.push('</code></pre>');
                return;
            case 'quote-block':
                this.push('</blockquote>');
                return;
            case 'verse-block':
                this.push('</p>');
                return;
            case 'example-block':
                this.push('</pre>');
                return;
            case 'center-block':
                this.push('</div>');
                return;
            case 'comment-block':
            case 'comment':
                this.push('-->');
                return;
            case 'subscript':
                this.push('</sub>');
                return;
            case 'superscript':
                this.push('</sup>');
                return;
            case 'list':
                if (container.isOrdered()) {
                    this.push('</ol>');
                } else if (this.inDescriptiveList[this.inDescriptiveList.length - 1]) {
                    this.push('</dl>');
                } else {
                    this.push('</ul>');
                }
                this.inDescriptiveList.pop();
                return;
            case 'list-item':
                this.push(this.inDescriptiveList[this.inDescriptiveList.length - 1] ? '</dd>' : '</li>');
                return;
            case 'org-table':
                this.closeTableSection();
                this.push('</table>');
                return;
            case 'org-table-standard-row':
                this.push('</tr>');
                return;
            case 'org-table-cell':
                this.push('</td>');
                return;
            case 'link':
                this.push('</a>');
                return;
            case 'cloze':
                this.push('</span>');
                return;
            default:
                return;
        }
    }

    private closeTableSection(): void {
        if (this.tableRow === 'body') {
            this.push('</tbody>');
            this.tableRow = 'body-rule';
        } else if (this.tableRow === 'header') {
            this.push('</thead>');
            this.tableRow = 'body-rule';
        }
    }
}
