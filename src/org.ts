/**
 * Org tree version
 *
 * An `Org` pairs an immutable green tree with the configuration it was
 * parsed under. Edits never change an existing version: `replaceRange`
 * returns a new `Org` sharing every untouched subtree with this one.
 */

import { Document, castNode } from './ast';
import type { Keyword, ViewClass, AstNode } from './ast';
import type { GreenNode } from './parser/orgGreenTree';
import { resolveConfig } from './parser/orgConfig';
import type { OrgParseConfig, ParseConfig } from './parser/orgConfig';
import { parseDocument } from './parser/orgDocument';
import { replaceRangeWithStrategy } from './parser/orgReplace';
import type { ReplaceStrategy } from './parser/orgReplace';
import { SyntaxNode } from './parser/orgSyntaxTree';
import type { TextRange } from './parser/orgSyntaxTree';
import { HtmlExport } from './export/orgExportHtml';
import type { HtmlExportOptions } from './export/orgExportHtml';
import { MarkdownExport } from './export/orgExportMarkdown';
import { TraversalContext, traverse } from './export/orgTraverse';
import type { Traverser } from './export/orgTraverse';
import { exportLogger, parserLogger } from './utils/logger';

export class Org {
    private constructor(
        readonly green: GreenNode,
        readonly config: ParseConfig
    ) {}

    /**
     * Parse `text`; never fails
     */
    static parse(text: string, config: OrgParseConfig = {}): Org {
        const resolved = resolveConfig(config);
        const green = parseDocument(text, resolved);
        parserLogger.debug('Parsed document', { length: green.textLength });
        return new Org(green, resolved);
    }

    /**
     * Wrap an existing green root, e.g. one built by replaceRange()
     */
    static fromGreen(green: GreenNode, config: ParseConfig): Org {
        return new Org(green, config);
    }

    get length(): number {
        return this.green.textLength;
    }

    /**
     * Fresh red root over this version
     */
    syntax(): SyntaxNode {
        return SyntaxNode.newRoot(this.green);
    }

    document(): Document {
        return new Document(this.syntax());
    }

    // =========================================================================
    // Edits
    // =========================================================================

    /**
     * New version with `[range.start, range.end)` replaced by `text`
     *
     * @throws OutOfBoundsError when the range does not fit this version
     */
    replaceRange(range: TextRange, text: string): Org {
        return this.replaceRangeWithStrategy(range, text).org;
    }

    replaceRangeWithStrategy(range: TextRange, text: string): { org: Org; strategy: ReplaceStrategy } {
        const result = replaceRangeWithStrategy(this.green, this.config, range, text);
        return { org: new Org(result.green, this.config), strategy: result.strategy };
    }

    // =========================================================================
    // Queries
    // =========================================================================

    /**
     * First node of `View`'s kind in document order
     */
    firstNode<T extends AstNode>(View: ViewClass<T>): T | undefined {
        for (const node of this.syntax().descendants()) {
            const view = castNode(View, node);
            if (view) return view;
        }
        return undefined;
    }

    /**
     * All nodes of `View`'s kind in document order
     */
    findNodes<T extends AstNode>(View: ViewClass<T>): T[] {
        const found: T[] = [];
        for (const node of this.syntax().descendants()) {
            const view = castNode(View, node);
            if (view) found.push(view);
        }
        return found;
    }

    /**
     * Innermost node of `View`'s kind whose range covers `offset`
     */
    nodeAtOffset<T extends AstNode>(View: ViewClass<T>, offset: number): T | undefined {
        let found: T | undefined;
        for (const node of this.syntax().descendants()) {
            if (offset < node.start || offset >= node.end) continue;
            found = castNode(View, node) ?? found;
        }
        return found;
    }

    keywords(): Keyword[] {
        return this.document().keywords();
    }

    title(): string | undefined {
        return this.document().title();
    }

    // =========================================================================
    // Traversal and rendering
    // =========================================================================

    traverse(traverser: Traverser, ctx: TraversalContext = new TraversalContext()): void {
        traverse(this.syntax(), traverser, ctx);
    }

    /**
     * Source text; identical to the parsed input
     */
    toOrg(): string {
        return this.green.toString();
    }

    toHtml(options: HtmlExportOptions = {}): string {
        const html = new HtmlExport(options);
        this.traverse(html);
        const output = html.finish();
        exportLogger.debug('Rendered HTML', { length: output.length });
        return output;
    }

    toMarkdown(): string {
        const markdown = new MarkdownExport();
        this.traverse(markdown);
        const output = markdown.finish();
        exportLogger.debug('Rendered Markdown', { length: output.length });
        return output;
    }
}
