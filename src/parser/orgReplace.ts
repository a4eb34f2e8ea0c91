/**
 * Range replacement over an immutable tree version
 *
 * An edit re-parses the smallest enclosing headline that can be parsed on
 * its own and splices the result back with path copying. When no headline
 * qualifies the whole document is parsed again.
 */

import type { GreenNode } from './orgGreenTree';
import type { ParseConfig } from './orgConfig';
import { SyntaxNode } from './orgSyntaxTree';
import type { TextRange } from './orgSyntaxTree';
import { OutOfBoundsError } from './orgErrors';
import { parseDocument, parseStandaloneHeadline } from './orgDocument';
import { parserLogger } from '../utils/logger';

export type ReplaceStrategy = 'headline' | 'document';

export interface ReplaceResult {
    green: GreenNode;
    strategy: ReplaceStrategy;
    /** Range of the re-parsed region in the new text */
    reparsed: TextRange;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Replace `[range.start, range.end)` of the tree's text with `text` and
 * return the green root of the new version
 *
 * @throws OutOfBoundsError when the range does not fit the current text
 */
export function replaceRange(root: GreenNode, config: ParseConfig, range: TextRange, text: string): GreenNode {
    return replaceRangeWithStrategy(root, config, range, text).green;
}

/**
 * Same as replaceRange(), also reporting how the new version was built
 */
export function replaceRangeWithStrategy(
    root: GreenNode,
    config: ParseConfig,
    range: TextRange,
    text: string
): ReplaceResult {
    const length = root.textLength;
    if (!isValidRange(range, length)) {
        parserLogger.warn('Rejected out-of-bounds edit', { start: range.start, end: range.end, length });
        throw new OutOfBoundsError(range, length);
    }

    const syntax = SyntaxNode.newRoot(root);
    const candidates = enclosingHeadlines(syntax, range).reverse();

    for (const headline of candidates) {
        const replacement = reparseHeadline(headline, config, range, text, length);
        if (replacement) {
            parserLogger.debug('Edit re-parsed enclosing headline', {
                start: headline.start,
                end: headline.end,
                depth: candidates.indexOf(headline),
            });
            return {
                green: headline.replaceWith(replacement),
                strategy: 'headline',
                reparsed: { start: headline.start, end: headline.start + replacement.textLength },
            };
        }
    }

    const source = root.toString();
    const next = source.slice(0, range.start) + text + source.slice(range.end);
    parserLogger.debug('Edit re-parsed whole document', { length: next.length });
    return {
        green: parseDocument(next, config),
        strategy: 'document',
        reparsed: { start: 0, end: next.length },
    };
}

// =============================================================================
// Helpers
// =============================================================================

function isValidRange(range: TextRange, length: number): boolean {
    return Number.isInteger(range.start)
        && Number.isInteger(range.end)
        && range.start >= 0
        && range.start <= range.end
        && range.end <= length;
}

/**
 * Headlines containing the edit, outermost first. A headline qualifies only
 * when the edit leaves its stars alone and stops before its end, unless it
 * runs to the end of the document.
 */
function enclosingHeadlines(root: SyntaxNode, range: TextRange): SyntaxNode[] {
    const result: SyntaxNode[] = [];
    let current: SyntaxNode | undefined = root;
    while (current) {
        const next: SyntaxNode | undefined = current.children().find(child =>
            child.kind === 'headline' && child.start <= range.start && range.end <= child.end
        );
        if (!next) break;
        if (qualifies(next, range, root.end)) {
            result.push(next);
        }
        current = next;
    }
    return result;
}

function qualifies(headline: SyntaxNode, range: TextRange, documentEnd: number): boolean {
    const level = headlineLevelOf(headline);
    const startOk = range.start === headline.start || range.start >= headline.start + level + 1;
    const endOk = range.end < headline.end || headline.end === documentEnd;
    return startOk && endOk;
}

function headlineLevelOf(headline: SyntaxNode): number {
    return headline.firstToken('headline-stars')?.text.length ?? 0;
}

function reparseHeadline(
    headline: SyntaxNode,
    config: ParseConfig,
    range: TextRange,
    text: string,
    documentLength: number
): GreenNode | null {
    const old = headline.text();
    const localStart = range.start - headline.start;
    const localEnd = range.end - headline.start;
    const next = old.slice(0, localStart) + text + old.slice(localEnd);

    const atDocumentEnd = headline.end === documentLength;
    if (!atDocumentEnd && !/[\n\r]$/.test(next)) return null;

    const green = parseStandaloneHeadline(next, config);
    if (!green) return null;

    const stars = green.children[0];
    const level = stars && stars.kind === 'headline-stars' ? stars.textLength : 0;
    if (level !== headlineLevelOf(headline)) return null;

    return green;
}
