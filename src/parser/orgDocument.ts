/**
 * Document entry point of the grammar
 *
 *   document := [property-drawer] [section] headline*
 */

import { GreenNode } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { DEFAULT_CONFIG } from './orgConfig';
import type { ParseConfig } from './orgConfig';
import { findHeadline } from './orgLexer';
import type { ParseContext } from './orgLexer';
import { parseElements } from './orgElements';
import { tryParsePropertyDrawer } from './orgDrawers';
import { tryParseHeadline } from './orgHeadline';

/**
 * Parse a whole document. Total: every input yields a tree whose text
 * equals the input.
 */
export function parseDocument(text: string, config: ParseConfig = DEFAULT_CONFIG): GreenNode {
    const ctx: ParseContext = { text, config };
    const children: GreenElement[] = [];
    const firstHeadline = findHeadline(text, 0, text.length);
    let pos = 0;

    const properties = tryParsePropertyDrawer(ctx, 0, firstHeadline);
    if (properties) {
        children.push(properties.node);
        pos = properties.end;
    }

    if (pos < firstHeadline) {
        children.push(new GreenNode('section', parseElements(ctx, pos, firstHeadline)));
    }

    pos = firstHeadline;
    while (pos < text.length) {
        const headline = tryParseHeadline(ctx, pos, text.length);
        if (!headline) break;
        children.push(headline.node);
        pos = headline.end;
    }

    return new GreenNode('document', children);
}

/**
 * Parse `text` on its own as exactly one headline. Returns null unless the
 * text is a single headline that consumes all of it.
 */
export function parseStandaloneHeadline(text: string, config: ParseConfig): GreenNode | null {
    const result = tryParseHeadline({ text, config }, 0, text.length);
    if (!result || result.end !== text.length) return null;
    return result.node;
}
