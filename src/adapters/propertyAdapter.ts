/**
 * Property and outline interop
 *
 * Plain-object snapshots of property drawers and the headline outline, for
 * callers that want JSON-friendly data instead of tree views.
 */

import type { Document, Headline, PropertyDrawer } from '../ast';

// =============================================================================
// Types
// =============================================================================

export interface HeadingSummary {
    level: number;
    title: string;
    todoState?: string;
    priority?: string;
    tags: string[];
    /** Offset of the headline's first character */
    offset: number;
    properties: Record<string, string>;
    children: HeadingSummary[];
}

// =============================================================================
// Properties
// =============================================================================

/**
 * Resolved properties keyed by upper-case name; empty without a drawer
 */
export function propertiesToRecord(drawer: PropertyDrawer | undefined): Record<string, string> {
    const record: Record<string, string> = {};
    if (!drawer) return record;
    for (const [key, value] of drawer.toMap()) {
        record[key] = value;
    }
    return record;
}

/**
 * Value of `key` on `headline` or, failing that, on the nearest ancestor
 * headline, then on the document's own property drawer
 */
export function inheritedProperty(headline: Headline, key: string, document?: Document): string | undefined {
    let current: Headline | undefined = headline;
    while (current) {
        const value = current.properties()?.get(key);
        if (value !== undefined) return value;
        current = current.parentHeadline();
    }
    return document?.properties()?.get(key);
}

/**
 * Numeric property value; undefined when absent or not a number
 */
export function numericProperty(drawer: PropertyDrawer | undefined, key: string): number | undefined {
    const value = drawer?.get(key)?.trim();
    if (!value) return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
}

/**
 * Whitespace-separated property value, e.g. `:ROAM_ALIASES: a b`
 */
export function listProperty(drawer: PropertyDrawer | undefined, key: string): string[] {
    const value = drawer?.get(key)?.trim();
    return value ? value.split(/\s+/) : [];
}

// =============================================================================
// Outline
// =============================================================================

export function headlineToSummary(headline: Headline): HeadingSummary {
    return {
        level: headline.level(),
        title: headline.titleRaw(),
        todoState: headline.keyword(),
        priority: headline.priority(),
        tags: headline.tags(),
        offset: headline.start,
        properties: propertiesToRecord(headline.properties()),
        children: headline.headlines().map(headlineToSummary),
    };
}

/**
 * Outline of the whole document, one summary per top-level headline
 */
export function documentOutline(document: Document): HeadingSummary[] {
    return document.headlines().map(headlineToSummary);
}
