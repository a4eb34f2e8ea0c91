/**
 * Org-mode entity definitions
 * Mappings from entity names (`\alpha`, `\rarr` ...) to LaTeX, HTML and
 * UTF-8 representations. The table itself lives in orgEntities.json.
 */

import entityTable from './orgEntities.json';

export interface EntityDefinition {
    /** LaTeX representation */
    latex: string;
    /** HTML entity or character */
    html: string;
    /** UTF-8 character(s) */
    utf8: string;
}

const ORG_ENTITIES: ReadonlyMap<string, EntityDefinition> = new Map(Object.entries(entityTable));

/**
 * Entity name at the start of `text` (after the backslash): letters only,
 * or one of the numbered names such as `frac12` and `sup2`
 */
export const RE_ENTITY_NAME = /^(there4|sup[123]|frac[13][24]|[a-zA-Z]+)/;

/**
 * Get entity definition by name
 */
export function getEntity(name: string): EntityDefinition | undefined {
    return ORG_ENTITIES.get(name);
}

export function isValidEntity(name: string): boolean {
    return ORG_ENTITIES.has(name);
}
