/**
 * Parse configuration
 *
 * Callers pass a partial OrgParseConfig; every missing field falls back to
 * its documented default. The resolved ParseConfig is frozen and travels
 * with each tree version so an edit re-parses with the same grammar.
 */

// =============================================================================
// Types
// =============================================================================

export interface TodoKeywords {
    /** Keywords for open items */
    todo: readonly string[];
    /** Keywords for closed items */
    done: readonly string[];
}

export interface OrgParseConfig {
    /** Headline status keywords (default: TODO / DONE) */
    todoKeywords?: TodoKeywords;
    /** Affiliated keywords that accept an optional `[value]` (default: CAPTION, RESULTS) */
    dualKeywords?: readonly string[];
    /** Affiliated keywords whose value holds inline objects (default: CAPTION) */
    parsedKeywords?: readonly string[];
    /** Keywords attached to the following element; ATTR_* always qualifies */
    affiliatedKeywords?: readonly string[];
    /** Recognize `a_b` / `a^b`; 'brace' only accepts `a_{b}` / `a^{b}` */
    useSubSuperscript?: boolean | 'brace';
}

export interface ParseConfig {
    readonly todoKeywords: TodoKeywords;
    readonly dualKeywords: readonly string[];
    readonly parsedKeywords: readonly string[];
    readonly affiliatedKeywords: readonly string[];
    readonly useSubSuperscript: boolean | 'brace';
}

// =============================================================================
// Defaults
// =============================================================================

const DEFAULT_TODO_KEYWORDS: TodoKeywords = { todo: ['TODO'], done: ['DONE'] };
const DEFAULT_DUAL_KEYWORDS = ['CAPTION', 'RESULTS'];
const DEFAULT_PARSED_KEYWORDS = ['CAPTION'];
const DEFAULT_AFFILIATED_KEYWORDS = [
    'CAPTION',
    'DATA',
    'HEADER',
    'HEADERS',
    'LABEL',
    'NAME',
    'PLOT',
    'RESNAME',
    'RESULT',
    'RESULTS',
    'SOURCE',
    'SRCNAME',
    'TBLNAME',
];

/**
 * Resolve a partial configuration into a frozen ParseConfig
 */
export function resolveConfig(config: OrgParseConfig = {}): ParseConfig {
    const todoKeywords = config.todoKeywords ?? DEFAULT_TODO_KEYWORDS;
    return Object.freeze({
        todoKeywords: Object.freeze({
            todo: Object.freeze([...todoKeywords.todo]),
            done: Object.freeze([...todoKeywords.done]),
        }),
        dualKeywords: Object.freeze([...(config.dualKeywords ?? DEFAULT_DUAL_KEYWORDS)]),
        parsedKeywords: Object.freeze([...(config.parsedKeywords ?? DEFAULT_PARSED_KEYWORDS)]),
        affiliatedKeywords: Object.freeze([...(config.affiliatedKeywords ?? DEFAULT_AFFILIATED_KEYWORDS)]),
        useSubSuperscript: config.useSubSuperscript ?? true,
    });
}

export const DEFAULT_CONFIG: ParseConfig = resolveConfig();

// =============================================================================
// Lookups
// =============================================================================

/**
 * Classify a headline word: 'todo', 'done', or null when it is not a keyword
 */
export function todoKeywordType(config: ParseConfig, word: string): 'todo' | 'done' | null {
    if (config.todoKeywords.todo.includes(word)) return 'todo';
    if (config.todoKeywords.done.includes(word)) return 'done';
    return null;
}

export function isAffiliatedKeyword(config: ParseConfig, key: string): boolean {
    const upper = key.toUpperCase();
    return upper.startsWith('ATTR_') || config.affiliatedKeywords.includes(upper);
}

export function isDualKeyword(config: ParseConfig, key: string): boolean {
    return config.dualKeywords.includes(key.toUpperCase());
}

export function isParsedKeyword(config: ParseConfig, key: string): boolean {
    return config.parsedKeywords.includes(key.toUpperCase());
}
