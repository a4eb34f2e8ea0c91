/**
 * Org-mode syntax kinds
 * Every node and token of the lossless tree is tagged with one of these
 */

// =============================================================================
// Node Kinds
// =============================================================================

/**
 * Element-level node kinds
 */
export type ElementKind =
    | 'document'
    | 'section'
    | 'headline'
    | 'headline-priority'
    | 'headline-title'
    | 'headline-tags'
    | 'planning'
    | 'planning-scheduled'
    | 'planning-deadline'
    | 'planning-closed'
    | 'property-drawer'
    | 'node-property'
    | 'drawer'
    | 'drawer-begin'
    | 'drawer-end'
    | 'drawer-content'
    | 'paragraph'
    | 'list'
    | 'list-item'
    | 'list-item-counter'
    | 'list-item-checkbox'
    | 'list-item-tag'
    | 'list-item-content'
    | 'org-table'
    | 'org-table-standard-row'
    | 'org-table-rule-row'
    | 'org-table-cell'
    | 'table-el'
    | 'source-block'
    | 'example-block'
    | 'export-block'
    | 'quote-block'
    | 'center-block'
    | 'verse-block'
    | 'comment-block'
    | 'special-block'
    | 'dyn-block'
    | 'block-begin'
    | 'block-end'
    | 'block-content'
    | 'keyword'
    | 'affiliated-keyword'
    | 'babel-call'
    | 'comment'
    | 'fixed-width'
    | 'rule'
    | 'clock'
    | 'fn-def'
    | 'fn-content'
    | 'latex-environment';

/**
 * Object-level (inline) node kinds
 */
export type ObjectKind =
    | 'bold'
    | 'italic'
    | 'underline'
    | 'strike'
    | 'verbatim'
    | 'code'
    | 'link'
    | 'fn-ref'
    | 'macros'
    | 'cloze'
    | 'timestamp'
    | 'radio-target'
    | 'target'
    | 'cookie'
    | 'inline-call'
    | 'inline-src'
    | 'snippet'
    | 'line-break'
    | 'latex-fragment'
    | 'entity'
    | 'subscript'
    | 'superscript';

export type NodeKind = ElementKind | ObjectKind;

// =============================================================================
// Token Kinds
// =============================================================================

export type TokenKind =
    // generic
    | 'text'
    | 'whitespace'
    | 'new-line'
    | 'blank-line'
    // punctuation
    | 'star'
    | 'slash'
    | 'underscore'
    | 'plus'
    | 'minus'
    | 'minus2'
    | 'equal'
    | 'tilde'
    | 'caret'
    | 'colon'
    | 'colon2'
    | 'comma'
    | 'hash'
    | 'hash-plus'
    | 'pipe'
    | 'dollar'
    | 'dollar2'
    | 'backslash'
    | 'backslash2'
    | 'percent2'
    | 'at'
    | 'at2'
    | 'double-arrow'
    | 'l-bracket'
    | 'r-bracket'
    | 'l-bracket2'
    | 'r-bracket2'
    | 'l-curly'
    | 'l-curly2'
    | 'r-curly'
    | 'l-curly3'
    | 'r-curly3'
    | 'l-parens'
    | 'r-parens'
    | 'l-angle'
    | 'r-angle'
    | 'l-angle2'
    | 'r-angle2'
    | 'l-angle3'
    | 'r-angle3'
    // headline
    | 'headline-stars'
    | 'headline-keyword-todo'
    | 'headline-keyword-done'
    | 'planning-keyword'
    | 'clock-keyword'
    // lists
    | 'list-item-bullet'
    // blocks
    | 'src-block-language'
    | 'src-block-switches'
    | 'src-block-parameters'
    | 'export-block-type'
    // inline
    | 'link-path'
    | 'fn-label'
    | 'fn-prefix'
    // timestamps
    | 'timestamp-year'
    | 'timestamp-month'
    | 'timestamp-day'
    | 'timestamp-dayname'
    | 'timestamp-hour'
    | 'timestamp-minute'
    | 'timestamp-repeater-mark'
    | 'timestamp-delay-mark'
    | 'timestamp-value'
    | 'timestamp-unit';

export type SyntaxKind = NodeKind | TokenKind;

// =============================================================================
// Kind Groups
// =============================================================================

/**
 * Block kinds delimited by #+BEGIN_NAME / #+END_NAME
 */
export const BLOCK_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
    'source-block',
    'example-block',
    'export-block',
    'quote-block',
    'center-block',
    'verse-block',
    'comment-block',
    'special-block',
    'dyn-block',
]);

/**
 * Emphasis kinds and their delimiter token
 */
export const EMPHASIS_TOKENS: Readonly<Record<string, { kind: ObjectKind; token: TokenKind }>> = {
    '*': { kind: 'bold', token: 'star' },
    '/': { kind: 'italic', token: 'slash' },
    '_': { kind: 'underline', token: 'underscore' },
    '+': { kind: 'strike', token: 'plus' },
    '=': { kind: 'verbatim', token: 'equal' },
    '~': { kind: 'code', token: 'tilde' },
};
