/**
 * orgtree: a lossless Org document engine
 */

export { Org } from './org';

// Parser
export { resolveConfig, DEFAULT_CONFIG } from './parser/orgConfig';
export type { OrgParseConfig, ParseConfig, TodoKeywords } from './parser/orgConfig';
export { OutOfBoundsError, isOutOfBoundsError } from './parser/orgErrors';
export { GreenNode, GreenToken } from './parser/orgGreenTree';
export type { GreenElement } from './parser/orgGreenTree';
export { SyntaxNode, SyntaxToken, textRange, rangeContains, rangeContainsRange } from './parser/orgSyntaxTree';
export type { SyntaxElement, TextRange } from './parser/orgSyntaxTree';
export type { NodeKind, TokenKind, SyntaxKind, ElementKind, ObjectKind } from './parser/orgSyntaxKind';
export { replaceRange, replaceRangeWithStrategy } from './parser/orgReplace';
export type { ReplaceResult, ReplaceStrategy } from './parser/orgReplace';

// Views
export * from './ast';

// Traversal and export
export { TraversalContext, traverse, fromFn, fromFnWithCtx } from './export/orgTraverse';
export type { Traverser } from './export/orgTraverse';
export { containerFor, leafEventFor, eventKey } from './export/orgEvent';
export type { Container, ContainerKind, Event, EventType, LeafEvent, LeafKind } from './export/orgEvent';
export { HtmlExport } from './export/orgExportHtml';
export type { HtmlEventKey, HtmlExportOptions, HtmlOverride, HtmlOverrides } from './export/orgExportHtml';
export { MarkdownExport } from './export/orgExportMarkdown';

// Adapters
export {
    timestampDateToDate,
    timestampStartToDate,
    timestampEndToDate,
    formatTimestamp,
    shiftDate,
    nextOccurrence,
} from './adapters/timestampAdapter';
export type { FormatTimestampOptions } from './adapters/timestampAdapter';
export {
    propertiesToRecord,
    inheritedProperty,
    numericProperty,
    listProperty,
    headlineToSummary,
    documentOutline,
} from './adapters/propertyAdapter';
export type { HeadingSummary } from './adapters/propertyAdapter';

// Utilities
export { createLogger, getLoggingService, Logger, LogLevel } from './utils/logger';
export type { LogSink } from './utils/logger';
export { escapeHtml, escapeMarkdown } from './utils/escapeUtils';
