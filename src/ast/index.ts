/**
 * Typed views over the syntax tree
 */

export { AstNode, ElementNode, KeywordLike, AffiliatedKeyword, castNode, joinText } from './astNode';
export type { ViewClass } from './astNode';
export { Document } from './document';
export { Section } from './section';
export { Headline, Planning } from './headline';
export type { TodoType } from './headline';
export { Drawer, PropertyDrawer, NodeProperty } from './drawer';
export {
    Block,
    VerbatimBlock,
    SourceBlock,
    ExampleBlock,
    ExportBlock,
    CommentBlock,
    QuoteBlock,
    CenterBlock,
    VerseBlock,
    SpecialBlock,
    DynBlock,
} from './block';
export { List, ListItem } from './list';
export type { CheckboxState } from './list';
export { OrgTable, OrgTableRow, OrgTableCell, TableEl } from './table';
export { Paragraph, Keyword, BabelCall, Comment, FixedWidth, Rule, Clock, LatexEnvironment } from './element';
export { FnDef, FnRef, FnContent } from './footnote';
export {
    Emphasis,
    Bold,
    Italic,
    Underline,
    Strike,
    Verbatim,
    Code,
    Link,
    Macros,
    Cloze,
    RadioTarget,
    Target,
    Cookie,
    Snippet,
    InlineCall,
    InlineSrc,
    LineBreak,
    LatexFragment,
    Entity,
    Script,
    Subscript,
    Superscript,
} from './objects';
export { Timestamp } from './timestamp';
export type { TimestampDate, TimestampRepeater, TimestampDelay, RepeaterMark, DelayMark, TimeUnit } from './timestamp';
