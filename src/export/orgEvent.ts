/**
 * Traversal events
 *
 * A walk over the tree reports `enter` / `leave` around every container,
 * `text` for plain text, a dedicated event for each leaf object and, on
 * request, `token` for the remaining punctuation and whitespace.
 */

import type { SyntaxNode, SyntaxToken } from '../parser/orgSyntaxTree';
import {
    BabelCall,
    Bold,
    CenterBlock,
    Clock,
    Cloze,
    Code,
    Comment,
    CommentBlock,
    Cookie,
    Document,
    Drawer,
    DynBlock,
    Entity,
    ExampleBlock,
    ExportBlock,
    FixedWidth,
    FnContent,
    FnDef,
    FnRef,
    Headline,
    InlineCall,
    InlineSrc,
    Italic,
    Keyword,
    LatexEnvironment,
    LatexFragment,
    LineBreak,
    Link,
    List,
    ListItem,
    Macros,
    OrgTable,
    OrgTableCell,
    OrgTableRow,
    Paragraph,
    Planning,
    PropertyDrawer,
    QuoteBlock,
    RadioTarget,
    Rule,
    Section,
    Snippet,
    SourceBlock,
    SpecialBlock,
    Strike,
    Subscript,
    Superscript,
    TableEl,
    Target,
    Timestamp,
    Underline,
    Verbatim,
    VerseBlock,
} from '../ast';

// =============================================================================
// Containers
// =============================================================================

/**
 * Nodes reported with a matching pair of `enter` / `leave` events
 */
export type Container =
    | Document
    | Section
    | Headline
    | Paragraph
    | List
    | ListItem
    | OrgTable
    | OrgTableRow
    | OrgTableCell
    | TableEl
    | SourceBlock
    | ExampleBlock
    | ExportBlock
    | QuoteBlock
    | CenterBlock
    | VerseBlock
    | CommentBlock
    | SpecialBlock
    | DynBlock
    | Drawer
    | PropertyDrawer
    | Planning
    | Keyword
    | BabelCall
    | Comment
    | FixedWidth
    | FnDef
    | FnRef
    | FnContent
    | Bold
    | Italic
    | Underline
    | Strike
    | Verbatim
    | Code
    | Link
    | Cloze
    | Subscript
    | Superscript
    | RadioTarget
    | Target;

export type ContainerKind = Container['kind'];

/**
 * Wrap `node` in its container view, or undefined when it is not one
 */
export function containerFor(node: SyntaxNode): Container | undefined {
    switch (node.kind) {
        case 'document': return new Document(node);
        case 'section': return new Section(node);
        case 'headline': return new Headline(node);
        case 'paragraph': return new Paragraph(node);
        case 'list': return new List(node);
        case 'list-item': return new ListItem(node);
        case 'org-table': return new OrgTable(node);
        case 'org-table-standard-row':
        case 'org-table-rule-row': return new OrgTableRow(node);
        case 'org-table-cell': return new OrgTableCell(node);
        case 'table-el': return new TableEl(node);
        case 'source-block': return new SourceBlock(node);
        case 'example-block': return new ExampleBlock(node);
        case 'export-block': return new ExportBlock(node);
        case 'quote-block': return new QuoteBlock(node);
        case 'center-block': return new CenterBlock(node);
        case 'verse-block': return new VerseBlock(node);
        case 'comment-block': return new CommentBlock(node);
        case 'special-block': return new SpecialBlock(node);
        case 'dyn-block': return new DynBlock(node);
        case 'drawer': return new Drawer(node);
        case 'property-drawer': return new PropertyDrawer(node);
        case 'planning': return new Planning(node);
        case 'keyword': return new Keyword(node);
        case 'babel-call': return new BabelCall(node);
        case 'comment': return new Comment(node);
        case 'fixed-width': return new FixedWidth(node);
        case 'fn-def': return new FnDef(node);
        case 'fn-ref': return new FnRef(node);
        case 'fn-content': return new FnContent(node);
        case 'bold': return new Bold(node);
        case 'italic': return new Italic(node);
        case 'underline': return new Underline(node);
        case 'strike': return new Strike(node);
        case 'verbatim': return new Verbatim(node);
        case 'code': return new Code(node);
        case 'link': return new Link(node);
        case 'cloze': return new Cloze(node);
        case 'subscript': return new Subscript(node);
        case 'superscript': return new Superscript(node);
        case 'radio-target': return new RadioTarget(node);
        case 'target': return new Target(node);
        default: return undefined;
    }
}

// =============================================================================
// Leaf objects
// =============================================================================

interface LeafViews {
    'timestamp': Timestamp;
    'entity': Entity;
    'macros': Macros;
    'cookie': Cookie;
    'inline-call': InlineCall;
    'inline-src': InlineSrc;
    'clock': Clock;
    'line-break': LineBreak;
    'snippet': Snippet;
    'rule': Rule;
    'latex-fragment': LatexFragment;
    'latex-environment': LatexEnvironment;
}

export type LeafKind = keyof LeafViews;

export type LeafEvent = { [K in LeafKind]: { type: K; node: LeafViews[K] } }[LeafKind];

/**
 * Leaf event for `node`, or undefined when it is not a leaf object
 */
export function leafEventFor(node: SyntaxNode): LeafEvent | undefined {
    switch (node.kind) {
        case 'timestamp': return { type: 'timestamp', node: new Timestamp(node) };
        case 'entity': return { type: 'entity', node: new Entity(node) };
        case 'macros': return { type: 'macros', node: new Macros(node) };
        case 'cookie': return { type: 'cookie', node: new Cookie(node) };
        case 'inline-call': return { type: 'inline-call', node: new InlineCall(node) };
        case 'inline-src': return { type: 'inline-src', node: new InlineSrc(node) };
        case 'clock': return { type: 'clock', node: new Clock(node) };
        case 'line-break': return { type: 'line-break', node: new LineBreak(node) };
        case 'snippet': return { type: 'snippet', node: new Snippet(node) };
        case 'rule': return { type: 'rule', node: new Rule(node) };
        case 'latex-fragment': return { type: 'latex-fragment', node: new LatexFragment(node) };
        case 'latex-environment': return { type: 'latex-environment', node: new LatexEnvironment(node) };
        default: return undefined;
    }
}

// =============================================================================
// Events
// =============================================================================

export type Event =
    | { type: 'enter'; container: Container }
    | { type: 'leave'; container: Container }
    /** Plain text; `token` is absent for text assembled from several tokens (block values) */
    | { type: 'text'; text: string; token?: SyntaxToken }
    | { type: 'fn-label'; token: SyntaxToken }
    /** Any other token, only reported to traversers that ask for tokens */
    | { type: 'token'; token: SyntaxToken }
    | LeafEvent;

export type EventType = Event['type'];

/**
 * Override-table key of an event: the container kind for enter/leave, the
 * event type otherwise
 */
export function eventKey(event: Event): ContainerKind | Exclude<EventType, 'enter' | 'leave'> {
    if (event.type === 'enter' || event.type === 'leave') {
        return event.container.kind;
    }
    return event.type;
}
