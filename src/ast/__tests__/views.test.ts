/**
 * Tests for typed views over elements and objects
 */

import { describe, it, expect } from 'vitest';
import { Org } from '../../org';
import {
    BabelCall,
    Bold,
    Clock,
    Code,
    Comment,
    Cookie,
    Drawer,
    DynBlock,
    Entity,
    ExportBlock,
    FixedWidth,
    FnDef,
    FnRef,
    Headline,
    InlineCall,
    InlineSrc,
    Keyword,
    LatexEnvironment,
    LatexFragment,
    Link,
    List,
    Macros,
    Cloze,
    OrgTable,
    Paragraph,
    QuoteBlock,
    RadioTarget,
    Section,
    Snippet,
    SourceBlock,
    Subscript,
    Superscript,
    Target,
    Verbatim,
    castNode,
} from '..';

// =============================================================================
// Casting
// =============================================================================

describe('casting', () => {
    it('returns undefined for a kind mismatch', () => {
        const org = Org.parse('* a\n');
        const root = org.syntax();
        expect(Headline.cast(root)).toBeUndefined();
        expect(castNode(Headline, root.children()[0])?.level()).toBe(1);
    });

    it('finds the innermost node at an offset', () => {
        const org = Org.parse('* a\n** b\ntext *bold*\n');
        const offset = org.toOrg().indexOf('bold');
        expect(org.nodeAtOffset(Headline, offset)?.titleRaw()).toBe('b');
        expect(org.nodeAtOffset(Bold, offset)?.contentRaw()).toBe('bold');
        expect(org.nodeAtOffset(Bold, 0)).toBeUndefined();
    });
});

// =============================================================================
// Headlines
// =============================================================================

describe('Headline', () => {
    const text = [
        '* TODO [#A] Write report :work:urgent:',
        'SCHEDULED: <2024-01-15 Mon 10:00> DEADLINE: <2024-01-20 Sat>',
        ':PROPERTIES:',
        ':ID: abc',
        ':TAGS: one',
        ':TAGS+: two',
        ':END:',
        'Body text.',
        '** DONE Child',
        '',
    ].join('\n');
    const headline = Org.parse(text).firstNode(Headline);

    it('reads the title line', () => {
        expect(headline?.level()).toBe(1);
        expect(headline?.keyword()).toBe('TODO');
        expect(headline?.todoType()).toBe('todo');
        expect(headline?.priority()).toBe('A');
        expect(headline?.titleRaw()).toBe('Write report');
        expect(headline?.tags()).toEqual(['work', 'urgent']);
        expect(headline?.rawTags()).toBe(':work:urgent:');
    });

    it('reads tags with letters outside ASCII', () => {
        const tagged = Org.parse('* t :é:日本:x2:\n').firstNode(Headline);
        expect(tagged?.titleRaw()).toBe('t');
        expect(tagged?.tags()).toEqual(['é', '日本', 'x2']);
    });

    it('reads planning', () => {
        expect(headline?.scheduled()?.startDate()).toEqual({ year: 2024, month: 1, day: 15, dayName: 'Mon', hour: 10, minute: 0 });
        expect(headline?.deadline()?.startDate()).toEqual({ year: 2024, month: 1, day: 20, dayName: 'Sat' });
        expect(headline?.closed()).toBeUndefined();
    });

    it('reads properties with appended values', () => {
        const properties = headline?.properties();
        expect(properties?.get('id')).toBe('abc');
        expect(properties?.get('TAGS')).toBe('one two');
        expect(properties?.entries()).toEqual([['ID', 'abc'], ['TAGS', 'one'], ['TAGS', 'two']]);
        expect(properties?.properties()[2].isAppend()).toBe(true);
    });

    it('links section and child headlines', () => {
        expect(headline?.section()?.raw()).toBe('Body text.\n');
        const child = headline?.headlines()[0];
        expect(child?.isDone()).toBe(true);
        expect(child?.titleRaw()).toBe('Child');
        expect(child?.parentHeadline()?.titleRaw()).toBe('Write report');
        expect(headline?.parentHeadline()).toBeUndefined();
    });

    it('detects commented and archived headlines', () => {
        const [commented, archived] = Org.parse('* COMMENT hidden\n* Archived :ARCHIVE:\n').findNodes(Headline);
        expect(commented.isCommented()).toBe(true);
        expect(commented.isArchived()).toBe(false);
        expect(archived.isArchived()).toBe(true);
    });
});

// =============================================================================
// Document
// =============================================================================

describe('Document', () => {
    it('joins titles and lists keywords', () => {
        const org = Org.parse('#+TITLE: Notes\n#+TITLE: More\n#+AUTHOR: Someone\n\nIntro.\n');
        expect(org.title()).toBe('Notes More');
        expect(org.keywords().map(k => [k.key(), k.value()])).toEqual([
            ['TITLE', 'Notes'],
            ['TITLE', 'More'],
            ['AUTHOR', 'Someone'],
        ]);
    });

    it('has no title without a TITLE keyword', () => {
        expect(Org.parse('text\n').title()).toBeUndefined();
    });

    it('reads the document property drawer', () => {
        const doc = Org.parse(':PROPERTIES:\n:ID: doc-1\n:END:\n#+TITLE: x\n').document();
        expect(doc.properties()?.get('ID')).toBe('doc-1');
        expect(doc.section()?.raw()).toBe('#+TITLE: x\n');
    });
});

// =============================================================================
// Tables and lists
// =============================================================================

describe('OrgTable', () => {
    const table = Org.parse('| a | b |\n|---+---|\n| 1 | 2 |\n#+TBLFM: $2=$1\n').firstNode(OrgTable);

    it('reads rows and cells', () => {
        expect(table?.rows().length).toBe(3);
        expect(table?.ruleRowIndices()).toEqual([1]);
        expect(table?.hasHeader()).toBe(true);
        expect(table?.columnCount()).toBe(2);
        expect(table?.cellText(0, 0)).toBe('a');
        expect(table?.cellText(2, 1)).toBe('2');
        expect(table?.cellText(5, 0)).toBeUndefined();
    });

    it('reads formulas', () => {
        expect(table?.tblfm()).toEqual(['$2=$1']);
    });

    it('has no header without a rule row', () => {
        expect(Org.parse('| a |\n| b |\n').firstNode(OrgTable)?.hasHeader()).toBe(false);
    });
});

describe('List', () => {
    it('reads ordered items with checkboxes and counters', () => {
        const list = Org.parse('1. first\n2. [X] second\n3) [@5] third\n').firstNode(List);
        const items = list?.items() ?? [];
        expect(list?.isOrdered()).toBe(true);
        expect(items.map(item => item.bullet())).toEqual(['1.', '2.', '3)']);
        expect(items[0].contentRaw()).toBe('first\n');
        expect(items[0].checkbox()).toBeUndefined();
        expect(items[1].checkbox()).toBe('on');
        expect(items[2].counter()).toBe('@5');
    });

    it('reads checkbox states', () => {
        const items = Org.parse('- [ ] a\n- [-] b\n- [x] c\n').firstNode(List)?.items() ?? [];
        expect(items.map(item => item.checkbox())).toEqual(['off', 'trans', 'on']);
    });

    it('reads descriptive items', () => {
        const list = Org.parse('- term :: definition\n- other :: more\n').firstNode(List);
        expect(list?.isOrdered()).toBe(false);
        expect(list?.isDescriptive()).toBe(true);
        expect(list?.items()[0].tagRaw()).toBe('term');
        expect(list?.items()[0].contentRaw()).toBe('definition\n');
    });

    it('nests indented lists inside items', () => {
        const org = Org.parse('- a\n  - b\n- c\n');
        const lists = org.findNodes(List);
        expect(lists.length).toBe(2);
        expect(lists[0].items().map(item => item.bullet())).toEqual(['-', '-']);
        expect(lists[1].items()[0].indent()).toBe(2);
        expect(lists[1].items()[0].contentRaw()).toBe('b\n');
    });
});

// =============================================================================
// Blocks, drawers, keywords
// =============================================================================

describe('blocks', () => {
    it('reads source block header and value', () => {
        const block = Org.parse(
            '#+BEGIN_SRC python :results output :exports both\nprint(1)\n,* not a headline\n#+END_SRC\n'
        ).firstNode(SourceBlock);
        expect(block?.language()).toBe('python');
        expect(block?.switches()).toBeUndefined();
        expect(block?.parameters()).toBe(':results output :exports both');
        expect(block?.headerArguments()).toEqual(new Map([['results', 'output'], ['exports', 'both']]));
        expect(block?.value()).toBe('print(1)\n* not a headline\n');
        expect(block?.contentRaw()).toBe('print(1)\n,* not a headline\n');
    });

    it('separates switches from parameters', () => {
        const block = Org.parse('#+begin_src sh -n :var x=1\necho\n#+end_src\n').firstNode(SourceBlock);
        expect(block?.switches()).toBe('-n');
        expect(block?.parameters()).toBe(':var x=1');
        expect(block?.blockName()).toBe('src');
    });

    it('reads export, quote and dynamic blocks', () => {
        const org = Org.parse([
            '#+BEGIN_EXPORT html',
            '<b>raw</b>',
            '#+END_EXPORT',
            '#+begin_quote',
            'Quoted.',
            '#+end_quote',
            '#+BEGIN: clocktable :scope file',
            '| x |',
            '#+END:',
            '',
        ].join('\n'));
        expect(org.firstNode(ExportBlock)?.type()).toBe('html');
        expect(org.firstNode(ExportBlock)?.value()).toBe('<b>raw</b>\n');
        expect(org.firstNode(QuoteBlock)?.blockName()).toBe('quote');
        expect(org.firstNode(QuoteBlock)?.contentRaw()).toBe('Quoted.\n');
        expect(org.firstNode(DynBlock)?.blockName()).toBe('clocktable');
        expect(org.firstNode(DynBlock)?.parameters()).toBe(':scope file');
    });

    it('keeps the affiliated name of a drawer apart from its drawer name', () => {
        const drawer = Org.parse('#+NAME: notes\n:NOTES:\nx\n:END:\n').firstNode(Drawer);
        expect(drawer?.drawerName()).toBe('NOTES');
        expect(drawer?.name()).toBe('notes');
    });

    it('reads a drawer with a clock', () => {
        const org = Org.parse(':LOGBOOK:\nCLOCK: [2024-01-01 Mon 10:00]--[2024-01-01 Mon 11:00] =>  1:00\n:END:\n');
        expect(org.firstNode(Drawer)?.drawerName()).toBe('LOGBOOK');
        const clock = org.firstNode(Clock);
        expect(clock?.duration()).toBe('1:00');
        expect(clock?.isClosed()).toBe(true);
        expect(clock?.timestamp()?.endDate()).toEqual({ year: 2024, month: 1, day: 1, dayName: 'Mon', hour: 11, minute: 0 });
    });

    it('reads comments, fixed width, calls and LaTeX environments', () => {
        const org = Org.parse([
            '# a comment',
            '# more',
            ': fixed',
            ': width',
            '#+CALL: report(month=1)',
            '\\begin{equation}',
            'x = 1',
            '\\end{equation}',
            '',
        ].join('\n'));
        expect(org.firstNode(Comment)?.value()).toBe('a comment\nmore');
        expect(org.firstNode(FixedWidth)?.value()).toBe('fixed\nwidth');
        expect(org.firstNode(BabelCall)?.call()).toBe('report');
        expect(org.firstNode(BabelCall)?.value()).toBe('report(month=1)');
        expect(org.firstNode(LatexEnvironment)?.environmentName()).toBe('equation');
    });

    it('attaches affiliated keywords to the following element', () => {
        const org = Org.parse('#+CAPTION: A *caption*\n#+NAME: fig:one\n[[file:image.png]]\n');
        const paragraph = org.firstNode(Paragraph);
        expect(paragraph?.caption()?.value()).toBe('A *caption*');
        expect(paragraph?.name()).toBe('fig:one');
        expect(paragraph?.affiliatedKeywords().length).toBe(2);
        expect(org.firstNode(Keyword)).toBeUndefined();

        const link = org.firstNode(Link);
        expect(link?.path()).toBe('file:image.png');
        expect(link?.isImage()).toBe(true);
        expect(link?.caption()?.value()).toBe('A *caption*');
    });

    it('keeps a dangling affiliated keyword as a plain keyword', () => {
        const org = Org.parse('#+NAME: orphan\n');
        expect(org.firstNode(Keyword)?.value()).toBe('orphan');
        expect(org.firstNode(Section)?.elements().length).toBe(1);
    });
});

// =============================================================================
// Objects
// =============================================================================

describe('objects', () => {
    it('reads emphasis contents', () => {
        const org = Org.parse('Emphasis *bold* =verbatim= ~code~.\n');
        expect(org.firstNode(Bold)?.contentRaw()).toBe('bold');
        expect(org.firstNode(Verbatim)?.value()).toBe('verbatim');
        expect(org.firstNode(Code)?.value()).toBe('code');
    });

    it('reads links with descriptions', () => {
        const link = Org.parse('See [[https://example.com][Example *site*]].\n').firstNode(Link);
        expect(link?.path()).toBe('https://example.com');
        expect(link?.hasDescription()).toBe(true);
        expect(link?.descriptionRaw()).toBe('Example *site*');
        expect(link?.isImage()).toBe(false);
    });

    it('reads footnotes', () => {
        const org = Org.parse('Text with [fn:1] and [fn::inline note].\n\n[fn:1] The definition.\n');
        const [named, inline] = org.findNodes(FnRef);
        expect(named.label()).toBe('1');
        expect(named.isInline()).toBe(false);
        expect(inline.label()).toBeUndefined();
        expect(inline.isInline()).toBe(true);
        expect(inline.definition()?.raw()).toBe('inline note');
        expect(org.firstNode(FnDef)?.label()).toBe('1');
        expect(org.firstNode(FnDef)?.content()?.raw()).toBe('The definition.\n');
    });

    it('reads macros, cookies and snippets', () => {
        const org = Org.parse('{{{name(a, b\\, c)}}} [1/3] [50%] @@html:<br>@@\n');
        expect(org.firstNode(Macros)?.name()).toBe('name');
        expect(org.firstNode(Macros)?.argumentList()).toEqual(['a', 'b, c']);
        const [fraction, percent] = org.findNodes(Cookie);
        expect(fraction.fraction()).toEqual({ done: 1, total: 3 });
        expect(percent.percent()).toBe(50);
        expect(org.firstNode(Snippet)?.backend()).toBe('html');
        expect(org.firstNode(Snippet)?.value()).toBe('<br>');
    });

    it('reads cloze text, hint and id', () => {
        const plain = Org.parse('{{text}}\n').firstNode(Cloze);
        expect(plain?.textRaw()).toBe('text');
        expect(plain?.hint()).toBeUndefined();
        expect(plain?.id()).toBeUndefined();

        const hinted = Org.parse('{{text}{hint}}\n').firstNode(Cloze);
        expect(hinted?.hint()).toBe('hint');
        expect(hinted?.id()).toBeUndefined();

        const empty = Org.parse('{{text}{}@}\n').firstNode(Cloze);
        expect(empty?.hint()).toBe('');
        expect(empty?.id()).toBe('');

        const math = Org.parse('{{$\\frac{1}{2}$}{frac}@c1}\n').firstNode(Cloze);
        expect(math?.textRaw()).toBe('$\\frac{1}{2}$');
        expect(math?.text().map(element => element.kind)).toEqual(['latex-fragment']);
        expect(math?.hint()).toBe('frac');
        expect(math?.id()).toBe('c1');
    });

    it('rejects malformed cloze and leaves macros alone', () => {
        for (const text of ['{{}}', '{{text}', '{text}}', '{{text}{}', '{{text}a}', '{{{name}}}']) {
            expect(Org.parse(`${text}\n`).firstNode(Cloze)).toBeUndefined();
        }
        expect(Org.parse('{{{name}}}\n').firstNode(Macros)?.name()).toBe('name');
    });

    it('reads inline calls and inline source', () => {
        const org = Org.parse('Calls call_square[:x 1](4)[:results raw] and src_sh[:dir /tmp]{ls}.\n');
        const call = org.firstNode(InlineCall);
        expect(call?.call()).toBe('square');
        expect(call?.insideHeader()).toBe(':x 1');
        expect(call?.arguments()).toBe('4');
        expect(call?.endHeader()).toBe(':results raw');
        const src = org.firstNode(InlineSrc);
        expect(src?.language()).toBe('sh');
        expect(src?.parameters()).toBe(':dir /tmp');
        expect(src?.value()).toBe('ls');
    });

    it('reads targets, entities, scripts and LaTeX', () => {
        const org = Org.parse('<<target>> <<<radio>>> \\alpha \\beta{} a_{sub} b^{sup} $x^2$\n');
        expect(org.firstNode(Target)?.value()).toBe('target');
        expect(org.firstNode(RadioTarget)?.value()).toBe('radio');
        const [alpha, beta] = org.findNodes(Entity);
        expect(alpha.name()).toBe('alpha');
        expect(alpha.utf8()).toBe('α');
        expect(alpha.html()).toBe('&alpha;');
        expect(alpha.usesBrackets()).toBe(false);
        expect(beta.usesBrackets()).toBe(true);
        expect(org.firstNode(Subscript)?.contentRaw()).toBe('sub');
        expect(org.firstNode(Superscript)?.usesBraces()).toBe(true);
        expect(org.firstNode(LatexFragment)?.value()).toBe('x^2');
    });
});
