/**
 * Tests for the event walk: ordering, skip/stop and token reporting
 */

import { describe, it, expect } from 'vitest';
import { Org } from '../../org';
import { Headline } from '../../ast';
import { eventKey } from '../orgEvent';
import type { Event } from '../orgEvent';
import { TraversalContext, fromFn, fromFnWithCtx, traverse } from '../orgTraverse';

function describeEvent(event: Event): string {
    switch (event.type) {
        case 'enter':
        case 'leave':
            return `${event.type}:${event.container.kind}`;
        case 'text':
            return `text:${event.text}`;
        case 'fn-label':
        case 'token':
            return `${event.type}:${event.token.text}`;
        default:
            return event.type;
    }
}

function collect(text: string, options: { tokens?: boolean } = {}): string[] {
    const events: string[] = [];
    Org.parse(text).traverse(fromFn(event => events.push(describeEvent(event)), options));
    return events;
}

/**
 * Source text rebuilt from the tokens a `tokens: true` walk reports
 */
function tokenWalk(text: string): string {
    let rebuilt = '';
    Org.parse(text).traverse(fromFn(event => {
        if (event.type === 'token' || event.type === 'fn-label') rebuilt += event.token.text;
        if (event.type === 'text' && event.token) rebuilt += event.token.text;
    }, { tokens: true }));
    return rebuilt;
}

const TOKEN_CORPUS: string[] = [
    '* TODO h :t:\n#+BEGIN_SRC\nx\n#+END_SRC\n',
    '#+TITLE: Notes\n#+CALL: report(month=1)\n\nIntro.\n',
    '* DONE [#A] Ship :a:b:\nCLOSED: [2024-02-01 Thu 09:30] DEADLINE: <2024-02-02 Fri>\n:PROPERTIES:\n:ID: abc\n:END:\nBody.\n',
    '- [X] one\n- term :: definition\n  1. nested\n',
    '| a | b |\n|---+---|\n| 1 | 2 |\n#+TBLFM: $2=$1\n',
    '#+CAPTION: A *caption*\n#+NAME: fig\n[[file:image.png]]\n',
    '#+begin_quote\nQuoted /text/.\n#+end_quote\n:NOTES:\nin a drawer\n:END:\n',
    ':LOGBOOK:\nCLOCK: [2024-01-01 Mon 10:00]--[2024-01-01 Mon 11:00] =>  1:00\n:END:\n',
    'Fill {{x $a}b$}{h}@i} and {{y}}.\n',
    '# comment\n: fixed\n-----\n\\begin{equation}\nx\n\\end{equation}\n',
    'Text [fn:1] \\alpha <2024-01-15 Mon +1w> {{{m(a)}}} [1/2] src_sh{ls} $x$ a_{b}\\\\\nnext\n\n[fn:1] Def.\n',
];

describe('traverse', () => {
    it('counts headlines', () => {
        let count = 0;
        Org.parse('* a\n** b\n* c\n').traverse(fromFn(event => {
            if (event.type === 'enter' && event.container.kind === 'headline') count++;
        }));
        expect(count).toBe(3);
    });

    it('does not count a line of stars without a space as a headline', () => {
        let count = 0;
        Org.parse('* 1\n** 2\n*** 3\n****4').traverse(fromFn(event => {
            if (event.type === 'enter' && event.container.kind === 'headline') count++;
        }));
        expect(count).toBe(3);
    });

    it('reports enter and leave around every container', () => {
        expect(collect('*x*\n')).toEqual([
            'enter:document',
            'enter:section',
            'enter:paragraph',
            'enter:bold',
            'text:x',
            'leave:bold',
            'leave:paragraph',
            'leave:section',
            'leave:document',
        ]);
    });

    it('reports verbatim block contents as one text event', () => {
        expect(collect('#+BEGIN_SRC\nx\ny\n#+END_SRC\n')).toEqual([
            'enter:document',
            'enter:section',
            'enter:source-block',
            'text:x\ny\n',
            'leave:source-block',
            'leave:section',
            'leave:document',
        ]);
    });

    it('reports leaf objects and footnote labels', () => {
        const events = collect('[fn:1] Stamp <2024-01-15 Mon> \\alpha\n');
        expect(events).toContain('fn-label:1');
        expect(events).toContain('timestamp');
        expect(events).toContain('entity');
    });

    it('reports every token on request', () => {
        let text = '';
        Org.parse('*x* y\n').traverse(fromFn(event => {
            if (event.type === 'token') text += event.token.text;
            if (event.type === 'text' && event.token) text += event.text;
        }, { tokens: true }));
        expect(text).toBe('*x* y\n');
    });

    it.each(TOKEN_CORPUS)('rebuilds the source from tokens: %j', (text) => {
        expect(tokenWalk(text)).toBe(text);
    });

    it('walks headline parts and block delimiters when tokens are requested', () => {
        const events = collect('* TODO h :t:\n#+BEGIN_SRC\nx\n#+END_SRC\n', { tokens: true });
        expect(events).toContain('token:*');
        expect(events).toContain('token:TODO');
        expect(events).toContain('text:h');
        expect(events).toContain('text:x');
        expect(events).toContain('text:t');
        expect(events).not.toContain('text:x\n');
    });

    it('walks only the text of a cloze', () => {
        expect(collect('{{a}{h}@i}\n')).toEqual([
            'enter:document',
            'enter:section',
            'enter:paragraph',
            'enter:cloze',
            'text:a',
            'leave:cloze',
            'leave:paragraph',
            'leave:section',
            'leave:document',
        ]);
    });

    it('starts at any subtree', () => {
        const org = Org.parse('* a\n** b\ntext\n');
        const child = org.findNodes(Headline)[1];
        const events: string[] = [];
        traverse(child.syntax, fromFn(event => events.push(describeEvent(event))));
        expect(events[0]).toBe('enter:headline');
        expect(events[events.length - 1]).toBe('leave:headline');
        expect(events).toContain('text:text');
    });
});

describe('traversal control', () => {
    it('skips the contents and leave of a container', () => {
        const entered: string[] = [];
        let leaves = 0;
        Org.parse('* a\n** b\n* c\n').traverse(fromFnWithCtx((event, ctx) => {
            if (event.type === 'enter' && event.container instanceof Headline) {
                entered.push(event.container.titleRaw());
                ctx.skip();
            }
            if (event.type === 'leave' && event.container.kind === 'headline') leaves++;
        }));
        expect(entered).toEqual(['a', 'c']);
        expect(leaves).toBe(0);
    });

    it('stops the walk', () => {
        const events: string[] = [];
        const ctx = new TraversalContext();
        Org.parse('one\n\ntwo\n').traverse(fromFnWithCtx((event, inner) => {
            events.push(describeEvent(event));
            if (event.type === 'text') inner.stop();
        }), ctx);
        expect(events).toEqual(['enter:document', 'enter:section', 'enter:paragraph', 'text:one']);
        expect(ctx.stopped).toBe(true);
    });

    it('ignores skip on events that are not enter', () => {
        const events: string[] = [];
        Org.parse('a *b* c\n').traverse(fromFnWithCtx((event, ctx) => {
            events.push(describeEvent(event));
            if (event.type === 'text') ctx.skip();
        }));
        expect(events).toContain('text:b');
        expect(events).toContain('text: c');
    });
});

describe('eventKey', () => {
    it('uses the container kind for enter and leave', () => {
        const keys: string[] = [];
        Org.parse('| a |\n').traverse(fromFn(event => keys.push(eventKey(event))));
        expect(keys).toEqual([
            'document',
            'section',
            'org-table',
            'org-table-standard-row',
            'org-table-cell',
            'text',
            'org-table-cell',
            'org-table-standard-row',
            'org-table',
            'section',
            'document',
        ]);
    });
});
