/**
 * Tests for the green/red tree
 */

import { describe, it, expect } from 'vitest';
import { GreenNode, GreenToken } from '../orgGreenTree';
import { SyntaxNode, SyntaxToken, rangeContains, rangeContainsRange, textRange } from '../orgSyntaxTree';
import { parseDocument } from '../orgDocument';

function sample(): SyntaxNode {
    // paragraph "ab *c*\n"
    const green = new GreenNode('document', [
        new GreenNode('section', [
            new GreenNode('paragraph', [
                new GreenToken('text', 'ab '),
                new GreenNode('bold', [
                    new GreenToken('star', '*'),
                    new GreenToken('text', 'c'),
                    new GreenToken('star', '*'),
                ]),
                new GreenToken('new-line', '\n'),
            ]),
        ]),
    ]);
    return SyntaxNode.newRoot(green);
}

describe('green tree', () => {
    it('sums text lengths and rebuilds text', () => {
        const root = sample();
        expect(root.green.textLength).toBe(7);
        expect(root.text()).toBe('ab *c*\n');
    });

    it('copies only the replaced child', () => {
        const left = new GreenToken('text', 'a');
        const right = new GreenToken('text', 'b');
        const node = new GreenNode('paragraph', [left, right]);
        const copy = node.replaceChild(1, new GreenToken('text', 'cd'));
        expect(copy.children[0]).toBe(left);
        expect(copy.textLength).toBe(3);
        expect(node.toString()).toBe('ab');
    });
});

describe('red tree', () => {
    it('derives absolute offsets', () => {
        const paragraph = sample().descendants();
        const kinds = [...paragraph].map(node => `${node.kind}@${node.start}..${node.end}`);
        expect(kinds).toEqual(['document@0..7', 'section@0..7', 'paragraph@0..7', 'bold@3..6']);
    });

    it('separates nodes from tokens', () => {
        const paragraph = sample().children()[0].children()[0];
        expect(paragraph.children().map(node => node.kind)).toEqual(['bold']);
        expect(paragraph.childrenWithTokens().map(element => element.kind)).toEqual(['text', 'bold', 'new-line']);
        expect(paragraph.tokens().map(token => token.text)).toEqual(['ab ', '\n']);
        expect(paragraph.firstToken('new-line')?.start).toBe(6);
        expect(paragraph.firstChild('bold')?.firstToken('text')?.text).toBe('c');
    });

    it('walks ancestors and siblings', () => {
        const root = sample();
        const bold = root.children()[0].children()[0].children()[0];
        expect([...bold.ancestors()].map(node => node.kind)).toEqual(['bold', 'paragraph', 'section', 'document']);
        expect(bold.root()).toBe(root);
        expect(bold.prevSibling()?.toString()).toBe('ab ');
        expect(bold.nextSibling()?.kind).toBe('new-line');
    });

    it('lists leaf tokens in order', () => {
        expect([...sample().descendantTokens()].map(token => token.text)).toEqual(['ab ', '*', 'c', '*', '\n']);
    });

    it('finds the token at an offset', () => {
        const root = sample();
        expect(root.tokenAtOffset(0)?.text).toBe('ab ');
        expect(root.tokenAtOffset(3)?.text).toBe('*');
        expect(root.tokenAtOffset(4)?.text).toBe('c');
        expect(root.tokenAtOffset(7)?.text).toBe('\n');
        expect(root.tokenAtOffset(8)).toBeUndefined();
    });

    it('replaces a node by copying the path to the root', () => {
        const root = sample();
        const bold = root.children()[0].children()[0].children()[0];
        const green = bold.replaceWith(new GreenNode('italic', [
            new GreenToken('slash', '/'),
            new GreenToken('text', 'xyz'),
            new GreenToken('slash', '/'),
        ]));
        expect(green.toString()).toBe('ab /xyz/\n');
        expect(root.text()).toBe('ab *c*\n');
        const next = SyntaxNode.newRoot(green);
        expect(next.tokenAtOffset(4)?.text).toBe('xyz');
    });

    it('dumps the tree for debugging', () => {
        const root = SyntaxNode.newRoot(parseDocument('a\n'));
        expect(root.debugDump()).toBe([
            'document@0..2',
            '  section@0..2',
            '    paragraph@0..2',
            '      text@0..1 "a"',
            '      new-line@1..2 "\\n"',
        ].join('\n'));
    });

    it('reports token positions', () => {
        const token = sample().tokenAtOffset(4);
        expect(token).toBeInstanceOf(SyntaxToken);
        expect(token?.textRange).toEqual({ start: 4, end: 5 });
        expect(token?.isToken).toBe(true);
    });
});

describe('text ranges', () => {
    it('checks containment', () => {
        const range = textRange(2, 5);
        expect(rangeContains(range, 2)).toBe(true);
        expect(rangeContains(range, 5)).toBe(false);
        expect(rangeContainsRange(range, textRange(3, 5))).toBe(true);
        expect(rangeContainsRange(range, textRange(1, 3))).toBe(false);
    });
});
