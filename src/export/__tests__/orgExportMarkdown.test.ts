/**
 * Tests for the Markdown backend
 */

import { describe, it, expect } from 'vitest';
import { Org } from '../../org';

function md(text: string): string {
    return Org.parse(text).toMarkdown();
}

describe('MarkdownExport', () => {
    it('renders headlines and emphasis', () => {
        expect(md('* Title\nSome *bold* and /it/ text.\n')).toBe('# Title\n\nSome **bold** and *it* text.\n');
        expect(md('* A\n** B\ntext\n')).toBe('# A\n\n## B\n\ntext\n');
    });

    it('renders inline code without escaping', () => {
        expect(md('Use =a_b*= here.\n')).toBe('Use `a_b*` here.\n');
    });

    it('escapes markup characters in text', () => {
        expect(md('use # and [x]\n')).toBe('use \\# and \\[x\\]\n');
    });

    it('renders lists', () => {
        expect(md('- a\n- b\n')).toBe('- a\n- b\n');
        expect(md('1. one\n2. two\n')).toBe('1. one\n2. two\n');
        expect(md('- a\n  - b\n')).toBe('- a\n\n  - b\n');
    });

    it('renders tables with a header separator', () => {
        expect(md('| a | b |\n|---+---|\n| 1 | 2 |\n')).toBe('| a | b |\n| --- | --- |\n| 1 | 2 |\n');
    });

    it('renders source blocks as fenced code', () => {
        expect(md('#+BEGIN_SRC python\nprint(1)\n#+END_SRC\n')).toBe('```python\nprint(1)\n```\n');
    });

    it('renders links', () => {
        expect(md('See [[https://example.com][site]] and [[https://x.org]].\n')).toBe(
            'See [site](https://example.com) and <https://x.org>.\n'
        );
        expect(md('[[file:pic.png]]\n')).toBe('![](pic.png)\n');
    });

    it('renders quotes', () => {
        expect(md('#+begin_quote\nQuoted.\n#+end_quote\n')).toBe('> Quoted.\n');
    });

    it('renders footnotes', () => {
        expect(md('Text[fn:1].\n\n[fn:1] Note.\n')).toBe('Text[^1].\n\n[^1]: Note.\n');
    });

    it('drops keywords and comments', () => {
        expect(md('#+TITLE: x\n# hidden\nBody\n')).toBe('Body\n');
    });

    it('renders cloze as its text', () => {
        expect(md('Fill {{in}{hint}}.\n')).toBe('Fill in.\n');
    });

    it('renders entities as characters', () => {
        expect(md('\\alpha\n')).toBe('α\n');
    });
});
