/**
 * Tests for the HTML backend
 */

import { describe, it, expect } from 'vitest';
import { Org } from '../../org';
import { HtmlExport } from '../orgExportHtml';

function html(text: string): string {
    return Org.parse(text).toHtml();
}

function body(text: string): string {
    return html(text).replace(/^<main><section>/, '').replace(/<\/section><\/main>$/, '');
}

describe('HtmlExport', () => {
    describe('structure', () => {
        it('renders headlines with their sections', () => {
            expect(html('* title\n*section*')).toBe(
                '<main><h1>title</h1><section><p><b>section</b></p></section></main>'
            );
        });

        it('caps heading levels at six', () => {
            expect(html('******* deep\n')).toBe('<main><h6>deep</h6></main>');
        });

        it('renders an empty document', () => {
            expect(html('')).toBe('<main></main>');
        });

        it('skips keywords, planning and property drawers', () => {
            expect(html('#+TITLE: T\n* h\nSCHEDULED: <2024-01-15 Mon>\n:PROPERTIES:\n:ID: x\n:END:\nbody\n')).toBe(
                '<main><section></section><h1>h</h1><section><p>body</p></section></main>'
            );
        });
    });

    describe('inline markup', () => {
        it('maps emphasis to tags', () => {
            expect(body('*b* /i/ _u_ +s+ =v= ~c~\n')).toBe(
                '<p><b>b</b> <i>i</i> <u>u</u> <s>s</s> <code>v</code> <code>c</code></p>'
            );
        });

        it('escapes text', () => {
            expect(body('a < b & "c" \'d\'\n')).toBe('<p>a &lt; b &amp; &quot;c&quot; &#39;d&#39;</p>');
        });

        it('renders links and images', () => {
            expect(body('[[https://example.com][Ex]] [[./a.org]] [[file:img.png]]\n')).toBe(
                '<p><a href="https://example.com">Ex</a> <a href="./a.org">./a.org</a> <img src="img.png"></p>'
            );
        });

        it('renders timestamps, entities and line breaks', () => {
            expect(body('<2024-01-15 Mon> \\alpha\\\\\nnext\n')).toBe(
                '<p><span class="timestamp-wrapper"><span class="timestamp">&lt;2024-01-15 Mon&gt;</span></span> &alpha;<br/>\nnext</p>'
            );
        });

        it('wraps cloze text in a span', () => {
            expect(body('{{answer}{h}@1}\n')).toBe('<p><span class="cloze">answer</span></p>');
        });

        it('keeps only html snippets', () => {
            expect(body('@@html:<br>@@@@latex:\\\\@@\n')).toBe('<p><br></p>');
        });
    });

    describe('elements', () => {
        it('renders lists', () => {
            expect(body('- a\n- b\n')).toBe('<ul><li><p>a</p></li><li><p>b</p></li></ul>');
            expect(body('1. x\n')).toBe('<ol><li><p>x</p></li></ol>');
            expect(body('- t :: d\n')).toBe('<dl><dt>t</dt><dd><p>d</p></dd></dl>');
        });

        it('renders tables with a header', () => {
            expect(body('| a | b |\n|---+---|\n| 1 | 2 |\n')).toBe(
                '<table><thead><tr><td>a</td><td>b</td></tr></thead>'
                + '<tbody><tr><td>1</td><td>2</td></tr></tbody></table>'
            );
        });

        it('renders tables without a header', () => {
            expect(body('| a |\n| b |\n')).toBe('<table><tbody><tr><td>a</td></tr><tr><td>b</td></tr></tbody></table>');
        });

        it('renders source blocks with a language class', () => {
            expect(body('#+BEGIN_SRC js\nlet a = 1 < 2;\n#+END_SRC\n')).toBe(
                '<pre><code class="language-js">let a = 1 &lt; 2;\n</code></pre>'
            );
        });

        it('renders quote and example blocks', () => {
            expect(body('#+begin_quote\nq\n#+end_quote\n')).toBe('<blockquote><p>q</p></blockquote>');
            expect(body('#+BEGIN_EXAMPLE\n<x>\n#+END_EXAMPLE\n')).toBe('<pre class="example">&lt;x&gt;\n</pre>');
        });

        it('renders comments as HTML comments', () => {
            expect(body('# note\n')).toBe('<!--note-->');
        });

        it('renders rules', () => {
            expect(body('-----\n')).toBe('<hr/>');
        });
    });

    describe('overrides', () => {
        it('replaces the rendering of a container kind', () => {
            const output = Org.parse('*x* y\n').toHtml({
                overrides: {
                    bold: (event, _ctx, exporter) => {
                        exporter.push(event.type === 'enter' ? '<strong>' : '</strong>');
                    },
                },
            });
            expect(output).toBe('<main><section><p><strong>x</strong> y</p></section></main>');
        });

        it('falls back to the default rendering', () => {
            const seen: string[] = [];
            const output = Org.parse('para\n').toHtml({
                overrides: {
                    paragraph: (event, ctx, exporter) => {
                        seen.push(event.type);
                        exporter.defaultEvent(event, ctx);
                    },
                },
            });
            expect(output).toBe('<main><section><p>para</p></section></main>');
            expect(seen).toEqual(['enter', 'leave']);
        });

        it('can skip a container', () => {
            const output = Org.parse('* h\nbody\n').toHtml({
                overrides: {
                    section: (event, ctx) => {
                        if (event.type === 'enter') ctx.skip();
                    },
                },
            });
            expect(output).toBe('<main><h1>h</h1></main>');
        });

        it('stops the whole walk from inside a headline title', () => {
            const output = Org.parse('* *a* x\nbody\n* next\n').toHtml({
                overrides: {
                    bold: (_event, ctx) => ctx.stop(),
                },
            });
            expect(output).toBe('<main><h1>');
        });

        it('stops the whole walk from inside a description tag', () => {
            const output = Org.parse('- *t* :: d\n\nafter\n').toHtml({
                overrides: {
                    bold: (_event, ctx) => ctx.stop(),
                },
            });
            expect(output).toBe('<main><section><dl><dt>');
        });

        it('overrides leaf events', () => {
            const output = Org.parse('on <2024-01-15 Mon>\n').toHtml({
                overrides: {
                    timestamp: (event, _ctx, exporter) => {
                        if (event.type === 'timestamp') exporter.pushText(event.node.raw());
                    },
                },
            });
            expect(output).toBe('<main><section><p>on &lt;2024-01-15 Mon&gt;</p></section></main>');
        });
    });

    it('accumulates output across renders', () => {
        const exporter = new HtmlExport();
        const org = Org.parse('*a*');
        exporter.push('<div>');
        exporter.render(org.syntax());
        exporter.push('</div>');
        expect(exporter.finish()).toBe('<div><main><section><p><b>a</b></p></section></main></div>');
    });
});
