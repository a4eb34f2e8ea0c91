/**
 * Views over `#+BEGIN_NAME` ... `#+END_NAME` blocks and dynamic blocks
 */

import type { NodeKind, TokenKind } from '../parser/orgSyntaxKind';
import type { SyntaxNode, SyntaxToken } from '../parser/orgSyntaxTree';
import { ElementNode } from './astNode';

// =============================================================================
// Base
// =============================================================================

export abstract class Block extends ElementNode {
    protected begin(): SyntaxNode | undefined {
        return this.syntax.firstChild('block-begin');
    }

    protected beginToken(kind: TokenKind): SyntaxToken | undefined {
        return this.begin()?.firstToken(kind);
    }

    /**
     * The `block-content` node
     */
    content(): SyntaxNode | undefined {
        return this.syntax.firstChild('block-content');
    }

    /**
     * Offset just after the begin line
     */
    contentStart(): number {
        return this.begin()?.end ?? this.start;
    }

    /**
     * Offset of the end line
     */
    contentEnd(): number {
        return this.syntax.firstChild('block-end')?.start ?? this.end;
    }

    contentRaw(): string {
        return this.content()?.text() ?? '';
    }

    /**
     * Block name as written, e.g. `src` for `#+begin_src`
     */
    blockName(): string {
        const text = this.beginToken('text')?.text ?? '';
        const m = /^#\+begin_?:?(.*)$/i.exec(text);
        return m ? m[1] : '';
    }

    /**
     * Text after the block name on the begin line
     */
    parameters(): string | undefined {
        const begin = this.begin();
        if (!begin) return undefined;
        const tokens = begin.tokens().filter(t => t.kind !== 'new-line');
        const name = tokens.findIndex(t => t.kind === 'text');
        const rest = tokens.slice(name + 1).map(t => t.text).join('').trim();
        return rest || undefined;
    }
}

/**
 * Block kept verbatim: the value removes the comma that protects lines
 * starting with `*` or `#+`
 */
export abstract class VerbatimBlock extends Block {
    value(): string {
        const content = this.content();
        if (!content) return '';
        return content.tokens()
            .filter(t => t.kind !== 'comma')
            .map(t => t.text)
            .join('');
    }
}

// =============================================================================
// Verbatim blocks
// =============================================================================

export class SourceBlock extends VerbatimBlock {
    readonly kind = 'source-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'source-block';
    }

    language(): string | undefined {
        return this.beginToken('src-block-language')?.text;
    }

    switches(): string | undefined {
        return this.beginToken('src-block-switches')?.text;
    }

    parameters(): string | undefined {
        return this.beginToken('src-block-parameters')?.text;
    }

    /**
     * `:key value` header arguments
     */
    headerArguments(): Map<string, string> {
        const result = new Map<string, string>();
        const params = this.parameters();
        if (!params) return result;
        const re = /:(\S+)(?:[ \t]+((?:(?![ \t]+:)[\s\S])*))?/g;
        let m: RegExpExecArray | null;
        while ((m = re.exec(params)) !== null) {
            result.set(m[1], (m[2] ?? '').trim());
        }
        return result;
    }
}

export class ExampleBlock extends VerbatimBlock {
    readonly kind = 'example-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'example-block';
    }
}

export class ExportBlock extends VerbatimBlock {
    readonly kind = 'export-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'export-block';
    }

    type(): string | undefined {
        return this.beginToken('export-block-type')?.text;
    }
}

export class CommentBlock extends VerbatimBlock {
    readonly kind = 'comment-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'comment-block';
    }
}

// =============================================================================
// Blocks with parsed content
// =============================================================================

export class QuoteBlock extends Block {
    readonly kind = 'quote-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'quote-block';
    }
}

export class CenterBlock extends Block {
    readonly kind = 'center-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'center-block';
    }
}

/**
 * Verse block; its content holds inline objects, line breaks preserved
 */
export class VerseBlock extends Block {
    readonly kind = 'verse-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'verse-block';
    }
}

export class SpecialBlock extends Block {
    readonly kind = 'special-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'special-block';
    }
}

/**
 * `#+BEGIN: name params` ... `#+END:`
 */
export class DynBlock extends Block {
    readonly kind = 'dyn-block' as const;

    static canCast(kind: NodeKind): boolean {
        return kind === 'dyn-block';
    }

    blockName(): string {
        return this.begin()?.tokens('text')[1]?.text ?? '';
    }

    parameters(): string | undefined {
        return this.begin()?.tokens('text')[2]?.text;
    }
}
