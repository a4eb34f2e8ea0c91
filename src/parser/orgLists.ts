/**
 * Plain lists
 *
 * Items start with a bullet (`-`, `+`, indented `*`, `1.`, `1)`, `a.`,
 * `a)`) and extend over every following line indented deeper than the
 * bullet. A single blank line between items keeps the list going; two end
 * it.
 */

import { GreenNode, GreenToken } from './orgGreenTree';
import type { GreenElement } from './orgGreenTree';
import { countBlankLines, indentWidth, isBlank, linesFrom, readLine, takeBlankLines } from './orgLexer';
import type { Line, ParseContext, ParseResult } from './orgLexer';
import { parseObjects } from './orgObjects';
import { parseElements } from './orgElements';

const RE_BULLET = /^([ \t]*)([-+*]|\d+[.)]|[A-Za-z][.)])([ \t]+|$)/;
const RE_COUNTER = /^\[(@(?:\d+|[A-Za-z]))\]([ \t]+|$)/;
const RE_CHECKBOX = /^\[([ X\-x])\]([ \t]+|$)/;
const RE_TAG = /^(.*?\S)([ \t]+)(::)([ \t]+|$)/;

export interface BulletMatch {
    indent: string;
    bullet: string;
    gap: string;
}

/**
 * Match a list item line. A `*` bullet needs indentation, otherwise the
 * line is a headline.
 */
export function matchBullet(content: string): BulletMatch | null {
    const m = RE_BULLET.exec(content);
    if (!m) return null;
    if (m[2] === '*' && m[1] === '') return null;
    return { indent: m[1], bullet: m[2], gap: m[3] };
}

export function isUnorderedBullet(bullet: string): boolean {
    return bullet === '-' || bullet === '+' || bullet === '*';
}

// =============================================================================
// List
// =============================================================================

export function tryParseList(ctx: ParseContext, pos: number, limit: number): ParseResult | null {
    const first = readLine(ctx.text, pos, limit);
    if (!first) return null;
    const firstBullet = matchBullet(first.content);
    if (!firstBullet) return null;
    const indent = firstBullet.indent.length;

    const children: GreenElement[] = [];
    let cursor = pos;

    for (;;) {
        const line = readLine(ctx.text, cursor, limit);
        if (!line) break;
        const bullet = matchBullet(line.content);
        if (!bullet || bullet.indent.length !== indent) break;

        const contentEnd = findItemEnd(ctx.text, line, indent, limit);
        const itemChildren = listItemPrefix(ctx, line, bullet);
        const prefixLength = itemChildren.reduce((sum, child) => sum + child.textLength, 0);
        itemChildren.push(new GreenNode('list-item-content', parseElements(ctx, line.start + prefixLength, contentEnd)));

        // One blank line followed by a sibling item stays with this item
        const blankCount = countBlankLines(ctx.text, contentEnd, limit);
        if (blankCount === 1) {
            const blanks = takeBlankLines(ctx.text, contentEnd, limit);
            const next = readLine(ctx.text, blanks.end, limit);
            const nextBullet = next ? matchBullet(next.content) : null;
            if (nextBullet && nextBullet.indent.length === indent) {
                itemChildren.push(...blanks.tokens);
                children.push(new GreenNode('list-item', itemChildren));
                cursor = blanks.end;
                continue;
            }
        }

        children.push(new GreenNode('list-item', itemChildren));
        cursor = contentEnd;
        if (blankCount > 0) break;
    }

    const blanks = takeBlankLines(ctx.text, cursor, limit);
    children.push(...blanks.tokens);
    return { node: new GreenNode('list', children), end: blanks.end };
}

/**
 * End of an item's content: the first line that is not indented past the
 * bullet, excluding blank lines that are not followed by such a line
 */
function findItemEnd(text: string, first: Line, indent: number, limit: number): number {
    let end = first.next;
    let pendingBlanks = 0;
    for (const line of linesFrom(text, first.next, limit)) {
        if (isBlank(line)) {
            pendingBlanks++;
            if (pendingBlanks >= 2) break;
            continue;
        }
        if (indentWidth(line.content) <= indent) break;
        pendingBlanks = 0;
        end = line.next;
    }
    return end;
}

function listItemPrefix(ctx: ParseContext, line: Line, bullet: BulletMatch): GreenElement[] {
    const children: GreenElement[] = [];
    if (bullet.indent) children.push(new GreenToken('whitespace', bullet.indent));
    children.push(new GreenToken('list-item-bullet', bullet.bullet));
    if (bullet.gap) children.push(new GreenToken('whitespace', bullet.gap));

    let rest = line.content.slice(bullet.indent.length + bullet.bullet.length + bullet.gap.length);

    const counter = RE_COUNTER.exec(rest);
    if (counter) {
        children.push(new GreenNode('list-item-counter', [
            new GreenToken('l-bracket', '['),
            new GreenToken('text', counter[1]),
            new GreenToken('r-bracket', ']'),
        ]));
        if (counter[2]) children.push(new GreenToken('whitespace', counter[2]));
        rest = rest.slice(counter[0].length);
    }

    const checkbox = RE_CHECKBOX.exec(rest);
    if (checkbox) {
        children.push(new GreenNode('list-item-checkbox', [
            new GreenToken('l-bracket', '['),
            new GreenToken('text', checkbox[1]),
            new GreenToken('r-bracket', ']'),
        ]));
        if (checkbox[2]) children.push(new GreenToken('whitespace', checkbox[2]));
        rest = rest.slice(checkbox[0].length);
    }

    if (isUnorderedBullet(bullet.bullet)) {
        const tag = RE_TAG.exec(rest);
        if (tag) {
            children.push(
                new GreenNode('list-item-tag', parseObjects(tag[1], ctx.config)),
                new GreenToken('whitespace', tag[2]),
                new GreenToken('colon2', '::')
            );
            if (tag[4]) children.push(new GreenToken('whitespace', tag[4]));
        }
    }
    return children;
}
