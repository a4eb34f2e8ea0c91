/**
 * Tests for escape helpers
 */

import { describe, it, expect } from 'vitest';
import { escapeHtml, escapeMarkdown, normalizeLineEndings } from '../escapeUtils';

describe('escapeUtils', () => {
    it('escapes HTML special characters', () => {
        expect(escapeHtml('<a href="x">Tom & Jerry\'s</a>')).toBe(
            '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
        );
    });

    it('escapes Markdown markup characters', () => {
        expect(escapeMarkdown('a*b_c [d] `e` #f')).toBe('a\\*b\\_c \\[d\\] \\`e\\` \\#f');
    });

    it('normalizes line endings', () => {
        expect(normalizeLineEndings('a\r\nb\rc\n')).toBe('a\nb\nc\n');
    });

});
