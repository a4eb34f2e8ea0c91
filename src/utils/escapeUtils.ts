/**
 * Shared escape utilities for the HTML and Markdown renderers
 */

/**
 * Normalize line endings to Unix-style (LF only)
 * Converts CRLF (\r\n) and standalone CR (\r) to LF (\n)
 */
export function normalizeLineEndings(str: string): string {
    return str.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Escape special HTML characters
 * @returns Escaped string safe for HTML text and attribute values
 */
export function escapeHtml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * Escape characters that Markdown would otherwise read as markup
 */
export function escapeMarkdown(str: string): string {
    return str.replace(/([\\`*_[\]#<>|])/g, '\\$1');
}
