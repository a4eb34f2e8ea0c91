/**
 * Error types raised by the document engine
 *
 * Parsing never throws; the only failure a caller can observe is an edit
 * whose range does not fit the current text.
 */

import type { TextRange } from './orgSyntaxTree';

/**
 * Error thrown when an edit range lies outside the document
 */
export class OutOfBoundsError extends Error {
    public readonly range: Readonly<TextRange>;
    public readonly length: number;

    constructor(range: TextRange, length: number) {
        super(`Range ${range.start}..${range.end} is out of bounds for text of length ${length}`);
        this.name = 'OutOfBoundsError';
        this.range = { start: range.start, end: range.end };
        this.length = length;
    }
}

export function isOutOfBoundsError(error: unknown): error is OutOfBoundsError {
    return error instanceof OutOfBoundsError;
}
