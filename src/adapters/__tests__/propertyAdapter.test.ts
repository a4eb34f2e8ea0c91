/**
 * Tests for property lookups and the outline snapshot
 */

import { describe, it, expect } from 'vitest';
import { Org } from '../../org';
import { Headline } from '../../ast';
import {
    documentOutline,
    inheritedProperty,
    listProperty,
    numericProperty,
    propertiesToRecord,
} from '../propertyAdapter';

const TEXT = [
    ':PROPERTIES:',
    ':CATEGORY: work',
    ':END:',
    '* A',
    ':PROPERTIES:',
    ':EFFORT: 2',
    ':ALIASES: x  y',
    ':END:',
    '** TODO [#B] B :t:',
    'body',
    '* C',
    '',
].join('\n');

describe('propertyAdapter', () => {
    const org = Org.parse(TEXT);
    const [a, b, c] = org.findNodes(Headline);

    it('converts a drawer to a record', () => {
        expect(propertiesToRecord(a.properties())).toEqual({ EFFORT: '2', ALIASES: 'x  y' });
        expect(propertiesToRecord(c.properties())).toEqual({});
    });

    it('inherits from ancestors and the document', () => {
        expect(inheritedProperty(b, 'effort')).toBe('2');
        expect(inheritedProperty(b, 'CATEGORY')).toBeUndefined();
        expect(inheritedProperty(b, 'CATEGORY', org.document())).toBe('work');
        expect(inheritedProperty(c, 'EFFORT')).toBeUndefined();
    });

    it('reads numeric and list values', () => {
        expect(numericProperty(a.properties(), 'EFFORT')).toBe(2);
        expect(numericProperty(a.properties(), 'ALIASES')).toBeUndefined();
        expect(numericProperty(b.properties(), 'EFFORT')).toBeUndefined();
        expect(listProperty(a.properties(), 'aliases')).toEqual(['x', 'y']);
        expect(listProperty(undefined, 'aliases')).toEqual([]);
    });

    it('builds the outline', () => {
        expect(documentOutline(org.document())).toEqual([
            {
                level: 1,
                title: 'A',
                tags: [],
                offset: TEXT.indexOf('* A'),
                properties: { EFFORT: '2', ALIASES: 'x  y' },
                children: [
                    {
                        level: 2,
                        title: 'B',
                        todoState: 'TODO',
                        priority: 'B',
                        tags: ['t'],
                        offset: TEXT.indexOf('** TODO'),
                        properties: {},
                        children: [],
                    },
                ],
            },
            {
                level: 1,
                title: 'C',
                tags: [],
                offset: TEXT.indexOf('* C'),
                properties: {},
                children: [],
            },
        ]);
    });
});
