/**
 * Tests for the logging service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createLogger, getLoggingService, LogLevel } from '../logger';
import { Org } from '../../org';

describe('logger', () => {
    const service = getLoggingService();
    let lines: Array<[LogLevel, string]> = [];

    beforeEach(() => {
        lines = [];
        service.setSink((level, line) => {
            lines.push([level, line]);
        });
        service.clearErrors();
    });

    afterEach(() => {
        service.resetSink();
        service.setLevel(LogLevel.WARN);
    });

    it('filters by level', () => {
        const log = createLogger('Test');
        log.debug('hidden');
        log.info('hidden');
        log.warn('shown');
        expect(lines.length).toBe(1);
        expect(lines[0][0]).toBe(LogLevel.WARN);
        expect(lines[0][1]).toMatch(/\[WARN \] \[Test\] shown$/);
    });

    it('accepts level names', () => {
        service.setLevel('debug');
        expect(service.getConfiguredLevel()).toBe(LogLevel.DEBUG);
        service.setLevel('nonsense');
        expect(service.getConfiguredLevel()).toBe(LogLevel.WARN);
    });

    it('always logs errors and remembers them', () => {
        service.setLevel(LogLevel.ERROR);
        createLogger('Test').error('failed', new Error('boom'));
        expect(lines[0][1]).toMatch(/\[ERROR\] \[Test\] failed$/);
        expect(service.getRecentErrors().map(entry => entry.message)).toEqual(['failed: boom']);
    });

    it('appends data as JSON and names child modules', () => {
        service.setLevel(LogLevel.INFO);
        createLogger('Test').child('sub').info('done', { count: 2 });
        expect(lines[0][1]).toMatch(/\[Test:sub\] done \{"count":2\}$/);
    });

    it('reports parses at debug level', () => {
        service.setLevel(LogLevel.DEBUG);
        Org.parse('* a\n');
        expect(lines.map(([, line]) => line).some(line => line.endsWith('[Parser] Parsed document {"length":4}'))).toBe(true);
    });
});
