import { describe, expect, it } from 'vitest';
import { createLogger, LogLevel } from '../src/logging';

describe('createLogger', () => {
    it('drops lines below the threshold', () => {
        const lines: [string, LogLevel][] = [];
        const log = createLogger({ level: 'warn', sink: (line, level) => { lines.push([line, level]); } });
        log.debug('noise');
        log.info('chatter');
        log.warn('careful');
        log.error('broken');
        expect(lines.map(([, level]) => level)).toEqual(['warn', 'error']);
        expect(lines[0][0]).toContain('careful');
    });

    it('passes info lines through unchanged', () => {
        const lines: string[] = [];
        const log = createLogger({ sink: line => { lines.push(line); } });
        log.debug('hidden');
        log.info('4 useful types');
        expect(lines).toEqual(['4 useful types']);
    });
});
