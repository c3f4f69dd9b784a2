import { describe, expect, it } from 'vitest';
import { isIdentifier } from '../src/identifiers';

describe('isIdentifier', () => {
    it('accepts identifier-shaped strings', () => {
        expect(isIdentifier('show')).toBe(true);
        expect(isIdentifier('_private')).toBe(true);
        expect(isIdentifier('$el')).toBe(true);
        expect(isIdentifier('QWidget2')).toBe(true);
    });

    it('rejects everything else', () => {
        expect(isIdentifier('')).toBe(false);
        expect(isIdentifier('9lives')).toBe(false);
        expect(isIdentifier('set-text')).toBe(false);
        expect(isIdentifier('Hello world')).toBe(false);
        expect(isIdentifier('a.b')).toBe(false);
    });
});
