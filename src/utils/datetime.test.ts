import { describe, it, expect } from 'vitest';
import { formatHostDateTime, parseHostDateTime } from './datetime';

describe('host datetime helpers', () => {
    it('formats as a local naive timestamp', () => {
        expect(formatHostDateTime(new Date(2024, 0, 1, 9, 5, 7))).toBe('2024-01-01 09:05:07');
    });

    it('parses the naive format as local time', () => {
        expect(parseHostDateTime('2024-01-01 09:00:00')).toEqual(new Date(2024, 0, 1, 9, 0, 0));
        expect(parseHostDateTime(' 2024-03-15 18:30:45 ')).toEqual(new Date(2024, 2, 15, 18, 30, 45));
    });

    it('accepts ISO 8601 and Date values', () => {
        expect(parseHostDateTime('2024-01-01T09:00:00')).toEqual(new Date(2024, 0, 1, 9, 0, 0));
        const date = new Date(2024, 5, 1, 8, 0, 0);
        expect(parseHostDateTime(date)).toBe(date);
    });

    it('returns null for missing or invalid values', () => {
        expect(parseHostDateTime(null)).toBeNull();
        expect(parseHostDateTime(undefined)).toBeNull();
        expect(parseHostDateTime('yesterday')).toBeNull();
        expect(parseHostDateTime(new Date('invalid'))).toBeNull();
    });
});
