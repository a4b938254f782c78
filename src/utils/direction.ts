import type { Direction, DirectionHints } from '../types/sync';

const OUT_TOKENS = ['out', 'چیک آؤٹ'];
const IN_TOKENS = ['in', 'چیک ان'];

/**
 * Parse a loosely typed value as an integer, or null when it isn't one.
 * Accepts numbers (truncated), booleans and digit strings with surrounding whitespace.
 */
export function toInteger(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.trunc(value) : null;
    }
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
        return parseInt(value, 10);
    }
    return null;
}

/**
 * Classify a punch as IN or OUT. First matching rule wins:
 * numeric punch_state, punch_state_display text, explicit log_type,
 * device-native punch flag, then IN.
 */
export function detectDirection(hints: DirectionHints): Direction {
    const punchState = toInteger(hints.punch_state);
    if (punchState !== null) {
        return punchState === 1 ? 'OUT' : 'IN';
    }

    if (typeof hints.punch_state_display === 'string') {
        const display = hints.punch_state_display.toLowerCase();
        if (OUT_TOKENS.some(token => display.includes(token))) {
            return 'OUT';
        }
        if (IN_TOKENS.some(token => display.includes(token))) {
            return 'IN';
        }
    }

    if (typeof hints.log_type === 'string') {
        const logType = hints.log_type.toUpperCase();
        if (logType === 'IN' || logType === 'OUT') {
            return logType;
        }
    }

    const punch = toInteger(hints.punch);
    if (punch !== null) {
        return punch === 1 ? 'OUT' : 'IN';
    }

    return 'IN';
}
