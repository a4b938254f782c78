import { format, isValid, parse, parseISO } from 'date-fns';

export const HOST_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** Local naive timestamp, as both the device API and the HR ledger expect it. */
export function formatHostDateTime(date: Date): string {
    return format(date, HOST_DATETIME_FORMAT);
}

export function parseHostDateTime(value: string | Date | null | undefined): Date | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (value instanceof Date) {
        return isValid(value) ? value : null;
    }

    const trimmed = value.trim();
    const naive = parse(trimmed, HOST_DATETIME_FORMAT, new Date());
    if (isValid(naive)) {
        return naive;
    }

    // Some firmware sends ISO 8601 instead
    const iso = parseISO(trimmed);
    return isValid(iso) ? iso : null;
}
