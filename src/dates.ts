import { isValid, parse } from 'date-fns';
import { DATE_FORMAT } from './config';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a yyyy-MM-dd string to local midnight of that day.
 * Returns undefined for anything that is not a real calendar date (e.g. 2025-02-30).
 */
export function parseCalendarDate(value: string): Date | undefined {
    if (!CALENDAR_DATE_PATTERN.test(value)) {
        return undefined;
    }
    const parsed = parse(value, DATE_FORMAT, new Date(0));
    return isValid(parsed) ? parsed : undefined;
}

export function isCalendarDate(value: string): boolean {
    return parseCalendarDate(value) !== undefined;
}
