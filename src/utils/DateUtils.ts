import {
    addDays,
    differenceInCalendarDays,
    differenceInCalendarMonths,
    endOfMonth,
    format,
    isSameMonth,
    isValid,
    parseISO,
    startOfMonth,
} from 'date-fns';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_KEY_PATTERN = /^\d{4}-\d{2}$/;

/**
 * Calendar-day helpers. All dates are local YYYY-MM-DD strings.
 */
export class DateUtils {
    static parse(date: string): Date {
        return parseISO(date);
    }

    static getLocalDateString(date: Date): string {
        return format(date, 'yyyy-MM-dd');
    }

    static isValidDateString(value: string): boolean {
        // parseISO rolls 2025-02-30 over to March, so compare the round trip too
        if (!DATE_PATTERN.test(value)) return false;
        const parsed = parseISO(value);
        return isValid(parsed) && this.getLocalDateString(parsed) === value;
    }

    /** Calendar days from `from` to `to` (negative when `to` is earlier). */
    static getDiffDays(from: string, to: string): number {
        return differenceInCalendarDays(parseISO(to), parseISO(from));
    }

    static addDays(date: string, days: number): string {
        return this.getLocalDateString(addDays(parseISO(date), days));
    }

    /** Calendar days from the day of `now` to `date`. */
    static daysUntil(date: string, now: Date): number {
        return differenceInCalendarDays(parseISO(date), now);
    }

    static getMonthKey(date: string): string {
        return date.slice(0, 7);
    }

    static isValidMonthKey(value: string): boolean {
        return MONTH_KEY_PATTERN.test(value) && this.isValidDateString(`${value}-01`);
    }

    static getMonthsElapsed(from: string, to: string): number {
        return differenceInCalendarMonths(parseISO(to), parseISO(from));
    }

    static isSameMonth(a: string, b: string): boolean {
        return isSameMonth(parseISO(a), parseISO(b));
    }

    static getMonthStart(date: string): string {
        return this.getLocalDateString(startOfMonth(parseISO(date)));
    }

    static getMonthEnd(date: string): string {
        return this.getLocalDateString(endOfMonth(parseISO(date)));
    }

    static getMonthRange(monthKey: string): { start: string, end: string } {
        const start = `${monthKey}-01`;
        return { start, end: this.getMonthEnd(start) };
    }

    static minDate(a: string, b: string): string {
        return a <= b ? a : b;
    }

    static maxDate(a: string, b: string): string {
        return a >= b ? a : b;
    }
}
