import { describe, expect, it } from 'vitest';
import { DateUtils } from './DateUtils';

describe('DateUtils', () => {
    it('counts calendar days across a month boundary', () => {
        expect(DateUtils.getDiffDays('2025-01-28', '2025-02-03')).toBe(6);
        expect(DateUtils.getDiffDays('2025-02-03', '2025-01-28')).toBe(-6);
    });

    it('adds days and formats as YYYY-MM-DD', () => {
        expect(DateUtils.addDays('2024-02-28', 1)).toBe('2024-02-29');
        expect(DateUtils.addDays('2025-02-28', 1)).toBe('2025-03-01');
    });

    it('rejects dates that do not exist', () => {
        expect(DateUtils.isValidDateString('2025-02-30')).toBe(false);
        expect(DateUtils.isValidDateString('2025-2-3')).toBe(false);
        expect(DateUtils.isValidDateString('2024-02-29')).toBe(true);
    });

    it('resolves month bounds', () => {
        expect(DateUtils.getMonthRange('2024-02')).toEqual({ start: '2024-02-01', end: '2024-02-29' });
        expect(DateUtils.getMonthStart('2025-03-17')).toBe('2025-03-01');
        expect(DateUtils.getMonthsElapsed('2025-01-31', '2025-03-01')).toBe(2);
    });

    it('measures days until a date from a fixed now', () => {
        expect(DateUtils.daysUntil('2025-01-10', new Date(2025, 0, 3, 15, 30))).toBe(7);
    });
});
