import { describe, expect, it } from 'vitest';
import { DEFAULT_GRID_CONFIG } from '../../types';
import { GridConfigError, createMonthConfig, resolveGridConfig } from './GridConfigSchema';

describe('resolveGridConfig', () => {
    it('fills missing fields from the defaults', () => {
        const config = resolveGridConfig({ dayWidth: 12 });
        expect(config).toEqual({ ...DEFAULT_GRID_CONFIG, dayWidth: 12 });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('rejects non-positive dimensions', () => {
        expect(() => resolveGridConfig({ dayWidth: 0 })).toThrow(GridConfigError);
        expect(() => resolveGridConfig({ maxRowsPerDay: 1.5 })).toThrow(GridConfigError);
    });

    it('reports every issue with its field path', () => {
        try {
            resolveGridConfig({ rowHeight: -1, calendarStart: '2025-02-30' });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(GridConfigError);
            if (err instanceof GridConfigError) {
                expect(err.issues).toEqual([
                    'calendarStart: Must be a valid YYYY-MM-DD date',
                    'rowHeight: Number must be greater than 0',
                ]);
                expect(err.message.startsWith('[GridConfig] Invalid grid configuration')).toBe(true);
            }
        }
    });

    it('rejects inverted spacing bounds and calendar ranges', () => {
        expect(() => resolveGridConfig({ minTaskSpacing: 5, maxTaskSpacing: 2 }))
            .toThrow('maxTaskSpacing: maxTaskSpacing must be at least minTaskSpacing');
        expect(() => resolveGridConfig({ calendarStart: '2025-06-01', calendarEnd: '2025-05-31' }))
            .toThrow('calendarEnd: calendarEnd must not be before calendarStart');
    });
});

describe('createMonthConfig', () => {
    it('narrows the calendar to one month', () => {
        const config = createMonthConfig({ dayWidth: 10 }, '2024-02');
        expect(config.calendarStart).toBe('2024-02-01');
        expect(config.calendarEnd).toBe('2024-02-29');
        expect(config.dayWidth).toBe(10);
    });

    it('rejects malformed month keys', () => {
        expect(() => createMonthConfig({}, '2024-2')).toThrow(GridConfigError);
    });
});
