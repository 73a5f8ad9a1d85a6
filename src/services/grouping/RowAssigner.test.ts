import { afterEach, describe, expect, it, vi } from 'vitest';
import { makeTask } from '../../testUtils/makeTask';
import { RowAssigner } from './RowAssigner';

const ORIGIN = '2025-01-01';
const flat = () => 0.5;

describe('RowAssigner', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('stacks overlapping tasks and reuses freed rows', () => {
        const tasks = [
            makeTask('A', '2025-01-01', '2025-01-05'),
            makeTask('B', '2025-01-03', '2025-01-08'),
            makeTask('C', '2025-01-06', '2025-01-07'),
        ];

        const result = new RowAssigner(3).assign(tasks, flat, ORIGIN);

        expect(result.assignments.map(a => [a.task.id, a.row])).toEqual([['A', 0], ['B', 1], ['C', 0]]);
        expect(result.rows).toBe(2);
        expect(result.unconstrainedRows).toBe(2);
        expect(result.overflowCount).toBe(0);
    });

    it('keeps same-day neighbours apart', () => {
        const tasks = [
            makeTask('A', '2025-01-04', '2025-01-04'),
            makeTask('B', '2025-01-04', '2025-01-04'),
        ];
        const result = new RowAssigner(3).assign(tasks, flat, ORIGIN);
        expect(result.assignments.map(a => a.row)).toEqual([0, 1]);
    });

    it('folds overflow onto row 0 and never exceeds the row cap', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const tasks = ['1', '2', '3', '4', '5'].map(id => makeTask(id, '2025-01-10', '2025-01-10'));

        const result = new RowAssigner(3).assign(tasks, flat, ORIGIN);

        expect(result.assignments.map(a => a.row)).toEqual([0, 1, 2, 0, 0]);
        expect(result.assignments.filter(a => a.overflowed).map(a => a.task.id)).toEqual(['4', '5']);
        expect(result.rows).toBe(3);
        expect(result.unconstrainedRows).toBe(5);
        expect(result.overflowCount).toBe(2);
        expect(warn).toHaveBeenCalledWith('[RowAssigner] 2 task(s) exceeded 3 rows and were placed on row 0');
    });

    it('gives the lowest rows to the most prominent of tasks starting together', () => {
        const prominence: Record<string, number> = { low: 0.2, high: 0.9 };
        const tasks = [
            makeTask('low', '2025-02-01', '2025-02-20'),
            makeTask('high', '2025-02-01', '2025-02-01'),
        ];

        const result = new RowAssigner(3).assign(tasks, t => prominence[t.id] ?? 0, ORIGIN);

        expect(result.assignments.map(a => [a.task.id, a.row, a.stackIndex])).toEqual([
            ['high', 0, 0],
            ['low', 1, 1],
        ]);
    });
});
