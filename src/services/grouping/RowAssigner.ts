import type { Task } from '../../types';
import { DateUtils } from '../../utils/DateUtils';
import { TaskSorter, type TaskComparator } from '../sort/TaskSorter';

export interface RowAssignment {
    task: Task;
    row: number;
    /** Position in the group's stacking order (0 = most prominent among same-start tasks) */
    stackIndex: number;
    overflowed: boolean;
}

export interface RowAssignmentResult {
    assignments: RowAssignment[];
    rows: number;
    unconstrainedRows: number;
    overflowCount: number;
}

/**
 * Greedy first-fit row assignment within one temporal group.
 * Rows store their exclusive end day; a task fits when the row ended on or before its start.
 */
export class RowAssigner {
    constructor(private readonly maxRowsPerDay: number) {}

    assign(tasks: readonly Task[], prominenceOf: (task: Task) => number, origin: string): RowAssignmentResult {
        const byProminence: TaskComparator = (a, b) => prominenceOf(b) - prominenceOf(a);
        const sorted = tasks.slice().sort(
            TaskSorter.chain(TaskSorter.byStart, byProminence, TaskSorter.bySpanDesc, TaskSorter.byId),
        );

        const rowEnds: number[] = [];
        const assignments: RowAssignment[] = [];
        let overflowCount = 0;

        sorted.forEach((task, stackIndex) => {
            const startDay = DateUtils.getDiffDays(origin, task.startDate);
            const endDay = DateUtils.getDiffDays(origin, task.endDate) + 1;

            let row = rowEnds.findIndex(rowEnd => rowEnd <= startDay);
            let overflowed = false;

            if (row === -1 && rowEnds.length < this.maxRowsPerDay) {
                row = rowEnds.length;
                rowEnds.push(endDay);
            } else if (row === -1) {
                // Out of rows: fold onto row 0 and let the caller report it
                row = 0;
                overflowed = true;
                overflowCount++;
                rowEnds[0] = Math.max(rowEnds[0], endDay);
            } else {
                rowEnds[row] = endDay;
            }

            assignments.push({ task, row, stackIndex, overflowed });
        });

        if (overflowCount > 0) {
            console.warn(`[RowAssigner] ${overflowCount} task(s) exceeded ${this.maxRowsPerDay} rows and were placed on row 0`);
        }

        return {
            assignments,
            rows: rowEnds.length,
            unconstrainedRows: RowAssigner.countRows(sorted, origin),
            overflowCount,
        };
    }

    /** Rows the same greedy pass needs when nothing caps it. */
    static countRows(tasks: readonly Task[], origin: string): number {
        const rowEnds: number[] = [];
        for (const task of tasks) {
            const startDay = DateUtils.getDiffDays(origin, task.startDate);
            const endDay = DateUtils.getDiffDays(origin, task.endDate) + 1;
            const row = rowEnds.findIndex(rowEnd => rowEnd <= startDay);
            if (row === -1) {
                rowEnds.push(endDay);
            } else {
                rowEnds[row] = endDay;
            }
        }
        return rowEnds.length;
    }
}
