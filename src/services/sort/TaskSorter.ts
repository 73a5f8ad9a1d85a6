import type { Task } from '../../types';
import { DateUtils } from '../../utils/DateUtils';

export type TaskComparator = (a: Task, b: Task) => number;

/**
 * Comparator chains for task ordering. Every chain ends on the task id so
 * orderings never depend on input order.
 */
export class TaskSorter {
    static span(task: Task): number {
        return DateUtils.getDiffDays(task.startDate, task.endDate) + 1;
    }

    static byStart: TaskComparator = (a, b) => a.startDate.localeCompare(b.startDate);

    static bySpanDesc: TaskComparator = (a, b) => TaskSorter.span(b) - TaskSorter.span(a);

    static byId: TaskComparator = (a, b) => a.id.localeCompare(b.id);

    static chain(...comparators: TaskComparator[]): TaskComparator {
        return (a, b) => {
            for (const compare of comparators) {
                const cmp = compare(a, b);
                if (cmp !== 0) return cmp;
            }
            return 0;
        };
    }

    /** Start ASC, span DESC, id ASC. Returns a new array. */
    static defaultSort(tasks: readonly Task[]): Task[] {
        return tasks.slice().sort(TaskSorter.chain(TaskSorter.byStart, TaskSorter.bySpanDesc, TaskSorter.byId));
    }
}
