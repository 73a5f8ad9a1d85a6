import type { TaskBar } from '../../types';
import { DateUtils } from '../../utils/DateUtils';
import { TaskIdGenerator } from '../../utils/TaskIdGenerator';

/** Grid columns for a date range; implemented by SpatialPositioner. */
export interface ColumnMapper {
    columnSpan(startDate: string, endDate: string): { x: number, width: number };
}

/**
 * Splits bars that cross month boundaries into one segment per month.
 */
export class MonthBoundarySegmenter {
    constructor(private readonly columns: ColumnMapper) {}

    segment(bar: TaskBar): TaskBar[] {
        if (DateUtils.isSameMonth(bar.startDate, bar.endDate)) {
            return [bar];
        }

        // 1. Month-sized date ranges
        const ranges: Array<{ start: string, end: string }> = [];
        let cursor = bar.startDate;
        while (cursor <= bar.endDate) {
            const end = DateUtils.minDate(DateUtils.getMonthEnd(cursor), bar.endDate);
            ranges.push({ start: cursor, end });
            cursor = DateUtils.addDays(end, 1);
        }

        // 2. One bar per range
        const last = ranges.length - 1;
        return ranges.map((range, index) => ({
            ...bar,
            ...this.columns.columnSpan(range.start, range.end),
            segmentId: TaskIdGenerator.makeSegmentId(bar.taskId, range.start),
            monthKey: DateUtils.getMonthKey(range.start),
            startDate: range.start,
            endDate: range.end,
            isContinuation: index === 0 ? bar.isContinuation : true,
            isStart: index === 0 && bar.isStart,
            isEnd: index === last && bar.isEnd,
            crossesMonthBoundary: false,
            segmentIndex: index,
            segmentCount: ranges.length,
        }));
    }

    segmentAll(bars: readonly TaskBar[]): TaskBar[] {
        return bars.flatMap(bar => this.segment(bar));
    }

    static barsForMonth(bars: readonly TaskBar[], monthKey: string): TaskBar[] {
        return bars.filter(bar => bar.monthKey === monthKey);
    }
}
