import type { GridConfig, Task, TaskBar, TaskPriority } from '../../types';
import { DateUtils } from '../../utils/DateUtils';
import type { BarStyleResolver } from '../styling/BarStyleResolver';
import type { PlacementRuleEngine, PlacementSubject } from './PlacementRuleEngine';

/** One task with everything decided before it gets coordinates. */
export interface Placement {
    task: Task;
    priority: TaskPriority;
    row: number;
    stackIndex: number;
    groupId: string;
}

export function horizontalOverlap(a: TaskBar, b: TaskBar): boolean {
    return a.x < b.x + b.width && b.x < a.x + a.width;
}

/**
 * Maps placements to grid rectangles: clipping, alignment, spacing and snapping.
 */
export class SpatialPositioner {
    constructor(
        private readonly config: Readonly<GridConfig>,
        private readonly rules: PlacementRuleEngine,
        private readonly styles: BarStyleResolver,
    ) {}

    /** Left edge of a day column. */
    xOf(date: string): number {
        const { calendarStart, dayWidth, monthBoundaryGap } = this.config;
        return DateUtils.getDiffDays(calendarStart, date) * dayWidth
            + DateUtils.getMonthsElapsed(calendarStart, date) * monthBoundaryGap;
    }

    /** Right edge of a day column. */
    endXOf(date: string): number {
        return this.xOf(date) + this.config.dayWidth;
    }

    /** Horizontal extent of an inclusive date range, snapped when snapping is on. */
    columnSpan(startDate: string, endDate: string): { x: number, width: number } {
        const left = this.snapValue(this.xOf(startDate));
        const right = this.snapValue(this.endXOf(endDate));
        return { x: left, width: right - left };
    }

    private snapValue(value: number): number {
        if (!this.config.snapToGrid) return value;
        const resolution = this.config.gridResolution;
        return Math.round(value / resolution) * resolution;
    }

    position(placements: readonly Placement[]): TaskBar[] {
        const subjects = new Map<string, PlacementSubject>();
        const bars: TaskBar[] = [];

        for (const placement of placements) {
            const bar = this.placeBar(placement);
            if (!bar) continue;
            bars.push(bar);
            subjects.set(bar.taskId, {
                priority: placement.task.priority,
                isMilestone: placement.priority.isMilestone,
            });
        }

        this.applySpacing(bars, subjects);
        if (this.config.snapToGrid) {
            for (const bar of bars) {
                bar.y = this.snapValue(bar.y);
                bar.height = Math.max(this.config.gridResolution, this.snapValue(bar.height));
            }
        }
        return bars;
    }

    private placeBar(placement: Placement): TaskBar | null {
        const { task, priority } = placement;
        const { calendarStart, calendarEnd, dayHeight, rowHeight } = this.config;

        // 1. Clip to the calendar
        if (task.endDate < calendarStart || task.startDate > calendarEnd) return null;
        const startDate = DateUtils.maxDate(task.startDate, calendarStart);
        const endDate = DateUtils.minDate(task.endDate, calendarEnd);

        // 2. Alignment
        const rule = this.rules.resolveAlignment({ priority: task.priority, isMilestone: priority.isMilestone });
        const offset = rule ? rule.offsetRatio * dayHeight : 0;

        // 3. Size
        const { x, width } = this.columnSpan(startDate, endDate);
        const height = Math.min(rowHeight, Math.max(rowHeight * 0.5, rowHeight * priority.visualWeight));

        return {
            taskId: task.id,
            segmentId: task.id,
            monthKey: DateUtils.getMonthKey(startDate),
            startDate,
            endDate,
            x,
            y: offset + placement.row * rowHeight,
            width,
            height,
            row: placement.row,
            stackIndex: placement.stackIndex,
            groupId: placement.groupId,
            ...this.styles.resolve(task.category, priority.prominence),
            priority: task.priority,
            visualWeight: priority.visualWeight,
            prominence: priority.prominence,
            alignment: rule ? rule.alignment : 'left',
            isContinuation: task.startDate < calendarStart,
            isStart: task.startDate >= calendarStart,
            isEnd: task.endDate <= calendarEnd,
            crossesMonthBoundary: !DateUtils.isSameMonth(startDate, endDate),
            segmentIndex: 0,
            segmentCount: 1,
        };
    }

    /**
     * Pushes a bar down when it sits closer than the spacing rule allows
     * to a bar above it in the same day columns. Overlapping bars are left
     * to collision resolution.
     */
    private applySpacing(bars: TaskBar[], subjects: ReadonlyMap<string, PlacementSubject>): void {
        const { minTaskSpacing, maxTaskSpacing } = this.config;
        const ordered = bars.slice().sort((a, b) => {
            if (a.y !== b.y) return a.y - b.y;
            if (a.x !== b.x) return a.x - b.x;
            return a.taskId.localeCompare(b.taskId);
        });

        for (let i = 0; i < ordered.length; i++) {
            for (let j = i + 1; j < ordered.length; j++) {
                const upper = ordered[i];
                const lower = ordered[j];
                if (!horizontalOverlap(upper, lower)) continue;

                const upperSubject = subjects.get(upper.taskId);
                const lowerSubject = subjects.get(lower.taskId);
                if (!upperSubject || !lowerSubject) continue;

                const rule = this.rules.resolveSpacing(upperSubject, lowerSubject);
                if (!rule) continue;

                const required = Math.min(maxTaskSpacing, minTaskSpacing * rule.spacingFactor);
                const gap = lower.y - (upper.y + upper.height);
                if (gap >= 0 && gap < required) {
                    lower.y += required - gap;
                }
            }
        }
    }
}
