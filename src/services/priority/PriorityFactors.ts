import type { Overlap, OverlapSeverity, PriorityFactorId, Task } from '../../types';
import { DateUtils } from '../../utils/DateUtils';

export interface PriorityContext {
    now: Date;
    overlapsByTask: ReadonlyMap<string, readonly Overlap[]>;
    isMilestone: (task: Task) => boolean;
}

export interface PriorityFactor {
    id: PriorityFactorId;
    weight: number;
    compute: (task: Task, context: PriorityContext) => number;
}

// ── Lookup tables ──

const CONFLICT_POINTS: Readonly<Record<OverlapSeverity, number>> = {
    CRITICAL: 10,
    HIGH: 7,
    MEDIUM: 4,
    LOW: 2,
    NONE: 0,
};

/** [maxDays, points] pairs, first match wins */
type Ladder = ReadonlyArray<readonly [number, number]>;

const START_URGENCY: Ladder = [[0, 10], [1, 8], [3, 6], [7, 4], [14, 2]];
const END_URGENCY: Ladder = [[0, 15], [1, 12], [3, 8], [7, 5], [14, 3]];
const DURATION_BONUS: Ladder = [[1, 0], [7, 1], [30, 2]];
const MILESTONE_PROXIMITY: Ladder = [[7, 10], [30, 5]];

function climb(ladder: Ladder, days: number, otherwise: number): number {
    for (const [maxDays, points] of ladder) {
        if (days <= maxDays) return points;
    }
    return otherwise;
}

function durationDays(task: Task): number {
    return DateUtils.getDiffDays(task.startDate, task.endDate);
}

// ── Factors ──

export const importanceFactor: PriorityFactor = {
    id: 'importance',
    weight: 0.35,
    compute: (task, ctx) => {
        let score = task.priority * 2;
        if (ctx.isMilestone(task)) score += 10;
        return score + climb(DURATION_BONUS, durationDays(task), 3);
    },
};

export const timelineFactor: PriorityFactor = {
    id: 'timeline',
    weight: 0.25,
    compute: (task, ctx) => {
        const untilStart = DateUtils.daysUntil(task.startDate, ctx.now);
        const untilEnd = DateUtils.daysUntil(task.endDate, ctx.now);
        return climb(START_URGENCY, untilStart, 0) + climb(END_URGENCY, untilEnd, 0);
    },
};

export const conflictFactor: PriorityFactor = {
    id: 'conflict',
    weight: 0.25,
    compute: (task, ctx) => {
        const overlaps = ctx.overlapsByTask.get(task.id) ?? [];
        return overlaps.reduce((sum, overlap) => sum + CONFLICT_POINTS[overlap.severity], 0);
    },
};

export const milestoneFactor: PriorityFactor = {
    id: 'milestone',
    weight: 0.15,
    compute: (task, ctx) => {
        if (!ctx.isMilestone(task)) return 0;
        let score = 15;
        if (task.priority >= 4) score += 5;
        return score + climb(MILESTONE_PROXIMITY, DateUtils.daysUntil(task.endDate, ctx.now), 0);
    },
};

export const PRIORITY_FACTORS: readonly PriorityFactor[] = [
    importanceFactor,
    timelineFactor,
    conflictFactor,
    milestoneFactor,
];
