import type { Overlap, PriorityBand, PriorityFactorId, Task, TaskPriority } from '../../types';
import type { CategoryRegistry } from '../../constants/categoryRegistry';
import { DateUtils } from '../../utils/DateUtils';
import { PRIORITY_FACTORS, type PriorityContext, type PriorityFactor } from './PriorityFactors';

const MILESTONE_MARKER = 'MILESTONE';

/** Score at which a task reaches full base weight. */
const FULL_WEIGHT_SCORE = 15;
const NEUTRAL_CATEGORY_WEIGHT = 5;

const BAND_THRESHOLDS: ReadonlyArray<readonly [number, PriorityBand]> = [
    [15, 'CRITICAL'],
    [10, 'HIGH'],
    [6, 'MEDIUM'],
    [3, 'LOW'],
];

export const URGENCY_MULTIPLIER: Readonly<Record<PriorityBand, number>> = {
    CRITICAL: 1.0,
    HIGH: 0.8,
    MEDIUM: 0.6,
    LOW: 0.4,
    MINIMAL: 0.2,
};

export interface ScoringInput {
    now: Date;
    overlapsByTask: ReadonlyMap<string, readonly Overlap[]>;
}

function clamp01(value: number): number {
    return Math.min(1, Math.max(0, value));
}

/**
 * Turns a task plus its overlaps into a priority score, visual weight and prominence.
 */
export class PriorityScorer {
    constructor(
        private readonly categories: CategoryRegistry,
        private readonly factors: readonly PriorityFactor[] = PRIORITY_FACTORS,
    ) {}

    static nameSignalsMilestone(task: Task): boolean {
        return task.name.toUpperCase().includes(MILESTONE_MARKER);
    }

    isMilestone(task: Task): boolean {
        return PriorityScorer.nameSignalsMilestone(task) || this.categories.resolve(task.category).milestone === true;
    }

    static bandFor(score: number): PriorityBand {
        for (const [threshold, band] of BAND_THRESHOLDS) {
            if (score >= threshold) return band;
        }
        return 'MINIMAL';
    }

    score(task: Task, input: ScoringInput): TaskPriority {
        const context: PriorityContext = {
            now: input.now,
            overlapsByTask: input.overlapsByTask,
            isMilestone: (t) => this.isMilestone(t),
        };

        // 1. Weighted factor score
        const factors: Record<PriorityFactorId, number> = { importance: 0, timeline: 0, conflict: 0, milestone: 0 };
        let weighted = 0;
        let totalWeight = 0;
        for (const factor of this.factors) {
            const value = factor.compute(task, context);
            factors[factor.id] = value;
            weighted += value * factor.weight;
            totalWeight += factor.weight;
        }
        const score = totalWeight > 0 ? weighted / totalWeight : 0;
        const band = PriorityScorer.bandFor(score);

        // 2. Visual weight
        const category = this.categories.resolve(task.category);
        const baseWeight = clamp01(score / FULL_WEIGHT_SCORE);
        const duration = DateUtils.getDiffDays(task.startDate, task.endDate);
        let visualWeight = baseWeight;
        if (duration > 7) visualWeight *= 1.2;
        else if (duration < 1) visualWeight *= 0.8;
        visualWeight *= category.priorityWeight / NEUTRAL_CATEGORY_WEIGHT;
        if (PriorityScorer.nameSignalsMilestone(task)) visualWeight *= 1.5;
        visualWeight = clamp01(visualWeight);

        // 3. Prominence
        let prominence = visualWeight * URGENCY_MULTIPLIER[band];
        if (category.milestone) prominence *= 1.2;
        prominence = clamp01(prominence);

        return {
            taskId: task.id,
            score,
            factors,
            band,
            baseWeight,
            visualWeight,
            prominence,
            isMilestone: this.isMilestone(task),
        };
    }

    scoreAll(tasks: readonly Task[], input: ScoringInput): Map<string, TaskPriority> {
        const result = new Map<string, TaskPriority>();
        for (const task of tasks) {
            result.set(task.id, this.score(task, input));
        }
        return result;
    }

    static indexOverlaps(overlaps: readonly Overlap[]): Map<string, Overlap[]> {
        const index = new Map<string, Overlap[]>();
        for (const overlap of overlaps) {
            for (const id of [overlap.task1Id, overlap.task2Id]) {
                const list = index.get(id);
                if (list) list.push(overlap);
                else index.set(id, [overlap]);
            }
        }
        return index;
    }
}
