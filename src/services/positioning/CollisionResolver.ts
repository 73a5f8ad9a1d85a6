import type { TaskBar } from '../../types';
import { horizontalOverlap } from './SpatialPositioner';

export interface CollisionResult {
    bars: TaskBar[];
    resolved: number;
    /** Bars still overlapping after the pass */
    residual: number;
}

/**
 * Single-pass collision resolution. The more prominent bar of a colliding
 * pair keeps its place and the other one moves below it.
 */
export class CollisionResolver {
    constructor(private readonly buffer: number) {}

    collides(a: TaskBar, b: TaskBar): boolean {
        return horizontalOverlap(a, b)
            && a.y < b.y + b.height + this.buffer
            && b.y < a.y + a.height + this.buffer;
    }

    static overlapsStrictly(a: TaskBar, b: TaskBar): boolean {
        return horizontalOverlap(a, b) && a.y < b.y + b.height && b.y < a.y + a.height;
    }

    resolve(input: readonly TaskBar[]): CollisionResult {
        const bars = input.map(bar => ({ ...bar }));
        const ordered = bars.slice().sort((a, b) => {
            if (a.prominence !== b.prominence) return b.prominence - a.prominence;
            if (a.priority !== b.priority) return b.priority - a.priority;
            return a.segmentId.localeCompare(b.segmentId);
        });

        let resolved = 0;
        for (let i = 0; i < ordered.length; i++) {
            for (let j = i + 1; j < ordered.length; j++) {
                const winner = ordered[i];
                const loser = ordered[j];
                if (this.collides(winner, loser)) {
                    loser.y = winner.y + winner.height + this.buffer;
                    resolved++;
                }
            }
        }

        return { bars, resolved, residual: CollisionResolver.countOverlaps(bars) };
    }

    static countOverlaps(bars: readonly TaskBar[]): number {
        let count = 0;
        for (let i = 0; i < bars.length; i++) {
            for (let j = i + 1; j < bars.length; j++) {
                if (CollisionResolver.overlapsStrictly(bars[i], bars[j])) count++;
            }
        }
        return count;
    }
}
