import type { GridConfig, TaskBar } from '../../types';
import { CollisionResolver } from '../positioning/CollisionResolver';

/**
 * Collects layout issues for one run. Issues are reported, never thrown.
 */
export class LayoutValidator {
    private issues: string[] = [];

    constructor(private readonly config: Readonly<GridConfig>) {}

    addIssue(issue: string): void {
        this.issues.push(issue);
    }

    clearIssues(): void {
        this.issues = [];
    }

    getIssues(): string[] {
        return this.issues.slice();
    }

    validate(bars: readonly TaskBar[]): void {
        // Same row and month, overlapping rectangles
        for (let i = 0; i < bars.length; i++) {
            for (let j = i + 1; j < bars.length; j++) {
                const a = bars[i];
                const b = bars[j];
                if (a.row !== b.row || a.monthKey !== b.monthKey) continue;
                if (CollisionResolver.overlapsStrictly(a, b)) {
                    this.addIssue(`Task bars overlap in row ${a.row}: ${a.taskId} and ${b.taskId}`);
                }
            }
        }

        for (const bar of bars) {
            if (bar.y + bar.height > this.config.dayHeight) {
                this.addIssue(`Task bar ${bar.segmentId} extends below the day cell`);
            }
        }
    }
}
