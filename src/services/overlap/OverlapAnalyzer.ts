import type {
    CategorizedConflict,
    Overlap,
    OverlapAnalysis,
    OverlapSeverity,
    OverlapType,
    SeverityCounts,
    Task,
} from '../../types';
import { DateUtils } from '../../utils/DateUtils';
import { TaskSorter } from '../sort/TaskSorter';
import {
    OVERLAP_TEXT,
    PARTIAL_HIGH_RATIO,
    PARTIAL_MEDIUM_RATIO,
    emptyCategoryCounts,
    emptySeverityCounts,
    maxSeverity,
    severityRank,
} from './OverlapTypes';

const HOURS_PER_DAY = 24;

export interface GroupOverlapSummary {
    overlaps: Overlap[];
    maxSeverity: OverlapSeverity;
    severityCounts: SeverityCounts;
    resolution: string;
}

/**
 * Classifies pairwise task overlaps and summarizes them per group.
 * Tasks occupy whole days: [startDate, endDate + 1).
 */
export class OverlapAnalyzer {
    constructor(private readonly thresholdHours: number) {}

    analyzePair(a: Task, b: Task): Overlap | null {
        const sharedStart = DateUtils.maxDate(a.startDate, b.startDate);
        const sharedEnd = DateUtils.minDate(a.endDate, b.endDate);
        const overlapDays = DateUtils.getDiffDays(sharedStart, sharedEnd) + 1;
        if (overlapDays < 0) return null;

        const durationHours = overlapDays * HOURS_PER_DAY;
        if (durationHours < this.thresholdHours) return null;

        const type = OverlapAnalyzer.classify(a, b, overlapDays);
        const severity = OverlapAnalyzer.severityOf(type, overlapDays, a, b);
        const { reason, hint } = OverlapAnalyzer.describe(type, severity, a, b);

        return {
            task1Id: a.id,
            task2Id: b.id,
            type,
            severity,
            startDate: sharedStart,
            // Touching ranges share no day; report the boundary day
            endDate: overlapDays > 0 ? sharedEnd : sharedStart,
            overlapDays,
            durationHours,
            priority: Math.max(a.priority, b.priority),
            conflictReason: reason,
            resolutionHint: hint,
        };
    }

    static classify(a: Task, b: Task, overlapDays: number): OverlapType {
        const sharedStart = DateUtils.maxDate(a.startDate, b.startDate);
        const sharedEnd = DateUtils.minDate(a.endDate, b.endDate);

        if (a.startDate === b.startDate && a.endDate === b.endDate) return 'IDENTICAL';
        if (OverlapAnalyzer.contains(a, b) || OverlapAnalyzer.contains(b, a)) return 'NESTED';
        if (overlapDays === 0) return 'ADJACENT';
        // Same condition as IDENTICAL; kept so the precedence stays explicit
        if (sharedStart === a.startDate && sharedEnd === a.endDate
            && sharedStart === b.startDate && sharedEnd === b.endDate) return 'COMPLETE';
        return 'PARTIAL';
    }

    static severityOf(type: OverlapType, overlapDays: number, a: Task, b: Task): OverlapSeverity {
        switch (type) {
            case 'IDENTICAL':
                return 'CRITICAL';
            case 'NESTED':
            case 'COMPLETE':
                return 'HIGH';
            case 'PARTIAL': {
                const ratio = overlapDays / Math.min(TaskSorter.span(a), TaskSorter.span(b));
                if (ratio >= PARTIAL_HIGH_RATIO) return 'HIGH';
                if (ratio >= PARTIAL_MEDIUM_RATIO) return 'MEDIUM';
                return 'LOW';
            }
            case 'ADJACENT':
                return 'LOW';
            case 'NONE':
                return 'NONE';
        }
    }

    private static contains(outer: Task, inner: Task): boolean {
        return outer.startDate <= inner.startDate && outer.endDate >= inner.endDate;
    }

    private static describe(type: OverlapType, severity: OverlapSeverity, a: Task, b: Task): { reason: string, hint: string } {
        const text = OVERLAP_TEXT[type];
        let reason: string;
        if (type === 'NESTED') {
            const [inner, outer] = OverlapAnalyzer.contains(a, b) ? [b, a] : [a, b];
            reason = text.reason(inner.id, outer.id);
        } else {
            reason = text.reason(a.id, b.id);
        }
        let hint = text.hint;

        if (severity === 'CRITICAL') {
            reason += ' (CRITICAL)';
            hint = `URGENT: ${hint}`;
        } else if (severity === 'HIGH') {
            reason += ' (HIGH)';
            hint = `Important: ${hint}`;
        }
        return { reason, hint };
    }

    /** Every unordered pair of the group, most severe first. */
    analyzeGroup(tasks: readonly Task[]): GroupOverlapSummary {
        const overlaps: Overlap[] = [];
        for (let i = 0; i < tasks.length; i++) {
            for (let j = i + 1; j < tasks.length; j++) {
                const overlap = this.analyzePair(tasks[i], tasks[j]);
                if (overlap) overlaps.push(overlap);
            }
        }
        OverlapAnalyzer.sortOverlaps(overlaps);

        const severityCounts = OverlapAnalyzer.countSeverities(overlaps);
        return {
            overlaps,
            maxSeverity: maxSeverity(overlaps.map(o => o.severity)),
            severityCounts,
            resolution: OverlapAnalyzer.resolutionSummary(overlaps.length, severityCounts),
        };
    }

    static sortOverlaps(overlaps: Overlap[]): void {
        overlaps.sort((a, b) => {
            const rank = severityRank(a.severity) - severityRank(b.severity);
            if (rank !== 0) return rank;
            if (a.priority !== b.priority) return b.priority - a.priority;
            const first = a.task1Id.localeCompare(b.task1Id);
            if (first !== 0) return first;
            return a.task2Id.localeCompare(b.task2Id);
        });
    }

    static countSeverities(overlaps: readonly Overlap[]): SeverityCounts {
        const counts = emptySeverityCounts();
        for (const overlap of overlaps) counts[overlap.severity]++;
        return counts;
    }

    static resolutionSummary(total: number, counts: SeverityCounts): string {
        if (total === 0) return 'No conflicts detected';
        if (counts.CRITICAL > 0) return `URGENT: ${counts.CRITICAL} critical conflicts require immediate attention`;
        if (counts.HIGH > 0) return `Important: ${counts.HIGH} high-priority conflicts need resolution`;
        return `Moderate: ${total} conflicts can be addressed during planning`;
    }

    /** Run-wide totals across all group summaries, with conflict categories when they are known. */
    static summarize(
        totalTasks: number,
        groups: readonly GroupOverlapSummary[],
        conflicts: readonly CategorizedConflict[] = [],
    ): OverlapAnalysis {
        const overlaps = groups.flatMap(g => g.overlaps);
        OverlapAnalyzer.sortOverlaps(overlaps);

        const involved = new Set<string>();
        for (const overlap of overlaps) {
            involved.add(overlap.task1Id);
            involved.add(overlap.task2Id);
        }
        const severityCounts = OverlapAnalyzer.countSeverities(overlaps);
        const conflictGroups = groups.filter(g => g.overlaps.length > 0).length;
        const categoryCounts = emptyCategoryCounts();
        for (const conflict of conflicts) categoryCounts[conflict.category]++;

        let summary: string;
        if (overlaps.length === 0) {
            summary = `No task overlaps detected in ${totalTasks} tasks`;
        } else {
            summary = `Detected ${overlaps.length} overlaps affecting ${involved.size} tasks`
                + ` (${severityCounts.CRITICAL} critical, ${severityCounts.HIGH} high,`
                + ` ${severityCounts.MEDIUM} medium, ${severityCounts.LOW} low)`
                + ` in ${conflictGroups} overlap groups`;
        }

        return {
            totalTasks,
            overlappingTasks: involved.size,
            totalOverlaps: overlaps.length,
            severityCounts,
            categoryCounts,
            overlaps,
            summary,
        };
    }

    static getOverlapsBySeverity(analysis: OverlapAnalysis, severity: OverlapSeverity): Overlap[] {
        return analysis.overlaps.filter(o => o.severity === severity);
    }

    static getOverlapsByType(analysis: OverlapAnalysis, type: OverlapType): Overlap[] {
        return analysis.overlaps.filter(o => o.type === type);
    }

    static hasCriticalOverlaps(analysis: OverlapAnalysis): boolean {
        return analysis.severityCounts.CRITICAL > 0;
    }
}
