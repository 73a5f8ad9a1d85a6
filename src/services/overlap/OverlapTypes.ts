import type {
    ConflictCategoryCounts,
    OverlapSeverity,
    OverlapType,
    SeverityCounts,
} from '../../types';

/** Highest first. */
export const SEVERITY_ORDER: readonly OverlapSeverity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'NONE'];

export function severityRank(severity: OverlapSeverity): number {
    return SEVERITY_ORDER.indexOf(severity);
}

export function maxSeverity(severities: Iterable<OverlapSeverity>): OverlapSeverity {
    let max: OverlapSeverity = 'NONE';
    for (const severity of severities) {
        if (severityRank(severity) < severityRank(max)) max = severity;
    }
    return max;
}

export function emptySeverityCounts(): SeverityCounts {
    return { NONE: 0, LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
}

export function emptyCategoryCounts(): ConflictCategoryCounts {
    return {
        SCHEDULE_CONFLICT: 0,
        PRIORITY_CONFLICT: 0,
        ASSIGNEE_CONFLICT: 0,
        CATEGORY_CONFLICT: 0,
        MILESTONE_CONFLICT: 0,
        DEADLINE_CONFLICT: 0,
        TIMELINE_CONFLICT: 0,
    };
}

// Partial overlaps are graded by the share of the shorter task they cover
export const PARTIAL_HIGH_RATIO = 0.8;
export const PARTIAL_MEDIUM_RATIO = 0.5;

type OverlapText = {
    reason: (first: string, second: string) => string;
    hint: string;
};

export const OVERLAP_TEXT: Readonly<Record<OverlapType, OverlapText>> = {
    IDENTICAL: {
        reason: (a, b) => `Tasks ${a} and ${b} have identical schedules`,
        hint: "Consider merging tasks or adjusting one task's schedule",
    },
    NESTED: {
        reason: (inner, outer) => `Task ${inner} is completely contained within task ${outer}`,
        hint: 'Consider making the nested task a subtask or adjusting schedules',
    },
    COMPLETE: {
        reason: (a, b) => `Tasks ${a} and ${b} have complete schedule overlap`,
        hint: 'Tasks cannot run simultaneously - reschedule one task',
    },
    PARTIAL: {
        reason: (a, b) => `Tasks ${a} and ${b} have partial schedule overlap`,
        hint: 'Consider adjusting start/end dates to reduce overlap',
    },
    ADJACENT: {
        reason: (a, b) => `Tasks ${a} and ${b} are adjacent in schedule`,
        hint: 'Consider adding buffer time between tasks',
    },
    NONE: {
        reason: (a, b) => `Tasks ${a} and ${b} have unknown overlap type`,
        hint: 'Review task schedules for potential conflicts',
    },
};
