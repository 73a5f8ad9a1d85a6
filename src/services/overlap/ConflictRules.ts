import type {
    ConflictCategory,
    ConflictResolution,
    OverlapType,
} from '../../types';

// ── Conditions ──

export type ConflictCondition =
    | { kind: 'overlapType'; type: OverlapType }
    | { kind: 'bothPriorityAtLeast'; threshold: number }
    | { kind: 'sameAssignee' }
    | { kind: 'sameCategory' }
    | { kind: 'eitherMilestone' }
    /** Either task ends within `days` of now and either has at least `minPriority` */
    | { kind: 'dueWithin'; days: number; minPriority: number }
    /** Shared days over the first task's span */
    | { kind: 'overlapShareAtLeast'; ratio: number };

// ── Rules ──

export interface ConflictRule {
    name: string;
    description: string;
    /** Higher wins when several rules match */
    priority: number;
    condition: ConflictCondition;
    category: ConflictCategory;
}

export const FALLBACK_RULE_NAME = 'Generic schedule conflict';

export const DEFAULT_CONFLICT_RULES: readonly ConflictRule[] = [
    {
        name: 'Identical schedule',
        description: 'Tasks have identical start and end dates',
        priority: 1,
        condition: { kind: 'overlapType', type: 'IDENTICAL' },
        category: 'SCHEDULE_CONFLICT',
    },
    {
        name: 'High priority overlap',
        description: 'Both tasks have priority 3 or more',
        priority: 2,
        condition: { kind: 'bothPriorityAtLeast', threshold: 3 },
        category: 'PRIORITY_CONFLICT',
    },
    {
        name: 'Same assignee',
        description: 'Both tasks are assigned to the same person',
        priority: 3,
        condition: { kind: 'sameAssignee' },
        category: 'ASSIGNEE_CONFLICT',
    },
    {
        name: 'Same category',
        description: 'Both tasks belong to the same category',
        priority: 4,
        condition: { kind: 'sameCategory' },
        category: 'CATEGORY_CONFLICT',
    },
    {
        name: 'Milestone overlap',
        description: 'One or both tasks are milestones',
        priority: 5,
        condition: { kind: 'eitherMilestone' },
        category: 'MILESTONE_CONFLICT',
    },
    {
        name: 'Deadline pressure',
        description: 'A task is due within a week and one of them has priority 2 or more',
        priority: 6,
        condition: { kind: 'dueWithin', days: 7, minPriority: 2 },
        category: 'DEADLINE_CONFLICT',
    },
    {
        name: 'Long overlap',
        description: 'The overlap covers at least 70% of the first task',
        priority: 7,
        condition: { kind: 'overlapShareAtLeast', ratio: 0.7 },
        category: 'TIMELINE_CONFLICT',
    },
];

// ── Texts ──

export const ROOT_CAUSES: Readonly<Record<ConflictCategory, string>> = {
    SCHEDULE_CONFLICT: 'Tasks scheduled for identical time periods',
    PRIORITY_CONFLICT: 'Both tasks have high priority causing resource contention',
    ASSIGNEE_CONFLICT: 'Same person assigned to overlapping tasks',
    CATEGORY_CONFLICT: 'Tasks in the same category may have conflicting requirements',
    MILESTONE_CONFLICT: 'Milestone tasks have overlapping schedules',
    DEADLINE_CONFLICT: 'Tasks have conflicting deadlines',
    TIMELINE_CONFLICT: 'Tasks have significant timeline overlap',
};

const GENERIC_RESOLUTION: ConflictResolution = {
    strategy: 'Generic Resolution',
    description: 'Apply standard conflict resolution approach',
    actions: ['Review task requirements', 'Adjust schedules', 'Escalate if necessary'],
    effort: 'MEDIUM',
    impact: 'MEDIUM',
};

export const RESOLUTIONS: Readonly<Record<ConflictCategory, ConflictResolution>> = {
    SCHEDULE_CONFLICT: {
        strategy: 'Reschedule Tasks',
        description: 'Adjust start/end dates to eliminate overlap',
        actions: [
            'Move one task to a different time slot',
            'Extend timeline to accommodate both tasks',
            'Consider making one task a subtask',
        ],
        effort: 'MEDIUM',
        impact: 'HIGH',
    },
    ASSIGNEE_CONFLICT: {
        strategy: 'Reassign Tasks',
        description: 'Assign tasks to different people',
        actions: [
            'Find alternative assignee for one task',
            'Split tasks among multiple people',
            'Adjust workload distribution',
        ],
        effort: 'HIGH',
        impact: 'HIGH',
    },
    PRIORITY_CONFLICT: {
        strategy: 'Priority Adjustment',
        description: 'Adjust task priorities to resolve conflict',
        actions: [
            'Lower priority of one task',
            'Escalate for a priority decision',
            'Consider task dependencies',
        ],
        effort: 'LOW',
        impact: 'MEDIUM',
    },
    CATEGORY_CONFLICT: GENERIC_RESOLUTION,
    MILESTONE_CONFLICT: GENERIC_RESOLUTION,
    DEADLINE_CONFLICT: GENERIC_RESOLUTION,
    TIMELINE_CONFLICT: GENERIC_RESOLUTION,
};
