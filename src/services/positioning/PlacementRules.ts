import type { BarAlignment } from '../../types';

// ── Conditions ──

export type PlacementCondition =
    | { kind: 'always' }
    | { kind: 'milestone' }
    | { kind: 'priorityAtLeast'; threshold: number }
    /** Spacing only: true when either bar of the pair meets the threshold */
    | { kind: 'eitherPriorityAtLeast'; threshold: number };

// ── Rules ──

export interface AlignmentRule {
    name: string;
    priority: number;
    condition: PlacementCondition;
    alignment: BarAlignment;
    /** Vertical offset as a fraction of dayHeight */
    offsetRatio: number;
}

export interface SpacingRule {
    name: string;
    priority: number;
    condition: PlacementCondition;
    /** Required vertical gap as a multiple of minTaskSpacing, capped at maxTaskSpacing */
    spacingFactor: number;
}

export interface PlacementRuleSet {
    alignment: AlignmentRule[];
    spacing: SpacingRule[];
}

// ── Defaults ──

export function createDefaultRules(highPriorityThreshold: number): PlacementRuleSet {
    return {
        alignment: [
            {
                name: 'High priority alignment',
                priority: 10,
                condition: { kind: 'priorityAtLeast', threshold: highPriorityThreshold },
                alignment: 'top',
                offsetRatio: 0.1,
            },
            {
                name: 'Milestone alignment',
                priority: 8,
                condition: { kind: 'milestone' },
                alignment: 'middle',
                offsetRatio: 0.4,
            },
            {
                name: 'Default alignment',
                priority: 1,
                condition: { kind: 'always' },
                alignment: 'left',
                offsetRatio: 0.2,
            },
        ],
        spacing: [
            {
                name: 'High priority spacing',
                priority: 10,
                condition: { kind: 'eitherPriorityAtLeast', threshold: highPriorityThreshold },
                spacingFactor: 3,
            },
            {
                name: 'Default spacing',
                priority: 1,
                condition: { kind: 'always' },
                spacingFactor: 1,
            },
        ],
    };
}
