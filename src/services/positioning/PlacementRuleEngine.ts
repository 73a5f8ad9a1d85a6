import type {
    AlignmentRule,
    PlacementCondition,
    PlacementRuleSet,
    SpacingRule,
} from './PlacementRules';

/** What a rule condition can see about one bar. */
export interface PlacementSubject {
    priority: number;
    isMilestone: boolean;
}

/**
 * Interprets placement rules. Rules are tried in descending rule priority; first match wins.
 */
export class PlacementRuleEngine {
    private readonly alignmentRules: AlignmentRule[];
    private readonly spacingRules: SpacingRule[];

    constructor(rules: PlacementRuleSet) {
        this.alignmentRules = rules.alignment.slice().sort((a, b) => b.priority - a.priority);
        this.spacingRules = rules.spacing.slice().sort((a, b) => b.priority - a.priority);
    }

    resolveAlignment(subject: PlacementSubject): AlignmentRule | null {
        return this.alignmentRules.find(rule => PlacementRuleEngine.matches(rule.condition, [subject])) ?? null;
    }

    resolveSpacing(upper: PlacementSubject, lower: PlacementSubject): SpacingRule | null {
        return this.spacingRules.find(rule => PlacementRuleEngine.matches(rule.condition, [upper, lower])) ?? null;
    }

    static matches(condition: PlacementCondition, subjects: readonly PlacementSubject[]): boolean {
        switch (condition.kind) {
            case 'always':
                return true;
            case 'milestone':
                return subjects.every(s => s.isMilestone);
            case 'priorityAtLeast':
                return subjects.every(s => s.priority >= condition.threshold);
            case 'eitherPriorityAtLeast':
                return subjects.some(s => s.priority >= condition.threshold);
        }
    }
}
