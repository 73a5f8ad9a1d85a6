import type {
    CategorizedConflict,
    ConflictAnalysis,
    ConflictCategory,
    ConflictLevel,
    ConflictUrgency,
    Overlap,
    OverlapSeverity,
    Task,
} from '../../types';
import { CategoryRegistry } from '../../constants/categoryRegistry';
import { DateUtils } from '../../utils/DateUtils';
import { TaskSorter } from '../sort/TaskSorter';
import {
    DEFAULT_CONFLICT_RULES,
    FALLBACK_RULE_NAME,
    RESOLUTIONS,
    ROOT_CAUSES,
    type ConflictCondition,
    type ConflictRule,
} from './ConflictRules';
import { PARTIAL_HIGH_RATIO, PARTIAL_MEDIUM_RATIO, emptyCategoryCounts } from './OverlapTypes';

const SEVERITY_WEIGHT: Readonly<Record<OverlapSeverity, number>> = {
    CRITICAL: 5,
    HIGH: 4,
    MEDIUM: 3,
    LOW: 2,
    NONE: 1,
};

const DEADLINE_WINDOW_DAYS = 7;

/** What a conflict condition can see about one overlap. */
export interface ConflictSubject {
    overlap: Overlap;
    /** Task named by overlap.task1Id */
    first: Task;
    /** Task named by overlap.task2Id */
    second: Task;
    now: Date;
}

function levelFor(score: number, high: number, medium: number): ConflictLevel {
    if (score >= high) return 'HIGH';
    if (score >= medium) return 'MEDIUM';
    return 'LOW';
}

function sameNonEmpty(a: string, b: string): boolean {
    const left = a.trim();
    return left !== '' && left === b.trim();
}

/**
 * Sorts overlaps into conflict categories and rates each one.
 * Rules are tried in descending rule priority; first match wins, and an
 * overlap no rule matches falls back to a schedule conflict.
 */
export class ConflictCategorizer {
    private readonly rules: ConflictRule[];

    constructor(
        private readonly isMilestone: (task: Task) => boolean,
        rules: readonly ConflictRule[] = DEFAULT_CONFLICT_RULES,
    ) {
        this.rules = rules.slice().sort((a, b) => b.priority - a.priority);
    }

    matchRule(subject: ConflictSubject): ConflictRule | null {
        return this.rules.find(rule => this.matches(rule.condition, subject)) ?? null;
    }

    matches(condition: ConflictCondition, subject: ConflictSubject): boolean {
        const { overlap, first, second, now } = subject;
        switch (condition.kind) {
            case 'overlapType':
                return overlap.type === condition.type;
            case 'bothPriorityAtLeast':
                return first.priority >= condition.threshold && second.priority >= condition.threshold;
            case 'sameAssignee':
                return sameNonEmpty(first.assignee, second.assignee);
            case 'sameCategory':
                return ConflictCategorizer.sameCategory(first, second);
            case 'eitherMilestone':
                return this.isMilestone(first) || this.isMilestone(second);
            case 'dueWithin':
                return (ConflictCategorizer.dueWithin(first, condition.days, now)
                    || ConflictCategorizer.dueWithin(second, condition.days, now))
                    && (first.priority >= condition.minPriority || second.priority >= condition.minPriority);
            case 'overlapShareAtLeast':
                return ConflictCategorizer.shareOfFirst(overlap, first) >= condition.ratio;
        }
    }

    categorize(subject: ConflictSubject): CategorizedConflict {
        const rule = this.matchRule(subject);
        const category: ConflictCategory = rule?.category ?? 'SCHEDULE_CONFLICT';
        const resolution = RESOLUTIONS[category];

        return {
            overlap: subject.overlap,
            category,
            rule: rule?.name ?? FALLBACK_RULE_NAME,
            subCategory: ConflictCategorizer.subCategoryOf(subject),
            rootCause: ROOT_CAUSES[category],
            impact: this.assessImpact(subject),
            risk: this.assessRisk(subject),
            urgency: ConflictCategorizer.assessUrgency(subject),
            complexity: ConflictCategorizer.assessComplexity(subject),
            resolution: { ...resolution, actions: [...resolution.actions] },
        };
    }

    /** Categorizes every overlap whose tasks are both known; keeps the overlaps' order. */
    analyze(overlaps: readonly Overlap[], tasks: readonly Task[], now: Date): ConflictAnalysis {
        const tasksById = new Map<string, Task>();
        for (const task of tasks) tasksById.set(task.id, task);
        const conflicts: CategorizedConflict[] = [];
        for (const overlap of overlaps) {
            const first = tasksById.get(overlap.task1Id);
            const second = tasksById.get(overlap.task2Id);
            if (!first || !second) {
                console.warn(`[ConflictCategorizer] Overlap ${overlap.task1Id}/${overlap.task2Id} references an unknown task`);
                continue;
            }
            conflicts.push(this.categorize({ overlap, first, second, now }));
        }
        return ConflictCategorizer.summarize(conflicts);
    }

    static summarize(conflicts: CategorizedConflict[]): ConflictAnalysis {
        const categoryCounts = emptyCategoryCounts();
        const riskCounts: Record<ConflictLevel, number> = { LOW: 0, MEDIUM: 0, HIGH: 0 };
        const urgencyCounts: Record<ConflictUrgency, number> = { LOW: 0, MEDIUM: 0, HIGH: 0, URGENT: 0 };
        const strategyCounts: Record<string, number> = {};

        for (const conflict of conflicts) {
            categoryCounts[conflict.category]++;
            riskCounts[conflict.risk]++;
            urgencyCounts[conflict.urgency]++;
            const strategy = conflict.resolution.strategy;
            strategyCounts[strategy] = (strategyCounts[strategy] ?? 0) + 1;
        }

        const analysis: ConflictAnalysis = {
            totalConflicts: conflicts.length,
            categoryCounts,
            riskCounts,
            urgencyCounts,
            strategyCounts,
            conflicts,
            riskAssessment: ConflictCategorizer.riskAssessment(riskCounts),
            recommendations: [],
        };
        analysis.recommendations = ConflictCategorizer.recommendations(analysis);
        return analysis;
    }

    static getConflictsByCategory(analysis: ConflictAnalysis, category: ConflictCategory): CategorizedConflict[] {
        return analysis.conflicts.filter(c => c.category === category);
    }

    static getConflictsByRisk(analysis: ConflictAnalysis, risk: ConflictLevel): CategorizedConflict[] {
        return analysis.conflicts.filter(c => c.risk === risk);
    }

    static getConflictsByUrgency(analysis: ConflictAnalysis, urgency: ConflictUrgency): CategorizedConflict[] {
        return analysis.conflicts.filter(c => c.urgency === urgency);
    }

    // ── Conditions ──

    static sameCategory(a: Task, b: Task): boolean {
        return sameNonEmpty(CategoryRegistry.normalize(a.category), CategoryRegistry.normalize(b.category));
    }

    static dueWithin(task: Task, days: number, now: Date): boolean {
        return DateUtils.daysUntil(task.endDate, now) < days;
    }

    static shareOfFirst(overlap: Overlap, first: Task): number {
        return overlap.overlapDays / TaskSorter.span(first);
    }

    // ── Ratings ──

    static subCategoryOf({ overlap, first }: ConflictSubject): string {
        switch (overlap.type) {
            case 'IDENTICAL':
                return 'Identical Schedules';
            case 'NESTED':
                return 'Nested Tasks';
            case 'COMPLETE':
                return 'Complete Overlap';
            case 'PARTIAL': {
                const share = ConflictCategorizer.shareOfFirst(overlap, first);
                if (share >= PARTIAL_HIGH_RATIO) return 'High Overlap';
                if (share >= PARTIAL_MEDIUM_RATIO) return 'Medium Overlap';
                return 'Low Overlap';
            }
            case 'ADJACENT':
                return 'Adjacent Tasks';
            case 'NONE':
                return 'Unknown Overlap';
        }
    }

    private assessImpact({ overlap, first, second }: ConflictSubject): ConflictLevel {
        let score = SEVERITY_WEIGHT[overlap.severity] + first.priority + second.priority;
        if (overlap.overlapDays > 7) score += 2;
        else if (overlap.overlapDays > 3) score += 1;
        if (sameNonEmpty(first.assignee, second.assignee)) score += 3;
        if (ConflictCategorizer.sameCategory(first, second)) score += 1;
        if (this.isMilestone(first) || this.isMilestone(second)) score += 2;
        return levelFor(score, 10, 6);
    }

    private assessRisk({ overlap, first, second, now }: ConflictSubject): ConflictLevel {
        let score = SEVERITY_WEIGHT[overlap.severity];
        if (ConflictCategorizer.dueWithin(first, DEADLINE_WINDOW_DAYS, now)
            || ConflictCategorizer.dueWithin(second, DEADLINE_WINDOW_DAYS, now)) score += 3;
        if (first.priority >= 4 || second.priority >= 4) score += 2;
        if (this.isMilestone(first) || this.isMilestone(second)) score += 2;
        return levelFor(score, 8, 5);
    }

    static assessUrgency({ overlap, first, second, now }: ConflictSubject): ConflictUrgency {
        let score = SEVERITY_WEIGHT[overlap.severity] + first.priority + second.priority;
        const daysToStart = DateUtils.daysUntil(DateUtils.minDate(first.startDate, second.startDate), now);
        if (daysToStart <= 3) score += 3;
        else if (daysToStart <= 7) score += 2;
        else if (daysToStart <= 14) score += 1;

        if (score >= 8) return 'URGENT';
        if (score >= 5) return 'HIGH';
        if (score >= 3) return 'MEDIUM';
        return 'LOW';
    }

    static assessComplexity({ overlap, first, second }: ConflictSubject): ConflictLevel {
        let score: number;
        switch (overlap.type) {
            case 'IDENTICAL':
                score = 3;
                break;
            case 'NESTED':
            case 'COMPLETE':
                score = 2;
                break;
            default:
                score = 1;
        }
        if (sameNonEmpty(first.assignee, second.assignee)) score += 2;
        if (ConflictCategorizer.sameCategory(first, second)) score += 1;
        return levelFor(score, 6, 3);
    }

    // ── Summary ──

    static riskAssessment(riskCounts: Record<ConflictLevel, number>): string {
        if (riskCounts.HIGH > 0) return `HIGH RISK: ${riskCounts.HIGH} high-risk conflicts require immediate attention`;
        if (riskCounts.MEDIUM > 0) return `MEDIUM RISK: ${riskCounts.MEDIUM} medium-risk conflicts need resolution`;
        if (riskCounts.LOW > 0) return `LOW RISK: ${riskCounts.LOW} low-risk conflicts can be addressed during planning`;
        return 'NO RISK: No conflicts detected';
    }

    static recommendations(analysis: ConflictAnalysis): string[] {
        const recommendations: string[] = [];
        const critical = analysis.conflicts.filter(c => c.overlap.severity === 'CRITICAL').length;
        const high = analysis.conflicts.filter(c => c.overlap.severity === 'HIGH').length;

        if (critical > 0) recommendations.push(`Address ${critical} critical conflicts immediately`);
        if (high > 0) recommendations.push(`Resolve ${high} high-priority conflicts`);
        if (analysis.categoryCounts.ASSIGNEE_CONFLICT > 0) {
            recommendations.push(`Review ${analysis.categoryCounts.ASSIGNEE_CONFLICT} assignee conflicts for workload distribution`);
        }
        if (analysis.categoryCounts.SCHEDULE_CONFLICT > 0) {
            recommendations.push(`Reschedule ${analysis.categoryCounts.SCHEDULE_CONFLICT} conflicting tasks`);
        }
        if (analysis.totalConflicts > 0) {
            recommendations.push('Review conflict patterns to identify systemic issues');
        }
        return recommendations;
    }
}
