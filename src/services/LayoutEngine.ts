import type {
    GridConfig,
    LayoutResult,
    Task,
    TaskBar,
    TaskGroup,
    TaskPriority,
} from '../types';
import { CategoryRegistry } from '../constants/categoryRegistry';
import { TaskIdGenerator } from '../utils/TaskIdGenerator';
import { resolveGridConfig } from './config/GridConfigSchema';
import { RowAssigner } from './grouping/RowAssigner';
import { TemporalGrouper } from './grouping/TemporalGrouper';
import { ConflictCategorizer } from './overlap/ConflictCategorizer';
import type { ConflictRule } from './overlap/ConflictRules';
import { OverlapAnalyzer, type GroupOverlapSummary } from './overlap/OverlapAnalyzer';
import { CollisionResolver } from './positioning/CollisionResolver';
import { PlacementRuleEngine } from './positioning/PlacementRuleEngine';
import { createDefaultRules, type PlacementRuleSet } from './positioning/PlacementRules';
import { SpatialPositioner, type Placement } from './positioning/SpatialPositioner';
import { PriorityScorer } from './priority/PriorityScorer';
import { MonthBoundarySegmenter } from './segmentation/MonthBoundarySegmenter';
import { LayoutMetrics } from './statistics/LayoutMetrics';
import { buildRecommendations } from './statistics/Recommendations';
import { BarStyleResolver } from './styling/BarStyleResolver';
import { LayoutValidator } from './validation/LayoutValidator';

export interface LayoutEngineOptions {
    categories?: CategoryRegistry;
    rules?: PlacementRuleSet;
    conflictRules?: readonly ConflictRule[];
}

/**
 * Lays out planner tasks on a calendar grid.
 * Holds only the validated config and its collaborators; every run is independent.
 */
export class LayoutEngine {
    readonly config: Readonly<GridConfig>;
    private readonly grouper = new TemporalGrouper();
    private readonly rowAssigner: RowAssigner;
    private readonly overlapAnalyzer: OverlapAnalyzer;
    private readonly categorizer: ConflictCategorizer;
    private readonly scorer: PriorityScorer;
    private readonly positioner: SpatialPositioner;
    private readonly collisions: CollisionResolver;
    private readonly segmenter: MonthBoundarySegmenter;
    private readonly metrics: LayoutMetrics;

    /** Throws GridConfigError when the config is invalid. */
    constructor(config: Partial<GridConfig> = {}, options: LayoutEngineOptions = {}) {
        this.config = resolveGridConfig(config);
        const categories = options.categories ?? new CategoryRegistry();
        const rules = options.rules ?? createDefaultRules(this.config.highPriorityThreshold);

        this.rowAssigner = new RowAssigner(this.config.maxRowsPerDay);
        this.overlapAnalyzer = new OverlapAnalyzer(this.config.overlapThresholdHours);
        this.scorer = new PriorityScorer(categories);
        this.categorizer = new ConflictCategorizer(task => this.scorer.isMilestone(task), options.conflictRules);
        this.positioner = new SpatialPositioner(
            this.config,
            new PlacementRuleEngine(rules),
            new BarStyleResolver(categories, this.config.defaultOpacity),
        );
        this.collisions = new CollisionResolver(this.config.collisionBuffer);
        this.segmenter = new MonthBoundarySegmenter(this.positioner);
        this.metrics = new LayoutMetrics(this.config);
    }

    layout(input: readonly Task[], now: Date): LayoutResult {
        const validator = new LayoutValidator(this.config);
        const tasks = LayoutEngine.dedupe(input, validator);

        // 1. Temporal groups, their overlaps and conflict categories
        const clusters = this.grouper.group(tasks);
        const summaries: GroupOverlapSummary[] = clusters.map(cluster => this.overlapAnalyzer.analyzeGroup(cluster.tasks));
        const allOverlaps = summaries.flatMap(summary => summary.overlaps);
        OverlapAnalyzer.sortOverlaps(allOverlaps);
        const conflicts = this.categorizer.analyze(allOverlaps, tasks, now);
        const overlaps = OverlapAnalyzer.summarize(tasks.length, summaries, conflicts.conflicts);

        // 2. Priority and prominence
        const priorities = this.scorer.scoreAll(tasks, {
            now,
            overlapsByTask: PriorityScorer.indexOverlaps(overlaps.overlaps),
        });
        const prominenceOf = (task: Task) => priorities.get(task.id)?.prominence ?? 0;

        // 3. Rows
        const groups: TaskGroup[] = [];
        const placements: Placement[] = [];
        clusters.forEach((cluster, index) => {
            const groupId = TaskIdGenerator.makeGroupId(index);
            const rows = this.rowAssigner.assign(cluster.tasks, prominenceOf, this.config.calendarStart);
            const summary = summaries[index];

            groups.push({
                id: groupId,
                tasks: cluster.tasks,
                startDate: cluster.startDate,
                endDate: cluster.endDate,
                rows: rows.rows,
                unconstrainedRows: rows.unconstrainedRows,
                overflowCount: rows.overflowCount,
                overlaps: summary.overlaps,
                maxSeverity: summary.maxSeverity,
                severityCounts: summary.severityCounts,
                resolution: summary.resolution,
            });

            for (const assignment of rows.assignments) {
                const priority = priorities.get(assignment.task.id);
                if (!priority) continue;
                placements.push({
                    task: assignment.task,
                    priority,
                    row: assignment.row,
                    stackIndex: assignment.stackIndex,
                    groupId,
                });
            }
        });

        // 4. Coordinates, collisions, month segments
        const positioned = this.positioner.position(placements);
        const resolved = this.collisions.resolve(positioned);
        const taskBars = LayoutEngine.sortBars(this.segmenter.segmentAll(resolved.bars));

        // 5. Statistics, recommendations, issues
        const overflowCount = groups.reduce((sum, g) => sum + g.overflowCount, 0);
        const statistics = this.metrics.compute({
            bars: taskBars,
            totalTasks: tasks.length,
            totalGroups: groups.length,
            gridWidth: this.positioner.endXOf(this.config.calendarEnd),
            conflictsResolved: resolved.resolved,
            residualCollisions: resolved.residual,
            overflowCount,
            monthBoundaryCount: resolved.bars.filter(b => b.crossesMonthBoundary).length,
            overlaps,
        });
        validator.validate(taskBars);

        console.debug(`[LayoutEngine] ${tasks.length} tasks -> ${groups.length} groups, ${taskBars.length} bars, ${overlaps.totalOverlaps} overlaps`);

        return {
            taskBars,
            groups,
            overlaps,
            conflicts,
            priorities: LayoutEngine.rankPriorities(priorities.values()),
            statistics,
            recommendations: buildRecommendations(statistics, this.config),
            issues: validator.getIssues(),
        };
    }

    static getBarsForTask(result: LayoutResult, taskId: string): TaskBar[] {
        return result.taskBars.filter(bar => bar.taskId === taskId);
    }

    private static dedupe(tasks: readonly Task[], validator: LayoutValidator): Task[] {
        const seen = new Set<string>();
        const unique: Task[] = [];
        for (const task of tasks) {
            if (seen.has(task.id)) {
                validator.addIssue(`Duplicate task id ${task.id} ignored`);
                continue;
            }
            seen.add(task.id);
            unique.push(task);
        }
        return unique;
    }

    private static sortBars(bars: TaskBar[]): TaskBar[] {
        return bars.sort((a, b) => {
            const dateDiff = a.startDate.localeCompare(b.startDate);
            if (dateDiff !== 0) return dateDiff;
            if (a.y !== b.y) return a.y - b.y;
            return a.segmentId.localeCompare(b.segmentId);
        });
    }

    private static rankPriorities(priorities: Iterable<TaskPriority>): TaskPriority[] {
        return Array.from(priorities).sort((a, b) => {
            if (a.score !== b.score) return b.score - a.score;
            return a.taskId.localeCompare(b.taskId);
        });
    }
}
