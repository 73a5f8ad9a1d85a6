export interface Task {
    id: string;             // Unique identifier
    name: string;           // Display name (may carry a MILESTONE marker)
    category: string;       // Category key, resolved through the CategoryRegistry
    description: string;

    // Dates (inclusive range)
    startDate: string;      // YYYY-MM-DD
    endDate: string;        // YYYY-MM-DD, >= startDate

    priority: number;       // Higher = more prominent
    status: string;
    assignee: string;
}

export type OverlapType = 'NONE' | 'PARTIAL' | 'COMPLETE' | 'NESTED' | 'ADJACENT' | 'IDENTICAL';

export type OverlapSeverity = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type PriorityBand = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'MINIMAL';

export type BarAlignment = 'top' | 'middle' | 'left';

export interface Overlap {
    task1Id: string;
    task2Id: string;
    type: OverlapType;
    severity: OverlapSeverity;
    startDate: string;      // YYYY-MM-DD, first shared day
    endDate: string;        // YYYY-MM-DD, last shared day
    overlapDays: number;
    durationHours: number;
    priority: number;       // max of both task priorities
    conflictReason: string;
    resolutionHint: string;
}

export type SeverityCounts = Record<OverlapSeverity, number>;

export interface TaskGroup {
    id: string;
    tasks: Task[];
    startDate: string;
    endDate: string;
    /** Rows actually used, never above maxRowsPerDay */
    rows: number;
    /** Rows the greedy pass would need without the row cap */
    unconstrainedRows: number;
    overflowCount: number;
    overlaps: Overlap[];
    maxSeverity: OverlapSeverity;
    severityCounts: SeverityCounts;
    resolution: string;
}

export type PriorityFactorId = 'importance' | 'timeline' | 'conflict' | 'milestone';

export interface TaskPriority {
    taskId: string;
    score: number;
    factors: Record<PriorityFactorId, number>;
    band: PriorityBand;
    baseWeight: number;
    visualWeight: number;
    prominence: number;
    isMilestone: boolean;
}

export interface TaskBar {
    taskId: string;
    /** Equals taskId unless the bar is one month's piece of a longer task */
    segmentId: string;
    monthKey: string;       // YYYY-MM of startDate
    startDate: string;
    endDate: string;

    x: number;
    y: number;
    width: number;
    height: number;

    row: number;
    stackIndex: number;
    groupId: string;

    color: string;
    borderColor: string;
    opacity: number;
    zIndex: number;

    priority: number;
    visualWeight: number;
    prominence: number;
    alignment: BarAlignment;

    isContinuation: boolean;
    isStart: boolean;
    isEnd: boolean;
    crossesMonthBoundary: boolean;
    segmentIndex: number;
    segmentCount: number;
}

export interface GridConfig {
    calendarStart: string;          // YYYY-MM-DD
    calendarEnd: string;            // YYYY-MM-DD
    dayWidth: number;
    dayHeight: number;
    rowHeight: number;
    maxRowsPerDay: number;
    overlapThresholdHours: number;
    monthBoundaryGap: number;       // extra horizontal space per elapsed month
    minTaskSpacing: number;
    maxTaskSpacing: number;
    snapToGrid: boolean;
    gridResolution: number;
    alignmentTolerance: number;
    collisionBuffer: number;
    highPriorityThreshold: number;  // task priority at or above which placement rules treat it as high priority
    defaultOpacity: number;         // 0 - 1
}

export const DEFAULT_GRID_CONFIG: GridConfig = {
    calendarStart: '2025-01-01',
    calendarEnd: '2025-12-31',
    dayWidth: 20,
    dayHeight: 30,
    rowHeight: 8,
    maxRowsPerDay: 3,
    overlapThresholdHours: 1,
    monthBoundaryGap: 0,
    minTaskSpacing: 1,
    maxTaskSpacing: 10,
    snapToGrid: true,
    gridResolution: 1,
    alignmentTolerance: 0.5,
    collisionBuffer: 1,
    highPriorityThreshold: 4,
    defaultOpacity: 0.9,
};

export interface LayoutStatistics {
    totalTasks: number;
    processedBars: number;
    totalGroups: number;
    averageBarHeight: number;
    maxBarHeight: number;
    averageBarWidth: number;
    maxBarWidth: number;
    averageStackHeight: number;
    maxStackHeight: number;
    conflictsResolved: number;
    residualCollisions: number;
    overflowCount: number;
    monthBoundaryCount: number;
    totalOverlaps: number;
    criticalOverlaps: number;
    spaceEfficiency: number;
    alignmentScore: number;
    spacingScore: number;
    averageSpacing: number;
    visualBalance: number;
    gridUtilization: number;
}

export interface OverlapAnalysis {
    totalTasks: number;
    overlappingTasks: number;
    totalOverlaps: number;
    severityCounts: SeverityCounts;
    categoryCounts: ConflictCategoryCounts;
    overlaps: Overlap[];
    summary: string;
}

export type ConflictCategory =
    | 'SCHEDULE_CONFLICT'
    | 'PRIORITY_CONFLICT'
    | 'ASSIGNEE_CONFLICT'
    | 'CATEGORY_CONFLICT'
    | 'MILESTONE_CONFLICT'
    | 'DEADLINE_CONFLICT'
    | 'TIMELINE_CONFLICT';

export type ConflictCategoryCounts = Record<ConflictCategory, number>;

export type ConflictLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type ConflictUrgency = 'LOW' | 'MEDIUM' | 'HIGH' | 'URGENT';

export interface ConflictResolution {
    strategy: string;
    description: string;
    actions: string[];
    effort: ConflictLevel;
    impact: ConflictLevel;
}

export interface CategorizedConflict {
    overlap: Overlap;
    category: ConflictCategory;
    rule: string;           // name of the rule that matched, or the fallback
    subCategory: string;
    rootCause: string;
    impact: ConflictLevel;
    risk: ConflictLevel;
    urgency: ConflictUrgency;
    complexity: ConflictLevel;
    resolution: ConflictResolution;
}

export interface ConflictAnalysis {
    totalConflicts: number;
    categoryCounts: ConflictCategoryCounts;
    riskCounts: Record<ConflictLevel, number>;
    urgencyCounts: Record<ConflictUrgency, number>;
    strategyCounts: Record<string, number>;
    conflicts: CategorizedConflict[];
    riskAssessment: string;
    recommendations: string[];
}

export interface LayoutResult {
    taskBars: TaskBar[];
    groups: TaskGroup[];
    overlaps: OverlapAnalysis;
    conflicts: ConflictAnalysis;
    priorities: TaskPriority[];
    statistics: LayoutStatistics;
    recommendations: string[];
    issues: string[];
}
