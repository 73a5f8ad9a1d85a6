export * from './types';
export {
    CategoryRegistry,
    DEFAULT_CATEGORIES,
    FALLBACK_CATEGORY,
    type CategoryDefinition,
} from './constants/categoryRegistry';
export {
    GridConfigError,
    createMonthConfig,
    gridConfigSchema,
    resolveGridConfig,
} from './services/config/GridConfigSchema';
export { LayoutEngine, type LayoutEngineOptions } from './services/LayoutEngine';
export { TemporalGrouper, type TemporalCluster } from './services/grouping/TemporalGrouper';
export { RowAssigner, type RowAssignment, type RowAssignmentResult } from './services/grouping/RowAssigner';
export { OverlapAnalyzer, type GroupOverlapSummary } from './services/overlap/OverlapAnalyzer';
export { ConflictCategorizer, type ConflictSubject } from './services/overlap/ConflictCategorizer';
export {
    DEFAULT_CONFLICT_RULES,
    type ConflictCondition,
    type ConflictRule,
} from './services/overlap/ConflictRules';
export { PriorityScorer, URGENCY_MULTIPLIER, type ScoringInput } from './services/priority/PriorityScorer';
export { PRIORITY_FACTORS, type PriorityContext, type PriorityFactor } from './services/priority/PriorityFactors';
export {
    createDefaultRules,
    type AlignmentRule,
    type PlacementCondition,
    type PlacementRuleSet,
    type SpacingRule,
} from './services/positioning/PlacementRules';
export { PlacementRuleEngine, type PlacementSubject } from './services/positioning/PlacementRuleEngine';
export { SpatialPositioner, type Placement } from './services/positioning/SpatialPositioner';
export { CollisionResolver, type CollisionResult } from './services/positioning/CollisionResolver';
export { MonthBoundarySegmenter, type ColumnMapper } from './services/segmentation/MonthBoundarySegmenter';
export { LayoutMetrics } from './services/statistics/LayoutMetrics';
export { buildRecommendations } from './services/statistics/Recommendations';
export { TaskIdGenerator } from './utils/TaskIdGenerator';
