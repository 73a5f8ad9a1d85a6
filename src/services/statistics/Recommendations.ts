import type { GridConfig, LayoutStatistics } from '../../types';

const SPACE_EFFICIENCY_FLOOR = 0.7;
const ALIGNMENT_FLOOR = 0.8;
const SPACING_FLOOR = 0.7;
const BALANCE_FLOOR = 0.6;

/**
 * Advisory text for a finished layout, most pressing first.
 */
export function buildRecommendations(stats: LayoutStatistics, config: Readonly<GridConfig>): string[] {
    const recommendations: string[] = [];

    if (stats.overflowCount > 0) {
        recommendations.push(
            `Overcrowded: ${stats.overflowCount} task(s) exceeded ${config.maxRowsPerDay} rows per day and were placed on row 0; consider increasing maxRowsPerDay or rescheduling`,
        );
    }
    if (stats.criticalOverlaps > 0) {
        recommendations.push(`URGENT: ${stats.criticalOverlaps} critical overlap(s) require immediate attention`);
    }
    if (stats.spaceEfficiency < SPACE_EFFICIENCY_FLOOR) {
        recommendations.push('Consider reducing task spacing to improve space efficiency');
    }
    if (stats.alignmentScore < ALIGNMENT_FLOOR) {
        recommendations.push('Enable grid snapping to improve alignment consistency');
    }
    if (stats.spacingScore < SPACING_FLOOR) {
        recommendations.push('Adjust spacing rules to improve visual consistency');
    }
    if (stats.visualBalance < BALANCE_FLOOR) {
        recommendations.push('Redistribute tasks to improve visual balance');
    }
    if (stats.averageStackHeight > config.dayHeight * 2) {
        recommendations.push('Consider using horizontal stacking for high-density days');
    }
    if (stats.conflictsResolved > 0) {
        recommendations.push(`Resolved ${stats.conflictsResolved} visual conflict(s) - consider reviewing task scheduling`);
    }
    if (stats.residualCollisions > 0) {
        recommendations.push(`${stats.residualCollisions} collision(s) remain after resolution - consider reducing task density`);
    }

    return recommendations;
}
