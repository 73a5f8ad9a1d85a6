import type { GridConfig, LayoutStatistics, OverlapAnalysis, TaskBar } from '../../types';
import { DateUtils } from '../../utils/DateUtils';
import { horizontalOverlap } from '../positioning/SpatialPositioner';

export interface MetricsInput {
    bars: readonly TaskBar[];
    totalTasks: number;
    totalGroups: number;
    /** Width of the whole calendar in grid units */
    gridWidth: number;
    conflictsResolved: number;
    residualCollisions: number;
    overflowCount: number;
    monthBoundaryCount: number;
    overlaps: OverlapAnalysis;
}

function average(values: readonly number[]): number {
    return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

interface CellRect {
    colStart: number;
    colEnd: number;
    rowStart: number;
    rowEnd: number;
}

/** Total length of the union of [colStart, colEnd) intervals. */
function mergedLength(spans: readonly CellRect[]): number {
    const sorted = spans.slice().sort((a, b) => a.colStart - b.colStart);
    let total = 0;
    let runStart = -1;
    let runEnd = -1;
    for (const span of sorted) {
        if (span.colStart > runEnd) {
            total += runEnd - runStart;
            runStart = span.colStart;
            runEnd = span.colEnd;
        } else {
            runEnd = Math.max(runEnd, span.colEnd);
        }
    }
    return total + (runEnd - runStart);
}

function maximum(values: readonly number[]): number {
    return values.length === 0 ? 0 : Math.max(...values);
}

/**
 * Quality metrics over a finished layout. Scores are in [0, 1], higher is better.
 */
export class LayoutMetrics {
    constructor(private readonly config: Readonly<GridConfig>) {}

    compute(input: MetricsInput): LayoutStatistics {
        const { bars } = input;
        const heights = bars.map(b => b.height);
        const widths = bars.map(b => b.width);
        const stackHeights = this.stackHeights(bars);
        const spacing = this.spacing(bars);

        return {
            totalTasks: input.totalTasks,
            processedBars: bars.length,
            totalGroups: input.totalGroups,
            averageBarHeight: average(heights),
            maxBarHeight: maximum(heights),
            averageBarWidth: average(widths),
            maxBarWidth: maximum(widths),
            averageStackHeight: average(stackHeights),
            maxStackHeight: maximum(stackHeights),
            conflictsResolved: input.conflictsResolved,
            residualCollisions: input.residualCollisions,
            overflowCount: input.overflowCount,
            monthBoundaryCount: input.monthBoundaryCount,
            totalOverlaps: input.overlaps.totalOverlaps,
            criticalOverlaps: input.overlaps.severityCounts.CRITICAL,
            spaceEfficiency: this.spaceEfficiency(bars),
            alignmentScore: this.alignmentScore(bars),
            spacingScore: spacing.score,
            averageSpacing: spacing.average,
            visualBalance: this.visualBalance(bars, input.gridWidth),
            gridUtilization: this.gridUtilization(bars, input.gridWidth),
        };
    }

    /** Vertical extent of each group's bars. */
    stackHeights(bars: readonly TaskBar[]): number[] {
        const extents = new Map<string, { top: number, bottom: number }>();
        for (const bar of bars) {
            const extent = extents.get(bar.groupId);
            if (extent) {
                extent.top = Math.min(extent.top, bar.y);
                extent.bottom = Math.max(extent.bottom, bar.y + bar.height);
            } else {
                extents.set(bar.groupId, { top: bar.y, bottom: bar.y + bar.height });
            }
        }
        return Array.from(extents.values(), e => e.bottom - e.top);
    }

    /** Bar area over the area of the day cells that carry bars. */
    spaceEfficiency(bars: readonly TaskBar[]): number {
        if (bars.length === 0) return 1;

        const days = new Set<string>();
        let used = 0;
        for (const bar of bars) {
            used += bar.width * bar.height;
            for (let day = bar.startDate; day <= bar.endDate; day = DateUtils.addDays(day, 1)) {
                days.add(day);
            }
        }
        const available = days.size * this.config.dayWidth * this.config.dayHeight;
        return available > 0 ? Math.min(1, used / available) : 1;
    }

    isAligned(value: number): boolean {
        const { gridResolution, alignmentTolerance } = this.config;
        const remainder = ((value % gridResolution) + gridResolution) % gridResolution;
        return Math.min(remainder, gridResolution - remainder) <= alignmentTolerance;
    }

    alignmentScore(bars: readonly TaskBar[]): number {
        if (bars.length === 0) return 1;
        const aligned = bars.filter(b => this.isAligned(b.x) && this.isAligned(b.y)).length;
        return aligned / bars.length;
    }

    /** Center distances of bars sharing day columns, against the configured spacing range. */
    spacing(bars: readonly TaskBar[]): { score: number, average: number } {
        const { minTaskSpacing, maxTaskSpacing } = this.config;
        const distances: number[] = [];
        for (let i = 0; i < bars.length; i++) {
            for (let j = i + 1; j < bars.length; j++) {
                const a = bars[i];
                const b = bars[j];
                if (!horizontalOverlap(a, b)) continue;
                const dx = (a.x + a.width / 2) - (b.x + b.width / 2);
                const dy = (a.y + a.height / 2) - (b.y + b.height / 2);
                distances.push(Math.hypot(dx, dy));
            }
        }
        if (distances.length === 0) return { score: 1, average: 0 };

        const within = distances.filter(d => d >= minTaskSpacing && d <= maxTaskSpacing).length;
        return { score: within / distances.length, average: average(distances) };
    }

    /** 1 when the visual-weight centroid sits at the grid center. */
    visualBalance(bars: readonly TaskBar[], gridWidth: number): number {
        let totalWeight = 0;
        let cx = 0;
        let cy = 0;
        for (const bar of bars) {
            totalWeight += bar.visualWeight;
            cx += (bar.x + bar.width / 2) * bar.visualWeight;
            cy += (bar.y + bar.height / 2) * bar.visualWeight;
        }
        if (totalWeight === 0) return 1;

        const halfWidth = gridWidth / 2;
        const halfHeight = this.config.dayHeight / 2;
        const distance = Math.hypot(cx / totalWeight - halfWidth, cy / totalWeight - halfHeight);
        return Math.max(0, 1 - distance / Math.hypot(halfWidth, halfHeight));
    }

    /** Share of gridResolution cells covered by at least one bar. */
    gridUtilization(bars: readonly TaskBar[], gridWidth: number): number {
        const resolution = this.config.gridResolution;
        const cols = Math.ceil(gridWidth / resolution);
        const rows = Math.ceil(this.config.dayHeight / resolution);
        if (cols <= 0 || rows <= 0) return 0;

        // 1. Each bar as a rectangle of cell indices, clipped to the grid
        const cells: CellRect[] = [];
        for (const bar of bars) {
            const rect = {
                colStart: Math.max(0, Math.floor(bar.x / resolution)),
                colEnd: Math.min(cols, Math.ceil((bar.x + bar.width) / resolution)),
                rowStart: Math.max(0, Math.floor(bar.y / resolution)),
                rowEnd: Math.min(rows, Math.ceil((bar.y + bar.height) / resolution)),
            };
            if (rect.colStart < rect.colEnd && rect.rowStart < rect.rowEnd) cells.push(rect);
        }

        // 2. Between consecutive row boundaries the covering bars do not change
        const boundaries = Array.from(new Set(cells.flatMap(c => [c.rowStart, c.rowEnd]))).sort((a, b) => a - b);
        let covered = 0;
        for (let i = 0; i + 1 < boundaries.length; i++) {
            const top = boundaries[i];
            const bottom = boundaries[i + 1];
            const spans = cells.filter(c => c.rowStart <= top && c.rowEnd >= bottom);
            covered += mergedLength(spans) * (bottom - top);
        }
        return covered / (cols * rows);
    }
}
