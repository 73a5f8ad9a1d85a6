import { z } from 'zod';
import { DEFAULT_GRID_CONFIG, type GridConfig } from '../../types';
import { DateUtils } from '../../utils/DateUtils';

const calendarDate = z
    .string()
    .refine((value) => DateUtils.isValidDateString(value), 'Must be a valid YYYY-MM-DD date');

export const gridConfigSchema = z.object({
    calendarStart: calendarDate,
    calendarEnd: calendarDate,
    dayWidth: z.number().positive(),
    dayHeight: z.number().positive(),
    rowHeight: z.number().positive(),
    maxRowsPerDay: z.number().int().positive(),
    overlapThresholdHours: z.number().min(0),
    monthBoundaryGap: z.number().min(0),
    minTaskSpacing: z.number().min(0),
    maxTaskSpacing: z.number().min(0),
    snapToGrid: z.boolean(),
    gridResolution: z.number().positive(),
    alignmentTolerance: z.number().min(0),
    collisionBuffer: z.number().min(0),
    highPriorityThreshold: z.number(),
    defaultOpacity: z.number().min(0).max(1),
})
    .refine((c) => c.maxTaskSpacing >= c.minTaskSpacing, {
        message: 'maxTaskSpacing must be at least minTaskSpacing',
        path: ['maxTaskSpacing'],
    })
    .refine((c) => c.calendarEnd >= c.calendarStart, {
        message: 'calendarEnd must not be before calendarStart',
        path: ['calendarEnd'],
    });

export class GridConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`[GridConfig] Invalid grid configuration: ${issues.join('; ')}`);
        this.name = 'GridConfigError';
    }
}

/**
 * Merges a partial config over DEFAULT_GRID_CONFIG and validates it.
 * Throws GridConfigError before any layout work starts.
 */
export function resolveGridConfig(partial: Partial<GridConfig> = {}): Readonly<GridConfig> {
    const merged: GridConfig = Object.assign({}, DEFAULT_GRID_CONFIG, partial);
    const parsed = gridConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new GridConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
        );
    }
    return Object.freeze(parsed.data);
}

/**
 * Narrows a config to one calendar month so months can be laid out one call at a time.
 */
export function createMonthConfig(base: Partial<GridConfig>, monthKey: string): Readonly<GridConfig> {
    if (!DateUtils.isValidMonthKey(monthKey)) {
        throw new GridConfigError([`monthKey: Must be YYYY-MM, got "${monthKey}"`]);
    }
    const { start, end } = DateUtils.getMonthRange(monthKey);
    return resolveGridConfig({ ...base, calendarStart: start, calendarEnd: end });
}
