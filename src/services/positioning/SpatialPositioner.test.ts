import { describe, expect, it } from 'vitest';
import type { GridConfig } from '../../types';
import { CategoryRegistry } from '../../constants/categoryRegistry';
import { makeTask } from '../../testUtils/makeTask';
import { makePriority } from '../../testUtils/makePriority';
import { resolveGridConfig } from '../config/GridConfigSchema';
import { BarStyleResolver } from '../styling/BarStyleResolver';
import { PlacementRuleEngine } from './PlacementRuleEngine';
import { createDefaultRules } from './PlacementRules';
import { SpatialPositioner } from './SpatialPositioner';

function createPositioner(overrides: Partial<GridConfig> = {}): SpatialPositioner {
    const config = resolveGridConfig({ calendarStart: '2025-01-01', calendarEnd: '2025-03-31', ...overrides });
    return new SpatialPositioner(
        config,
        new PlacementRuleEngine(createDefaultRules(config.highPriorityThreshold)),
        new BarStyleResolver(new CategoryRegistry(), config.defaultOpacity),
    );
}

describe('SpatialPositioner', () => {
    it('places a bar on its day columns with default alignment', () => {
        const task = makeTask('A', '2025-01-03', '2025-01-05');

        const [bar] = createPositioner().position([
            { task, priority: makePriority('A'), row: 0, stackIndex: 0, groupId: 'group_0' },
        ]);

        expect(bar).toEqual({
            taskId: 'A',
            segmentId: 'A',
            monthKey: '2025-01',
            startDate: '2025-01-03',
            endDate: '2025-01-05',
            x: 40,
            y: 6,
            width: 60,
            height: 4,
            row: 0,
            stackIndex: 0,
            groupId: 'group_0',
            color: '#50E3C2',
            borderColor: '#000000',
            opacity: 0.9,
            zIndex: 4,
            priority: 2,
            visualWeight: 0.5,
            prominence: 0.3,
            alignment: 'left',
            isContinuation: false,
            isStart: true,
            isEnd: true,
            crossesMonthBoundary: false,
            segmentIndex: 0,
            segmentCount: 1,
        });
    });

    it('anchors high priority bars near the top and milestones in the middle', () => {
        const positioner = createPositioner();
        const bars = positioner.position([
            {
                task: makeTask('urgent', '2025-01-10', '2025-01-10', { priority: 5 }),
                priority: makePriority('urgent'), row: 1, stackIndex: 1, groupId: 'group_0',
            },
            {
                task: makeTask('gate', '2025-02-10', '2025-02-10'),
                priority: makePriority('gate', { isMilestone: true }), row: 0, stackIndex: 0, groupId: 'group_1',
            },
        ]);

        expect(bars.map(b => [b.taskId, b.alignment, b.y])).toEqual([
            ['urgent', 'top', 11],
            ['gate', 'middle', 12],
        ]);
    });

    it('clamps bar height between half and one row height', () => {
        const positioner = createPositioner();
        const bars = positioner.position([
            { task: makeTask('thin', '2025-01-01', '2025-01-01'), priority: makePriority('thin', { visualWeight: 0.1 }), row: 0, stackIndex: 0, groupId: 'group_0' },
            { task: makeTask('full', '2025-02-01', '2025-02-01'), priority: makePriority('full', { visualWeight: 1 }), row: 0, stackIndex: 0, groupId: 'group_1' },
        ]);
        expect(bars.map(b => b.height)).toEqual([4, 8]);
    });

    it('pushes a stacked bar down to keep the required spacing', () => {
        const positioner = createPositioner({ dayHeight: 20 });
        const bars = positioner.position([
            {
                task: makeTask('lead', '2025-01-01', '2025-01-05', { priority: 4 }),
                priority: makePriority('lead', { visualWeight: 1 }), row: 0, stackIndex: 0, groupId: 'group_0',
            },
            {
                task: makeTask('next', '2025-01-02', '2025-01-06'),
                priority: makePriority('next', { visualWeight: 1 }), row: 1, stackIndex: 1, groupId: 'group_0',
            },
        ]);

        // lead spans y 2..10; next starts at 4 + 8 = 12, one short of the high priority gap of 3
        expect(bars.map(b => [b.taskId, b.y])).toEqual([['lead', 2], ['next', 13]]);
    });

    it('clips bars to the calendar and flags the cut edge', () => {
        const positioner = createPositioner();
        const bars = positioner.position([
            { task: makeTask('early', '2024-12-20', '2025-01-02'), priority: makePriority('early'), row: 0, stackIndex: 0, groupId: 'group_0' },
            { task: makeTask('outside', '2025-05-01', '2025-05-02'), priority: makePriority('outside'), row: 0, stackIndex: 0, groupId: 'group_1' },
        ]);

        expect(bars).toHaveLength(1);
        expect(bars[0]).toMatchObject({
            startDate: '2025-01-01',
            endDate: '2025-01-02',
            x: 0,
            width: 40,
            isContinuation: true,
            isStart: false,
            isEnd: true,
        });
    });

    it('snaps coordinates to the grid resolution', () => {
        const positioner = createPositioner({ dayWidth: 12.5, gridResolution: 5 });
        const [bar] = positioner.position([
            { task: makeTask('s', '2025-01-02', '2025-01-02'), priority: makePriority('s'), row: 0, stackIndex: 0, groupId: 'group_0' },
        ]);
        expect([bar.x, bar.width, bar.y, bar.height]).toEqual([15, 10, 5, 5]);
    });

    it('adds the month gap for every elapsed month', () => {
        const positioner = createPositioner({ monthBoundaryGap: 10 });
        expect(positioner.xOf('2025-01-31')).toBe(600);
        expect(positioner.xOf('2025-02-01')).toBe(630);
        expect(positioner.columnSpan('2025-03-01', '2025-03-02')).toEqual({ x: 1200, width: 40 });
    });
});
