import { describe, expect, it } from 'vitest';
import type { TaskBar } from '../../types';
import { CategoryRegistry } from '../../constants/categoryRegistry';
import { makeTask } from '../../testUtils/makeTask';
import { makePriority } from '../../testUtils/makePriority';
import { DateUtils } from '../../utils/DateUtils';
import { resolveGridConfig } from '../config/GridConfigSchema';
import { PlacementRuleEngine } from '../positioning/PlacementRuleEngine';
import { createDefaultRules } from '../positioning/PlacementRules';
import { SpatialPositioner } from '../positioning/SpatialPositioner';
import { BarStyleResolver } from '../styling/BarStyleResolver';
import { MonthBoundarySegmenter } from './MonthBoundarySegmenter';

const config = resolveGridConfig({ calendarStart: '2025-01-01', calendarEnd: '2025-12-31' });
const positioner = new SpatialPositioner(
    config,
    new PlacementRuleEngine(createDefaultRules(config.highPriorityThreshold)),
    new BarStyleResolver(new CategoryRegistry(), config.defaultOpacity),
);
const segmenter = new MonthBoundarySegmenter(positioner);

function barFor(id: string, start: string, end: string): TaskBar {
    const [bar] = positioner.position([
        { task: makeTask(id, start, end), priority: makePriority(id), row: 0, stackIndex: 0, groupId: 'group_0' },
    ]);
    return bar;
}

describe('MonthBoundarySegmenter', () => {
    it('splits a bar crossing into the next month into two segments', () => {
        const bar = barFor('T', '2025-01-28', '2025-02-03');
        expect(bar.crossesMonthBoundary).toBe(true);

        const segments = segmenter.segment(bar);

        expect(segments.map(s => ({
            segmentId: s.segmentId,
            monthKey: s.monthKey,
            startDate: s.startDate,
            endDate: s.endDate,
            x: s.x,
            width: s.width,
            isStart: s.isStart,
            isEnd: s.isEnd,
            isContinuation: s.isContinuation,
            segmentIndex: s.segmentIndex,
            segmentCount: s.segmentCount,
        }))).toEqual([
            {
                segmentId: 'T##seg:2025-01-28', monthKey: '2025-01', startDate: '2025-01-28', endDate: '2025-01-31',
                x: 540, width: 80, isStart: true, isEnd: false, isContinuation: false, segmentIndex: 0, segmentCount: 2,
            },
            {
                segmentId: 'T##seg:2025-02-01', monthKey: '2025-02', startDate: '2025-02-01', endDate: '2025-02-03',
                x: 620, width: 60, isStart: false, isEnd: true, isContinuation: true, segmentIndex: 1, segmentCount: 2,
            },
        ]);
        expect(segments.every(s => s.taskId === 'T' && !s.crossesMonthBoundary)).toBe(true);
    });

    it('marks middle segments as neither start nor end', () => {
        const segments = segmenter.segment(barFor('Q', '2025-01-15', '2025-03-10'));

        expect(segments.map(s => [s.startDate, s.endDate, s.isStart, s.isEnd, s.isContinuation])).toEqual([
            ['2025-01-15', '2025-01-31', true, false, false],
            ['2025-02-01', '2025-02-28', false, false, true],
            ['2025-03-01', '2025-03-10', false, true, true],
        ]);
    });

    it('covers every day of the bar exactly once', () => {
        const bar = barFor('long', '2025-03-20', '2025-06-05');
        const segments = segmenter.segment(bar);

        let expected = bar.startDate;
        for (const segment of segments) {
            expect(segment.startDate).toBe(expected);
            expected = DateUtils.addDays(segment.endDate, 1);
        }
        expect(expected).toBe(DateUtils.addDays(bar.endDate, 1));
        expect(segments.reduce((sum, s) => sum + s.width, 0)).toBe(bar.width);
    });

    it('returns a single-month bar unchanged', () => {
        const bar = barFor('S', '2025-04-02', '2025-04-09');
        expect(segmenter.segment(bar)).toEqual([bar]);
    });

    it('is idempotent', () => {
        const once = segmenter.segmentAll([barFor('A', '2025-01-28', '2025-02-03'), barFor('B', '2025-05-05', '2025-05-06')]);
        expect(segmenter.segmentAll(once)).toEqual(once);
        expect(MonthBoundarySegmenter.barsForMonth(once, '2025-02').map(s => s.segmentId)).toEqual(['A##seg:2025-02-01']);
    });
});
