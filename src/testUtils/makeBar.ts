import type { TaskBar } from '../types';

export function makeBar(taskId: string, rect: Pick<TaskBar, 'x' | 'y' | 'width' | 'height'>, overrides: Partial<TaskBar> = {}): TaskBar {
    return {
        taskId,
        segmentId: taskId,
        monthKey: '2025-01',
        startDate: '2025-01-01',
        endDate: '2025-01-05',
        ...rect,
        row: 0,
        stackIndex: 0,
        groupId: 'group_0',
        color: '#CCCCCC',
        borderColor: '#000000',
        opacity: 0.9,
        zIndex: 1,
        priority: 2,
        visualWeight: 0.5,
        prominence: 0.5,
        alignment: 'left',
        isContinuation: false,
        isStart: true,
        isEnd: true,
        crossesMonthBoundary: false,
        segmentIndex: 0,
        segmentCount: 1,
        ...overrides,
    };
}
