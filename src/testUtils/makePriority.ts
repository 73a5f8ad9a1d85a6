import type { TaskPriority } from '../types';

export function makePriority(taskId: string, overrides: Partial<TaskPriority> = {}): TaskPriority {
    return {
        taskId,
        score: 5,
        factors: { importance: 5, timeline: 0, conflict: 0, milestone: 0 },
        band: 'LOW',
        baseWeight: 0.5,
        visualWeight: 0.5,
        prominence: 0.3,
        isMilestone: false,
        ...overrides,
    };
}
