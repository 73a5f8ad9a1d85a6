import type { Task } from '../types';

export function makeTask(id: string, startDate: string, endDate: string, overrides: Partial<Task> = {}): Task {
    return {
        id,
        name: `Task ${id}`,
        category: 'RESEARCH',
        description: '',
        startDate,
        endDate,
        priority: 2,
        status: 'Planned',
        assignee: 'test-user',
        ...overrides,
    };
}
