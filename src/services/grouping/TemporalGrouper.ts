import type { Task } from '../../types';
import { DateUtils } from '../../utils/DateUtils';
import { TaskSorter } from '../sort/TaskSorter';

export interface TemporalCluster {
    tasks: Task[];
    startDate: string;
    endDate: string;
}

/**
 * Partitions tasks into clusters that are closed under inclusive date overlap.
 */
export class TemporalGrouper {
    static overlaps(a: Task, b: Task): boolean {
        return a.startDate <= b.endDate && b.startDate <= a.endDate;
    }

    group(tasks: readonly Task[]): TemporalCluster[] {
        const sorted = TaskSorter.defaultSort(tasks);
        const grouped = new Set<string>();
        const clusters: TemporalCluster[] = [];

        for (const seed of sorted) {
            if (grouped.has(seed.id)) continue;

            const members: Task[] = [seed];
            grouped.add(seed.id);

            // Absorb until a full scan adds nothing, so A-B-C chains end up together
            let absorbed = true;
            while (absorbed) {
                absorbed = false;
                for (const candidate of sorted) {
                    if (grouped.has(candidate.id)) continue;
                    if (members.some(member => TemporalGrouper.overlaps(member, candidate))) {
                        members.push(candidate);
                        grouped.add(candidate.id);
                        absorbed = true;
                    }
                }
            }

            const ordered = TaskSorter.defaultSort(members);
            clusters.push({
                tasks: ordered,
                startDate: ordered.reduce((min, t) => DateUtils.minDate(min, t.startDate), seed.startDate),
                endDate: ordered.reduce((max, t) => DateUtils.maxDate(max, t.endDate), seed.endDate),
            });
        }

        return clusters;
    }
}
