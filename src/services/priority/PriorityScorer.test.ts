import { describe, expect, it } from 'vitest';
import type { Overlap } from '../../types';
import { CategoryRegistry } from '../../constants/categoryRegistry';
import { makeTask } from '../../testUtils/makeTask';
import { OverlapAnalyzer } from '../overlap/OverlapAnalyzer';
import { PriorityScorer } from './PriorityScorer';

const NOW = new Date(2025, 2, 1);
const noOverlaps = new Map<string, Overlap[]>();

describe('PriorityScorer', () => {
    const scorer = new PriorityScorer(new CategoryRegistry());

    it('maps scores onto bands', () => {
        expect(PriorityScorer.bandFor(15)).toBe('CRITICAL');
        expect(PriorityScorer.bandFor(14.99)).toBe('HIGH');
        expect(PriorityScorer.bandFor(6)).toBe('MEDIUM');
        expect(PriorityScorer.bandFor(3)).toBe('LOW');
        expect(PriorityScorer.bandFor(2.9)).toBe('MINIMAL');
    });

    it('detects milestones by name or category', () => {
        expect(scorer.isMilestone(makeTask('a', '2025-03-01', '2025-03-01', { name: 'Thesis milestone' }))).toBe(true);
        expect(scorer.isMilestone(makeTask('b', '2025-03-01', '2025-03-01', { category: 'milestone' }))).toBe(true);
        expect(scorer.isMilestone(makeTask('c', '2025-03-01', '2025-03-01'))).toBe(false);
    });

    it('scores a distant ordinary task from its factors', () => {
        // 10 days long, starts in 30 days, no conflicts
        const task = makeTask('t', '2025-03-31', '2025-04-10', { priority: 3, category: 'RESEARCH' });

        const result = scorer.score(task, { now: NOW, overlapsByTask: noOverlaps });

        expect(result.factors).toEqual({ importance: 8, timeline: 0, conflict: 0, milestone: 0 });
        expect(result.score).toBeCloseTo(2.8);
        expect(result.band).toBe('MINIMAL');
        expect(result.baseWeight).toBeCloseTo(2.8 / 15);
        expect(result.visualWeight).toBeCloseTo((2.8 / 15) * 1.2);
        expect(result.prominence).toBeCloseTo((2.8 / 15) * 1.2 * 0.2);
    });

    it('ranks a nested milestone above the long task that contains it', () => {
        const research = makeTask('research', '2025-02-15', '2025-04-15', { priority: 2, category: 'RESEARCH' });
        const defense = makeTask('defense', '2025-03-05', '2025-03-05', {
            priority: 5, category: 'DISSERTATION', name: 'Defense MILESTONE',
        });
        const overlaps = new OverlapAnalyzer(1).analyzeGroup([research, defense]).overlaps;
        const input = { now: NOW, overlapsByTask: PriorityScorer.indexOverlaps(overlaps) };

        const milestone = scorer.score(defense, input);
        const longTask = scorer.score(research, input);

        expect(milestone.factors).toEqual({ importance: 20, timeline: 9, conflict: 7, milestone: 30 });
        expect(milestone.score).toBeCloseTo(15.5);
        expect(milestone.band).toBe('CRITICAL');
        expect(milestone.visualWeight).toBe(1);
        expect(milestone.prominence).toBe(1);

        expect(longTask.factors).toEqual({ importance: 7, timeline: 10, conflict: 7, milestone: 0 });
        expect(longTask.score).toBeCloseTo(6.7);
        expect(longTask.band).toBe('MEDIUM');
        expect(longTask.prominence).toBeCloseTo((6.7 / 15) * 1.2 * 0.6);

        expect(milestone.prominence).toBeGreaterThan(longTask.prominence);
    });

    it('boosts prominence for milestone categories', () => {
        const registry = new CategoryRegistry([
            { key: 'GATE', displayName: 'Gate', color: '#123456', priorityWeight: 5, milestone: true },
            { key: 'PLAIN', displayName: 'Plain', color: '#654321', priorityWeight: 5 },
        ]);
        const gateScorer = new PriorityScorer(registry);
        const task = makeTask('g', '2025-03-31', '2025-04-10', { priority: 1 });

        const gate = gateScorer.score({ ...task, category: 'GATE' }, { now: NOW, overlapsByTask: noOverlaps });
        const plain = gateScorer.score({ ...task, category: 'PLAIN' }, { now: NOW, overlapsByTask: noOverlaps });

        // importance 2 + 10 + 2, milestone factor 15: score (4.9 + 2.25) vs 1.4
        expect(gate.score).toBeCloseTo(7.15);
        expect(plain.score).toBeCloseTo(1.4);
        expect(gate.prominence).toBeCloseTo((7.15 / 15) * 1.2 * 0.6 * 1.2);
    });
});
