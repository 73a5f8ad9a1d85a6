import { describe, expect, it } from 'vitest';
import { makeBar } from '../../testUtils/makeBar';
import { resolveGridConfig } from '../config/GridConfigSchema';
import { LayoutValidator } from './LayoutValidator';

describe('LayoutValidator', () => {
    it('reports same-row overlaps and bars below the day cell', () => {
        const validator = new LayoutValidator(resolveGridConfig());
        validator.validate([
            makeBar('a', { x: 0, y: 6, width: 40, height: 4 }),
            makeBar('b', { x: 20, y: 8, width: 40, height: 4 }),
            makeBar('c', { x: 20, y: 8, width: 40, height: 4 }, { row: 1 }),
            makeBar('d', { x: 200, y: 28, width: 20, height: 4 }, { row: 2 }),
        ]);

        expect(validator.getIssues()).toEqual([
            'Task bars overlap in row 0: a and b',
            'Task bar d extends below the day cell',
        ]);

        validator.clearIssues();
        expect(validator.getIssues()).toEqual([]);
    });
});
