import { describe, expect, it } from 'vitest';
import { CategoryRegistry, FALLBACK_CATEGORY } from './categoryRegistry';

describe('CategoryRegistry', () => {
    it('resolves keys case-insensitively', () => {
        const registry = new CategoryRegistry();
        expect(registry.resolve('proposal').color).toBe('#4A90E2');
        expect(registry.resolve(' Dissertation ').priorityWeight).toBe(8);
    });

    it('falls back for unknown categories', () => {
        const registry = new CategoryRegistry();
        expect(registry.resolve('GARDENING')).toBe(FALLBACK_CATEGORY);
        expect(registry.has('GARDENING')).toBe(false);
    });

    it('rejects duplicate keys', () => {
        expect(() => new CategoryRegistry([
            { key: 'ops', displayName: 'Ops', color: '#000000', priorityWeight: 5 },
            { key: 'OPS', displayName: 'Ops again', color: '#111111', priorityWeight: 5 },
        ])).toThrow('[CategoryRegistry] Duplicate category key: OPS');
    });

    it('rejects empty keys', () => {
        expect(() => new CategoryRegistry([
            { key: '  ', displayName: 'Blank', color: '#000000', priorityWeight: 5 },
        ])).toThrow('[CategoryRegistry] Category key must not be empty');
    });
});
