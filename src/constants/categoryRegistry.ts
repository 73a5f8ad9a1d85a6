export type CategoryDefinition = {
    key: string;
    displayName: string;
    color: string;
    /** 1 - 10, 5 is neutral */
    priorityWeight: number;
    milestone?: boolean;
};

export const FALLBACK_CATEGORY: CategoryDefinition = {
    key: 'UNCATEGORIZED',
    displayName: 'Uncategorized',
    color: '#CCCCCC',
    priorityWeight: 5,
};

export const DEFAULT_CATEGORIES: readonly CategoryDefinition[] = [
    { key: 'PROPOSAL', displayName: 'Proposal', color: '#4A90E2', priorityWeight: 6 },
    { key: 'LASER', displayName: 'Laser', color: '#F5A623', priorityWeight: 5 },
    { key: 'IMAGING', displayName: 'Imaging', color: '#7ED321', priorityWeight: 5 },
    { key: 'ADMIN', displayName: 'Admin', color: '#BD10E0', priorityWeight: 3 },
    { key: 'DISSERTATION', displayName: 'Dissertation', color: '#D0021B', priorityWeight: 8 },
    { key: 'RESEARCH', displayName: 'Research', color: '#50E3C2', priorityWeight: 5 },
    { key: 'PUBLICATION', displayName: 'Publication', color: '#B8E986', priorityWeight: 7 },
    { key: 'MILESTONE', displayName: 'Milestone', color: '#D0021B', priorityWeight: 10, milestone: true },
];

/**
 * Immutable category table, built once and handed to the layout engine.
 * Keys match case-insensitively; unknown keys resolve to FALLBACK_CATEGORY.
 */
export class CategoryRegistry {
    private readonly entries: ReadonlyMap<string, CategoryDefinition>;

    constructor(
        definitions: readonly CategoryDefinition[] = DEFAULT_CATEGORIES,
        private readonly fallback: CategoryDefinition = FALLBACK_CATEGORY,
    ) {
        const entries = new Map<string, CategoryDefinition>();
        for (const def of definitions) {
            const key = CategoryRegistry.normalize(def.key);
            if (!key) {
                throw new Error('[CategoryRegistry] Category key must not be empty');
            }
            if (entries.has(key)) {
                throw new Error(`[CategoryRegistry] Duplicate category key: ${def.key}`);
            }
            entries.set(key, Object.freeze({ ...def }));
        }
        this.entries = entries;
    }

    static normalize(key: string): string {
        return key.trim().toUpperCase();
    }

    resolve(category: string): CategoryDefinition {
        return this.entries.get(CategoryRegistry.normalize(category)) ?? this.fallback;
    }

    has(category: string): boolean {
        return this.entries.has(CategoryRegistry.normalize(category));
    }
}
