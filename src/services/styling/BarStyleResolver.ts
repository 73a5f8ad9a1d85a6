import type { CategoryRegistry } from '../../constants/categoryRegistry';

const BORDER_COLOR = '#000000';

export interface BarStyle {
    color: string;
    borderColor: string;
    opacity: number;
    zIndex: number;
}

/**
 * Resolves bar paint from the category table and prominence.
 * Pure data, no rendering.
 */
export class BarStyleResolver {
    constructor(
        private readonly categories: CategoryRegistry,
        private readonly defaultOpacity: number,
    ) {}

    resolve(category: string, prominence: number): BarStyle {
        return {
            color: this.categories.resolve(category).color,
            borderColor: BORDER_COLOR,
            opacity: this.defaultOpacity,
            // More prominent bars paint on top
            zIndex: Math.round(prominence * 10) + 1,
        };
    }
}
