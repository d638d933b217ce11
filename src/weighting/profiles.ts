import type { PerspectiveWeights } from '../types.js';

/**
 * Perspective weights per project category (clarity, consistency, deference).
 * Categories that lean on immersive content relax clarity and raise deference;
 * task-focused ones do the opposite.
 */
export const CATEGORY_WEIGHTS = {
  productivity: { clarity: 1.0, consistency: 1.0, deference: 0.6 },
  media: { clarity: 0.7, consistency: 0.8, deference: 1.0 },
  utility: { clarity: 1.0, consistency: 0.8, deference: 0.5 },
  social: { clarity: 0.9, consistency: 0.9, deference: 0.8 },
  game: { clarity: 0.6, consistency: 0.7, deference: 1.0 },
  education: { clarity: 1.0, consistency: 0.9, deference: 0.7 },
  health: { clarity: 1.0, consistency: 0.9, deference: 0.7 },
  finance: { clarity: 1.0, consistency: 1.0, deference: 0.6 },
  general: { clarity: 1.0, consistency: 1.0, deference: 1.0 },
} as const satisfies Record<string, PerspectiveWeights>;

export type ProjectCategory = keyof typeof CATEGORY_WEIGHTS;

export const DEFAULT_CATEGORY: ProjectCategory = 'general';

export const PROJECT_CATEGORIES = Object.keys(CATEGORY_WEIGHTS).filter(isProjectCategory);

export function isProjectCategory(value: string): value is ProjectCategory {
  return Object.hasOwn(CATEGORY_WEIGHTS, value);
}

/**
 * Weights for a category. Unknown categories get the neutral `general` row;
 * callers that must reject them check `isProjectCategory` first.
 */
export function resolveWeights(category: string): PerspectiveWeights {
  const row = isProjectCategory(category) ? CATEGORY_WEIGHTS[category] : CATEGORY_WEIGHTS[DEFAULT_CATEGORY];
  return { ...row };
}
