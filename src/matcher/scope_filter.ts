import { enclosingNames } from '../indexer/scopes.js';
import type { ScopeConstraint, SourceUnit } from '../types.js';

export interface ScopeFilter {
  (unit: SourceUnit, tokenIndex: number): boolean;
}

/**
 * Build the `inside` / `not_inside` check for a pattern. Returns null when the
 * pattern carries neither list.
 */
export function compileScopeFilter(constraint: ScopeConstraint): ScopeFilter | null {
  const inside = constraint.inside ?? [];
  const notInside = constraint.not_inside ?? [];
  if (inside.length === 0 && notInside.length === 0) return null;

  return (unit, tokenIndex) => {
    const names = enclosingNames(unit, tokenIndex);
    if (inside.length > 0 && !inside.some((name) => names.has(name))) return false;
    return !notInside.some((name) => names.has(name));
  };
}
