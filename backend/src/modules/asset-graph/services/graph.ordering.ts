/**
 * Deterministic ordering helpers.
 * Ids compare by UTF-16 code unit so the result never depends on locale.
 */

import type { Relationship } from '../contracts/asset-graph.types.js';

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function relationshipKey(rel: Pick<Relationship, 'source' | 'target' | 'kind'>): string {
  return `${rel.source}\u0000${rel.target}\u0000${rel.kind}`;
}

/** (source, target, kind) ascending */
export function compareRelationships(a: Relationship, b: Relationship): number {
  return compareIds(a.source, b.source) || compareIds(a.target, b.target) || compareIds(a.kind, b.kind);
}

/** Weight descending, then (source, target, kind) ascending */
export function compareByWeight(a: Relationship, b: Relationship): number {
  return b.weight - a.weight || compareRelationships(a, b);
}

export function otherEndpoint(rel: Relationship, id: string): string {
  return rel.source === id ? rel.target : rel.source;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
