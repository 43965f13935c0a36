/**
 * DependencyGraph - Tracks which sources derive from which upstream providers
 *
 * Two sources that share an upstream provider cannot corroborate each other
 * independently. Lineage is followed transitively and may contain cycles.
 */
import { ValidationError } from '../errors';
import type { HiddenConvergence } from '../types';

function normalizeId(id: unknown, field: string): string {
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, field, id);
  }
  return id.trim();
}

/** A list or set of ids. A bare string is not one. */
export type IdCollection = readonly string[] | ReadonlySet<string>;

function idsOf(ids: IdCollection, field: string): string[] {
  if (typeof ids === 'string' || !(Array.isArray(ids) || ids instanceof Set)) {
    throw new ValidationError(`${field} must be an array or set of ids`, field, ids);
  }
  return Array.from(ids);
}

export class DependencyGraph {
  private readonly upstream: Map<string, Set<string>> = new Map();
  private readonly downstream: Map<string, Set<string>> = new Map();

  /**
   * Register (or extend) the upstream set of a source. Idempotent.
   * @throws ValidationError on empty ids or a bare string in place of the id
   * list; nothing is registered in that case
   */
  recordLineage(sourceId: string, upstreamIds: IdCollection): void {
    const source = normalizeId(sourceId, 'sourceId');
    const deps = idsOf(upstreamIds, 'upstreamIds').map((id) => normalizeId(id, 'upstreamIds'));

    const edges = this.ensureNode(source);
    for (const dep of deps) {
      if (dep === source) continue;
      this.ensureNode(dep);
      edges.add(dep);
      this.ensureDownstream(dep).add(source);
    }
  }

  private ensureNode(id: string): Set<string> {
    const existing = this.upstream.get(id);
    if (existing) return existing;
    const created = new Set<string>();
    this.upstream.set(id, created);
    return created;
  }

  private ensureDownstream(id: string): Set<string> {
    const existing = this.downstream.get(id);
    if (existing) return existing;
    const created = new Set<string>();
    this.downstream.set(id, created);
    return created;
  }

  has(id: string): boolean {
    return this.upstream.has(id);
  }

  get size(): number {
    return this.upstream.size;
  }

  nodes(): string[] {
    return Array.from(this.upstream.keys());
  }

  directUpstreamOf(sourceId: string): string[] {
    return Array.from(this.upstream.get(sourceId) ?? []);
  }

  downstreamOf(providerId: string): string[] {
    return Array.from(this.downstream.get(providerId) ?? []);
  }

  /**
   * All upstream providers reachable from a source, excluding the source.
   * Unknown sources have none.
   */
  upstreamOf(sourceId: string): Set<string> {
    const visited = new Set<string>();
    const stack = [sourceId];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      for (const dep of this.upstream.get(current) ?? []) {
        if (!visited.has(dep)) stack.push(dep);
      }
    }

    visited.delete(sourceId);
    return visited;
  }

  sharesUpstream(a: string, b: string): boolean {
    if (a === b) return true;
    return this.pairShares(a, this.upstreamOf(a), b, this.upstreamOf(b));
  }

  private pairShares(a: string, upA: Set<string>, b: string, upB: Set<string>): boolean {
    if (upA.has(b) || upB.has(a)) return true;
    const [smaller, larger] = upA.size <= upB.size ? [upA, upB] : [upB, upA];
    for (const id of smaller) {
      if (larger.has(id)) return true;
    }
    return false;
  }

  /**
   * 1 - sharedPairs / C(n, 2) over the distinct sources.
   * Fewer than two sources score 0: a lone source corroborates nothing.
   */
  independenceScore(sources: IdCollection): number {
    const unique = Array.from(new Set(idsOf(sources, 'sources')));
    const n = unique.length;
    if (n < 2) return 0;

    const closures = new Map(unique.map((id) => [id, this.upstreamOf(id)] as const));
    const closureOf = (id: string): Set<string> => closures.get(id) ?? new Set();

    let sharedPairs = 0;
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        const a = unique[i];
        const b = unique[j];
        if (a === undefined || b === undefined) continue;
        if (this.pairShares(a, closureOf(a), b, closureOf(b))) {
          sharedPairs++;
        }
      }
    }

    const totalPairs = (n * (n - 1)) / 2;
    return 1 - sharedPairs / totalPairs;
  }

  /**
   * Pairs of registered nodes whose upstream closures overlap by more than
   * `threshold` (Jaccard), strongest first.
   */
  findHiddenConvergences(threshold: number = 0.8): HiddenConvergence[] {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new ValidationError('threshold must be within [0, 1]', 'threshold', threshold);
    }

    const closures = this.nodes()
      .map((id) => ({ id, closure: this.upstreamOf(id) }))
      .filter((entry) => entry.closure.size > 0);

    const convergences: HiddenConvergence[] = [];
    for (let i = 0; i < closures.length; i++) {
      for (let j = i + 1; j < closures.length; j++) {
        const left = closures[i];
        const right = closures[j];
        if (left === undefined || right === undefined) continue;

        let overlap = 0;
        for (const id of left.closure) {
          if (right.closure.has(id)) overlap++;
        }
        const union = left.closure.size + right.closure.size - overlap;
        const jaccard = overlap / union;
        if (jaccard > threshold) {
          convergences.push({ sourceA: left.id, sourceB: right.id, jaccard });
        }
      }
    }

    return convergences.sort(
      (x, y) =>
        y.jaccard - x.jaccard ||
        x.sourceA.localeCompare(y.sourceA) ||
        x.sourceB.localeCompare(y.sourceB),
    );
  }
}
