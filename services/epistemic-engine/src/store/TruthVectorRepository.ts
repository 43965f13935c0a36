/**
 * TruthVectorRepository - Storage seam for truth vectors
 *
 * Allows the in-memory store to be swapped for a durable one.
 */
import type { TruthVector } from '../types';

export interface TruthVectorRepository {
  /** Vector for a claim key, or null if never observed */
  get(claimKey: string): Promise<TruthVector | null>;

  /** Insert or replace the vector for its claim key */
  save(vector: TruthVector): Promise<void>;

  /** Point-in-time snapshot of every vector */
  list(): Promise<TruthVector[]>;

  size(): Promise<number>;
}

/**
 * Holds frozen vectors; readers always get a consistent snapshot.
 */
export class InMemoryTruthVectorRepository implements TruthVectorRepository {
  private readonly vectors: Map<string, TruthVector> = new Map();

  async get(claimKey: string): Promise<TruthVector | null> {
    return this.vectors.get(claimKey) ?? null;
  }

  async save(vector: TruthVector): Promise<void> {
    this.vectors.set(vector.claimKey, Object.isFrozen(vector) ? vector : Object.freeze({ ...vector }));
  }

  async list(): Promise<TruthVector[]> {
    return Array.from(this.vectors.values());
  }

  async size(): Promise<number> {
    return this.vectors.size;
  }
}
