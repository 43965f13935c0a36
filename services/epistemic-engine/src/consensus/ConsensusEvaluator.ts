/**
 * ConsensusEvaluator - Ranks the truth vectors currently trusted
 *
 * Read-only. Works on a point-in-time snapshot of the repository and never
 * takes a claim lock.
 */
import { EpistemicState, type TruthVector } from '../types';
import type { TruthVectorRepository } from '../store/TruthVectorRepository';

/**
 * Highest confidence first, then most recently updated, then vector id
 */
export function compareConsensus(a: TruthVector, b: TruthVector): number {
  return (
    b.confidence - a.confidence ||
    b.updatedAt - a.updatedAt ||
    a.vectorId.localeCompare(b.vectorId)
  );
}

export class ConsensusEvaluator {
  constructor(private readonly repository: TruthVectorRepository) {}

  /**
   * ARCHETYPAL vectors, ranked. The snapshot is taken when iteration starts.
   */
  async *consensusVectors(): AsyncGenerator<TruthVector, void, undefined> {
    for (const vector of await this.rank()) {
      yield vector;
    }
  }

  async rank(limit?: number): Promise<TruthVector[]> {
    const snapshot = await this.repository.list();
    const ranked = snapshot
      .filter((vector) => vector.epistemicState === EpistemicState.ARCHETYPAL)
      .sort(compareConsensus);
    return limit === undefined ? ranked : ranked.slice(0, Math.max(0, limit));
  }
}
