/**
 * ContradictionDetector - Scalar disagreement among the values reported for
 * one claim. 0 is full agreement, 1 maximal disagreement.
 */
import type { ContradictionConfig } from '../config/EngineConfig';
import { ValidationError } from '../errors';
import type { ClaimValue } from '../types';

const DEFAULT_CONFIG: ContradictionConfig = {
  divergenceThreshold: 0.1,
  epsilon: 1e-9,
};

export class ContradictionDetector {
  private readonly config: ContradictionConfig;

  constructor(config: Partial<ContradictionConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!(this.config.divergenceThreshold > 0) || !(this.config.epsilon > 0)) {
      throw new ValidationError(
        'divergenceThreshold and epsilon must be positive',
        'contradiction',
        this.config,
      );
    }
  }

  score(values: readonly ClaimValue[]): number {
    if (values.length < 2) return 0;

    const numeric: number[] = [];
    const categorical: string[] = [];
    for (const value of values) {
      if (typeof value === 'number') numeric.push(value);
      else categorical.push(value);
    }

    if (numeric.length > 0 && categorical.length > 0) {
      throw new ValidationError('cannot score mixed numeric and categorical values', 'values', values);
    }

    return numeric.length > 0 ? this.numericScore(numeric) : this.categoricalScore(categorical);
  }

  /**
   * Relative spread (max - min) / max(|mean|, epsilon), saturating at the
   * divergence threshold.
   */
  numericScore(values: readonly number[]): number {
    if (values.length < 2) return 0;

    let min = Infinity;
    let max = -Infinity;
    let mean = 0;
    for (const value of values) {
      if (!Number.isFinite(value)) {
        throw new ValidationError('numeric values must be finite', 'values', value);
      }
      min = Math.min(min, value);
      max = Math.max(max, value);
      mean += value / values.length;
    }

    if (max === min) return 0;

    const spread = (max - min) / Math.max(Math.abs(mean), this.config.epsilon);
    return Math.min(1, spread / this.config.divergenceThreshold);
  }

  /**
   * Fraction of values that disagree with the majority value
   */
  categoricalScore(values: readonly string[]): number {
    if (values.length < 2) return 0;

    const counts = new Map<string, number>();
    let majority = 0;
    for (const value of values) {
      const count = (counts.get(value) ?? 0) + 1;
      counts.set(value, count);
      majority = Math.max(majority, count);
    }

    return 1 - majority / values.length;
  }
}
