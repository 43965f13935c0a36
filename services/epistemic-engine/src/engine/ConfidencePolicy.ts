/**
 * ConfidencePolicy - Confidence as a function of the current state and
 * evidence. Baseline 0.5; corroboration and archetypal consensus add,
 * disputes, anomalies and shared upstreams subtract.
 */
import type { ConfidenceWeights } from '../config/EngineConfig';
import { EpistemicState, type EvidenceScores } from '../types';

const DEFAULT_WEIGHTS: ConfidenceWeights = {
  baseline: 0.5,
  corroborationBonus: 0.2,
  sharedUpstreamPenalty: 0.2,
  lowIndependenceThreshold: 0.25,
  archetypalBonus: 0.2,
  disputedPenalty: 0.2,
  anomalousPenalty: 0.1,
};

export interface ConfidenceAssessment {
  value: number;
  /** Before clamping to [0, 1] */
  raw: number;
  clamped: boolean;
}

export class ConfidencePolicy {
  private readonly weights: ConfidenceWeights;

  constructor(weights: Partial<ConfidenceWeights> = {}) {
    this.weights = { ...DEFAULT_WEIGHTS, ...weights };
  }

  getWeights(): Readonly<ConfidenceWeights> {
    return this.weights;
  }

  hasSharedUpstreamPenalty(evidence: EvidenceScores): boolean {
    return (
      evidence.sourceCount >= 2 &&
      evidence.independenceScore <= this.weights.lowIndependenceThreshold
    );
  }

  assess(state: EpistemicState, evidence: EvidenceScores): ConfidenceAssessment {
    const w = this.weights;
    let adjustment = 0;

    switch (state) {
      case EpistemicState.ARCHETYPAL:
        adjustment += w.corroborationBonus + w.archetypalBonus;
        break;
      case EpistemicState.CORROBORATED:
        adjustment += w.corroborationBonus;
        break;
      case EpistemicState.DISPUTED:
        adjustment -= w.disputedPenalty;
        break;
      case EpistemicState.ANOMALOUS:
        adjustment -= w.anomalousPenalty;
        break;
      case EpistemicState.RAW_OBSERVATION:
        break;
    }

    if (this.hasSharedUpstreamPenalty(evidence)) {
      adjustment -= w.sharedUpstreamPenalty;
    }

    const raw = w.baseline + adjustment;
    const value = Math.min(1, Math.max(0, raw));
    return { value, raw, clamped: value !== raw };
  }
}
