/**
 * EpistemicStateMachine - Maps current evidence to a trust state
 *
 * States are not sticky. Each merge evaluates the state from scratch so a
 * trusted claim that later receives contradicting evidence falls back.
 */
import type { StateThresholds } from '../config/EngineConfig';
import { ConfigValidationError } from '../errors';
import { EpistemicState, type EvidenceScores, type StateTransition } from '../types';

const DEFAULT_THRESHOLDS: StateThresholds = {
  corroborationMaxContradiction: 0.3,
  disputeMinContradiction: 0.7,
  archetypalMinSources: 3,
  archetypalMinIndependence: 0.5,
};

export interface TransitionResult {
  state: EpistemicState;
  /** Present only when the state changed */
  transition: StateTransition | null;
}

export class EpistemicStateMachine {
  private readonly thresholds: StateThresholds;

  constructor(thresholds: Partial<StateThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    const t = this.thresholds;
    if (
      !(t.corroborationMaxContradiction > 0) ||
      t.corroborationMaxContradiction > t.disputeMinContradiction ||
      t.disputeMinContradiction > 1 ||
      !Number.isInteger(t.archetypalMinSources) ||
      t.archetypalMinSources < 2
    ) {
      throw new ConfigValidationError('invalid epistemic state thresholds', [JSON.stringify(t)]);
    }
  }

  getThresholds(): Readonly<StateThresholds> {
    return this.thresholds;
  }

  isArchetypalEligible(evidence: EvidenceScores): boolean {
    return (
      evidence.sourceCount >= this.thresholds.archetypalMinSources &&
      evidence.contradictionScore < this.thresholds.corroborationMaxContradiction &&
      evidence.independenceScore > this.thresholds.archetypalMinIndependence
    );
  }

  evaluate(evidence: EvidenceScores): EpistemicState {
    if (evidence.sourceCount <= 1) {
      return EpistemicState.RAW_OBSERVATION;
    }
    if (this.isArchetypalEligible(evidence)) {
      return EpistemicState.ARCHETYPAL;
    }
    if (evidence.contradictionScore < this.thresholds.corroborationMaxContradiction) {
      return EpistemicState.CORROBORATED;
    }
    if (evidence.contradictionScore >= this.thresholds.disputeMinContradiction) {
      return EpistemicState.DISPUTED;
    }
    // Ambiguous band: needs human review
    return EpistemicState.ANOMALOUS;
  }

  transition(current: EpistemicState, evidence: EvidenceScores, at: number): TransitionResult {
    const state = this.evaluate(evidence);
    if (state === current) {
      return { state, transition: null };
    }
    return {
      state,
      transition: Object.freeze({
        from: current,
        to: state,
        at,
        sourceCount: evidence.sourceCount,
        contradictionScore: evidence.contradictionScore,
        independenceScore: evidence.independenceScore,
      }),
    };
  }
}
