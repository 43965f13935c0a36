/**
 * Core data model for the epistemic validation engine
 */

/**
 * Trust classification of a truth vector. Recomputed on every merge.
 */
export enum EpistemicState {
  RAW_OBSERVATION = 'RAW_OBSERVATION',
  CORROBORATED = 'CORROBORATED',
  DISPUTED = 'DISPUTED',
  ANOMALOUS = 'ANOMALOUS',
  ARCHETYPAL = 'ARCHETYPAL',
}

export const ALL_EPISTEMIC_STATES: readonly EpistemicState[] = [
  EpistemicState.RAW_OBSERVATION,
  EpistemicState.CORROBORATED,
  EpistemicState.DISPUTED,
  EpistemicState.ANOMALOUS,
  EpistemicState.ARCHETYPAL,
];

export type ValueKind = 'numeric' | 'categorical';

export type ClaimValue = number | string;

/**
 * Normalized key for "the same fact". Callers normalize the fields.
 */
export interface ClaimIdentity {
  readonly subject: string;
  readonly metric: string;
  readonly timeBucket: string;
}

/**
 * One source's reported value for a claim. Frozen once recorded.
 */
export interface Observation {
  readonly sourceId: string;
  readonly claim: ClaimIdentity;
  readonly value: ClaimValue;
  readonly valueKind: ValueKind;
  /** Epoch ms reported by the source */
  readonly timestamp: number;
  readonly upstreamLineage: readonly string[];
  /** Epoch ms at which the engine accepted it */
  readonly receivedAt: number;
}

/**
 * Aggregate scores fed to the state machine
 */
export interface EvidenceScores {
  readonly sourceCount: number;
  readonly contradictionScore: number;
  readonly independenceScore: number;
}

export interface StateTransition extends EvidenceScores {
  readonly from: EpistemicState;
  readonly to: EpistemicState;
  readonly at: number;
}

/**
 * Aggregate record for one claim identity. Each merge produces a new,
 * frozen instance.
 */
export interface TruthVector {
  readonly vectorId: string;
  readonly claimKey: string;
  readonly claim: ClaimIdentity;
  readonly valueKind: ValueKind;
  /** Distinct sources in first-report order */
  readonly sources: readonly string[];
  readonly observations: readonly Observation[];
  readonly confidence: number;
  readonly contradictionScore: number;
  readonly independenceScore: number;
  readonly epistemicState: EpistemicState;
  readonly requiresInvestigation: boolean;
  readonly isConsensus: boolean;
  readonly stateHistory: readonly StateTransition[];
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface IngestResult {
  readonly vectorId: string;
  readonly claimKey: string;
  readonly epistemicState: EpistemicState;
  readonly confidence: number;
  readonly created: boolean;
  readonly duplicate: boolean;
}

export interface HiddenConvergence {
  readonly sourceA: string;
  readonly sourceB: string;
  /** Jaccard overlap of the two upstream closures */
  readonly jaccard: number;
}

export interface StoreSummary {
  readonly total: number;
  readonly byState: Readonly<Record<EpistemicState, number>>;
  readonly requiringInvestigation: number;
  readonly observations: number;
}
