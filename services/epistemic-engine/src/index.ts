/**
 * Epistemic validation engine
 */

export { EpistemicEngine, type EpistemicEngineEvents, type EpistemicEngineOptions } from './engine/EpistemicEngine';
export { ContradictionDetector } from './engine/ContradictionDetector';
export { EpistemicStateMachine, type TransitionResult } from './engine/EpistemicStateMachine';
export { type ConfidenceAssessment, ConfidencePolicy } from './engine/ConfidencePolicy';
export { DependencyGraph, type IdCollection } from './graph/DependencyGraph';
export {
  currentValues,
  type MergeOutcome,
  TruthVectorStore,
  type TruthVectorStoreDeps,
  type VectorLookup,
} from './store/TruthVectorStore';
export { InMemoryTruthVectorRepository, type TruthVectorRepository } from './store/TruthVectorRepository';
export { KeyedMutex } from './store/KeyedMutex';
export { compareConsensus, ConsensusEvaluator } from './consensus/ConsensusEvaluator';
export {
  type ConfidenceWeights,
  type ContradictionConfig,
  createEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  EngineConfigSchema,
  type InvestigationConfig,
  loadEngineConfigFromEnv,
  type StateThresholds,
} from './config/EngineConfig';
export { LineageConfigSchema, type LineageMap, loadLineageFile, parseLineageConfig } from './config/lineage';
export {
  ClaimIdentitySchema,
  ObservationInputSchema,
  type ObservationInput,
  parseClaimIdentity,
  parseObservation,
} from './schemas/observation';
export { ConfigValidationError, InvariantViolationError, UnknownClaimError, ValidationError } from './errors';
export { claimKeyOf, vectorIdOf } from './types/claimKey';
export * from './types';
