/**
 * TruthVectorStore - One truth vector per claim identity
 *
 * Merges each accepted observation into its vector under a per-claim lock:
 * contradiction and independence are recomputed, the state machine picks
 * the state, the confidence policy scores it, and the new frozen vector is
 * saved. Unrelated claims never contend.
 */
import { type Clock, Logger, SystemClock } from '@corroborate/shared';
import { createEngineConfig, type EngineConfig } from '../config/EngineConfig';
import { ConfidencePolicy } from '../engine/ConfidencePolicy';
import { ContradictionDetector } from '../engine/ContradictionDetector';
import { EpistemicStateMachine } from '../engine/EpistemicStateMachine';
import { InvariantViolationError, UnknownClaimError, ValidationError } from '../errors';
import { DependencyGraph } from '../graph/DependencyGraph';
import { parseClaimIdentity, parseObservation } from '../schemas/observation';
import {
  type ClaimIdentity,
  type ClaimValue,
  EpistemicState,
  type EvidenceScores,
  type IngestResult,
  type Observation,
  type StateTransition,
  type StoreSummary,
  type TruthVector,
} from '../types';
import { claimKeyOf, vectorIdOf } from '../types/claimKey';
import { KeyedMutex } from './KeyedMutex';
import { InMemoryTruthVectorRepository, type TruthVectorRepository } from './TruthVectorRepository';

export type VectorLookup =
  | { readonly found: true; readonly vector: TruthVector }
  | { readonly found: false; readonly error: UnknownClaimError };

/**
 * Everything a merge changed, for callers that publish events
 */
export interface MergeOutcome {
  result: IngestResult;
  vector: TruthVector;
  previous: TruthVector | null;
  transition: StateTransition | null;
}

export interface TruthVectorStoreDeps {
  graph: DependencyGraph;
  config?: EngineConfig;
  repository?: TruthVectorRepository;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Latest value per source, in source order
 */
export function currentValues(
  sources: readonly string[],
  observations: readonly Observation[],
): ClaimValue[] {
  const latest = new Map<string, ClaimValue>();
  for (const observation of observations) {
    latest.set(observation.sourceId, observation.value);
  }
  return sources.flatMap((source) => {
    const value = latest.get(source);
    return value === undefined ? [] : [value];
  });
}

function latestValueOf(vector: TruthVector, sourceId: string): ClaimValue | undefined {
  for (let i = vector.observations.length - 1; i >= 0; i--) {
    const observation = vector.observations[i];
    if (observation !== undefined && observation.sourceId === sourceId) {
      return observation.value;
    }
  }
  return undefined;
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

export class TruthVectorStore {
  private readonly config: EngineConfig;
  private readonly graph: DependencyGraph;
  private readonly repository: TruthVectorRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly mutex = new KeyedMutex();
  private readonly detector: ContradictionDetector;
  private readonly stateMachine: EpistemicStateMachine;
  private readonly confidencePolicy: ConfidencePolicy;

  constructor(deps: TruthVectorStoreDeps) {
    this.config = deps.config ?? createEngineConfig();
    this.graph = deps.graph;
    this.repository = deps.repository ?? new InMemoryTruthVectorRepository();
    this.logger = deps.logger ?? Logger.forComponent('TruthVectorStore');
    this.clock = deps.clock ?? new SystemClock();
    this.detector = new ContradictionDetector(this.config.contradiction);
    this.stateMachine = new EpistemicStateMachine(this.config.thresholds);
    this.confidencePolicy = new ConfidencePolicy(this.config.confidence);
  }

  /**
   * Validate and merge one observation.
   * Declared lineage is registered in the graph once the observation passes
   * validation, independently of whether the merge is saved.
   * @throws ValidationError if the observation is malformed or its value kind
   * differs from the claim's; the vector and the graph are left unchanged
   * @throws InvariantViolationError if the merged vector breaks a model
   * invariant; the vector is left unchanged
   */
  async ingest(input: unknown): Promise<MergeOutcome> {
    const correlationId = Logger.generateCorrelationId();
    let observation: Observation;
    try {
      observation = parseObservation(input, this.clock.now());
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`Rejected observation: ${error.message}`, correlationId, {
          field: error.field,
        });
      }
      throw error;
    }

    const claimKey = claimKeyOf(observation.claim);
    return this.mutex.runExclusive(claimKey, () =>
      this.merge(claimKey, observation, correlationId),
    );
  }

  private async merge(
    claimKey: string,
    observation: Observation,
    correlationId: string,
  ): Promise<MergeOutcome> {
    const existing = await this.repository.get(claimKey);

    if (existing && existing.valueKind !== observation.valueKind) {
      const error = new ValidationError(
        `Claim ${claimKey} holds ${existing.valueKind} values, got ${observation.valueKind}`,
        'valueKind',
        observation.valueKind,
      );
      this.logger.warn(`Rejected observation: ${error.message}`, correlationId, {
        sourceId: observation.sourceId,
      });
      throw error;
    }

    // Stays recorded whether or not the merge below is saved
    this.graph.recordLineage(observation.sourceId, observation.upstreamLineage);

    if (existing && latestValueOf(existing, observation.sourceId) === observation.value) {
      this.logger.debug(`Duplicate observation ignored for ${claimKey}`, correlationId, {
        sourceId: observation.sourceId,
        vectorId: existing.vectorId,
      });
      return {
        result: this.summarize(existing, false, true),
        vector: existing,
        previous: existing,
        transition: null,
      };
    }

    const now = this.clock.now();
    const observations = existing ? [...existing.observations, observation] : [observation];
    const sources =
      existing === null
        ? [observation.sourceId]
        : existing.sources.includes(observation.sourceId)
          ? [...existing.sources]
          : [...existing.sources, observation.sourceId];

    const evidence: EvidenceScores = {
      sourceCount: sources.length,
      contradictionScore: this.detector.score(currentValues(sources, observations)),
      independenceScore: this.graph.independenceScore(sources),
    };

    const previousState = existing?.epistemicState ?? EpistemicState.RAW_OBSERVATION;
    const { state, transition } = this.stateMachine.transition(previousState, evidence, now);

    const confidence = this.confidencePolicy.assess(state, evidence);
    if (confidence.clamped) {
      this.logger.warn(`Confidence clamped for ${claimKey}`, correlationId, {
        raw: confidence.raw,
        value: confidence.value,
      });
    }

    const vector: TruthVector = Object.freeze({
      vectorId: existing?.vectorId ?? vectorIdOf(claimKey),
      claimKey,
      claim: existing?.claim ?? observation.claim,
      valueKind: observation.valueKind,
      sources: Object.freeze(sources),
      observations: Object.freeze(observations),
      confidence: confidence.value,
      contradictionScore: evidence.contradictionScore,
      independenceScore: evidence.independenceScore,
      epistemicState: state,
      requiresInvestigation: this.requiresInvestigation(
        state,
        evidence.contradictionScore,
        confidence.value,
      ),
      isConsensus:
        sources.length >= this.config.thresholds.archetypalMinSources &&
        evidence.contradictionScore < this.config.thresholds.corroborationMaxContradiction,
      stateHistory: Object.freeze(
        transition ? [...(existing?.stateHistory ?? []), transition] : [...(existing?.stateHistory ?? [])],
      ),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });

    this.assertInvariants(vector, correlationId);
    await this.repository.save(vector);

    if (!existing) {
      this.logger.info(`Truth vector created for ${claimKey}`, correlationId, {
        vectorId: vector.vectorId,
        sourceId: observation.sourceId,
      });
    }
    if (transition) {
      this.logger.info(
        `Epistemic state ${transition.from} -> ${transition.to} for ${claimKey}`,
        correlationId,
        {
          vectorId: vector.vectorId,
          sourceCount: transition.sourceCount,
          contradictionScore: transition.contradictionScore,
          independenceScore: transition.independenceScore,
          confidence: vector.confidence,
        },
      );
    }

    return {
      result: this.summarize(vector, existing === null, false),
      vector,
      previous: existing,
      transition,
    };
  }

  private requiresInvestigation(
    state: EpistemicState,
    contradictionScore: number,
    confidence: number,
  ): boolean {
    const { contradictionAbove, confidenceAbove } = this.config.investigation;
    return (
      state === EpistemicState.ANOMALOUS ||
      (contradictionScore > contradictionAbove && confidence > confidenceAbove)
    );
  }

  private summarize(vector: TruthVector, created: boolean, duplicate: boolean): IngestResult {
    return {
      vectorId: vector.vectorId,
      claimKey: vector.claimKey,
      epistemicState: vector.epistemicState,
      confidence: vector.confidence,
      created,
      duplicate,
    };
  }

  /**
   * @throws InvariantViolationError after logging it as fatal
   */
  private assertInvariants(vector: TruthVector, correlationId: string): void {
    const violations: Array<[string, unknown]> = [];

    for (const field of ['confidence', 'contradictionScore', 'independenceScore'] as const) {
      if (!isUnitInterval(vector[field])) {
        violations.push([field, vector[field]]);
      }
    }
    if (vector.sources.length === 0) {
      violations.push(['sources', vector.sources]);
    }
    if (
      vector.epistemicState === EpistemicState.ARCHETYPAL &&
      !this.stateMachine.isArchetypalEligible({
        sourceCount: vector.sources.length,
        contradictionScore: vector.contradictionScore,
        independenceScore: vector.independenceScore,
      })
    ) {
      violations.push(['epistemicState', vector.epistemicState]);
    }

    const first = violations[0];
    if (!first) return;

    const [field, value] = first;
    const error = new InvariantViolationError(
      `${field} out of bounds: ${JSON.stringify(value)}`,
      field,
      value,
      vector.vectorId,
    );
    this.logger.fatal('Truth vector invariant violated', error, correlationId, {
      claimKey: vector.claimKey,
      violations: violations.map(([name]) => name),
    });
    throw error;
  }

  async getVector(claim: ClaimIdentity): Promise<VectorLookup> {
    const claimKey = claimKeyOf(parseClaimIdentity(claim));
    const vector = await this.repository.get(claimKey);
    return vector
      ? { found: true, vector }
      : { found: false, error: new UnknownClaimError(claimKey) };
  }

  async snapshot(): Promise<TruthVector[]> {
    return this.repository.list();
  }

  async summary(): Promise<StoreSummary> {
    const vectors = await this.repository.list();
    const byState: Record<EpistemicState, number> = {
      [EpistemicState.RAW_OBSERVATION]: 0,
      [EpistemicState.CORROBORATED]: 0,
      [EpistemicState.DISPUTED]: 0,
      [EpistemicState.ANOMALOUS]: 0,
      [EpistemicState.ARCHETYPAL]: 0,
    };
    let requiringInvestigation = 0;
    let observations = 0;

    for (const vector of vectors) {
      byState[vector.epistemicState] += 1;
      if (vector.requiresInvestigation) requiringInvestigation++;
      observations += vector.observations.length;
    }

    return { total: vectors.length, byState, requiringInvestigation, observations };
  }

  /** Claim keys currently being merged */
  pendingMerges(): number {
    return this.mutex.size;
  }
}
