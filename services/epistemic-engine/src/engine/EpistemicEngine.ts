/**
 * EpistemicEngine - Entry point for data-collection agents and report
 * generators
 *
 * Owns one dependency graph, one truth vector store and one consensus
 * evaluator. Callers construct it and own its lifecycle.
 */
import { EventEmitter } from 'eventemitter3';
import { type Clock, Logger, SystemClock } from '@corroborate/shared';
import { createEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/EngineConfig';
import type { LineageMap } from '../config/lineage';
import { ConsensusEvaluator } from '../consensus/ConsensusEvaluator';
import { ValidationError } from '../errors';
import { DependencyGraph, type IdCollection } from '../graph/DependencyGraph';
import {
  InMemoryTruthVectorRepository,
  type TruthVectorRepository,
} from '../store/TruthVectorRepository';
import { type MergeOutcome, TruthVectorStore, type VectorLookup } from '../store/TruthVectorStore';
import type {
  ClaimIdentity,
  HiddenConvergence,
  IngestResult,
  StateTransition,
  StoreSummary,
  TruthVector,
} from '../types';

export interface EpistemicEngineEvents {
  vector_created: (vector: TruthVector) => void;
  vector_updated: (vector: TruthVector, previous: TruthVector) => void;
  state_changed: (vector: TruthVector, transition: StateTransition) => void;
  duplicate_ignored: (vector: TruthVector) => void;
  validation_error: (error: ValidationError) => void;
  investigation_required: (vector: TruthVector) => void;
}

export interface EpistemicEngineOptions {
  config?: EngineConfigInput;
  logger?: Logger;
  clock?: Clock;
  repository?: TruthVectorRepository;
  lineage?: LineageMap;
}

export class EpistemicEngine extends EventEmitter<EpistemicEngineEvents> {
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly graph: DependencyGraph;
  private readonly store: TruthVectorStore;
  private readonly evaluator: ConsensusEvaluator;

  constructor(options: EpistemicEngineOptions = {}) {
    super();
    this.config = createEngineConfig(options.config);
    this.logger = options.logger ?? Logger.forComponent('epistemic-engine');
    this.graph = new DependencyGraph();

    const repository = options.repository ?? new InMemoryTruthVectorRepository();
    this.store = new TruthVectorStore({
      graph: this.graph,
      config: this.config,
      repository,
      logger: this.logger,
      clock: options.clock ?? new SystemClock(),
    });
    this.evaluator = new ConsensusEvaluator(repository);

    if (options.lineage) {
      this.loadLineage(options.lineage);
    }
  }

  getConfig(): Readonly<EngineConfig> {
    return this.config;
  }

  /**
   * Validate and merge one observation into its truth vector.
   * Exact duplicates resolve with `duplicate: true` and change nothing.
   * A throwing event listener is logged and does not reject the call.
   * @throws ValidationError on malformed input
   */
  async ingest(input: unknown): Promise<IngestResult> {
    const timerId = this.logger.startTimer('ingest');
    try {
      const outcome = await this.store.ingest(input);
      try {
        this.publish(outcome);
      } catch (error) {
        // The merge is already saved
        this.logger.error(
          `Event listener failed for ${outcome.result.claimKey}`,
          error instanceof Error ? error : new Error(String(error)),
          undefined,
          { vectorId: outcome.result.vectorId },
        );
      }
      return outcome.result;
    } catch (error) {
      if (error instanceof ValidationError) {
        this.emit('validation_error', error);
      }
      throw error;
    } finally {
      this.logger.endTimer(timerId);
    }
  }

  private publish(outcome: MergeOutcome): void {
    const { vector, previous, transition, result } = outcome;

    if (result.duplicate) {
      this.emit('duplicate_ignored', vector);
      return;
    }

    if (previous === null) {
      this.emit('vector_created', vector);
    } else {
      this.emit('vector_updated', vector, previous);
    }

    if (transition) {
      this.emit('state_changed', vector, transition);
    }

    if (vector.requiresInvestigation && !(previous?.requiresInvestigation ?? false)) {
      this.logger.warn(`Claim ${vector.claimKey} requires investigation`, undefined, {
        vectorId: vector.vectorId,
        epistemicState: vector.epistemicState,
        contradictionScore: vector.contradictionScore,
      });
      this.emit('investigation_required', vector);
    }
  }

  /**
   * Register upstream providers for a source. Idempotent.
   * @throws ValidationError on empty ids
   */
  recordLineage(sourceId: string, upstreamIds: IdCollection): void {
    this.graph.recordLineage(sourceId, upstreamIds);
  }

  loadLineage(lineage: LineageMap): void {
    for (const [sourceId, upstreamIds] of Object.entries(lineage)) {
      this.graph.recordLineage(sourceId, upstreamIds);
    }
    this.logger.info(`Lineage loaded for ${Object.keys(lineage).length} sources`);
  }

  getVector(claim: ClaimIdentity): Promise<VectorLookup> {
    return this.store.getVector(claim);
  }

  consensusVectors(): AsyncGenerator<TruthVector, void, undefined> {
    return this.evaluator.consensusVectors();
  }

  rankConsensus(limit?: number): Promise<TruthVector[]> {
    return this.evaluator.rank(limit);
  }

  independenceScore(sourceIds: IdCollection): number {
    return this.graph.independenceScore(sourceIds);
  }

  findHiddenConvergences(threshold?: number): HiddenConvergence[] {
    return this.graph.findHiddenConvergences(threshold);
  }

  upstreamOf(sourceId: string): string[] {
    return Array.from(this.graph.upstreamOf(sourceId));
  }

  summary(): Promise<StoreSummary> {
    return this.store.summary();
  }
}
