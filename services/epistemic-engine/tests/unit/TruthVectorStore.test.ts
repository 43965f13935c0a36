import type { ManualClock } from '@corroborate/shared';
import { createEngineConfig } from '../../src/config/EngineConfig';
import { InvariantViolationError, UnknownClaimError, ValidationError } from '../../src/errors';
import { DependencyGraph } from '../../src/graph/DependencyGraph';
import { currentValues, TruthVectorStore } from '../../src/store/TruthVectorStore';
import { InMemoryTruthVectorRepository } from '../../src/store/TruthVectorRepository';
import { EpistemicState } from '../../src/types';
import { claimKeyOf, vectorIdOf } from '../../src/types/claimKey';
import {
  BTC_CHANGE,
  categoricalObservation,
  createTestClock,
  createTestLogger,
  numericObservation,
  T0,
} from '../helpers';

describe('TruthVectorStore', () => {
  let graph: DependencyGraph;
  let clock: ManualClock;
  let store: TruthVectorStore;

  beforeEach(() => {
    graph = new DependencyGraph();
    clock = createTestClock();
    store = new TruthVectorStore({ graph, clock, logger: createTestLogger() });
  });

  describe('ingest', () => {
    it('should create a RAW_OBSERVATION vector on first observation', async () => {
      const outcome = await store.ingest(numericObservation('feed-a', 5.2, ['agg-1']));

      expect(outcome.result).toEqual({
        vectorId: vectorIdOf(claimKeyOf(BTC_CHANGE)),
        claimKey: '["BTC","change_24h_pct","2026-01-05T12"]',
        epistemicState: EpistemicState.RAW_OBSERVATION,
        confidence: 0.5,
        created: true,
        duplicate: false,
      });
      expect(outcome.previous).toBeNull();
      expect(outcome.vector.sources).toEqual(['feed-a']);
      expect(outcome.vector.contradictionScore).toBe(0);
      expect(outcome.vector.independenceScore).toBe(0);
      expect(outcome.vector.createdAt).toBe(T0);
    });

    it('should record the declared lineage in the graph', async () => {
      await store.ingest(numericObservation('feed-a', 5.2, ['agg-1']));

      expect(graph.directUpstreamOf('feed-a')).toEqual(['agg-1']);
    });

    it('should treat an identical re-report as a no-op', async () => {
      const first = await store.ingest(numericObservation('feed-a', 5.2));
      await store.ingest(numericObservation('feed-b', 5.2));
      clock.advance(1000);

      const duplicate = await store.ingest(numericObservation('feed-a', 5.2));

      expect(duplicate.result.duplicate).toBe(true);
      expect(duplicate.vector.sources).toHaveLength(2);
      expect(duplicate.vector.observations).toHaveLength(2);
      expect(duplicate.vector.updatedAt).toBe(first.vector.createdAt);
    });

    it('should replace a source contribution when it reports a new value', async () => {
      await store.ingest(numericObservation('feed-a', 5.2));
      await store.ingest(numericObservation('feed-b', 5.2));

      const outcome = await store.ingest(numericObservation('feed-a', 9.0));

      expect(outcome.vector.sources).toEqual(['feed-a', 'feed-b']);
      expect(outcome.vector.observations).toHaveLength(3);
      expect(currentValues(outcome.vector.sources, outcome.vector.observations)).toEqual([9.0, 5.2]);
      expect(outcome.vector.contradictionScore).toBe(1);
      expect(outcome.vector.epistemicState).toBe(EpistemicState.DISPUTED);
    });

    it('should record state transitions in the history', async () => {
      await store.ingest(numericObservation('feed-a', 5.2));
      clock.advance(500);
      const outcome = await store.ingest(numericObservation('feed-b', 5.2));

      expect(outcome.transition).toEqual({
        from: EpistemicState.RAW_OBSERVATION,
        to: EpistemicState.CORROBORATED,
        at: T0 + 500,
        sourceCount: 2,
        contradictionScore: 0,
        independenceScore: 1,
      });
      expect(outcome.vector.stateHistory).toEqual([outcome.transition]);
      expect(outcome.vector.updatedAt).toBe(T0 + 500);
      expect(outcome.vector.createdAt).toBe(T0);
    });

    it('should flag the ambiguous band for investigation', async () => {
      await store.ingest(categoricalObservation('feed-a', 'up'));
      const outcome = await store.ingest(categoricalObservation('feed-b', 'down'));

      expect(outcome.vector.contradictionScore).toBe(0.5);
      expect(outcome.vector.epistemicState).toBe(EpistemicState.ANOMALOUS);
      expect(outcome.vector.requiresInvestigation).toBe(true);
    });

    it('should mark three agreeing sources as consensus even when they share upstreams', async () => {
      await store.ingest(numericObservation('feed-a', 5.2, ['agg-1']));
      await store.ingest(numericObservation('feed-b', 5.2, ['agg-1']));
      const outcome = await store.ingest(numericObservation('feed-c', 5.2, ['agg-1']));

      expect(outcome.vector.isConsensus).toBe(true);
      expect(outcome.vector.independenceScore).toBe(0);
      expect(outcome.vector.epistemicState).toBe(EpistemicState.CORROBORATED);
    });

    it('should return frozen vectors', async () => {
      const outcome = await store.ingest(numericObservation('feed-a', 5.2));

      expect(Object.isFrozen(outcome.vector)).toBe(true);
      expect(Object.isFrozen(outcome.vector.observations[0])).toBe(true);
    });
  });

  describe('validation', () => {
    it('should reject a missing timestamp', async () => {
      const { timestamp: _omitted, ...input } = numericObservation('feed-a', 5.2);

      await expect(store.ingest(input)).rejects.toMatchObject({
        name: 'ValidationError',
        field: 'timestamp',
      });
    });

    it('should reject a value of the wrong kind', async () => {
      await expect(
        store.ingest({ ...numericObservation('feed-a', 5.2), value: 'five' }),
      ).rejects.toMatchObject({ field: 'value', value: 'five' });
    });

    it('should reject non-finite numbers', async () => {
      await expect(
        store.ingest(numericObservation('feed-a', Number.POSITIVE_INFINITY)),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a kind that differs from the claim', async () => {
      const claim = { subject: 'BTC', metric: 'trend', timeBucket: '2026-01-05' };
      await store.ingest(categoricalObservation('feed-a', 'up', [], claim));

      await expect(
        store.ingest(numericObservation('feed-b', 1, ['agg-9'], claim)),
      ).rejects.toMatchObject({ field: 'valueKind' });

      const lookup = await store.getVector(claim);
      expect(lookup.found && lookup.vector.sources).toEqual(['feed-a']);
      expect(graph.has('feed-b')).toBe(false);
    });

    it('should accept ISO timestamps', async () => {
      const outcome = await store.ingest({
        ...numericObservation('feed-a', 5.2),
        timestamp: '2026-01-05T11:59:00.000Z',
      });

      expect(outcome.vector.observations[0]?.timestamp).toBe(T0 - 60_000);
    });
  });

  describe('getVector', () => {
    it('should return an explicit not-found for unknown claims', async () => {
      const lookup = await store.getVector(BTC_CHANGE);

      expect(lookup.found).toBe(false);
      if (!lookup.found) {
        expect(lookup.error).toBeInstanceOf(UnknownClaimError);
        expect(lookup.error.claimKey).toBe(claimKeyOf(BTC_CHANGE));
      }
    });

    it('should return the stored vector', async () => {
      await store.ingest(numericObservation('feed-a', 5.2));

      const lookup = await store.getVector(BTC_CHANGE);

      expect(lookup.found && lookup.vector.observations).toHaveLength(1);
    });
  });

  describe('summary', () => {
    it('should count vectors per state', async () => {
      await store.ingest(numericObservation('feed-a', 5.2));
      await store.ingest(categoricalObservation('feed-a', 'up'));
      await store.ingest(categoricalObservation('feed-b', 'down'));

      expect(await store.summary()).toEqual({
        total: 2,
        byState: {
          RAW_OBSERVATION: 1,
          CORROBORATED: 0,
          DISPUTED: 0,
          ANOMALOUS: 1,
          ARCHETYPAL: 0,
        },
        requiringInvestigation: 1,
        observations: 3,
      });
    });
  });

  describe('invariants', () => {
    it('should refuse to save a vector whose scores leave [0, 1]', async () => {
      const repository = new InMemoryTruthVectorRepository();
      const guarded = new TruthVectorStore({
        graph,
        clock,
        repository,
        logger: createTestLogger(),
        config: createEngineConfig(),
      });
      jest.spyOn(graph, 'independenceScore').mockReturnValue(1.5);
      const save = jest.spyOn(repository, 'save');

      await expect(guarded.ingest(numericObservation('feed-a', 5.2))).rejects.toMatchObject({
        name: 'InvariantViolationError',
        field: 'independenceScore',
        value: 1.5,
      });
      expect(save).not.toHaveBeenCalled();
      expect(await repository.size()).toBe(0);
    });

    it('should release the claim lock after a failed merge', async () => {
      jest.spyOn(graph, 'independenceScore').mockReturnValueOnce(-1);

      await expect(store.ingest(numericObservation('feed-a', 5.2))).rejects.toBeInstanceOf(
        InvariantViolationError,
      );
      const outcome = await store.ingest(numericObservation('feed-a', 5.2));

      expect(outcome.result.created).toBe(true);
      expect(store.pendingMerges()).toBe(0);
    });

    it('should keep declared lineage when a merge fails', async () => {
      jest.spyOn(graph, 'independenceScore').mockReturnValueOnce(2);

      await expect(
        store.ingest(numericObservation('feed-a', 5.2, ['agg-1'])),
      ).rejects.toBeInstanceOf(InvariantViolationError);

      expect(graph.directUpstreamOf('feed-a')).toEqual(['agg-1']);
      expect((await store.getVector(BTC_CHANGE)).found).toBe(false);
    });
  });
});
