import { EpistemicStateMachine } from '../../src/engine/EpistemicStateMachine';
import { ConfigValidationError } from '../../src/errors';
import { EpistemicState } from '../../src/types';

describe('EpistemicStateMachine', () => {
  const machine = new EpistemicStateMachine();

  const evidence = (sourceCount: number, contradictionScore: number, independenceScore: number) => ({
    sourceCount,
    contradictionScore,
    independenceScore,
  });

  describe('evaluate', () => {
    it('should keep a single source as RAW_OBSERVATION whatever the scores', () => {
      expect(machine.evaluate(evidence(1, 0.9, 1))).toBe(EpistemicState.RAW_OBSERVATION);
    });

    it('should corroborate two agreeing sources', () => {
      expect(machine.evaluate(evidence(2, 0.1, 1))).toBe(EpistemicState.CORROBORATED);
    });

    it('should not promote two sources to ARCHETYPAL', () => {
      expect(machine.evaluate(evidence(2, 0, 1))).toBe(EpistemicState.CORROBORATED);
    });

    it('should mark the ambiguous band ANOMALOUS', () => {
      expect(machine.evaluate(evidence(2, 0.3, 1))).toBe(EpistemicState.ANOMALOUS);
      expect(machine.evaluate(evidence(3, 0.69, 1))).toBe(EpistemicState.ANOMALOUS);
    });

    it('should mark strong contradiction DISPUTED', () => {
      expect(machine.evaluate(evidence(2, 0.7, 1))).toBe(EpistemicState.DISPUTED);
      expect(machine.evaluate(evidence(5, 1, 1))).toBe(EpistemicState.DISPUTED);
    });

    it('should promote three independent agreeing sources to ARCHETYPAL', () => {
      expect(machine.evaluate(evidence(3, 0.2, 2 / 3))).toBe(EpistemicState.ARCHETYPAL);
    });

    it('should require independence strictly above the threshold', () => {
      expect(machine.evaluate(evidence(3, 0.2, 0.5))).toBe(EpistemicState.CORROBORATED);
    });

    it('should demote ARCHETYPAL when contradiction rises', () => {
      const result = machine.transition(EpistemicState.ARCHETYPAL, evidence(3, 0.8, 1), 1000);

      expect(result.state).toBe(EpistemicState.DISPUTED);
      expect(result.transition).toEqual({
        from: EpistemicState.ARCHETYPAL,
        to: EpistemicState.DISPUTED,
        at: 1000,
        sourceCount: 3,
        contradictionScore: 0.8,
        independenceScore: 1,
      });
    });
  });

  it('should report no transition when the state is unchanged', () => {
    const result = machine.transition(EpistemicState.CORROBORATED, evidence(2, 0, 1), 1000);

    expect(result).toEqual({ state: EpistemicState.CORROBORATED, transition: null });
  });

  it('should honour configured thresholds', () => {
    const strict = new EpistemicStateMachine({ archetypalMinSources: 4 });

    expect(strict.evaluate(evidence(3, 0, 1))).toBe(EpistemicState.CORROBORATED);
    expect(strict.evaluate(evidence(4, 0, 1))).toBe(EpistemicState.ARCHETYPAL);
  });

  it('should reject overlapping contradiction bands', () => {
    expect(
      () =>
        new EpistemicStateMachine({
          corroborationMaxContradiction: 0.8,
          disputeMinContradiction: 0.5,
        }),
    ).toThrow(ConfigValidationError);
  });
});
