/**
 * Engine configuration
 *
 * Every threshold and weight of the engine is policy, not law: this schema
 * holds the defaults and the bounds they must respect.
 */
import { z } from 'zod';
import { ConfigValidationError } from '../errors';

const unit = z.number().min(0).max(1);

export const ContradictionConfigSchema = z
  .object({
    /** Relative spread at which numeric values become maximally contradictory */
    divergenceThreshold: z.number().positive().default(0.1),
    /** Floor for |mean| when normalizing the spread */
    epsilon: z.number().positive().default(1e-9),
  })
  .default({});

export const StateThresholdsSchema = z
  .object({
    corroborationMaxContradiction: z.number().gt(0).max(1).default(0.3),
    disputeMinContradiction: unit.default(0.7),
    archetypalMinSources: z.number().int().min(2).default(3),
    archetypalMinIndependence: unit.default(0.5),
  })
  .refine((t) => t.corroborationMaxContradiction <= t.disputeMinContradiction, {
    message: 'corroborationMaxContradiction must not exceed disputeMinContradiction',
    path: ['corroborationMaxContradiction'],
  })
  .default({});

export const ConfidenceWeightsSchema = z
  .object({
    baseline: unit.default(0.5),
    corroborationBonus: unit.default(0.2),
    sharedUpstreamPenalty: unit.default(0.2),
    lowIndependenceThreshold: unit.default(0.25),
    archetypalBonus: unit.default(0.2),
    disputedPenalty: unit.default(0.2),
    anomalousPenalty: unit.default(0.1),
  })
  .default({});

export const InvestigationConfigSchema = z
  .object({
    contradictionAbove: unit.default(0.7),
    confidenceAbove: unit.default(0.5),
  })
  .default({});

export const EngineConfigSchema = z.object({
  contradiction: ContradictionConfigSchema,
  thresholds: StateThresholdsSchema,
  confidence: ConfidenceWeightsSchema,
  investigation: InvestigationConfigSchema,
});

export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ContradictionConfig = EngineConfig['contradiction'];
export type StateThresholds = EngineConfig['thresholds'];
export type ConfidenceWeights = EngineConfig['confidence'];
export type InvestigationConfig = EngineConfig['investigation'];

/**
 * Merge a partial configuration over the defaults and validate it.
 * @throws ConfigValidationError
 */
export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(result.error, 'engine config');
  }
  return result.data;
}

type Section = keyof EngineConfig;

const ENV_BINDINGS: Readonly<Record<string, readonly [Section, string]>> = {
  EPISTEMIC_DIVERGENCE_THRESHOLD: ['contradiction', 'divergenceThreshold'],
  EPISTEMIC_EPSILON: ['contradiction', 'epsilon'],
  EPISTEMIC_CORROBORATION_MAX_CONTRADICTION: ['thresholds', 'corroborationMaxContradiction'],
  EPISTEMIC_DISPUTE_MIN_CONTRADICTION: ['thresholds', 'disputeMinContradiction'],
  EPISTEMIC_ARCHETYPAL_MIN_SOURCES: ['thresholds', 'archetypalMinSources'],
  EPISTEMIC_ARCHETYPAL_MIN_INDEPENDENCE: ['thresholds', 'archetypalMinIndependence'],
  EPISTEMIC_CONFIDENCE_BASELINE: ['confidence', 'baseline'],
  EPISTEMIC_CORROBORATION_BONUS: ['confidence', 'corroborationBonus'],
  EPISTEMIC_SHARED_UPSTREAM_PENALTY: ['confidence', 'sharedUpstreamPenalty'],
  EPISTEMIC_LOW_INDEPENDENCE_THRESHOLD: ['confidence', 'lowIndependenceThreshold'],
  EPISTEMIC_ARCHETYPAL_BONUS: ['confidence', 'archetypalBonus'],
  EPISTEMIC_DISPUTED_PENALTY: ['confidence', 'disputedPenalty'],
  EPISTEMIC_ANOMALOUS_PENALTY: ['confidence', 'anomalousPenalty'],
  EPISTEMIC_INVESTIGATION_CONTRADICTION_ABOVE: ['investigation', 'contradictionAbove'],
  EPISTEMIC_INVESTIGATION_CONFIDENCE_ABOVE: ['investigation', 'confidenceAbove'],
};

/**
 * Build the engine configuration from EPISTEMIC_* environment variables.
 * Unset variables fall back to the defaults.
 * @throws ConfigValidationError
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const raw: Record<Section, Record<string, number>> = {
    contradiction: {},
    thresholds: {},
    confidence: {},
    investigation: {},
  };

  for (const [variable, [section, key]] of Object.entries(ENV_BINDINGS)) {
    const value = env[variable];
    if (value === undefined) continue;
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
      throw new ConfigValidationError(`${variable} must be numeric, got "${value}"`, [variable]);
    }
    raw[section][key] = parsed;
  }

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(result.error, 'environment');
  }
  return result.data;
}
