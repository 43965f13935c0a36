/**
 * Observation input schema
 *
 * Uses Zod for runtime validation at the ingest boundary.
 */
import { z } from 'zod';
import { ValidationError } from '../errors';
import type { ClaimIdentity, Observation } from '../types';

const IdSchema = z.string().trim().min(1);

export const ClaimIdentitySchema = z
  .object({
    subject: IdSchema,
    metric: IdSchema,
    timeBucket: IdSchema,
  })
  .strict();

export const ValueKindSchema = z.enum(['numeric', 'categorical']);

/**
 * Epoch ms, ISO8601 string or Date, normalized to epoch ms
 */
export const TimestampSchema = z
  .union([
    z.number().int().nonnegative(),
    z.string().datetime({ offset: true }),
    z.date(),
  ])
  .transform((value) => {
    if (typeof value === 'number') return value;
    if (typeof value === 'string') return Date.parse(value);
    return value.getTime();
  });

export const ObservationInputSchema = z
  .object({
    sourceId: IdSchema,
    claim: ClaimIdentitySchema,
    value: z.union([z.number(), z.string()]),
    valueKind: ValueKindSchema,
    timestamp: TimestampSchema,
    upstreamLineage: z.array(IdSchema).default([]),
  })
  .strict()
  .superRefine((input, ctx) => {
    if (input.valueKind === 'numeric') {
      if (typeof input.value !== 'number' || !Number.isFinite(input.value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['value'],
          message: 'numeric claims require a finite number',
        });
      }
    } else if (typeof input.value !== 'string' || input.value.trim().length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['value'],
        message: 'categorical claims require a non-empty string',
      });
    }
  });

export type ObservationInput = z.input<typeof ObservationInputSchema>;

/**
 * Parse and validate an observation.
 * @throws ValidationError if the input is malformed
 */
export function parseObservation(input: unknown, receivedAt: number): Observation {
  const result = ObservationInputSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, input, 'observation');
  }
  const data = result.data;
  const claim: ClaimIdentity = Object.freeze({ ...data.claim });
  return Object.freeze({
    sourceId: data.sourceId,
    claim,
    value: typeof data.value === 'string' ? data.value.trim() : data.value,
    valueKind: data.valueKind,
    timestamp: data.timestamp,
    upstreamLineage: Object.freeze([...data.upstreamLineage]),
    receivedAt,
  });
}

/**
 * @throws ValidationError if the claim is malformed
 */
export function parseClaimIdentity(input: unknown): ClaimIdentity {
  const result = ClaimIdentitySchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, input, 'claim');
  }
  return Object.freeze({ ...result.data });
}
