import { createHash } from 'crypto';
import type { ClaimIdentity } from './index';

/**
 * Canonical string key for a claim identity
 */
export function claimKeyOf(claim: ClaimIdentity): string {
  return JSON.stringify([claim.subject, claim.metric, claim.timeBucket]);
}

/**
 * Stable vector id: SHA-256 of the canonical claim key
 */
export function vectorIdOf(claimKey: string): string {
  return createHash('sha256').update(claimKey).digest('hex');
}
