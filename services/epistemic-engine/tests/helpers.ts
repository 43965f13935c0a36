import { Logger, LogLevel, ManualClock } from '@corroborate/shared';
import type { ObservationInput } from '../src/schemas/observation';
import type { ClaimIdentity } from '../src/types';

export const T0 = Date.parse('2026-01-05T12:00:00.000Z');

export const BTC_CHANGE: ClaimIdentity = {
  subject: 'BTC',
  metric: 'change_24h_pct',
  timeBucket: '2026-01-05T12',
};

export function createTestLogger(): Logger {
  return new Logger({
    level: LogLevel.DEBUG,
    component: 'test',
    enableConsole: false,
    enableFile: false,
    enablePerformanceLogging: true,
    sensitiveFields: ['password', 'secret', 'token'],
    maxStackTraceLines: 5,
  });
}

export function createTestClock(): ManualClock {
  return new ManualClock(T0);
}

export function numericObservation(
  sourceId: string,
  value: number,
  upstreamLineage: string[] = [],
  claim: ClaimIdentity = BTC_CHANGE,
): ObservationInput {
  return {
    sourceId,
    claim,
    value,
    valueKind: 'numeric',
    timestamp: T0,
    upstreamLineage,
  };
}

export function categoricalObservation(
  sourceId: string,
  value: string,
  upstreamLineage: string[] = [],
  claim: ClaimIdentity = { subject: 'ETH', metric: 'trend', timeBucket: '2026-01-05' },
): ObservationInput {
  return {
    sourceId,
    claim,
    value,
    valueKind: 'categorical',
    timestamp: T0,
    upstreamLineage,
  };
}
