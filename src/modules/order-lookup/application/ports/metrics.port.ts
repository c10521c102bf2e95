import type { UpstreamSystem } from '../../domain/errors';

export type LookupOutcome = 'found' | 'not_found' | 'invalid_identifier';

export interface LookupMetricsPort {
  incrementLookup(outcome: LookupOutcome): void;

  incrementUpstreamCall(input: {
    system: UpstreamSystem;
    result: 'ok' | 'no_data' | 'error';
  }): void;

  observeLookupLatency(seconds: number): void;
}
