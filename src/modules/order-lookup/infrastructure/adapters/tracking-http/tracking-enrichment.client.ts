import { Injectable } from '@nestjs/common';
import type { TrackingEnrichmentPort } from '../../../application/ports/tracking.port';
import type { UpstreamResult } from '../../../application/ports/upstream-result';
import type { TrackingDetail } from '../../../domain/records';
import { MAX_TRACKING_NUMBERS_PER_REQUEST, TRACKING_DETAILS_ENDPOINT } from './endpoints';
import { TrackingClient } from './tracking-client';

/** Tracking detail by carrier tracking numbers, authenticated with a bearer key. */
@Injectable()
export class TrackingEnrichmentClient implements TrackingEnrichmentPort {
  constructor(private readonly client: TrackingClient) {}

  async lookupByTrackingNumbers(input: {
    requestId: string;
    trackingNumbers: string[];
  }): Promise<UpstreamResult<TrackingDetail>> {
    const { enabled, apiKey } = this.client.config;
    const trackingNumbers = input.trackingNumbers.slice(0, MAX_TRACKING_NUMBERS_PER_REQUEST);

    if (!enabled || !apiKey || trackingNumbers.length === 0) {
      return { status: 'no_data' };
    }

    return this.client.postForDetail({
      requestId: input.requestId,
      path: TRACKING_DETAILS_ENDPOINT,
      body: { trackingNumbers },
      headers: { Authorization: `Bearer ${apiKey}` },
    });
  }
}
