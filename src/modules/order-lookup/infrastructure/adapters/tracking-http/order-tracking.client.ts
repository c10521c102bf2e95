import { Injectable } from '@nestjs/common';
import type { OrderTrackingPort } from '../../../application/ports/tracking.port';
import type { UpstreamResult } from '../../../application/ports/upstream-result';
import type { TrackingDetail } from '../../../domain/records';
import { ORDER_STATUS_ENDPOINT } from './endpoints';
import { TrackingClient } from './tracking-client';

/**
 * Tracking detail by order number. Credentials travel in the JSON body
 * (`userKey`, `password`, `customerNo`) rather than in headers.
 */
@Injectable()
export class OrderTrackingClient implements OrderTrackingPort {
  constructor(private readonly client: TrackingClient) {}

  async lookupByOrderNumber(input: {
    requestId: string;
    orderNumber: number;
  }): Promise<UpstreamResult<TrackingDetail>> {
    const { enabled, userKey, password, customerNo } = this.client.config;

    if (!enabled || !userKey || !password || !customerNo) {
      return { status: 'no_data' };
    }

    return this.client.postForDetail({
      requestId: input.requestId,
      path: ORDER_STATUS_ENDPOINT,
      body: {
        userKey,
        password,
        customerNo,
        orderNumber: String(input.orderNumber),
      },
    });
  }
}
