import { Injectable } from '@nestjs/common';
import type { OrderRecord } from '../../../domain/records';
import { CommerceClient } from './commerce-client';
import { CommerceOrderResolver } from './commerce-order-resolver';
import { orderDetailEndpoint } from './endpoints';
import { normalizeOrderRecord, resolveIdentifier, unwrapOrderPayload } from './payload-normalizers';

/**
 * Order-system shape where search returns summaries only and the full order
 * is fetched by internal id.
 */
@Injectable()
export class SearchThenDetailOrderResolver extends CommerceOrderResolver {
  constructor(client: CommerceClient) {
    super(client, SearchThenDetailOrderResolver.name);
  }

  protected async loadOrder(
    match: Record<string, unknown>,
    orderNumber: number,
    requestId: string,
  ): Promise<OrderRecord | undefined> {
    const internalId = resolveIdentifier(match.id);
    if (!internalId) {
      return undefined;
    }

    const detail = await this.client.getJson(orderDetailEndpoint(internalId), requestId);
    if (detail.status !== 'ok') {
      return undefined;
    }

    const payload = unwrapOrderPayload(detail.data);
    return payload ? normalizeOrderRecord(payload, orderNumber) : undefined;
  }
}
