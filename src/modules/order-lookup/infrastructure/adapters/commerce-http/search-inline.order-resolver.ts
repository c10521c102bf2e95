import { Injectable } from '@nestjs/common';
import type { OrderRecord } from '../../../domain/records';
import { CommerceClient } from './commerce-client';
import { CommerceOrderResolver } from './commerce-order-resolver';
import { normalizeOrderRecord } from './payload-normalizers';

/** Order-system shape where search entries already carry the full order. */
@Injectable()
export class SearchInlineOrderResolver extends CommerceOrderResolver {
  constructor(client: CommerceClient) {
    super(client, SearchInlineOrderResolver.name);
  }

  protected async loadOrder(
    match: Record<string, unknown>,
    orderNumber: number,
  ): Promise<OrderRecord | undefined> {
    return normalizeOrderRecord(match, orderNumber);
  }
}
