import { createLogger, type Logger } from '../../../../../common/utils/logger';
import type {
  OrderNotFoundReason,
  OrderResolution,
  OrderResolverPort,
} from '../../../application/ports/order-resolver.port';
import type { OrderRecord } from '../../../domain/records';
import type { CommerceClient } from './commerce-client';
import { customerEndpoint, orderSearchEndpoint } from './endpoints';
import {
  extractCustomerEmails,
  extractSearchEntries,
  findExactOrderMatch,
} from './payload-normalizers';

/**
 * Search -> (shape-specific order load) -> customer fetch -> email check.
 * Subclasses only decide how the matched search entry becomes a full order.
 */
export abstract class CommerceOrderResolver implements OrderResolverPort {
  protected readonly logger: Logger;

  protected constructor(protected readonly client: CommerceClient, loggerContext: string) {
    this.logger = createLogger(loggerContext);
  }

  async resolveOrder(input: {
    requestId: string;
    orderNumber: number;
    customerEmail?: string;
  }): Promise<OrderResolution> {
    const email = input.customerEmail?.trim().toLowerCase();
    if (!email) {
      return this.notFound(input.requestId, 'missing_email');
    }

    const search = await this.client.getJson(orderSearchEndpoint(input.orderNumber), input.requestId);
    if (search.status === 'error') {
      return this.notFound(input.requestId, 'search_failed');
    }

    const entries = search.status === 'ok' ? extractSearchEntries(search.data) : [];
    const match = findExactOrderMatch(entries, input.orderNumber);
    if (!match) {
      return this.notFound(input.requestId, 'no_exact_match');
    }

    const order = await this.loadOrder(match, input.orderNumber, input.requestId);
    if (!order) {
      return this.notFound(input.requestId, 'detail_unavailable');
    }

    if (!order.customerId) {
      return this.notFound(input.requestId, 'missing_customer_link');
    }

    const customer = await this.client.getJson(customerEndpoint(order.customerId), input.requestId);
    if (customer.status !== 'ok') {
      return this.notFound(input.requestId, 'customer_unavailable');
    }

    if (!extractCustomerEmails(customer.data).includes(email)) {
      return this.notFound(input.requestId, 'email_mismatch');
    }

    return { ok: true, order };
  }

  protected abstract loadOrder(
    match: Record<string, unknown>,
    orderNumber: number,
    requestId: string,
  ): Promise<OrderRecord | undefined>;

  private notFound(requestId: string, reason: OrderNotFoundReason): OrderResolution {
    this.logger.info('order_resolution_failed', {
      event: 'order_resolution_failed',
      request_id: requestId,
      reason,
    });

    return { ok: false, reason };
  }
}
