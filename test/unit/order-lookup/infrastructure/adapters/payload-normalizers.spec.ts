import {
  extractCustomerEmails,
  extractSearchEntries,
  findExactOrderMatch,
  normalizeOrderRecord,
  unwrapOrderPayload,
} from '@/modules/order-lookup/infrastructure/adapters/commerce-http/payload-normalizers';

describe('commerce payload normalizers', () => {
  it('finds the search entry whose order number matches exactly', () => {
    const entries = extractSearchEntries({
      orders: [
        { id: 'ord-9', orderNumber: 405001 },
        'garbage',
        { id: 'ord-1', orderNumber: '40500' },
      ],
    });

    expect(entries).toHaveLength(2);
    expect(findExactOrderMatch(entries, 40500)).toEqual({ id: 'ord-1', orderNumber: '40500' });
    expect(findExactOrderMatch(entries, 40501)).toBeUndefined();
  });

  it('returns no entries for unexpected search bodies', () => {
    expect(extractSearchEntries({ orders: 'none' })).toEqual([]);
    expect(extractSearchEntries([])).toEqual([]);
  });

  it('unwraps the order envelope when present', () => {
    expect(unwrapOrderPayload({ order: { id: 'ord-1' } })).toEqual({ id: 'ord-1' });
    expect(unwrapOrderPayload({ id: 'ord-1' })).toEqual({ id: 'ord-1' });
    expect(unwrapOrderPayload({})).toBeUndefined();
    expect(unwrapOrderPayload('ord-1')).toBeUndefined();
  });

  it('normalizes an order record', () => {
    expect(
      normalizeOrderRecord(
        {
          id: 'ord-1',
          customerId: 77,
          fulfillmentStatus: ' Fulfilled ',
          items: [
            { productTitle: 'Wine A', quantity: '2' },
            { title: 'Wine B', quantity: 0 },
            { sku: 'SKU-9', quantity: 3.7 },
            {},
          ],
          fulfillments: [
            { type: 'Shipped', shipped: { trackingNumbers: ['1Z1', ' ', 42], carrier: 'UPS' } },
            { type: 'Pickup' },
          ],
        },
        40500,
      ),
    ).toEqual({
      internalId: 'ord-1',
      orderNumber: 40500,
      customerId: '77',
      fulfillmentStatus: 'Fulfilled',
      shippingStatus: '',
      lineItems: [
        { title: 'Wine A', quantity: 2 },
        { title: 'Wine B', quantity: 1 },
        { title: 'SKU-9', quantity: 3 },
        { title: 'Item', quantity: 1 },
      ],
      shipmentEvents: [
        { type: 'Shipped', trackingNumbers: ['1Z1', '42'], carrier: 'UPS' },
        { type: 'Pickup', trackingNumbers: [] },
      ],
    });
  });

  it('lowercases customer emails in either shape', () => {
    expect(
      extractCustomerEmails({ emails: ['Jane@Example.com', { email: 'ALT@example.com' }, 7] }),
    ).toEqual(['jane@example.com', 'alt@example.com']);
    expect(extractCustomerEmails({})).toEqual([]);
  });
});
