import type { LineItem } from '../records';
import type { StatusLine } from '../status-vocabulary';

export function buildNotFoundContext(rawIdentifier: string, supportContact: string): string {
  return `Order ${rawIdentifier} not found with the provided details. Please double-check the order number or contact ${supportContact} for assistance.`;
}

export function buildFoundContext(input: {
  rawIdentifier: string;
  lineItems?: LineItem[];
  statusLine: StatusLine;
  supportContact: string;
}): string {
  const parts = [`Order ${input.rawIdentifier} found.`];

  const itemSummary = input.lineItems ? summarizeLineItems(input.lineItems) : undefined;
  if (itemSummary) {
    parts.push(`Items: ${itemSummary}.`);
  }

  parts.push(input.statusLine.sentence);

  if (input.statusLine.needsAttention) {
    parts.push(`If you have questions, contact ${input.supportContact}.`);
  }

  return parts.join(' ');
}

/**
 * Groups items by title in first-seen order and sums their quantities:
 * `2 x Wine A, 1 x Wine B`. Returns undefined for an empty list.
 */
export function summarizeLineItems(items: LineItem[]): string | undefined {
  const totals = new Map<string, number>();
  for (const item of items) {
    totals.set(item.title, (totals.get(item.title) ?? 0) + item.quantity);
  }

  if (totals.size === 0) {
    return undefined;
  }

  return [...totals.entries()]
    .map(([title, quantity]) => `${quantity} x ${title}`)
    .join(', ');
}
