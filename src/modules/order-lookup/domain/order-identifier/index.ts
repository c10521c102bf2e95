export { normalizeOrderIdentifier, parseOrderNumber } from './normalize';
export type { NormalizedOrderIdentifier, OrderIdentifierResult } from './types';
