export interface NormalizedOrderIdentifier {
  /** Identifier exactly as the caller sent it. */
  raw: string;
  /** Trimmed identifier without the optional leading `#`. */
  canonical: string;
  orderNumber: number;
}

export type OrderIdentifierResult =
  | { ok: true; identifier: NormalizedOrderIdentifier }
  | { ok: false; code: 'invalid_identifier' };
