export interface LookupFound {
  kind: 'found';
  context: string;
  trackingUrl: string | null;
}

export interface LookupNotFound {
  kind: 'not_found';
  context: string;
}

export type LookupResult = LookupFound | LookupNotFound;
