export interface OrderLookupFoundResponse {
  context: string;
  tracking_url: string | null;
}

export interface OrderLookupNotFoundResponse {
  context: string;
}

export type OrderLookupResponse = OrderLookupFoundResponse | OrderLookupNotFoundResponse;
