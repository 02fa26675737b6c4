export enum PriceFailureReason {
  RATE_LIMIT = 'rate_limit',
  TIMEOUT = 'timeout',
  NOT_FOUND = 'not_found',
  NETWORK = 'network',
  INVALID_RESPONSE = 'invalid_response',
}

export interface IPriceLookupResult {
  readonly usdPrice: number | null;
  readonly failureReason: PriceFailureReason | null;
}

export interface IPriceQuote {
  readonly usdPrice: number;
  readonly verified: boolean;
  readonly fetchedAtEpochMs: number | null;
  readonly stale: boolean;
}

export interface IPriceSourcePort {
  getUsdPrice(assetId: string): Promise<IPriceLookupResult>;
}
