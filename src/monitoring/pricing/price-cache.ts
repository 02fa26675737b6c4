import { Logger } from '@nestjs/common';

import type { NetworkKey } from '../../core/networks/network-key.interfaces';
import {
  type IPriceLookupResult,
  type IPriceQuote,
  type IPriceSourcePort,
  PriceFailureReason,
} from '../../core/ports/pricing/price-source.interfaces';

export interface IPriceCacheOptions {
  readonly networkKey: NetworkKey;
  readonly assetId: string;
  readonly ttlMs: number;
  readonly priceSource: IPriceSourcePort;
  readonly fallbackUsdPrice?: number | null;
  readonly now?: () => number;
  readonly onRefreshFailure?: (reason: PriceFailureReason) => void;
}

interface ICachedPrice {
  readonly usdPrice: number;
  readonly fetchedAtEpochMs: number;
}

/**
 * Single-asset USD price holder with a time-to-live.
 *
 * A failed refresh keeps serving the last verified value (flagged `stale`). Before
 * any verified value exists the optional fallback price is served with
 * `verified: false`; callers must not treat it as a market price.
 */
export class PriceCache {
  private readonly logger: Logger = new Logger(PriceCache.name);
  private readonly now: () => number;
  private cachedPrice: ICachedPrice | null = null;
  private refreshInFlight: Promise<IPriceQuote | null> | null = null;

  public constructor(private readonly options: IPriceCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  public async getPrice(): Promise<IPriceQuote | null> {
    if (this.cachedPrice !== null && this.isFresh(this.cachedPrice)) {
      return this.toVerifiedQuote(this.cachedPrice, false);
    }

    if (this.refreshInFlight !== null) {
      return this.refreshInFlight;
    }

    this.refreshInFlight = this.refresh().finally((): void => {
      this.refreshInFlight = null;
    });

    return this.refreshInFlight;
  }

  private async refresh(): Promise<IPriceQuote | null> {
    const lookupResult: IPriceLookupResult = await this.lookupPrice();

    if (
      lookupResult.usdPrice !== null &&
      Number.isFinite(lookupResult.usdPrice) &&
      lookupResult.usdPrice > 0
    ) {
      this.cachedPrice = {
        usdPrice: lookupResult.usdPrice,
        fetchedAtEpochMs: this.now(),
      };
      this.logger.debug(
        `price refreshed network=${this.options.networkKey} usdPrice=${String(lookupResult.usdPrice)}`,
      );
      return this.toVerifiedQuote(this.cachedPrice, false);
    }

    const failureReason: PriceFailureReason =
      lookupResult.failureReason ?? PriceFailureReason.INVALID_RESPONSE;
    this.options.onRefreshFailure?.(failureReason);

    if (this.cachedPrice !== null) {
      this.logger.warn(
        `price refresh failed, serving stale value network=${this.options.networkKey} reason=${failureReason}`,
      );
      return this.toVerifiedQuote(this.cachedPrice, true);
    }

    const fallbackQuote: IPriceQuote | null = this.buildFallbackQuote();
    this.logger.warn(
      `price refresh failed, no verified price network=${this.options.networkKey} reason=${failureReason} fallback=${fallbackQuote === null ? 'none' : String(fallbackQuote.usdPrice)}`,
    );

    return fallbackQuote;
  }

  private async lookupPrice(): Promise<IPriceLookupResult> {
    try {
      return await this.options.priceSource.getUsdPrice(this.options.assetId);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `price source threw network=${this.options.networkKey} reason=${errorMessage}`,
      );
      return { usdPrice: null, failureReason: PriceFailureReason.NETWORK };
    }
  }

  private isFresh(cachedPrice: ICachedPrice): boolean {
    return this.now() - cachedPrice.fetchedAtEpochMs < this.options.ttlMs;
  }

  private toVerifiedQuote(cachedPrice: ICachedPrice, stale: boolean): IPriceQuote {
    return {
      usdPrice: cachedPrice.usdPrice,
      verified: true,
      fetchedAtEpochMs: cachedPrice.fetchedAtEpochMs,
      stale,
    };
  }

  private buildFallbackQuote(): IPriceQuote | null {
    const fallbackUsdPrice: number | null = this.options.fallbackUsdPrice ?? null;

    if (fallbackUsdPrice === null || fallbackUsdPrice <= 0) {
      return null;
    }

    return {
      usdPrice: fallbackUsdPrice,
      verified: false,
      fetchedAtEpochMs: null,
      stale: false,
    };
  }
}
