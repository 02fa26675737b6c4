import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { AppConfigService } from '../../../config/app-config.service';
import {
  type IPriceLookupResult,
  type IPriceSourcePort,
  PriceFailureReason,
} from '../../../core/ports/pricing/price-source.interfaces';
import {
  LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';

const HTTP_STATUS_TOO_MANY_REQUESTS = 429;

const simplePricePayloadSchema = z.record(
  z.string(),
  z.object({
    usd: z.number().optional(),
  }),
);

type SimplePricePayload = z.infer<typeof simplePricePayloadSchema>;

@Injectable()
export class CoinGeckoPriceSourceAdapter implements IPriceSourcePort {
  private readonly logger: Logger = new Logger(CoinGeckoPriceSourceAdapter.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
  ) {}

  public async getUsdPrice(assetId: string): Promise<IPriceLookupResult> {
    let response: Response;

    try {
      response = await this.rateLimiterService.schedule(
        LimiterKey.COINGECKO,
        async (): Promise<Response> =>
          fetch(this.buildSimplePriceUrl(assetId), {
            method: 'GET',
            headers: { accept: 'application/json' },
            signal: AbortSignal.timeout(this.appConfigService.coingeckoTimeoutMs),
          }),
        RequestPriority.NORMAL,
      );
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      const normalizedErrorMessage: string = errorMessage.toLowerCase();
      this.logger.debug(`coingecko request failed assetId=${assetId} reason=${errorMessage}`);

      if (
        normalizedErrorMessage.includes('timeout') ||
        normalizedErrorMessage.includes('aborted')
      ) {
        return { usdPrice: null, failureReason: PriceFailureReason.TIMEOUT };
      }

      return { usdPrice: null, failureReason: PriceFailureReason.NETWORK };
    }

    return this.mapFetchResponse(response, assetId);
  }

  private async mapFetchResponse(response: Response, assetId: string): Promise<IPriceLookupResult> {
    if (response.status === HTTP_STATUS_TOO_MANY_REQUESTS) {
      return { usdPrice: null, failureReason: PriceFailureReason.RATE_LIMIT };
    }

    if (!response.ok) {
      this.logger.debug(
        `coingecko non-2xx response assetId=${assetId} status=${String(response.status)}`,
      );
      return { usdPrice: null, failureReason: PriceFailureReason.NETWORK };
    }

    let payload: unknown;

    try {
      payload = await response.json();
    } catch {
      return { usdPrice: null, failureReason: PriceFailureReason.INVALID_RESPONSE };
    }

    const parsedPayload = simplePricePayloadSchema.safeParse(payload);

    if (!parsedPayload.success) {
      return { usdPrice: null, failureReason: PriceFailureReason.INVALID_RESPONSE };
    }

    const prices: SimplePricePayload = parsedPayload.data;
    const usdValue: number | undefined = prices[assetId]?.usd;

    if (usdValue === undefined || !Number.isFinite(usdValue) || usdValue <= 0) {
      return { usdPrice: null, failureReason: PriceFailureReason.NOT_FOUND };
    }

    return { usdPrice: usdValue, failureReason: null };
  }

  private buildSimplePriceUrl(assetId: string): URL {
    const baseUrl: string = this.appConfigService.coingeckoApiBaseUrl.replace(/\/+$/, '');
    const url: URL = new URL(`${baseUrl}/simple/price`);
    url.searchParams.set('ids', assetId);
    url.searchParams.set('vs_currencies', 'usd');
    return url;
  }
}
