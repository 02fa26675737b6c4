import { Injectable, Logger } from '@nestjs/common';

import { AppConfigService } from '../../../config/app-config.service';
import {
  SourceFailureReason,
  SourceUnavailableError,
} from '../../../core/errors/monitoring.errors';
import type { NetworkKey } from '../../../core/networks/network-key.interfaces';
import {
  type LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';

const HTTP_STATUS_TOO_MANY_REQUESTS = 429;

export interface IExplorerRequest {
  readonly network: NetworkKey;
  readonly limiterKey: LimiterKey;
  readonly url: URL;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: unknown;
  readonly priority?: RequestPriority;
  readonly signal?: AbortSignal;
}

/**
 * JSON transport shared by explorer adapters. Every failure surfaces as
 * {@link SourceUnavailableError}; callers validate the returned payload themselves.
 */
@Injectable()
export class ExplorerHttpClient {
  private readonly logger: Logger = new Logger(ExplorerHttpClient.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
  ) {}

  public async getJson(request: IExplorerRequest): Promise<unknown> {
    return this.requestJson('GET', request);
  }

  public async postJson(request: IExplorerRequest): Promise<unknown> {
    return this.requestJson('POST', request);
  }

  private async requestJson(method: 'GET' | 'POST', request: IExplorerRequest): Promise<unknown> {
    const response: Response = await this.executeRequest(method, request);

    if (response.status === HTTP_STATUS_TOO_MANY_REQUESTS) {
      throw new SourceUnavailableError(
        request.network,
        SourceFailureReason.RATE_LIMIT,
        `${method} ${request.url.host} returned 429`,
      );
    }

    if (!response.ok) {
      throw new SourceUnavailableError(
        request.network,
        SourceFailureReason.HTTP_STATUS,
        `${method} ${request.url.host} returned ${String(response.status)}`,
      );
    }

    try {
      return await response.json();
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(
        request.network,
        SourceFailureReason.INVALID_RESPONSE,
        `invalid json from ${request.url.host}: ${errorMessage}`,
      );
    }
  }

  private async executeRequest(
    method: 'GET' | 'POST',
    request: IExplorerRequest,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      ...(request.body === undefined ? {} : { 'content-type': 'application/json' }),
      ...request.headers,
    };

    const timeoutSignal: AbortSignal = AbortSignal.timeout(
      this.appConfigService.monitorFetchTimeoutMs,
    );

    try {
      return await this.rateLimiterService.schedule(
        request.limiterKey,
        async (): Promise<Response> => {
          // The caller may have given up while this request waited in the limiter queue.
          if (request.signal?.aborted === true) {
            throw new Error('request aborted before it was sent');
          }

          return fetch(request.url, {
            method,
            headers,
            body: request.body === undefined ? undefined : JSON.stringify(request.body),
            signal:
              request.signal === undefined
                ? timeoutSignal
                : AbortSignal.any([request.signal, timeoutSignal]),
          });
        },
        request.priority ?? RequestPriority.NORMAL,
      );
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      const normalizedErrorMessage: string = errorMessage.toLowerCase();
      const reason: SourceFailureReason =
        normalizedErrorMessage.includes('timeout') || normalizedErrorMessage.includes('aborted')
          ? SourceFailureReason.TIMEOUT
          : SourceFailureReason.NETWORK;

      this.logger.debug(
        `explorer request failed network=${request.network} host=${request.url.host} reason=${errorMessage}`,
      );
      throw new SourceUnavailableError(request.network, reason, errorMessage);
    }
  }
}
