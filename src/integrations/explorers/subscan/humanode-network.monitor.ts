import {
  SUBSCAN_MAX_ROWS,
  SUBSCAN_SUCCESS_CODE,
  type SubscanTransfer,
  subscanTransferSchema,
  subscanTransfersResponseSchema,
} from './subscan-transfers.interfaces';
import {
  MalformedRecordError,
  SourceFailureReason,
  SourceUnavailableError,
} from '../../../core/errors/monitoring.errors';
import { NetworkKey } from '../../../core/networks/network-key.interfaces';
import {
  BaseNetworkMonitor,
  type IBaseNetworkMonitorOptions,
  type INormalizedTransfer,
} from '../../../monitoring/base-network.monitor';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { ExplorerHttpClient } from '../http/explorer-http.client';
import { parseDecimalAmount } from '../shared/amount.util';

export interface ISubscanSourceOptions {
  readonly apiBaseUrl: string;
  readonly apiKey: string | null;
}

export class HumanodeNetworkMonitor extends BaseNetworkMonitor {
  public constructor(
    options: IBaseNetworkMonitorOptions,
    private readonly httpClient: ExplorerHttpClient,
    private readonly sourceOptions: ISubscanSourceOptions,
  ) {
    super(options);
  }

  protected async loadLatestTransfers(
    limit: number,
    signal?: AbortSignal,
  ): Promise<readonly INormalizedTransfer[]> {
    const payload: unknown = await this.httpClient.postJson({
      network: NetworkKey.HUMANODE,
      limiterKey: LimiterKey.SUBSCAN,
      url: this.buildTransfersUrl(),
      headers:
        this.sourceOptions.apiKey === null ? {} : { 'X-API-Key': this.sourceOptions.apiKey },
      body: { row: Math.min(limit, SUBSCAN_MAX_ROWS), page: 0 },
      signal,
    });
    const parsedPayload = subscanTransfersResponseSchema.safeParse(payload);

    if (!parsedPayload.success) {
      throw new SourceUnavailableError(
        NetworkKey.HUMANODE,
        SourceFailureReason.INVALID_RESPONSE,
        'subscan response has an unexpected shape',
      );
    }

    if (parsedPayload.data.code !== SUBSCAN_SUCCESS_CODE) {
      throw new SourceUnavailableError(
        NetworkKey.HUMANODE,
        SourceFailureReason.INVALID_RESPONSE,
        `subscan code=${String(parsedPayload.data.code)} message=${parsedPayload.data.message ?? 'n/a'}`,
      );
    }

    const transfers: readonly unknown[] = parsedPayload.data.data?.transfers ?? [];

    return this.mapRecords(transfers, (rawItem: unknown): INormalizedTransfer | null =>
      this.mapTransfer(rawItem),
    );
  }

  private mapTransfer(rawItem: unknown): INormalizedTransfer | null {
    const parsedItem = subscanTransferSchema.safeParse(rawItem);

    if (!parsedItem.success) {
      throw new MalformedRecordError(NetworkKey.HUMANODE, parsedItem.error.message);
    }

    const transfer: SubscanTransfer = parsedItem.data;

    if (transfer.success === false) {
      return null;
    }

    const amountNative: number | null = parseDecimalAmount(transfer.amount);

    if (amountNative === null) {
      throw new MalformedRecordError(
        NetworkKey.HUMANODE,
        `hash=${transfer.hash} amount=${transfer.amount}`,
      );
    }

    return {
      txHash: transfer.hash,
      amountNative,
      sender: transfer.from,
      receiver: transfer.to,
      timestamp: transfer.block_timestamp,
    };
  }

  private buildTransfersUrl(): URL {
    const baseUrl: string = this.sourceOptions.apiBaseUrl.replace(/\/+$/, '');
    return new URL(`${baseUrl}/api/v2/scan/transfers`);
  }
}
