import {
  BaseNetworkMonitor,
  type IBaseNetworkMonitorOptions,
  type INormalizedTransfer,
} from '../../src/monitoring/base-network.monitor';

type ScriptedBatch = {
  readonly transfers: readonly INormalizedTransfer[];
  readonly delayMs: number;
};

/**
 * Replays one queued batch per fetch; an exhausted script returns an empty feed. A
 * delayed batch answers late and ignores the abort signal, like a slow explorer.
 */
export class ScriptedNetworkMonitor extends BaseNetworkMonitor {
  private readonly batches: ScriptedBatch[] = [];

  public constructor(options: IBaseNetworkMonitorOptions) {
    super(options);
  }

  public enqueueBatch(transfers: readonly INormalizedTransfer[], delayMs: number = 0): void {
    this.batches.push({ transfers, delayMs });
  }

  protected async loadLatestTransfers(limit: number): Promise<readonly INormalizedTransfer[]> {
    const batch: ScriptedBatch | undefined = this.batches.shift();

    if (batch === undefined) {
      return [];
    }

    if (batch.delayMs > 0) {
      await new Promise<void>((resolve: () => void): void => {
        setTimeout(resolve, batch.delayMs);
      });
    }

    return batch.transfers.slice(0, limit);
  }
}
