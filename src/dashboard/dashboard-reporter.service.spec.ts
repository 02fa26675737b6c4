import { afterEach, describe, expect, it, vi } from 'vitest';

import { DashboardReporterService } from './dashboard-reporter.service';
import { AlertMessageFormatter } from '../alerts/alert-message.formatter';
import { NotificationKind } from '../alerts/alert.interfaces';
import type { NotificationDispatcherService } from '../alerts/notification-dispatcher.service';
import type { AppConfigService } from '../config/app-config.service';
import { AlertMode } from '../config/app-config.types';
import { NetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import type { ITransactionRecord } from '../core/transactions/transaction.interfaces';
import type { MetricsService } from '../observability/metrics.service';
import { InMemorySubscriberStore } from '../subscribers/in-memory-subscriber.store';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';

type DashboardHarness = {
  readonly reporter: DashboardReporterService;
  readonly registry: SubscriberRegistryService;
  readonly tonRecent: ReturnType<typeof vi.fn>;
  readonly venomRecent: ReturnType<typeof vi.fn>;
  readonly sendSystemMessage: ReturnType<typeof vi.fn>;
};

const reporters: DashboardReporterService[] = [];

const buildTransaction = (txHash: string, amountNative: number): ITransactionRecord => ({
  network: NetworkKey.TON,
  txHash,
  amountNative,
  amountUsd: null,
  priceVerified: false,
  sender: '0:sender',
  receiver: '0:receiver',
  timestamp: 1_700_000_000,
});

const createMonitorStub = (
  networkKey: NetworkKey,
  fetchRecentAnyAmount: ReturnType<typeof vi.fn>,
): INetworkMonitor => ({
  networkKey,
  displayName: networkKey,
  fetchLatestTransactions: vi.fn(),
  fetchAndFilter: vi.fn(),
  fetchRecentAnyAmount,
  getCurrentPrice: vi.fn(),
});

const createHarness = async (): Promise<DashboardHarness> => {
  const configStub: AppConfigService = {
    alertMode: AlertMode.PER_SUBSCRIBER,
    telegramChatId: null,
    networkThresholds: new Map<NetworkKey, never>(),
    dashboardEnabled: true,
    dashboardIntervalSec: 3600,
    dashboardLimit: 5,
  } as unknown as AppConfigService;
  const registry: SubscriberRegistryService = new SubscriberRegistryService(
    new InMemorySubscriberStore(),
    configStub,
    { enabledSubscribers: { set: vi.fn() } } as unknown as MetricsService,
  );
  await registry.onModuleInit();

  const tonRecent: ReturnType<typeof vi.fn> = vi
    .fn()
    .mockResolvedValue([buildTransaction('h1', 1.5)]);
  const venomRecent: ReturnType<typeof vi.fn> = vi
    .fn()
    .mockRejectedValue(new Error('venom down'));
  const sendSystemMessage: ReturnType<typeof vi.fn> = vi.fn().mockResolvedValue(true);

  const reporter: DashboardReporterService = new DashboardReporterService(
    [
      createMonitorStub(NetworkKey.TON, tonRecent),
      createMonitorStub(NetworkKey.VENOM, venomRecent),
    ],
    registry,
    { sendSystemMessage } as unknown as NotificationDispatcherService,
    new AlertMessageFormatter(configStub),
    configStub,
  );
  reporters.push(reporter);

  return { reporter, registry, tonRecent, venomRecent, sendSystemMessage };
};

describe('DashboardReporterService', (): void => {
  afterEach(async (): Promise<void> => {
    await Promise.all(
      reporters
        .splice(0)
        .map(async (reporter: DashboardReporterService): Promise<void> => reporter.stop()),
    );
    vi.useRealTimers();
  });

  it('renders every network and marks failed ones as empty', async (): Promise<void> => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:34:56.000Z'));
    const { reporter, tonRecent } = await createHarness();

    const report: string = await reporter.buildReport();

    expect(tonRecent).toHaveBeenCalledWith(5);
    expect(report).toBe(
      [
        '📊 <b>Transaction Dashboard</b>',
        '',
        '<b>TON</b>',
        '  • <a href="https://tonviewer.com/transaction/h1">1.5000 TON</a>',
        '',
        '<b>Venom</b>',
        '  No recent transactions',
        '',
        '🕒 Updated: 12:34:56 UTC',
      ].join('\n'),
    );
  });

  it('shares one build between concurrent callers', async (): Promise<void> => {
    const { reporter, tonRecent, venomRecent } = await createHarness();

    const [first, second] = await Promise.all([reporter.buildReport(), reporter.buildReport()]);

    expect(first).toBe(second);
    expect(tonRecent).toHaveBeenCalledTimes(1);
    expect(venomRecent).toHaveBeenCalledTimes(1);
  });

  it('publishes to every enabled subscriber', async (): Promise<void> => {
    const { reporter, registry, sendSystemMessage } = await createHarness();
    await registry.enable('200');
    await registry.enable('300');
    await registry.enable('400');
    await registry.disable('400');
    sendSystemMessage.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

    const delivered: number = await reporter.publish();

    expect(delivered).toBe(1);
    expect(sendSystemMessage).toHaveBeenCalledTimes(2);
    expect(sendSystemMessage).toHaveBeenCalledWith(
      '300',
      expect.stringContaining('📊 <b>Transaction Dashboard</b>'),
      NotificationKind.DASHBOARD,
    );
  });

  it('does not query networks when nobody is subscribed', async (): Promise<void> => {
    const { reporter, tonRecent } = await createHarness();

    await expect(reporter.publish()).resolves.toBe(0);
    expect(tonRecent).not.toHaveBeenCalled();
  });

  it('publishes once per interval until stopped', async (): Promise<void> => {
    vi.useFakeTimers();
    const { reporter, registry, sendSystemMessage } = await createHarness();
    await registry.enable('200');

    reporter.onApplicationBootstrap();
    await vi.advanceTimersByTimeAsync(3_599_000);
    expect(sendSystemMessage).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(sendSystemMessage).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3_600_000);
    expect(sendSystemMessage).toHaveBeenCalledTimes(2);

    await reporter.stop();
    await vi.advanceTimersByTimeAsync(3_600_000);
    expect(sendSystemMessage).toHaveBeenCalledTimes(2);
  });
});
