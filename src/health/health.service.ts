import { Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth } from './health.types';
import { withTimeout } from '../common/utils/async/with-timeout.util';
import { AppConfigService } from '../config/app-config.service';
import { DatabaseService } from '../database/kysely/database.service';
import { PollOrchestratorService } from '../orchestrator/poll-orchestrator.service';
import {
  NetworkCycleState,
  type NetworkRuntimeEntry,
  type RuntimeTelemetry,
} from '../runtime/runtime-status.interfaces';
import { RuntimeStatusService } from '../runtime/runtime-status.service';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';
import { TelegramSenderService } from '../telegram/telegram-sender.service';

@Injectable()
export class HealthService {
  private static readonly TELEGRAM_HEALTH_TIMEOUT_MS: number = 5000;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
    private readonly runtimeStatusService: RuntimeStatusService,
    private readonly pollOrchestratorService: PollOrchestratorService,
    private readonly subscriberRegistry: SubscriberRegistryService,
    private readonly telegramSenderService: TelegramSenderService,
  ) {}

  public async getHealthStatus(): Promise<AppHealthStatus> {
    const [database, telegram]: [ComponentHealth, ComponentHealth] = await Promise.all([
      this.checkDatabase(),
      this.checkTelegram(),
    ]);
    const runtime: RuntimeTelemetry = this.runtimeStatusService.getTelemetry();
    const failingNetworks: boolean = Object.values(runtime.byNetwork).some(
      (entry: NetworkRuntimeEntry): boolean => entry.state === NetworkCycleState.FAILED,
    );
    const isHealthy: boolean = database.ok && telegram.ok && !failingNetworks;

    return {
      status: isHealthy ? 'ok' : 'degraded',
      version: this.appConfigService.appVersion,
      orchestrator: this.pollOrchestratorService.getState(),
      enabledSubscribers: this.subscriberRegistry.listEnabledSubscribers().length,
      database,
      telegram,
      runtime,
    };
  }

  private async checkDatabase(): Promise<ComponentHealth> {
    if (!this.databaseService.isConfigured()) {
      return { ok: true, details: 'not configured, subscribers kept in memory' };
    }

    const databaseOk: boolean = await this.databaseService.healthCheck();

    return { ok: databaseOk, details: databaseOk ? 'reachable' : 'unreachable' };
  }

  private async checkTelegram(): Promise<ComponentHealth> {
    try {
      const username: string = await withTimeout(
        this.telegramSenderService.getBotUsername(),
        HealthService.TELEGRAM_HEALTH_TIMEOUT_MS,
        'telegram getMe',
      );

      return { ok: true, details: `reachable as @${username}` };
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      return { ok: false, details: `getMe failed: ${errorMessage}` };
    }
  }
}
