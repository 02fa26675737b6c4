import type { OrchestratorState } from '../orchestrator/poll-orchestrator.interfaces';
import type { RuntimeTelemetry } from '../runtime/runtime-status.interfaces';

export type ComponentHealth = {
  readonly ok: boolean;
  readonly details: string;
};

export type AppHealthStatus = {
  readonly status: 'ok' | 'degraded';
  readonly version: string;
  readonly orchestrator: OrchestratorState;
  readonly enabledSubscribers: number;
  readonly database: ComponentHealth;
  readonly telegram: ComponentHealth;
  readonly runtime: RuntimeTelemetry;
};
