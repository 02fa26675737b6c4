import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

const COMPONENT_HEALTH_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    ok: { type: 'boolean' },
    details: { type: 'string', example: 'reachable' },
  },
  required: ['ok', 'details'],
};

const NETWORK_RUNTIME_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    network: { type: 'string', enum: ['ton', 'everscale', 'venom', 'humanode'] },
    state: { type: 'string', enum: ['pending', 'ok', 'failed'] },
    lastAttemptIso: { type: 'string', nullable: true },
    lastSuccessIso: { type: 'string', nullable: true },
    lastError: { type: 'string', nullable: true },
    lastNewTransactions: { type: 'integer' },
    consecutiveFailures: { type: 'integer' },
  },
};

export const HEALTH_STATUS_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    version: { type: 'string', example: '1.0.0' },
    orchestrator: {
      type: 'string',
      enum: ['idle', 'polling', 'dispatching', 'sleeping', 'stopped'],
    },
    enabledSubscribers: { type: 'integer' },
    database: COMPONENT_HEALTH_SCHEMA,
    telegram: COMPONENT_HEALTH_SCHEMA,
    runtime: {
      type: 'object',
      properties: {
        cycle: {
          type: 'object',
          properties: {
            completedCycles: { type: 'integer' },
            lastCycleStartedIso: { type: 'string', nullable: true },
            lastCycleDurationMs: { type: 'number', nullable: true },
            lastCycleError: { type: 'string', nullable: true },
          },
        },
        byNetwork: { type: 'object', additionalProperties: NETWORK_RUNTIME_SCHEMA },
      },
    },
  },
  required: ['status', 'version', 'orchestrator', 'database', 'telegram', 'runtime'],
};
