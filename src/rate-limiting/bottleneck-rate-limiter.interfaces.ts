export enum LimiterKey {
  COINGECKO = 'coingecko',
  TONCENTER = 'toncenter',
  EVERSCALE_GRAPHQL = 'everscale_graphql',
  VENOM_GRAPHQL = 'venom_graphql',
  SUBSCAN = 'subscan',
  TELEGRAM_NOTIFICATIONS = 'telegram_notifications',
}

// Bottleneck priority: lower number = higher priority (0–9 range)
/* eslint-disable no-magic-numbers */
export enum RequestPriority {
  CRITICAL = 1,
  HIGH = 5,
  NORMAL = 7,
  LOW = 9,
}
/* eslint-enable no-magic-numbers */

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
}

export interface ILimiterQueueSnapshot {
  readonly key: LimiterKey;
  readonly queueSize: number;
  readonly running: number;
}
