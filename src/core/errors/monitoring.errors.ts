import type { NetworkKey } from '../networks/network-key.interfaces';

export enum SourceFailureReason {
  RATE_LIMIT = 'rate_limit',
  TIMEOUT = 'timeout',
  HTTP_STATUS = 'http_status',
  NETWORK = 'network',
  INVALID_RESPONSE = 'invalid_response',
}

export class SourceUnavailableError extends Error {
  public constructor(
    public readonly network: NetworkKey,
    public readonly reason: SourceFailureReason,
    details: string,
  ) {
    super(`${network} source unavailable reason=${reason}: ${details}`);
    this.name = 'SourceUnavailableError';
  }
}

export class MalformedRecordError extends Error {
  public constructor(
    public readonly network: NetworkKey,
    details: string,
  ) {
    super(`${network} malformed record: ${details}`);
    this.name = 'MalformedRecordError';
  }
}

export class DispatchFailureError extends Error {
  public constructor(
    public readonly destination: string,
    details: string,
  ) {
    super(`dispatch to ${destination} failed: ${details}`);
    this.name = 'DispatchFailureError';
  }
}

export class ConfigurationMissingError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationMissingError';
  }
}
