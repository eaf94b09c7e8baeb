/**
 * Credential Core Errors
 *
 * Every failure raised by the authorization core extends `GatewayError`,
 * carrying a stable code for programmatic handling. State-token errors
 * collapse into `InvalidStateError` at the flow controller boundary.
 */

export const ErrorCode = {
  UNKNOWN_AGENT: 'UNKNOWN_AGENT',
  UNKNOWN_STATE: 'UNKNOWN_STATE',
  EXPIRED_STATE: 'EXPIRED_STATE',
  REPLAYED_STATE: 'REPLAYED_STATE',
  INVALID_STATE: 'INVALID_STATE',
  EXCHANGE_FAILED: 'EXCHANGE_FAILED',
  REFRESH_FAILED: 'REFRESH_FAILED',
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  PROVIDER_REJECTED: 'PROVIDER_REJECTED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface GatewayErrorOptions {
  /** HTTP status the web layer should answer with */
  readonly statusCode?: number;
  readonly cause?: unknown;
}

export class GatewayError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number | undefined;

  constructor(message: string, code: ErrorCode, options?: GatewayErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'GatewayError';
    this.code = code;
    this.statusCode = options?.statusCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Thrown by the scope registry for an unregistered agent name
 */
export class UnknownAgentError extends GatewayError {
  readonly agentName: string;

  constructor(agentName: string) {
    super(`Unknown agent: ${agentName}`, ErrorCode.UNKNOWN_AGENT, { statusCode: 404 });
    this.name = 'UnknownAgentError';
    this.agentName = agentName;
  }
}

/**
 * Base class for the reasons a state identifier cannot be consumed
 */
export abstract class StateTokenError extends GatewayError {}

export class UnknownStateError extends StateTokenError {
  constructor() {
    super('Authorization state not found', ErrorCode.UNKNOWN_STATE);
    this.name = 'UnknownStateError';
  }
}

export class ExpiredStateError extends StateTokenError {
  constructor() {
    super('Authorization state has expired', ErrorCode.EXPIRED_STATE);
    this.name = 'ExpiredStateError';
  }
}

export class ReplayedStateError extends StateTokenError {
  constructor() {
    super('Authorization state was already used', ErrorCode.REPLAYED_STATE);
    this.name = 'ReplayedStateError';
  }
}

/**
 * The callback's state parameter was rejected; the flow must restart
 */
export class InvalidStateError extends GatewayError {
  constructor(options?: Omit<GatewayErrorOptions, 'statusCode'>) {
    super('Invalid or expired authorization state', ErrorCode.INVALID_STATE, {
      ...options,
      statusCode: 400,
    });
    this.name = 'InvalidStateError';
  }
}

export class ExchangeFailedError extends GatewayError {
  constructor(message = 'Authorization code exchange failed', options?: Omit<GatewayErrorOptions, 'statusCode'>) {
    super(message, ErrorCode.EXCHANGE_FAILED, { ...options, statusCode: 400 });
    this.name = 'ExchangeFailedError';
  }
}

export class RefreshFailedError extends GatewayError {
  constructor(message = 'Access token refresh failed', options?: Omit<GatewayErrorOptions, 'statusCode'>) {
    super(message, ErrorCode.REFRESH_FAILED, { ...options, statusCode: 401 });
    this.name = 'RefreshFailedError';
  }
}

/**
 * Network failure, timeout or 5xx from the provider. The credential the
 * request concerned may still be valid.
 */
export class ProviderUnavailableError extends GatewayError {
  constructor(message = 'OAuth provider unavailable', options?: Omit<GatewayErrorOptions, 'statusCode'>) {
    super(message, ErrorCode.PROVIDER_UNAVAILABLE, { ...options, statusCode: 503 });
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * Explicit rejection by the provider (e.g. `invalid_grant`)
 */
export class ProviderRejectedError extends GatewayError {
  /** OAuth `error` field of the provider response, when there was one */
  readonly oauthError: string | undefined;

  constructor(message: string, oauthError?: string, options?: Omit<GatewayErrorOptions, 'statusCode'>) {
    super(message, ErrorCode.PROVIDER_REJECTED, { ...options, statusCode: 400 });
    this.name = 'ProviderRejectedError';
    this.oauthError = oauthError;
  }
}
