/**
 * Error taxonomy for the polling engine.
 *
 * TransportError and NotifyError are isolated to one device or one message.
 * PersistenceError halts accumulation for the affected device.
 * ConfigError drops one registry entry at startup.
 * DataQualityWarning is a value, never thrown: the offending delta is zeroed.
 */

export class TransportError extends Error {
  constructor(readonly device: string, readonly reason: string, options?: { cause?: unknown }) {
    super(`Device ${device} unreachable: ${reason}`, options);
    this.name = 'TransportError';
  }
}

export class PersistenceError extends Error {
  constructor(readonly operation: string, readonly path: string, options?: { cause?: unknown }) {
    super(`Persistence failed during ${operation} (${path})`, options);
    this.name = 'PersistenceError';
  }
}

export class NotifyError extends Error {
  constructor(readonly channel: string, reason: string) {
    super(`${channel} notification failed: ${reason}`);
    this.name = 'NotifyError';
  }
}

export class ConfigError extends Error {
  constructor(readonly entry: string, readonly issues: string[]) {
    super(`Invalid device configuration for ${entry}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type DataQualityCode = 'implausible_rate' | 'counter_out_of_range';

export interface DataQualityWarning {
  code: DataQualityCode;
  device: string;
  interfaceLabel: string;
  direction: 'in' | 'out';
  message: string;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
