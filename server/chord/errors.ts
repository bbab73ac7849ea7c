import type { Grid } from './types';

export class InvalidThresholdError extends Error {
  code = 'INVALID_THRESHOLD';
  recoverable = false;

  constructor(public threshold: number) {
    super(`Threshold must be a number strictly between 0 and 1, got ${threshold}`);
    this.name = 'InvalidThresholdError';
  }
}

export class UnknownGroupError extends Error {
  code = 'UNKNOWN_GROUP';
  recoverable = false;

  constructor(public group: string, public knownGroups: readonly string[]) {
    super(`Unknown vertebrae group "${group}" (expected one of: ${knownGroups.join(', ')})`);
    this.name = 'UnknownGroupError';
  }
}

export class GridMismatchError extends Error {
  code = 'GRID_MISMATCH';
  recoverable = false;

  constructor(message: string, public details?: { subject: string; expected?: Grid; actual?: Grid }) {
    super(message);
    this.name = 'GridMismatchError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  recoverable = false;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class VolumeLoadError extends Error {
  code = 'VOLUME_LOAD_ERROR';
  recoverable = true;

  constructor(message: string, public filePath: string) {
    super(message);
    this.name = 'VolumeLoadError';
  }
}

export class SeriesLoadError extends Error {
  code = 'SERIES_LOAD_ERROR';
  recoverable = true;

  constructor(message: string, public directory: string) {
    super(message);
    this.name = 'SeriesLoadError';
  }
}

export type PreconditionError = InvalidThresholdError | UnknownGroupError | GridMismatchError | ConfigurationError;

/** Configuration mistakes that stop a run, as opposed to I/O failures. */
export function isPreconditionError(error: unknown): error is PreconditionError {
  return (
    error instanceof InvalidThresholdError ||
    error instanceof UnknownGroupError ||
    error instanceof GridMismatchError ||
    error instanceof ConfigurationError
  );
}
