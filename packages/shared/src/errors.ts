/** Error taxonomy shared by every vidfarm package.
 * Each error carries a stable `code` so the HTTP and CLI surfaces can map it without instanceof chains. */

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'STORAGE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'NO_SLOT_AVAILABLE';

export abstract class VidfarmError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends VidfarmError {
  readonly code = 'INVALID_REQUEST' as const;

  constructor(
    message: string,
    public readonly fields: string[] = [],
  ) {
    super(message);
  }
}

export class StorageError extends VidfarmError {
  readonly code = 'STORAGE_ERROR' as const;
}

export class ConfigurationError extends VidfarmError {
  readonly code = 'CONFIGURATION_ERROR' as const;
}

/** Raised only when cadence enforcement is on and the search horizon is exhausted */
export class NoSlotAvailableError extends VidfarmError {
  readonly code = 'NO_SLOT_AVAILABLE' as const;

  constructor(
    public readonly platform: string,
    public readonly horizonDays: number,
  ) {
    super(`No publish slot available for ${platform} within ${horizonDays} days`);
  }
}

export function isVidfarmError(err: unknown): err is VidfarmError {
  return err instanceof VidfarmError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
