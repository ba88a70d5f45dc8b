export class HomewatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HomewatchError';
  }
}

export class ConfigError extends HomewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends HomewatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends HomewatchError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export type DeliveryErrorKind = 'transient' | 'rejected';

export class DeliveryError extends HomewatchError {
  constructor(
    message: string,
    public readonly kind: DeliveryErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'DELIVERY_ERROR', details);
    this.name = 'DeliveryError';
  }
}

export type StoreErrorKind = 'unavailable' | 'corrupt';

export class StoreError extends HomewatchError {
  constructor(
    message: string,
    public readonly kind: StoreErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'STORE_ERROR', details);
    this.name = 'StoreError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
