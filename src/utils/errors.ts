export type DemErrorCode =
  | 'DOMAIN_ERROR'
  | 'SERVICE_ERROR'
  | 'TRANSPORT_ERROR'
  | 'DECODE_ERROR'
  | 'CONFIG_ERROR';

/**
 * Base class for every error the elevation pipeline raises
 */
export class DemError extends Error {
  readonly code: DemErrorCode;

  constructor(code: DemErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Latitude at or beyond the poles, or a non-finite coordinate
export class DomainError extends DemError {
  constructor(message: string) {
    super('DOMAIN_ERROR', message);
  }
}

export class TileServiceError extends DemError {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super('SERVICE_ERROR', `Tile request failed with HTTP ${status}: ${url}`);
    this.url = url;
    this.status = status;
  }
}

export class TileTransportError extends DemError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TRANSPORT_ERROR', `Tile request to ${url} failed: ${reason}`, { cause });
    this.url = url;
  }
}

export class TileDecodeError extends DemError {
  constructor(message: string, cause?: unknown) {
    super('DECODE_ERROR', message, cause === undefined ? undefined : { cause });
  }
}

export class ConfigError extends DemError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}
