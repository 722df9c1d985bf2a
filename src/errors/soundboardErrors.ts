export type SoundboardErrorKind =
  | 'storage_unavailable'
  | 'asset_not_found'
  | 'conflict'
  | 'not_found'
  | 'invalid_request'
  | 'playback_device';

const STATUS_BY_KIND: Record<SoundboardErrorKind, number> = {
  storage_unavailable: 503,
  asset_not_found: 404,
  conflict: 409,
  not_found: 404,
  invalid_request: 400,
  playback_device: 502,
};

export class SoundboardError extends Error {
  readonly kind: SoundboardErrorKind;
  readonly statusCode: number;

  constructor(kind: SoundboardErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = STATUS_BY_KIND[kind];
  }
}

/** The mapping document could not be read, parsed or written. */
export class StorageUnavailableError extends SoundboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_unavailable', message, options);
  }
}

export class AssetNotFoundError extends SoundboardError {
  readonly assetName: string;

  constructor(assetName: string) {
    super('asset_not_found', `Asset not found: ${assetName}`);
    this.assetName = assetName;
  }
}

export class ConflictError extends SoundboardError {
  constructor(message: string) {
    super('conflict', message);
  }
}

export class NotFoundError extends SoundboardError {
  constructor(message: string) {
    super('not_found', message);
  }
}

export class InvalidRequestError extends SoundboardError {
  constructor(message: string) {
    super('invalid_request', message);
  }
}

export class PlaybackDeviceError extends SoundboardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('playback_device', message, options);
  }
}

export function isSoundboardError(error: unknown): error is SoundboardError {
  return error instanceof SoundboardError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
