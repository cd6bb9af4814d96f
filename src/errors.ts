export class ImageBatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or conflicting settings. Fatal before any file is processed. */
export class ConfigError extends ImageBatchError {}

export class DecodeError extends ImageBatchError {}

export class ResizeError extends ImageBatchError {}

export class ConversionError extends ImageBatchError {}

export class EncodeError extends ImageBatchError {}

export class PathError extends ImageBatchError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
