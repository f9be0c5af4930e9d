import type { ShotErrorCode } from './model';

export class ShotProcessingError extends Error {
  readonly code: ShotErrorCode;

  constructor(code: ShotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ShotProcessingError';
    this.code = code;
  }
}

/** The input could not be read or is not a decodable raster image. */
export class ImageDecodeError extends ShotProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IMAGE_DECODE', message, options);
    this.name = 'ImageDecodeError';
  }
}

/** The recognition engine failed to start, configure, recognize or shut down. */
export class OcrEngineError extends ShotProcessingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('OCR_ENGINE', message, options);
    this.name = 'OcrEngineError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return 'unknown error';
}
