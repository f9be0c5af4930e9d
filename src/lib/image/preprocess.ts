import { readFile } from 'node:fs/promises';
import sharp from 'sharp';
import { fileTypeFromBuffer } from 'file-type';
import { env, type Env } from '../../config/env';
import { ImageDecodeError, describeCause } from '../shots/errors';
import {
  adaptiveThreshold,
  bilateralFilter,
  morphClose,
  toGray,
  type AdaptiveThresholdOptions,
  type BilateralOptions,
} from './filters';

export type ImageInput = Buffer | Uint8Array | string;

export type PreprocessOptions = Readonly<{
  minHeight: number;
  maxWidth: number;
  maxBytes: number;
  autoOrient: boolean;
  bilateral: BilateralOptions;
  threshold: AdaptiveThresholdOptions;
  closeSize: number;
}>;

export type PreprocessedImage = { width: number; height: number; png: Buffer };

const SUPPORTED_MIME = new Set(['image/jpeg', 'image/png', 'image/webp', 'image/tiff', 'image/gif', 'image/avif']);

export const DEFAULT_FILTERS = {
  bilateral: { diameter: 9, sigmaColor: 75, sigmaSpace: 75 },
  threshold: { blockSize: 11, c: 2 },
  closeSize: 2,
} as const;

export function preprocessOptionsFromEnv(source: Env = env): PreprocessOptions {
  return Object.freeze({
    minHeight: source.IMAGE_MIN_HEIGHT,
    maxWidth: source.IMAGE_MAX_WIDTH,
    maxBytes: source.IMAGE_MAX_BYTES,
    autoOrient: source.FEATURES.AUTO_ORIENT,
    ...DEFAULT_FILTERS,
  });
}

export async function loadImageBytes(input: ImageInput, maxBytes: number): Promise<Buffer> {
  let bytes: Buffer;
  if (typeof input === 'string') {
    try {
      bytes = await readFile(input);
    } catch (e) {
      throw new ImageDecodeError(`Cannot read image file ${input}: ${describeCause(e)}`, { cause: e });
    }
  } else {
    bytes = Buffer.isBuffer(input) ? input : Buffer.from(input);
  }

  if (bytes.byteLength === 0) throw new ImageDecodeError('Image is empty');
  if (bytes.byteLength > maxBytes) {
    throw new ImageDecodeError(`Image is ${bytes.byteLength} bytes, above the ${maxBytes} byte limit`);
  }

  const ft = await fileTypeFromBuffer(bytes);
  if (!ft || !SUPPORTED_MIME.has(ft.mime)) {
    throw new ImageDecodeError(`Unsupported image format: ${ft?.mime ?? 'unrecognized bytes'}`);
  }
  return bytes;
}

/**
 * Photograph -> binary image for the recognizer: grayscale, bilateral
 * smoothing, adaptive threshold, closing, then a cubic upscale when the
 * frame is shorter than `minHeight`.
 */
export async function preprocessImage(
  input: ImageInput,
  options: PreprocessOptions = preprocessOptionsFromEnv()
): Promise<PreprocessedImage> {
  const bytes = await loadImageBytes(input, options.maxBytes);

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    let pipeline = sharp(bytes);
    if (options.autoOrient) pipeline = pipeline.rotate();
    decoded = await pipeline
      .flatten({ background: '#ffffff' })
      .resize({ width: options.maxWidth, withoutEnlargement: true })
      .greyscale()
      .toColourspace('b-w')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (e) {
    throw new ImageDecodeError(`Cannot decode image: ${describeCause(e)}`, { cause: e });
  }

  const { width, height, channels } = decoded.info;
  const gray = toGray(decoded.data, width, height, channels);
  const smoothed = bilateralFilter(gray, options.bilateral);
  const binary = adaptiveThreshold(smoothed, options.threshold);
  const closed = morphClose(binary, options.closeSize);

  try {
    let out = sharp(Buffer.from(closed.data), { raw: { width, height, channels: 1 } });
    if (height < options.minHeight) {
      const scaledWidth = Math.max(1, Math.floor((width * options.minHeight) / height));
      out = out.resize({ width: scaledWidth, height: options.minHeight, fit: 'fill', kernel: 'cubic' });
    }
    const { data, info } = await out.toColourspace('b-w').png().toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, png: data };
  } catch (e) {
    throw new ImageDecodeError(`Cannot encode preprocessed image: ${describeCause(e)}`, { cause: e });
  }
}
