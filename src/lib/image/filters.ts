export type GrayImage = { width: number; height: number; data: Uint8Array };

// Mirror without repeating the edge pixel: -1 -> 1, n -> n - 2.
function reflect101(i: number, n: number): number {
  if (n === 1) return 0;
  let j = i;
  while (j < 0 || j >= n) {
    j = j < 0 ? -j : 2 * (n - 1) - j;
  }
  return j;
}

function clamp(i: number, n: number): number {
  return i < 0 ? 0 : i >= n ? n - 1 : i;
}

/** Rec. 601 luma from interleaved 8-bit samples; only the first three channels are read. */
export function toGray(data: Uint8Array, width: number, height: number, channels: number): GrayImage {
  const out = new Uint8Array(width * height);
  if (channels < 3) {
    for (let p = 0; p < out.length; p++) out[p] = data[p * channels];
    return { width, height, data: out };
  }
  for (let p = 0; p < out.length; p++) {
    const i = p * channels;
    out[p] = Math.round(0.299 * data[i] + 0.587 * data[i + 1] + 0.114 * data[i + 2]);
  }
  return { width, height, data: out };
}

export type BilateralOptions = { diameter: number; sigmaColor: number; sigmaSpace: number };

/**
 * Bilateral smoothing: neighbours inside a disc of the given diameter are
 * weighted by distance and by intensity difference, so flat areas average
 * out while digit edges survive.
 */
export function bilateralFilter(src: GrayImage, { diameter, sigmaColor, sigmaSpace }: BilateralOptions): GrayImage {
  const { width, height, data } = src;
  const radius = Math.max(1, Math.floor(diameter / 2));

  const colorWeight = new Float64Array(256);
  const colorCoeff = -0.5 / (sigmaColor * sigmaColor);
  for (let d = 0; d < 256; d++) colorWeight[d] = Math.exp(d * d * colorCoeff);

  const offsets: { dx: number; dy: number; w: number }[] = [];
  const spaceCoeff = -0.5 / (sigmaSpace * sigmaSpace);
  for (let dy = -radius; dy <= radius; dy++) {
    for (let dx = -radius; dx <= radius; dx++) {
      const r2 = dx * dx + dy * dy;
      if (r2 > radius * radius) continue;
      offsets.push({ dx, dy, w: Math.exp(r2 * spaceCoeff) });
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const center = data[y * width + x];
      let sum = 0;
      let norm = 0;
      for (const { dx, dy, w } of offsets) {
        const v = data[reflect101(y + dy, height) * width + reflect101(x + dx, width)];
        const weight = w * colorWeight[Math.abs(v - center)];
        sum += v * weight;
        norm += weight;
      }
      out[y * width + x] = Math.round(sum / norm);
    }
  }
  return { width, height, data: out };
}

function gaussianKernel(size: number): Float64Array {
  const sigma = 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const half = Math.floor(size / 2);
  const kernel = new Float64Array(size);
  let total = 0;
  for (let i = 0; i < size; i++) {
    const d = i - half;
    kernel[i] = Math.exp(-(d * d) / (2 * sigma * sigma));
    total += kernel[i];
  }
  for (let i = 0; i < size; i++) kernel[i] /= total;
  return kernel;
}

export type AdaptiveThresholdOptions = { blockSize: number; c: number };

/**
 * Local binarization: a pixel turns white when it is brighter than the
 * Gaussian-weighted mean of its block minus `c`, black otherwise.
 */
export function adaptiveThreshold(src: GrayImage, { blockSize, c }: AdaptiveThresholdOptions): GrayImage {
  if (blockSize < 3 || blockSize % 2 === 0) {
    throw new RangeError(`blockSize must be an odd number >= 3, got ${blockSize}`);
  }
  const { width, height, data } = src;
  const kernel = gaussianKernel(blockSize);
  const half = Math.floor(blockSize / 2);

  const horizontal = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = 0;
      for (let k = 0; k < blockSize; k++) acc += kernel[k] * data[y * width + clamp(x + k - half, width)];
      horizontal[y * width + x] = acc;
    }
  }

  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let mean = 0;
      for (let k = 0; k < blockSize; k++) mean += kernel[k] * horizontal[clamp(y + k - half, height) * width + x];
      out[y * width + x] = data[y * width + x] > mean - c ? 255 : 0;
    }
  }
  return { width, height, data: out };
}

function morph(src: GrayImage, size: number, anchor: number, pick: (a: number, b: number) => number, sign: 1 | -1): GrayImage {
  const { width, height, data } = src;
  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let acc = -1;
      for (let ky = 0; ky < size; ky++) {
        const sy = y + sign * (ky - anchor);
        if (sy < 0 || sy >= height) continue;
        for (let kx = 0; kx < size; kx++) {
          const sx = x + sign * (kx - anchor);
          if (sx < 0 || sx >= width) continue;
          const v = data[sy * width + sx];
          acc = acc < 0 ? v : pick(acc, v);
        }
      }
      out[y * width + x] = acc < 0 ? data[y * width + x] : acc;
    }
  }
  return { width, height, data: out };
}

/**
 * Closing with a square structuring element: dilation, then erosion with the
 * reflected element. Fills dark gaps narrower than the element inside bright
 * strokes. Pixels outside the frame are ignored.
 */
export function morphClose(src: GrayImage, size: number): GrayImage {
  if (size < 1) throw new RangeError(`structuring element size must be >= 1, got ${size}`);
  const anchor = Math.floor(size / 2);
  const dilated = morph(src, size, anchor, Math.max, 1);
  return morph(dilated, size, anchor, Math.min, -1);
}
