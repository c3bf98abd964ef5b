import { InvalidFrameError } from '../errors.js';
import type { Frame, PreprocessedFrame } from '../types.js';

export const DEFAULT_BLUR_RADIUS = 2;
export const MAX_BLUR_RADIUS = 15;

export interface PreprocessOptions {
  blurRadius?: number;
}

const kernelCache = new Map<number, Float64Array>();

export function preprocess(frame: Frame, options: PreprocessOptions = {}): PreprocessedFrame {
  assertFrame(frame);
  const blurRadius = normalizeBlurRadius(options.blurRadius);
  const grayscale = toGrayscale(frame);
  const data =
    blurRadius > 0 ? binomialBlur(grayscale, frame.width, frame.height, blurRadius) : grayscale;

  return {
    width: frame.width,
    height: frame.height,
    data,
    blurRadius,
    ts: frame.ts
  };
}

export function normalizeBlurRadius(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return DEFAULT_BLUR_RADIUS;
  }
  return Math.min(MAX_BLUR_RADIUS, Math.max(0, Math.round(value)));
}

export function assertFrame(frame: Frame) {
  const { width, height, data } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidFrameError(`Frame has invalid dimensions ${width}x${height}`);
  }
  if (data.length < width * height * 4) {
    throw new InvalidFrameError(
      `Frame buffer holds ${data.length} bytes, expected ${width * height * 4} for ${width}x${height} RGBA`
    );
  }
}

function toGrayscale(frame: Frame): Uint8Array {
  const { width, height, data } = frame;
  const grayscale = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i += 1) {
    const offset = i * 4;
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(
      0.2126 * data[offset] + 0.7152 * data[offset + 1] + 0.0722 * data[offset + 2]
    );
  }

  return grayscale;
}

/**
 * Separable blur whose weights are the binomial coefficients of row `2 * radius` of Pascal's
 * triangle, the discrete approximation of a Gaussian. Samples outside the frame clamp to the
 * nearest edge pixel.
 */
function binomialBlur(data: Uint8Array, width: number, height: number, radius: number): Uint8Array {
  const kernel = binomialKernel(radius);
  const horizontal = new Float64Array(width * height);

  for (let y = 0; y < height; y += 1) {
    const row = y * width;
    for (let x = 0; x < width; x += 1) {
      let total = 0;
      for (let k = -radius; k <= radius; k += 1) {
        const sampleX = clamp(x + k, 0, width - 1);
        total += data[row + sampleX] * kernel[k + radius];
      }
      horizontal[row + x] = total;
    }
  }

  const output = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let total = 0;
      for (let k = -radius; k <= radius; k += 1) {
        const sampleY = clamp(y + k, 0, height - 1);
        total += horizontal[sampleY * width + x] * kernel[k + radius];
      }
      output[y * width + x] = Math.round(total);
    }
  }

  return output;
}

export function binomialKernel(radius: number): Float64Array {
  const cached = kernelCache.get(radius);
  if (cached) {
    return cached;
  }

  const size = radius * 2 + 1;
  const weights = new Float64Array(size);
  weights[0] = 1;
  for (let row = 1; row < size; row += 1) {
    for (let k = row; k > 0; k -= 1) {
      weights[k] += weights[k - 1];
    }
  }

  const sum = 2 ** (size - 1);
  for (let k = 0; k < size; k += 1) {
    weights[k] /= sum;
  }

  kernelCache.set(radius, weights);
  return weights;
}

function clamp(value: number, min: number, max: number) {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
