import { DimensionMismatchError } from '../errors.js';
import type { MotionRegion, PreprocessedFrame } from '../types.js';

export const DEFAULT_BASE_THRESHOLD = 255;

export interface AnalyzeOptions {
  baseThreshold?: number;
  dilateIterations?: number;
}

export interface DiffStats {
  changedPixels: number;
  threshold: number;
}

/**
 * Intensity delta at or above which a pixel counts as changed. Higher sensitivity lowers the
 * threshold; the result always stays within [1, 255].
 */
export function thresholdFor(sensitivity: number, baseThreshold = DEFAULT_BASE_THRESHOLD): number {
  const s = Number.isFinite(sensitivity) ? Math.min(1, Math.max(0, sensitivity)) : 0;
  const base = Number.isFinite(baseThreshold) ? baseThreshold : DEFAULT_BASE_THRESHOLD;
  return Math.min(255, Math.max(1, base * (1 - s)));
}

export function analyze(
  previous: PreprocessedFrame,
  current: PreprocessedFrame,
  sensitivity: number,
  options: AnalyzeOptions = {}
): MotionRegion[] {
  const { mask } = changeMask(previous, current, sensitivity, options);
  const iterations = Math.max(0, Math.floor(options.dilateIterations ?? 0));

  let dilated = mask;
  for (let i = 0; i < iterations; i += 1) {
    dilated = dilate(dilated, current.width, current.height);
  }

  return labelRegions(dilated, current.width, current.height);
}

export function changeMask(
  previous: PreprocessedFrame,
  current: PreprocessedFrame,
  sensitivity: number,
  options: AnalyzeOptions = {}
): { mask: Uint8Array; stats: DiffStats } {
  if (previous.width !== current.width || previous.height !== current.height) {
    throw new DimensionMismatchError(
      { width: previous.width, height: previous.height },
      { width: current.width, height: current.height }
    );
  }

  const threshold = thresholdFor(sensitivity, options.baseThreshold);
  const size = current.width * current.height;
  const mask = new Uint8Array(size);
  let changedPixels = 0;

  for (let i = 0; i < size; i += 1) {
    if (Math.abs(current.data[i] - previous.data[i]) >= threshold) {
      mask[i] = 1;
      changedPixels += 1;
    }
  }

  return { mask, stats: { changedPixels, threshold } };
}

function dilate(mask: Uint8Array, width: number, height: number): Uint8Array {
  const output = new Uint8Array(mask.length);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      if (mask[y * width + x] === 0) {
        continue;
      }
      const top = Math.max(0, y - 1);
      const bottom = Math.min(height - 1, y + 1);
      const left = Math.max(0, x - 1);
      const right = Math.min(width - 1, x + 1);
      for (let ny = top; ny <= bottom; ny += 1) {
        output.fill(1, ny * width + left, ny * width + right + 1);
      }
    }
  }

  return output;
}

/** 8-connected component labelling over a binary mask. */
export function labelRegions(mask: Uint8Array, width: number, height: number): MotionRegion[] {
  const visited = new Uint8Array(mask.length);
  const stack = new Int32Array(mask.length);
  const regions: MotionRegion[] = [];

  for (let start = 0; start < mask.length; start += 1) {
    if (mask[start] === 0 || visited[start] === 1) {
      continue;
    }

    let top = 0;
    stack[top++] = start;
    visited[start] = 1;

    let minX = width;
    let minY = height;
    let maxX = -1;
    let maxY = -1;
    let area = 0;

    while (top > 0) {
      const index = stack[--top];
      const x = index % width;
      const y = (index - x) / width;
      area += 1;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;

      for (let dy = -1; dy <= 1; dy += 1) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) {
          continue;
        }
        for (let dx = -1; dx <= 1; dx += 1) {
          const nx = x + dx;
          if ((dx === 0 && dy === 0) || nx < 0 || nx >= width) {
            continue;
          }
          const neighbor = ny * width + nx;
          if (mask[neighbor] === 1 && visited[neighbor] === 0) {
            visited[neighbor] = 1;
            stack[top++] = neighbor;
          }
        }
      }
    }

    regions.push({
      x: minX,
      y: minY,
      width: maxX - minX + 1,
      height: maxY - minY + 1,
      area
    });
  }

  return regions.sort(compareRegions);
}

export function compareRegions(a: MotionRegion, b: MotionRegion): number {
  return b.area - a.area || a.y - b.y || a.x - b.x;
}
