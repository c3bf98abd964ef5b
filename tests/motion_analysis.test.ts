import { describe, expect, it } from 'vitest';
import { DimensionMismatchError, InvalidFrameError } from '../src/errors.js';
import { analyze, changeMask, labelRegions, thresholdFor } from '../src/video/analyze.js';
import { decide, filterRegions, largestRegion } from '../src/video/decide.js';
import { binomialKernel, normalizeBlurRadius, preprocess } from '../src/video/preprocess.js';
import { BRIGHT, GRAY, grayScene, solidFrame, squareScene, withSquare } from './helpers/frames.js';

describe('preprocess', () => {
  it('PreprocessUniformFrameKeepsIntensity', () => {
    const result = preprocess(solidFrame(8, 6, GRAY, 42));

    expect(result.width).toBe(8);
    expect(result.height).toBe(6);
    expect(result.blurRadius).toBe(2);
    expect(result.ts).toBe(42);
    expect(result.data).toHaveLength(48);
    expect(Array.from(new Set(result.data))).toEqual([40]);
  });

  it('PreprocessWithoutBlurKeepsEdges', () => {
    const result = preprocess(squareScene(), { blurRadius: 0 });

    expect(result.blurRadius).toBe(0);
    expect(result.data[50 * 100 + 50]).toBe(240);
    expect(result.data[40 * 100 + 40]).toBe(240);
    expect(result.data[39 * 100 + 40]).toBe(40);
  });

  it('PreprocessBlurSoftensEdges', () => {
    const result = preprocess(squareScene());

    expect(result.data[50 * 100 + 50]).toBe(240);
    expect(result.data[40 * 100 + 40]).toBe(135);
    expect(result.data[39 * 100 + 40]).toBe(83);
  });

  it('PreprocessRejectsInvalidFrames', () => {
    expect(() => preprocess({ width: 0, height: 4, data: new Uint8Array(0), ts: 0 })).toThrow(
      InvalidFrameError
    );
    expect(() => preprocess({ width: 2, height: 2, data: new Uint8Array(15), ts: 0 })).toThrow(
      /expected 16/
    );
  });

  it('BinomialKernelWeights', () => {
    expect(Array.from(binomialKernel(1))).toEqual([0.25, 0.5, 0.25]);
    expect(Array.from(binomialKernel(2))).toEqual([1 / 16, 4 / 16, 6 / 16, 4 / 16, 1 / 16]);
  });

  it('BlurRadiusNormalization', () => {
    expect(normalizeBlurRadius(undefined)).toBe(2);
    expect(normalizeBlurRadius(Number.NaN)).toBe(2);
    expect(normalizeBlurRadius(-3)).toBe(0);
    expect(normalizeBlurRadius(1.6)).toBe(2);
    expect(normalizeBlurRadius(99)).toBe(15);
  });
});

describe('analyze', () => {
  it('ThresholdFollowsSensitivity', () => {
    expect(thresholdFor(0)).toBe(255);
    expect(thresholdFor(0.5)).toBe(127.5);
    expect(thresholdFor(1)).toBe(1);
    expect(thresholdFor(2)).toBe(1);
    expect(thresholdFor(-1)).toBe(255);
    expect(thresholdFor(0.5, 100)).toBe(50);
    expect(thresholdFor(0.8)).toBeCloseTo(51, 6);
  });

  it('ThresholdIsMonotonic', () => {
    let previous = Number.POSITIVE_INFINITY;
    for (let s = 0; s <= 1; s += 0.05) {
      const threshold = thresholdFor(s);
      expect(threshold).toBeLessThanOrEqual(previous);
      expect(threshold).toBeGreaterThanOrEqual(1);
      expect(threshold).toBeLessThanOrEqual(255);
      previous = threshold;
    }
  });

  it('AnalyzeFindsSquare', () => {
    const previous = preprocess(grayScene(0));
    const current = preprocess(squareScene(1));

    expect(analyze(previous, current, 0.5)).toEqual([{ x: 40, y: 40, width: 20, height: 20, area: 396 }]);
    expect(analyze(previous, current, 0.8)).toEqual([{ x: 39, y: 39, width: 22, height: 22, area: 472 }]);
    expect(analyze(previous, current, 0.2)).toEqual([]);
  });

  it('AnalyzeIdenticalFramesHasNoRegions', () => {
    const frame = preprocess(squareScene());
    expect(analyze(frame, frame, 1)).toEqual([]);
  });

  it('AnalyzeRejectsDimensionChange', () => {
    const previous = preprocess(solidFrame(10, 10, GRAY));
    const current = preprocess(solidFrame(20, 10, GRAY));

    let caught: unknown;
    try {
      analyze(previous, current, 0.5);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DimensionMismatchError);
    if (caught instanceof DimensionMismatchError) {
      expect(caught.previous).toEqual({ width: 10, height: 10 });
      expect(caught.current).toEqual({ width: 20, height: 10 });
      expect(caught.code).toBe('dimension-mismatch');
    }
  });

  it('ChangeMaskCountsChangedPixels', () => {
    const previous = preprocess(grayScene(), { blurRadius: 0 });
    const current = preprocess(squareScene(), { blurRadius: 0 });

    const { stats } = changeMask(previous, current, 0.5);
    expect(stats).toEqual({ changedPixels: 400, threshold: 127.5 });
    expect(changeMask(previous, current, 0).stats.changedPixels).toBe(0);
  });

  it('DilationGrowsRegions', () => {
    const base = solidFrame(10, 10, GRAY);
    const previous = preprocess(base, { blurRadius: 0 });
    const current = preprocess(withSquare(base, { x: 5, y: 5, width: 1, height: 1 }, BRIGHT), {
      blurRadius: 0
    });

    expect(analyze(previous, current, 0.5)).toEqual([{ x: 5, y: 5, width: 1, height: 1, area: 1 }]);
    expect(analyze(previous, current, 0.5, { dilateIterations: 1 })).toEqual([
      { x: 4, y: 4, width: 3, height: 3, area: 9 }
    ]);
  });

  it('LabelRegionsJoinsDiagonalNeighbours', () => {
    const mask = Uint8Array.from([1, 0, 0, 0, 1, 0, 0, 0, 0]);
    expect(labelRegions(mask, 3, 3)).toEqual([{ x: 0, y: 0, width: 2, height: 2, area: 2 }]);
  });

  it('LabelRegionsOrdering', () => {
    expect(labelRegions(Uint8Array.from([1, 1, 0, 0, 1]), 5, 1)).toEqual([
      { x: 0, y: 0, width: 2, height: 1, area: 2 },
      { x: 4, y: 0, width: 1, height: 1, area: 1 }
    ]);

    // equal areas order by row, then column
    const mask = new Uint8Array(15);
    mask[4] = 1;
    mask[2] = 1;
    mask[10] = 1;
    expect(labelRegions(mask, 5, 3).map(region => [region.x, region.y])).toEqual([
      [2, 0],
      [4, 0],
      [0, 2]
    ]);
  });
});

describe('decide', () => {
  const square = { x: 40, y: 40, width: 20, height: 20, area: 396 };
  const speck = { x: 1, y: 1, width: 1, height: 1, area: 1 };
  const stamp = { sequence: 1, ts: 1000, snapshot: true };

  it('DecideAreaFilterIsInclusive', () => {
    const atLimit = decide([square], { minArea: 396 }, false, stamp);
    expect(atLimit.presence).toBe(true);
    expect(atLimit.event).toEqual({ sequence: 1, ts: 1000, regions: [square], snapshot: true });

    const aboveLimit = decide([square], { minArea: 397 }, false, stamp);
    expect(aboveLimit).toEqual({ presence: false, qualifying: [], event: null });
  });

  it('DecideIsEdgeTriggered', () => {
    const first = decide([square], { minArea: 300 }, false, stamp);
    const sustained = decide([square], { minArea: 300 }, first.presence, { ...stamp, sequence: 2 });
    const quiet = decide([], { minArea: 300 }, sustained.presence, { ...stamp, sequence: 2 });
    const again = decide([square], { minArea: 300 }, quiet.presence, { ...stamp, sequence: 2 });

    expect(first.event?.sequence).toBe(1);
    expect(sustained.presence).toBe(true);
    expect(sustained.event).toBeNull();
    expect(quiet.presence).toBe(false);
    expect(again.event?.sequence).toBe(2);
  });

  it('DecideDropsSmallRegions', () => {
    const decision = decide([speck, square], { minArea: 10 }, false, stamp);
    expect(decision.qualifying).toEqual([square]);
    expect(decision.event?.regions).toEqual([square]);
  });

  it('DecideFreezesEvents', () => {
    const { event } = decide([square], { minArea: 1 }, false, stamp);
    expect(event).not.toBeNull();
    if (event) {
      expect(Object.isFrozen(event)).toBe(true);
      expect(Object.isFrozen(event.regions)).toBe(true);
      expect(Object.isFrozen(event.regions[0])).toBe(true);
      expect(largestRegion(event)).toEqual(square);
    }
  });

  it('FilterRegionsSortsLargestFirst', () => {
    expect(filterRegions([speck, square], 1)).toEqual([square, speck]);
    expect(largestRegion({ regions: [] })).toBeNull();
  });
});
