import { describe, expect, it } from 'vitest';

import { COLORMAPS, COLORMAP_NAMES, valueToRGBA } from './colormaps';
import { checkAppearance, createImage, decimationFactor, paintWindow, pixelIndices } from './renderLogic';

describe('valueToRGBA', () => {
  it('interpolates between stops', () => {
    expect(valueToRGBA(0.25, COLORMAPS.jet)).toEqual([0, 127.5, 255, 1]);
  });

  it('clamps to the end stops and leaves NaN uncolored', () => {
    expect(valueToRGBA(-1, COLORMAPS.gray)).toEqual([0, 0, 0, 1]);
    expect(valueToRGBA(2, COLORMAPS.gray)).toEqual([255, 255, 255, 1]);
    expect(valueToRGBA(Number.NaN, COLORMAPS.gray)).toBeNull();
  });

  it('covers [0, 1] in every colormap', () => {
    expect(COLORMAP_NAMES).toEqual(['gray', 'Greys', 'jet', 'viridis', 'inferno', 'seismic']);
    for (const name of COLORMAP_NAMES) {
      const stops = COLORMAPS[name];
      expect(stops[0].value).toBe(0);
      expect(stops[stops.length - 1].value).toBe(1);
    }
  });
});

describe('pixelIndices', () => {
  it('picks the index under each pixel centre', () => {
    expect(Array.from(pixelIndices([0, 10], 4))).toEqual([1, 3, 6, 8]);
    expect(Array.from(pixelIndices([5, 7], 4))).toEqual([5, 5, 6, 6]);
  });

  it('reports how many traces share a column', () => {
    expect(decimationFactor([0, 10], 4)).toBe(3);
    expect(decimationFactor([0, 10], 40)).toBe(1);
  });
});

describe('paintWindow', () => {
  it('leaves NaN samples transparent', () => {
    const image = createImage(1, 2);
    paintWindow(
      image,
      { traces: [0, 1], samples: [0, 2], data: new Float32Array([Number.NaN, 50]), width: 2 },
      new Int32Array([0]),
      new Int32Array([0, 1]),
      { colormap: 'gray', intensityMin: 0, intensityMax: 100 },
    );
    expect(Array.from(image.data)).toEqual([0, 0, 0, 0, 128, 128, 128, 255]);
  });

  it('skips columns whose trace is outside the window', () => {
    const image = createImage(2, 1);
    paintWindow(
      image,
      { traces: [4, 5], samples: [0, 1], data: new Float32Array([100]), width: 1 },
      new Int32Array([3, 4]),
      new Int32Array([0]),
      { colormap: 'gray', intensityMin: 0, intensityMax: 100 },
    );
    expect(Array.from(image.data)).toEqual([0, 0, 0, 0, 255, 255, 255, 255]);
  });
});

describe('checkAppearance', () => {
  it('requires min < max', () => {
    expect(() => checkAppearance({ colormap: 'gray', intensityMin: 1, intensityMax: 0 })).toThrow(RangeError);
    expect(() => checkAppearance({ colormap: 'gray', intensityMin: 0, intensityMax: 1 })).not.toThrow();
  });
});
