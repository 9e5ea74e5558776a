import { describe, expect, it } from 'vitest';

import {
  clampRange,
  clampViewport,
  fullViewport,
  indexToPixel,
  pan,
  pixelToIndex,
  step,
  stepShift,
  zoomIn,
  zoomOut,
  zoomOutToRect,
  type Extent,
  type Viewport,
} from './viewport';

const extent: Extent = { traceCount: 100, sampleCount: 50 };
const canvas = { width: 200, height: 100 };
const centred: Viewport = { traces: [40, 60], samples: [10, 20] };

function expectValid(viewport: Viewport, bounds: Extent): void {
  const [t0, t1] = viewport.traces;
  const [s0, s1] = viewport.samples;
  expect(Number.isInteger(t0) && Number.isInteger(t1)).toBe(true);
  expect(Number.isInteger(s0) && Number.isInteger(s1)).toBe(true);
  expect(0 <= t0 && t0 < t1 && t1 <= bounds.traceCount).toBe(true);
  expect(0 <= s0 && s0 < s1 && s1 <= bounds.sampleCount).toBe(true);
}

describe('step', () => {
  const long: Extent = { traceCount: 10_000, sampleCount: 100 };

  it('moves by the width less the overlap', () => {
    const next = step({ traces: [0, 500], samples: [0, 100] }, long, 'next', 0.1);
    expect(next.traces).toEqual([450, 950]);
    expect(next.samples).toEqual([0, 100]);
  });

  it('returns to the starting view after next then prev', () => {
    const start: Viewport = { traces: [1000, 1500], samples: [0, 100] };
    const next = step(start, long, 'next');
    const back = step(next, long, 'prev');

    const overlap = Math.min(start.traces[1], next.traces[1]) - Math.max(start.traces[0], next.traces[0]);
    expect(overlap).toBeGreaterThanOrEqual(0.1 * 500);
    expect(back).toEqual(start);
  });

  it('stops at the edges without shrinking the view', () => {
    expect(step({ traces: [9800, 10_000], samples: [0, 100] }, long, 'next').traces).toEqual([9800, 10_000]);
    expect(step({ traces: [9700, 9900], samples: [0, 100] }, long, 'next').traces).toEqual([9800, 10_000]);
    expect(step({ traces: [100, 600], samples: [0, 100] }, long, 'prev').traces).toEqual([0, 500]);
  });

  it('always overlaps the previous view by at least the overlap fraction', () => {
    for (const width of [1, 2, 5, 9, 10, 11, 99, 500, 777]) {
      const shift = stepShift(width, 0.1);
      expect(shift).toBeGreaterThanOrEqual(1);
      if (width >= 10) expect(width - shift).toBeGreaterThanOrEqual(0.1 * width);
    }
  });

  it('rejects overlap fractions outside [0, 1)', () => {
    expect(() => step(centred, extent, 'next', 1)).toThrow(RangeError);
    expect(() => step(centred, extent, 'next', -0.1)).toThrow(RangeError);
  });
});

describe('zoomIn', () => {
  it('zooms to the dragged box whichever way it was dragged', () => {
    const full = fullViewport(extent);
    const zoomed = zoomIn(full, extent, canvas, { x0: 50, y0: 60, x1: 10, y1: 20 });
    expect(zoomed).toEqual({ traces: [5, 25], samples: [10, 30] });
  });

  it('never collapses below one trace by one sample', () => {
    const full = fullViewport(extent);
    const zoomed = zoomIn(full, extent, canvas, { x0: 50, y0: 40, x1: 50, y1: 40 });
    expect(zoomed).toEqual({ traces: [25, 26], samples: [20, 21] });
  });

  it('intersects boxes that leave the canvas with the data bounds', () => {
    const full = fullViewport(extent);
    const zoomed = zoomIn(full, extent, canvas, { x0: -20, y0: -5, x1: 400, y1: 150 });
    expect(zoomed).toEqual(full);
  });

  it('zooms relative to the current view', () => {
    const zoomed = zoomIn(centred, extent, canvas, { x0: 0, y0: 0, x1: 100, y1: 50 });
    expect(zoomed).toEqual({ traces: [40, 50], samples: [10, 15] });
  });
});

describe('zoomOut', () => {
  it('expands about the centre', () => {
    expect(zoomOut(centred, extent, 2)).toEqual({ traces: [30, 70], samples: [5, 25] });
  });

  it('shifts inward at the edges and crops to the full extent', () => {
    expect(zoomOut({ traces: [0, 20], samples: [0, 10] }, extent, 2)).toEqual({ traces: [0, 40], samples: [0, 20] });
    expect(zoomOut(centred, extent, 100)).toEqual(fullViewport(extent));
  });

  it('rejects factors below 1', () => {
    expect(() => zoomOut(centred, extent, 0.5)).toThrow(RangeError);
  });
});

describe('zoomOutToRect', () => {
  it('shrinks the current view into the box', () => {
    const zoomed = zoomOutToRect(centred, extent, canvas, { x0: 150, y0: 75, x1: 50, y1: 25 });
    expect(zoomed).toEqual({ traces: [30, 70], samples: [5, 25] });
  });

  it('ignores a box with no area', () => {
    expect(zoomOutToRect(centred, extent, canvas, { x0: 10, y0: 10, x1: 10, y1: 90 })).toBe(centred);
  });
});

describe('pan', () => {
  it('moves content with the pointer', () => {
    expect(pan(centred, extent, canvas, 50, -30)).toEqual({ traces: [35, 55], samples: [13, 23] });
  });

  it('keeps the view size when pushed past an edge', () => {
    expect(pan(centred, extent, canvas, 10_000, -10_000)).toEqual({ traces: [0, 20], samples: [40, 50] });
  });
});

describe('clamping', () => {
  it('brings an out-of-range viewport back into bounds', () => {
    expect(clampViewport({ traces: [120, 90], samples: [-5, 5] }, extent)).toEqual({
      traces: [70, 100],
      samples: [0, 10],
    });
  });

  it('rejects non-finite positions instead of producing NaN ranges', () => {
    expect(() => zoomIn(centred, extent, canvas, { x0: Number.NaN, y0: 0, x1: 10, y1: 10 })).toThrow(RangeError);
    expect(() => zoomOutToRect(centred, extent, canvas, { x0: 0, y0: 0, x1: Infinity, y1: 10 })).toThrow(RangeError);
    expect(() => pan(centred, extent, canvas, Number.NaN, 0)).toThrow('Pan offset must be finite, got (NaN, 0)');
    expect(() => clampViewport({ traces: [0, Number.NaN], samples: [0, 5] }, extent)).toThrow(RangeError);
  });

  it('crops a range wider than the data', () => {
    expect(clampRange(-10, 500, 100)).toEqual([0, 100]);
    expect(clampRange(3, 0, 100)).toEqual([3, 4]);
  });

  it('keeps every viewport in bounds through a long mixed sequence', () => {
    // Deterministic LCG so failures reproduce
    let seed = 12345;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };

    let viewport = fullViewport(extent);
    for (let i = 0; i < 500; i++) {
      const op = Math.floor(next() * 6);
      const x = next() * 260 - 30;
      const y = next() * 130 - 15;
      switch (op) {
        case 0: viewport = zoomIn(viewport, extent, canvas, { x0: x, y0: y, x1: next() * 200, y1: next() * 100 }); break;
        case 1: viewport = zoomOut(viewport, extent, 1 + next() * 3); break;
        case 2: viewport = pan(viewport, extent, canvas, x - 100, y - 50); break;
        case 3: viewport = step(viewport, extent, next() < 0.5 ? 'prev' : 'next'); break;
        case 4: viewport = zoomOutToRect(viewport, extent, canvas, { x0: x, y0: y, x1: x + next() * 200, y1: y + next() * 100 }); break;
        default: viewport = fullViewport(extent);
      }
      expectValid(viewport, extent);
    }
  });
});

describe('pixel mapping', () => {
  it('maps each index centre back to the same index', () => {
    for (const [range, pixels] of [[[0, 100], 37], [[13, 20], 640], [[5, 1005], 1000]] as const) {
      for (let index = range[0]; index < range[1]; index++) {
        expect(pixelToIndex(indexToPixel(index, [range[0], range[1]], pixels), [range[0], range[1]], pixels)).toBe(index);
      }
    }
  });

  it('clamps pixels outside the canvas to the edge index', () => {
    expect(pixelToIndex(-5, [10, 20], 100)).toBe(10);
    expect(pixelToIndex(100, [10, 20], 100)).toBe(19);
  });
});
