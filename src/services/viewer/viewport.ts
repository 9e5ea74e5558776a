import type { IndexRange } from '../radargram/radargramStore';

/**
 * Viewport math. Every function here is pure and returns a viewport with
 * `0 ≤ start < end ≤ count` on both axes.
 *
 * Pixel coordinates are canvas pixels with (0, 0) at the top left; x maps to
 * traces and y maps to samples (fast time grows downward).
 */

export interface Viewport {
  traces: IndexRange;
  samples: IndexRange;
}

export interface Extent {
  traceCount: number;
  sampleCount: number;
}

export interface CanvasSize {
  width: number;
  height: number;
}

/** Rectangle in canvas pixels, as dragged: corners in any order. */
export interface PixelRect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export type StepDirection = 'prev' | 'next';

export const DEFAULT_OVERLAP_FRACTION = 0.1;

export function rangeWidth([start, end]: IndexRange): number {
  return end - start;
}

export function fullViewport(extent: Extent): Viewport {
  return { traces: [0, extent.traceCount], samples: [0, extent.sampleCount] };
}

/**
 * Fit `[start, start + width)` into `[0, count)`: shifted inward when it
 * overhangs an edge, cropped when it is wider than `count`.
 */
export function clampRange(start: number, width: number, count: number): IndexRange {
  const w = Math.min(Math.max(1, Math.round(width)), count);
  const s = Math.min(Math.max(0, Math.round(start)), count - w);
  return [s, s + w];
}

function assertFinite(what: string, values: number[]): void {
  if (!values.every((v) => Number.isFinite(v))) {
    throw new RangeError(`${what} must be finite, got (${values.join(', ')})`);
  }
}

/** Fractional index under a pixel along one axis. */
function indexAt(pixel: number, range: IndexRange, pixels: number): number {
  return range[0] + (pixel * rangeWidth(range)) / pixels;
}

/** Index range covered by two pixel positions, intersected with `[0, count)`. */
function coveredRange(p0: number, p1: number, range: IndexRange, pixels: number, count: number): IndexRange {
  const a = indexAt(Math.min(p0, p1), range, pixels);
  const b = indexAt(Math.max(p0, p1), range, pixels);
  const start = Math.min(Math.max(0, Math.floor(a)), count - 1);
  const end = Math.max(start + 1, Math.min(count, Math.ceil(b)));
  return [start, end];
}

/** Zoom to the dragged box, at least one trace by one sample. */
export function zoomIn(viewport: Viewport, extent: Extent, canvas: CanvasSize, rect: PixelRect): Viewport {
  assertFinite('Zoom box', [rect.x0, rect.y0, rect.x1, rect.y1]);
  return {
    traces: coveredRange(rect.x0, rect.x1, viewport.traces, canvas.width, extent.traceCount),
    samples: coveredRange(rect.y0, rect.y1, viewport.samples, canvas.height, extent.sampleCount),
  };
}

function expandAboutCentre(range: IndexRange, factor: number, count: number): IndexRange {
  const width = rangeWidth(range) * factor;
  const centre = (range[0] + range[1]) / 2;
  return clampRange(centre - width / 2, width, count);
}

/** Expand symmetrically about the centre by `factor` (≥ 1) on both axes. */
export function zoomOut(viewport: Viewport, extent: Extent, factor: number): Viewport {
  if (!Number.isFinite(factor) || factor < 1) {
    throw new RangeError(`Zoom-out factor must be at least 1, got ${factor}`);
  }
  return {
    traces: expandAboutCentre(viewport.traces, factor, extent.traceCount),
    samples: expandAboutCentre(viewport.samples, factor, extent.sampleCount),
  };
}

/**
 * Zoom out so the current view would fit into the dragged box. A box with no
 * width or height leaves the viewport unchanged.
 */
export function zoomOutToRect(viewport: Viewport, extent: Extent, canvas: CanvasSize, rect: PixelRect): Viewport {
  assertFinite('Zoom box', [rect.x0, rect.y0, rect.x1, rect.y1]);
  const boxWidth = Math.abs(rect.x1 - rect.x0);
  const boxHeight = Math.abs(rect.y1 - rect.y0);
  if (boxWidth === 0 || boxHeight === 0) return viewport;
  return {
    traces: expandAboutCentre(viewport.traces, Math.max(1, canvas.width / boxWidth), extent.traceCount),
    samples: expandAboutCentre(viewport.samples, Math.max(1, canvas.height / boxHeight), extent.sampleCount),
  };
}

/**
 * Drag-to-pan: content follows the pointer, so dragging right by `dxPx`
 * moves the view towards earlier traces. Size is preserved.
 */
export function pan(viewport: Viewport, extent: Extent, canvas: CanvasSize, dxPx: number, dyPx: number): Viewport {
  assertFinite('Pan offset', [dxPx, dyPx]);
  const tw = rangeWidth(viewport.traces);
  const sw = rangeWidth(viewport.samples);
  const dt = Math.round((dxPx * tw) / canvas.width);
  const ds = Math.round((dyPx * sw) / canvas.height);
  return {
    traces: clampRange(viewport.traces[0] - dt, tw, extent.traceCount),
    samples: clampRange(viewport.samples[0] - ds, sw, extent.sampleCount),
  };
}

/** Traces a step moves by: the width less the overlap, never zero. */
export function stepShift(width: number, overlapFraction: number): number {
  return Math.max(1, Math.floor((1 - overlapFraction) * width));
}

/**
 * Move the trace range one screen along the transect, keeping
 * `overlapFraction` of the previous view in the new one. Stops at the edges.
 */
export function step(
  viewport: Viewport,
  extent: Extent,
  direction: StepDirection,
  overlapFraction = DEFAULT_OVERLAP_FRACTION,
): Viewport {
  if (!(overlapFraction >= 0 && overlapFraction < 1)) {
    throw new RangeError(`Overlap fraction must be in [0, 1), got ${overlapFraction}`);
  }
  const width = rangeWidth(viewport.traces);
  const shift = stepShift(width, overlapFraction);
  const start = direction === 'next' ? viewport.traces[0] + shift : viewport.traces[0] - shift;
  return { ...viewport, traces: clampRange(start, width, extent.traceCount) };
}

/**
 * Bring an arbitrary viewport back into bounds, e.g. one restored from
 * saved state for a different file.
 */
export function clampViewport(viewport: Viewport, extent: Extent): Viewport {
  const [t0, t1] = viewport.traces;
  const [s0, s1] = viewport.samples;
  assertFinite('Viewport', [t0, t1, s0, s1]);
  return {
    traces: clampRange(Math.min(t0, t1), Math.abs(t1 - t0), extent.traceCount),
    samples: clampRange(Math.min(s0, s1), Math.abs(s1 - s0), extent.sampleCount),
  };
}

/**
 * Index under a pixel, floored and clamped into the viewport so that every
 * pixel maps to a trace/sample currently on screen.
 */
export function pixelToIndex(pixel: number, range: IndexRange, pixels: number): number {
  const index = Math.floor(indexAt(pixel, range, pixels));
  return Math.min(Math.max(range[0], index), range[1] - 1);
}

/** Pixel at the centre of `index`'s column (or row). */
export function indexToPixel(index: number, range: IndexRange, pixels: number): number {
  return ((index - range[0] + 0.5) * pixels) / rangeWidth(range);
}
