import type { IndexRange, RadarWindow } from '../radargram/radargramStore';
import { COLORMAPS, valueToRGBA, type ColormapName } from './colormaps';
import { pixelToIndex, rangeWidth } from './viewport';

export interface Appearance {
  colormap: ColormapName;
  /** Intensity drawn with the colormap's first stop */
  intensityMin: number;
  /** Intensity drawn with the colormap's last stop */
  intensityMax: number;
}

/** RGBA image, row-major, 4 bytes per pixel. Same layout as canvas ImageData. */
export interface RenderedImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export function createImage(width: number, height: number): RenderedImage {
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/**
 * Index drawn in each pixel column (or row): the one under the pixel centre.
 * With more indices than pixels this skips indices rather than averaging them.
 */
export function pixelIndices(range: IndexRange, pixels: number): Int32Array {
  const out = new Int32Array(pixels);
  for (let p = 0; p < pixels; p++) out[p] = pixelToIndex(p + 0.5, range, pixels);
  return out;
}

/** Traces skipped per drawn column; 1 when every trace gets at least a column. */
export function decimationFactor(range: IndexRange, pixels: number): number {
  return Math.max(1, Math.ceil(rangeWidth(range) / pixels));
}

export function checkAppearance(appearance: Appearance): void {
  if (!(appearance.colormap in COLORMAPS)) {
    throw new RangeError(`Unknown colormap ${appearance.colormap}`);
  }
  const { intensityMin: min, intensityMax: max } = appearance;
  if (!Number.isFinite(min) || !Number.isFinite(max) || !(min < max)) {
    throw new RangeError(`Intensity bounds must be finite with min < max, got [${min}, ${max}]`);
  }
}

/**
 * Paint the columns of `image` whose trace falls inside `window`.
 * NaN samples stay transparent.
 */
export function paintWindow(
  image: RenderedImage,
  window: RadarWindow,
  columns: Int32Array,
  rows: Int32Array,
  appearance: Appearance,
): void {
  const colorTable = COLORMAPS[appearance.colormap];
  const { intensityMin: min, intensityMax: max } = appearance;
  const scale = 1 / (max - min);
  const [t0, t1] = window.traces;
  const [s0] = window.samples;
  const pixels = image.data;

  for (let x = 0; x < columns.length; x++) {
    const trace = columns[x];
    if (trace < t0 || trace >= t1) continue;
    const rowBase = (trace - t0) * window.width - s0;

    for (let y = 0; y < rows.length; y++) {
      const rgba = valueToRGBA((window.data[rowBase + rows[y]] - min) * scale, colorTable);
      if (!rgba) continue;

      const off = (y * image.width + x) * 4;
      pixels[off]     = rgba[0] + 0.5 | 0; // fast round for positive values
      pixels[off + 1] = rgba[1] + 0.5 | 0;
      pixels[off + 2] = rgba[2] + 0.5 | 0;
      pixels[off + 3] = (rgba[3] * 255 + 0.5) | 0;
    }
  }
}
