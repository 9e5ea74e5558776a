/**
 * Colormaps for radargram display.
 *
 * Stop values are normalized to [0, 1]: 0 maps to the lower intensity bound,
 * 1 to the upper. Colors are linearly interpolated between stops.
 */

export interface ColorStop {
  value: number;
  r: number;
  g: number;
  b: number;
  a: number;
}

export type ColormapName = 'gray' | 'Greys' | 'jet' | 'viridis' | 'inferno' | 'seismic';

export const COLORMAPS: Record<ColormapName, ColorStop[]> = {
  // Low returns dark, strong returns bright
  gray: [
    { value: 0, r: 0, g: 0, b: 0, a: 1 },
    { value: 1, r: 255, g: 255, b: 255, a: 1 },
  ],
  // Inverted gray
  Greys: [
    { value: 0, r: 255, g: 255, b: 255, a: 1 },
    { value: 1, r: 0, g: 0, b: 0, a: 1 },
  ],
  jet: [
    { value: 0, r: 0, g: 0, b: 128, a: 1 },
    { value: 0.125, r: 0, g: 0, b: 255, a: 1 },
    { value: 0.375, r: 0, g: 255, b: 255, a: 1 },
    { value: 0.625, r: 255, g: 255, b: 0, a: 1 },
    { value: 0.875, r: 255, g: 0, b: 0, a: 1 },
    { value: 1, r: 128, g: 0, b: 0, a: 1 },
  ],
  viridis: [
    { value: 0, r: 68, g: 1, b: 84, a: 1 },
    { value: 0.25, r: 59, g: 82, b: 139, a: 1 },
    { value: 0.5, r: 33, g: 145, b: 140, a: 1 },
    { value: 0.75, r: 94, g: 201, b: 98, a: 1 },
    { value: 1, r: 253, g: 231, b: 37, a: 1 },
  ],
  inferno: [
    { value: 0, r: 0, g: 0, b: 4, a: 1 },
    { value: 0.25, r: 87, g: 16, b: 110, a: 1 },
    { value: 0.5, r: 188, g: 55, b: 84, a: 1 },
    { value: 0.75, r: 249, g: 142, b: 9, a: 1 },
    { value: 1, r: 252, g: 255, b: 164, a: 1 },
  ],
  // Diverging: blue below the midpoint, red above
  seismic: [
    { value: 0, r: 0, g: 0, b: 77, a: 1 },
    { value: 0.25, r: 0, g: 0, b: 255, a: 1 },
    { value: 0.5, r: 255, g: 255, b: 255, a: 1 },
    { value: 0.75, r: 255, g: 0, b: 0, a: 1 },
    { value: 1, r: 128, g: 0, b: 0, a: 1 },
  ],
};

export const COLORMAP_NAMES = Object.keys(COLORMAPS).filter(isColormapName);

export function isColormapName(name: string): name is ColormapName {
  return name in COLORMAPS;
}

/**
 * Interpolated RGBA (alpha 0-1) for a normalized value. Values outside
 * [first stop, last stop] clamp to the end stops; NaN returns null.
 */
export function valueToRGBA(
  value: number,
  colorTable: ColorStop[],
): [number, number, number, number] | null {
  const len = colorTable.length;
  if (len === 0 || Number.isNaN(value)) return null;

  if (value <= colorTable[0].value) {
    const s = colorTable[0];
    return [s.r, s.g, s.b, s.a];
  }
  if (value >= colorTable[len - 1].value) {
    const s = colorTable[len - 1];
    return [s.r, s.g, s.b, s.a];
  }

  // Binary search: find largest i where colorTable[i].value <= value
  let lo = 0;
  let hi = len - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (colorTable[mid].value <= value) lo = mid;
    else hi = mid - 1;
  }

  const a = colorTable[lo];
  const b = colorTable[lo + 1];
  const range = b.value - a.value;
  if (range <= 0) return [a.r, a.g, a.b, a.a];

  const t = (value - a.value) / range;
  return [
    a.r + (b.r - a.r) * t,
    a.g + (b.g - a.g) * t,
    a.b + (b.b - a.b) * t,
    a.a + (b.a - a.a) * t,
  ];
}
