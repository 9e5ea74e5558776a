import type { IndexRange, RadargramStore } from '../radargram/radargramStore';
import { indexToPixel } from './viewport';

export interface AxisTick {
  /** Pixel offset along the axis */
  pixel: number;
  index: number;
  label: string;
}

export interface CursorReading {
  traceIndex: number;
  sampleIndex: number;
  amplitude: number;
  fastTimeUs: number;
}

function clampIndex(index: number, count: number): number {
  return Math.min(Math.max(0, Math.round(index)), count - 1);
}

/** X-axis label: cumulative along-track distance of the nearest trace. */
export function alongTrackLabel(radargram: RadargramStore, trace: number): string {
  const { alongTrackM } = radargram.traceGeolocation(clampIndex(trace, radargram.traceCount));
  return `${(alongTrackM / 1000).toFixed(1)} km`;
}

/** Y-axis label: two-way travel time of the nearest sample. */
export function fastTimeLabel(radargram: RadargramStore, sample: number): string {
  return `${radargram.fastTime(clampIndex(sample, radargram.sampleCount)).toFixed(1)} µs`;
}

/** Evenly spaced index positions across a range, ends included. */
export function tickIndices([start, end]: IndexRange, count: number): number[] {
  const last = end - 1;
  if (count < 2 || last === start) return [start];
  const ticks: number[] = [];
  for (let i = 0; i < count; i++) {
    const index = Math.round(start + ((last - start) * i) / (count - 1));
    if (ticks[ticks.length - 1] !== index) ticks.push(index);
  }
  return ticks;
}

export function traceTicks(radargram: RadargramStore, range: IndexRange, pixels: number, count = 5): AxisTick[] {
  return tickIndices(range, count).map((index) => ({
    pixel: indexToPixel(index, range, pixels),
    index,
    label: alongTrackLabel(radargram, index),
  }));
}

export function sampleTicks(radargram: RadargramStore, range: IndexRange, pixels: number, count = 5): AxisTick[] {
  return tickIndices(range, count).map((index) => ({
    pixel: indexToPixel(index, range, pixels),
    index,
    label: fastTimeLabel(radargram, index),
  }));
}

/** Fixed-width status line under the radargram. */
export function formatCursorReadout(reading: CursorReading): string {
  const tr = String(reading.traceIndex).padStart(5);
  const sa = String(reading.sampleIndex).padStart(4);
  const twtt = reading.fastTimeUs.toFixed(2).padStart(5);
  return `tr: ${tr}, sa: ${sa}, a: ${reading.amplitude.toFixed(2)}, twtt: ${twtt}µs`;
}
