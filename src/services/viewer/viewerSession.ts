import { createStore, type StoreApi } from 'zustand/vanilla';
import type { IntensityRange, RadargramStore } from '../radargram/radargramStore';
import { formatCursorReadout, sampleTicks, traceTicks, type AxisTick } from './axisLabels';
import {
  boundsFeature,
  cursorFeature,
  rangeBounds,
  trackFeature,
  trackPositions,
  type OverlayFeature,
} from './overlay';
import {
  checkAppearance,
  createImage,
  decimationFactor,
  paintWindow,
  pixelIndices,
  type Appearance,
  type RenderedImage,
} from './renderLogic';
import {
  DEFAULT_OVERLAP_FRACTION,
  clampViewport,
  fullViewport,
  pan,
  pixelToIndex,
  step,
  zoomIn,
  zoomOut,
  zoomOutToRect,
  type CanvasSize,
  type Extent,
  type PixelRect,
  type StepDirection,
  type Viewport,
} from './viewport';

export interface CursorPosition {
  traceIndex: number;
  sampleIndex: number;
  lat: number;
  lon: number;
  alongTrackM: number;
  fastTimeUs: number;
}

export interface ViewerState {
  viewport: Viewport;
  appearance: Appearance;
  canvas: CanvasSize;
  /** Last position under the pointer; null until the pointer enters the canvas */
  cursor: CursorPosition | null;
  /** While frozen the cursor (and the map crosshair) stays put */
  crosshairFrozen: boolean;
  trace: TraceDisplay;
}

/** Single-trace amplitude plot beside the radargram. */
export interface TraceDisplay {
  visible: boolean;
  /** While frozen the displayed trace ignores the cursor */
  frozen: boolean;
  /** Trace being plotted; null until the cursor has picked one */
  traceIndex: number | null;
}

export interface TraceProfile {
  traceIndex: number;
  /** One amplitude per sample */
  values: Float32Array;
  fastTimeUs: Float64Array;
}

export interface ViewerSessionOptions {
  canvas: CanvasSize;
  /** Segment id carried on overlay features; defaults to the file's metadata */
  segmentId?: string;
  /** Missing intensity bounds are estimated from the data */
  appearance?: Partial<Appearance>;
  overlapFraction?: number;
  /** Initial view; clamped into the file. Defaults to the full extent. */
  viewport?: Viewport;
}

export interface ViewerTicks {
  x: AxisTick[];
  y: AxisTick[];
}

/** Traces read per request while rendering; bounds memory for wide views. */
const RENDER_STRIP_TRACES = 256;

function checkCanvas(canvas: CanvasSize): void {
  if (!Number.isInteger(canvas.width) || !Number.isInteger(canvas.height) || canvas.width < 1 || canvas.height < 1) {
    throw new RangeError(`Canvas size must be positive integers, got ${canvas.width}×${canvas.height}`);
  }
}

/**
 * One open radargram view. Holds the viewport, appearance and cursor in a
 * zustand store so hosts can subscribe; all reads go through the
 * RadargramStore and nothing here writes files or touches the network.
 */
export class ViewerSession {
  readonly state: StoreApi<ViewerState>;
  private store: RadargramStore;
  private bounds: Extent;

  /**
   * @param autoIntensity - the intensity bounds came from an estimate, so
   *   refineIntensity() may replace them
   */
  constructor(
    radargram: RadargramStore,
    initial: ViewerState,
    readonly segmentId: string,
    readonly overlapFraction = DEFAULT_OVERLAP_FRACTION,
    private autoIntensity = false,
  ) {
    if (!(overlapFraction >= 0 && overlapFraction < 1)) {
      throw new RangeError(`Overlap fraction must be in [0, 1), got ${overlapFraction}`);
    }
    checkCanvas(initial.canvas);
    checkAppearance(initial.appearance);
    this.store = radargram;
    this.bounds = { traceCount: radargram.traceCount, sampleCount: radargram.sampleCount };
    this.state = createStore<ViewerState>()(() => ({
      ...initial,
      viewport: clampViewport(initial.viewport, this.extent),
    }));
  }

  get radargram(): RadargramStore {
    return this.store;
  }

  get extent(): Extent {
    return this.bounds;
  }

  get viewport(): Viewport {
    return this.state.getState().viewport;
  }

  get appearance(): Appearance {
    return this.state.getState().appearance;
  }

  subscribe(listener: (state: ViewerState, previous: ViewerState) => void): () => void {
    return this.state.subscribe(listener);
  }

  // ── Viewport ───────────────────────────────────────────────────────

  zoomIn(rect: PixelRect): Viewport {
    const { viewport, canvas } = this.state.getState();
    return this.setViewport(zoomIn(viewport, this.extent, canvas, rect));
  }

  zoomOut(factor = 2): Viewport {
    return this.setViewport(zoomOut(this.viewport, this.extent, factor));
  }

  zoomOutToRect(rect: PixelRect): Viewport {
    const { viewport, canvas } = this.state.getState();
    return this.setViewport(zoomOutToRect(viewport, this.extent, canvas, rect));
  }

  pan(dxPx: number, dyPx: number): Viewport {
    const { viewport, canvas } = this.state.getState();
    return this.setViewport(pan(viewport, this.extent, canvas, dxPx, dyPx));
  }

  fullExtent(): Viewport {
    return this.setViewport(fullViewport(this.extent));
  }

  step(direction: StepDirection): Viewport {
    return this.setViewport(step(this.viewport, this.extent, direction, this.overlapFraction));
  }

  setViewport(viewport: Viewport): Viewport {
    const clamped = clampViewport(viewport, this.extent);
    this.state.setState({ viewport: clamped });
    return clamped;
  }

  setCanvasSize(canvas: CanvasSize): void {
    checkCanvas(canvas);
    this.state.setState({ canvas });
  }

  // ── Appearance ─────────────────────────────────────────────────────

  /** Change colormap and/or intensity bounds. The viewport is untouched. */
  setAppearance(changes: Partial<Appearance>): Appearance {
    const appearance = { ...this.appearance, ...changes };
    checkAppearance(appearance);
    if (changes.intensityMin !== undefined || changes.intensityMax !== undefined) this.autoIntensity = false;
    this.state.setState({ appearance });
    return appearance;
  }

  /**
   * Replace estimated intensity bounds with the exact range over the whole
   * file. Bounds the user has set are kept.
   */
  async refineIntensity(): Promise<Appearance> {
    const store = this.store;
    const range = await store.intensityRange();
    if (!this.autoIntensity || store !== this.store) return this.appearance;
    const appearance = { ...this.appearance, intensityMin: range.min, intensityMax: range.max };
    this.state.setState({ appearance });
    return appearance;
  }

  // ── Products ───────────────────────────────────────────────────────

  get product(): string {
    return this.store.product;
  }

  get availableProducts(): readonly string[] {
    return this.store.availableProducts;
  }

  /**
   * Show another product of the same file. The view returns to the full
   * extent and intensity bounds are re-estimated; colormap and canvas stay.
   */
  async setProduct(product: string): Promise<void> {
    if (product === this.store.product) return;
    const next = await this.store.withProduct(product);
    let estimate: IntensityRange;
    try {
      estimate = await next.estimateIntensityRange();
    } catch (err) {
      await next.close();
      throw err;
    }

    const previous = this.store;
    this.store = next;
    this.bounds = { traceCount: next.traceCount, sampleCount: next.sampleCount };
    this.autoIntensity = true;
    const { appearance, trace } = this.state.getState();
    this.state.setState({
      viewport: fullViewport(this.bounds),
      appearance: { ...appearance, intensityMin: estimate.min, intensityMax: estimate.max },
      cursor: null,
      trace: { ...trace, traceIndex: null },
    });
    console.info(`[Radargram] ${next.path}: showing ${product}`);
    await previous.close();
  }

  // ── Cursor ─────────────────────────────────────────────────────────

  /**
   * Trace and sample under a canvas pixel, with the trace's geolocation.
   * Pixels outside the canvas clamp to the nearest edge trace/sample.
   * Updates the session cursor unless the crosshair is frozen.
   */
  cursorToGeolocation(x: number, y = 0): CursorPosition {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new RangeError(`Cursor position must be finite, got (${x}, ${y})`);
    }
    const { viewport, canvas, crosshairFrozen, trace } = this.state.getState();
    const traceIndex = pixelToIndex(x, viewport.traces, canvas.width);
    const sampleIndex = pixelToIndex(y, viewport.samples, canvas.height);
    const geo = this.radargram.traceGeolocation(traceIndex);
    const cursor: CursorPosition = {
      traceIndex,
      sampleIndex,
      lat: geo.lat,
      lon: geo.lon,
      alongTrackM: geo.alongTrackM,
      fastTimeUs: this.radargram.fastTime(sampleIndex),
    };
    if (!crosshairFrozen) this.state.setState({ cursor });
    if (trace.visible && !trace.frozen) this.state.setState({ trace: { ...trace, traceIndex } });
    return cursor;
  }

  setCrosshairFrozen(frozen: boolean): void {
    this.state.setState({ crosshairFrozen: frozen });
  }

  // ── Trace profile ──────────────────────────────────────────────────

  /** Showing the profile always starts it unfrozen. */
  setTraceVisible(visible: boolean): void {
    const { trace } = this.state.getState();
    this.state.setState({ trace: { ...trace, visible, frozen: false } });
  }

  /** Ignored while the profile is hidden. */
  setTraceFrozen(frozen: boolean): void {
    const { trace } = this.state.getState();
    if (!trace.visible) return;
    this.state.setState({ trace: { ...trace, frozen } });
  }

  /**
   * Move a frozen profile one drawn column left (-1) or right (1), that is
   * by as many traces as one pixel column spans. Returns the new trace.
   */
  stepTrace(direction: -1 | 1): number | null {
    const { trace, viewport, canvas } = this.state.getState();
    if (!trace.visible || !trace.frozen || trace.traceIndex === null) return trace.traceIndex;
    const skip = decimationFactor(viewport.traces, canvas.width);
    const traceIndex = Math.min(this.bounds.traceCount - 1, Math.max(0, trace.traceIndex + direction * skip));
    this.state.setState({ trace: { ...trace, traceIndex } });
    return traceIndex;
  }

  /**
   * Amplitude along the displayed trace. A `traceIndex` moves the display
   * there unless it is frozen. Null while the profile is hidden or before
   * any trace has been chosen.
   */
  async traceProfile(traceIndex?: number): Promise<TraceProfile | null> {
    const { trace } = this.state.getState();
    if (!trace.visible) return null;
    if (traceIndex !== undefined && !trace.frozen) {
      if (!Number.isInteger(traceIndex) || traceIndex < 0 || traceIndex >= this.bounds.traceCount) {
        throw new RangeError(`trace index ${traceIndex} out of range [0, ${this.bounds.traceCount})`);
      }
      this.state.setState({ trace: { ...trace, traceIndex } });
    }

    const shown = this.state.getState().trace.traceIndex;
    if (shown === null) return null;
    const store = this.store;
    const window = await store.readWindow([shown, shown + 1], [0, store.sampleCount]);
    const fastTimeUs = new Float64Array(store.sampleCount);
    for (let s = 0; s < fastTimeUs.length; s++) fastTimeUs[s] = store.fastTime(s);
    return { traceIndex: shown, values: window.data, fastTimeUs };
  }

  /** Status line for the current cursor, or null before the pointer has moved. */
  async readout(): Promise<string | null> {
    const { cursor } = this.state.getState();
    if (!cursor) return null;
    const { traceIndex, sampleIndex } = cursor;
    const window = await this.radargram.readWindow([traceIndex, traceIndex + 1], [sampleIndex, sampleIndex + 1]);
    return formatCursorReadout({
      traceIndex,
      sampleIndex,
      amplitude: window.data[0],
      fastTimeUs: cursor.fastTimeUs,
    });
  }

  // ── Rendering ──────────────────────────────────────────────────────

  /**
   * Render the current viewport at canvas size. Wide views are decimated to
   * one trace per pixel column and read in strips, so memory follows the
   * canvas rather than the viewport.
   */
  async render(): Promise<RenderedImage> {
    const { viewport, canvas, appearance } = this.state.getState();
    const columns = pixelIndices(viewport.traces, canvas.width);
    const rows = pixelIndices(viewport.samples, canvas.height);
    const image = createImage(canvas.width, canvas.height);

    let x = 0;
    while (x < columns.length) {
      const stripStart = columns[x];
      const stripLimit = stripStart + RENDER_STRIP_TRACES;
      let last = x;
      while (last + 1 < columns.length && columns[last + 1] < stripLimit) last++;

      const window = await this.radargram.readWindow([stripStart, columns[last] + 1], viewport.samples);
      paintWindow(image, window, columns, rows, appearance);
      x = last + 1;
    }
    return image;
  }

  ticks(count = 5): ViewerTicks {
    const { viewport, canvas } = this.state.getState();
    return {
      x: traceTicks(this.radargram, viewport.traces, canvas.width, count),
      y: sampleTicks(this.radargram, viewport.samples, canvas.height, count),
    };
  }

  // ── Host map ───────────────────────────────────────────────────────

  /** Features for the host map: cursor, on-screen track, view and full bounds. */
  overlay(): GeoJSON.FeatureCollection<OverlayFeature['geometry'], OverlayFeature['properties']> {
    const { viewport, cursor } = this.state.getState();
    const geolocations = this.radargram.geolocations();
    const features: OverlayFeature[] = [];

    if (cursor) {
      features.push(cursorFeature(this.segmentId, cursor.traceIndex, this.radargram.traceGeolocation(cursor.traceIndex)));
    }
    features.push(trackFeature(this.segmentId, trackPositions(geolocations, viewport.traces)));

    const viewBounds = rangeBounds(geolocations, viewport.traces);
    if (viewBounds) features.push(boundsFeature(this.segmentId, 'viewport-bounds', viewBounds));
    const fullBounds = rangeBounds(geolocations, [0, this.extent.traceCount]);
    if (fullBounds) features.push(boundsFeature(this.segmentId, 'full-bounds', fullBounds));

    return { type: 'FeatureCollection', features };
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

/**
 * Open a viewer on a radargram. Intensity bounds not given in
 * `options.appearance` come from the store's sampled estimate; call
 * refineIntensity() afterwards for the exact range.
 */
export async function createViewerSession(
  radargram: RadargramStore,
  options: ViewerSessionOptions,
): Promise<ViewerSession> {
  const given = options.appearance ?? {};
  let { intensityMin, intensityMax } = given;
  const autoIntensity = intensityMin === undefined && intensityMax === undefined;
  if (intensityMin === undefined || intensityMax === undefined) {
    const estimate = await radargram.estimateIntensityRange();
    intensityMin ??= estimate.min;
    intensityMax ??= estimate.max;
  }

  return new ViewerSession(
    radargram,
    {
      viewport: options.viewport ?? fullViewport({ traceCount: radargram.traceCount, sampleCount: radargram.sampleCount }),
      appearance: { colormap: given.colormap ?? 'gray', intensityMin, intensityMax },
      canvas: options.canvas,
      cursor: null,
      crosshairFrozen: false,
      trace: { visible: false, frozen: false, traceIndex: null },
    },
    options.segmentId ?? (radargram.metadata.segment || radargram.path),
    options.overlapFraction,
    autoIntensity,
  );
}
