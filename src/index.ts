export {
  ConfigError,
  FormatError,
  IntegrityError,
  NetworkError,
  StorageError,
  UnsupportedDownloadError,
  describeError,
  isAbortError,
} from './services/errors';
export type { FormatErrorReason } from './services/errors';

// Index & locator
export { MemoryGeometryIndex, loadGeometryIndex, parseChecksum, segmentsFromGeoJSON } from './services/index/geometryIndex';
export type {
  AuthClass,
  Availability,
  Checksum,
  DownloadMethod,
  GeometryIndex,
  IndexCrs,
  Position,
  RemoteResource,
  SegmentRecord,
} from './services/index/types';
export { DEFAULT_MAX_CANDIDATES, locate } from './services/locator/segmentLocator';
export type { Candidate, LocateOptions } from './services/locator/segmentLocator';
export { SUPPORTED_DOWNLOAD_METHODS, SUPPORTED_FORMATS, planSelection } from './services/selection';
export type { SelectionIntent, SelectionPlan } from './services/selection';

// Stores
export { createSegmentStore, getAvailability, refreshLocalAvailability } from './stores/segmentStore';
export type { SegmentAvailabilityState, SegmentStore } from './stores/segmentStore';
export { createTransferStore } from './stores/transferStore';
export type { TransferStore, TransferTableState } from './stores/transferStore';
export {
  DEFAULT_MAX_CONCURRENT_DOWNLOADS,
  createConfigStore,
  fileStateStorage,
  parseConfig,
  rootDirIsValid,
  toDownloadConfig,
} from './stores/configStore';
export type { ConfigState, ConfigStore, UserConfig } from './stores/configStore';

// Downloads
export { DownloadManager } from './services/download/downloadManager';
export type { CancelOptions, TransferHandle } from './services/download/downloadManager';
export { PARTIAL_META_SUFFIX, PARTIAL_SUFFIX, transferPaths } from './services/download/fileLayout';
export type {
  ArchiveCredentials,
  DownloadConfig,
  FetchLike,
  Transfer,
  TransferEvent,
  TransferListener,
  TransferProgress,
  TransferState,
} from './services/download/types';

// Radargrams
export {
  DEFAULT_MAX_TILES,
  DEFAULT_TILE_TRACES,
  DEFAULT_WHOLE_FILE_THRESHOLD,
  INTENSITY_SAMPLE_TILES,
  isDataFormat,
  openRadargram,
} from './services/radargram/radargramStore';
export type {
  DataFormat,
  IndexRange,
  IntensityRange,
  OpenRadargramOptions,
  RadarWindow,
  RadargramStore,
  TraceGeolocation,
} from './services/radargram/radargramStore';
export { NETCDF_FORMATS, isNetcdfFormat } from './services/radargram/netcdf';
export type { NetcdfFormat } from './services/radargram/netcdf';
export { encodeRadargram, writeRadargramFile } from './services/radargram/format';
export type { RadargramContent, RadargramMetadata, SampleType, TraceLocation } from './services/radargram/format';

// Viewer
export { ViewerSession, createViewerSession } from './services/viewer/viewerSession';
export type {
  CursorPosition,
  TraceDisplay,
  TraceProfile,
  ViewerSessionOptions,
  ViewerState,
  ViewerTicks,
} from './services/viewer/viewerSession';
export { DEFAULT_OVERLAP_FRACTION } from './services/viewer/viewport';
export type { CanvasSize, Extent, PixelRect, StepDirection, Viewport } from './services/viewer/viewport';
export { COLORMAP_NAMES, COLORMAPS, isColormapName } from './services/viewer/colormaps';
export type { ColorStop, ColormapName } from './services/viewer/colormaps';
export type { Appearance, RenderedImage } from './services/viewer/renderLogic';
export type { OverlayFeature, OverlayKind, OverlayProperties } from './services/viewer/overlay';
export type { AxisTick, CursorReading } from './services/viewer/axisLabels';
