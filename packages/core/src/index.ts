export * from './models/index.js';

export type {
  ArtifactStorePort,
  EncodedFormat,
  Frame,
  FrameOrientation,
  FramePixelFormat,
  ImageCodecPort,
  RecognitionEnginePort,
  RecognitionQuality,
  RecognitionRequest,
} from './ports/index.js';

export {
  CropFailureError,
  EncodingFailureError,
  ImageLoadError,
  InvalidFrameError,
  InvalidInputError,
  InvalidRegionError,
  NotImplementedError,
  RecognitionFailureError,
  ScanError,
} from './exceptions.js';
export type { ScanStage } from './exceptions.js';

export { createLogger, silentLogger } from './logger.js';
export type { Logger, Namespace } from './logger.js';

export { DEFAULT_SCAN_CONFIG, resolveScanConfig, resolveScanOptions } from './config.js';
export type { DebugImagePolicy, ScanConfig } from './config.js';

export {
  intersects,
  mapRegion,
  roundHalfAwayFromZero,
  toNormalizedRegion,
  validateNormalizedRegion,
} from './region/region-mapper.js';

export { normalizeOrientation, swapsAxes, uprightSize } from './image/orientation.js';
export {
  contrastParameters,
  contrastStage,
  cropStage,
  enhance,
  sharpenStage,
  toneCurveStage,
  unsharpMaskStage,
  upscaleStage,
  upscaledSize,
} from './image/enhancer.js';
export type { ContrastParameters } from './image/enhancer.js';
export { applyLookupTable, buildToneCurve } from './image/tone-curve.js';
export { SharpImageCodec } from './image/sharp-image-codec.js';

export { RecognitionInvoker } from './recognition/recognition-invoker.js';
export type { RecognitionInvokerOptions } from './recognition/recognition-invoker.js';
export { fromBottomLeftBox, fromPixelBox, isFiniteBox } from './recognition/coordinates.js';
export type { PixelBox } from './recognition/coordinates.js';

export { assembleResult, assembleText, orderLines } from './result/result-assembler.js';
export type { AssembleDeps, AssembleInput } from './result/result-assembler.js';
export { filterDigits } from './result/digits.js';
export { formatScanOutput, parseScanOutput } from './result/scan-output.js';
export type { FormatOptions, ScanOutputPayload } from './result/scan-output.js';

export { adaptFrame, frameOrientation } from './frame/frame-adapter.js';
export { FrameScanner } from './frame/frame-scanner.js';
export type { FrameScanOptions, FrameScanState, FrameScannerOptions } from './frame/frame-scanner.js';

export { TempFileArtifactStore } from './artifacts/temp-file-artifact-store.js';
export { stripFileScheme } from './paths.js';

export { RegionScanService } from './region-scan-service.js';
export { createRegionScanService, scanFrame, scanImage, scanImageWithRegion } from './api.js';
