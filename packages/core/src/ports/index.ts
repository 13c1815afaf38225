export type { ArtifactStorePort } from './artifact-store.js';
export type { Frame, FrameOrientation, FramePixelFormat } from './frame.js';
export type { EncodedFormat, ImageCodecPort } from './image-codec.js';
export type {
  RecognitionEnginePort,
  RecognitionQuality,
  RecognitionRequest,
} from './recognition-engine.js';
