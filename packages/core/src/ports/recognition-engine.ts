import type { ImageBuffer, NormalizedRegion, RecognizedLine } from '../models/index.js';

export type RecognitionQuality = 'accurate' | 'fast';

export interface RecognitionRequest {
  readonly image: ImageBuffer;
  /** Area of `image` to prioritize; engines without region support ignore it */
  readonly regionHint?: NormalizedRegion;
  readonly digitsOnly: boolean;
  readonly quality: RecognitionQuality;
  /** Dictionary/language-model correction of recognized words */
  readonly languageCorrection: boolean;
}

export interface RecognitionEnginePort {
  /** Whether `regionHint` narrows the engine's search */
  readonly supportsRegionHint: boolean;
  /**
   * Recognize text lines. Boxes must be normalized to `image`, origin top-left.
   * Must be safe to call while other calls are in flight.
   */
  recognize(request: RecognitionRequest): Promise<RecognizedLine[]>;
  /** Release engine resources */
  terminate?(): Promise<void>;
}
