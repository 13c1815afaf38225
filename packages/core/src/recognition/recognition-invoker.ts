import { RecognitionFailureError } from '../exceptions.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type { ImageBuffer, NormalizedRegion, RecognizedLine } from '../models/index.js';
import type {
  RecognitionEnginePort,
  RecognitionQuality,
  RecognitionRequest,
} from '../ports/recognition-engine.js';
import { isFiniteBox } from './coordinates.js';
import { withTimeout } from './timeout.js';

export interface RecognitionInvokerOptions {
  readonly timeoutMs: number;
  readonly quality: RecognitionQuality;
  readonly logger?: Logger;
}

export class RecognitionInvoker {
  private readonly log: Logger;

  constructor(
    private readonly engine: RecognitionEnginePort,
    private readonly options: RecognitionInvokerOptions,
  ) {
    this.log = options.logger ?? createLogger('Recognize');
  }

  get supportsRegionHint(): boolean {
    return this.engine.supportsRegionHint;
  }

  async recognize(
    image: ImageBuffer,
    regionHint: NormalizedRegion | undefined,
    digitsOnly: boolean,
  ): Promise<RecognizedLine[]> {
    const request: RecognitionRequest = {
      image,
      regionHint,
      digitsOnly,
      quality: this.options.quality,
      // Dictionary correction turns "O"/"l" into letters; digits want the literal reading.
      languageCorrection: !digitsOnly,
    };

    let lines: RecognizedLine[];
    try {
      lines = await withTimeout(this.engine.recognize(request), this.options.timeoutMs);
    } catch (error) {
      if (error instanceof RecognitionFailureError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new RecognitionFailureError(`Recognition engine failed: ${message}`, error);
    }

    const usable = lines.filter((line) => line.text.trim().length > 0 && isFiniteBox(line.boundingBox));
    this.log.info(`Recognized ${usable.length} line(s) on ${image.width}x${image.height}`);
    return usable;
  }
}
