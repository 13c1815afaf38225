import { InvalidFrameError, ScanError } from '../exceptions.js';
import type { ScanStage } from '../exceptions.js';
import { normalizeOrientation } from '../image/orientation.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type { ImageBuffer, NormalizedRegion, ScanResult } from '../models/index.js';
import type { Frame } from '../ports/frame.js';
import type { RecognitionInvoker } from '../recognition/recognition-invoker.js';
import { assembleText } from '../result/result-assembler.js';
import { adaptFrame } from './frame-adapter.js';

export type FrameScanState = 'idle' | 'validating' | 'adapting' | 'recognizing' | 'done' | 'failed';

export interface FrameScanOptions {
  readonly digitsOnly?: boolean;
  /** Region of interest, normalized to the upright frame */
  readonly region?: NormalizedRegion;
}

export interface FrameScannerOptions {
  readonly logger?: Logger;
  readonly onStateChange?: (state: FrameScanState) => void;
}

/**
 * One live-frame scan: Idle -> Validating -> Adapting -> Recognizing -> Done/Failed.
 * No file I/O and no debug artifact. Create one per frame.
 */
export class FrameScanner {
  private current: FrameScanState = 'idle';
  private readonly log: Logger;

  constructor(
    private readonly invoker: RecognitionInvoker,
    private readonly options: FrameScannerOptions = {},
  ) {
    this.log = options.logger ?? createLogger('Frame');
  }

  get state(): FrameScanState {
    return this.current;
  }

  async scan(frame: Frame, scanOptions: FrameScanOptions = {}): Promise<ScanResult> {
    if (this.current !== 'idle') {
      throw new Error(`FrameScanner already used (state: ${this.current})`);
    }
    const digitsOnly = scanOptions.digitsOnly ?? false;

    this.transition('validating');
    if (!frame.isValid) {
      throw this.fail('validate', new InvalidFrameError());
    }

    this.transition('adapting');
    let image: ImageBuffer;
    try {
      image = normalizeOrientation(adaptFrame(frame));
    } catch (error) {
      throw this.fail('adapt', error);
    }

    this.transition('recognizing');
    let text: string;
    try {
      const lines = await this.invoker.recognize(image, scanOptions.region, digitsOnly);
      text = assembleText(lines, scanOptions.region, this.invoker.supportsRegionHint, digitsOnly);
    } catch (error) {
      throw this.fail('recognize', error);
    }

    this.transition('done');
    return { text };
  }

  private transition(next: FrameScanState): void {
    this.current = next;
    this.options.onStateChange?.(next);
  }

  private fail(stage: ScanStage, cause: unknown): ScanError {
    this.transition('failed');
    const error = new ScanError(stage, cause);
    this.log.error(error.message);
    return error;
  }
}
