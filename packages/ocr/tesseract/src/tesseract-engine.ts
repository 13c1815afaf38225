import Tesseract, { type Worker } from 'tesseract.js';
import type {
  ImageCodecPort,
  RecognitionEnginePort,
  RecognitionQuality,
  RecognitionRequest,
  RecognizedLine,
} from '@region-ocr/core';
import { SharpImageCodec, fromPixelBox } from '@region-ocr/core';

export interface TesseractEngineConfig {
  lang: string;
  workerPath?: string;
  corePath?: string;
  langPath?: string;
  codec: ImageCodecPort;
}

const DIGIT_WHITELIST = '0123456789.,-';

type WorkerMode = 'text' | 'literal' | 'digits';

type WorkerKey = `${WorkerMode}:${RecognitionQuality}`;

export class TesseractEngine implements RecognitionEnginePort {
  readonly supportsRegionHint = true;

  private readonly workers = new Map<WorkerKey, Promise<Worker>>();
  private readonly config: TesseractEngineConfig;

  constructor(config: Partial<TesseractEngineConfig> = {}) {
    this.config = {
      lang: config.lang ?? 'eng',
      workerPath: config.workerPath,
      corePath: config.corePath,
      langPath: config.langPath,
      codec: config.codec ?? new SharpImageCodec(),
    };
  }

  async recognize(request: RecognitionRequest): Promise<RecognizedLine[]> {
    const { image, regionHint } = request;
    const worker = await this.getWorker(request);
    const png = await this.config.codec.encode(image, 'png');

    const rectangle = regionHint
      ? {
          left: Math.round(regionHint.x * image.width),
          top: Math.round(regionHint.y * image.height),
          width: Math.max(1, Math.round(regionHint.width * image.width)),
          height: Math.max(1, Math.round(regionHint.height * image.height)),
        }
      : undefined;

    const result = await worker.recognize(
      Buffer.from(png),
      rectangle ? { rectangle } : {},
      { text: true, blocks: true },
    );

    const lines = (result.data.blocks ?? [])
      .flatMap((block) => block.paragraphs)
      .flatMap((paragraph) => paragraph.lines);

    return lines.map((line) => ({
      text: line.text.trim(),
      confidence: line.confidence,
      boundingBox: fromPixelBox(
        {
          x: line.bbox.x0,
          y: line.bbox.y0,
          width: line.bbox.x1 - line.bbox.x0,
          height: line.bbox.y1 - line.bbox.y0,
        },
        image.width,
        image.height,
      ),
    }));
  }

  /**
   * Ends every worker that started. A worker whose creation failed has nothing
   * to release; that failure already rejected the recognize call waiting on it.
   */
  async terminate(): Promise<void> {
    const pending = [...this.workers.values()];
    this.workers.clear();
    const settled = await Promise.allSettled(pending);
    const started = settled.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
    await Promise.all(started.map((worker) => worker.terminate()));
  }

  // One worker per mode: parameters are fixed at creation so concurrent scans never race on them.
  private getWorker(request: RecognitionRequest): Promise<Worker> {
    const mode: WorkerMode = request.digitsOnly
      ? 'digits'
      : request.languageCorrection
        ? 'text'
        : 'literal';
    const key: WorkerKey = `${mode}:${request.quality}`;
    const existing = this.workers.get(key);
    if (existing) {
      return existing;
    }

    const created = this.createConfiguredWorker(mode, request.quality);
    this.workers.set(key, created);
    void created.catch(() => {
      if (this.workers.get(key) === created) {
        this.workers.delete(key);
      }
    });
    return created;
  }

  private async createConfiguredWorker(
    mode: WorkerMode,
    quality: RecognitionQuality,
  ): Promise<Worker> {
    // Dictionaries are init-only parameters, so literal modes need their own worker.
    const worker = await Tesseract.createWorker(
      this.config.lang,
      Tesseract.OEM.LSTM_ONLY,
      {
        workerPath: this.config.workerPath,
        corePath: this.config.corePath,
        langPath: this.config.langPath,
      },
      mode === 'text' ? {} : { load_system_dawg: '0', load_freq_dawg: '0' },
    );

    await worker.setParameters({
      tessedit_pageseg_mode: quality === 'fast' ? Tesseract.PSM.SINGLE_BLOCK : Tesseract.PSM.AUTO,
      preserve_interword_spaces: '1',
      ...(mode === 'digits' ? { tessedit_char_whitelist: DIGIT_WHITELIST } : {}),
    });
    return worker;
  }
}
