import type { ScanConfig } from './config.js';
import { resolveScanConfig, resolveScanOptions } from './config.js';
import { ScanError } from './exceptions.js';
import type { ScanStage } from './exceptions.js';
import type { FrameScanOptions } from './frame/frame-scanner.js';
import { FrameScanner } from './frame/frame-scanner.js';
import { enhance } from './image/enhancer.js';
import { normalizeOrientation } from './image/orientation.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import type {
  NormalizedRegion,
  PixelRegion,
  RecognizedLine,
  ScanOptions,
  ScanResult,
} from './models/index.js';
import { stripFileScheme } from './paths.js';
import type { ArtifactStorePort } from './ports/artifact-store.js';
import type { Frame } from './ports/frame.js';
import type { ImageCodecPort } from './ports/image-codec.js';
import type { RecognitionEnginePort } from './ports/recognition-engine.js';
import { RecognitionInvoker } from './recognition/recognition-invoker.js';
import { mapRegion } from './region/region-mapper.js';
import { assembleResult } from './result/result-assembler.js';

async function runStage<T>(stage: ScanStage, work: () => T | Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw new ScanError(stage, error);
  }
}

export class RegionScanService {
  private readonly config: ScanConfig;
  private readonly invoker: RecognitionInvoker;
  private readonly log: Logger;
  private readonly logger?: Logger;

  constructor(
    private readonly engine: RecognitionEnginePort,
    private readonly codec: ImageCodecPort,
    private readonly artifacts: ArtifactStorePort,
    config: Partial<ScanConfig> = {},
    logger?: Logger,
  ) {
    this.config = resolveScanConfig(config);
    this.logger = logger;
    this.log = logger ?? createLogger('Scan');
    this.invoker = new RecognitionInvoker(engine, {
      timeoutMs: this.config.recognitionTimeoutMs,
      quality: this.config.recognitionQuality,
      logger,
    });
  }

  /**
   * Scans an image file, optionally restricted to a region of the upright image.
   * Resolves with the result or rejects with a single ScanError naming the stage.
   */
  async scanFile(
    source: string,
    region?: NormalizedRegion,
    options: Partial<ScanOptions> = {},
  ): Promise<ScanResult> {
    const scanOptions = await runStage('validate', () => resolveScanOptions(options));
    const filePath = stripFileScheme(source);

    const decoded = await runStage('load', () => this.codec.decode(filePath));
    const upright = await runStage('orient', () => normalizeOrientation(decoded));
    this.log.info(`Loaded ${filePath}: ${upright.width}x${upright.height}`);

    let pixelRegion: PixelRegion | undefined;
    if (region !== undefined && scanOptions.useRegion) {
      const selected: NormalizedRegion = region;
      const mapped = await runStage('map', () => mapRegion(selected, upright.width, upright.height));
      this.log.info(
        `Region {x: ${selected.x}, y: ${selected.y}, w: ${selected.width}, h: ${selected.height}} -> ` +
          `{x: ${mapped.x}, y: ${mapped.y}, w: ${mapped.width}, h: ${mapped.height}}`,
      );
      pixelRegion = mapped;
    }
    const useRegion = pixelRegion !== undefined;

    const prepared = await runStage('enhance', () =>
      enhance(upright, pixelRegion, scanOptions, this.config),
    );

    // The crop already confines the engine to the region, so no hint is passed.
    const lines: RecognizedLine[] = await runStage('recognize', () =>
      this.invoker.recognize(prepared, undefined, scanOptions.digitsOnly),
    );

    const debugImage = this.shouldWriteDebugImage(useRegion, scanOptions) ? prepared : undefined;
    return runStage('assemble', () =>
      assembleResult(
        { lines, regionApplied: useRegion, digitsOnly: scanOptions.digitsOnly, debugImage },
        { codec: this.codec, artifacts: this.artifacts, config: this.config, logger: this.log },
      ),
    );
  }

  async scanFrame(frame: Frame, options: FrameScanOptions = {}): Promise<ScanResult> {
    const scanner = new FrameScanner(this.invoker, { logger: this.logger });
    return scanner.scan(frame, options);
  }

  async terminate(): Promise<void> {
    await this.engine.terminate?.();
  }

  private shouldWriteDebugImage(useRegion: boolean, options: ScanOptions): boolean {
    switch (this.config.debugImage) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'auto':
        return useRegion || options.contrast !== 1;
    }
  }
}
