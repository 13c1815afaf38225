import { TempFileArtifactStore } from './artifacts/temp-file-artifact-store.js';
import type { ScanConfig } from './config.js';
import { resolveScanConfig } from './config.js';
import type { FrameScanOptions } from './frame/frame-scanner.js';
import { SharpImageCodec } from './image/sharp-image-codec.js';
import type { Logger } from './logger.js';
import type { ScanOptions } from './models/index.js';
import type { Frame } from './ports/frame.js';
import type { RecognitionEnginePort } from './ports/recognition-engine.js';
import { RegionScanService } from './region-scan-service.js';
import { formatScanOutput } from './result/scan-output.js';

/** Service wired with the sharp codec and temp-directory artifacts. */
export function createRegionScanService(
  engine: RecognitionEnginePort,
  overrides: Partial<ScanConfig> = {},
  logger?: Logger,
): RegionScanService {
  const config = resolveScanConfig(overrides);
  return new RegionScanService(
    engine,
    new SharpImageCodec(),
    new TempFileArtifactStore(config.tempDir, logger),
    config,
    logger,
  );
}

export async function scanImage(service: RegionScanService, path: string): Promise<string> {
  const result = await service.scanFile(path);
  return formatScanOutput(result, { regionUsed: false });
}

export async function scanImageWithRegion(
  service: RegionScanService,
  path: string,
  x: number,
  y: number,
  width: number,
  height: number,
  digitsOnly?: boolean,
  contrast?: number,
): Promise<string> {
  const options: Partial<ScanOptions> = { digitsOnly, contrast };
  const result = await service.scanFile(path, { x, y, width, height }, options);
  return formatScanOutput(result, { regionUsed: true });
}

export async function scanFrame(
  service: RegionScanService,
  frame: Frame,
  options?: FrameScanOptions,
): Promise<string> {
  const result = await service.scanFrame(frame, options);
  return result.text;
}
