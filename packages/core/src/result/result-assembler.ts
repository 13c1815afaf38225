import type { ScanConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { ImageBuffer, NormalizedRegion, RecognizedLine, ScanResult } from '../models/index.js';
import type { ArtifactStorePort } from '../ports/artifact-store.js';
import type { ImageCodecPort } from '../ports/image-codec.js';
import { intersects } from '../region/region-mapper.js';
import { filterDigits } from './digits.js';

export interface AssembleInput {
  readonly lines: readonly RecognizedLine[];
  /** Region the lines must overlap, in the same coordinates as their boxes */
  readonly region?: NormalizedRegion;
  /** The engine or an upstream crop already restricted output to `region` */
  readonly regionApplied?: boolean;
  readonly digitsOnly: boolean;
  readonly debugImage?: ImageBuffer;
}

export interface AssembleDeps {
  readonly codec: ImageCodecPort;
  readonly artifacts: ArtifactStorePort;
  readonly config: Pick<ScanConfig, 'debugImageQuality'>;
  readonly logger: Logger;
}

export function orderLines(lines: readonly RecognizedLine[]): RecognizedLine[] {
  return [...lines].sort(
    (a, b) => a.boundingBox.y - b.boundingBox.y || a.boundingBox.x - b.boundingBox.x,
  );
}

export function assembleText(
  lines: readonly RecognizedLine[],
  region: NormalizedRegion | undefined,
  regionApplied: boolean,
  digitsOnly: boolean,
): string {
  const inRegion =
    region && !regionApplied ? lines.filter((line) => intersects(line.boundingBox, region)) : lines;
  const joined = orderLines(inRegion)
    .map((line) => line.text)
    .join('\n');
  return digitsOnly ? filterDigits(joined) : joined;
}

async function persistDebugImage(image: ImageBuffer, deps: AssembleDeps): Promise<string | undefined> {
  try {
    const jpeg = await deps.codec.encode(image, 'jpeg', deps.config.debugImageQuality);
    const filePath = await deps.artifacts.write('processed', 'jpg', jpeg);
    deps.logger.info(`Debug image written: ${filePath}`);
    return filePath;
  } catch (error) {
    deps.logger.warn('Debug image skipped', error);
    return undefined;
  }
}

export async function assembleResult(input: AssembleInput, deps: AssembleDeps): Promise<ScanResult> {
  const text = assembleText(input.lines, input.region, input.regionApplied ?? false, input.digitsOnly);
  if (!input.debugImage) {
    return { text };
  }

  const debugImagePath = await persistDebugImage(input.debugImage, deps);
  return debugImagePath ? { text, debugImagePath } : { text };
}
