import { randomUUID } from 'node:crypto';
import { mkdir, open } from 'node:fs/promises';
import * as path from 'node:path';
import { EncodingFailureError } from '../exceptions.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type { ArtifactStorePort } from '../ports/artifact-store.js';

export class TempFileArtifactStore implements ArtifactStorePort {
  private readonly log: Logger;

  constructor(
    private readonly dir: string,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('Artifact');
  }

  /** Names are unique across stores and processes sharing `dir`. */
  async write(prefix: string, extension: string, data: Uint8Array): Promise<string> {
    const name = `${prefix}_${Date.now()}_${randomUUID()}.${extension}`;
    const filePath = path.join(this.dir, name);

    try {
      await mkdir(this.dir, { recursive: true });
      const handle = await open(filePath, 'wx');
      try {
        await handle.writeFile(data);
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new EncodingFailureError(`Could not write artifact: ${filePath}`, error);
    }

    this.log.info(`Wrote ${data.byteLength} bytes to ${filePath}`);
    return filePath;
  }
}
