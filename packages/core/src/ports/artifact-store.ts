export interface ArtifactStorePort {
  /** Persist bytes under a unique name derived from `prefix` and return the absolute path */
  write(prefix: string, extension: string, data: Uint8Array): Promise<string>;
}
