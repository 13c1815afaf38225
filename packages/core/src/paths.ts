import { fileURLToPath } from 'node:url';

const FILE_SCHEME = 'file://';

/** `file:///a/b%20c.jpg` -> `/a/b c.jpg`; anything else is returned unchanged. */
export function stripFileScheme(source: string): string {
  if (!source.startsWith(FILE_SCHEME)) {
    return source;
  }
  try {
    return fileURLToPath(source);
  } catch {
    return source.slice(FILE_SCHEME.length);
  }
}
