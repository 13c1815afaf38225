import { pathToFileURL } from 'node:url';
import type { ScanResult } from '../models/index.js';

export interface ScanOutputPayload {
  readonly text: string;
  readonly croppedImagePath: string;
}

export interface FormatOptions {
  readonly regionUsed: boolean;
}

/**
 * Plain text, or `{"text", "croppedImagePath"}` JSON when a region was used
 * or a processed image was written. The path is a `file://` URI or "".
 */
export function formatScanOutput(result: ScanResult, options: FormatOptions): string {
  if (!options.regionUsed && !result.debugImagePath) {
    return result.text;
  }

  const payload: ScanOutputPayload = {
    text: result.text,
    croppedImagePath: result.debugImagePath ? pathToFileURL(result.debugImagePath).href : '',
  };
  return JSON.stringify(payload);
}

function isPayload(value: unknown): value is ScanOutputPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'text' in value &&
    typeof value.text === 'string' &&
    'croppedImagePath' in value &&
    typeof value.croppedImagePath === 'string'
  );
}

/** Reads scan output as JSON first and falls back to plain text. */
export function parseScanOutput(raw: string): ScanOutputPayload {
  const plain: ScanOutputPayload = { text: raw, croppedImagePath: '' };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return plain;
  }
  return isPayload(parsed) ? { text: parsed.text, croppedImagePath: parsed.croppedImagePath } : plain;
}
