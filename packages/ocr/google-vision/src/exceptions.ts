import { RecognitionFailureError } from '@region-ocr/core';

export class OcrAuthenticationError extends RecognitionFailureError {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`Vision API authentication failed (${status}): ${body}`);
    this.name = 'OcrAuthenticationError';
    this.status = status;
  }
}
