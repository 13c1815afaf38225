export type FrameOrientation =
  | 'portrait'
  | 'portrait-upside-down'
  | 'landscape-left'
  | 'landscape-right';

export type FramePixelFormat = 'yuv' | 'rgb' | 'bgra' | 'unknown';

/** A live camera frame as delivered by the capture layer. */
export interface Frame {
  readonly isValid: boolean;
  readonly width: number;
  readonly height: number;
  readonly bytesPerRow: number;
  readonly isMirrored: boolean;
  readonly orientation: FrameOrientation;
  readonly pixelFormat: FramePixelFormat;
  toArrayBuffer(): ArrayBuffer;
}
