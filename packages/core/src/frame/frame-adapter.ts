import { InvalidFrameError, NotImplementedError } from '../exceptions.js';
import type { ImageBuffer, Orientation, PixelLayout } from '../models/index.js';
import { channelCount, createImageBuffer, packRows } from '../models/index.js';
import type { Frame, FrameOrientation, FramePixelFormat } from '../ports/frame.js';

const ORIENTATION: Record<FrameOrientation, { plain: Orientation; mirrored: Orientation }> = {
  portrait: { plain: 1, mirrored: 2 },
  'portrait-upside-down': { plain: 3, mirrored: 4 },
  'landscape-left': { plain: 8, mirrored: 5 },
  'landscape-right': { plain: 6, mirrored: 7 },
};

export function frameOrientation(frame: Pick<Frame, 'orientation' | 'isMirrored'>): Orientation {
  const entry = ORIENTATION[frame.orientation];
  return frame.isMirrored ? entry.mirrored : entry.plain;
}

function layoutForFormat(format: FramePixelFormat): PixelLayout {
  switch (format) {
    case 'yuv':
      return 'gray';
    case 'rgb':
      return 'rgb';
    case 'bgra':
      return 'rgba';
    case 'unknown':
      throw new NotImplementedError('Frame pixel format "unknown" is not supported');
  }
}

function swapRedBlue(buffer: ImageBuffer): ImageBuffer {
  const data = buffer.data.slice();
  for (let i = 0; i < data.length; i += 4) {
    const b = data[i];
    data[i] = data[i + 2];
    data[i + 2] = b;
  }
  return { ...buffer, data };
}

/**
 * Converts a camera frame into a tightly packed ImageBuffer tagged with the
 * frame's orientation. YUV frames contribute their luma plane only.
 */
export function adaptFrame(frame: Frame): ImageBuffer {
  const layout = layoutForFormat(frame.pixelFormat);

  const data = new Uint8Array(frame.toArrayBuffer());
  const stride = frame.bytesPerRow > 0 ? frame.bytesPerRow : frame.width * channelCount(layout);

  let buffer: ImageBuffer;
  try {
    buffer = createImageBuffer({
      data,
      width: frame.width,
      height: frame.height,
      stride,
      layout,
      orientation: frameOrientation(frame),
    });
  } catch (error) {
    throw new InvalidFrameError(
      `Frame buffer does not match ${frame.width}x${frame.height} ${frame.pixelFormat}: ` +
        (error instanceof Error ? error.message : String(error)),
    );
  }

  const packed = packRows(buffer);
  return frame.pixelFormat === 'bgra' ? swapRedBlue(packed) : packed;
}
