import { VisionError, createImageFrame } from "@template-tracking/vision-core";
import type { CreateImageFrameOptions, ImageFrame, Point2D } from "@template-tracking/vision-core";

export function createFilledFrame(
  width: number,
  height: number,
  value = 0,
  options: CreateImageFrameOptions = {}
): ImageFrame {
  const channels = options.channels ?? 1;
  return createImageFrame(width, height, new Float64Array(width * height * channels).fill(value), options);
}

/**
 * Returns a copy of `frame` with `patch` pasted at `at` (top-left).
 */
export function stampTemplate(frame: ImageFrame, patch: ImageFrame, at: Point2D): ImageFrame {
  if (
    at.x < 0 ||
    at.y < 0 ||
    at.x + patch.width > frame.width ||
    at.y + patch.height > frame.height ||
    patch.channels !== frame.channels
  ) {
    throw new VisionError(
      "out-of-range",
      `Cannot stamp ${patch.width}x${patch.height} patch at (${at.x}, ${at.y}) in ${frame.width}x${frame.height} frame`
    );
  }

  const { channels } = frame;
  const data = Float64Array.from(frame.data);
  for (let row = 0; row < patch.height; row += 1) {
    for (let col = 0; col < patch.width; col += 1) {
      for (let c = 0; c < channels; c += 1) {
        data[((at.y + row) * frame.width + at.x + col) * channels + c] =
          patch.data[(row * patch.width + col) * channels + c] ?? 0;
      }
    }
  }

  return { ...frame, data };
}
