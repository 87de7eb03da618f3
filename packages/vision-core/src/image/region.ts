import { VisionError } from "../errors";
import type { ImageFrame, ImageSize, PixelRect } from "../types/image";

export function rectWidth(rect: PixelRect): number {
  return rect.right - rect.left;
}

export function rectHeight(rect: PixelRect): number {
  return rect.bottom - rect.top;
}

export function fullFrameRect(size: ImageSize): PixelRect {
  return { left: 0, top: 0, right: size.width, bottom: size.height };
}

export function isRectInside(rect: PixelRect, size: ImageSize): boolean {
  return (
    rect.left >= 0 &&
    rect.top >= 0 &&
    rect.right <= size.width &&
    rect.bottom <= size.height &&
    rect.right > rect.left &&
    rect.bottom > rect.top
  );
}

/**
 * Copies the pixels inside `rect` into a new frame with the same channels and depth.
 */
export function cropImage(image: ImageFrame, rect: PixelRect): ImageFrame {
  if (!isRectInside(rect, image)) {
    throw new VisionError(
      "out-of-range",
      `Rect [${rect.left}, ${rect.top}, ${rect.right}, ${rect.bottom}) is empty or outside the ${image.width}x${image.height} image`
    );
  }

  const width = rectWidth(rect);
  const height = rectHeight(rect);
  const { channels } = image;
  const rowLength = width * channels;
  const data = new Float64Array(rowLength * height);

  for (let row = 0; row < height; row += 1) {
    const srcStart = ((rect.top + row) * image.width + rect.left) * channels;
    const dstStart = row * rowLength;
    for (let i = 0; i < rowLength; i += 1) {
      data[dstStart + i] = image.data[srcStart + i] ?? 0;
    }
  }

  return { width, height, channels, depth: image.depth, data };
}
