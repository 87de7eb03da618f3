import { VisionError } from "../errors";
import type { ImageFrame, PixelDepth } from "../types/image";
import { describeIssues, imageFrameSchema } from "./schemas";

export type CreateImageFrameOptions = {
  channels?: number;
  depth?: PixelDepth;
};

/**
 * Canvas `ImageData` shape: 4 interleaved bytes per pixel.
 */
export type RgbaBuffer = {
  width: number;
  height: number;
  data: ArrayLike<number>;
};

export function createImageFrame(
  width: number,
  height: number,
  data: ArrayLike<number>,
  options: CreateImageFrameOptions = {}
): ImageFrame {
  const parsed = imageFrameSchema.safeParse({
    width,
    height,
    channels: options.channels ?? 1,
    depth: options.depth ?? "float",
    data
  });
  if (!parsed.success) {
    throw new VisionError(
      "invalid-argument",
      `Invalid image frame: ${describeIssues(parsed.error).join("; ")}`
    );
  }
  return parsed.data;
}

export function fromRgba(image: RgbaBuffer): ImageFrame {
  const { width, height, data } = image;
  if (data.length !== width * height * 4) {
    throw new VisionError(
      "invalid-argument",
      `RGBA buffer of ${width}x${height} needs ${width * height * 4} bytes, received ${data.length}`
    );
  }

  const gray = new Uint8Array(width * height);
  for (let i = 0; i < gray.length; i += 1) {
    const idx = i * 4;
    gray[i] = Math.round(
      (data[idx] ?? 0) * 0.299 + (data[idx + 1] ?? 0) * 0.587 + (data[idx + 2] ?? 0) * 0.114
    );
  }

  return createImageFrame(width, height, gray, { channels: 1, depth: "uint8" });
}
