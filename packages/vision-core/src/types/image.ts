export type PixelDepth = "uint8" | "uint16" | "int16" | "float" | "logical";

/**
 * Row-major image with interleaved channels:
 * `data[(y * width + x) * channels + c]`.
 */
export type ImageFrame = {
  width: number;
  height: number;
  channels: number;
  depth: PixelDepth;
  data: ArrayLike<number>;
};

export type ImageMask = {
  width: number;
  height: number;
  data: ArrayLike<boolean>;
};

export type ImageSize = {
  width: number;
  height: number;
};

export type Point2D = {
  x: number;
  y: number;
};

/** Zero-based, half-open: `right` and `bottom` are exclusive. */
export type PixelRect = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export const PIXEL_RANGE: Record<PixelDepth, number> = {
  uint8: 255,
  uint16: 65535,
  int16: 65535,
  float: 1,
  logical: 1
};
