import { rectHeight, rectWidth } from "@template-tracking/vision-core";
import type { ImageSize, PixelRect, Point2D } from "@template-tracking/vision-core";

import { TrackingError } from "./errors";

/**
 * Window of `radius` pixels around the previous placement, clipped to the frame.
 *
 * Bounds are zero-based and half-open. The far edges reach one pixel past
 * `previous + template + radius`, so a radius of 0 still lets the template
 * move by one pixel right or down.
 */
export function computeSearchWindow(
  previous: Point2D,
  template: ImageSize,
  radius: number,
  frame: ImageSize
): PixelRect {
  const window: PixelRect = {
    left: Math.max(previous.x - radius, 0),
    top: Math.max(previous.y - radius, 0),
    right: Math.min(previous.x + template.width + radius + 1, frame.width),
    bottom: Math.min(previous.y + template.height + radius + 1, frame.height)
  };

  if (rectWidth(window) < template.width || rectHeight(window) < template.height) {
    throw new TrackingError(
      "failed-precondition",
      `Search window [${window.left}, ${window.top}, ${window.right}, ${window.bottom}) cannot hold a ${template.width}x${template.height} template`
    );
  }

  return window;
}
