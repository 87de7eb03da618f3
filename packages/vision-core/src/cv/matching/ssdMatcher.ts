import { VisionError } from "../../errors";
import { PIXEL_RANGE } from "../../types/image";
import type { ImageFrame, ImageMask } from "../../types/image";
import type { MatchResult, TemplateMatcher } from "./TemplateMatcherPort";

function assertMatchable(image: ImageFrame, template: ImageFrame, mask?: ImageMask): void {
  if (template.width > image.width || template.height > image.height) {
    throw new VisionError(
      "invalid-argument",
      `Template ${template.width}x${template.height} does not fit in image ${image.width}x${image.height}`
    );
  }
  if (template.channels !== image.channels) {
    throw new VisionError(
      "invalid-argument",
      `Template has ${template.channels} channels, image has ${image.channels}`
    );
  }
  if (template.depth !== image.depth) {
    throw new VisionError(
      "invalid-argument",
      `Template depth ${template.depth} does not match image depth ${image.depth}`
    );
  }
  if (mask && (mask.width !== template.width || mask.height !== template.height)) {
    throw new VisionError(
      "invalid-argument",
      `Mask ${mask.width}x${mask.height} does not match template ${template.width}x${template.height}`
    );
  }
}

function includedPixels(template: ImageFrame, mask?: ImageMask): number[] {
  const count = template.width * template.height;
  const included: number[] = [];
  for (let i = 0; i < count; i += 1) {
    if (!mask || mask.data[i] === true) {
      included.push(i);
    }
  }
  return included;
}

/**
 * Exhaustive masked sum-of-squared-differences search.
 *
 * The score is the SSD divided by `included pixels * channels * range^2`, so
 * in-range data scores within [0, 1]. Placements are scanned row by row and
 * the first minimum wins.
 */
export function matchTemplate(
  image: ImageFrame,
  template: ImageFrame,
  mask?: ImageMask
): MatchResult {
  assertMatchable(image, template, mask);

  const included = includedPixels(template, mask);
  if (included.length === 0) {
    throw new VisionError("invalid-argument", "Mask excludes every template pixel");
  }

  const { channels } = image;
  const offsets = included.map((index) => {
    const ty = Math.floor(index / template.width);
    const tx = index % template.width;
    return { image: (ty * image.width + tx) * channels, template: index * channels };
  });

  let best: { x: number; y: number; ssd: number } = { x: 0, y: 0, ssd: Infinity };

  for (let y = 0; y <= image.height - template.height; y += 1) {
    for (let x = 0; x <= image.width - template.width; x += 1) {
      const origin = (y * image.width + x) * channels;
      let ssd = 0;
      for (const offset of offsets) {
        for (let c = 0; c < channels; c += 1) {
          const diff =
            (image.data[origin + offset.image + c] ?? 0) -
            (template.data[offset.template + c] ?? 0);
          ssd += diff * diff;
        }
        if (ssd >= best.ssd) {
          break;
        }
      }
      if (ssd < best.ssd) {
        best = { x, y, ssd };
      }
    }
  }

  const range = PIXEL_RANGE[image.depth];
  return {
    x: best.x,
    y: best.y,
    score: best.ssd / (included.length * channels * range * range)
  };
}

export class SsdTemplateMatcher implements TemplateMatcher {
  match(image: ImageFrame, template: ImageFrame, mask?: ImageMask): MatchResult {
    return matchTemplate(image, template, mask);
  }
}
