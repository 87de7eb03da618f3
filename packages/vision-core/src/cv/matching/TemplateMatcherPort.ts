import type { ImageFrame, ImageMask } from "../../types/image";

export type MatchResult = {
  /** Top-left column of the best placement, in the searched image's coordinates. */
  x: number;
  /** Top-left row of the best placement, in the searched image's coordinates. */
  y: number;
  /** Dissimilarity, lower is better. */
  score: number;
};

export interface TemplateMatcher {
  match(image: ImageFrame, template: ImageFrame, mask?: ImageMask): MatchResult;
}
