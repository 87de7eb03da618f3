import type { ImageFrame, ImageMask, MatchResult, TemplateMatcher } from "@template-tracking/vision-core";

export type MatcherCall = {
  width: number;
  height: number;
};

/**
 * Returns queued results in order, ignoring pixel content.
 */
export class ScriptedMatcher implements TemplateMatcher {
  readonly calls: MatcherCall[] = [];
  readonly masks: Array<ImageMask | undefined> = [];
  private readonly script: MatchResult[];

  constructor(script: MatchResult[]) {
    this.script = [...script];
  }

  match(image: ImageFrame, _template: ImageFrame, mask?: ImageMask): MatchResult {
    this.calls.push({ width: image.width, height: image.height });
    this.masks.push(mask);
    const next = this.script.shift();
    if (!next) {
      throw new Error(`ScriptedMatcher has no result for call ${this.calls.length}`);
    }
    return next;
  }
}
