import { describeIssues, imageFrameSchema } from "@template-tracking/vision-core";
import type { ImageFrame } from "@template-tracking/vision-core";

import { describeFrameMismatch, resolveTrackingConfig } from "./config";
import type { TrackTemplateOptions } from "./config";
import { TrackingConfigError } from "./errors";
import { reportStep } from "./reporting";
import { reduceTracking, rejectionThreshold, startTracking } from "./trackingStateMachine";
import type { ResolvedTrackingConfig, TrackingState, TrackingStepOutput } from "./types";

export type TrackedFrame = {
  index: number;
  /** `NaN` when the match was rejected. */
  x: number;
  y: number;
  score: number;
  accepted: boolean;
};

type Session = {
  config: ResolvedTrackingConfig;
  state: TrackingState;
  nextIndex: number;
};

/**
 * Frame-at-a-time tracker for live sources. Follows the same policy as
 * `trackTemplate`; the first frame after construction or `reset()` is
 * searched over the whole frame and fixes the expected frame shape.
 */
export class TemplateTracker {
  private readonly template: ImageFrame;
  private readonly options: TrackTemplateOptions;
  private session: Session | null = null;

  constructor(template: ImageFrame, options: TrackTemplateOptions = {}) {
    this.template = template;
    this.options = options;
  }

  update(frame: ImageFrame): TrackedFrame {
    if (!this.session) {
      const config = resolveTrackingConfig([frame], this.template, this.options);
      const output = startTracking(
        { index: 0, frame: config.frames[0], template: config.template, mask: config.mask, matcher: config.matcher },
        config.mode
      );
      reportStep(config, null, output);
      this.session = { config, state: output.state, nextIndex: 1 };
      return this.toTrackedFrame(config, output);
    }

    const { config, state, nextIndex } = this.session;
    this.assertCompatible(config, frame, nextIndex);

    const output = reduceTracking(
      state,
      { index: nextIndex, frame, template: config.template, mask: config.mask, matcher: config.matcher },
      config.mode
    );
    reportStep(config, state, output);
    this.session = { config, state: output.state, nextIndex: nextIndex + 1 };
    return this.toTrackedFrame(config, output);
  }

  getState(): TrackingState | null {
    return this.session ? this.session.state : null;
  }

  reset(): void {
    this.session = null;
  }

  private assertCompatible(config: ResolvedTrackingConfig, frame: ImageFrame, index: number): void {
    const parsed = imageFrameSchema.safeParse(frame);
    if (!parsed.success) {
      throw new TrackingConfigError(describeIssues(parsed.error, `frames.${index}`));
    }
    const mismatch = describeFrameMismatch(config.frames[0], frame);
    if (mismatch) {
      throw new TrackingConfigError([`frames.${index}: ${mismatch}`]);
    }
  }

  private toTrackedFrame(config: ResolvedTrackingConfig, output: TrackingStepOutput): TrackedFrame {
    const threshold = rejectionThreshold(config.mode);
    const rejected = threshold !== null && output.sample.score > threshold;
    return {
      index: output.sample.index,
      x: rejected ? NaN : output.sample.x,
      y: rejected ? NaN : output.sample.y,
      score: output.sample.score,
      accepted: !rejected
    };
  }
}
