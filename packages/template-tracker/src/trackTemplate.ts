import type { ImageFrame } from "@template-tracking/vision-core";

import { resolveTrackingConfig } from "./config";
import type { TrackTemplateOptions } from "./config";
import { reportStep } from "./reporting";
import { reduceTracking, rejectionThreshold, startTracking } from "./trackingStateMachine";
import type { FrameSample, TrackingResult, TrackingState } from "./types";

/**
 * Marks every frame scoring above `threshold` as a missing position.
 * Scores are kept as reported by the matcher.
 */
export function applyRejection(samples: FrameSample[], threshold: number | null): TrackingResult {
  const rejected = (sample: FrameSample) => threshold !== null && sample.score > threshold;
  return {
    x: samples.map((sample) => (rejected(sample) ? NaN : sample.x)),
    y: samples.map((sample) => (rejected(sample) ? NaN : sample.y)),
    d: samples.map((sample) => sample.score),
    samples
  };
}

/**
 * Tracks `template` through `frames`.
 *
 * Frame 0 is searched over the whole frame. With a `radius`, every later frame
 * is searched inside a window around the previous position; adding a
 * `threshold` grows that window by `rate` after each rejected match.
 * Positions of frames scoring above `threshold` come back as `NaN`.
 *
 * @throws TrackingConfigError when the frames, template or options are malformed.
 */
export function trackTemplate(
  frames: readonly ImageFrame[],
  template: ImageFrame,
  options: TrackTemplateOptions = {}
): TrackingResult {
  const config = resolveTrackingConfig(frames, template, options);
  const [first, ...rest] = config.frames;
  const base = { template: config.template, mask: config.mask, matcher: config.matcher };

  const start = startTracking({ ...base, index: 0, frame: first }, config.mode);
  reportStep(config, null, start);

  const { samples } = rest.reduce<{ state: TrackingState; samples: FrameSample[] }>(
    (acc, frame, offset) => {
      const output = reduceTracking(acc.state, { ...base, index: offset + 1, frame }, config.mode);
      reportStep(config, acc.state, output);
      acc.samples.push(output.sample);
      return { state: output.state, samples: acc.samples };
    },
    { state: start.state, samples: [start.sample] }
  );

  return applyRejection(samples, rejectionThreshold(config.mode));
}
