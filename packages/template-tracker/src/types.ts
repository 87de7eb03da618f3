import type {
  ImageFrame,
  ImageMask,
  PixelRect,
  Point2D,
  TemplateMatcher
} from "@template-tracking/vision-core";

import type { TrackingLogger } from "./logger";

export type TrackingMode =
  | {
      kind: "full-frame";
      threshold: number | null;
    }
  | {
      kind: "windowed-fixed";
      radius: number;
    }
  | {
      kind: "windowed-adaptive";
      radius: number;
      threshold: number;
      rate: number;
    };

export type TrackingState = {
  /** Last accepted top-left position, in full-frame coordinates. */
  position: Point2D;
  radius: number;
  consecutiveMisses: number;
};

export type FrameSample = {
  index: number;
  /** Full-frame position; the held position when the frame was rejected mid-run. */
  x: number;
  y: number;
  score: number;
  accepted: boolean;
  window: PixelRect;
  /** Radius used to build `window`, `null` for full-frame searches. */
  radius: number | null;
};

export type TrackingResult = {
  x: number[];
  y: number[];
  d: number[];
  samples: FrameSample[];
};

export type FrameSequence = readonly [ImageFrame, ...ImageFrame[]];

export type StepObserver = (sample: FrameSample) => void;

export type ResolvedTrackingConfig = {
  frames: FrameSequence;
  template: ImageFrame;
  mode: TrackingMode;
  mask?: ImageMask;
  matcher: TemplateMatcher;
  onStep?: StepObserver;
  logger: TrackingLogger;
};

export type TrackingStepContext = {
  index: number;
  frame: ImageFrame;
  template: ImageFrame;
  mask?: ImageMask;
  matcher: TemplateMatcher;
};

export type TrackingStepOutput = {
  state: TrackingState;
  sample: FrameSample;
};
