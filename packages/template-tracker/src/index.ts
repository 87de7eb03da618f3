export * from "./errors";
export { LOG_PREFIX, defaultTrackingLogger } from "./logger";
export type { TrackingLogger } from "./logger";
export type {
  FrameSample,
  FrameSequence,
  ResolvedTrackingConfig,
  StepObserver,
  TrackingMode,
  TrackingResult,
  TrackingState,
  TrackingStepContext,
  TrackingStepOutput
} from "./types";
export {
  DEFAULT_GROWTH_RATE,
  describeFrameMismatch,
  frameSequenceSchema,
  resolveTrackingConfig,
  selectTrackingMode,
  trackTemplateOptionsSchema
} from "./config";
export type { ParsedTrackTemplateOptions, TrackTemplateOptions } from "./config";
export { computeSearchWindow } from "./searchWindow";
export {
  reduceTracking,
  rejectionThreshold,
  startTracking,
  stepFullFrame,
  stepWindowedAdaptive,
  stepWindowedFixed
} from "./trackingStateMachine";
export { applyRejection, trackTemplate } from "./trackTemplate";
export { TemplateTracker } from "./TemplateTracker";
export type { TrackedFrame } from "./TemplateTracker";
export { ScriptedMatcher } from "./mock/scriptedMatcher";
export type { MatcherCall } from "./mock/scriptedMatcher";
export { createFilledFrame, stampTemplate } from "./mock/syntheticFrames";
