import { cropImage, fullFrameRect } from "@template-tracking/vision-core";
import type { MatchResult, PixelRect, Point2D } from "@template-tracking/vision-core";

import { computeSearchWindow } from "./searchWindow";
import type {
  TrackingMode,
  TrackingState,
  TrackingStepContext,
  TrackingStepOutput
} from "./types";

type Search = {
  position: Point2D;
  score: number;
  window: PixelRect;
};

function searchFullFrame(context: TrackingStepContext): Search {
  const match: MatchResult = context.matcher.match(context.frame, context.template, context.mask);
  return {
    position: { x: match.x, y: match.y },
    score: match.score,
    window: fullFrameRect(context.frame)
  };
}

function searchAround(state: TrackingState, context: TrackingStepContext): Search {
  const window = computeSearchWindow(state.position, context.template, state.radius, context.frame);
  const local = context.matcher.match(cropImage(context.frame, window), context.template, context.mask);
  return {
    position: { x: local.x + window.left, y: local.y + window.top },
    score: local.score,
    window
  };
}

function initialRadius(mode: TrackingMode): number {
  return mode.kind === "full-frame" ? 0 : mode.radius;
}

/** Threshold applied by the final rejection pass, `null` when disabled. */
export function rejectionThreshold(mode: TrackingMode): number | null {
  switch (mode.kind) {
    case "full-frame":
      return mode.threshold;
    case "windowed-fixed":
      return null;
    case "windowed-adaptive":
      return mode.threshold;
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unknown tracking mode: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Frame 0 is always searched over the whole frame, in every mode.
 */
export function startTracking(context: TrackingStepContext, mode: TrackingMode): TrackingStepOutput {
  const found = searchFullFrame(context);
  const threshold = rejectionThreshold(mode);
  return {
    state: { position: found.position, radius: initialRadius(mode), consecutiveMisses: 0 },
    sample: {
      index: context.index,
      x: found.position.x,
      y: found.position.y,
      score: found.score,
      accepted: threshold === null || found.score <= threshold,
      window: found.window,
      radius: null
    }
  };
}

export function stepFullFrame(
  state: TrackingState,
  context: TrackingStepContext,
  mode: Extract<TrackingMode, { kind: "full-frame" }>
): TrackingStepOutput {
  const found = searchFullFrame(context);
  const accepted = mode.threshold === null || found.score <= mode.threshold;
  return {
    state: {
      position: found.position,
      radius: state.radius,
      consecutiveMisses: accepted ? 0 : state.consecutiveMisses + 1
    },
    sample: {
      index: context.index,
      x: found.position.x,
      y: found.position.y,
      score: found.score,
      accepted,
      window: found.window,
      radius: null
    }
  };
}

export function stepWindowedFixed(
  state: TrackingState,
  context: TrackingStepContext,
  mode: Extract<TrackingMode, { kind: "windowed-fixed" }>
): TrackingStepOutput {
  const found = searchAround({ ...state, radius: mode.radius }, context);
  return {
    state: { position: found.position, radius: mode.radius, consecutiveMisses: 0 },
    sample: {
      index: context.index,
      x: found.position.x,
      y: found.position.y,
      score: found.score,
      accepted: true,
      window: found.window,
      radius: mode.radius
    }
  };
}

/**
 * A rejected match holds the last position and grows the radius by `rate`;
 * the next accepted match snaps the radius back to its configured value.
 */
export function stepWindowedAdaptive(
  state: TrackingState,
  context: TrackingStepContext,
  mode: Extract<TrackingMode, { kind: "windowed-adaptive" }>
): TrackingStepOutput {
  const found = searchAround(state, context);

  if (found.score > mode.threshold) {
    return {
      state: {
        position: state.position,
        radius: Math.round(state.radius * mode.rate),
        consecutiveMisses: state.consecutiveMisses + 1
      },
      sample: {
        index: context.index,
        x: state.position.x,
        y: state.position.y,
        score: found.score,
        accepted: false,
        window: found.window,
        radius: state.radius
      }
    };
  }

  return {
    state: { position: found.position, radius: mode.radius, consecutiveMisses: 0 },
    sample: {
      index: context.index,
      x: found.position.x,
      y: found.position.y,
      score: found.score,
      accepted: true,
      window: found.window,
      radius: state.radius
    }
  };
}

export function reduceTracking(
  state: TrackingState,
  context: TrackingStepContext,
  mode: TrackingMode
): TrackingStepOutput {
  switch (mode.kind) {
    case "full-frame":
      return stepFullFrame(state, context, mode);
    case "windowed-fixed":
      return stepWindowedFixed(state, context, mode);
    case "windowed-adaptive":
      return stepWindowedAdaptive(state, context, mode);
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unknown tracking mode: ${JSON.stringify(exhaustive)}`);
    }
  }
}
