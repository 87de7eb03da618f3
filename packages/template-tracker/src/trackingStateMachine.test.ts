import { describe, expect, it } from "vitest";

import { ScriptedMatcher } from "./mock/scriptedMatcher";
import { createFilledFrame } from "./mock/syntheticFrames";
import {
  reduceTracking,
  rejectionThreshold,
  startTracking,
  stepFullFrame,
  stepWindowedAdaptive,
  stepWindowedFixed
} from "./trackingStateMachine";
import type { TrackingMode, TrackingState, TrackingStepContext } from "./types";

const frame = createFilledFrame(20, 20);
const template = createFilledFrame(4, 4, 1);

function contextFor(matcher: ScriptedMatcher, index = 1): TrackingStepContext {
  return { index, frame, template, matcher };
}

describe("trackingStateMachine", () => {
  const adaptive = { kind: "windowed-adaptive", radius: 3, threshold: 0.2, rate: 2 } as const;

  it("searches frame 0 over the whole frame", () => {
    const matcher = new ScriptedMatcher([{ x: 7, y: 2, score: 0.3 }]);
    const output = startTracking(contextFor(matcher, 0), adaptive);

    expect(matcher.calls).toEqual([{ width: 20, height: 20 }]);
    expect(output.state).toEqual({ position: { x: 7, y: 2 }, radius: 3, consecutiveMisses: 0 });
    expect(output.sample).toEqual({
      index: 0,
      x: 7,
      y: 2,
      score: 0.3,
      accepted: false,
      window: { left: 0, top: 0, right: 20, bottom: 20 },
      radius: null
    });
  });

  it("holds the position and grows the radius on a rejected match", () => {
    const matcher = new ScriptedMatcher([{ x: 1, y: 1, score: 0.5 }]);
    const state: TrackingState = { position: { x: 6, y: 6 }, radius: 3, consecutiveMisses: 0 };

    const output = stepWindowedAdaptive(state, contextFor(matcher), adaptive);

    expect(matcher.calls).toEqual([{ width: 11, height: 11 }]);
    expect(output.state).toEqual({ position: { x: 6, y: 6 }, radius: 6, consecutiveMisses: 1 });
    expect(output.sample).toEqual({
      index: 1,
      x: 6,
      y: 6,
      score: 0.5,
      accepted: false,
      window: { left: 3, top: 3, right: 14, bottom: 14 },
      radius: 3
    });
  });

  it("translates an accepted match and resets the radius", () => {
    const matcher = new ScriptedMatcher([{ x: 5, y: 2, score: 0.1 }]);
    const state: TrackingState = { position: { x: 6, y: 6 }, radius: 6, consecutiveMisses: 2 };

    const output = stepWindowedAdaptive(state, contextFor(matcher), adaptive);

    expect(output.sample.window).toEqual({ left: 0, top: 0, right: 17, bottom: 17 });
    expect(output.state).toEqual({ position: { x: 5, y: 2 }, radius: 3, consecutiveMisses: 0 });
    expect(output.sample.accepted).toBe(true);
  });

  it("accepts a score equal to the threshold", () => {
    const matcher = new ScriptedMatcher([{ x: 0, y: 0, score: 0.2 }]);
    const state: TrackingState = { position: { x: 6, y: 6 }, radius: 3, consecutiveMisses: 0 };

    expect(stepWindowedAdaptive(state, contextFor(matcher), adaptive).sample.accepted).toBe(true);
  });

  it("grows the radius geometrically over consecutive misses", () => {
    const mode = { kind: "windowed-adaptive", radius: 1, threshold: 0.2, rate: 2 } as const;
    const matcher = new ScriptedMatcher([
      { x: 0, y: 0, score: 0.9 },
      { x: 0, y: 0, score: 0.9 },
      { x: 0, y: 0, score: 0.9 },
      { x: 0, y: 0, score: 0.05 }
    ]);
    let state: TrackingState = { position: { x: 8, y: 8 }, radius: 1, consecutiveMisses: 0 };
    const radii: number[] = [];

    for (let index = 1; index <= 4; index += 1) {
      state = stepWindowedAdaptive(state, contextFor(matcher, index), mode).state;
      radii.push(state.radius);
    }

    expect(radii).toEqual([2, 4, 8, 1]);
  });

  it("keeps a zero radius at zero after a miss", () => {
    const mode = { kind: "windowed-adaptive", radius: 0, threshold: 0.2, rate: 2 } as const;
    const matcher = new ScriptedMatcher([{ x: 0, y: 0, score: 0.5 }]);
    const state: TrackingState = { position: { x: 4, y: 4 }, radius: 0, consecutiveMisses: 0 };

    expect(stepWindowedAdaptive(state, contextFor(matcher), mode).state.radius).toBe(0);
  });

  it("translates windowed matches with a fixed radius", () => {
    const matcher = new ScriptedMatcher([{ x: 3, y: 1, score: 0.9 }]);
    const state: TrackingState = { position: { x: 10, y: 8 }, radius: 2, consecutiveMisses: 0 };

    const output = stepWindowedFixed(state, contextFor(matcher), { kind: "windowed-fixed", radius: 2 });

    expect(output.sample.window).toEqual({ left: 8, top: 6, right: 17, bottom: 15 });
    expect(output.sample).toMatchObject({ x: 11, y: 7, score: 0.9, accepted: true });
  });

  it("follows full-frame matches even when rejected", () => {
    const matcher = new ScriptedMatcher([{ x: 12, y: 3, score: 0.4 }]);
    const state: TrackingState = { position: { x: 1, y: 1 }, radius: 0, consecutiveMisses: 0 };

    const output = stepFullFrame(state, contextFor(matcher), { kind: "full-frame", threshold: 0.3 });

    expect(output.state.position).toEqual({ x: 12, y: 3 });
    expect(output.sample).toMatchObject({ x: 12, y: 3, accepted: false, radius: null });
    expect(matcher.calls).toEqual([{ width: 20, height: 20 }]);
  });

  it("dispatches on the mode", () => {
    const state: TrackingState = { position: { x: 6, y: 6 }, radius: 3, consecutiveMisses: 0 };
    const modes: TrackingMode[] = [
      { kind: "full-frame", threshold: null },
      { kind: "windowed-fixed", radius: 3 },
      adaptive
    ];

    const widths = modes.map((mode) => {
      const matcher = new ScriptedMatcher([{ x: 0, y: 0, score: 0 }]);
      reduceTracking(state, contextFor(matcher), mode);
      return matcher.calls[0]?.width;
    });

    expect(widths).toEqual([20, 11, 11]);
  });

  it("reports the rejection threshold of each mode", () => {
    expect(rejectionThreshold({ kind: "full-frame", threshold: null })).toBeNull();
    expect(rejectionThreshold({ kind: "full-frame", threshold: 0.4 })).toBe(0.4);
    expect(rejectionThreshold({ kind: "windowed-fixed", radius: 2 })).toBeNull();
    expect(rejectionThreshold(adaptive)).toBe(0.2);
  });
});
