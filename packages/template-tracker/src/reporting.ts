import { LOG_PREFIX } from "./logger";
import type { ResolvedTrackingConfig, TrackingState, TrackingStepOutput } from "./types";

export function reportStep(
  config: ResolvedTrackingConfig,
  previous: TrackingState | null,
  output: TrackingStepOutput
): void {
  if (previous && output.state.radius > previous.radius) {
    config.logger.debug(
      `${LOG_PREFIX} frame ${output.sample.index} rejected (score ${output.sample.score}), search radius ${previous.radius} -> ${output.state.radius}`
    );
  }
  config.onStep?.(output.sample);
}
