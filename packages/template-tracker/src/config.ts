import {
  SsdTemplateMatcher,
  describeIssues,
  imageFrameSchema,
  imageMaskSchema
} from "@template-tracking/vision-core";
import type { ImageFrame, TemplateMatcher } from "@template-tracking/vision-core";
import { z } from "zod";

import { TrackingConfigError } from "./errors";
import { LOG_PREFIX, defaultTrackingLogger } from "./logger";
import type { TrackingLogger } from "./logger";
import type { FrameSample, ResolvedTrackingConfig, TrackingMode } from "./types";

export const DEFAULT_GROWTH_RATE = 1.1;

function isTemplateMatcher(value: unknown): value is TemplateMatcher {
  return (
    typeof value === "object" &&
    value !== null &&
    "match" in value &&
    typeof value.match === "function"
  );
}

function isTrackingLogger(value: unknown): value is TrackingLogger {
  return (
    typeof value === "object" &&
    value !== null &&
    "warn" in value &&
    typeof value.warn === "function" &&
    "debug" in value &&
    typeof value.debug === "function"
  );
}

/**
 * `radius` and `threshold` are disabled when omitted or negative. `rate` only
 * matters, and is only checked, when both are enabled.
 */
export const trackTemplateOptionsSchema = z
  .object({
    radius: z.number().int().optional(),
    threshold: z.number().finite().optional(),
    rate: z.number().finite().default(DEFAULT_GROWTH_RATE),
    mask: imageMaskSchema.optional(),
    matcher: z.custom<TemplateMatcher>(isTemplateMatcher, "matcher must implement match()").optional(),
    onStep: z
      .custom<(sample: FrameSample) => void>(
        (value) => typeof value === "function",
        "onStep must be a function"
      )
      .optional(),
    logger: z.custom<TrackingLogger>(isTrackingLogger, "logger must provide warn() and debug()").optional()
  })
  .strict();

export type TrackTemplateOptions = z.input<typeof trackTemplateOptionsSchema>;
export type ParsedTrackTemplateOptions = z.output<typeof trackTemplateOptionsSchema>;

export function describeFrameMismatch(reference: ImageFrame, frame: ImageFrame): string | null {
  if (frame.width !== reference.width || frame.height !== reference.height) {
    return `frame is ${frame.width}x${frame.height}, expected ${reference.width}x${reference.height}`;
  }
  if (frame.channels !== reference.channels) {
    return `frame has ${frame.channels} channels, expected ${reference.channels}`;
  }
  if (frame.depth !== reference.depth) {
    return `frame depth is ${frame.depth}, expected ${reference.depth}`;
  }
  return null;
}

export const frameSequenceSchema = z
  .array(imageFrameSchema)
  .nonempty("frame sequence must contain at least one frame")
  .superRefine((frames, ctx) => {
    const reference = frames[0];
    frames.forEach((frame, index) => {
      const mismatch = describeFrameMismatch(reference, frame);
      if (mismatch) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: mismatch });
      }
    });
  });

export function selectTrackingMode(options: ParsedTrackTemplateOptions): TrackingMode {
  const radius = options.radius !== undefined && options.radius >= 0 ? options.radius : null;
  const threshold =
    options.threshold !== undefined && options.threshold >= 0 ? options.threshold : null;

  if (radius === null) {
    return { kind: "full-frame", threshold };
  }
  if (threshold === null) {
    return { kind: "windowed-fixed", radius };
  }
  return { kind: "windowed-adaptive", radius, threshold, rate: options.rate };
}

export function resolveTrackingConfig(
  frames: readonly ImageFrame[],
  template: ImageFrame,
  options: TrackTemplateOptions = {}
): ResolvedTrackingConfig {
  const parsedFrames = frameSequenceSchema.safeParse(frames);
  const parsedTemplate = imageFrameSchema.safeParse(template);
  const parsedOptions = trackTemplateOptionsSchema.safeParse(options);

  const issues: string[] = [];
  if (!parsedFrames.success) {
    issues.push(...describeIssues(parsedFrames.error, "frames"));
  }
  if (!parsedTemplate.success) {
    issues.push(...describeIssues(parsedTemplate.error, "template"));
  }
  if (!parsedOptions.success) {
    issues.push(...describeIssues(parsedOptions.error, "options"));
  }
  if (!parsedFrames.success || !parsedTemplate.success || !parsedOptions.success) {
    throw new TrackingConfigError(issues);
  }

  const sequence = parsedFrames.data;
  const reference = sequence[0];
  const tpl = parsedTemplate.data;
  const parsed = parsedOptions.data;

  if (tpl.width > reference.width || tpl.height > reference.height) {
    issues.push(
      `template: ${tpl.width}x${tpl.height} template does not fit in ${reference.width}x${reference.height} frames`
    );
  }
  if (tpl.channels !== reference.channels) {
    issues.push(`template: template has ${tpl.channels} channels, frames have ${reference.channels}`);
  }
  if (tpl.depth !== reference.depth) {
    issues.push(`template: template depth ${tpl.depth} does not match frame depth ${reference.depth}`);
  }
  if (parsed.mask && (parsed.mask.width !== tpl.width || parsed.mask.height !== tpl.height)) {
    issues.push(
      `options.mask: ${parsed.mask.width}x${parsed.mask.height} mask does not match ${tpl.width}x${tpl.height} template`
    );
  }

  const mode = selectTrackingMode(parsed);
  if (mode.kind === "windowed-adaptive" && mode.rate < 1) {
    issues.push(`options.rate: rate must be at least 1 when the search window adapts, received ${mode.rate}`);
  }
  if (issues.length > 0) {
    throw new TrackingConfigError(issues);
  }

  const logger = parsed.logger ?? defaultTrackingLogger;

  if (mode.kind === "windowed-adaptive" && Math.round(mode.radius * mode.rate) === mode.radius) {
    logger.warn(
      `${LOG_PREFIX} radius ${mode.radius} does not grow at rate ${mode.rate} after a rejected match; raise the radius or the rate to re-acquire a lost template`
    );
  }

  return {
    frames: sequence,
    template: tpl,
    mode,
    mask: parsed.mask,
    matcher: parsed.matcher ?? new SsdTemplateMatcher(),
    onStep: parsed.onStep,
    logger
  };
}
