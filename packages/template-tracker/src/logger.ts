export type TrackingLogger = Pick<Console, "warn" | "debug">;

export const LOG_PREFIX = "[TemplateTracker]";

/** Warnings go to the console; per-frame debug lines need an injected logger. */
export const defaultTrackingLogger: TrackingLogger = {
  warn: (...data: unknown[]) => console.warn(...data),
  debug: () => undefined
};
