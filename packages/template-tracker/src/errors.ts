export type TrackingErrorCode = "invalid-argument" | "failed-precondition";

export class TrackingError extends Error {
  readonly code: TrackingErrorCode;

  constructor(code: TrackingErrorCode, message: string) {
    super(message);
    this.name = "TrackingError";
    this.code = code;
  }
}

/**
 * Raised before any frame is matched when the frames, template or options are malformed.
 */
export class TrackingConfigError extends TrackingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid-argument", `Invalid tracking configuration: ${issues.join("; ")}`);
    this.name = "TrackingConfigError";
    this.issues = issues;
  }
}
