export type VisionErrorCode = "invalid-argument" | "out-of-range" | "failed-precondition";

export class VisionError extends Error {
  readonly code: VisionErrorCode;

  constructor(code: VisionErrorCode, message: string) {
    super(message);
    this.name = "VisionError";
    this.code = code;
  }
}
