import { z } from "zod";

const dimension = z.number().int().positive();

function isNumericArrayLike(value: unknown): value is ArrayLike<number> {
  if (Array.isArray(value)) {
    return true;
  }
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function isBooleanArrayLike(value: unknown): value is ArrayLike<boolean> {
  if (typeof value !== "object" || value === null || !("length" in value)) {
    return false;
  }
  const { length } = value;
  if (typeof length !== "number" || !Number.isInteger(length) || length < 0) {
    return false;
  }
  for (let i = 0; i < length; i += 1) {
    if (typeof Reflect.get(value, i) !== "boolean") {
      return false;
    }
  }
  return true;
}

export const pixelDepthSchema = z.enum(["uint8", "uint16", "int16", "float", "logical"]);

export const imageFrameSchema = z
  .object({
    width: dimension,
    height: dimension,
    channels: dimension,
    depth: pixelDepthSchema,
    data: z.custom<ArrayLike<number>>(isNumericArrayLike, "data must be an array or typed array")
  })
  .superRefine((frame, ctx) => {
    const expected = frame.width * frame.height * frame.channels;
    if (frame.data.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["data"],
        message: `expected ${expected} values, received ${frame.data.length}`
      });
    }
  });

export const imageMaskSchema = z
  .object({
    width: dimension,
    height: dimension,
    data: z.custom<ArrayLike<boolean>>(isBooleanArrayLike, "data must be an array-like of booleans")
  })
  .superRefine((mask, ctx) => {
    const expected = mask.width * mask.height;
    if (mask.data.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["data"],
        message: `expected ${expected} values, received ${mask.data.length}`
      });
    }
  });

export function describeIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const segments = prefix === undefined ? issue.path : [prefix, ...issue.path];
    const path = segments.length > 0 ? segments.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
