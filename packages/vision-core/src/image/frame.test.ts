import { describe, expect, it } from "vitest";

import { VisionError } from "../errors";
import { createImageFrame, fromRgba } from "./frame";
import { imageMaskSchema } from "./schemas";

describe("createImageFrame", () => {
  it("defaults to a single float channel", () => {
    const frame = createImageFrame(2, 2, [0, 0.5, 1, 0.25]);
    expect(frame.channels).toBe(1);
    expect(frame.depth).toBe("float");
  });

  it("rejects data of the wrong length", () => {
    expect(() => createImageFrame(3, 2, [1, 2, 3])).toThrow(
      "Invalid image frame: data: expected 6 values, received 3"
    );
  });

  it("rejects non-integer dimensions", () => {
    expect(() => createImageFrame(1.5, 2, [1, 2, 3])).toThrow(VisionError);
  });
});

describe("fromRgba", () => {
  it("converts to luminance bytes", () => {
    const frame = fromRgba({
      width: 2,
      height: 1,
      data: new Uint8ClampedArray([255, 255, 255, 255, 10, 20, 30, 255])
    });

    expect(frame.depth).toBe("uint8");
    expect(Array.from(frame.data)).toEqual([255, 18]);
  });

  it("rejects short buffers", () => {
    expect(() => fromRgba({ width: 2, height: 2, data: new Uint8ClampedArray(4) })).toThrow(
      "RGBA buffer of 2x2 needs 16 bytes, received 4"
    );
  });
});

describe("imageMaskSchema", () => {
  it("requires one flag per pixel", () => {
    const result = imageMaskSchema.safeParse({ width: 2, height: 2, data: [true, false] });
    expect(result.success).toBe(false);
  });

  it("accepts read-only and array-like flags", () => {
    const flags: readonly boolean[] = Object.freeze([true, false, false, true]);
    const arrayLike: ArrayLike<boolean> = { length: 2, 0: true, 1: false };

    expect(imageMaskSchema.safeParse({ width: 2, height: 2, data: flags }).success).toBe(true);
    expect(imageMaskSchema.safeParse({ width: 2, height: 1, data: arrayLike }).success).toBe(true);
  });

  it("rejects flags that are not booleans", () => {
    const result = imageMaskSchema.safeParse({ width: 2, height: 1, data: [1, 0] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("data must be an array-like of booleans");
    }
  });
});
