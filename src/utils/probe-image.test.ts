import { Buffer } from "node:buffer";
import { describe, expect, it } from "vitest";
import { png } from "../testing/fixtures.ts";
import { sniffImageType } from "./probe-image.ts";

describe("sniffImageType", () => {
  it("recognizes a PNG", () => {
    expect(sniffImageType(png(16, 16))).toEqual({
      type: "png",
      mime: "image/png",
    });
  });

  it("returns null for anything else", () => {
    expect(sniffImageType(Buffer.from("hello"))).toBeNull();
  });
});
