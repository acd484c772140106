import { describe, expect, it } from "vitest";
import { eachDateBetween, toDateString } from "./dates.ts";
import { ValidationError } from "./errors.ts";

describe("toDateString", () => {
  it("keeps well-formed dates", () => {
    expect(toDateString(" 2024-02-29 ")).toBe("2024-02-29");
  });

  it("formats Date objects in local time", () => {
    expect(toDateString(new Date(2024, 0, 31, 23, 59))).toBe("2024-01-31");
  });

  it.each(["2024-02-30", "2024-13-01", "24-01-01", "2024/01/01", ""])(
    "rejects %j",
    (value) => {
      expect(() => toDateString(value)).toThrow(ValidationError);
    }
  );

  it("rejects invalid Date objects", () => {
    expect(() => toDateString(new Date("nope"))).toThrow(ValidationError);
  });
});

describe("eachDateBetween", () => {
  it("includes both ends", () => {
    expect(eachDateBetween("2023-12-30", "2024-01-02")).toEqual([
      "2023-12-30",
      "2023-12-31",
      "2024-01-01",
      "2024-01-02",
    ]);
  });
});
