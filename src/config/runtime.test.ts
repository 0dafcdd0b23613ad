import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { minutesToMs, parsePositiveInt } from "./runtime";

describe("parsePositiveInt", () => {
  it("accepts whole positive numbers", () => {
    expect(parsePositiveInt("12")).toBe(12);
  });

  it.each(["0", "-3", "1.5", "abc", ""])("rejects %j", (value) => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});

describe("minutesToMs", () => {
  it("converts minutes", () => {
    expect(minutesToMs(5)).toBe(300000);
  });
});
