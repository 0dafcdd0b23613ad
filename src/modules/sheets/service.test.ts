import { describe, expect, it } from "vitest";
import type { FoodLog } from "../sync/types";
import { HEADER_ROW, hasExpectedHeader, parseEntries, readRecentEntries, toSheetRow } from "./service";

const header = [...HEADER_ROW];

describe("toSheetRow", () => {
  it("formats the timestamp and fills optional cells with blanks", () => {
    expect(toSheetRow({ foodName: "Soup", capturedAt: new Date(2026, 0, 5, 7, 4, 9) })).toEqual([
      "2026-01-05 07:04:09",
      "Soup",
      "",
      "",
    ]);
  });
});

describe("hasExpectedHeader", () => {
  it("accepts the exact header only", () => {
    expect(hasExpectedHeader(header)).toBe(true);
    expect(hasExpectedHeader(["Date", "Food", "Recipe", "Photo URL"])).toBe(false);
    expect(hasExpectedHeader(["Date", "Food Name", "Recipe"])).toBe(false);
    expect(hasExpectedHeader(undefined)).toBe(false);
  });
});

describe("parseEntries", () => {
  const rows = [
    header,
    ["2026-10-01 08:00:00", "Toast", "r1", "u1"],
    ["2026-10-02 08:00:00", "Eggs", "r2", "u2"],
    ["2026-10-03 08:00:00", "Oats", "r3", "u3"],
  ];

  it("returns the last rows after the header", () => {
    expect(parseEntries(rows, 2)).toEqual([
      { date: "2026-10-02 08:00:00", foodName: "Eggs", recipe: "r2", photoUrl: "u2" },
      { date: "2026-10-03 08:00:00", foodName: "Oats", recipe: "r3", photoUrl: "u3" },
    ]);
  });

  it("pads rows whose trailing cells came back trimmed", () => {
    expect(
      parseEntries([header, ["2026-10-01 08:00:00", "Toast", "r1"], ["2026-10-02 08:00:00", "Eggs"]], 10)
    ).toEqual([
      { date: "2026-10-01 08:00:00", foodName: "Toast", recipe: "r1", photoUrl: "" },
      { date: "2026-10-02 08:00:00", foodName: "Eggs", recipe: "", photoUrl: "" },
    ]);
  });

  it("drops rows without a date or food name", () => {
    expect(parseEntries([header, [], ["2026-10-01 08:00:00"], ["", "Toast", "r1", "u1"]], 10)).toEqual([]);
  });

  it("handles an empty sheet", () => {
    expect(parseEntries([], 5)).toEqual([]);
  });
});

describe("readRecentEntries", () => {
  it("reads through the food log", async () => {
    const foodLog: FoodLog = {
      ensureHeaderRow: async () => {},
      appendRow: async () => {},
      appendRows: async () => {},
      readAllRows: async () => [header, ["2026-10-01 08:00:00", "Toast", "", ""]],
    };

    await expect(readRecentEntries(foodLog)).resolves.toEqual([
      { date: "2026-10-01 08:00:00", foodName: "Toast", recipe: "", photoUrl: "" },
    ]);
  });
});
