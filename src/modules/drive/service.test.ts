import { describe, expect, it } from "vitest";
import { buildImageQuery, toCandidate } from "./service";

describe("buildImageQuery", () => {
  const modifiedAfter = new Date("2026-10-17T10:30:00.000Z");

  it("restricts to the folder when one is configured", () => {
    expect(buildImageQuery({ folderId: "folder-1", modifiedAfter })).toBe(
      "'folder-1' in parents and trashed = false and modifiedTime > '2026-10-17T10:30:00.000Z' and mimeType contains 'image/'"
    );
  });

  it("searches everywhere without a folder", () => {
    expect(buildImageQuery({ modifiedAfter })).toBe(
      "trashed = false and modifiedTime > '2026-10-17T10:30:00.000Z' and mimeType contains 'image/'"
    );
  });

  it("escapes quotes in the folder id", () => {
    expect(buildImageQuery({ folderId: "it's", modifiedAfter })).toMatch(/^'it\\'s' in parents and /);
  });
});

describe("toCandidate", () => {
  it("maps Drive metadata", () => {
    expect(
      toCandidate({
        id: "f1",
        name: "lunch.jpg",
        mimeType: "image/jpeg",
        modifiedTime: "2026-10-18T09:00:00.000Z",
        webViewLink: "https://drive.example/f1",
      })
    ).toEqual({
      id: "f1",
      name: "lunch.jpg",
      mimeType: "image/jpeg",
      modifiedTime: "2026-10-18T09:00:00.000Z",
      viewUrl: "https://drive.example/f1",
    });
  });

  it("leaves the link unset when Drive omits it", () => {
    expect(toCandidate({ id: "f2", name: "a.png", webViewLink: null })).toEqual({
      id: "f2",
      name: "a.png",
      mimeType: "",
      modifiedTime: "",
      viewUrl: undefined,
    });
  });

  it("drops files without an id or name", () => {
    expect(toCandidate({ name: "orphan.jpg" })).toBeNull();
    expect(toCandidate({ id: "f3" })).toBeNull();
  });
});
