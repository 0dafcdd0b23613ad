import { describe, expect, it } from "vitest";
import { decodeBmp } from "./decoders";

/** 1x2 bottom-up 24-bit BMP: the first stored row is the bottom one. */
function tallBmp(top: [number, number, number], bottom: [number, number, number]): Buffer {
  const file = Buffer.alloc(54 + 8);
  file.write("BM", 0, "ascii");
  file.writeUInt32LE(file.length, 2);
  file.writeUInt32LE(54, 10);
  file.writeUInt32LE(40, 14);
  file.writeInt32LE(1, 18);
  file.writeInt32LE(2, 22);
  file.writeUInt16LE(1, 26);
  file.writeUInt16LE(24, 28);
  file.writeUInt32LE(8, 34);
  for (const [row, [r, g, b]] of [bottom, top].entries()) {
    file[54 + row * 4] = b;
    file[55 + row * 4] = g;
    file[56 + row * 4] = r;
  }
  return file;
}

describe("decodeBmp", () => {
  it("returns top-down RGB pixels", () => {
    const decoded = decodeBmp(tallBmp([250, 10, 20], [5, 60, 240]));

    expect({ width: decoded.width, height: decoded.height, channels: decoded.channels }).toEqual({
      width: 1,
      height: 2,
      channels: 3,
    });
    expect([...decoded.pixels]).toEqual([250, 10, 20, 5, 60, 240]);
  });

  it("throws on a truncated header", () => {
    expect(() => decodeBmp(Buffer.from("BM"))).toThrow();
  });
});
