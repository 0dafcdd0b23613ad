import sharp from "sharp";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { FoodSyncError, errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import type { BmpDecoder, HeicConverter } from "./decoders";
import { fileExtension } from "./formats";

const log = createLogger("images");

/** Fully loaded pixels; nothing downstream touches the source bytes again. */
export type DecodedImage = {
  pixels: Buffer;
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
};

export type DecodeSource = {
  bytes: Buffer;
  filename: string;
};

export type DecodeTactic = {
  name: string;
  decode: (source: DecodeSource) => Promise<DecodedImage>;
};

async function loadPixels(image: sharp.Sharp): Promise<DecodedImage> {
  const { data, info } = await image.raw().toBuffer({ resolveWithObject: true });
  return { pixels: data, width: info.width, height: info.height, channels: info.channels };
}

export const streamTactic: DecodeTactic = {
  name: "stream",
  decode: ({ bytes }) => {
    const image = sharp();
    Readable.from([bytes]).pipe(image);
    return loadPixels(image);
  },
};

export const bufferedTactic: DecodeTactic = {
  name: "buffered",
  decode: ({ bytes }) => loadPixels(sharp(bytes)),
};

export function forcedHeicTactic(convert: HeicConverter): DecodeTactic {
  return {
    name: "forced-heic",
    decode: async ({ bytes }) => loadPixels(sharp(await convert(bytes))),
  };
}

/** Pure-JS BMP reader, for libvips builds without a BMP loader. */
export function bmpTactic(decodeBmp: BmpDecoder): DecodeTactic {
  return {
    name: "bmp",
    decode: async ({ bytes }) => decodeBmp(bytes),
  };
}

/**
 * Writes the bytes to a private temp directory (keeping the extension so the
 * loader can sniff it), loads every pixel, then removes the directory whether
 * or not decoding worked.
 */
export function tempFileTactic(tmpRoot: string = os.tmpdir()): DecodeTactic {
  return {
    name: "temp-file",
    decode: async ({ bytes, filename }) => {
      const dir = await fs.mkdtemp(path.join(tmpRoot, "food-sync-"));
      try {
        const file = path.join(dir, `source${fileExtension(filename)}`);
        await fs.writeFile(file, bytes);
        return await loadPixels(sharp(file));
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    },
  };
}

export function heicTactics(convert: HeicConverter | null, tmpRoot?: string): DecodeTactic[] {
  const tactics = [streamTactic, bufferedTactic];
  if (convert) tactics.push(forcedHeicTactic(convert));
  tactics.push(tempFileTactic(tmpRoot));
  return tactics;
}

export async function decodeWithTactics(
  tactics: readonly DecodeTactic[],
  source: DecodeSource
): Promise<{ image: DecodedImage; tactic: string }> {
  for (const tactic of tactics) {
    try {
      const image = await tactic.decode(source);
      return { image, tactic: tactic.name };
    } catch (e) {
      log.debug(`${tactic.name} failed for ${source.filename}: ${errorMessage(e)}`);
    }
  }

  throw new FoodSyncError(
    "DECODE_FAILED",
    `All decode tactics failed for ${source.filename} (${tactics.map((t) => t.name).join(", ")})`
  );
}
