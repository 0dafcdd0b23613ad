import { decode as readBmp } from "bmp-js";
import { createLogger } from "../../utils/logger";
import { errorMessage } from "../../utils/errors";
import type { DecodedImage } from "./decode";

const log = createLogger("images");

/** Turns HEIC/HEIF bytes into a PNG buffer sharp can read. */
export type HeicConverter = (bytes: Buffer) => Promise<Buffer>;

export type BmpDecoder = (bytes: Buffer) => DecodedImage;

/**
 * What the process can decode, probed once at startup and handed to every
 * normalize call.
 */
export type DecoderRegistry = {
  heicConverter: HeicConverter | null;
  bmpDecoder: BmpDecoder;
};

/** bmp-js hands back ABGR quads whatever the bit depth; keep RGB. */
export const decodeBmp: BmpDecoder = (bytes) => {
  const { width, height, data } = readBmp(bytes);
  const pixels = Buffer.alloc(width * height * 3);
  for (let src = 0, dst = 0; dst < pixels.length; src += 4, dst += 3) {
    pixels[dst] = data[src + 3];
    pixels[dst + 1] = data[src + 2];
    pixels[dst + 2] = data[src + 1];
  }
  return { pixels, width, height, channels: 3 };
};

type HeicConvertFn = (options: {
  buffer: Uint8Array;
  format: "JPEG" | "PNG";
  quality?: number;
}) => Promise<ArrayBuffer | Uint8Array>;

function isHeicConvertFn(value: unknown): value is HeicConvertFn {
  return typeof value === "function";
}

async function loadHeicConverter(): Promise<HeicConverter | null> {
  try {
    const mod: unknown = await import("heic-convert");
    const candidate = typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
    if (!isHeicConvertFn(candidate)) {
      log.warn("heic-convert loaded but exposes no converter function");
      return null;
    }

    return async (bytes) => {
      const out = await candidate({ buffer: bytes, format: "PNG" });
      return Buffer.from(new Uint8Array(out));
    };
  } catch (e) {
    log.warn(`HEIF support unavailable: ${errorMessage(e)}`);
    return null;
  }
}

export async function registerDecoders(): Promise<DecoderRegistry> {
  const heicConverter = await loadHeicConverter();
  log.info(`HEIF support ${heicConverter ? "enabled" : "disabled"}`);

  return { heicConverter, bmpDecoder: decodeBmp };
}
