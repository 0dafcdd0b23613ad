import sharp from "sharp";
import { FoodSyncError, errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { bmpTactic, bufferedTactic, decodeWithTactics, heicTactics, type DecodedImage, type DecodeTactic } from "./decode";
import type { DecoderRegistry } from "./decoders";
import { fileExtension, isHeicFilename, isSupportedFormat } from "./formats";

const log = createLogger("images");

export const MAX_WIDTH = 1920;
export const MAX_HEIGHT = 1080;
export const JPEG_QUALITY = 85;

export type ColorModel = "rgb" | "grayscale";

export type NormalizedImage = {
  bytes: Buffer;
  mime: "image/jpeg";
  width: number;
  height: number;
  colorModel: ColorModel;
};

export type NormalizeOptions = {
  /** Where the temp-file tactic may create its scratch directory. */
  tmpDir?: string;
};

function tacticsFor(filename: string, decoders: DecoderRegistry, opts: NormalizeOptions): DecodeTactic[] {
  if (isHeicFilename(filename)) {
    if (!decoders.heicConverter) {
      throw new FoodSyncError("DECODER_UNAVAILABLE", `HEIC/HEIF file ${filename} cannot be processed: no HEIF decoder registered`);
    }
    return heicTactics(decoders.heicConverter, opts.tmpDir);
  }

  if (fileExtension(filename) === ".bmp") {
    return [bufferedTactic, bmpTactic(decoders.bmpDecoder)];
  }

  return [bufferedTactic];
}

/**
 * Alpha, palette and CMYK sources arrive here already expanded by the decoder;
 * anything with an alpha band is flattened onto white and forced to sRGB.
 */
function fromPixels(decoded: DecodedImage): { image: sharp.Sharp; colorModel: ColorModel } {
  const { pixels, width, height, channels } = decoded;
  const image = sharp(pixels, { raw: { width, height, channels } });

  if (channels === 1) {
    return { image: image.toColourspace("b-w"), colorModel: "grayscale" };
  }
  if (channels === 3) {
    return { image: image.toColourspace("srgb"), colorModel: "rgb" };
  }
  return {
    image: image.flatten({ background: "#ffffff" }).toColourspace("srgb"),
    colorModel: "rgb",
  };
}

export function exceedsEnvelope(width: number, height: number) {
  return width > MAX_WIDTH || height > MAX_HEIGHT;
}

/**
 * Coerces one supported photo into a JPEG no larger than 1920x1080.
 *
 * Throws FoodSyncError with UNSUPPORTED_FORMAT, DECODER_UNAVAILABLE (HEIC
 * only) or DECODE_FAILED; callers treat all three as retry-eligible skips.
 */
export async function normalizeImage(
  bytes: Buffer,
  filename: string,
  decoders: DecoderRegistry,
  opts: NormalizeOptions = {}
): Promise<NormalizedImage> {
  if (!isSupportedFormat(filename)) {
    throw new FoodSyncError("UNSUPPORTED_FORMAT", `Unsupported format: ${filename}`);
  }

  const tactics = tacticsFor(filename, decoders, opts);
  if (isHeicFilename(filename)) {
    log.debug(`HEIC file ${filename} signature: ${bytes.subarray(0, 20).toString("hex")}`);
  }

  const { image: decoded, tactic } = await decodeWithTactics(tactics, { bytes, filename });
  if (tactics.length > 1) {
    log.info(`Opened ${filename} using ${tactic}`);
  }

  const oversized = exceedsEnvelope(decoded.width, decoded.height);

  try {
    const { image: shaped, colorModel } = fromPixels(decoded);
    let image = shaped;

    if (oversized) {
      image = image.resize({
        width: MAX_WIDTH,
        height: MAX_HEIGHT,
        fit: "inside",
        withoutEnlargement: true,
        kernel: sharp.kernel.lanczos3,
      });
    }

    const { data, info } = await image
      .jpeg({ quality: JPEG_QUALITY, optimiseCoding: true })
      .toBuffer({ resolveWithObject: true });

    if (oversized) {
      log.info(`Resized image ${filename} to ${info.width}x${info.height}`);
    }

    return { bytes: data, mime: "image/jpeg", width: info.width, height: info.height, colorModel };
  } catch (e) {
    throw new FoodSyncError("DECODE_FAILED", `Error processing image ${filename}: ${errorMessage(e)}`, { cause: e });
  }
}
