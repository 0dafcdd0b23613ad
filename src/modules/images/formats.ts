export const SUPPORTED_EXTENSIONS = [
  ".heic",
  ".heif",
  ".jpg",
  ".jpeg",
  ".png",
  ".bmp",
  ".gif",
  ".webp",
] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

const SUPPORTED = new Set<string>(SUPPORTED_EXTENSIONS);

/** Lowercased extension including the dot, or "" when the name has none. */
export function fileExtension(filename: string): string {
  const idx = filename.lastIndexOf(".");
  return idx === -1 ? "" : filename.slice(idx).toLowerCase();
}

export function isSupportedFormat(filename: string): boolean {
  return SUPPORTED.has(fileExtension(filename));
}

export function isHeicFilename(filename: string): boolean {
  const ext = fileExtension(filename);
  return ext === ".heic" || ext === ".heif";
}
