export type FoodSyncErrorCode =
  | "CONFIGURATION_ERROR"
  | "UNSUPPORTED_FORMAT"
  | "DECODER_UNAVAILABLE"
  | "DECODE_FAILED"
  | "DOWNLOAD_FAILED"
  | "CLASSIFICATION_FAILED"
  | "RECIPE_GENERATION_FAILED"
  | "SPREADSHEET_WRITE_FAILED"
  | "CYCLE_FAILURE";

export class FoodSyncError extends Error {
  readonly code: FoodSyncErrorCode;

  constructor(code: FoodSyncErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = "FoodSyncError";
    this.code = code;
  }
}

export function isFoodSyncError(err: unknown, code?: FoodSyncErrorCode): err is FoodSyncError {
  if (!(err instanceof FoodSyncError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
