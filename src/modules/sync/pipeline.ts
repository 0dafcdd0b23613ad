import { errorMessage, isFoodSyncError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { hoursBefore } from "../../utils/time";
import type { DecoderRegistry } from "../images/decoders";
import { isSupportedFormat } from "../images/formats";
import { normalizeImage, type NormalizedImage, type NormalizeOptions } from "../images/normalize";
import type { ProcessedLedger } from "../ledger/service";
import type { CandidateItem, FoodAnalyzer, FoodDetection, FoodLog, FoodRecord, PhotoStorage } from "./types";

const log = createLogger("sync");

export type SyncDeps = {
  storage: PhotoStorage;
  analyzer: FoodAnalyzer;
  foodLog: FoodLog;
  ledger: ProcessedLedger;
  decoders: DecoderRegistry;
  folderId?: string;
  maxResults: number;
  normalizeOptions?: NormalizeOptions;
  now?: () => Date;
};

export type SkipReason =
  | "UNSUPPORTED_FORMAT"
  | "DOWNLOAD_FAILED"
  | "DECODER_UNAVAILABLE"
  | "DECODE_FAILED"
  | "CLASSIFICATION_FAILED"
  | "SPREADSHEET_WRITE_FAILED"
  | "LEDGER_WRITE_FAILED"
  | "UNEXPECTED";

/** `synced` and `no_food` are terminal (ledger marked); `skipped` is retried next cycle. */
export type ItemOutcome =
  | { status: "synced"; record: FoodRecord }
  | { status: "no_food" }
  | { status: "skipped"; reason: SkipReason };

export type CycleReport = {
  discovered: number;
  candidates: number;
  processed: number;
  noFood: number;
  skipped: number;
  outcomes: Array<{ id: string; name: string; outcome: ItemOutcome }>;
};

const currentTime = (deps: SyncDeps) => deps.now?.() ?? new Date();

const skipped = (reason: SkipReason): ItemOutcome => ({ status: "skipped", reason });

function normalizeFailureReason(err: unknown): SkipReason {
  if (isFoodSyncError(err, "DECODER_UNAVAILABLE")) return "DECODER_UNAVAILABLE";
  if (isFoodSyncError(err, "UNSUPPORTED_FORMAT")) return "UNSUPPORTED_FORMAT";
  return "DECODE_FAILED";
}

async function runItem(deps: SyncDeps, item: CandidateItem): Promise<ItemOutcome> {
  if (!isSupportedFormat(item.name)) {
    log.warn(`Unsupported format: ${item.name}`);
    return skipped("UNSUPPORTED_FORMAT");
  }

  let bytes: Buffer;
  try {
    bytes = await deps.storage.downloadBytes(item.id);
  } catch (e) {
    log.error(`Failed to download ${item.name}`, e);
    return skipped("DOWNLOAD_FAILED");
  }

  let image: NormalizedImage;
  try {
    image = await normalizeImage(bytes, item.name, deps.decoders, deps.normalizeOptions);
  } catch (e) {
    log.error(`Failed to process image ${item.name}: ${errorMessage(e)}`);
    return skipped(normalizeFailureReason(e));
  }

  let detection: FoodDetection;
  try {
    detection = await deps.analyzer.classifyFood(image);
  } catch (e) {
    log.error(`Failed to classify ${item.name}`, e);
    return skipped("CLASSIFICATION_FAILED");
  }

  if (detection.kind === "no_food") {
    log.info(`No food detected in ${item.name}`);
    await deps.ledger.markProcessed(item.id);
    return { status: "no_food" };
  }

  let recipe: string | undefined;
  try {
    recipe = await deps.analyzer.generateRecipe(detection.name);
  } catch (e) {
    log.error(`Error generating recipe for ${detection.name}: ${errorMessage(e)}`);
  }

  const record: FoodRecord = {
    foodName: detection.name,
    recipe,
    photoUrl: item.viewUrl ?? "",
    capturedAt: currentTime(deps),
  };

  try {
    await deps.foodLog.appendRow(record);
  } catch (e) {
    log.error(`Failed to log to sheets: ${item.name}`, e);
    return skipped("SPREADSHEET_WRITE_FAILED");
  }

  try {
    await deps.ledger.markProcessed(item.id);
  } catch (e) {
    log.error(
      `Row written for ${item.name} but ledger persist failed; it may be logged again after a restart`,
      e
    );
    return skipped("LEDGER_WRITE_FAILED");
  }

  log.info(`Successfully processed: ${item.name} - ${record.foodName}`);
  return { status: "synced", record };
}

/** One item, start to finish. Never throws. */
export async function processItem(deps: SyncDeps, item: CandidateItem): Promise<ItemOutcome> {
  log.info(`Processing photo: ${item.name}`);
  try {
    return await runItem(deps, item);
  } catch (e) {
    log.error(`Error processing photo ${item.name}`, e);
    return skipped("UNEXPECTED");
  }
}

/**
 * Discover, filter against the ledger, then process candidates one by one.
 * The lookback is always `hoursBack` from now, never "since last success":
 * a photo that was modified before the window opened and never processed is
 * not picked up again.
 */
export async function runCycle(deps: SyncDeps, opts: { hoursBack: number }): Promise<CycleReport> {
  const now = currentTime(deps);
  log.info(`Checking for photos from the last ${opts.hoursBack} hours`);

  const found = await deps.storage.listImages({
    folderId: deps.folderId,
    modifiedAfter: hoursBefore(now, opts.hoursBack),
    maxResults: deps.maxResults,
  });
  const candidates = found.filter((item) => !deps.ledger.contains(item.id));

  const report: CycleReport = {
    discovered: found.length,
    candidates: candidates.length,
    processed: 0,
    noFood: 0,
    skipped: 0,
    outcomes: [],
  };

  if (candidates.length === 0) {
    log.info("No new photos found");
    return report;
  }

  log.info(`Found ${candidates.length} photos to process`);

  for (const item of candidates) {
    const outcome = await processItem(deps, item);
    report.outcomes.push({ id: item.id, name: item.name, outcome });
    if (outcome.status === "synced") report.processed += 1;
    else if (outcome.status === "no_food") report.noFood += 1;
    else report.skipped += 1;
  }

  log.info(`Processed ${report.processed} food photos`);
  return report;
}
