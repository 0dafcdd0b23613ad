import type { AppEnv } from "./config/env";
import { createOpenAiFoodAnalyzer } from "./modules/ai/openai-food";
import { createDriveStorage } from "./modules/drive/service";
import { registerDecoders } from "./modules/images/decoders";
import { openFileLedger } from "./modules/ledger/service";
import { readRecentEntries, createSheetsFoodLog, type SheetEntry } from "./modules/sheets/service";
import { superviseCycles } from "./modules/sync/monitor";
import { runCycle, type CycleReport, type SyncDeps } from "./modules/sync/pipeline";
import { createLogger } from "./utils/logger";

const log = createLogger("app");

export type FoodSyncApp = {
  deps: SyncDeps;
  runOnce(hoursBack: number): Promise<CycleReport>;
  runMonitor(opts: { intervalMinutes: number; hoursBack: number; signal?: AbortSignal }): Promise<number>;
  recentEntries(limit: number): Promise<SheetEntry[]>;
};

/** Wires the pipeline around already-built collaborators. */
export function createSyncApp(deps: SyncDeps): FoodSyncApp {
  return {
    deps,
    runOnce: (hoursBack) => runCycle(deps, { hoursBack }),
    runMonitor: ({ intervalMinutes, hoursBack, signal }) =>
      superviseCycles(() => runCycle(deps, { hoursBack }), { intervalMinutes, signal }),
    recentEntries: (limit) => readRecentEntries(deps.foodLog, limit),
  };
}

export async function createApp(env: AppEnv): Promise<FoodSyncApp> {
  log.info("Initializing food-photo-sync...");

  const decoders = await registerDecoders();
  const ledger = openFileLedger(env.PROCESSED_FILES_DB);
  const storage = createDriveStorage(env.GOOGLE_SERVICE_ACCOUNT_FILE);
  const foodLog = createSheetsFoodLog(env.GOOGLE_SERVICE_ACCOUNT_FILE, env.GOOGLE_SHEET_ID);
  const analyzer = createOpenAiFoodAnalyzer({
    apiKey: env.OPENAI_API_KEY,
    visionModel: env.OPENAI_VISION_MODEL,
    textModel: env.OPENAI_TEXT_MODEL,
  });

  try {
    await foodLog.ensureHeaderRow();
  } catch (e) {
    log.error("Error setting up headers", e);
  }

  log.info("food-photo-sync initialized");
  return createSyncApp({
    storage,
    analyzer,
    foodLog,
    ledger,
    decoders,
    folderId: env.GOOGLE_DRIVE_FOLDER_ID,
    maxResults: env.MAX_PHOTOS_PER_RUN,
  });
}
