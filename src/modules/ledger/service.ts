import { z } from "zod";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { FoodSyncError, errorMessage } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("ledger");

export const LedgerFileSchema = z.array(z.string().min(1));

export type PersistIds = (ids: string[]) => Promise<void>;

/**
 * Set of Drive file ids that were synced or confirmed to hold no food.
 *
 * Loaded once; `markProcessed` rewrites the whole record each time, which is
 * O(total ids) per call. Fine for a bot that handles a handful of photos per
 * cycle, but not for very large ledgers. Assumes a single writer process.
 */
export class ProcessedLedger {
  private readonly ids: Set<string>;

  constructor(initialIds: Iterable<string>, private readonly persist: PersistIds) {
    this.ids = new Set(initialIds);
  }

  contains(id: string) {
    return this.ids.has(id);
  }

  async markProcessed(id: string) {
    this.ids.add(id);
    await this.persist(this.list());
  }

  get size() {
    return this.ids.size;
  }

  list(): string[] {
    return Array.from(this.ids);
  }
}

export function readLedgerFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) return [];

  const raw = fs.readFileSync(filePath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new FoodSyncError("CONFIGURATION_ERROR", `Ledger file ${filePath} is not valid JSON: ${errorMessage(e)}`);
  }

  const parsed = LedgerFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new FoodSyncError("CONFIGURATION_ERROR", `Ledger file ${filePath} must be a JSON array of file ids`);
  }
  return parsed.data;
}

/** Writes beside the ledger, then renames over it, so a crash never leaves half a file. */
export async function writeLedgerFile(filePath: string, ids: string[]) {
  const tmp = `${filePath}.tmp`;
  await fsp.writeFile(tmp, JSON.stringify(ids), "utf8");
  await fsp.rename(tmp, filePath);
}

export function openFileLedger(filePath: string): ProcessedLedger {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const ids = readLedgerFile(filePath);
  log.info(`Loaded ${ids.length} processed file ids from ${filePath}`);
  return new ProcessedLedger(ids, (next) => writeLedgerFile(filePath, next));
}
