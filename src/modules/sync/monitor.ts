import { setTimeout as delay } from "node:timers/promises";
import { minutesToMs } from "../../config/runtime";
import { FoodSyncError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";

const log = createLogger("monitor");

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type MonitorOptions = {
  intervalMinutes: number;
  signal?: AbortSignal;
  sleep?: Sleep;
};

export const sleepUnlessAborted: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
};

/**
 * Runs `cycle` forever on a fixed interval. A failing cycle is logged as a
 * CYCLE_FAILURE and the loop carries on; only the abort signal ends it.
 * Resolves with the number of cycles attempted.
 */
export async function superviseCycles(cycle: () => Promise<unknown>, opts: MonitorOptions): Promise<number> {
  const sleep = opts.sleep ?? sleepUnlessAborted;
  const intervalMs = minutesToMs(opts.intervalMinutes);
  let cycles = 0;

  log.info(`Starting continuous monitoring (checking every ${opts.intervalMinutes} minutes)`);

  while (!opts.signal?.aborted) {
    cycles += 1;
    try {
      await cycle();
    } catch (e) {
      log.error("Error during monitoring cycle", new FoodSyncError("CYCLE_FAILURE", `Cycle ${cycles} failed`, { cause: e }));
    }

    if (opts.signal?.aborted) break;
    log.info(`Waiting ${opts.intervalMinutes} minutes until next check...`);
    await sleep(intervalMs, opts.signal);
  }

  log.info(`Monitoring stopped after ${cycles} cycles`);
  return cycles;
}
