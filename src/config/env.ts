import { z } from "zod";
import fs from "node:fs";
import path from "node:path";
import { FoodSyncError } from "../utils/errors";
import { createLogger, LOG_LEVELS } from "../utils/logger";

const log = createLogger("env");

export function loadDotEnvFileIfPresent(filename = ".env", processEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const p = path.resolve(process.cwd(), filename);
    if (!fs.existsSync(p)) return;

    const raw = fs.readFileSync(p, "utf8");
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const idx = trimmed.indexOf("=");
      if (idx === -1) continue;

      const key = trimmed.slice(0, idx).trim();
      let val = trimmed.slice(idx + 1).trim();

      // strip surrounding quotes
      if (
        (val.startsWith('"') && val.endsWith('"')) ||
        (val.startsWith("'") && val.endsWith("'"))
      ) {
        val = val.slice(1, -1);
      }

      // real env wins over the file
      if (processEnv[key] === undefined) processEnv[key] = val;
    }
  } catch (e) {
    log.warn("failed to load .env:", e);
  }
}

const DEFAULT_SERVICE_ACCOUNT_FILE = "./config/service-account-key.json";

const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const required = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }).trim());

const logLevel = z.preprocess((v) => {
  const s = blankToUndefined(v);
  if (typeof s !== "string") return s;
  const upper = s.trim().toUpperCase();
  return upper === "WARN" ? "WARNING" : upper;
}, z.enum(LOG_LEVELS).default("INFO"));

const EnvSchema = z.object({
  GOOGLE_SHEET_ID: required("GOOGLE_SHEET_ID"),
  OPENAI_API_KEY: required("OPENAI_API_KEY"),

  // Unset means "any folder the service account can see"
  GOOGLE_DRIVE_FOLDER_ID: z.preprocess(blankToUndefined, z.string().trim().optional()),

  GOOGLE_SERVICE_ACCOUNT_FILE: z.preprocess(
    blankToUndefined,
    z.string().default(DEFAULT_SERVICE_ACCOUNT_FILE)
  ),
  PROCESSED_FILES_DB: z.preprocess(blankToUndefined, z.string().default("./data/processed_files.json")),

  CHECK_INTERVAL_MINUTES: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(5)),
  MAX_PHOTOS_PER_RUN: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(1000).default(10)),
  LOG_LEVEL: logLevel,

  OPENAI_VISION_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
  OPENAI_TEXT_MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
});

export type AppEnv = z.infer<typeof EnvSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const key = issue.path.join(".");
  return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
}

/**
 * Reads `.env` (unless disabled), validates the environment and resolves file
 * paths against the working directory. Every problem is collected into one
 * CONFIGURATION_ERROR so the operator sees them all at once.
 */
export function loadEnv(
  processEnv: NodeJS.ProcessEnv = process.env,
  opts: { dotEnvFile?: string | null } = {}
): AppEnv {
  const dotEnvFile = opts.dotEnvFile === undefined ? ".env" : opts.dotEnvFile;
  if (dotEnvFile) loadDotEnvFileIfPresent(dotEnvFile, processEnv);

  const parsed = EnvSchema.safeParse(processEnv);
  const problems: string[] = parsed.success ? [] : parsed.error.issues.map(formatIssue);

  const keyFile = path.resolve(
    process.cwd(),
    parsed.success
      ? parsed.data.GOOGLE_SERVICE_ACCOUNT_FILE
      : processEnv.GOOGLE_SERVICE_ACCOUNT_FILE || DEFAULT_SERVICE_ACCOUNT_FILE
  );
  if (!fs.existsSync(keyFile)) {
    problems.push(`Service account file not found at ${keyFile}`);
  }

  if (!parsed.success || problems.length > 0) {
    throw new FoodSyncError("CONFIGURATION_ERROR", `Configuration errors:\n${problems.join("\n")}`);
  }

  return {
    ...parsed.data,
    GOOGLE_SERVICE_ACCOUNT_FILE: keyFile,
    PROCESSED_FILES_DB: path.resolve(process.cwd(), parsed.data.PROCESSED_FILES_DB),
  };
}
