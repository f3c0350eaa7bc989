import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  APP_NAME,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_CACHE_FILE,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_LOG_FILE,
  DEFAULT_REFRESH_INTERVAL_MS,
  XDG_CONFIG_DIR,
} from "./constants.js";
import { errorCode, errorMessage } from "./errors.js";
import { parseWindowSpec } from "./time-window.js";

// Configuration file path
export const CONFIG_FILE_PATH = path.join(XDG_CONFIG_DIR, `${APP_NAME}.json`);

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function isWindowText(value: string): boolean {
  try {
    parseWindowSpec(value);
    return true;
  } catch {
    return false;
  }
}

// Configuration structure; every key is optional in the file
const configSchema = z.object({
  PROJECT_ROOTS: z.array(z.string().min(1)).default([]), // empty: Claude's default roots
  DEFAULT_WINDOW: z
    .string()
    .refine(isWindowText, { message: "Expected a window preset or START..END" })
    .default("week-monday-9am"),
  REFRESH_INTERVAL_MS: z.number().int().min(100).default(DEFAULT_REFRESH_INTERVAL_MS),
  CACHE_CAPACITY: z.number().int().min(1).default(DEFAULT_CACHE_CAPACITY),
  CACHE_TTL_MS: z.number().int().nonnegative().default(DEFAULT_CACHE_TTL_MS),
  PERSIST_CACHE: z.boolean().default(true), // keep snapshots across restarts
  CACHE_FILE: z.string().min(1).default(DEFAULT_CACHE_FILE),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_FILE: z.string().min(1).default(DEFAULT_LOG_FILE),
  DEBUG_OUTPUT: z.boolean().default(false), // print snapshots instead of redrawing
});

export type UsagedashConfig = z.infer<typeof configSchema>;

// Default configuration
export const DEFAULT_CONFIG: Readonly<UsagedashConfig> = Object.freeze(configSchema.parse({}));

/**
 * Load usagedash.json, creating it with defaults when missing.
 * A file that does not parse or validate is left alone and the defaults are
 * used for this run.
 */
export async function loadConfig(configPath: string = CONFIG_FILE_PATH): Promise<UsagedashConfig> {
  let content: string;
  try {
    content = await readFile(configPath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      await saveConfig(DEFAULT_CONFIG, configPath);
    } else {
      console.warn(`Failed to read ${configPath}, using defaults: ${errorMessage(error)}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  try {
    const result = configSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      console.warn(`Invalid ${configPath}, using defaults: ${issues}`);
      return { ...DEFAULT_CONFIG };
    }
    return result.data;
  } catch (error) {
    console.warn(`Failed to parse ${configPath}, using defaults: ${errorMessage(error)}`);
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Save usagedash.json configuration file
 */
export async function saveConfig(
  config: Readonly<UsagedashConfig>,
  configPath: string = CONFIG_FILE_PATH,
): Promise<void> {
  try {
    await mkdir(path.dirname(configPath), { recursive: true });
    const content = JSON.stringify(config, null, 2);
    await writeFile(configPath, content, "utf8");
  } catch (error) {
    console.warn(`Failed to save ${configPath}: ${errorMessage(error)}`);
  }
}
