import { homedir } from "node:os";
import path from "node:path";
import { xdgCache, xdgConfig, xdgState } from "xdg-basedir";

/**
 * User's home directory path
 */
export const USER_HOME_DIR = homedir();

/**
 * XDG base directories, with the XDG fallbacks under $HOME
 */
export const XDG_CONFIG_DIR = xdgConfig ?? path.join(USER_HOME_DIR, ".config");
export const XDG_CACHE_DIR = xdgCache ?? path.join(USER_HOME_DIR, ".cache");
export const XDG_STATE_DIR =
  xdgState ?? path.join(USER_HOME_DIR, ".local", "state");

export const APP_NAME = "usagedash";

/**
 * Default Claude Code path (legacy location)
 */
export const DEFAULT_CLAUDE_CODE_PATH = path.join(USER_HOME_DIR, ".claude");

/**
 * Default Claude config path (new XDG location)
 */
export const DEFAULT_CLAUDE_CONFIG_PATH = path.join(XDG_CONFIG_DIR, "claude");

/**
 * Environment variable for custom Claude config directories (comma separated)
 */
export const CLAUDE_CONFIG_DIR_ENV = "CLAUDE_CONFIG_DIR";

/**
 * Projects directory name within Claude data directory
 */
export const CLAUDE_PROJECTS_DIR_NAME = "projects";

export const USAGE_FILE_EXTENSION = ".jsonl";

/**
 * Model name used when a usage line does not name one
 */
export const UNKNOWN_MODEL = "unknown";

export const RATE_WINDOW_SECONDS = 60;

export const DEFAULT_REFRESH_INTERVAL_MS = 2000;
export const DEFAULT_CACHE_CAPACITY = 8;
export const DEFAULT_CACHE_TTL_MS = 2000;

export const DEFAULT_CACHE_FILE = path.join(
  XDG_CACHE_DIR,
  APP_NAME,
  "snapshots.json",
);
export const DEFAULT_LOG_FILE = path.join(
  XDG_STATE_DIR,
  APP_NAME,
  `${APP_NAME}.log`,
);

/**
 * Read size used when consuming appended bytes from a log file
 */
export const READ_CHUNK_BYTES = 4 * 1024 * 1024;
