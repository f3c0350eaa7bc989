import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import {
  CLAUDE_CONFIG_DIR_ENV,
  CLAUDE_PROJECTS_DIR_NAME,
  DEFAULT_CLAUDE_CODE_PATH,
  DEFAULT_CLAUDE_CONFIG_PATH,
  USAGE_FILE_EXTENSION,
} from "./constants.js";
import { errorCode, errorMessage } from "./errors.js";
import type { LogFileStat } from "./types.js";

export interface LocateError {
  readonly path: string;
  readonly message: string;
}

export interface LocateResult {
  readonly roots: readonly string[];
  readonly availableRoots: readonly string[];
  readonly files: readonly LogFileStat[];
  readonly errors: readonly LocateError[];
}

/**
 * Project roots to scan: $CLAUDE_CONFIG_DIR entries when set, otherwise the
 * XDG and legacy Claude directories.
 */
export function defaultProjectRoots(
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const configured = env[CLAUDE_CONFIG_DIR_ENV]?.trim();
  if (configured != null && configured !== "") {
    return configured
      .split(",")
      .map((value) => value.trim())
      .filter((value) => value !== "")
      .map((value) => path.join(path.resolve(value), CLAUDE_PROJECTS_DIR_NAME));
  }

  return [
    path.join(DEFAULT_CLAUDE_CONFIG_PATH, CLAUDE_PROJECTS_DIR_NAME),
    path.join(DEFAULT_CLAUDE_CODE_PATH, CLAUDE_PROJECTS_DIR_NAME),
  ];
}

/**
 * List `<root>/<project>/**\/*.jsonl` with size and mtime.
 *
 * A missing root is not an error: it just contributes nothing. Anything that
 * cannot be read below it is collected in `errors` and skipped.
 */
export async function locateLogFiles(root: string): Promise<LocateResult> {
  const files: LogFileStat[] = [];
  const errors: LocateError[] = [];

  let projects: Dirent[];
  try {
    projects = await readdir(root, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return { roots: [root], availableRoots: [], files, errors };
    }
    errors.push({ path: root, message: errorMessage(error) });
    return { roots: [root], availableRoots: [], files, errors };
  }

  for (const project of projects) {
    if (!project.isDirectory()) {
      continue;
    }
    await walkProject(path.join(root, project.name), files, errors);
  }

  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { roots: [root], availableRoots: [root], files, errors };
}

async function walkProject(
  dir: string,
  files: LogFileStat[],
  errors: LocateError[],
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    errors.push({ path: dir, message: errorMessage(error) });
    return;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkProject(entryPath, files, errors);
      continue;
    }
    if (!entry.isFile() || !entry.name.endsWith(USAGE_FILE_EXTENSION)) {
      continue;
    }

    try {
      const info = await stat(entryPath);
      files.push({ path: entryPath, size: info.size, mtimeMs: info.mtimeMs });
    } catch (error) {
      errors.push({ path: entryPath, message: errorMessage(error) });
    }
  }
}

/**
 * Locate across several roots. A path listed under two roots is kept once.
 */
export async function locateAll(
  roots: readonly string[],
): Promise<LocateResult> {
  const results = await Promise.all(roots.map((root) => locateLogFiles(root)));
  const seen = new Set<string>();
  const files: LogFileStat[] = [];

  for (const result of results) {
    for (const file of result.files) {
      if (seen.has(file.path)) {
        continue;
      }
      seen.add(file.path);
      files.push(file);
    }
  }

  return {
    roots: [...roots],
    availableRoots: results.flatMap((result) => result.availableRoots),
    files,
    errors: results.flatMap((result) => result.errors),
  };
}

/**
 * Extract project name from a transcript path: the segment after "projects"
 */
export function extractProjectFromPath(jsonlPath: string): string {
  const segments = jsonlPath.split(/[/\\]/);
  const projectsIndex = segments.lastIndexOf(CLAUDE_PROJECTS_DIR_NAME);

  if (projectsIndex === -1 || projectsIndex + 1 >= segments.length - 1) {
    return "unknown";
  }

  const projectName = segments[projectsIndex + 1];
  return projectName != null && projectName.trim() !== ""
    ? projectName
    : "unknown";
}
