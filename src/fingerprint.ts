import { createHash } from "node:crypto";
import type { LogFileStat, WindowSpec } from "./types.js";
import { windowSpecKey } from "./time-window.js";

/**
 * Hash of the on-disk state: every (path, size, mtime) plus which roots
 * exist. Metadata only, nothing is read.
 */
export function sourceFingerprint(
  files: readonly LogFileStat[],
  availableRoots: readonly string[] = [],
): string {
  const hash = createHash("sha256");
  for (const root of [...availableRoots].sort()) {
    hash.update(`root\0${root}\n`);
  }
  const sorted = [...files].sort((a, b) =>
    a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
  );
  for (const file of sorted) {
    hash.update(`${file.path}\0${file.size}\0${file.mtimeMs}\n`);
  }
  return hash.digest("hex");
}

export function cacheKey(spec: WindowSpec, fingerprint: string): string {
  return createHash("sha256")
    .update(windowSpecKey(spec))
    .update("\0")
    .update(fingerprint)
    .digest("hex");
}
