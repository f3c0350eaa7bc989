#!/usr/bin/env node

import { loadConfig } from "./config.js";
import { errorMessage, InvalidWindowError } from "./errors.js";
import { createLogger } from "./logger.js";
import { RefreshDriver } from "./refresh-driver.js";
import { renderStatusLines } from "./status-line.js";
import { parseWindowSpec, presetWindow } from "./time-window.js";
import { WINDOW_PRESETS, type Snapshot, type WindowSpec } from "./types.js";
import { UsageEngine } from "./usage-engine.js";

const STATUS_LINES = 4;

function nextPreset(spec: WindowSpec): WindowSpec {
  const index = spec.kind === "preset" ? WINDOW_PRESETS.indexOf(spec.preset) : -1;
  const next = WINDOW_PRESETS[(index + 1) % WINDOW_PRESETS.length] ?? "week-monday-9am";
  return presetWindow(next);
}

// ---- Main Logic ----
async function main() {
  const config = await loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL, file: config.LOG_FILE });

  // A window on the command line wins over DEFAULT_WINDOW
  let initialWindow: WindowSpec;
  try {
    initialWindow = parseWindowSpec(process.argv[2] ?? config.DEFAULT_WINDOW);
  } catch (error) {
    console.error(errorMessage(error));
    process.exitCode = 1;
    return;
  }

  const engine = new UsageEngine({
    roots: config.PROJECT_ROOTS.length > 0 ? config.PROJECT_ROOTS : undefined,
    logger,
    cacheCapacity: config.CACHE_CAPACITY,
    cacheTtlMs: config.CACHE_TTL_MS,
    cacheFile: config.PERSIST_CACHE ? config.CACHE_FILE : undefined,
  });
  const driver = new RefreshDriver(engine, {
    intervalMs: config.REFRESH_INTERVAL_MS,
    logger,
    initialWindow,
  });

  const color = process.stdout.isTTY === true;
  let isFirstRender = true;

  // Clear screen once at startup (skip in debug mode)
  if (!config.DEBUG_OUTPUT) {
    process.stdout.write("\x1B[2J\x1B[0;0H");
  }

  const render = (snapshot: Snapshot) => {
    if (config.DEBUG_OUTPUT) {
      const stats = engine.stats();
      console.log(
        `DEBUG: built ${snapshot.builtAt.toISOString()} records=${snapshot.recordCount} files=${snapshot.diagnostics.filesScanned} parses=${stats.parseInvocations} cache=${stats.cacheHits}/${stats.cacheMisses}`,
      );
    } else if (!isFirstRender) {
      // Move cursor up to overwrite previous status
      process.stdout.write(`\x1B[${STATUS_LINES}A`);
    }
    isFirstRender = false;

    for (const line of renderStatusLines(snapshot, { color })) {
      console.log(`  ${line}\x1B[K`);
    }
  };
  driver.onSnapshot(render);

  const shutdown = () => {
    driver.stop();
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
      process.stdin.pause();
    }
    logger.flush();
    process.exitCode = 0;
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  // "w" cycles through the window presets, "q" or Ctrl-C quits
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
    process.stdin.setEncoding("utf8");
    process.stdin.on("data", (key: string) => {
      if (key === "q" || key === "\u0003") {
        shutdown();
      } else if (key === "w") {
        driver.setWindow(nextPreset(driver.window)).catch((error: unknown) => {
          logger.error({ err: errorMessage(error) }, "window change failed");
        });
      }
    });
  }

  logger.info({ window: initialWindow.kind === "preset" ? initialWindow.preset : "custom" }, "usagedash started");
  driver.start();
}

main().catch((error: unknown) => {
  if (error instanceof InvalidWindowError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
