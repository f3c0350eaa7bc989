import { appendFileSync, mkdirSync, mkdtempSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import type { Logger } from "../../src/logger.js";
import type { LogFileStat, UsageRecord } from "../../src/types.js";

export const silentLogger: Logger = pino({ level: "silent" });

export interface UsageLineOptions {
  timestamp?: string | null;
  model?: string;
  input?: number;
  output?: number;
  cacheRead?: number;
  cacheCreation?: number;
  messageId?: string;
  requestId?: string;
  sessionId?: string;
  costUSD?: number;
}

/**
 * One assistant transcript line (no trailing newline)
 */
export function usageLine(options: UsageLineOptions = {}): string {
  const usage: Record<string, number> = {
    input_tokens: options.input ?? 0,
    output_tokens: options.output ?? 0,
  };
  if (options.cacheRead != null) usage.cache_read_input_tokens = options.cacheRead;
  if (options.cacheCreation != null) usage.cache_creation_input_tokens = options.cacheCreation;

  return JSON.stringify({
    type: "assistant",
    ...(options.timestamp === null
      ? {}
      : { timestamp: options.timestamp ?? "2025-03-03T10:00:00.000Z" }),
    sessionId: options.sessionId,
    requestId: options.requestId,
    costUSD: options.costUSD,
    message: {
      id: options.messageId,
      model: options.model ?? "claude-sonnet-4-5-20250929",
      usage,
    },
  });
}

export function makeRecord(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    identity: "line:/tmp/projects/demo/s.jsonl:0",
    timestamp: new Date("2025-03-03T10:00:00.000Z"),
    projectId: "demo",
    sessionId: "s",
    model: "claude-sonnet-4-5-20250929",
    inputTokens: 0,
    outputTokens: 0,
    cacheReadTokens: 0,
    cacheCreationTokens: 0,
    reportedCostUSD: null,
    sourceFile: "/tmp/projects/demo/s.jsonl",
    byteOffset: 0,
    ...overrides,
  };
}

export function statOf(filePath: string, mtimeMs: number): LogFileStat {
  return { path: filePath, size: statSync(filePath).size, mtimeMs };
}

/**
 * A throwaway `projects` root under the OS temp directory
 */
export class ProjectsFixture {
  readonly base: string;
  readonly root: string;

  constructor() {
    this.base = mkdtempSync(join(tmpdir(), "usagedash-test-"));
    this.root = join(this.base, "projects");
    mkdirSync(this.root, { recursive: true });
  }

  file(project: string, name: string): string {
    const dir = join(this.root, project);
    mkdirSync(dir, { recursive: true });
    return join(dir, name);
  }

  write(project: string, name: string, lines: readonly string[]): string {
    const filePath = this.file(project, name);
    writeFileSync(filePath, lines.map((line) => `${line}\n`).join(""));
    return filePath;
  }

  append(filePath: string, text: string): void {
    appendFileSync(filePath, text);
  }

  cleanup(): void {
    rmSync(this.base, { recursive: true, force: true });
  }
}

export interface CapturedLogs {
  readonly logger: Logger;
  /** `msg` of every line written so far */
  messages(): string[];
}

/**
 * Logger that keeps its JSON lines in memory
 */
export function captureLogger(level = "debug"): CapturedLogs {
  const lines: string[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        lines.push(line);
      },
    },
  );
  return {
    logger,
    messages: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === "object" && parsed !== null && "msg" in parsed
          ? String(parsed.msg)
          : "";
      }),
  };
}
