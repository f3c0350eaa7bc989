import { open, type FileHandle } from "node:fs/promises";
import { READ_CHUNK_BYTES } from "./constants.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { lineLocation, parseUsageLine, type LineLocation } from "./record-parser.js";
import type { LogFileStat, UsageRecord } from "./types.js";

/** Bytes compared at the start of a file to notice it was replaced */
const HEAD_SIGNATURE_BYTES = 64;

interface FileState {
  /** end of the last complete line consumed */
  offset: number;
  size: number;
  mtimeMs: number;
  head: Buffer;
  skippedLines: number;
  /** every record this file produced, including ones another file owns */
  readonly records: Map<string, UsageRecord>;
}

export interface SyncReport {
  readonly filesRead: number;
  readonly bytesRead: number;
  readonly recordsAdded: number;
  readonly recordsRemoved: number;
  readonly skippedLines: number;
  readonly unreadableFiles: number;
}

interface ReadResult {
  readonly rewritten: boolean;
  readonly start: number;
  readonly consumedTo: number;
  readonly head: Buffer;
  readonly records: UsageRecord[];
  readonly skippedLines: number;
}

/**
 * Running, deduplicated set of usage records for one engine.
 *
 * Each file is read once from the start and afterwards only for the bytes
 * appended since the last sync. A file that shrank, or whose start or line
 * boundary changed, has its previous records dropped and is re-derived from
 * scratch. Identity decides uniqueness: the first file to report an identity
 * owns it, other observers are kept so a copy can take over when the owner
 * is invalidated.
 */
export class UsageAggregator {
  private readonly files = new Map<string, FileState>();
  /** identity -> files that reported it, first one is canonical */
  private readonly observers = new Map<string, string[]>();
  private readonly unreadable = new Set<string>();
  private readonly logger: Logger;

  private cachedRecords: readonly UsageRecord[] | null = null;
  private parseCount = 0;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "aggregator" });
  }

  /** Number of lines handed to the parser since construction */
  get parseInvocations(): number {
    return this.parseCount;
  }

  get size(): number {
    return this.observers.size;
  }

  get skippedLines(): number {
    let total = 0;
    for (const state of this.files.values()) {
      total += state.skippedLines;
    }
    return total;
  }

  get unreadableFiles(): number {
    return this.unreadable.size;
  }

  /**
   * Bring the record set up to date with the given file listing.
   */
  async sync(files: readonly LogFileStat[]): Promise<SyncReport> {
    let filesRead = 0;
    let bytesRead = 0;
    let recordsAdded = 0;
    let recordsRemoved = 0;

    const listed = new Set(files.map((file) => file.path));
    for (const path of this.unreadable) {
      if (!listed.has(path)) {
        this.unreadable.delete(path);
      }
    }

    for (const file of files) {
      const state = this.files.get(file.path);
      if (
        state != null &&
        state.size === file.size &&
        state.mtimeMs === file.mtimeMs
      ) {
        continue;
      }

      let result: ReadResult;
      try {
        result = await this.readFile(file, state);
      } catch (error) {
        // Previous contribution stays as it was
        this.unreadable.add(file.path);
        this.logger.warn(
          { file: file.path, err: errorMessage(error) },
          "log file unreadable",
        );
        continue;
      }
      this.unreadable.delete(file.path);
      filesRead++;

      let target = state;
      if (target == null || result.rewritten) {
        if (target != null) {
          recordsRemoved += this.invalidate(file.path, target);
          this.logger.debug({ file: file.path }, "log file rewritten, re-deriving");
        }
        target = {
          offset: 0,
          size: 0,
          mtimeMs: 0,
          head: result.head,
          skippedLines: 0,
          records: new Map(),
        };
        this.files.set(file.path, target);
      }

      bytesRead += result.consumedTo - result.start;
      for (const record of result.records) {
        if (this.observe(file.path, target, record)) {
          recordsAdded++;
        }
      }

      target.offset = result.consumedTo;
      target.size = file.size;
      target.mtimeMs = file.mtimeMs;
      target.head = result.head;
      target.skippedLines += result.skippedLines;
    }

    if (filesRead > 0) {
      this.cachedRecords = null;
    }

    const report: SyncReport = {
      filesRead,
      bytesRead,
      recordsAdded,
      recordsRemoved,
      skippedLines: this.skippedLines,
      unreadableFiles: this.unreadable.size,
    };
    if (filesRead > 0) {
      this.logger.debug(report, "sync complete");
    }
    return report;
  }

  /**
   * Canonical records, one per identity. The array is shared until the next
   * change to the set.
   */
  records(): readonly UsageRecord[] {
    if (this.cachedRecords != null) {
      return this.cachedRecords;
    }

    const records: UsageRecord[] = [];
    for (const [identity, files] of this.observers) {
      const owner = files[0];
      const record = owner != null ? this.files.get(owner)?.records.get(identity) : undefined;
      if (record != null) {
        records.push(record);
      }
    }
    records.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    this.cachedRecords = Object.freeze(records);
    return this.cachedRecords;
  }

  /**
   * Returns true when the identity was new to the whole set
   */
  private observe(filePath: string, state: FileState, record: UsageRecord): boolean {
    if (state.records.has(record.identity)) {
      return false;
    }
    state.records.set(record.identity, record);

    const observers = this.observers.get(record.identity);
    if (observers == null) {
      this.observers.set(record.identity, [filePath]);
      return true;
    }
    observers.push(filePath);
    return false;
  }

  /**
   * Forget everything a file reported. Returns how many identities left the
   * set entirely (no other file still holds them).
   */
  private invalidate(filePath: string, state: FileState): number {
    let removed = 0;
    for (const identity of state.records.keys()) {
      const observers = this.observers.get(identity);
      if (observers == null) {
        continue;
      }
      const remaining = observers.filter((observer) => observer !== filePath);
      if (remaining.length === 0) {
        this.observers.delete(identity);
        removed++;
      } else {
        this.observers.set(identity, remaining);
      }
    }
    this.files.delete(filePath);
    return removed;
  }

  private async readFile(
    file: LogFileStat,
    state: FileState | undefined,
  ): Promise<ReadResult> {
    const handle = await open(file.path, "r");
    try {
      const head = await readAt(handle, 0, Math.min(HEAD_SIGNATURE_BYTES, file.size));
      const rewritten = state != null && (await this.wasRewritten(handle, file, state, head));
      const start = state == null || rewritten ? 0 : state.offset;

      const base = lineLocation(file.path, start);
      const records: UsageRecord[] = [];
      let skippedLines = 0;
      const consumedTo = await readCompleteLines(
        handle,
        start,
        file.size,
        (line, offset) => {
          this.parseCount++;
          const location: LineLocation = { ...base, byteOffset: offset };
          const outcome = parseUsageLine(line, location);
          if (outcome.kind === "record") {
            records.push(outcome.record);
          } else if (outcome.kind === "skipped") {
            skippedLines++;
            this.logger.trace({ file: file.path, offset, reason: outcome.reason }, "line skipped");
          }
        },
        (tail, offset) => {
          // Unterminated last line: counted once it parses, never skipped
          this.parseCount++;
          const outcome = parseUsageLine(tail, { ...base, byteOffset: offset });
          if (outcome.kind === "record") {
            records.push(outcome.record);
          }
        },
      );

      return { rewritten, start, consumedTo, head, records, skippedLines };
    } finally {
      await handle.close();
    }
  }

  private async wasRewritten(
    handle: FileHandle,
    file: LogFileStat,
    state: FileState,
    head: Buffer,
  ): Promise<boolean> {
    if (file.size < state.size) {
      return true;
    }
    if (file.size === state.size) {
      // Same length, new mtime: edited in place
      return true;
    }
    if (!head.subarray(0, state.head.length).equals(state.head)) {
      return true;
    }
    if (state.offset > 0) {
      const boundary = await readAt(handle, state.offset - 1, 1);
      return boundary[0] !== 0x0a;
    }
    return false;
  }
}

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  if (length <= 0) {
    return Buffer.alloc(0);
  }
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  return buffer.subarray(0, bytesRead);
}

/**
 * Feed every newline-terminated line in [start, end) to `onLine` with the
 * byte offset where it begins. Returns the offset just past the last
 * newline. Bytes after it go to `onTail` but are read again next time.
 */
async function readCompleteLines(
  handle: FileHandle,
  start: number,
  end: number,
  onLine: (line: string, offset: number) => void,
  onTail: (line: string, offset: number) => void,
): Promise<number> {
  let position = start;
  let carry: Buffer = Buffer.alloc(0);
  let carryOffset = start;

  while (position < end) {
    const chunk = await readAt(handle, position, Math.min(READ_CHUNK_BYTES, end - position));
    if (chunk.length === 0) {
      break;
    }
    position += chunk.length;

    const data = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
    let lineStart = 0;
    let newline = data.indexOf(0x0a, lineStart);
    while (newline !== -1) {
      onLine(data.toString("utf8", lineStart, newline), carryOffset + lineStart);
      lineStart = newline + 1;
      newline = data.indexOf(0x0a, lineStart);
    }
    carry = data.subarray(lineStart);
    carryOffset += lineStart;
  }

  if (carry.length > 0) {
    onTail(carry.toString("utf8"), carryOffset);
  }
  return carryOffset;
}
