import pino from "pino";
import { DEFAULT_REFRESH_INTERVAL_MS } from "./constants.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { presetWindow, validateWindowSpec, windowSpecKey } from "./time-window.js";
import type { Snapshot, WindowSpec } from "./types.js";

/** The part of the engine the driver needs */
export interface SnapshotSource {
  query(spec: WindowSpec): Promise<Snapshot>;
}

export interface RefreshDriverOptions {
  intervalMs?: number;
  logger?: Logger;
  initialWindow?: WindowSpec;
}

export type SnapshotListener = (snapshot: Snapshot) => void;

/**
 * Periodic rebuild loop between the engine and the renderer.
 *
 * Ticks that land while a build is running are dropped. A window change
 * starts its own build straight away; whichever result arrives for a window
 * that is no longer selected, or after a newer one was applied, is thrown
 * away. The renderer reads `current()` and never waits on a build.
 */
export class RefreshDriver {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly listeners = new Set<SnapshotListener>();

  private windowSpec: WindowSpec;
  private snapshot: Snapshot | null = null;
  private error: Error | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private nextSequence = 0;
  private appliedSequence = -1;
  private skipped = 0;

  constructor(
    private readonly source: SnapshotSource,
    options: RefreshDriverOptions = {},
  ) {
    this.intervalMs = Math.max(1, options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS);
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "refresh-driver",
    });
    const initial = options.initialWindow ?? presetWindow("week-monday-9am");
    validateWindowSpec(initial);
    this.windowSpec = initial;
  }

  get window(): WindowSpec {
    return this.windowSpec;
  }

  get lastError(): Error | null {
    return this.error;
  }

  /** Ticks dropped because a build was still running */
  get skippedTicks(): number {
    return this.skipped;
  }

  get running(): boolean {
    return this.timer != null;
  }

  current(): Snapshot | null {
    return this.snapshot;
  }

  onSnapshot(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Build once right away, then on every interval
   */
  start(): void {
    if (this.timer != null) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  stop(): void {
    if (this.timer != null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One scheduled refresh. Resolves when the build finishes, or at once when
   * the tick is skipped.
   */
  tick(): Promise<void> {
    if (this.inFlight != null) {
      this.skipped++;
      this.logger.trace("tick skipped, build in flight");
      return Promise.resolve();
    }
    return this.launch();
  }

  /**
   * Switch windows. Throws InvalidWindowError synchronously for a bad custom
   * window and leaves the selection and current snapshot as they were.
   */
  setWindow(spec: WindowSpec): Promise<void> {
    validateWindowSpec(spec);
    this.windowSpec = spec;
    return this.launch();
  }

  /** Resolves once every build started so far has settled */
  async idle(): Promise<void> {
    while (this.inFlight != null) {
      await this.inFlight;
    }
  }

  private launch(): Promise<void> {
    const sequence = this.nextSequence++;
    const spec = this.windowSpec;

    const build = this.source.query(spec).then(
      (snapshot) => this.apply(sequence, spec, snapshot),
      (error: unknown) => this.fail(sequence, spec, error),
    );
    const tracked = build.finally(() => {
      if (this.inFlight === tracked) {
        this.inFlight = null;
      }
    });
    this.inFlight = tracked;
    return tracked;
  }

  private isCurrent(sequence: number, spec: WindowSpec): boolean {
    return (
      sequence > this.appliedSequence &&
      windowSpecKey(spec) === windowSpecKey(this.windowSpec)
    );
  }

  private apply(sequence: number, spec: WindowSpec, snapshot: Snapshot): void {
    if (!this.isCurrent(sequence, spec)) {
      this.logger.debug({ sequence, window: windowSpecKey(spec) }, "discarded superseded snapshot");
      return;
    }
    this.appliedSequence = sequence;
    this.snapshot = snapshot;
    this.error = null;

    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error({ err: errorMessage(error) }, "snapshot listener failed");
      }
    }
  }

  private fail(sequence: number, spec: WindowSpec, error: unknown): void {
    if (!this.isCurrent(sequence, spec)) {
      return;
    }
    this.error = error instanceof Error ? error : new Error(errorMessage(error));
    this.logger.error(
      { sequence, window: windowSpecKey(spec), err: this.error.message },
      "snapshot build failed",
    );
  }
}
