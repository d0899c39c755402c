/**
 * Poll Scheduler
 *
 * Runs a cycle immediately, then every intervalMs measured start-to-start.
 * Cycles never overlap: the next one is only scheduled once the current one
 * has settled. stop() aborts the in-flight cycle and waits for it.
 * A failed cycle is logged and handed to onCycleError, if given.
 */

import { info, error as logError } from "../utils/logger.js";
import type { Clock } from "./types.js";

export type CycleTask = (signal: AbortSignal) => Promise<unknown>;
export type CycleErrorHook = (err: unknown) => Promise<void>;

export class PollScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private stopped = true;
  private cycles = 0;

  constructor(
    private readonly task: CycleTask,
    private readonly intervalMs: number,
    private readonly clock: Clock,
    private readonly onCycleError?: CycleErrorHook
  ) {}

  get completedCycles(): number {
    return this.cycles;
  }

  get isRunning(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    info("Scheduler", `Polling every ${Math.round(this.intervalMs / 1000)}s`);
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    if (this.running) {
      await this.running;
    }
    info("Scheduler", "Stopped");
  }

  private schedule(delayMs: number): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.running = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const startedAt = this.clock.now();
    this.controller = new AbortController();

    try {
      await this.task(this.controller.signal);
    } catch (err) {
      logError("Scheduler", "Cycle failed", err);
      await this.reportFailure(err);
    } finally {
      this.cycles++;
      this.controller = null;
      this.running = null;
    }

    // a clock stepping backwards must not stretch the interval
    const elapsed = Math.max(0, this.clock.now() - startedAt);
    this.schedule(Math.max(0, this.intervalMs - elapsed));
  }

  private async reportFailure(err: unknown): Promise<void> {
    if (!this.onCycleError) return;
    try {
      await this.onCycleError(err);
    } catch (hookErr) {
      logError("Scheduler", "Cycle error hook failed", hookErr);
    }
  }
}
