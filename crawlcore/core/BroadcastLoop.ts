//crawlcore/core/BroadcastLoop.ts

import { tickPeriodMs } from "../config/netConfig";
import { createMessage } from "../shared/messages";
import { encodeMessageFrame } from "../protocol/MessageCodec";
import { Logger } from "../utils/logger";
import type { SessionManager } from "./SessionManager";
import type { StateStore } from "./StateStore";

export interface BroadcastLoopConfig {
  /** Full-snapshot broadcasts per second. */
  tickRate: number;

  /** Called after each tick with its number (starting at 1) and duration. */
  onTick?: (tick: number, elapsedMs: number) => void;
}

/**
 * BroadcastLoop
 *
 * Pushes the whole snapshot to every session once per period:
 *  - encodes a `game_state` frame inside one store critical section
 *  - hands the frame to each session without waiting for delivery
 *  - sleeps max(0, period - elapsed); a slow tick is not made up later
 */
export class BroadcastLoop {
  private readonly log = Logger.scope("BROADCAST");
  readonly periodMs: number;

  private running = false;
  private handle: NodeJS.Timeout | null = null;
  private ticks = 0;

  constructor(
    private readonly store: StateStore,
    private readonly sessions: SessionManager,
    private readonly cfg: BroadcastLoopConfig,
  ) {
    this.periodMs = tickPeriodMs({ tickRate: Math.max(cfg.tickRate, 1) });
  }

  get tickCount(): number {
    return this.ticks;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.log.info("Starting broadcast loop", {
      tickRate: this.cfg.tickRate,
      periodMs: Number(this.periodMs.toFixed(2)),
    });

    this.schedule(0);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }

    this.log.info("Broadcast loop stopped", { lastTick: this.ticks });
  }

  /**
   * One iteration: encode under the lock, release, fan out.
   * Returns how many sessions the frame was handed to.
   */
  runOnce(): number {
    const frame = this.store.withLock((state) =>
      encodeMessageFrame(createMessage("game_state", state)),
    );

    this.ticks++;
    return this.sessions.broadcastFrame(frame, "game_state");
  }

  private schedule(delayMs: number): void {
    this.handle = setTimeout(() => this.iterate(), delayMs);
  }

  private iterate(): void {
    if (!this.running) return;

    const startedAt = performance.now();
    try {
      this.runOnce();
    } catch (err) {
      this.log.error("Broadcast tick failed", { tick: this.ticks, err });
    }
    const elapsed = performance.now() - startedAt;

    try {
      this.cfg.onTick?.(this.ticks, elapsed);
    } catch (err) {
      this.log.warn("Error in BroadcastLoop onTick hook", { err });
    }

    if (this.ticks % 300 === 0) {
      this.log.debug("Broadcast summary", {
        tick: this.ticks,
        sessions: this.sessions.count(),
        elapsedMs: Number(elapsed.toFixed(3)),
      });
    }

    if (this.running) {
      this.schedule(Math.max(0, this.periodMs - elapsed));
    }
  }
}
