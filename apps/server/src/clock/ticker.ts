import { TICK_SECONDS } from "@tickbound/shared";

/** Receives one callback per game tick. */
export interface Tickable {
  onTick(): void;
}

/**
 * Fixed-rate tick source consumed by the buff engine.
 */
export interface Ticker {
  readonly tickPeriodSeconds: number;
  subscribe(tickable: Tickable): void;
  unsubscribe(tickable: Tickable): void;
  isSubscribed(tickable: Tickable): boolean;
  /** Seconds until the next tick fires. Presentation only. */
  timeUntilNextTick(): number;
}

export class TickerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TickerConfigError";
  }
}

/**
 * Ticker driven by an external simulation loop. Elapsed milliseconds are accumulated
 * and one tick fires for every full period, so a long frame replays the ticks it covered.
 */
export class FixedTicker implements Ticker {
  readonly tickPeriodSeconds: number;
  private readonly tickPeriodMs: number;
  private readonly tickables: Tickable[] = [];
  private elapsedMs = 0;
  private tickCount = 0;

  constructor(tickPeriodSeconds: number = TICK_SECONDS) {
    if (!Number.isFinite(tickPeriodSeconds) || tickPeriodSeconds <= 0) {
      throw new TickerConfigError("FixedTicker period must be positive.");
    }
    this.tickPeriodSeconds = tickPeriodSeconds;
    this.tickPeriodMs = tickPeriodSeconds * 1000;
  }

  get currentTick(): number {
    return this.tickCount;
  }

  get subscriberCount(): number {
    return this.tickables.length;
  }

  /** Register a tickable; duplicates are ignored. */
  subscribe(tickable: Tickable): void {
    if (this.tickables.includes(tickable)) {
      return;
    }
    this.tickables.push(tickable);
  }

  unsubscribe(tickable: Tickable): void {
    const index = this.tickables.indexOf(tickable);
    if (index !== -1) {
      this.tickables.splice(index, 1);
    }
  }

  isSubscribed(tickable: Tickable): boolean {
    return this.tickables.includes(tickable);
  }

  timeUntilNextTick(): number {
    return Math.max(0, (this.tickPeriodMs - this.elapsedMs) / 1000);
  }

  /**
   * Feed elapsed wall time into the ticker.
   *
   * @returns number of ticks fired.
   */
  advance(deltaMs: number): number {
    if (!Number.isFinite(deltaMs) || deltaMs <= 0) {
      return 0;
    }
    this.elapsedMs += deltaMs;
    let fired = 0;
    while (this.elapsedMs >= this.tickPeriodMs) {
      this.elapsedMs -= this.tickPeriodMs;
      this.tick();
      fired += 1;
    }
    return fired;
  }

  /**
   * Fire a single tick immediately. Tickables removed by an earlier callback in the
   * same tick are skipped; ones added during the tick wait for the next.
   */
  tick(): void {
    this.tickCount += 1;
    const snapshot = [...this.tickables];
    for (const tickable of snapshot) {
      if (!this.tickables.includes(tickable)) {
        continue;
      }
      tickable.onTick();
    }
  }
}
