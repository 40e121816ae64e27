import { DEFAULT_MAX_TRACKED_BUFFS, TICK_SECONDS, type BuffKind } from "@tickbound/shared";
import { createModuleLogger, type Logger } from "@tickbound/shared-servers";
import type { Tickable, Ticker } from "../clock/ticker";
import type { EntityHandle } from "../world/entities/game-entity";
import type { BuffContext, BuffEvent, BuffEventListener } from "./buff-events";
import { BuffTimerInstance, createBuffKey } from "./buff-timer-instance";

export interface BuffTimerServiceOptions {
  /** Tick source. The service subscribes while at least one buff is tracked. */
  ticker?: Ticker;
  /** Used when no ticker is given. */
  tickPeriodSeconds?: number;
  /** Hard limit to stop runaway buff spawning. */
  maxTrackedBuffs?: number;
  /** Log state transitions at debug level. */
  logDebugMessages?: boolean;
  logger?: Logger;
}

/**
 * Registry of timed buffs keyed by (entity, kind). Advances every tracked timer once per
 * tick and notifies listeners synchronously, in ascending sequence order within a tick.
 *
 * Listeners run inside the mutating call. A listener that removes the key it was told about
 * (for example from a buff_started handler) recurses into buff_ended before the outer call
 * returns; that is single-threaded reentrancy and safe.
 */
export class BuffTimerService implements Tickable {
  readonly tickPeriodSeconds: number;
  private readonly buffs = new Map<string, BuffTimerInstance>();
  private readonly listeners: BuffEventListener[] = [];
  private readonly ticker?: Ticker;
  private readonly maxTrackedBuffs: number;
  private readonly logDebugMessages: boolean;
  private readonly logger: Logger;
  private sequenceCounter = 0;
  private subscribedToTicker = false;

  constructor(options: BuffTimerServiceOptions = {}) {
    this.ticker = options.ticker;
    this.tickPeriodSeconds = options.ticker?.tickPeriodSeconds ?? options.tickPeriodSeconds ?? TICK_SECONDS;
    this.maxTrackedBuffs = Math.max(1, options.maxTrackedBuffs ?? DEFAULT_MAX_TRACKED_BUFFS);
    this.logDebugMessages = options.logDebugMessages ?? false;
    this.logger = options.logger ?? createModuleLogger("buff-timer-service");
  }

  /** Register a buff event listener; duplicate listeners are ignored. */
  addEventListener(listener: BuffEventListener): void {
    if (this.listeners.includes(listener)) {
      return;
    }
    this.listeners.push(listener);
  }

  /** Remove a previously registered buff event listener. */
  removeEventListener(listener: BuffEventListener): void {
    for (let i = this.listeners.length - 1; i >= 0; i -= 1) {
      if (this.listeners[i] === listener) {
        this.listeners.splice(i, 1);
      }
    }
  }

  clearEventListeners(): void {
    this.listeners.length = 0;
  }

  get activeBuffs(): ReadonlyMap<string, BuffTimerInstance> {
    return this.buffs;
  }

  get size(): number {
    return this.buffs.size;
  }

  /**
   * Start a buff, or update the existing one for the same key. A new key always starts
   * from a full countdown; an existing key resets only when the context asks for it.
   */
  apply(context: BuffContext): BuffTimerInstance | undefined {
    const entity = context.entity;
    if (!entity) {
      return undefined;
    }

    const key = createBuffKey(entity.id, context.definition.kind);
    const existing = this.buffs.get(key);
    if (existing) {
      existing.applyContext(context);
      this.log("Refreshed buff", existing);
      this.emit({ type: "buff_updated", instance: existing });
      return existing;
    }

    const instance = this.track(entity, context);
    if (!instance) {
      return undefined;
    }
    this.log("Started buff", instance);
    this.emit({ type: "buff_started", instance });
    return instance;
  }

  /**
   * Update metadata without resetting the countdown. A refresh for an untracked key starts it.
   */
  refresh(context: BuffContext): BuffTimerInstance | undefined {
    return this.apply({ ...context, resetTimer: false });
  }

  /**
   * End a buff immediately. Missing keys are ignored.
   *
   * @returns true when a buff was removed.
   */
  remove(entityId: string, kind: BuffKind): boolean {
    const key = createBuffKey(entityId, kind);
    const instance = this.buffs.get(key);
    if (!instance) {
      return false;
    }
    this.buffs.delete(key);
    this.log("Removed buff", instance);
    this.emit({ type: "buff_ended", instance, reason: "Manual" });
    this.releaseTickerSubscriptionIfIdle();
    return true;
  }

  /** End every buff on an entity, in sequence order. */
  removeAllFor(entityId: string): number {
    let removed = 0;
    for (const instance of this.getBuffsFor(entityId)) {
      if (this.remove(entityId, instance.kind)) {
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Transplant saved state into the registry. Behaves like a refresh that also sets the
   * countdown, and emits buff_restored instead of buff_started so listeners that react to
   * new buffs do not treat a reload as a fresh application.
   */
  restore(context: BuffContext, remainingTicks: number): BuffTimerInstance | undefined {
    const entity = context.entity;
    if (!entity) {
      return undefined;
    }

    const key = createBuffKey(entity.id, context.definition.kind);
    let instance = this.buffs.get(key);
    if (instance) {
      instance.applyContext({ ...context, resetTimer: false });
    } else {
      instance = this.track(entity, { ...context, resetTimer: true });
      if (!instance) {
        return undefined;
      }
    }

    instance.setRemainingTicks(remainingTicks);
    this.log("Restored buff", instance);
    this.emit({ type: "buff_restored", instance });
    this.emit({ type: "buff_updated", instance });
    return instance;
  }

  /** True when the key is already tracked or the capacity limit leaves room for it. */
  canTrack(entityId: string, kind: BuffKind): boolean {
    return this.buffs.has(createBuffKey(entityId, kind)) || this.buffs.size < this.maxTrackedBuffs;
  }

  tryGetBuff(entityId: string, kind: BuffKind): BuffTimerInstance | undefined {
    return this.buffs.get(createBuffKey(entityId, kind));
  }

  /** Snapshot of an entity's buffs in ascending sequence order. */
  getBuffsFor(entityId: string): BuffTimerInstance[] {
    const result: BuffTimerInstance[] = [];
    for (const instance of this.buffs.values()) {
      if (instance.entity.id === entityId) {
        result.push(instance);
      }
    }
    return result.sort((a, b) => a.sequenceId - b.sequenceId);
  }

  /** Drop every buff without notifying listeners. */
  clear(): void {
    this.buffs.clear();
    this.releaseTickerSubscriptionIfIdle();
  }

  onTick(): void {
    const snapshot = [...this.buffs.values()].sort((a, b) => a.sequenceId - b.sequenceId);
    let removedAny = false;

    for (const instance of snapshot) {
      // Removed or replaced by a listener earlier in this tick
      if (!this.isLive(instance) || instance.isIndefinite) {
        continue;
      }

      if (instance.isRecurring) {
        if (instance.countDown() <= 0) {
          this.emit({ type: "buff_looped", instance });
          instance.resetTimer();
        }
        this.emit({ type: "buff_updated", instance });
        continue;
      }

      if (!instance.hasDuration) {
        continue;
      }

      const remaining = instance.countDown();
      if (instance.canWarn && remaining === instance.warningTicks) {
        this.emit({ type: "buff_warning", instance });
        if (!this.isLive(instance)) {
          continue;
        }
      }

      if (remaining <= 0) {
        this.buffs.delete(instance.key);
        removedAny = true;
        this.log("Buff expired", instance);
        this.emit({ type: "buff_ended", instance, reason: "Expired" });
      } else {
        this.emit({ type: "buff_updated", instance });
      }
    }

    if (removedAny) {
      this.releaseTickerSubscriptionIfIdle();
    }
  }

  private track(entity: EntityHandle, context: BuffContext): BuffTimerInstance | undefined {
    if (this.buffs.size >= this.maxTrackedBuffs) {
      this.logger.warn(
        { entityId: entity.id, kind: context.definition.kind, maxTrackedBuffs: this.maxTrackedBuffs },
        "Buff capacity reached; ignoring new buff",
      );
      return undefined;
    }
    this.sequenceCounter += 1;
    const instance = new BuffTimerInstance(entity, context, this.sequenceCounter, this.tickPeriodSeconds);
    this.buffs.set(instance.key, instance);
    this.ensureTickerSubscription();
    return instance;
  }

  private isLive(instance: BuffTimerInstance): boolean {
    return this.buffs.get(instance.key) === instance;
  }

  private ensureTickerSubscription(): void {
    if (this.subscribedToTicker || !this.ticker) {
      return;
    }
    this.ticker.subscribe(this);
    this.subscribedToTicker = true;
  }

  private releaseTickerSubscriptionIfIdle(): void {
    if (!this.subscribedToTicker || this.buffs.size > 0) {
      return;
    }
    this.ticker?.unsubscribe(this);
    this.subscribedToTicker = false;
  }

  /** Notify all registered buff event listeners. */
  private emit(event: BuffEvent): void {
    for (const listener of [...this.listeners]) {
      listener.onBuffEvent(event);
    }
  }

  private log(message: string, instance: BuffTimerInstance): void {
    if (!this.logDebugMessages) {
      return;
    }
    this.logger.debug(
      {
        entityId: instance.entity.id,
        kind: instance.kind,
        remainingTicks: instance.remainingTicks,
        sequenceId: instance.sequenceId,
      },
      message,
    );
  }
}
