import {
  INDEFINITE_TICKS,
  getDurationTicks,
  getIntervalTicks,
  normalizeBuffDefinition,
  resolveDisplayName,
  resolveWarningTicks,
  type BuffDefinition,
  type BuffKind,
  type BuffSourceType,
} from "@tickbound/shared";
import type { EntityHandle } from "../world/entities/game-entity";
import type { BuffContext } from "./buff-events";

export const createBuffKey = (entityId: string, kind: BuffKind): string => `${entityId}:${kind}`;

/**
 * Runtime state of one tracked buff. Owned by the registry; entities never hold these.
 */
export class BuffTimerInstance {
  readonly key: string;
  readonly entity: EntityHandle;
  readonly sequenceId: number;
  private currentDefinition: BuffDefinition;
  private currentSourceType: BuffSourceType;
  private currentSourceId: string;
  private remaining = INDEFINITE_TICKS;
  private duration = INDEFINITE_TICKS;
  private interval = 0;
  private warning = 0;

  constructor(
    entity: EntityHandle,
    context: BuffContext,
    sequenceId: number,
    private readonly tickPeriodSeconds: number,
  ) {
    this.entity = entity;
    this.sequenceId = sequenceId;
    this.currentDefinition = normalizeBuffDefinition(context.definition);
    this.key = createBuffKey(entity.id, this.currentDefinition.kind);
    this.currentSourceType = context.sourceType;
    this.currentSourceId = this.currentDefinition.kind;
    this.applyContext(context, true);
  }

  get definition(): BuffDefinition {
    return this.currentDefinition;
  }

  get kind(): BuffKind {
    return this.currentDefinition.kind;
  }

  get sourceType(): BuffSourceType {
    return this.currentSourceType;
  }

  get sourceId(): string {
    return this.currentSourceId;
  }

  get remainingTicks(): number {
    return this.remaining;
  }

  get durationTicks(): number {
    return this.duration;
  }

  /** Loop length in ticks; zero for buffs that do not recur. */
  get intervalTicks(): number {
    return this.interval;
  }

  get warningTicks(): number {
    return this.warning;
  }

  get hasDuration(): boolean {
    return this.duration > 0;
  }

  get isRecurring(): boolean {
    return this.currentDefinition.isRecurring;
  }

  get isIndefinite(): boolean {
    return this.duration < 0 && !this.currentDefinition.isRecurring;
  }

  get displayName(): string {
    return resolveDisplayName(this.currentDefinition);
  }

  get canWarn(): boolean {
    return this.currentDefinition.showExpiryWarning && this.warning > 0;
  }

  /**
   * Replace the definition and source metadata, then reset or keep the countdown.
   */
  applyContext(context: BuffContext, initial = false): void {
    const wasRecurring = this.currentDefinition.isRecurring;
    const previousInterval = this.interval;

    this.currentDefinition = normalizeBuffDefinition(context.definition);
    this.currentSourceType = context.sourceType;
    this.currentSourceId = context.sourceId ? context.sourceId : this.currentDefinition.kind;
    this.duration = getDurationTicks(this.currentDefinition, this.tickPeriodSeconds);
    this.interval = this.currentDefinition.isRecurring
      ? getIntervalTicks(this.currentDefinition, this.tickPeriodSeconds)
      : 0;
    this.warning = resolveWarningTicks(this.currentDefinition, this.duration);

    const intervalChanged = !initial && wasRecurring && this.isRecurring && previousInterval !== this.interval;
    if (initial || context.resetTimer || intervalChanged) {
      this.resetTimer();
      return;
    }
    this.remaining = this.clampRemainingTicks(this.remaining);
  }

  /** Restart the countdown from the current definition. */
  resetTimer(): void {
    if (this.isRecurring) {
      this.remaining = Math.max(1, this.interval);
    } else if (this.duration > 0) {
      this.remaining = this.duration;
    } else {
      this.remaining = INDEFINITE_TICKS;
    }
  }

  /**
   * Set the countdown directly. The value is forced into the range the current
   * definition allows.
   */
  setRemainingTicks(ticks: number): void {
    this.remaining = this.clampRemainingTicks(ticks);
  }

  /**
   * One countdown step. Returns the new remaining value; indefinite buffs do not move.
   */
  countDown(): number {
    if (this.isIndefinite) {
      return this.remaining;
    }
    this.remaining = Math.max(0, this.remaining - 1);
    return this.remaining;
  }

  /** Normalized progress for countdown animations. */
  getProgress01(): number {
    if (!this.hasDuration) {
      return 0;
    }
    return Math.min(1, Math.max(0, 1 - this.remaining / this.duration));
  }

  private clampRemainingTicks(ticks: number): number {
    if (this.isRecurring) {
      const interval = Math.max(1, this.interval);
      if (!Number.isFinite(ticks) || ticks <= 0 || ticks > interval) {
        return interval;
      }
      return Math.max(1, Math.trunc(ticks));
    }
    if (this.duration > 0) {
      if (!Number.isFinite(ticks) || ticks <= 0) {
        return this.duration;
      }
      return Math.min(this.duration, Math.max(1, Math.trunc(ticks)));
    }
    return INDEFINITE_TICKS;
  }
}
