import { TICK_EPSILON, resolvePoisonIntervalSeconds, type PoisonConfig } from "@tickbound/shared";

export interface PoisonEffectHooks {
  /** Called after every poison hit with the damage it dealt. */
  onPoisonTick?: (damage: number) => void;
  /** Called once when the poison runs out or is forced to end. */
  onPoisonEnd?: () => void;
}

/**
 * Runtime poison state. Damage is dealt once per interval and drops by a fixed step
 * after every `hitsPerDecayStep` hits; the poison ends once it reaches the configured floor.
 */
export class PoisonEffect {
  private active = false;
  private damage = 0;
  private hitsSinceDecay = 0;
  private timer = 0;

  constructor(
    readonly config: PoisonConfig,
    private readonly hooks: PoisonEffectHooks = {},
  ) {}

  get isActive(): boolean {
    return this.active;
  }

  get currentDamage(): number {
    return this.damage;
  }

  get ticksSinceDecay(): number {
    return this.hitsSinceDecay;
  }

  /** Seconds accumulated toward the next hit, in [0, tickIntervalSeconds). */
  get tickTimer(): number {
    return this.timer;
  }

  /** Seconds until the next hit, clamped to [0, tickIntervalSeconds]. */
  get timeToNextTick(): number {
    const interval = resolvePoisonIntervalSeconds(this.config);
    return Math.min(interval, Math.max(0, interval - this.timer));
  }

  /** Start or restart from full strength. */
  apply(): void {
    this.active = true;
    this.damage = this.config.startDamagePerTick;
    this.hitsSinceDecay = 0;
    this.timer = 0;
  }

  /**
   * Progress the poison by `deltaSeconds`, dealing one hit for every interval boundary crossed.
   */
  advance(deltaSeconds: number, dealDamage?: (amount: number) => void): void {
    if (!this.active || !Number.isFinite(deltaSeconds) || deltaSeconds <= 0) {
      return;
    }
    const interval = resolvePoisonIntervalSeconds(this.config);
    this.timer += deltaSeconds;

    while (this.active && this.timer + TICK_EPSILON >= interval) {
      this.timer = Math.max(0, this.timer - interval);
      const hit = this.damage;
      dealDamage?.(hit);
      this.hooks.onPoisonTick?.(hit);

      this.hitsSinceDecay += 1;
      if (this.hitsSinceDecay >= this.config.hitsPerDecayStep) {
        this.hitsSinceDecay = 0;
        this.damage = Math.max(
          this.config.minDamagePerTick,
          this.damage - this.config.decayAmountPerStep,
        );
      }
      if (this.damage <= this.config.minDamagePerTick) {
        this.end();
      }
    }
  }

  forceEnd(): void {
    if (!this.active) {
      return;
    }
    this.end();
  }

  /**
   * Restore saved state without dealing damage. Out of range values are clamped to what
   * the config allows.
   */
  restoreState(currentDamage: number, ticksSinceDecay: number, tickTimer: number): void {
    const interval = resolvePoisonIntervalSeconds(this.config);
    this.damage = Number.isFinite(currentDamage) ? Math.max(0, Math.trunc(currentDamage)) : 0;
    this.hitsSinceDecay = Number.isFinite(ticksSinceDecay)
      ? Math.min(Math.max(0, Math.trunc(ticksSinceDecay)), Math.max(0, this.config.hitsPerDecayStep - 1))
      : 0;
    const timer = Number.isFinite(tickTimer) ? tickTimer : 0;
    this.timer = Math.min(interval, Math.max(0, timer));
    this.active = this.damage > 0;
  }

  private end(): void {
    this.active = false;
    this.hooks.onPoisonEnd?.();
  }
}
