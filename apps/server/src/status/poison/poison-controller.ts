import {
  TICK_EPSILON,
  getDurationTicks,
  resolvePoisonIntervalSeconds,
  type BuffDefinition,
  type PoisonConfig,
} from "@tickbound/shared";
import { createModuleLogger, type Logger } from "@tickbound/shared-servers";
import type { BuffContext } from "../../buffs/buff-events";
import type { BuffTimerService } from "../../buffs/buff-timer-service";
import type { Tickable, Ticker } from "../../clock/ticker";
import type { GameEntity } from "../../world/entities/game-entity";
import { PoisonEffect } from "./poison-effect";

export interface PoisonControllerOptions {
  ticker: Ticker;
  /** Timer service the poison buff is reported to. May be missing while the world boots. */
  resolveService: () => BuffTimerService | undefined;
  logger?: Logger;
}

/** Saved progress of a running poison. */
export interface PoisonRestoreState {
  currentDamage: number;
  ticksSinceDecay: number;
  /** Seconds accumulated towards the next hit. */
  tickTimer: number;
}

export interface PoisonControllerListener {
  onPoisonTick?(damage: number): void;
  onPoisonEnd?(): void;
}

/**
 * Total poison lifetime in seconds from first hit to the floor; zero when it never decays.
 */
export const calculatePoisonLifetimeSeconds = (config: PoisonConfig): number => {
  if (config.decayAmountPerStep <= 0 || config.hitsPerDecayStep <= 0) {
    return 0;
  }
  const decaySteps = Math.max(
    1,
    Math.ceil((config.startDamagePerTick - config.minDamagePerTick) / config.decayAmountPerStep),
  );
  return Math.max(0, decaySteps * config.hitsPerDecayStep * resolvePoisonIntervalSeconds(config));
};

/**
 * Poison buff timer definition. Apply and removal payloads share it so the timer
 * listeners always see the same metadata.
 */
export const createPoisonBuffDefinition = (config: PoisonConfig, durationSeconds: number): BuffDefinition => ({
  kind: "Poison",
  displayName: "Poison",
  iconId: config.id ? config.id.toLowerCase() : "poison",
  durationSeconds: durationSeconds > 0 ? durationSeconds : 0,
  recurringIntervalSeconds: 0,
  isRecurring: false,
  showExpiryWarning: false,
  expiryWarningTicks: 0,
});

/**
 * Owns the poison effect of one entity: immunity window, damage cadence and the
 * poison buff timer shown to players.
 */
export class PoisonController implements Tickable {
  private readonly ticker: Ticker;
  private readonly resolveService: () => BuffTimerService | undefined;
  private readonly logger: Logger;
  private readonly listeners: PoisonControllerListener[] = [];
  private active?: PoisonEffect;
  private immunity = 0;
  private ticksUntilDamage = 0;
  private intervalTicks = 0;
  private isEnabled = true;

  constructor(
    private readonly entity: GameEntity,
    options: PoisonControllerOptions,
  ) {
    this.ticker = options.ticker;
    this.resolveService = options.resolveService;
    this.logger = options.logger ?? createModuleLogger("poison-controller");
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  /** True when the entity has a combat target that is still alive. */
  get hasLiveTarget(): boolean {
    return this.entity.combatTarget?.isAlive === true;
  }

  get activeEffect(): PoisonEffect | undefined {
    return this.active;
  }

  get isPoisoned(): boolean {
    return this.active?.isActive === true;
  }

  get isImmune(): boolean {
    return this.immunity > 0;
  }

  /** Remaining immunity in seconds. */
  get immunityTimer(): number {
    return this.immunity;
  }

  set immunityTimer(seconds: number) {
    this.immunity = Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
    this.syncTickerSubscription();
  }

  /** Ticks left until the next poison hit, for cooldown displays. */
  get ticksUntilNextDamage(): number {
    return this.ticksUntilDamage;
  }

  addListener(listener: PoisonControllerListener): void {
    if (!this.listeners.includes(listener)) {
      this.listeners.push(listener);
    }
  }

  removeListener(listener: PoisonControllerListener): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * Poison the entity, restarting any poison already running.
   *
   * @returns false when the controller is disabled or immune, the target is missing or dead,
   * no config is given, or the timer service has no room for the poison buff.
   */
  applyPoison(config: PoisonConfig | undefined): boolean {
    if (!config || !this.isEnabled || this.isImmune) {
      return false;
    }
    if (!this.hasLiveTarget || !this.canReportTimer()) {
      return false;
    }

    const effect = this.replaceEffect(config);
    effect.apply();
    this.configureTickCadence(config, effect.tickTimer);
    this.syncTickerSubscription();
    if (!this.reportPoisonTimer(config, calculatePoisonLifetimeSeconds(config))) {
      this.discardEffect(effect);
      return false;
    }
    return true;
  }

  /**
   * Re-prime a poison from saved progress. Unlike `applyPoison` this ignores immunity and
   * never reports the poison buff as a new one: a running poison from another config is
   * swapped out without ending its timer, and a missing timer is restored, not started.
   *
   * @returns false when the controller is disabled, the target is missing or dead, the saved
   * state carries no damage, or the timer service has no room for the poison buff.
   */
  restorePoison(config: PoisonConfig, state: PoisonRestoreState): boolean {
    if (!this.isEnabled || !this.hasLiveTarget || !(state.currentDamage > 0)) {
      return false;
    }
    if (!this.canReportTimer()) {
      return false;
    }

    const effect = this.replaceEffect(config);
    effect.apply();
    effect.restoreState(state.currentDamage, state.ticksSinceDecay, state.tickTimer);
    this.configureTickCadence(config, effect.tickTimer);
    this.syncTickerSubscription();
    if (!this.reportPoisonTimer(config, this.remainingLifetimeSeconds(effect), true)) {
      this.discardEffect(effect);
      return false;
    }
    return true;
  }

  /**
   * Remove any poison and grant immunity for at least `immunitySeconds`.
   */
  curePoison(immunitySeconds = 0): void {
    this.active?.forceEnd();
    this.active = undefined;
    this.ticksUntilDamage = 0;
    this.intervalTicks = 0;
    const grant = Number.isFinite(immunitySeconds) ? immunitySeconds : 0;
    this.immunityTimer = Math.max(this.immunity, grant);
  }

  /** Recompute the hit countdown from the effect's current timer. Used after restores. */
  refreshTickCountdown(): void {
    if (!this.active) {
      this.ticksUntilDamage = 0;
      this.intervalTicks = 0;
      this.syncTickerSubscription();
      return;
    }
    this.configureTickCadence(this.active.config, this.active.tickTimer);
    this.syncTickerSubscription();
  }

  /**
   * Reissue the poison buff timer with the lifetime left in the current effect state, so
   * the countdown matches after a restore.
   */
  resyncBuffTimerWithState(): void {
    const effect = this.active;
    if (!effect?.isActive) {
      return;
    }
    this.reportPoisonTimer(effect.config, this.remainingLifetimeSeconds(effect));
  }

  onTick(): void {
    const period = this.ticker.tickPeriodSeconds;
    if (this.immunity > 0) {
      this.immunity = Math.max(0, this.immunity - period);
    }

    const effect = this.active;
    if (!effect) {
      this.syncTickerSubscription();
      return;
    }

    if (!this.hasLiveTarget) {
      effect.forceEnd();
      return;
    }

    if (this.ticksUntilDamage > 0) {
      this.ticksUntilDamage -= 1;
    }
    effect.advance(period, (amount) => {
      this.entity.combatTarget?.applyDamage(amount, "poison");
    });
  }

  enable(): void {
    this.isEnabled = true;
    this.syncTickerSubscription();
  }

  /** Disabling ends any running poison; immunity is kept. */
  disable(): void {
    this.isEnabled = false;
    this.active?.forceEnd();
    this.active = undefined;
    this.ticksUntilDamage = 0;
    this.intervalTicks = 0;
    this.ticker.unsubscribe(this);
  }

  private createEffect(config: PoisonConfig): PoisonEffect {
    const effect: PoisonEffect = new PoisonEffect(config, {
      onPoisonTick: (damage) => {
        this.ticksUntilDamage = this.intervalTicks;
        for (const listener of [...this.listeners]) {
          listener.onPoisonTick?.(damage);
        }
      },
      onPoisonEnd: () => {
        this.handlePoisonEnded(effect);
      },
    });
    return effect;
  }

  /** Reuse the running effect for the same config; otherwise install a new one. */
  private replaceEffect(config: PoisonConfig): PoisonEffect {
    const current = this.active;
    if (current && current.config === config) {
      return current;
    }
    const next = this.createEffect(config);
    this.active = next;
    // Superseded: ends without touching the poison timer, which now belongs to `next`
    current?.forceEnd();
    return next;
  }

  /** Drop an effect whose buff timer was refused, without reporting a removal. */
  private discardEffect(effect: PoisonEffect): void {
    if (this.active === effect) {
      this.active = undefined;
    }
    effect.forceEnd();
    this.ticksUntilDamage = 0;
    this.intervalTicks = 0;
    this.syncTickerSubscription();
    this.logger.warn(
      { entityId: this.entity.id, configId: effect.config.id },
      "Buff service refused the poison timer; poison not applied",
    );
  }

  private handlePoisonEnded(effect: PoisonEffect): void {
    if (this.active !== effect) {
      return;
    }
    this.active = undefined;
    this.ticksUntilDamage = 0;
    this.intervalTicks = 0;
    this.resolveService()?.remove(this.entity.id, "Poison");
    this.syncTickerSubscription();
    this.logger.debug({ entityId: this.entity.id, configId: effect.config.id }, "Poison ended");
    for (const listener of [...this.listeners]) {
      listener.onPoisonEnd?.();
    }
  }

  private configureTickCadence(config: PoisonConfig, currentTickTimer: number): void {
    const period = this.ticker.tickPeriodSeconds;
    const intervalSeconds = resolvePoisonIntervalSeconds(config);
    this.intervalTicks = Math.max(1, Math.ceil(intervalSeconds / period - TICK_EPSILON));
    const clampedTimer = Math.min(Math.max(0, currentTickTimer), intervalSeconds);
    const remainingSeconds = Math.max(0, intervalSeconds - clampedTimer);
    const remainingTicks = Math.ceil(remainingSeconds / period - TICK_EPSILON);
    this.ticksUntilDamage = Math.min(Math.max(0, remainingTicks), this.intervalTicks);
  }

  /** Tick while poisoned or immune; idle otherwise. */
  private syncTickerSubscription(): void {
    const needsTicks = this.isEnabled && (this.active !== undefined || this.immunity > 0);
    if (needsTicks) {
      this.ticker.subscribe(this);
    } else {
      this.ticker.unsubscribe(this);
    }
  }

  private remainingLifetimeSeconds(effect: PoisonEffect): number {
    const config = effect.config;
    const lifetimeSeconds = calculatePoisonLifetimeSeconds(config);
    if (lifetimeSeconds <= 0) {
      return 0;
    }
    const intervalSeconds = resolvePoisonIntervalSeconds(config);
    const decayAmount = Math.max(1, config.decayAmountPerStep);
    const hitsPerStep = Math.max(1, config.hitsPerDecayStep);
    const totalDecaySteps = Math.max(
      1,
      Math.ceil((config.startDamagePerTick - config.minDamagePerTick) / decayAmount),
    );
    const damageDelta = Math.max(0, config.startDamagePerTick - effect.currentDamage);
    const completedSteps = Math.min(Math.floor(damageDelta / decayAmount), totalDecaySteps);
    const ticksIntoCurrentStep = Math.min(Math.max(0, effect.ticksSinceDecay), hitsPerStep - 1);
    const ticksConsumed = completedSteps * hitsPerStep + ticksIntoCurrentStep;
    const partialTimer = Math.min(Math.max(0, effect.tickTimer), intervalSeconds);
    const elapsedSeconds = ticksConsumed * intervalSeconds + partialTimer;
    return Math.max(0, lifetimeSeconds - elapsedSeconds);
  }

  private canReportTimer(): boolean {
    const service = this.resolveService();
    return !service || service.canTrack(this.entity.id, "Poison");
  }

  /**
   * @returns false when the service refused a new poison key. Without a service there is
   * nothing to report to and the effect runs untracked.
   */
  private reportPoisonTimer(config: PoisonConfig, durationSeconds: number, restoring = false): boolean {
    const service = this.resolveService();
    if (!service) {
      return true;
    }
    const context: BuffContext = {
      entity: this.entity,
      definition: createPoisonBuffDefinition(config, durationSeconds),
      sourceType: "Combat",
      sourceId: config.id,
      resetTimer: true,
    };
    if (restoring && !service.tryGetBuff(this.entity.id, "Poison")) {
      const fullTicks = getDurationTicks(context.definition, service.tickPeriodSeconds);
      return service.restore(context, fullTicks) !== undefined;
    }
    return service.apply(context) !== undefined;
  }
}
