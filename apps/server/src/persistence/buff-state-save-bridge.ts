import {
  BUFF_SAVE_VERSION,
  DEFAULT_POISON_CONFIG_ID,
  resolvePoisonIntervalSeconds,
  type BuffKind,
  type BuffSaveDocument,
  type BuffSaveEntry,
} from "@tickbound/shared";
import { createModuleLogger, type Logger } from "@tickbound/shared-servers";
import type { BuffEvent, BuffEventListener } from "../buffs/buff-events";
import type { BuffTimerInstance } from "../buffs/buff-timer-instance";
import type { BuffTimerService } from "../buffs/buff-timer-service";
import type { Tickable, Ticker } from "../clock/ticker";
import type { PoisonConfigRegistry } from "../status/poison/poison-config-registry";
import type { PoisonController } from "../status/poison/poison-controller";
import type { GameEntity } from "../world/entities/game-entity";
import { decodeBuffSaveDocument, definitionFromEntry } from "./buff-save-codec";
import type { SaveManager } from "./save-manager";

export type SaveBridgeState = "idle" | "capturing" | "deferred" | "restoring";

export interface BuffStateSaveBridgeOptions {
  entityId: string;
  saveKey: string;
  store: SaveManager;
  ticker: Ticker;
  resolveService: () => BuffTimerService | undefined;
  resolveEntity: () => GameEntity | undefined;
  resolvePoisonController: () => PoisonController | undefined;
  poisonConfigs: PoisonConfigRegistry;
  /** Config every restored poison is rebuilt from. */
  canonicalPoisonConfigId?: string;
  /** Kinds persisted by another system. */
  ignoredKinds?: readonly BuffKind[];
  logger?: Logger;
}

interface PendingRestore {
  entry: BuffSaveEntry;
  /** Set once the timer has gone through the service, so a retry never replays it. */
  timerRestored: boolean;
  /** The service already refused this timer once; later refusals are not logged again. */
  refused: boolean;
}

const CAPTURED_EVENTS: ReadonlySet<BuffEvent["type"]> = new Set<BuffEvent["type"]>([
  "buff_started",
  "buff_updated",
  "buff_restored",
  "buff_ended",
]);

/**
 * Persists one entity's buff timers and restores them on load.
 *
 * While enabled the bridge mirrors every change for its entity into a cached document,
 * so a save still has data when the service is briefly unreachable. Loading stages the
 * stored entries and replays them once the service, the entity and (for poison) a live
 * poison controller exist; until then a ticker subscription polls once per tick.
 * A restore pass is all-or-nothing: when any dependency is missing nothing is replayed.
 */
export class BuffStateSaveBridge implements BuffEventListener {
  readonly entityId: string;
  readonly saveKey: string;
  private readonly store: SaveManager;
  private readonly ticker: Ticker;
  private readonly resolveService: () => BuffTimerService | undefined;
  private readonly resolveEntity: () => GameEntity | undefined;
  private readonly resolvePoisonController: () => PoisonController | undefined;
  private readonly poisonConfigs: PoisonConfigRegistry;
  private readonly canonicalPoisonConfigId: string;
  private readonly ignoredKinds: ReadonlySet<BuffKind>;
  private readonly logger: Logger;
  private readonly retryPoller: Tickable = {
    onTick: () => {
      this.pollPendingRestores();
    },
  };

  private enabled = false;
  private restoring = false;
  private retryArmed = false;
  private attachedService?: BuffTimerService;
  private cachedDocument?: BuffSaveDocument;
  private pending: PendingRestore[] = [];
  private pendingImmunitySeconds?: number;

  constructor(options: BuffStateSaveBridgeOptions) {
    this.entityId = options.entityId;
    this.saveKey = options.saveKey;
    this.store = options.store;
    this.ticker = options.ticker;
    this.resolveService = options.resolveService;
    this.resolveEntity = options.resolveEntity;
    this.resolvePoisonController = options.resolvePoisonController;
    this.poisonConfigs = options.poisonConfigs;
    this.canonicalPoisonConfigId = options.canonicalPoisonConfigId ?? DEFAULT_POISON_CONFIG_ID;
    this.ignoredKinds = new Set(options.ignoredKinds ?? []);
    this.logger = (options.logger ?? createModuleLogger("buff-state-save-bridge")).child({
      entityId: options.entityId,
    });
  }

  get state(): SaveBridgeState {
    if (this.restoring) {
      return "restoring";
    }
    if (this.retryArmed) {
      return "deferred";
    }
    return this.enabled ? "capturing" : "idle";
  }

  /** Records staged by `load()` that have not been fully restored yet. */
  get pendingCount(): number {
    return this.pending.length;
  }

  get cachedSnapshot(): BuffSaveDocument | undefined {
    return this.cachedDocument;
  }

  enable(): void {
    if (this.enabled) {
      return;
    }
    this.enabled = true;
    const service = this.attachToService();
    if (service) {
      this.cachedDocument = this.buildDocument(service);
    }
    this.tryRestorePending();
  }

  /** Saves, stops capturing and cancels any pending restore. */
  disable(): void {
    if (!this.enabled) {
      return;
    }
    this.save();
    this.enabled = false;
    this.detachFromService();
    this.stopRetry();
    this.pending = [];
    this.pendingImmunitySeconds = undefined;
  }

  onBuffEvent(event: BuffEvent): void {
    if (!this.enabled || event.instance.entity.id !== this.entityId || !CAPTURED_EVENTS.has(event.type)) {
      return;
    }
    if (this.attachedService) {
      this.cachedDocument = this.buildDocument(this.attachedService);
    }
  }

  /**
   * Write the entity's buffs to the store. Falls back to the cached document when the
   * service is unreachable, and keeps entries that are still waiting to be restored.
   */
  save(): void {
    const service = this.resolveService();
    const document = service ? this.buildDocument(service) : this.cachedWithLiveImmunity();
    const merged = this.mergePending(document);

    if (!merged || (merged.entries.length === 0 && merged.poisonImmunitySeconds <= 0)) {
      this.store.delete(this.saveKey);
      this.logger.debug({ saveKey: this.saveKey }, "No buff state to save; cleared record");
      return;
    }

    this.store.save(this.saveKey, merged);
    this.logger.debug({ saveKey: this.saveKey, entries: merged.entries.length }, "Saved buff state");
  }

  /** Read the stored document and try to restore it right away. */
  load(): void {
    this.pending = [];
    this.pendingImmunitySeconds = undefined;

    const document = decodeBuffSaveDocument(this.store.load(this.saveKey), this.logger);
    if (!document) {
      this.stopRetry();
      return;
    }

    for (const entry of document.entries) {
      if (this.ignoredKinds.has(entry.kind)) {
        continue;
      }
      this.pending.push({ entry, timerRestored: false, refused: false });
    }
    if (document.poisonImmunitySeconds > 0) {
      this.pendingImmunitySeconds = document.poisonImmunitySeconds;
    }

    this.logger.debug({ saveKey: this.saveKey, entries: this.pending.length }, "Loaded buff state");
    this.tryRestorePending();
  }

  /**
   * Replay staged records when every dependency is ready.
   *
   * @returns true when nothing is left to restore.
   */
  tryRestorePending(): boolean {
    if (this.pending.length === 0 && this.pendingImmunitySeconds === undefined) {
      this.stopRetry();
      return true;
    }

    const service = this.resolveService();
    const entity = this.resolveEntity();
    if (!service || !entity) {
      this.armRetry();
      return false;
    }

    const controller = this.resolvePoisonController();
    const needsPoison = this.pending.some((record) => record.entry.kind === "Poison");
    if (needsPoison && !(controller?.enabled === true && controller.hasLiveTarget)) {
      this.armRetry();
      return false;
    }

    if (this.enabled) {
      this.attachToService();
    }

    this.restoring = true;
    const requeued: PendingRestore[] = [];
    for (const record of this.pending) {
      if (!record.timerRestored) {
        const instance = service.restore(
          {
            entity,
            definition: definitionFromEntry(record.entry),
            sourceType: record.entry.sourceType,
            sourceId: record.entry.sourceId,
            resetTimer: false,
          },
          record.entry.remainingTicks,
        );
        if (!instance) {
          if (!record.refused) {
            record.refused = true;
            this.logger.warn({ kind: record.entry.kind }, "Buff service refused a restored timer; keeping it pending");
          }
          requeued.push(record);
          continue;
        }
        record.timerRestored = true;
      }
      if (record.entry.kind === "Poison" && controller && !this.restorePoisonState(controller, record.entry)) {
        requeued.push(record);
      }
    }
    this.pending = requeued;

    if (this.pendingImmunitySeconds !== undefined) {
      if (controller) {
        controller.immunityTimer = Math.max(controller.immunityTimer, this.pendingImmunitySeconds);
      }
      this.pendingImmunitySeconds = undefined;
    }
    this.restoring = false;

    if (this.pending.length > 0) {
      this.logger.debug({ requeued: this.pending.length }, "Poison restore not ready; retrying next tick");
      this.armRetry();
      return false;
    }
    this.stopRetry();
    return true;
  }

  private restorePoisonState(controller: PoisonController, entry: BuffSaveEntry): boolean {
    const config = this.poisonConfigs.resolve(this.canonicalPoisonConfigId);
    if (!config || entry.poisonCurrentDamage <= 0) {
      controller.immunityTimer = Math.max(controller.immunityTimer, entry.poisonImmunityTimer);
      return true;
    }

    if (entry.sourceId.toLowerCase() !== config.id.toLowerCase()) {
      this.logger.warn(
        { savedConfigId: entry.sourceId, canonicalConfigId: config.id },
        "Saved poison config differs from canonical config; restoring with canonical",
      );
    }

    const restored = controller.restorePoison(config, {
      currentDamage: entry.poisonCurrentDamage,
      ticksSinceDecay: entry.poisonTicksSinceDecay,
      tickTimer: resolvePoisonIntervalSeconds(config) - entry.poisonTimeToNextTick,
    });
    if (!restored) {
      return false;
    }
    controller.immunityTimer = entry.poisonImmunityTimer;
    return true;
  }

  private pollPendingRestores(): void {
    if (!this.enabled) {
      this.stopRetry();
      return;
    }
    this.tryRestorePending();
  }

  private armRetry(): void {
    if (this.retryArmed || !this.enabled) {
      return;
    }
    this.retryArmed = true;
    this.ticker.subscribe(this.retryPoller);
  }

  private stopRetry(): void {
    if (!this.retryArmed) {
      return;
    }
    this.retryArmed = false;
    this.ticker.unsubscribe(this.retryPoller);
  }

  private attachToService(): BuffTimerService | undefined {
    const service = this.resolveService();
    if (service === this.attachedService) {
      return service;
    }
    this.detachFromService();
    if (service) {
      service.addEventListener(this);
      this.attachedService = service;
    }
    return service;
  }

  private detachFromService(): void {
    this.attachedService?.removeEventListener(this);
    this.attachedService = undefined;
  }

  private buildDocument(service: BuffTimerService): BuffSaveDocument {
    const controller = this.resolvePoisonController();
    const entries: BuffSaveEntry[] = [];
    for (const instance of service.getBuffsFor(this.entityId)) {
      if (this.ignoredKinds.has(instance.kind)) {
        continue;
      }
      entries.push(this.entryFromInstance(instance, controller));
    }
    return {
      version: BUFF_SAVE_VERSION,
      entityId: this.entityId,
      entries,
      poisonImmunitySeconds: controller?.immunityTimer ?? 0,
    };
  }

  private entryFromInstance(instance: BuffTimerInstance, controller: PoisonController | undefined): BuffSaveEntry {
    const definition = instance.definition;
    const entry: BuffSaveEntry = {
      ...definition,
      sourceType: instance.sourceType,
      sourceId: instance.sourceId,
      remainingTicks: instance.remainingTicks,
      poisonCurrentDamage: 0,
      poisonTicksSinceDecay: 0,
      poisonTimeToNextTick: 0,
      poisonImmunityTimer: 0,
    };

    if (instance.kind === "Poison" && controller) {
      const effect = controller.activeEffect;
      if (effect?.isActive) {
        entry.poisonCurrentDamage = effect.currentDamage;
        entry.poisonTicksSinceDecay = effect.ticksSinceDecay;
        entry.poisonTimeToNextTick = effect.timeToNextTick;
      }
      entry.poisonImmunityTimer = controller.immunityTimer;
    }
    return entry;
  }

  /**
   * The cached document with immunity read from the live controller, since immunity can
   * change without any buff event reaching the cache.
   */
  private cachedWithLiveImmunity(): BuffSaveDocument | undefined {
    const controller = this.resolvePoisonController();
    if (!controller) {
      return this.cachedDocument;
    }
    const immunity = controller.immunityTimer;
    const base: BuffSaveDocument = this.cachedDocument ?? {
      version: BUFF_SAVE_VERSION,
      entityId: this.entityId,
      entries: [],
      poisonImmunitySeconds: 0,
    };
    return {
      ...base,
      entries: base.entries.map((entry) =>
        entry.kind === "Poison" ? { ...entry, poisonImmunityTimer: immunity } : entry,
      ),
      poisonImmunitySeconds: immunity,
    };
  }

  /** Entries still waiting to be restored are carried into the saved document. */
  private mergePending(document: BuffSaveDocument | undefined): BuffSaveDocument | undefined {
    if (this.pending.length === 0 && this.pendingImmunitySeconds === undefined) {
      return document;
    }
    const base: BuffSaveDocument = document
      ? { ...document, entries: [...document.entries] }
      : { version: BUFF_SAVE_VERSION, entityId: this.entityId, entries: [], poisonImmunitySeconds: 0 };

    for (const record of this.pending) {
      const index = base.entries.findIndex((entry) => entry.kind === record.entry.kind);
      const live = base.entries[index];
      if (index === -1 || !live) {
        base.entries.push(record.entry);
      } else {
        // A restored timer keeps its live countdown; the rest comes from the staged record
        base.entries[index] = record.timerRestored
          ? { ...record.entry, remainingTicks: live.remainingTicks }
          : record.entry;
      }
    }
    base.poisonImmunitySeconds = Math.max(base.poisonImmunitySeconds, this.pendingImmunitySeconds ?? 0);
    return base;
  }
}
