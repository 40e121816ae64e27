import { DEFAULT_POISON_CONFIG_ID, type BuffKind } from "@tickbound/shared";
import { createModuleLogger, type Logger } from "@tickbound/shared-servers";
import { BuffTimerService } from "../buffs/buff-timer-service";
import { FixedTicker } from "../clock/ticker";
import { buffSaveKeyFor } from "../persistence/buff-save-codec";
import { BuffStateSaveBridge } from "../persistence/buff-state-save-bridge";
import type { SaveManager } from "../persistence/save-manager";
import { AntifireProtection } from "../status/antifire/antifire-protection";
import { FrozenStatusController } from "../status/freeze/frozen-status-controller";
import { PoisonController } from "../status/poison/poison-controller";
import type { PoisonConfigRegistry } from "../status/poison/poison-config-registry";
import type { GameEntity } from "./entities/game-entity";
import { EntityDirectory } from "./entity-directory";

export interface BuffWorldOptions {
  store: SaveManager;
  poisonConfigs: PoisonConfigRegistry;
  tickPeriodSeconds?: number;
  canonicalPoisonConfigId?: string;
  /** Kinds the save bridges leave to another system. */
  ignoredKinds?: readonly BuffKind[];
  maxTrackedBuffs?: number;
  logDebugMessages?: boolean;
  logger?: Logger;
}

/** Per-entity controllers created when an entity joins the world. */
export interface EntityBuffComponents {
  entity: GameEntity;
  poison: PoisonController;
  freeze: FrozenStatusController;
  antifire: AntifireProtection;
  saveBridge: BuffStateSaveBridge;
}

export interface AddEntityOptions {
  /** Defaults to `buffs_<entity name>`. */
  saveKey?: string;
  /** Restore saved buffs right away. */
  load?: boolean;
}

/**
 * Composition root for the buff engine: one ticker, one timer service and the
 * per-entity controllers wired to them.
 */
export class BuffWorld {
  readonly ticker: FixedTicker;
  readonly service: BuffTimerService;
  readonly entities = new EntityDirectory();
  readonly store: SaveManager;
  readonly poisonConfigs: PoisonConfigRegistry;
  private readonly components = new Map<string, EntityBuffComponents>();
  private readonly canonicalPoisonConfigId: string;
  private readonly ignoredKinds: readonly BuffKind[];
  private readonly logger: Logger;

  constructor(options: BuffWorldOptions) {
    this.logger = options.logger ?? createModuleLogger("buff-world");
    this.ticker = new FixedTicker(options.tickPeriodSeconds);
    this.service = new BuffTimerService({
      ticker: this.ticker,
      maxTrackedBuffs: options.maxTrackedBuffs,
      logDebugMessages: options.logDebugMessages,
      logger: this.logger.child({ component: "buff-timer-service" }),
    });
    this.store = options.store;
    this.poisonConfigs = options.poisonConfigs;
    this.canonicalPoisonConfigId = options.canonicalPoisonConfigId ?? DEFAULT_POISON_CONFIG_ID;
    this.ignoredKinds = options.ignoredKinds ?? [];
  }

  /** Feed wall time from the host loop. Returns the number of ticks fired. */
  advance(deltaMs: number): number {
    return this.ticker.advance(deltaMs);
  }

  addEntity(entity: GameEntity, options: AddEntityOptions = {}): EntityBuffComponents {
    const existing = this.components.get(entity.id);
    if (existing) {
      return existing;
    }

    const resolveService = () => this.service;
    const poison = new PoisonController(entity, {
      ticker: this.ticker,
      resolveService,
      logger: this.logger.child({ component: "poison-controller" }),
    });
    entity.poison = poison;
    this.entities.register(entity);

    const freeze = new FrozenStatusController(entity, resolveService, this.ticker);
    const antifire = new AntifireProtection(entity, resolveService);
    const saveBridge = new BuffStateSaveBridge({
      entityId: entity.id,
      saveKey: options.saveKey ?? buffSaveKeyFor(entity.name),
      store: this.store,
      ticker: this.ticker,
      resolveService,
      resolveEntity: () => this.entities.resolve(entity.id),
      resolvePoisonController: () => this.entities.resolve(entity.id)?.poison,
      poisonConfigs: this.poisonConfigs,
      canonicalPoisonConfigId: this.canonicalPoisonConfigId,
      ignoredKinds: this.ignoredKinds,
      logger: this.logger.child({ component: "buff-state-save-bridge" }),
    });

    const components: EntityBuffComponents = { entity, poison, freeze, antifire, saveBridge };
    this.components.set(entity.id, components);
    freeze.enable();
    saveBridge.enable();
    if (options.load) {
      saveBridge.load();
    }
    this.logger.debug({ entityId: entity.id }, "Entity added to buff world");
    return components;
  }

  /**
   * Save and detach an entity. Its live buffs end with reason Manual.
   *
   * @returns false when the entity was not in the world.
   */
  removeEntity(entityId: string): boolean {
    const components = this.components.get(entityId);
    if (!components) {
      return false;
    }
    components.saveBridge.disable();
    components.freeze.disable();
    components.poison.disable();
    this.service.removeAllFor(entityId);
    this.components.delete(entityId);
    this.entities.unregister(entityId);
    components.entity.poison = undefined;
    this.logger.debug({ entityId }, "Entity removed from buff world");
    return true;
  }

  getComponents(entityId: string): EntityBuffComponents | undefined {
    return this.components.get(entityId);
  }

  saveEntity(entityId: string): boolean {
    const components = this.components.get(entityId);
    components?.saveBridge.save();
    return components !== undefined;
  }

  loadEntity(entityId: string): boolean {
    const components = this.components.get(entityId);
    components?.saveBridge.load();
    return components !== undefined;
  }

  saveAll(): number {
    for (const components of this.components.values()) {
      components.saveBridge.save();
    }
    return this.components.size;
  }

  /** Save and remove every entity, then drop whatever the service still tracks. */
  dispose(): void {
    for (const entityId of [...this.components.keys()]) {
      this.removeEntity(entityId);
    }
    this.service.clear();
    this.service.clearEventListeners();
  }
}
