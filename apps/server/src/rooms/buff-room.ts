import {
  DEFAULT_POISON_CONFIG_ID,
  type BuffApplyMessage,
  type BuffKind,
  type BuffRefreshMessage,
  type BuffRemoveMessage,
  type BuffStateMessage,
  type PoisonApplyMessage,
  type PoisonCureMessage,
} from "@tickbound/shared";
import { createModuleLogger } from "@tickbound/shared-servers";
import { Room, type Client } from "@colyseus/core";
import type { BuffEvent, BuffEventListener } from "../buffs/buff-events";
import * as CommandHandler from "../commands/commands";
import { FileSaveStore } from "../persistence/file-save-store";
import { PoisonConfigRegistry } from "../status/poison/poison-config-registry";
import { BuffWorld } from "../world/buff-world";
import { GameEntity, HealthComponent } from "../world/entities/game-entity";

const logger = createModuleLogger("buff-room");

const DEFAULT_PLAYER_HP = 99;
const MAX_NAME_LENGTH = 32;

export interface BuffRoomOptions {
  tickSeconds: number;
  saveDir: string;
  poisonConfigPath: string;
  canonicalPoisonConfigId?: string;
  ignoredKinds?: BuffKind[];
}

export interface BuffJoinOptions {
  name?: string;
}

const sanitizeName = (name: unknown, fallback: string): string => {
  if (typeof name !== "string") {
    return fallback;
  }
  const cleaned = name.trim().replace(/[^A-Za-z0-9_-]/g, "").slice(0, MAX_NAME_LENGTH);
  return cleaned.length > 0 ? cleaned : fallback;
};

/**
 * Hosts a buff world. Each client owns one entity; buff changes are pushed to the owner
 * as `buff_state` after the frame they happen in.
 */
export class BuffRoom extends Room {
  maxClients = 100;

  private world?: BuffWorld;
  private store?: FileSaveStore;
  private readonly entityBySession = new Map<string, string>();
  private readonly dirtyEntities = new Set<string>();
  private readonly stateListener: BuffEventListener = {
    onBuffEvent: (event: BuffEvent) => {
      this.dirtyEntities.add(event.instance.entity.id);
    },
  };

  async onCreate(options: BuffRoomOptions) {
    const poisonConfigs = await PoisonConfigRegistry.fromFile(
      options.poisonConfigPath,
      logger.child({ component: "poison-config-registry" }),
    );
    const store = new FileSaveStore(options.saveDir, logger.child({ component: "file-save-store" }));
    await store.hydrate();
    this.store = store;

    const world = new BuffWorld({
      store,
      poisonConfigs,
      tickPeriodSeconds: options.tickSeconds,
      canonicalPoisonConfigId: options.canonicalPoisonConfigId ?? DEFAULT_POISON_CONFIG_ID,
      ignoredKinds: options.ignoredKinds,
      logger,
    });
    world.service.addEventListener(this.stateListener);
    this.world = world;

    this.setSimulationInterval((deltaTime) => {
      world.advance(deltaTime);
      this.flushBuffState();
    });

    // Bind messages
    this.onMessage("buff_apply", (client, data: BuffApplyMessage) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        CommandHandler.applyBuffCommand({ world, entityId, data });
      }
    });

    this.onMessage("buff_refresh", (client, data: BuffRefreshMessage) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        CommandHandler.refreshBuffCommand({ world, entityId, data });
      }
    });

    this.onMessage("buff_remove", (client, data: BuffRemoveMessage) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        CommandHandler.removeBuffCommand({ world, entityId, data });
      }
    });

    this.onMessage("poison_apply", (client, data: PoisonApplyMessage) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        CommandHandler.applyPoisonCommand({ world, entityId, data });
      }
    });

    this.onMessage("poison_cure", (client, data: PoisonCureMessage) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        CommandHandler.curePoisonCommand({ world, entityId, data });
      }
    });

    this.onMessage("save", (client) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        world.saveEntity(entityId);
      }
    });

    this.onMessage("load", (client) => {
      const entityId = this.entityIdFor(client);
      if (entityId) {
        world.loadEntity(entityId);
        this.dirtyEntities.add(entityId);
      }
    });

    logger.info({ roomId: this.roomId, poisonConfigs: poisonConfigs.size }, "BuffRoom created");
  }

  onJoin(client: Client, options: BuffJoinOptions = {}) {
    const world = this.world;
    if (!world) {
      return;
    }
    const entityId = `player-${client.sessionId}`;
    const entity = new GameEntity(entityId, sanitizeName(options.name, client.sessionId));
    entity.combatTarget = new HealthComponent(DEFAULT_PLAYER_HP);
    world.addEntity(entity, { load: true });
    this.entityBySession.set(client.sessionId, entityId);
    this.dirtyEntities.add(entityId);
    logger.info({ entityId, name: entity.name }, "Player joined buff room");
  }

  onLeave(client: Client) {
    const entityId = this.entityBySession.get(client.sessionId);
    this.entityBySession.delete(client.sessionId);
    if (!entityId) {
      return;
    }
    this.world?.removeEntity(entityId);
    this.dirtyEntities.delete(entityId);
    logger.info({ entityId }, "Player left buff room");
  }

  async onDispose() {
    this.world?.dispose();
    await this.store?.flush();
    logger.info({ roomId: this.roomId }, "BuffRoom disposed");
  }

  private entityIdFor(client: Client): string | undefined {
    const entityId = this.entityBySession.get(client.sessionId);
    if (!entityId) {
      logger.warn({ sessionId: client.sessionId }, "No entity for client");
    }
    return entityId;
  }

  private flushBuffState(): void {
    const world = this.world;
    if (!world || this.dirtyEntities.size === 0) {
      return;
    }
    for (const [sessionId, entityId] of this.entityBySession) {
      if (!this.dirtyEntities.has(entityId)) {
        continue;
      }
      const client = this.clients.find((candidate) => candidate.sessionId === sessionId);
      if (client) {
        const payload: BuffStateMessage = {
          entityId,
          buffs: CommandHandler.buildBuffTimerViews(world, entityId),
        };
        client.send("buff_state", payload);
      }
    }
    this.dirtyEntities.clear();
  }
}
