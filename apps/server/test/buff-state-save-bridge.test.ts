import { describe, expect, it, vi } from "vitest";
import type { BuffKind, BuffSaveDocument, BuffSaveEntry } from "@tickbound/shared";
import { createCapturingLogger, createSilentLogger, type Logger } from "@tickbound/shared-servers";
import { BuffTimerService } from "../src/buffs/buff-timer-service";
import { FixedTicker } from "../src/clock/ticker";
import { buffSaveKeyFor, decodeBuffSaveDocument } from "../src/persistence/buff-save-codec";
import { BuffStateSaveBridge } from "../src/persistence/buff-state-save-bridge";
import { MemorySaveStore } from "../src/persistence/save-manager";
import { PoisonConfigRegistry } from "../src/status/poison/poison-config-registry";
import { PoisonController } from "../src/status/poison/poison-controller";
import { HealthComponent, type GameEntity } from "../src/world/entities/game-entity";
import {
  EventRecorder,
  contextFor,
  createPlayer,
  poisonConfig,
  recurringDefinition,
  timedDefinition,
} from "./buff-test-helpers";

interface HarnessOptions {
  canonicalPoisonConfigId?: string;
  poisonIntervalSeconds?: number;
  ignoredKinds?: BuffKind[];
  maxTrackedBuffs?: number;
  logger?: Logger;
}

const createHarness = (options: HarnessOptions = {}) => {
  const logger = options.logger ?? createSilentLogger();
  const ticker = new FixedTicker(1);
  const player = createPlayer();
  const deps: { service?: BuffTimerService; entity?: GameEntity } = {
    service: new BuffTimerService({ ticker, maxTrackedBuffs: options.maxTrackedBuffs, logger }),
    entity: player,
  };
  const controller = new PoisonController(player, {
    ticker,
    resolveService: () => deps.service,
    logger,
  });
  player.poison = controller;
  const store = new MemorySaveStore();
  const saveKey = buffSaveKeyFor(player.name);
  const bridge = new BuffStateSaveBridge({
    entityId: player.id,
    saveKey,
    store,
    ticker,
    resolveService: () => deps.service,
    resolveEntity: () => deps.entity,
    resolvePoisonController: () => deps.entity?.poison,
    poisonConfigs: new PoisonConfigRegistry(
      [
      poisonConfig({ tickIntervalSeconds: options.poisonIntervalSeconds ?? 1 }),
      poisonConfig({ id: "strong_poison", startDamagePerTick: 6 }),
    ],
      logger,
    ),
    canonicalPoisonConfigId: options.canonicalPoisonConfigId,
    ignoredKinds: options.ignoredKinds,
    logger,
  });
  const service = (): BuffTimerService => {
    if (!deps.service) {
      throw new Error("service was detached by the test");
    }
    return deps.service;
  };
  return { ticker, player, deps, controller, store, saveKey, bridge, service };
};

const storedEntry = (overrides: Partial<BuffSaveEntry> & Pick<BuffSaveEntry, "kind">): BuffSaveEntry => ({
  durationSeconds: 10,
  recurringIntervalSeconds: 0,
  isRecurring: false,
  showExpiryWarning: false,
  expiryWarningTicks: 0,
  sourceType: "Potion",
  sourceId: overrides.kind,
  remainingTicks: 6,
  poisonCurrentDamage: 0,
  poisonTicksSinceDecay: 0,
  poisonTimeToNextTick: 0,
  poisonImmunityTimer: 0,
  ...overrides,
});

const poisonEntry = (overrides: Partial<BuffSaveEntry> = {}): BuffSaveEntry =>
  storedEntry({
    kind: "Poison",
    durationSeconds: 8,
    sourceType: "Combat",
    sourceId: "poison",
    remainingTicks: 3,
    poisonCurrentDamage: 2,
    poisonTicksSinceDecay: 1,
    poisonTimeToNextTick: 0.25,
    ...overrides,
  });

const documentOf = (entries: BuffSaveEntry[], poisonImmunitySeconds = 0): BuffSaveDocument => ({
  version: 1,
  entityId: "player-1",
  entries,
  poisonImmunitySeconds,
});

const storedDocument = (store: MemorySaveStore, key: string): BuffSaveDocument | undefined => {
  return decodeBuffSaveDocument(store.load(key), createSilentLogger());
};

describe("BuffStateSaveBridge", () => {
  it("moves from idle to capturing when enabled", () => {
    const { bridge } = createHarness();

    expect(bridge.state).toBe("idle");
    bridge.enable();
    expect(bridge.state).toBe("capturing");
  });

  it("round-trips the remaining countdown of a recurring buff", () => {
    const { ticker, player, bridge, store, saveKey, service } = createHarness();
    bridge.enable();
    service().apply(contextFor(player, recurringDefinition("PrayerRenewal", 5)));
    ticker.tick();
    ticker.tick();
    ticker.tick();

    bridge.save();
    service().clear();
    bridge.load();

    expect(storedDocument(store, saveKey)?.entries[0]).toMatchObject({
      kind: "PrayerRenewal",
      isRecurring: true,
      recurringIntervalSeconds: 5,
      remainingTicks: 2,
    });
    expect(service().tryGetBuff(player.id, "PrayerRenewal")?.remainingTicks).toBe(2);
  });

  it("saves the cached snapshot when the service is unreachable", () => {
    const { ticker, player, deps, bridge, store, saveKey, service } = createHarness();
    bridge.enable();
    service().apply(contextFor(player, timedDefinition("Antifire", 10)));
    ticker.tick();
    ticker.tick();

    expect(bridge.cachedSnapshot?.entries[0]?.remainingTicks).toBe(8);
    deps.service = undefined;
    bridge.save();

    const document = storedDocument(store, saveKey);
    expect(document?.entries).toHaveLength(1);
    expect(document?.entries[0]).toMatchObject({ kind: "Antifire", remainingTicks: 8 });
  });

  it("deletes the record when there is nothing to save", () => {
    const { bridge, store, saveKey } = createHarness();
    store.save(saveKey, documentOf([storedEntry({ kind: "Antifire" })]));
    bridge.enable();

    bridge.save();

    expect(store.has(saveKey)).toBe(false);
  });

  it("keeps a record that only carries poison immunity", () => {
    const { bridge, controller, store, saveKey } = createHarness();
    bridge.enable();
    controller.curePoison(30);

    bridge.save();

    expect(storedDocument(store, saveKey)).toMatchObject({ entries: [], poisonImmunitySeconds: 30 });
  });

  it("leaves ignored kinds out of saves and loads", () => {
    const { player, bridge, store, saveKey, service } = createHarness({ ignoredKinds: ["Stamina"] });
    bridge.enable();
    service().apply(contextFor(player, timedDefinition("Stamina", 10)));
    service().apply(contextFor(player, timedDefinition("Antifire", 10)));

    bridge.save();
    expect(storedDocument(store, saveKey)?.entries.map((entry) => entry.kind)).toEqual(["Antifire"]);

    service().clear();
    store.save(saveKey, documentOf([storedEntry({ kind: "Stamina" }), storedEntry({ kind: "Overload" })]));
    bridge.load();

    expect(service().getBuffsFor(player.id).map((instance) => instance.kind)).toEqual(["Overload"]);
  });

  it("captures poison progress from the controller", () => {
    const { ticker, bridge, controller, store, saveKey } = createHarness();
    bridge.enable();
    controller.applyPoison(poisonConfig());
    for (let i = 0; i < 5; i += 1) {
      ticker.tick();
    }

    bridge.save();

    expect(storedDocument(store, saveKey)?.entries[0]).toMatchObject({
      kind: "Poison",
      sourceId: "poison",
      remainingTicks: 3,
      poisonCurrentDamage: 2,
      poisonTicksSinceDecay: 1,
      poisonTimeToNextTick: 1,
      poisonImmunityTimer: 0,
    });
  });

  it("re-primes poison state from a loaded record", () => {
    const { player, bridge, controller, store, saveKey, service } = createHarness();
    store.save(saveKey, documentOf([poisonEntry()]));
    bridge.enable();

    bridge.load();

    const effect = controller.activeEffect;
    expect(effect?.currentDamage).toBe(2);
    expect(effect?.ticksSinceDecay).toBe(1);
    expect(effect?.tickTimer).toBeCloseTo(0.75);
    // 5 hits and 0.75 s of an 8 s poison already spent
    expect(service().tryGetBuff(player.id, "Poison")?.remainingTicks).toBe(3);
    expect(bridge.pendingCount).toBe(0);
  });

  it("restores the hit timer as interval minus the saved time to next hit", () => {
    const { bridge, controller, store, saveKey } = createHarness({ poisonIntervalSeconds: 0.6 });
    store.save(saveKey, documentOf([poisonEntry({ poisonTimeToNextTick: 0.25 })]));
    bridge.enable();

    bridge.load();

    expect(controller.activeEffect?.tickTimer).toBeCloseTo(0.35);
  });

  it("defers every record until the poison controller is ready and restores each once", () => {
    const { ticker, player, bridge, controller, store, saveKey, service } = createHarness();
    const recorder = new EventRecorder();
    service().addEventListener(recorder);
    const restoreSpy = vi.spyOn(service(), "restore");
    store.save(saveKey, documentOf([storedEntry({ kind: "Antifire" }), poisonEntry()]));
    controller.disable();
    bridge.enable();

    bridge.load();
    for (let i = 0; i < 5; i += 1) {
      ticker.tick();
    }

    expect(bridge.state).toBe("deferred");
    expect(bridge.pendingCount).toBe(2);
    expect(restoreSpy).not.toHaveBeenCalled();
    expect(service().size).toBe(0);

    controller.enable();
    ticker.tick();
    ticker.tick();
    ticker.tick();

    expect(restoreSpy).toHaveBeenCalledTimes(2);
    expect(recorder.count("buff_restored")).toBe(2);
    expect(recorder.count("buff_started")).toBe(0);
    expect(bridge.pendingCount).toBe(0);
    expect(bridge.state).toBe("capturing");
    expect(service().tryGetBuff(player.id, "Antifire")).toBeDefined();
    expect(controller.isPoisoned).toBe(true);
  });

  it("waits for the entity before restoring", () => {
    const { ticker, player, deps, bridge, store, saveKey, service } = createHarness();
    store.save(saveKey, documentOf([storedEntry({ kind: "Antifire", remainingTicks: 4 })]));
    deps.entity = undefined;
    bridge.enable();

    bridge.load();
    ticker.tick();
    expect(service().size).toBe(0);

    deps.entity = player;
    ticker.tick();

    expect(service().tryGetBuff(player.id, "Antifire")?.remainingTicks).toBe(4);
    expect(bridge.state).toBe("capturing");
  });

  it("keeps unrestored records when saving during a deferral", () => {
    const { bridge, controller, store, saveKey } = createHarness();
    store.save(saveKey, documentOf([storedEntry({ kind: "Antifire" }), poisonEntry()], 12));
    controller.disable();
    bridge.enable();
    bridge.load();

    bridge.save();

    const document = storedDocument(store, saveKey);
    expect(document?.entries.map((entry) => entry.kind)).toEqual(["Antifire", "Poison"]);
    expect(document?.entries[1]?.poisonCurrentDamage).toBe(2);
    expect(document?.poisonImmunitySeconds).toBe(12);
  });

  it("cancels the retry loop on disable", () => {
    const { ticker, bridge, controller, store, saveKey } = createHarness();
    store.save(saveKey, documentOf([poisonEntry()]));
    controller.disable();
    bridge.enable();
    bridge.load();
    expect(ticker.subscriberCount).toBe(1);

    bridge.disable();

    expect(bridge.state).toBe("idle");
    expect(bridge.pendingCount).toBe(0);
    expect(ticker.subscriberCount).toBe(0);
  });

  it("restores only the timer and immunity when the canonical config is missing", () => {
    const { logger, lines } = createCapturingLogger();
    const { player, bridge, controller, store, saveKey, service } = createHarness({
      canonicalPoisonConfigId: "missing_poison",
      logger,
    });
    store.save(saveKey, documentOf([poisonEntry({ poisonImmunityTimer: 12 })]));
    bridge.enable();

    bridge.load();

    expect(service().tryGetBuff(player.id, "Poison")?.remainingTicks).toBe(3);
    expect(controller.isPoisoned).toBe(false);
    expect(controller.immunityTimer).toBe(12);
    expect(lines.filter((line) => line.level === 50)).toHaveLength(1);
  });

  it("warns and uses the canonical config when the saved id differs", () => {
    const { logger, lines } = createCapturingLogger();
    const { bridge, controller, store, saveKey } = createHarness({ logger });
    store.save(saveKey, documentOf([poisonEntry({ sourceId: "strong_poison" })]));
    bridge.enable();

    bridge.load();

    expect(controller.activeEffect?.config.id).toBe("poison");
    const warnings = lines.filter((line) => line.level === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.savedConfigId).toBe("strong_poison");
  });

  it("applies top-level poison immunity from the document", () => {
    const { bridge, controller, store, saveKey } = createHarness();
    store.save(saveKey, documentOf([], 30));
    bridge.enable();

    bridge.load();

    expect(controller.immunityTimer).toBe(30);
  });

  it("saves immunity granted while the service is unreachable", () => {
    const { deps, bridge, controller, store, saveKey } = createHarness();
    bridge.enable();
    deps.service = undefined;

    controller.curePoison(30);
    bridge.save();

    expect(storedDocument(store, saveKey)).toMatchObject({ entries: [], poisonImmunitySeconds: 30 });
  });

  it("keeps a record pending while the service is at capacity", () => {
    const { logger, lines } = createCapturingLogger();
    const { ticker, player, bridge, store, saveKey, service } = createHarness({ maxTrackedBuffs: 1, logger });
    service().apply(contextFor(createPlayer("player-2"), timedDefinition("Overload", 3)));
    store.save(saveKey, documentOf([storedEntry({ kind: "Antifire", remainingTicks: 6 })]));
    bridge.enable();

    bridge.load();

    expect(bridge.pendingCount).toBe(1);
    expect(bridge.state).toBe("deferred");
    expect(service().tryGetBuff(player.id, "Antifire")).toBeUndefined();

    bridge.save();
    const saved = storedDocument(store, saveKey);
    expect(saved?.entries).toHaveLength(1);
    expect(saved?.entries[0]).toMatchObject({ kind: "Antifire", remainingTicks: 6 });

    ticker.tick();
    ticker.tick();
    expect(bridge.pendingCount).toBe(1);

    // The other entity's buff expires and frees the slot
    ticker.tick();

    expect(bridge.pendingCount).toBe(0);
    expect(bridge.state).toBe("capturing");
    expect(service().tryGetBuff(player.id, "Antifire")?.remainingTicks).toBe(6);
    const refusals = lines.filter((line) => line.msg === "Buff service refused a restored timer; keeping it pending");
    expect(refusals).toHaveLength(1);
    expect(refusals[0]?.kind).toBe("Antifire");
  });

  it("restores over a poison from another config without a started event", () => {
    const { player, bridge, controller, store, saveKey, service } = createHarness();
    controller.applyPoison(poisonConfig({ id: "strong_poison", startDamagePerTick: 6 }));
    store.save(saveKey, documentOf([poisonEntry()]));
    bridge.enable();
    const recorder = new EventRecorder();
    service().addEventListener(recorder);

    bridge.load();

    expect(recorder.types()).toEqual(["buff_restored", "buff_updated", "buff_updated"]);
    expect(controller.activeEffect?.config.id).toBe("poison");
    expect(controller.activeEffect?.currentDamage).toBe(2);
    expect(service().tryGetBuff(player.id, "Poison")?.remainingTicks).toBe(3);
  });

  it("re-queues a poison record that fails mid-pass without replaying its timer", () => {
    const { ticker, player, bridge, controller, store, saveKey, service } = createHarness();
    store.save(
      saveKey,
      documentOf([storedEntry({ kind: "Antifire", remainingTicks: 6 }), poisonEntry({ remainingTicks: 3 })]),
    );
    bridge.enable();
    // The target dies as soon as the poison timer is back, after the readiness check passed
    service().addEventListener({
      onBuffEvent: (event) => {
        if (event.type === "buff_restored" && event.instance.kind === "Poison") {
          player.combatTarget = new HealthComponent(0);
        }
      },
    });
    const restoreSpy = vi.spyOn(service(), "restore");

    bridge.load();

    expect(restoreSpy).toHaveBeenCalledTimes(2);
    expect(bridge.pendingCount).toBe(1);
    expect(bridge.state).toBe("deferred");
    expect(controller.isPoisoned).toBe(false);
    expect(service().tryGetBuff(player.id, "Antifire")?.remainingTicks).toBe(6);
    expect(service().tryGetBuff(player.id, "Poison")?.remainingTicks).toBe(3);

    ticker.tick();
    bridge.save();

    const saved = storedDocument(store, saveKey);
    expect(saved?.entries.map((entry) => entry.kind)).toEqual(["Antifire", "Poison"]);
    expect(saved?.entries[0]?.remainingTicks).toBe(5);
    expect(saved?.entries[1]).toMatchObject({
      remainingTicks: 2,
      poisonCurrentDamage: 2,
      poisonTicksSinceDecay: 1,
      poisonTimeToNextTick: 0.25,
    });

    player.combatTarget = new HealthComponent(99);
    ticker.tick();

    expect(restoreSpy).toHaveBeenCalledTimes(2);
    expect(bridge.pendingCount).toBe(0);
    expect(bridge.state).toBe("capturing");
    expect(controller.isPoisoned).toBe(true);
    expect(controller.activeEffect?.currentDamage).toBe(2);
  });
});
