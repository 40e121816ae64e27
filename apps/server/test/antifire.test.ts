import { describe, expect, it } from "vitest";
import { createSilentLogger } from "@tickbound/shared-servers";
import { BuffTimerService } from "../src/buffs/buff-timer-service";
import { AntifireProtection } from "../src/status/antifire/antifire-protection";
import { contextFor, createPlayer, timedDefinition } from "./buff-test-helpers";

const createHarness = () => {
  const service = new BuffTimerService({ logger: createSilentLogger() });
  const player = createPlayer();
  const protection = new AntifireProtection(player, () => service);
  return { service, player, protection };
};

describe("AntifireProtection", () => {
  it("passes non-dragonfire damage through", () => {
    const { service, player, protection } = createHarness();
    service.apply(contextFor(player, timedDefinition("SuperAntifire", 60)));

    expect(protection.modifyDamage(40, "melee")).toBe(40);
  });

  it("leaves unprotected dragonfire untouched", () => {
    const { protection } = createHarness();

    expect(protection.modifyDamage(50, "dragonfire")).toBe(50);
  });

  it("reduces dragonfire by a quarter with an antifire buff", () => {
    const { service, player, protection } = createHarness();
    service.apply(contextFor(player, timedDefinition("Antifire", 60)));

    expect(protection.hasActiveAntifireBuff()).toBe(true);
    expect(protection.modifyDamage(50, "dragonfire")).toBe(37);
  });

  it("reduces dragonfire by three quarters with a dragonfire shield", () => {
    const { player, protection } = createHarness();
    player.shield = { id: "shield_17", name: "Dragonfire Shield" };

    expect(protection.hasDragonfireShieldEquipped()).toBe(true);
    expect(protection.modifyDamage(50, "dragonfire")).toBe(12);
  });

  it("blocks dragonfire with antifire and a shield together", () => {
    const { service, player, protection } = createHarness();
    player.shield = { id: "dragonfire_shield", name: "Shield" };
    service.apply(contextFor(player, timedDefinition("Antifire", 60)));

    expect(protection.modifyDamage(50, "dragonfire")).toBe(0);
  });

  it("blocks dragonfire with super antifire alone", () => {
    const { service, player, protection } = createHarness();
    service.apply(contextFor(player, timedDefinition("SuperAntifire", 60)));

    expect(protection.modifyDamage(50, "dragonfire")).toBe(0);
  });

  it("accepts custom shield identifiers", () => {
    const service = new BuffTimerService({ logger: createSilentLogger() });
    const player = createPlayer();
    player.shield = { id: "wyvern_shield", name: "Ancient wyvern shield" };
    const protection = new AntifireProtection(player, () => service, ["wyvern_shield"]);

    expect(protection.modifyDamage(40, "dragonfire")).toBe(10);
  });

  it("builds the standard antifire definition", () => {
    const service = new BuffTimerService({ logger: createSilentLogger() });

    const instance = service.apply(
      contextFor(createPlayer(), AntifireProtection.buildStandardAntifireBuffDefinition()),
    );

    expect(instance?.durationTicks).toBe(300);
    expect(instance?.warningTicks).toBe(30);
    expect(instance?.canWarn).toBe(true);
  });
});
