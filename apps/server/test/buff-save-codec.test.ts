import { describe, expect, it } from "vitest";
import { createCapturingLogger, createSilentLogger } from "@tickbound/shared-servers";
import { buffSaveKeyFor, decodeBuffSaveDocument } from "../src/persistence/buff-save-codec";

describe("buff save codec", () => {
  it("builds save keys from entity names", () => {
    expect(buffSaveKeyFor("alice")).toBe("buffs_alice");
  });

  it("drops entries with unknown kinds and coerces numbers", () => {
    const { logger, lines } = createCapturingLogger();

    const document = decodeBuffSaveDocument(
      {
        version: 1,
        entityId: "player-1",
        poisonImmunitySeconds: "12",
        entries: [
          { kind: "Haste", durationSeconds: 10 },
          {
            kind: "Antifire",
            durationSeconds: -5,
            remainingTicks: "7.9",
            sourceType: "Nowhere",
            displayName: "",
            poisonTimeToNextTick: -1,
          },
        ],
      },
      logger,
    );

    expect(document).toEqual({
      version: 1,
      entityId: "player-1",
      poisonImmunitySeconds: 12,
      entries: [
        {
          kind: "Antifire",
          durationSeconds: 0,
          recurringIntervalSeconds: 0,
          isRecurring: false,
          showExpiryWarning: false,
          expiryWarningTicks: 0,
          sourceType: "Scripted",
          sourceId: "Antifire",
          remainingTicks: 7,
          poisonCurrentDamage: 0,
          poisonTicksSinceDecay: 0,
          poisonTimeToNextTick: 0,
          poisonImmunityTimer: 0,
        },
      ],
    });
    expect(lines.filter((line) => line.level === 40)).toHaveLength(1);
  });

  it("rejects documents from another version", () => {
    const { logger, lines } = createCapturingLogger();

    expect(decodeBuffSaveDocument({ version: 2, entries: [] }, logger)).toBeUndefined();
    expect(lines.filter((line) => line.level === 40)).toHaveLength(1);
  });

  it("reads untagged documents as the current version", () => {
    const document = decodeBuffSaveDocument({ entries: [] }, createSilentLogger());

    expect(document).toEqual({ version: 1, entityId: "", entries: [], poisonImmunitySeconds: 0 });
  });

  it("returns undefined for missing or malformed documents", () => {
    expect(decodeBuffSaveDocument(undefined, createSilentLogger())).toBeUndefined();
    expect(decodeBuffSaveDocument("nope", createSilentLogger())).toBeUndefined();
  });
});
