import { describe, expect, it } from "vitest";
import {
  createIndefiniteDefinition,
  getDurationTicks,
  getIntervalTicks,
  normalizeBuffDefinition,
  resolveDisplayName,
  resolveWarningTicks,
} from "./buff-definition";
import type { BuffDefinition } from "./buff-types";

const definition = (overrides: Partial<BuffDefinition> = {}): BuffDefinition => ({
  kind: "Antifire",
  durationSeconds: 6,
  recurringIntervalSeconds: 0,
  isRecurring: false,
  showExpiryWarning: false,
  expiryWarningTicks: 0,
  ...overrides,
});

describe("buff definition tick math", () => {
  it("rounds durations up to whole ticks", () => {
    expect(getDurationTicks(definition({ durationSeconds: 1 }), 0.6)).toBe(2);
    expect(getDurationTicks(definition({ durationSeconds: 3 }), 0.6)).toBe(5);
    expect(getDurationTicks(definition({ durationSeconds: 0.01 }), 0.6)).toBe(1);
  });

  it("treats a zero duration as indefinite", () => {
    expect(getDurationTicks(definition({ durationSeconds: 0 }), 0.6)).toBe(-1);
  });

  it("falls back to the duration when no interval is configured", () => {
    expect(getIntervalTicks(definition({ durationSeconds: 4 }), 1)).toBe(4);
    expect(getIntervalTicks(definition({ durationSeconds: 4, recurringIntervalSeconds: 2 }), 1)).toBe(
      2,
    );
  });

  it("never reports an interval below one tick", () => {
    expect(getIntervalTicks(definition({ durationSeconds: 0 }), 1)).toBe(1);
  });

  it("derives a warning threshold from a tenth of the duration", () => {
    const warned = definition({ showExpiryWarning: true });
    expect(resolveWarningTicks(warned, 300)).toBe(30);
    expect(resolveWarningTicks(warned, 5)).toBe(1);
    expect(resolveWarningTicks(warned, 1)).toBe(1);
    expect(resolveWarningTicks(warned, -1)).toBe(0);
  });

  it("prefers an explicit warning threshold and ignores it when warnings are off", () => {
    expect(resolveWarningTicks(definition({ showExpiryWarning: true, expiryWarningTicks: 7 }), 300)).toBe(
      7,
    );
    expect(resolveWarningTicks(definition({ expiryWarningTicks: 7 }), 300)).toBe(0);
  });
});

describe("normalizeBuffDefinition", () => {
  it("clamps negative and non-finite numbers to zero", () => {
    const normalized = normalizeBuffDefinition(
      definition({
        durationSeconds: -5,
        recurringIntervalSeconds: Number.NaN,
        expiryWarningTicks: -2,
      }),
    );

    expect(normalized.durationSeconds).toBe(0);
    expect(normalized.recurringIntervalSeconds).toBe(0);
    expect(normalized.expiryWarningTicks).toBe(0);
  });

  it("drops empty display names so the kind is shown", () => {
    const normalized = normalizeBuffDefinition(definition({ displayName: "" }));

    expect(normalized.displayName).toBeUndefined();
    expect(resolveDisplayName(normalized)).toBe("Antifire");
    expect(resolveDisplayName(definition({ displayName: "Dragon ward" }))).toBe("Dragon ward");
  });

  it("builds indefinite definitions", () => {
    const indefinite = createIndefiniteDefinition("Custom", "Blessing");

    expect(getDurationTicks(indefinite, 0.6)).toBe(-1);
    expect(indefinite.isRecurring).toBe(false);
    expect(indefinite.displayName).toBe("Blessing");
  });
});
