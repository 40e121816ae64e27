import { EXPIRY_WARNING_FRACTION, INDEFINITE_TICKS, TICK_EPSILON } from "../constants";
import { clamp, toInteger, toNonNegativeNumber } from "../utils/number";
import type { BuffDefinition, BuffKind } from "./buff-types";

const secondsToTicks = (seconds: number, tickPeriodSeconds: number): number => {
  return Math.max(1, Math.ceil(seconds / tickPeriodSeconds - TICK_EPSILON));
};

/**
 * Build a definition with every numeric field forced into its valid domain.
 * Upstream callers are trusted game code, so bad numbers are clamped instead of rejected.
 */
export const normalizeBuffDefinition = (definition: BuffDefinition): BuffDefinition => {
  const normalized: BuffDefinition = {
    kind: definition.kind,
    durationSeconds: toNonNegativeNumber(definition.durationSeconds),
    recurringIntervalSeconds: toNonNegativeNumber(definition.recurringIntervalSeconds),
    isRecurring: definition.isRecurring === true,
    showExpiryWarning: definition.showExpiryWarning === true,
    expiryWarningTicks: Math.max(0, toInteger(definition.expiryWarningTicks)),
  };
  if (definition.displayName) {
    normalized.displayName = definition.displayName;
  }
  if (definition.iconId) {
    normalized.iconId = definition.iconId;
  }
  return normalized;
};

/**
 * Converts the configured duration to ticks, or INDEFINITE_TICKS when there is none.
 */
export const getDurationTicks = (definition: BuffDefinition, tickPeriodSeconds: number): number => {
  if (!(definition.durationSeconds > 0)) {
    return INDEFINITE_TICKS;
  }
  return secondsToTicks(definition.durationSeconds, tickPeriodSeconds);
};

/**
 * Converts the recurring interval to ticks, falling back to the duration when the
 * interval is not configured. Never less than one.
 */
export const getIntervalTicks = (definition: BuffDefinition, tickPeriodSeconds: number): number => {
  const seconds =
    definition.recurringIntervalSeconds > 0
      ? definition.recurringIntervalSeconds
      : definition.durationSeconds;
  if (!(seconds > 0)) {
    return 1;
  }
  return secondsToTicks(seconds, tickPeriodSeconds);
};

/**
 * Resolves the tick count at which an expiry warning fires. Zero disables the warning.
 */
export const resolveWarningTicks = (definition: BuffDefinition, durationTicks: number): number => {
  if (!definition.showExpiryWarning) {
    return 0;
  }
  if (definition.expiryWarningTicks > 0) {
    return definition.expiryWarningTicks;
  }
  if (durationTicks <= 0) {
    return 0;
  }
  return clamp(
    Math.floor(durationTicks / EXPIRY_WARNING_FRACTION),
    1,
    Math.max(1, durationTicks - 1),
  );
};

export const resolveDisplayName = (definition: Pick<BuffDefinition, "kind" | "displayName">): string => {
  return definition.displayName ? definition.displayName : definition.kind;
};

/** Definition for a kind with no fixed duration and no loop. */
export const createIndefiniteDefinition = (kind: BuffKind, displayName?: string): BuffDefinition => {
  const definition: BuffDefinition = {
    kind,
    durationSeconds: 0,
    recurringIntervalSeconds: 0,
    isRecurring: false,
    showExpiryWarning: false,
    expiryWarningTicks: 0,
  };
  if (displayName) {
    definition.displayName = displayName;
  }
  return definition;
};
