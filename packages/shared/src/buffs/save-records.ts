import type { BuffKind, BuffSourceType } from "./buff-types";

/**
 * Persisted state of one buff timer. Poison fields stay at zero for other kinds.
 */
export interface BuffSaveEntry {
  kind: BuffKind;
  displayName?: string;
  iconId?: string;
  durationSeconds: number;
  recurringIntervalSeconds: number;
  isRecurring: boolean;
  showExpiryWarning: boolean;
  expiryWarningTicks: number;
  sourceType: BuffSourceType;
  sourceId: string;
  remainingTicks: number;
  poisonCurrentDamage: number;
  poisonTicksSinceDecay: number;
  poisonTimeToNextTick: number;
  poisonImmunityTimer: number;
}

/** Envelope stored under an entity's save key. */
export interface BuffSaveDocument {
  version: number;
  entityId: string;
  entries: BuffSaveEntry[];
  /** Immunity carried even when no poison timer is live. */
  poisonImmunitySeconds: number;
}
