import {
  DEFAULT_POISON_DECAY_AMOUNT,
  DEFAULT_POISON_HITS_PER_DECAY_STEP,
  DEFAULT_POISON_INTERVAL_SECONDS,
} from "../constants";
import { isRecord } from "../utils/guards";
import { toFiniteNumber, toInteger } from "../utils/number";

export interface PoisonConfig {
  /** Unique identifier, compared case-insensitively. */
  id: string;
  /** Damage dealt every poison hit when first applied. */
  startDamagePerTick: number;
  /** Seconds between poison hits. */
  tickIntervalSeconds: number;
  /** Hits dealt before severity drops. */
  hitsPerDecayStep: number;
  /** Damage removed at each decay step. */
  decayAmountPerStep: number;
  /** Poison ends once damage falls to this value. */
  minDamagePerTick: number;
}

/**
 * Reads a poison config from loosely typed data. Returns undefined when no usable id exists.
 */
export const parsePoisonConfig = (value: unknown): PoisonConfig | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const id = typeof value.id === "string" ? value.id.trim() : "";
  if (id.length === 0) {
    return undefined;
  }
  const interval = toFiniteNumber(value.tickIntervalSeconds, DEFAULT_POISON_INTERVAL_SECONDS);
  return {
    id,
    startDamagePerTick: Math.max(0, toInteger(value.startDamagePerTick)),
    tickIntervalSeconds: interval > 0 ? interval : DEFAULT_POISON_INTERVAL_SECONDS,
    hitsPerDecayStep: Math.max(
      1,
      toInteger(value.hitsPerDecayStep, DEFAULT_POISON_HITS_PER_DECAY_STEP),
    ),
    decayAmountPerStep: Math.max(0, toInteger(value.decayAmountPerStep, DEFAULT_POISON_DECAY_AMOUNT)),
    minDamagePerTick: Math.max(0, toInteger(value.minDamagePerTick)),
  };
};

/** Hit interval in seconds, falling back to the default for non-positive values. */
export const resolvePoisonIntervalSeconds = (config: Pick<PoisonConfig, "tickIntervalSeconds">): number => {
  return Number.isFinite(config.tickIntervalSeconds) && config.tickIntervalSeconds > 0
    ? config.tickIntervalSeconds
    : DEFAULT_POISON_INTERVAL_SECONDS;
};
