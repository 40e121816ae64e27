export const BUFF_KINDS = [
  "Poison",
  "Venom",
  "Antifire",
  "SuperAntifire",
  "Overload",
  "Freeze",
  "Stamina",
  "PrayerRenewal",
  "Custom",
] as const;

/** Identifies a buff slot. An entity holds at most one live timer per kind. */
export type BuffKind = (typeof BUFF_KINDS)[number];

export const BUFF_SOURCE_TYPES = [
  "Combat",
  "Potion",
  "Equipment",
  "Skill",
  "Environment",
  "Scripted",
] as const;

/** Origin of a buff, used for presentation and auditing only. */
export type BuffSourceType = (typeof BUFF_SOURCE_TYPES)[number];

export type BuffEndReason = "Manual" | "Expired";

export type DamageType = "melee" | "ranged" | "magic" | "poison" | "dragonfire";

/**
 * Description of a buff timer. Combat, consumables and scripted events build one of these
 * before handing it to the timer service.
 */
export interface BuffDefinition {
  kind: BuffKind;
  /** Readable name; the kind is shown when absent. */
  displayName?: string;
  iconId?: string;
  /** Total lifetime in seconds. Zero means the buff never runs out on its own. */
  durationSeconds: number;
  /** Loop length for recurring buffs. Zero reuses durationSeconds. */
  recurringIntervalSeconds: number;
  isRecurring: boolean;
  showExpiryWarning: boolean;
  /** Explicit warning threshold in ticks. Zero derives one from the duration. */
  expiryWarningTicks: number;
}

const BUFF_KIND_SET: ReadonlySet<string> = new Set(BUFF_KINDS);
const BUFF_SOURCE_TYPE_SET: ReadonlySet<string> = new Set(BUFF_SOURCE_TYPES);

export const isBuffKind = (value: unknown): value is BuffKind => {
  return typeof value === "string" && BUFF_KIND_SET.has(value);
};

export const isBuffSourceType = (value: unknown): value is BuffSourceType => {
  return typeof value === "string" && BUFF_SOURCE_TYPE_SET.has(value);
};
