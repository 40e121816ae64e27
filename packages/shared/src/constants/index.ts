// Shared timing and tuning constants
// Used by the buff engine, its host and any client presenting buff timers

// Timing
export const TICK_SECONDS = 0.6; // Length of one game tick
export const TICK_EPSILON = 1e-6; // Slack for float drift when converting seconds to ticks

// Buff registry
export const DEFAULT_MAX_TRACKED_BUFFS = 64;
export const INDEFINITE_TICKS = -1;
export const EXPIRY_WARNING_FRACTION = 10; // Default warning lands at a tenth of the duration

// Persistence
export const BUFF_SAVE_VERSION = 1;
export const BUFF_SAVE_KEY_PREFIX = "buffs_";

// Poison
export const DEFAULT_POISON_INTERVAL_SECONDS = 15;
export const DEFAULT_POISON_HITS_PER_DECAY_STEP = 4;
export const DEFAULT_POISON_DECAY_AMOUNT = 1;
export const DEFAULT_POISON_CONFIG_ID = "poison";

// Antifire
export const STANDARD_ANTIFIRE_DURATION_SECONDS = 180;
export const ANTIFIRE_BUFF_DAMAGE_REDUCTION = 0.25;
export const DRAGONFIRE_SHIELD_DAMAGE_REDUCTION = 0.75;

// Freeze
export const FREEZE_DISPLAY_NAME = "Frozen";
export const FREEZE_ICON_ID = "frozen";
