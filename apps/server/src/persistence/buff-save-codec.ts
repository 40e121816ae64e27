import {
  BUFF_SAVE_KEY_PREFIX,
  BUFF_SAVE_VERSION,
  isBuffKind,
  isBuffSourceType,
  isRecord,
  normalizeBuffDefinition,
  toInteger,
  toNonNegativeNumber,
  type BuffDefinition,
  type BuffSaveDocument,
  type BuffSaveEntry,
} from "@tickbound/shared";
import type { Logger } from "@tickbound/shared-servers";

/** Store key for an entity's buff document. */
export const buffSaveKeyFor = (entityName: string): string => `${BUFF_SAVE_KEY_PREFIX}${entityName}`;

export const definitionFromEntry = (entry: BuffSaveEntry): BuffDefinition => {
  return normalizeBuffDefinition({
    kind: entry.kind,
    displayName: entry.displayName,
    iconId: entry.iconId,
    durationSeconds: entry.durationSeconds,
    recurringIntervalSeconds: entry.recurringIntervalSeconds,
    isRecurring: entry.isRecurring,
    showExpiryWarning: entry.showExpiryWarning,
    expiryWarningTicks: entry.expiryWarningTicks,
  });
};

const optionalString = (value: unknown): string | undefined => {
  return typeof value === "string" && value.length > 0 ? value : undefined;
};

/**
 * Reads one stored entry. Unknown kinds yield undefined; every other field is coerced
 * into range.
 */
export const decodeBuffSaveEntry = (value: unknown, logger: Logger): BuffSaveEntry | undefined => {
  if (!isRecord(value)) {
    logger.warn("Dropping malformed buff save entry");
    return undefined;
  }
  if (!isBuffKind(value.kind)) {
    logger.warn({ kind: value.kind }, "Dropping buff save entry with unknown kind");
    return undefined;
  }

  const kind = value.kind;
  const definition = normalizeBuffDefinition({
    kind,
    displayName: optionalString(value.displayName),
    iconId: optionalString(value.iconId),
    durationSeconds: toNonNegativeNumber(value.durationSeconds),
    recurringIntervalSeconds: toNonNegativeNumber(value.recurringIntervalSeconds),
    isRecurring: value.isRecurring === true,
    showExpiryWarning: value.showExpiryWarning === true,
    expiryWarningTicks: toInteger(value.expiryWarningTicks),
  });

  return {
    ...definition,
    sourceType: isBuffSourceType(value.sourceType) ? value.sourceType : "Scripted",
    sourceId: optionalString(value.sourceId) ?? kind,
    remainingTicks: toInteger(value.remainingTicks),
    poisonCurrentDamage: Math.max(0, toInteger(value.poisonCurrentDamage)),
    poisonTicksSinceDecay: Math.max(0, toInteger(value.poisonTicksSinceDecay)),
    poisonTimeToNextTick: toNonNegativeNumber(value.poisonTimeToNextTick),
    poisonImmunityTimer: toNonNegativeNumber(value.poisonImmunityTimer),
  };
};

/**
 * Validate a stored buff document. Returns undefined for anything that is not a document
 * of a version this build understands; documents without a version tag are read as current.
 */
export const decodeBuffSaveDocument = (value: unknown, logger: Logger): BuffSaveDocument | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    logger.warn("Ignoring malformed buff save document");
    return undefined;
  }

  const version = value.version === undefined ? BUFF_SAVE_VERSION : toInteger(value.version, -1);
  if (version !== BUFF_SAVE_VERSION) {
    logger.warn({ version: value.version, expected: BUFF_SAVE_VERSION }, "Ignoring buff save document with unsupported version");
    return undefined;
  }

  const entries: BuffSaveEntry[] = [];
  if (Array.isArray(value.entries)) {
    for (const raw of value.entries) {
      const entry = decodeBuffSaveEntry(raw, logger);
      if (entry) {
        entries.push(entry);
      }
    }
  }

  return {
    version,
    entityId: typeof value.entityId === "string" ? value.entityId : "",
    entries,
    poisonImmunitySeconds: toNonNegativeNumber(value.poisonImmunitySeconds),
  };
};
