import {
  isBuffKind,
  isBuffSourceType,
  isRecord,
  normalizeBuffDefinition,
  toNonNegativeNumber,
  toInteger,
  type BuffApplyMessage,
  type BuffDefinition,
  type BuffRefreshMessage,
  type BuffRemoveMessage,
  type BuffTimerView,
  type PoisonApplyMessage,
  type PoisonCureMessage,
} from "@tickbound/shared";
import { createModuleLogger } from "@tickbound/shared-servers";
import type { BuffContext } from "../buffs/buff-events";
import type { BuffWorld } from "../world/buff-world";

const logger = createModuleLogger("commands");

export type ClientCommand =
  | BuffApplyMessage
  | BuffRefreshMessage
  | BuffRemoveMessage
  | PoisonApplyMessage
  | PoisonCureMessage;

export interface ClientCommandContext<T extends ClientCommand> {
  world: BuffWorld;
  /** Entity owned by the sending client. */
  entityId: string;
  /** Client payload. Shape is checked again before use. */
  data: T;
}

const parseDefinition = (value: unknown): BuffDefinition | undefined => {
  if (!isRecord(value) || !isBuffKind(value.kind)) {
    return undefined;
  }
  return normalizeBuffDefinition({
    kind: value.kind,
    displayName: typeof value.displayName === "string" ? value.displayName : undefined,
    iconId: typeof value.iconId === "string" ? value.iconId : undefined,
    durationSeconds: toNonNegativeNumber(value.durationSeconds),
    recurringIntervalSeconds: toNonNegativeNumber(value.recurringIntervalSeconds),
    isRecurring: value.isRecurring === true,
    showExpiryWarning: value.showExpiryWarning === true,
    expiryWarningTicks: toInteger(value.expiryWarningTicks),
  });
};

const buildContext = (
  { world, entityId, data }: ClientCommandContext<BuffApplyMessage>,
  resetTimer: boolean,
): BuffContext | undefined => {
  const entity = world.entities.resolve(entityId);
  if (!entity || !isRecord(data)) {
    return undefined;
  }
  const definition = parseDefinition(data.definition);
  if (!definition) {
    logger.warn({ entityId }, "Rejected buff message with invalid definition");
    return undefined;
  }
  return {
    entity,
    definition,
    sourceType: isBuffSourceType(data.sourceType) ? data.sourceType : "Scripted",
    sourceId: typeof data.sourceId === "string" && data.sourceId.length > 0 ? data.sourceId : undefined,
    resetTimer,
  };
};

/**
 * Starts a buff on the sender's entity, or resets the one already running.
 */
export const applyBuffCommand = (context: ClientCommandContext<BuffApplyMessage>): boolean => {
  const buffContext = buildContext(context, true);
  return buffContext ? context.world.service.apply(buffContext) !== undefined : false;
};

/**
 * Updates a buff without touching its countdown.
 */
export const refreshBuffCommand = (context: ClientCommandContext<BuffRefreshMessage>): boolean => {
  const buffContext = buildContext(context, false);
  return buffContext ? context.world.service.refresh(buffContext) !== undefined : false;
};

export const removeBuffCommand = ({ world, entityId, data }: ClientCommandContext<BuffRemoveMessage>): boolean => {
  if (!isRecord(data) || !isBuffKind(data.kind)) {
    return false;
  }
  if (data.kind === "Poison") {
    const poison = world.entities.resolve(entityId)?.poison;
    if (poison?.isPoisoned) {
      poison.curePoison(0);
      return true;
    }
  }
  return world.service.remove(entityId, data.kind);
};

/**
 * Poisons the sender's entity with a named config. Unknown configs are refused.
 */
export const applyPoisonCommand = ({ world, entityId, data }: ClientCommandContext<PoisonApplyMessage>): boolean => {
  const poison = world.entities.resolve(entityId)?.poison;
  if (!poison || !isRecord(data) || typeof data.configId !== "string") {
    return false;
  }
  return poison.applyPoison(world.poisonConfigs.resolve(data.configId));
};

export const curePoisonCommand = ({ world, entityId, data }: ClientCommandContext<PoisonCureMessage>): boolean => {
  const poison = world.entities.resolve(entityId)?.poison;
  if (!poison) {
    return false;
  }
  const immunitySeconds = isRecord(data) ? toNonNegativeNumber(data.immunitySeconds) : 0;
  poison.curePoison(immunitySeconds);
  return true;
};

/** Client view of an entity's live buffs in sequence order. */
export const buildBuffTimerViews = (world: BuffWorld, entityId: string): BuffTimerView[] => {
  return world.service.getBuffsFor(entityId).map((instance) => {
    const view: BuffTimerView = {
      kind: instance.kind,
      displayName: instance.displayName,
      remainingTicks: instance.remainingTicks,
      durationTicks: instance.durationTicks,
      isRecurring: instance.isRecurring,
      sequenceId: instance.sequenceId,
    };
    if (instance.definition.iconId) {
      view.iconId = instance.definition.iconId;
    }
    return view;
  });
};
