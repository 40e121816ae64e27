import {
  FREEZE_DISPLAY_NAME,
  FREEZE_ICON_ID,
  TICK_SECONDS,
  type BuffDefinition,
  type BuffSourceType,
} from "@tickbound/shared";
import type { BuffContext } from "../../buffs/buff-events";
import type { BuffTimerInstance } from "../../buffs/buff-timer-instance";
import type { BuffTimerService } from "../../buffs/buff-timer-service";
import type { EntityHandle } from "../../world/entities/game-entity";

export interface FreezeOptions {
  sourceType?: BuffSourceType;
  /** Defaults to the frozen entity's name. */
  sourceId?: string;
  /** False refreshes an existing freeze without restarting its countdown. */
  resetTimer?: boolean;
}

/** Freeze timer definition lasting at least one tick. */
export const buildFreezeBuffDefinition = (
  durationSeconds: number,
  tickPeriodSeconds: number = TICK_SECONDS,
): BuffDefinition => {
  const seconds = Number.isFinite(durationSeconds) ? durationSeconds : 0;
  return {
    kind: "Freeze",
    displayName: FREEZE_DISPLAY_NAME,
    iconId: FREEZE_ICON_ID,
    durationSeconds: Math.max(tickPeriodSeconds, seconds),
    recurringIntervalSeconds: 0,
    isRecurring: false,
    showExpiryWarning: false,
    expiryWarningTicks: 0,
  };
};

export const applyFreezeSeconds = (
  service: BuffTimerService,
  entity: EntityHandle,
  durationSeconds: number,
  options: FreezeOptions = {},
): BuffTimerInstance | undefined => {
  const context: BuffContext = {
    entity,
    definition: buildFreezeBuffDefinition(durationSeconds, service.tickPeriodSeconds),
    sourceType: options.sourceType ?? "Combat",
    sourceId: options.sourceId ?? entity.name,
    resetTimer: options.resetTimer ?? true,
  };
  return context.resetTimer ? service.apply(context) : service.refresh(context);
};

export const applyFreezeTicks = (
  service: BuffTimerService,
  entity: EntityHandle,
  ticks: number,
  options: FreezeOptions = {},
): BuffTimerInstance | undefined => {
  const wholeTicks = Number.isFinite(ticks) ? Math.max(1, Math.trunc(ticks)) : 1;
  return applyFreezeSeconds(service, entity, wholeTicks * service.tickPeriodSeconds, options);
};
