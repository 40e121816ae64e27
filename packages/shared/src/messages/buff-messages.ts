import type { BuffDefinition, BuffKind, BuffSourceType } from "../buffs/buff-types";

/** Client request to start or reset a buff on the sender's entity. */
export interface BuffApplyMessage {
  definition: BuffDefinition;
  sourceType: BuffSourceType;
  sourceId?: string;
}

/** Same payload as apply; the countdown is kept. */
export type BuffRefreshMessage = BuffApplyMessage;

export interface BuffRemoveMessage {
  kind: BuffKind;
}

export interface PoisonApplyMessage {
  configId: string;
}

export interface PoisonCureMessage {
  immunitySeconds: number;
}

/** Server view of one live buff, sent after every change. */
export interface BuffTimerView {
  kind: BuffKind;
  displayName: string;
  iconId?: string;
  remainingTicks: number;
  durationTicks: number;
  isRecurring: boolean;
  sequenceId: number;
}

export interface BuffStateMessage {
  entityId: string;
  buffs: BuffTimerView[];
}
