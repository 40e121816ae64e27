import type { BuffDefinition, BuffEndReason, BuffSourceType } from "@tickbound/shared";
import type { EntityHandle } from "../world/entities/game-entity";
import type { BuffTimerInstance } from "./buff-timer-instance";

/** Payload describing a buff to start, refresh or restore. */
export interface BuffContext {
  entity: EntityHandle | undefined;
  definition: BuffDefinition;
  sourceType: BuffSourceType;
  /** Defaults to the buff kind when absent. */
  sourceId?: string;
  /** True resets the countdown; false keeps it. */
  resetTimer: boolean;
}

/** Emitted once when a key is first tracked through apply or refresh. */
export interface BuffStartedEvent {
  type: "buff_started";
  instance: BuffTimerInstance;
}

/** Emitted after a countdown step or any metadata change. */
export interface BuffUpdatedEvent {
  type: "buff_updated";
  instance: BuffTimerInstance;
}

/** Emitted when a recurring buff wraps back to its full interval. */
export interface BuffLoopedEvent {
  type: "buff_looped";
  instance: BuffTimerInstance;
}

/** Emitted on the tick a finite buff reaches its warning threshold. */
export interface BuffWarningEvent {
  type: "buff_warning";
  instance: BuffTimerInstance;
}

/** Emitted when saved state is transplanted back into the registry. */
export interface BuffRestoredEvent {
  type: "buff_restored";
  instance: BuffTimerInstance;
}

export interface BuffEndedEvent {
  type: "buff_ended";
  instance: BuffTimerInstance;
  reason: BuffEndReason;
}

/** BuffTimerService event union. */
export type BuffEvent =
  | BuffStartedEvent
  | BuffUpdatedEvent
  | BuffLoopedEvent
  | BuffWarningEvent
  | BuffRestoredEvent
  | BuffEndedEvent;

/** Listener interface for receiving BuffTimerService events. */
export interface BuffEventListener {
  onBuffEvent(event: BuffEvent): void;
}
