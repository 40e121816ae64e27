import type { BuffEvent, BuffEventListener } from "../../buffs/buff-events";
import type { BuffTimerInstance } from "../../buffs/buff-timer-instance";
import type { BuffTimerService } from "../../buffs/buff-timer-service";
import type { Tickable, Ticker } from "../../clock/ticker";
import type { GameEntity } from "../../world/entities/game-entity";

/**
 * Locks an entity's movement while a Freeze buff is live on it.
 *
 * The service may not exist yet when the controller is enabled; in that case the
 * controller polls the ticker until it can attach.
 */
export class FrozenStatusController implements BuffEventListener {
  private readonly activeFreezes = new Set<BuffTimerInstance>();
  private attachedService?: BuffTimerService;
  private enabled = false;
  private readonly attachPoller: Tickable = {
    onTick: () => {
      if (this.tryAttach()) {
        this.ticker.unsubscribe(this.attachPoller);
      }
    },
  };

  constructor(
    private readonly entity: GameEntity,
    private readonly resolveService: () => BuffTimerService | undefined,
    private readonly ticker: Ticker,
  ) {}

  get isFrozen(): boolean {
    return this.activeFreezes.size > 0;
  }

  enable(): void {
    if (this.enabled) {
      return;
    }
    this.enabled = true;
    if (!this.tryAttach()) {
      this.ticker.subscribe(this.attachPoller);
    }
  }

  disable(): void {
    if (!this.enabled) {
      return;
    }
    this.enabled = false;
    this.ticker.unsubscribe(this.attachPoller);
    this.attachedService?.removeEventListener(this);
    this.attachedService = undefined;
    this.activeFreezes.clear();
    this.applyMovementLock();
  }

  onBuffEvent(event: BuffEvent): void {
    const instance = event.instance;
    if (instance.kind !== "Freeze" || instance.entity.id !== this.entity.id) {
      return;
    }

    switch (event.type) {
      case "buff_started":
      case "buff_restored":
      case "buff_updated":
        this.activeFreezes.add(instance);
        break;
      case "buff_ended":
        this.activeFreezes.delete(instance);
        break;
      default:
        return;
    }
    this.applyMovementLock();
  }

  private tryAttach(): boolean {
    if (!this.enabled) {
      return true;
    }
    const service = this.resolveService();
    if (!service) {
      return false;
    }
    this.attachedService = service;
    service.addEventListener(this);
    this.syncWithExisting(service);
    return true;
  }

  private syncWithExisting(service: BuffTimerService): void {
    this.activeFreezes.clear();
    const existing = service.tryGetBuff(this.entity.id, "Freeze");
    if (existing) {
      this.activeFreezes.add(existing);
    }
    this.applyMovementLock();
  }

  private applyMovementLock(): void {
    this.entity.mobility.frozen = this.activeFreezes.size > 0;
  }
}
