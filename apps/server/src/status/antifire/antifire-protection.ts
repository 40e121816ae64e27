import {
  ANTIFIRE_BUFF_DAMAGE_REDUCTION,
  DRAGONFIRE_SHIELD_DAMAGE_REDUCTION,
  STANDARD_ANTIFIRE_DURATION_SECONDS,
  type BuffDefinition,
  type DamageType,
} from "@tickbound/shared";
import type { BuffTimerService } from "../../buffs/buff-timer-service";
import type { GameEntity } from "../../world/entities/game-entity";

const DEFAULT_SHIELD_IDENTIFIERS = ["dragonfire_shield", "Dragonfire shield"];

/**
 * Dragonfire mitigation from live antifire buffs and an equipped dragonfire shield.
 */
export class AntifireProtection {
  private readonly shieldIdentifiers: Set<string>;

  constructor(
    private readonly entity: GameEntity,
    private readonly resolveService: () => BuffTimerService | undefined,
    shieldIdentifiers: readonly string[] = DEFAULT_SHIELD_IDENTIFIERS,
  ) {
    this.shieldIdentifiers = new Set(shieldIdentifiers.map((id) => id.toLowerCase()));
  }

  static buildStandardAntifireBuffDefinition(): BuffDefinition {
    return {
      kind: "Antifire",
      displayName: "Antifire",
      iconId: "antifire",
      durationSeconds: STANDARD_ANTIFIRE_DURATION_SECONDS,
      recurringIntervalSeconds: 0,
      isRecurring: false,
      showExpiryWarning: true,
      expiryWarningTicks: 0,
    };
  }

  hasActiveAntifireBuff(): boolean {
    return this.hasBuff("Antifire") || this.hasBuff("SuperAntifire");
  }

  hasDragonfireShieldEquipped(): boolean {
    const shield = this.entity.shield;
    if (!shield) {
      return false;
    }
    return this.shieldIdentifiers.has(shield.id.toLowerCase()) || this.shieldIdentifiers.has(shield.name.toLowerCase());
  }

  /** Damage left after dragonfire mitigation; other damage types pass through. */
  modifyDamage(damage: number, type: DamageType): number {
    if (type !== "dragonfire" || !Number.isFinite(damage) || damage <= 0) {
      return damage;
    }
    if (this.hasBuff("SuperAntifire")) {
      return 0;
    }

    const shielded = this.hasDragonfireShieldEquipped();
    const antifire = this.hasBuff("Antifire");
    if (shielded && antifire) {
      return 0;
    }

    let reduction = 0;
    if (shielded) {
      reduction = Math.max(reduction, DRAGONFIRE_SHIELD_DAMAGE_REDUCTION);
    }
    if (antifire) {
      reduction = Math.max(reduction, ANTIFIRE_BUFF_DAMAGE_REDUCTION);
    }
    return Math.max(0, Math.floor(damage * (1 - reduction)));
  }

  private hasBuff(kind: "Antifire" | "SuperAntifire"): boolean {
    return this.resolveService()?.tryGetBuff(this.entity.id, kind) !== undefined;
  }
}
