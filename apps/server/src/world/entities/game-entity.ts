import type { DamageType } from "@tickbound/shared";
import type { PoisonController } from "../../status/poison/poison-controller";

/** Identity of an object buffs can attach to. */
export interface EntityHandle {
  readonly id: string;
  readonly name: string;
}

/** Anything that can take damage and die. */
export interface CombatTarget {
  readonly isAlive: boolean;
  applyDamage(amount: number, type: DamageType): void;
}

export interface DamageRecord {
  amount: number;
  type: DamageType;
}

/**
 * Minimal hitpoint pool. Records every hit so callers can inspect what landed.
 */
export class HealthComponent implements CombatTarget {
  readonly damageTaken: DamageRecord[] = [];
  private hp: number;

  constructor(readonly maxHp: number) {
    this.hp = Math.max(0, maxHp);
  }

  get currentHp(): number {
    return this.hp;
  }

  get isAlive(): boolean {
    return this.hp > 0;
  }

  applyDamage(amount: number, type: DamageType): void {
    if (!Number.isFinite(amount) || amount <= 0 || !this.isAlive) {
      return;
    }
    this.hp = Math.max(0, this.hp - amount);
    this.damageTaken.push({ amount, type });
  }
}

/** Movement state locked by freezes. */
export interface Mobility {
  frozen: boolean;
}

export interface EquippedItem {
  id: string;
  name: string;
}

/**
 * Server-side entity: a handle plus the optional components buff controllers look up.
 */
export class GameEntity implements EntityHandle {
  combatTarget?: CombatTarget;
  poison?: PoisonController;
  readonly mobility: Mobility = { frozen: false };
  shield?: EquippedItem;

  constructor(
    readonly id: string,
    readonly name: string = id,
  ) {}
}
