import type { GameEntity } from "./entities/game-entity";

/** Live entities by id. Controllers resolve through here on every use. */
export class EntityDirectory {
  private readonly entities = new Map<string, GameEntity>();

  register(entity: GameEntity): void {
    this.entities.set(entity.id, entity);
  }

  unregister(entityId: string): GameEntity | undefined {
    const entity = this.entities.get(entityId);
    this.entities.delete(entityId);
    return entity;
  }

  resolve(entityId: string): GameEntity | undefined {
    return this.entities.get(entityId);
  }

  get size(): number {
    return this.entities.size;
  }
}
