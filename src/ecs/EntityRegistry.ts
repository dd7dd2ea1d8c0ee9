import type { Entity } from "./types";

export type DespawnResult = "despawned" | "already-despawned";

/**
 * Issues and invalidates entity handles.
 *
 * Slots are recycled through a FIFO free list; despawning bumps the slot's
 * generation so a handle from a previous life never matches the new occupant.
 */
export class EntityRegistry {
  private readonly generations: number[] = [];
  private readonly alive: boolean[] = [];
  private readonly enabled: boolean[] = [];
  private readonly freeSlots: number[] = [];
  private liveCount = 0;

  spawn(): Entity {
    const recycled = this.freeSlots.shift();
    const index = recycled ?? this.generations.length;
    if (recycled === undefined) {
      this.generations.push(1);
      this.alive.push(false);
      this.enabled.push(true);
    }
    this.alive[index] = true;
    this.enabled[index] = true;
    this.liveCount++;
    return { index, generation: this.generations[index] };
  }

  despawn(entity: Entity): DespawnResult {
    if (!this.isAlive(entity)) return "already-despawned";
    this.generations[entity.index]++;
    this.alive[entity.index] = false;
    this.freeSlots.push(entity.index);
    this.liveCount--;
    return "despawned";
  }

  isAlive(entity: Entity): boolean {
    return (
      entity.index >= 0 &&
      entity.index < this.generations.length &&
      this.alive[entity.index] &&
      this.generations[entity.index] === entity.generation
    );
  }

  /** Entity-level switch. Returns false for stale handles. */
  setEnabled(entity: Entity, enabled: boolean): boolean {
    if (!this.isAlive(entity)) return false;
    this.enabled[entity.index] = enabled;
    return true;
  }

  isEnabled(entity: Entity): boolean {
    return this.isAlive(entity) && this.enabled[entity.index];
  }

  /** Live handle currently occupying a slot, if any. */
  entityAt(index: number): Entity | undefined {
    if (index < 0 || index >= this.generations.length || !this.alive[index]) return undefined;
    return { index, generation: this.generations[index] };
  }

  /** All live entities, ascending by slot index. */
  entities(): Entity[] {
    const result: Entity[] = [];
    for (let index = 0; index < this.generations.length; index++) {
      if (this.alive[index]) result.push({ index, generation: this.generations[index] });
    }
    return result;
  }

  get aliveCount(): number {
    return this.liveCount;
  }

  /** Number of slots ever allocated. */
  get capacity(): number {
    return this.generations.length;
  }
}
