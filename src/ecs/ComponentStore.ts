import { BorrowConflictError } from "../core/errors";
import { sameEntity, type Entity } from "./types";

/**
 * Sparse-set storage for one component type.
 *
 * sparse[slot] → dense index; dense arrays hold the values and their owning
 * handles. Removal swaps the last element into the hole.
 *
 * The store also tracks borrows: any number of shared borrows over the whole
 * store, or one exclusive borrow per instance, never both at once.
 */
export class ComponentStore<T extends object> {
  readonly key: string;

  private readonly sparse: Array<number | undefined> = [];
  private readonly dense: T[] = [];
  private readonly owners: Entity[] = [];

  private sharedBorrows = 0;
  private readonly exclusiveSlots = new Set<number>();

  constructor(key: string) {
    this.key = key;
  }

  get size(): number {
    return this.dense.length;
  }

  /** Inserts or replaces. Returns true when the entity had no value before. */
  set(entity: Entity, value: T): boolean {
    this.assertWritable(entity, "cannot attach");
    const denseIndex = this.sparse[entity.index];
    if (denseIndex !== undefined) {
      this.dense[denseIndex] = value;
      this.owners[denseIndex] = entity;
      return false;
    }
    this.sparse[entity.index] = this.dense.length;
    this.dense.push(value);
    this.owners.push(entity);
    return true;
  }

  get(entity: Entity): T | undefined {
    const denseIndex = this.lookup(entity);
    if (denseIndex === undefined) return undefined;
    if (this.exclusiveSlots.has(entity.index)) {
      throw new BorrowConflictError(this.key, `instance ${entity.index} is exclusively borrowed`);
    }
    return this.dense[denseIndex];
  }

  has(entity: Entity): boolean {
    return this.lookup(entity) !== undefined;
  }

  delete(entity: Entity): boolean {
    const denseIndex = this.lookup(entity);
    if (denseIndex === undefined) return false;
    this.assertWritable(entity, "cannot detach");

    const lastIndex = this.dense.length - 1;
    if (denseIndex !== lastIndex) {
      const moved = this.owners[lastIndex];
      this.dense[denseIndex] = this.dense[lastIndex];
      this.owners[denseIndex] = moved;
      this.sparse[moved.index] = denseIndex;
    }
    this.dense.pop();
    this.owners.pop();
    this.sparse[entity.index] = undefined;
    return true;
  }

  /**
   * Runs `fn` with the only live reference to the entity's value.
   * Returns undefined when the entity has no value in this store.
   */
  mutate<R>(entity: Entity, fn: (value: T) => R): R | undefined {
    const denseIndex = this.lookup(entity);
    if (denseIndex === undefined) return undefined;
    if (this.sharedBorrows > 0) {
      throw new BorrowConflictError(this.key, "exclusive access requested while the store is shared-borrowed");
    }
    if (this.exclusiveSlots.has(entity.index)) {
      throw new BorrowConflictError(this.key, `instance ${entity.index} is already exclusively borrowed`);
    }
    this.exclusiveSlots.add(entity.index);
    try {
      return fn(this.dense[denseIndex]);
    } finally {
      this.exclusiveSlots.delete(entity.index);
    }
  }

  /** Holds a shared borrow on the whole store while `fn` runs. */
  withShared<R>(fn: () => R): R {
    if (this.exclusiveSlots.size > 0) {
      throw new BorrowConflictError(this.key, "shared access requested while an instance is exclusively borrowed");
    }
    this.sharedBorrows++;
    try {
      return fn();
    } finally {
      this.sharedBorrows--;
    }
  }

  get isBorrowed(): boolean {
    return this.sharedBorrows > 0 || this.exclusiveSlots.size > 0;
  }

  /** Owning handles in dense (insertion/swap) order. */
  entities(): readonly Entity[] {
    return this.owners;
  }

  private lookup(entity: Entity): number | undefined {
    const denseIndex = this.sparse[entity.index];
    if (denseIndex === undefined) return undefined;
    // Generation check keeps a stale handle from reaching the slot's new owner
    return sameEntity(this.owners[denseIndex], entity) ? denseIndex : undefined;
  }

  private assertWritable(entity: Entity, action: string): void {
    if (this.sharedBorrows > 0) {
      throw new BorrowConflictError(this.key, `${action} while the store is shared-borrowed`);
    }
    if (this.exclusiveSlots.has(entity.index)) {
      throw new BorrowConflictError(this.key, `${action} while instance ${entity.index} is exclusively borrowed`);
    }
  }
}
