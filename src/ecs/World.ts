import { emitEvent } from "../core/EventBus";
import { ComponentStore } from "./ComponentStore";
import { componentRegistry, type ComponentRegistry } from "./ComponentRegistry";
import { EntityRegistry, type DespawnResult } from "./EntityRegistry";
import { isComponentEnabled, type Entity } from "./types";

/** Component names usable with a world over component map M. */
export type ComponentKey<M> = Extract<keyof M, string>;

/** One query result: the entity followed by its components, in key order. */
export type QueryRow<M, K extends readonly ComponentKey<M>[]> = [
  Entity,
  ...{ [I in keyof K]: K[I] extends keyof M ? Readonly<M[K[I]]> : never },
];

export interface WorldOptions {
  /** Source of component self-updates; defaults to the process-wide registry. */
  registry?: ComponentRegistry;
}

/**
 * The central ECS container: entity registry, per-type component stores and
 * the query engine.
 *
 * Access rules:
 * - `getComponent`, `query` and `forEach` hand out read-only views;
 * - `mutateComponent` is the only way to write, and holds an exclusive borrow
 *   for the duration of its callback;
 * - inside `forEach` the listed stores are shared-borrowed, so writing to them
 *   throws. Collect first, then mutate.
 */
export class World<M extends Record<keyof M, object>> {
  private readonly entityRegistry = new EntityRegistry();

  // Component stores: componentName → sparse set (type-erased)
  private readonly stores = new Map<string, ComponentStore<object>>();

  private readonly registry: ComponentRegistry;

  constructor(options: WorldOptions = {}) {
    this.registry = options.registry ?? componentRegistry;
  }

  // --- Entity lifecycle ---

  spawn(): Entity {
    return this.entityRegistry.spawn();
  }

  despawn(entity: Entity): DespawnResult {
    if (!this.entityRegistry.isAlive(entity)) return "already-despawned";

    // Remove from all component stores
    for (const store of this.stores.values()) {
      store.delete(entity);
    }
    const result = this.entityRegistry.despawn(entity);
    emitEvent("entity:despawned", { entity });
    return result;
  }

  isAlive(entity: Entity): boolean {
    return this.entityRegistry.isAlive(entity);
  }

  setEntityEnabled(entity: Entity, enabled: boolean): boolean {
    return this.entityRegistry.setEnabled(entity, enabled);
  }

  isEntityEnabled(entity: Entity): boolean {
    return this.entityRegistry.isEnabled(entity);
  }

  entities(): Entity[] {
    return this.entityRegistry.entities();
  }

  // --- Component operations ---

  /** Attaches (or replaces) a component. Returns false for a stale handle. */
  addComponent<K extends ComponentKey<M>>(entity: Entity, key: K, data: M[K]): boolean {
    if (!this.entityRegistry.isAlive(entity)) return false;
    let store = this.storeFor(key);
    if (!store) {
      store = new ComponentStore<M[K]>(key);
      this.stores.set(key, store);
    }
    store.set(entity, data);
    return true;
  }

  removeComponent<K extends ComponentKey<M>>(entity: Entity, key: K): boolean {
    if (!this.entityRegistry.isAlive(entity)) return false;
    return this.storeFor(key)?.delete(entity) ?? false;
  }

  getComponent<K extends ComponentKey<M>>(entity: Entity, key: K): Readonly<M[K]> | undefined {
    if (!this.entityRegistry.isAlive(entity)) return undefined;
    return this.storeFor(key)?.get(entity);
  }

  hasComponent<K extends ComponentKey<M>>(entity: Entity, key: K): boolean {
    if (!this.entityRegistry.isAlive(entity)) return false;
    return this.storeFor(key)?.has(entity) ?? false;
  }

  /**
   * Runs `fn` with exclusive access to one component instance.
   * Returns undefined (and never calls `fn`) when the handle is stale or the
   * component is absent.
   */
  mutateComponent<K extends ComponentKey<M>, R>(
    entity: Entity,
    key: K,
    fn: (component: M[K]) => R
  ): R | undefined {
    if (!this.entityRegistry.isAlive(entity)) return undefined;
    return this.storeFor(key)?.mutate(entity, fn);
  }

  /**
   * True when the entity is alive and enabled and each listed component is
   * present and enabled. Systems call this to honour disable flags.
   */
  isActive(entity: Entity, ...keys: ComponentKey<M>[]): boolean {
    if (!this.entityRegistry.isEnabled(entity)) return false;
    for (const key of keys) {
      const component = this.storeFor(key)?.get(entity);
      if (!component || !isComponentEnabled(component)) return false;
    }
    return true;
  }

  // --- Queries ---

  /** Entities holding every listed component, ascending by slot index. */
  entitiesWith(...keys: ComponentKey<M>[]): Entity[] {
    const stores = this.collectStores(keys);
    if (!stores) return [];
    return this.matchingEntities(stores);
  }

  /**
   * Rows of (entity, ...components) for entities holding every listed
   * component, ascending by slot index. Unknown component types yield [].
   */
  query<const K extends readonly ComponentKey<M>[]>(...keys: K): QueryRow<M, K>[] {
    const stores = this.collectStores(keys);
    if (!stores) return [];
    return this.withSharedBorrows(stores, () =>
      this.matchingEntities(stores).map((entity) => this.buildRow<K>(entity, stores))
    );
  }

  /**
   * Visits the same rows as `query` while holding shared borrows on every
   * listed store. Use it for the collection phase of a system.
   */
  forEach<const K extends readonly ComponentKey<M>[]>(
    keys: K,
    visitor: (...row: QueryRow<M, K>) => void
  ): void {
    const stores = this.collectStores(keys);
    if (!stores) return;
    this.withSharedBorrows(stores, () => {
      for (const entity of this.matchingEntities(stores)) {
        visitor(...this.buildRow<K>(entity, stores));
      }
    });
  }

  // --- Component self-updates ---

  /**
   * Runs every registered self-update over enabled components on enabled
   * entities, in registration order then slot order.
   */
  runComponentUpdates(dt: number): void {
    for (const registration of this.registry.list()) {
      const store = this.stores.get(registration.key);
      if (!store) continue;

      for (const entity of this.matchingEntities([store])) {
        if (!this.entityRegistry.isEnabled(entity)) continue;
        store.mutate(entity, (component) => {
          if (isComponentEnabled(component)) {
            registration.update(component, entity, dt);
          }
        });
      }
    }
  }

  get componentRegistry(): ComponentRegistry {
    return this.registry;
  }

  // --- Internals ---

  private storeFor<K extends ComponentKey<M>>(key: K): ComponentStore<M[K]> | undefined {
    // Stores are erased to ComponentStore<object>; the key fixes the shape.
    return this.stores.get(key) as ComponentStore<M[K]> | undefined;
  }

  private collectStores(keys: readonly string[]): ComponentStore<object>[] | undefined {
    const stores: ComponentStore<object>[] = [];
    for (const key of keys) {
      const store = this.stores.get(key);
      if (!store) return undefined;
      stores.push(store);
    }
    return stores;
  }

  private matchingEntities(stores: ComponentStore<object>[]): Entity[] {
    if (stores.length === 0) return this.entityRegistry.entities();

    // Walk the smallest store, check membership in the rest
    let smallest = stores[0];
    for (const store of stores) {
      if (store.size < smallest.size) smallest = store;
    }
    const matches = smallest.entities().filter((entity) => stores.every((store) => store.has(entity)));
    return matches.sort((a, b) => a.index - b.index);
  }

  private buildRow<K extends readonly ComponentKey<M>[]>(
    entity: Entity,
    stores: ComponentStore<object>[]
  ): QueryRow<M, K> {
    const row: [Entity, ...object[]] = [entity];
    for (const store of stores) {
      const component = store.get(entity);
      if (component) row.push(component);
    }
    // Same erasure as storeFor: stores were collected in key order
    return row as QueryRow<M, K>;
  }

  private withSharedBorrows<R>(stores: ComponentStore<object>[], fn: () => R): R {
    const [first, ...rest] = stores;
    if (!first) return fn();
    return first.withShared(() => this.withSharedBorrows(rest, fn));
  }
}
