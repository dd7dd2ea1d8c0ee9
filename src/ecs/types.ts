/**
 * Core ECS type definitions.
 * - Entities are (index, generation) handles issued by the EntityRegistry.
 * - Components are plain data objects keyed by a component name.
 * - Systems are functions run by the Scheduler once per tick.
 */

export interface Entity {
  readonly index: number;
  readonly generation: number;
}

/** Component name → component shape. */
export type ComponentMap = Record<string, object>;

/** Optional per-component switch; absent means enabled. */
export interface Toggleable {
  enabled?: boolean;
}

export function entityKey(entity: Entity): string {
  return `${entity.index}v${entity.generation}`;
}

export function sameEntity(a: Entity, b: Entity): boolean {
  return a.index === b.index && a.generation === b.generation;
}

export function isComponentEnabled(component: object): boolean {
  return !("enabled" in component) || component.enabled !== false;
}
