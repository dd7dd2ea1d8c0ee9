import { NavError } from "../core/errors";
import { logger } from "../core/Logger";
import type { Entity } from "./types";

/**
 * Self-update routine contributed by a component type.
 *
 * `update` only sees its own component instance: it must not reach into other
 * components or other entities.
 */
export interface ComponentRegistration<T extends object = object> {
  readonly key: string;
  update(component: T, entity: Entity, dt: number): void;
}

/**
 * Registry of component self-updates, filled during start-up and sealed once
 * the first tick runs. Lets the scheduler sweep "every enabled component of
 * type T" without knowing the concrete types.
 */
export class ComponentRegistry {
  private readonly registrations = new Map<string, ComponentRegistration>();
  private sealed = false;

  register<T extends object>(registration: ComponentRegistration<T>): void {
    if (this.sealed) {
      throw new NavError(`Cannot register "${registration.key}": registry is sealed after the first tick`);
    }
    if (this.registrations.has(registration.key)) {
      logger.debug("ECS", `Replacing self-update for "${registration.key}"`);
    }
    this.registrations.set(registration.key, registration);
  }

  has(key: string): boolean {
    return this.registrations.has(key);
  }

  /** Registrations in the order they were first added. */
  list(): ComponentRegistration[] {
    return [...this.registrations.values()];
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}

/** Process-wide registry that component modules register into at import time. */
export const componentRegistry = new ComponentRegistry();
