import { NavError } from "../core/errors";
import { logger } from "../core/Logger";
import type { World } from "./World";

/** Fixed per-tick phase order. */
export const PHASES = ["input", "intent", "pathfinding", "physics", "render"] as const;
export type Phase = (typeof PHASES)[number];

export type System<M extends Record<keyof M, object>> = (world: World<M>, dt: number) => void;

interface ScheduledSystem<M extends Record<keyof M, object>> {
  name: string;
  phase: Phase;
  run: System<M>;
}

/**
 * Runs systems once per tick: phases in PHASES order, systems inside a phase
 * in registration order. Component self-updates run first, at the head of the
 * input phase.
 */
export class Scheduler<M extends Record<keyof M, object>> {
  readonly world: World<M>;
  private readonly systems: ScheduledSystem<M>[] = [];

  private tickCount = 0;
  private elapsedTime = 0;

  constructor(world: World<M>) {
    this.world = world;
  }

  addSystem(phase: Phase, name: string, run: System<M>): this {
    if (this.systems.some((s) => s.name === name)) {
      throw new NavError(`System "${name}" is already scheduled`);
    }
    this.systems.push({ name, phase, run });
    return this;
  }

  removeSystem(name: string): boolean {
    const index = this.systems.findIndex((s) => s.name === name);
    if (index === -1) return false;
    this.systems.splice(index, 1);
    return true;
  }

  /** System names in execution order. */
  executionOrder(): string[] {
    return this.ordered().map((s) => s.name);
  }

  tick(dt: number): void {
    if (!Number.isFinite(dt) || dt <= 0) {
      throw new RangeError(`Tick delta must be a positive finite number, got ${dt}`);
    }
    if (!this.world.componentRegistry.isSealed) {
      this.world.componentRegistry.seal();
      logger.debug("ECS", "Component registry sealed");
    }

    this.tickCount++;
    this.elapsedTime += dt;

    this.world.runComponentUpdates(dt);
    for (const system of this.ordered()) {
      system.run(this.world, dt);
    }
  }

  get ticks(): number {
    return this.tickCount;
  }

  get elapsed(): number {
    return this.elapsedTime;
  }

  private ordered(): ScheduledSystem<M>[] {
    // Stable sort: registration order holds within a phase
    return [...this.systems].sort((a, b) => PHASES.indexOf(a.phase) - PHASES.indexOf(b.phase));
  }
}
