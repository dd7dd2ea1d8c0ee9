// Public entry point

export * from "./core/errors";
export { logger, LogLevel, parseLogLevel, type LogCategory } from "./core/Logger";
export { onEvent, offEvent, emitEvent, clearEvent, clearAllEvents, type EventHandler } from "./core/EventBus";
export type * from "./core/EventTypes";
export { PathSearch, pathCost, octileDistance, type SearchOptions, type SearchResult } from "./core/PathSearch";

export { World, type ComponentKey, type QueryRow, type WorldOptions } from "./ecs/World";
export { Scheduler, PHASES, type Phase, type System } from "./ecs/Scheduler";
export { ComponentRegistry, componentRegistry, type ComponentRegistration } from "./ecs/ComponentRegistry";
export { EntityRegistry, type DespawnResult } from "./ecs/EntityRegistry";
export { entityKey, sameEntity, type Entity } from "./ecs/types";
export * from "./ecs/components";

export { GridMap, cellKey, sameCell, type GridCell, type WorldPoint, type CellState } from "./grid/GridMap";
export { loadLevel, parseLevelDescription, readLevelFile, type Level, type LevelDescription, type BotSpawn } from "./grid/LevelLoader";

export { NAV_DEFAULTS, resolveNavigationConfig, type NavigationConfig } from "./config/navigation";
export { createNavAgent, createObstacle, type NavAgentOptions } from "./entities";

export { createPathfindingSystem, setNavigationTarget, clearNavigationTarget, turnTowards } from "./systems/PathfindingSystem";
export { createMovementSystem, type MovementOptions } from "./systems/MovementSystem";
export { createPatrolSystem } from "./systems/PatrolSystem";
export { createDebugOverlaySystem, buildNavigationDebugView, type NavigationDebugRow } from "./systems/DebugOverlaySystem";
export { createSimulation, type Simulation, type SimulationCommand, type SimulationOptions } from "./simulation";
