import { Server, Socket } from "socket.io";
import { createServer, type Server as HttpServer } from "http";
import { onEvent } from "../../src/core/EventBus";
import { logger } from "../../src/core/Logger";
import { entityKey } from "../../src/ecs/types";
import { PATHFINDER } from "../../src/ecs/components";
import { createSimulation, type Simulation } from "../../src/simulation";
import type { Level } from "../../src/grid/LevelLoader";
import type { NavigationDebugRow } from "../../src/systems/DebugOverlaySystem";
import type { ServerConfig } from "./config";
import { parseEntityPayload, parsePoint, parseTargetRequest, toAgentStates, toLevelInfo } from "./protocol";
import type { ClientToServerEvents, ServerToClientEvents } from "./types";

type ClientSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

/**
 * Headless host: runs the simulation on a fixed interval and streams the
 * navigation overlay to every connected client.
 *
 * Client requests are only queued here; the simulation applies them at the
 * start of its next tick.
 */
export class NavigationServer {
  private readonly io: Server<ClientToServerEvents, ServerToClientEvents>;
  private readonly httpServer: HttpServer;
  private readonly simulation: Simulation;
  private readonly config: ServerConfig;
  private readonly unsubscribers: Array<() => void> = [];
  private tickInterval: ReturnType<typeof setInterval> | null = null;
  private latest: NavigationDebugRow[] = [];

  constructor(level: Level, config: ServerConfig) {
    this.config = config;
    this.simulation = createSimulation(level, {
      overlay: { publish: (rows) => this.broadcast(rows) },
    });

    this.httpServer = createServer();
    this.io = new Server(this.httpServer, {
      cors: { origin: "*" },
    });

    this.setupHandlers();
    this.unsubscribers.push(
      onEvent("entity:despawned", ({ entity }) => {
        this.io.emit("bot:despawned", { entity: { index: entity.index, generation: entity.generation } });
      })
    );

    this.httpServer.listen(config.port, () => {
      logger.info("SERVER", `Navigation server running on port ${config.port} (${config.tickRate} Hz, level "${level.name}")`);
    });

    const dt = 1 / config.tickRate;
    this.tickInterval = setInterval(() => this.tick(dt), 1000 / config.tickRate);
  }

  private setupHandlers(): void {
    this.io.on("connection", (socket: ClientSocket) => {
      logger.info("SERVER", `Client connected: ${socket.id}`);

      socket.emit("welcome", {
        level: toLevelInfo(this.simulation.level),
        agents: toAgentStates(this.latest, this.config.debugExplored),
      });

      socket.on("nav:set-target", (data) => this.handleSetTarget(socket, data));
      socket.on("nav:clear-target", (data) => this.handleClearTarget(socket, data));
      socket.on("bot:spawn", (data) => this.handleSpawn(socket, data));
      socket.on("bot:despawn", (data) => this.handleDespawn(socket, data));
      socket.on("disconnect", () => {
        logger.info("SERVER", `Client disconnected: ${socket.id}`);
      });
    });
  }

  private handleSetTarget(socket: ClientSocket, data: unknown): void {
    const request = parseTargetRequest(data);
    if (!request || !this.simulation.world.isAlive(request.entity)) {
      socket.emit("nav:rejected", { reason: "nav:set-target needs a live entity and a cell or position" });
      return;
    }
    this.simulation.enqueue({ type: "set-target", entity: request.entity, target: request.target });
    logger.debug("SERVER", `${socket.id} retargeted ${entityKey(request.entity)}`);
  }

  private handleClearTarget(socket: ClientSocket, data: unknown): void {
    const entity = parseEntityPayload(data);
    if (!entity || !this.simulation.world.isAlive(entity)) {
      socket.emit("nav:rejected", { reason: "nav:clear-target needs a live entity" });
      return;
    }
    this.simulation.enqueue({ type: "clear-target", entity });
  }

  private handleSpawn(socket: ClientSocket, data: unknown): void {
    const payload: object = typeof data === "object" && data !== null ? data : {};
    const position = parsePoint("position" in payload ? payload.position : null);
    const name = "name" in payload && typeof payload.name === "string" ? payload.name : undefined;

    const { grid } = this.simulation.level;
    const cell = position ? grid.worldToCell(position) : null;
    if (!position || !cell || !grid.isWalkable(cell.x, cell.y)) {
      socket.emit("nav:rejected", { reason: "bot:spawn needs a position on a walkable cell" });
      return;
    }

    this.simulation.enqueue({
      type: "spawn-bot",
      bot: { name, spawn: position },
      onSpawned: (entity) => {
        this.io.emit("bot:spawned", { entity: { index: entity.index, generation: entity.generation }, name: name ?? null });
        logger.info("SERVER", `${socket.id} spawned ${entityKey(entity)} at (${position.x}, ${position.z})`);
      },
    });
  }

  private handleDespawn(socket: ClientSocket, data: unknown): void {
    const entity = parseEntityPayload(data);
    // Only bots; obstacles are part of the level
    if (!entity || !this.simulation.world.hasComponent(entity, PATHFINDER)) {
      socket.emit("nav:rejected", { reason: "bot:despawn needs a live bot" });
      return;
    }
    this.simulation.enqueue({ type: "despawn", entity });
    logger.info("SERVER", `${socket.id} despawned ${entityKey(entity)}`);
  }

  private tick(dt: number): void {
    try {
      this.simulation.tick(dt);
    } catch (err) {
      logger.error("SERVER", "Simulation tick failed, stopping loop", err);
      this.stopLoop();
    }
  }

  private broadcast(rows: NavigationDebugRow[]): void {
    this.latest = rows;
    if (this.io.engine.clientsCount === 0) return;
    this.io.emit("nav:state", {
      agents: toAgentStates(rows, this.config.debugExplored),
      tick: this.simulation.scheduler.ticks,
      timestamp: Date.now(),
    });
  }

  private stopLoop(): void {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
  }

  shutdown(): void {
    this.stopLoop();
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.io.close();
  }
}
