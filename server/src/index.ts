import { fileURLToPath } from "url";
import { logger } from "../../src/core/Logger";
import { readLevelFile } from "../../src/grid/LevelLoader";
import { readServerConfig } from "./config";
import { NavigationServer } from "./NavigationServer";

const config = readServerConfig();
logger.level = config.logLevel;

const levelPath = config.levelPath ?? fileURLToPath(new URL("../../levels/station.json", import.meta.url));

logger.info("SERVER", "Starting navigation server...");
const server = new NavigationServer(readLevelFile(levelPath), config);

// Graceful shutdown
process.on("SIGINT", () => {
  logger.info("SERVER", "Shutting down server...");
  server.shutdown();
  process.exit(0);
});

process.on("SIGTERM", () => {
  logger.info("SERVER", "Shutting down server...");
  server.shutdown();
  process.exit(0);
});
