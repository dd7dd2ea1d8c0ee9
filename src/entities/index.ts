/**
 * Entity factory exports
 *
 * Factories attach every component an entity kind needs, with defaults.
 */

export { createNavAgent, type NavAgentOptions } from "./createNavAgent";
export { createObstacle } from "./createObstacle";
