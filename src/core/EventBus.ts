/**
 * EventBus - Simple pub/sub for loose coupling between systems
 *
 * Usage:
 *   onEvent("nav:arrived", (data) => console.log(data.cell));
 *   emitEvent("nav:arrived", { entity, cell });
 *   offEvent("nav:arrived", handler);
 */

import type { EventMap, EventName } from "./EventTypes";

export type EventHandler<K extends EventName> = (data: EventMap[K]) => void;

type StoredHandler = (data: unknown) => void;

// Store all event handlers
const handlers: Map<EventName, Set<StoredHandler>> = new Map();

/**
 * Subscribe to an event. Returns a function that removes the subscription.
 */
export function onEvent<K extends EventName>(event: K, handler: EventHandler<K>): () => void {
  let eventHandlers = handlers.get(event);
  if (!eventHandlers) {
    eventHandlers = new Set();
    handlers.set(event, eventHandlers);
  }
  eventHandlers.add(handler as StoredHandler);
  return () => offEvent(event, handler);
}

/**
 * Unsubscribe from an event
 */
export function offEvent<K extends EventName>(event: K, handler: EventHandler<K>): void {
  const eventHandlers = handlers.get(event);
  if (eventHandlers) {
    eventHandlers.delete(handler as StoredHandler);
  }
}

/**
 * Emit an event to all subscribers
 */
export function emitEvent<K extends EventName>(event: K, data: EventMap[K]): void {
  const eventHandlers = handlers.get(event);
  if (eventHandlers) {
    eventHandlers.forEach((handler) => handler(data));
  }
}

/**
 * Remove all handlers for an event (useful for cleanup)
 */
export function clearEvent(event: EventName): void {
  handlers.delete(event);
}

/**
 * Remove all handlers for all events (useful for testing)
 */
export function clearAllEvents(): void {
  handlers.clear();
}
