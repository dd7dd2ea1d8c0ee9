import { afterEach, describe, it, expect, vi } from "vitest";
import { clearAllEvents, clearEvent, emitEvent, offEvent, onEvent } from "./EventBus";

const entity = { index: 0, generation: 1 };

afterEach(() => {
  clearAllEvents();
});

describe("EventBus", () => {
  it("delivers payloads to subscribers of that event only", () => {
    const arrived = vi.fn();
    const stuck = vi.fn();
    onEvent("nav:arrived", arrived);
    onEvent("nav:stuck-detected", stuck);

    emitEvent("nav:arrived", { entity, cell: { x: 1, y: 2 } });

    expect(arrived).toHaveBeenCalledWith({ entity, cell: { x: 1, y: 2 } });
    expect(stuck).not.toHaveBeenCalled();
  });

  it("unsubscribes through offEvent or the returned function", () => {
    const a = vi.fn();
    const b = vi.fn();
    onEvent("nav:arrived", a);
    const stop = onEvent("nav:arrived", b);

    offEvent("nav:arrived", a);
    stop();
    emitEvent("nav:arrived", { entity, cell: { x: 0, y: 0 } });

    expect(a).not.toHaveBeenCalled();
    expect(b).not.toHaveBeenCalled();
  });

  it("drops every handler of one event on clearEvent", () => {
    const handler = vi.fn();
    onEvent("entity:despawned", handler);
    clearEvent("entity:despawned");

    emitEvent("entity:despawned", { entity });

    expect(handler).not.toHaveBeenCalled();
  });
});
