import { describe, expect, it, vi } from "vitest";
import { PointerEventsError } from "../../core/errors";
import { rawMouseEvent } from "../../input/RawInputTypes";
import type { Logger } from "../../types/contracts";
import { HostWindow, type PointerWindow } from "../HostWindow";
import { PointerEvents } from "../PointerEvents";
import { PointerEventsManager } from "../PointerEventsManager";

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("PointerEventsManager", () => {
  it("creates one dispatcher per window on first lookup", () => {
    const manager = new PointerEventsManager();
    const a = new HostWindow("a");
    const b = new HostWindow("b");

    expect(manager.hasWindow(a)).toBe(false);
    const first = manager.eventsForWindow(a);
    expect(manager.eventsForWindow(a)).toBe(first);
    expect(manager.eventsForWindow(b)).not.toBe(first);
    expect(manager.windowCount).toBe(2);
    expect(first.window).toBe(a);
  });

  it("resolves the default window", () => {
    const main = new HostWindow("main");
    const manager = new PointerEventsManager({ defaultWindow: main });
    expect(manager.events().window).toBe(main);
    expect(manager.hasWindow(main)).toBe(true);
  });

  it("fails without a default window", () => {
    const error = catchError(() => new PointerEventsManager().events());
    expect(error).toBeInstanceOf(PointerEventsError);
    expect(error instanceof PointerEventsError && error.code).toBe("NO_DEFAULT_WINDOW");
  });

  it("fails and logs when a required window has no dispatcher", () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const manager = new PointerEventsManager({ logger });

    const error = catchError(() => manager.requireEventsForWindow(new HostWindow("ghost")));
    expect(error instanceof PointerEventsError && error.code).toBe("UNREGISTERED_WINDOW");
    expect(logger.error).toHaveBeenCalledWith("No PointerEvents available for window", { windowId: "ghost" });
    expect(manager.windowCount).toBe(0);
  });

  it("removes a window and disposes its dispatcher", () => {
    const logger: Logger = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const window = new HostWindow("w");
    const manager = new PointerEventsManager({ logger, config: { consumeLegacyEvents: true } });
    manager.eventsForWindow(window);
    expect(window.emitMouse(rawMouseEvent("moved", 0, 0))).toBe(true);

    expect(manager.removeWindow(window)).toBe(true);
    expect(manager.removeWindow(window)).toBe(false);
    expect(manager.hasWindow(window)).toBe(false);
    expect(manager.windowCount).toBe(0);
    expect(window.emitMouse(rawMouseEvent("moved", 0, 0))).toBe(false);
    expect(logger.debug).toHaveBeenCalledWith("Removed pointer events for window", { windowId: "w" });
  });

  it("passes its options to every dispatcher", () => {
    const window = new HostWindow("w");
    const manager = new PointerEventsManager({ config: { consumeLegacyEvents: true } });
    manager.eventsForWindow(window);
    expect(window.emitMouse(rawMouseEvent("moved", 0, 0))).toBe(true);
  });

  it("builds dispatchers through createEvents", () => {
    const createEvents = vi.fn((window: PointerWindow) => new PointerEvents(window));
    const manager = new PointerEventsManager({ createEvents });
    const window = new HostWindow("w");

    manager.eventsForWindow(window);
    manager.eventsForWindow(window);
    expect(createEvents).toHaveBeenCalledTimes(1);
  });
});
