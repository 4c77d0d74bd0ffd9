import { describe, expect, it, vi } from "vitest";
import { EVENT_ORDER } from "../../config/defaults";
import { PointerEventsError } from "../../core/errors";
import { rawMouseEvent } from "../../input/RawInputTypes";
import type { PointerEventArgs } from "../../model/PointerEventArgs";
import { HostWindow } from "../HostWindow";
import { PointerEventsManager } from "../PointerEventsManager";
import {
  registerPointerEventForWindow,
  registerPointerEvents,
  registerPointerEventsForWindow,
  unregisterPointerEventForWindow,
  unregisterPointerEvents,
  unregisterPointerEventsForWindow,
} from "../registration";

function makeListener() {
  return {
    onPointerDown: vi.fn<(e: PointerEventArgs) => boolean | void>(),
    onPointerUp: vi.fn<(e: PointerEventArgs) => boolean | void>(),
    onPointerMove: vi.fn<(e: PointerEventArgs) => boolean | void>(),
    onPointerCancel: vi.fn<(e: PointerEventArgs) => boolean | void>(),
  };
}

describe("registration helpers", () => {
  it("registers a bundle on a window, creating its dispatcher", () => {
    const manager = new PointerEventsManager();
    const window = new HostWindow("w");
    const listener = makeListener();

    registerPointerEventsForWindow(manager, window, listener);
    window.emitMouse(rawMouseEvent("pressed", 0, 0));

    expect(manager.hasWindow(window)).toBe(true);
    expect(listener.onPointerDown).toHaveBeenCalledTimes(1);
    expect(unregisterPointerEventsForWindow(manager, window, listener)).toBe(true);
  });

  it("fails to unregister from a window without a dispatcher", () => {
    const manager = new PointerEventsManager();
    expect(() => unregisterPointerEventsForWindow(manager, new HostWindow("w"), makeListener())).toThrow(
      PointerEventsError,
    );
  });

  it("registers a generic listener once per priority", () => {
    const manager = new PointerEventsManager();
    const window = new HostWindow("w");
    const listener = { onPointerEvent: vi.fn<(e: PointerEventArgs) => boolean | void>() };

    registerPointerEventForWindow(manager, window, listener, EVENT_ORDER.APP);
    registerPointerEventForWindow(manager, window, listener, EVENT_ORDER.APP);
    window.emitMouse(rawMouseEvent("entered", 0, 0));
    expect(listener.onPointerEvent).toHaveBeenCalledTimes(1);

    expect(unregisterPointerEventForWindow(manager, window, listener, EVENT_ORDER.APP)).toBe(true);
    expect(unregisterPointerEventForWindow(manager, window, listener, EVENT_ORDER.APP)).toBe(false);
    window.emitMouse(rawMouseEvent("exited", 0, 0));
    expect(listener.onPointerEvent).toHaveBeenCalledTimes(1);
  });

  it("uses the default window", () => {
    const main = new HostWindow("main");
    const manager = new PointerEventsManager({ defaultWindow: main });
    const listener = makeListener();

    registerPointerEvents(manager, listener);
    main.emitMouse(rawMouseEvent("pressed", 0, 0));
    expect(listener.onPointerDown).toHaveBeenCalledTimes(1);
    expect(unregisterPointerEvents(manager, listener)).toBe(true);
  });
});
