import * as assert from "node:assert/strict";
import { StrokeTracker } from "../src/aggregation/StrokeTracker";
import { PointerEventsError } from "../src/core/errors";
import { HostWindow } from "../src/dispatch/HostWindow";
import { PointerEventsManager } from "../src/dispatch/PointerEventsManager";
import {
  registerPointerEvents,
  registerPointerEventsForWindow,
  unregisterPointerEventsForWindow,
} from "../src/dispatch/registration";
import { rawMouseEvent, rawTouchEvent } from "../src/input/RawInputTypes";

const main = new HostWindow("main");
const palette = new HostWindow("palette", { mouse: false });
const manager = new PointerEventsManager({ defaultWindow: main, nowMicros: () => 0 });

const mainStrokes = new StrokeTracker();
const paletteStrokes = new StrokeTracker();
registerPointerEvents(manager, mainStrokes);
registerPointerEventsForWindow(manager, palette, paletteStrokes);

main.emitMouse(rawMouseEvent("pressed", 10, 10));
main.emitMouse(rawMouseEvent("dragged", 40, 12));
main.emitMouse(rawMouseEvent("released", 40, 12));

palette.emitTouch(rawTouchEvent("down", 5, 5, { id: 0 }));
palette.emitTouch(rawTouchEvent("down", 50, 5, { id: 1 }));
palette.emitTouch(rawTouchEvent("up", 5, 5, { id: 0 }));
palette.emitTouch(rawTouchEvent("up", 50, 5, { id: 1 }));

assert.equal(manager.windowCount, 2);
assert.equal(mainStrokes.strokes.size, 1, "Mouse input should stay on the main window");
assert.equal(paletteStrokes.strokes.size, 2, "Each touch slot should get its own stroke");

assert.ok(unregisterPointerEventsForWindow(manager, palette, paletteStrokes));
assert.ok(!unregisterPointerEventsForWindow(manager, palette, paletteStrokes), "Second unregister is a no-op");

assert.throws(
  () => manager.requireEventsForWindow(new HostWindow("detached")),
  (error: unknown) => error instanceof PointerEventsError && error.code === "UNREGISTERED_WINDOW",
);

console.log("multi-window smoke: ok", {
  windows: manager.windowCount,
  mainStrokes: mainStrokes.strokes.size,
  paletteStrokes: paletteStrokes.strokes.size,
});
