import * as assert from "node:assert/strict";
import { StrokeTracker } from "../src/aggregation/StrokeTracker";
import { HostWindow } from "../src/dispatch/HostWindow";
import { PointerEvents } from "../src/dispatch/PointerEvents";
import { encodePointerEventLog } from "../src/interchange/codec";
import type { PointerEventArgs } from "../src/model/PointerEventArgs";
import { PointerReplayPlayer, type PointerReplayScript } from "../src/replay/PointerReplay";
import { syntheticMultiTouch } from "../src/testing/syntheticInput";

const recorderWindow = new HostWindow("recorder", { mouse: false });
const recorder = new PointerEvents(recorderWindow, { nowMicros: () => 0 });
const recorded: PointerEventArgs[] = [];
recorder.pointerEvent.subscribe((e) => {
  recorded.push(e);
});

const input = syntheticMultiTouch("replay-smoke", [
  { from: { x: 100, y: 100 }, to: { x: 300, y: 140 } },
  { from: { x: 400, y: 380 }, to: { x: 220, y: 260 } },
]);
for (const e of input) recorderWindow.emitTouch(e);

assert.equal(recorded.length, input.length, "Every raw touch should be recorded");

const script: PointerReplayScript = {
  version: 1,
  name: "two-finger-drag",
  events: encodePointerEventLog(recorded),
};

const replayWindow = new HostWindow("replay");
const replayEvents = new PointerEvents(replayWindow);
const tracker = new StrokeTracker();
replayEvents.registerPointerEvents(tracker);

const player = new PointerReplayPlayer();
for (let t = 0; t <= 200_000; t += 16_000) {
  player.dispatchUntil(replayEvents, script, t);
}

assert.ok(player.isFinished(script), "Replay should be fully consumed");
assert.equal(tracker.strokes.size, 2, "Replay should rebuild one stroke per finger");
for (const strokes of tracker.strokes.values()) {
  assert.equal(strokes.length, 1);
  assert.ok(strokes[0].isFinished(), "Each stroke should end with pointerup");
  assert.equal(strokes[0].size, 10);
}

console.log("pointer replay smoke: ok", {
  recorded: recorded.length,
  strokes: [...tracker.strokes.keys()],
});
