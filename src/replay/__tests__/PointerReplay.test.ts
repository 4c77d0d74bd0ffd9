import { describe, expect, it } from "vitest";
import { HostWindow } from "../../dispatch/HostWindow";
import { PointerEvents } from "../../dispatch/PointerEvents";
import { encodePointerEvent } from "../../interchange/codec";
import { PointerEventArgs } from "../../model/PointerEventArgs";
import { POINTER_DOWN, POINTER_MOVE, POINTER_UP } from "../../model/pointerEventTypes";
import { PointerReplayPlayer, type PointerReplayScript } from "../PointerReplay";

function makeScript(): PointerReplayScript {
  return {
    version: 1,
    name: "tap-drag",
    events: [
      { eventType: POINTER_DOWN, timestampMicros: 1_000_000 },
      { eventType: POINTER_MOVE, timestampMicros: 1_010_000 },
      { eventType: POINTER_UP, timestampMicros: 1_030_000 },
    ].map((init) => encodePointerEvent(new PointerEventArgs({ ...init, pointerId: 2 }))),
  };
}

describe("PointerReplayPlayer", () => {
  it("drains events relative to the first timestamp", () => {
    const script = makeScript();
    const player = new PointerReplayPlayer();

    expect(player.drainUntil(script, 0).map((e) => e.eventType)).toEqual([POINTER_DOWN]);
    expect(player.drainUntil(script, 10_000).map((e) => e.eventType)).toEqual([POINTER_MOVE]);
    expect(player.isFinished(script)).toBe(false);
    expect(player.drainUntil(script, 100_000).map((e) => e.eventType)).toEqual([POINTER_UP]);
    expect(player.isFinished(script)).toBe(true);
    expect(player.drainUntil(script, 200_000)).toEqual([]);
  });

  it("starts over after reset", () => {
    const script = makeScript();
    const player = new PointerReplayPlayer();
    player.drainUntil(script, 100_000);

    player.reset();
    expect(player.drainUntil(script, 100_000)).toHaveLength(3);
  });

  it("treats an empty script as finished", () => {
    const script: PointerReplayScript = { version: 1, name: "empty", events: [] };
    const player = new PointerReplayPlayer();
    expect(player.drainUntil(script, 0)).toEqual([]);
    expect(player.isFinished(script)).toBe(true);
  });

  it("dispatches due events with the window as source", () => {
    const window = new HostWindow("replay");
    const events = new PointerEvents(window);
    const sources: unknown[] = [];
    events.pointerDown.subscribe((e) => {
      sources.push(e.eventSource);
      return true;
    });
    const moves: number[] = [];
    events.pointerMove.subscribe((e) => void moves.push(e.pointerId));

    const player = new PointerReplayPlayer();
    expect(player.dispatchUntil(events, makeScript(), 20_000)).toBe(1);
    expect(sources).toEqual([window]);
    expect(moves).toEqual([2]);
  });
});
