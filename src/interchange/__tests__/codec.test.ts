import { describe, expect, it, vi } from "vitest";
import { Point } from "../../model/Point";
import { PointShape } from "../../model/PointShape";
import { PointerEventArgs } from "../../model/PointerEventArgs";
import { PROPERTY_PRESSURE, PROPERTY_TILT_X } from "../../model/pointerEventTypes";
import type { Logger } from "../../types/contracts";
import {
  decodePointShape,
  decodePointerEvent,
  decodePointerEventLog,
  encodePointerEvent,
  encodePointerEventLog,
} from "../codec";

function makeLogger(): Logger {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makePenEvent(): PointerEventArgs {
  const coalesced = new PointerEventArgs({
    eventType: "pointermove",
    timestampMicros: 9_000,
    pointerId: 12,
    sequenceIndex: 4,
    deviceType: "pen",
    isCoalesced: true,
    point: new Point({ position: { x: 9, y: 9 } }),
  });
  return new PointerEventArgs({
    eventType: "pointermove",
    timestampMicros: 10_000,
    detail: 1,
    point: new Point({
      position: { x: 10, y: 20 },
      precisePosition: { x: 10.5, y: 20.25 },
      shape: new PointShape({ shapeType: "RECTANGLE", width: 2, height: 3, angleDeg: 15 }),
      pressure: 0.5,
      tangentialPressure: 0.25,
      twistDeg: 45,
      tiltXDeg: -30,
      tiltYDeg: 10,
    }),
    pointerId: 12,
    deviceId: 3,
    pointerIndex: -1,
    sequenceIndex: 5,
    deviceType: "pen",
    isPrimary: true,
    button: -1,
    buttons: 1,
    modifiers: 2,
    coalescedPointerEvents: [coalesced],
    estimatedProperties: [PROPERTY_TILT_X, PROPERTY_PRESSURE],
    estimatedPropertiesExpectingUpdates: [PROPERTY_PRESSURE],
  });
}

describe("interchange codec", () => {
  it("writes snake_case records", () => {
    const record = encodePointerEvent(makePenEvent());
    expect(record.event_type).toBe("pointermove");
    expect(record.device_type).toBe("PEN");
    expect(record.point.precise_position).toEqual({ x: 10.5, y: 20.25 });
    expect(record.point.shape.shape_type).toBe("RECTANGLE");
    expect(record.estimated_properties).toEqual(["pressure", "tilt_x"]);
    expect(record.estimated_properties_expecting_updates).toEqual(["pressure"]);
    expect(record.coalesced_pointer_events).toHaveLength(1);
    expect(record.coalesced_pointer_events[0].is_coalesced).toBe(true);
  });

  it("is stable across decode and encode", () => {
    const first = encodePointerEvent(makePenEvent());
    const second = encodePointerEvent(decodePointerEvent(first));
    expect(second).toEqual(first);
  });

  it("is stable for a partial record", () => {
    const decoded = decodePointerEvent({ event_type: "pointerdown", pointer_id: 4, point: { position: { x: 1, y: 2 } } });
    const record = encodePointerEvent(decoded);
    expect(encodePointerEvent(decodePointerEvent(record))).toEqual(record);
  });

  it("fills defaults for missing fields", () => {
    const e = decodePointerEvent({});
    expect(e.eventType).toBe("unknown");
    expect(e.pointerId).toBe(0);
    expect(e.pointerIndex).toBe(0);
    expect(e.deviceType).toBe("unknown");
    expect(e.isPrimary).toBe(false);
    expect(e.position).toEqual({ x: 0, y: 0 });
    expect(e.point.shape.shapeType).toBe("ELLIPSE");
    expect(e.point.shape.width).toBe(1);
    expect(e.point.shape.height).toBe(1);
    expect(e.estimatedProperties.size).toBe(0);
    expect(e.coalescedPointerEvents).toEqual([]);
  });

  it("replaces mistyped fields with defaults", () => {
    const e = decodePointerEvent({
      pointer_id: "abc",
      is_primary: "yes",
      buttons: -1,
      point: { pressure: "high", position: { x: 5 } },
    });
    expect(e.pointerId).toBe(0);
    expect(e.isPrimary).toBe(false);
    expect(e.buttons).toBe(0);
    expect(e.point.pressure).toBe(0);
    expect(e.position).toEqual({ x: 5, y: 0 });
    expect(e.point.precisePosition).toEqual({ x: 5, y: 0 });
  });

  it("keeps fractional timestamps as whole microseconds", () => {
    const e = new PointerEventArgs({ timestampMicros: 1_234_567.5 });
    expect(e.timestampMicros).toBe(1_234_568);
    expect(encodePointerEvent(e).timestamp_micros).toBe(1_234_568);
    expect(decodePointerEvent(encodePointerEvent(e)).timestampMicros).toBe(1_234_568);
  });

  it("truncates fractional integer fields", () => {
    const e = decodePointerEvent({
      timestamp_micros: 1_234_567.9,
      pointer_id: 4.2,
      sequence_index: 7.5,
      device_id: -3.7,
      buttons: 1.9,
    });
    expect(e.timestampMicros).toBe(1_234_567);
    expect(e.pointerId).toBe(4);
    expect(e.sequenceIndex).toBe(7);
    expect(e.deviceId).toBe(-3);
    expect(e.buttons).toBe(1);
  });

  it("warns about unknown shape types", () => {
    const logger = makeLogger();
    const shape = decodePointShape({ shape_type: "TRIANGLE", width: 4 }, { logger });
    expect(shape.shapeType).toBe("ELLIPSE");
    expect(shape.width).toBe(4);
    expect(logger.warn).toHaveBeenCalledWith("Unknown shape type, using ELLIPSE", { value: "TRIANGLE" });
  });

  it("drops unknown estimated properties with a warning", () => {
    const logger = makeLogger();
    const e = decodePointerEvent({ estimated_properties: ["pressure", "tilt_z"] }, { logger });
    expect([...e.estimatedProperties]).toEqual(["pressure"]);
    expect(logger.warn).toHaveBeenCalledWith("Unknown estimated property dropped", {
      field: "estimated_properties",
      value: "tilt_z",
    });
  });

  it("reads device types in either case and keeps custom kinds", () => {
    expect(decodePointerEvent({ device_type: "Touch" }).deviceType).toBe("touch");
    expect(decodePointerEvent({ device_type: "MOUSE" }).deviceType).toBe("mouse");
    expect(decodePointerEvent({ device_type: "eraser" }).deviceType).toBe("eraser");
    expect(encodePointerEvent(new PointerEventArgs({ deviceType: "eraser" })).device_type).toBe("eraser");
  });

  it("assigns the event source to nested events", () => {
    const e = decodePointerEvent(
      { event_type: "pointermove", coalesced_pointer_events: [{ event_type: "pointermove" }, 7] },
      { eventSource: "replay" },
    );
    expect(e.eventSource).toBe("replay");
    expect(e.coalescedPointerEvents).toHaveLength(1);
    expect(e.coalescedPointerEvents[0].eventSource).toBe("replay");
  });

  it("decodes logs", () => {
    const logger = makeLogger();
    const log = encodePointerEventLog([makePenEvent(), new PointerEventArgs({ eventType: "pointerup" })]);
    expect(decodePointerEventLog(log).map((e) => e.eventType)).toEqual(["pointermove", "pointerup"]);
    expect(decodePointerEventLog({ events: [] }, { logger })).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("Pointer event log is not an array", { type: "object" });
  });
});
