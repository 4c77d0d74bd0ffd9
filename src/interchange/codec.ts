import { Point } from "../model/Point";
import { PointShape, SHAPE_TYPES, type ShapeType } from "../model/PointShape";
import { PointerEventArgs } from "../model/PointerEventArgs";
import {
  STANDARD_DEVICE_TYPES,
  TYPE_UNKNOWN,
  isEstimatedProperty,
  type DeviceType,
  type EstimatedProperty,
} from "../model/pointerEventTypes";
import { NOOP_LOGGER, type Logger } from "../types/contracts";
import {
  pointRecordSchema,
  pointShapeRecordSchema,
  pointerEventRecordSchema,
  type PointRecord,
  type PointShapeRecord,
  type PointerEventRecord,
} from "./schema";

export interface DecodeOptions {
  logger?: Logger;
  /** Assigned to every decoded event, nested ones included. */
  eventSource?: unknown;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveShapeType(value: string | undefined, logger: Logger): ShapeType {
  if (value === undefined) return "ELLIPSE";
  const match = SHAPE_TYPES.find((t) => t === value);
  if (match) return match;
  logger.warn("Unknown shape type, using ELLIPSE", { value });
  return "ELLIPSE";
}

function encodeDeviceType(deviceType: DeviceType): string {
  return STANDARD_DEVICE_TYPES.some((t) => t === deviceType) ? deviceType.toUpperCase() : deviceType;
}

function decodeDeviceType(value: string | undefined): DeviceType {
  if (value === undefined || value.length === 0) return TYPE_UNKNOWN;
  const lower = value.toLowerCase();
  const standard = STANDARD_DEVICE_TYPES.find((t) => t === lower);
  return standard ?? value;
}

function decodeEstimatedProperties(values: unknown[], field: string, logger: Logger): EstimatedProperty[] {
  const out: EstimatedProperty[] = [];
  for (const value of values) {
    if (typeof value === "string" && isEstimatedProperty(value)) {
      out.push(value);
    } else {
      logger.warn("Unknown estimated property dropped", { field, value });
    }
  }
  return out;
}

function decodeNested(values: unknown[], field: string, options: DecodeOptions, logger: Logger): PointerEventArgs[] {
  const out: PointerEventArgs[] = [];
  for (const value of values) {
    if (isObject(value)) {
      out.push(decodePointerEvent(value, options));
    } else {
      logger.warn("Nested pointer event is not an object", { field });
    }
  }
  return out;
}

export function encodePointShape(shape: PointShape): PointShapeRecord {
  return {
    shape_type: shape.shapeType,
    width: shape.width,
    height: shape.height,
    width_tolerance: shape.widthTolerance,
    height_tolerance: shape.heightTolerance,
    angle_deg: shape.angleDeg,
  };
}

export function decodePointShape(value: unknown, options: DecodeOptions = {}): PointShape {
  const logger = options.logger ?? NOOP_LOGGER;
  const parsed = pointShapeRecordSchema.parse(isObject(value) ? value : {});
  return new PointShape({
    shapeType: resolveShapeType(parsed.shape_type, logger),
    width: parsed.width,
    height: parsed.height,
    widthTolerance: parsed.width_tolerance,
    heightTolerance: parsed.height_tolerance,
    angleDeg: parsed.angle_deg,
  });
}

export function encodePoint(point: Point): PointRecord {
  return {
    position: { x: point.position.x, y: point.position.y },
    precise_position: { x: point.precisePosition.x, y: point.precisePosition.y },
    shape: encodePointShape(point.shape),
    pressure: point.pressure,
    tangential_pressure: point.tangentialPressure,
    twist_deg: point.twistDeg,
    tilt_x_deg: point.tiltXDeg,
    tilt_y_deg: point.tiltYDeg,
  };
}

/** Missing `precise_position` falls back to `position`. */
export function decodePoint(value: unknown, options: DecodeOptions = {}): Point {
  const parsed = pointRecordSchema.parse(isObject(value) ? value : {});
  return new Point({
    position: parsed.position,
    precisePosition: parsed.precise_position ?? parsed.position,
    shape: decodePointShape(parsed.shape, options),
    pressure: parsed.pressure,
    tangentialPressure: parsed.tangential_pressure,
    twistDeg: parsed.twist_deg,
    tiltXDeg: parsed.tilt_x_deg,
    tiltYDeg: parsed.tilt_y_deg,
  });
}

export function encodePointerEvent(e: PointerEventArgs): PointerEventRecord {
  return {
    event_type: e.eventType,
    timestamp_micros: e.timestampMicros,
    detail: e.detail,
    point: encodePoint(e.point),
    pointer_id: e.pointerId,
    device_id: e.deviceId,
    pointer_index: e.pointerIndex,
    sequence_index: e.sequenceIndex,
    device_type: encodeDeviceType(e.deviceType),
    is_coalesced: e.isCoalesced,
    is_predicted: e.isPredicted,
    is_primary: e.isPrimary,
    button: e.button,
    buttons: e.buttons,
    modifiers: e.modifiers,
    coalesced_pointer_events: e.coalescedPointerEvents.map(encodePointerEvent),
    predicted_pointer_events: e.predictedPointerEvents.map(encodePointerEvent),
    estimated_properties: [...e.estimatedProperties].sort(),
    estimated_properties_expecting_updates: [...e.estimatedPropertiesExpectingUpdates].sort(),
  };
}

/**
 * Decodes an interchange record. Never throws: missing or mistyped fields take
 * their defaults and unknown enum values are logged and replaced.
 */
export function decodePointerEvent(value: unknown, options: DecodeOptions = {}): PointerEventArgs {
  const logger = options.logger ?? NOOP_LOGGER;
  if (!isObject(value)) {
    logger.warn("Pointer event record is not an object, using defaults", { type: typeof value });
  }
  const parsed = pointerEventRecordSchema.parse(isObject(value) ? value : {});

  return new PointerEventArgs({
    eventSource: options.eventSource,
    eventType: parsed.event_type,
    timestampMicros: parsed.timestamp_micros,
    detail: parsed.detail,
    point: decodePoint(parsed.point, options),
    pointerId: parsed.pointer_id,
    deviceId: parsed.device_id,
    pointerIndex: parsed.pointer_index,
    sequenceIndex: parsed.sequence_index,
    deviceType: decodeDeviceType(parsed.device_type),
    isCoalesced: parsed.is_coalesced,
    isPredicted: parsed.is_predicted,
    isPrimary: parsed.is_primary,
    button: parsed.button,
    buttons: parsed.buttons,
    modifiers: parsed.modifiers,
    coalescedPointerEvents: decodeNested(parsed.coalesced_pointer_events, "coalesced_pointer_events", options, logger),
    predictedPointerEvents: decodeNested(parsed.predicted_pointer_events, "predicted_pointer_events", options, logger),
    estimatedProperties: decodeEstimatedProperties(parsed.estimated_properties, "estimated_properties", logger),
    estimatedPropertiesExpectingUpdates: decodeEstimatedProperties(
      parsed.estimated_properties_expecting_updates,
      "estimated_properties_expecting_updates",
      logger,
    ),
  });
}

export function encodePointerEventLog(events: readonly PointerEventArgs[]): PointerEventRecord[] {
  return events.map(encodePointerEvent);
}

export function decodePointerEventLog(values: unknown, options: DecodeOptions = {}): PointerEventArgs[] {
  if (!Array.isArray(values)) {
    (options.logger ?? NOOP_LOGGER).warn("Pointer event log is not an array", { type: typeof values });
    return [];
  }
  return decodeNested(values, "log", options, options.logger ?? NOOP_LOGGER);
}
