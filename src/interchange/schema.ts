import { z } from "zod";

// Every field falls back instead of failing so that partial or older records
// still decode. Enum-like strings are kept raw here and resolved by the codec,
// which logs unrecognized values.

const finite = (fallback: number) => z.number().finite().catch(fallback);
// Integer fields drop any fractional part; only non-numbers fall back.
const integer = z.number().finite().transform(Math.trunc);
const unsigned = integer.pipe(z.number().int().nonnegative()).catch(0);
const signed = integer.pipe(z.number().int()).catch(0);
const flag = z.boolean().catch(false);
const optionalString = z.string().optional().catch(undefined);

export const vec2Schema = z.object({
  x: finite(0),
  y: finite(0),
});

export const pointShapeRecordSchema = z.object({
  shape_type: optionalString,
  width: finite(1),
  height: finite(1),
  width_tolerance: finite(0),
  height_tolerance: finite(0),
  angle_deg: finite(0),
});

export const pointRecordSchema = z.object({
  position: vec2Schema.catch({ x: 0, y: 0 }),
  precise_position: vec2Schema.optional().catch(undefined),
  shape: pointShapeRecordSchema.optional().catch(undefined),
  pressure: finite(0),
  tangential_pressure: finite(0),
  twist_deg: finite(0),
  tilt_x_deg: finite(0),
  tilt_y_deg: finite(0),
});

export const pointerEventRecordSchema = z.object({
  event_type: z.string().min(1).catch("unknown"),
  timestamp_micros: unsigned,
  detail: unsigned,
  point: pointRecordSchema.optional().catch(undefined),
  pointer_id: unsigned,
  device_id: signed,
  pointer_index: signed,
  sequence_index: unsigned,
  device_type: optionalString,
  is_coalesced: flag,
  is_predicted: flag,
  is_primary: flag,
  button: signed,
  buttons: unsigned,
  modifiers: unsigned,
  // Nested events are decoded one by one so a bad entry drops only itself.
  coalesced_pointer_events: z.array(z.unknown()).catch([]),
  predicted_pointer_events: z.array(z.unknown()).catch([]),
  estimated_properties: z.array(z.unknown()).catch([]),
  estimated_properties_expecting_updates: z.array(z.unknown()).catch([]),
});

export interface Vec2Record {
  x: number;
  y: number;
}

export interface PointShapeRecord {
  shape_type: string;
  width: number;
  height: number;
  width_tolerance: number;
  height_tolerance: number;
  angle_deg: number;
}

export interface PointRecord {
  position: Vec2Record;
  precise_position: Vec2Record;
  shape: PointShapeRecord;
  pressure: number;
  tangential_pressure: number;
  twist_deg: number;
  tilt_x_deg: number;
  tilt_y_deg: number;
}

export interface PointerEventRecord {
  event_type: string;
  timestamp_micros: number;
  detail: number;
  point: PointRecord;
  pointer_id: number;
  device_id: number;
  pointer_index: number;
  sequence_index: number;
  device_type: string;
  is_coalesced: boolean;
  is_predicted: boolean;
  is_primary: boolean;
  button: number;
  buttons: number;
  modifiers: number;
  coalesced_pointer_events: PointerEventRecord[];
  predicted_pointer_events: PointerEventRecord[];
  estimated_properties: string[];
  estimated_properties_expecting_updates: string[];
}
