export { PointerEvents } from "./dispatch/PointerEvents";
export type { PointerEventListener, PointerListener, PointerEventsOptions } from "./dispatch/PointerEvents";
export { PointerEventsManager } from "./dispatch/PointerEventsManager";
export type { PointerEventsManagerOptions } from "./dispatch/PointerEventsManager";
export { HostWindow } from "./dispatch/HostWindow";
export type { HostWindowOptions, PointerWindow, RawInputSource } from "./dispatch/HostWindow";
export {
  registerPointerEvents,
  registerPointerEventsForWindow,
  registerPointerEventForWindow,
  unregisterPointerEvents,
  unregisterPointerEventsForWindow,
  unregisterPointerEventForWindow,
} from "./dispatch/registration";
export type { GenericPointerListener } from "./dispatch/registration";

export { EventChannel } from "./core/EventChannel";
export type { ChannelListener, EventChannelOptions } from "./core/EventChannel";
export { PointerEventsError } from "./core/errors";
export type { PointerEventsErrorCode } from "./core/errors";

export {
  DEFAULT_LISTENER_PRIORITY,
  DEFAULT_POINTER_EVENTS_CONFIG,
  DEFAULT_STROKE_TRACKER_CONFIG,
  EVENT_ORDER,
  performanceClock,
} from "./config/defaults";
export type { PointerEventsConfig, StrokeTrackerConfig } from "./config/defaults";
export { NOOP_LOGGER } from "./types/contracts";
export type { Logger, MicrosClock, Unsubscribe, Vec2 } from "./types/contracts";

export { EventArgs, EVENT_TYPE_UNKNOWN } from "./model/EventArgs";
export type { EventArgsInit } from "./model/EventArgs";
export { Point, tiltToSpherical } from "./model/Point";
export type { PointInit } from "./model/Point";
export { PointShape, DEFAULT_POINT_SHAPE, SHAPE_TYPES } from "./model/PointShape";
export type { PointShapeInit, ShapeType } from "./model/PointShape";
export { PointerEventArgs } from "./model/PointerEventArgs";
export type { PointerEventInit } from "./model/PointerEventArgs";
export * from "./model/pointerEventTypes";

export * from "./input/RawInputTypes";
export { hashCombine, pointerIdFor, touchPointerId, MOUSE_DEVICE_ID, MOUSE_POINTER_ID } from "./input/pointerIds";
export { mouseToPointerEvent, touchToPointerEvent } from "./input/convertRawInput";
export type { ConversionContext } from "./input/convertRawInput";

export { PointerStroke } from "./aggregation/PointerStroke";
export { PointerEventCollection } from "./aggregation/PointerEventCollection";
export { StrokeTracker } from "./aggregation/StrokeTracker";
export type { StrokeTrackerOptions } from "./aggregation/StrokeTracker";

export {
  decodePoint,
  decodePointShape,
  decodePointerEvent,
  decodePointerEventLog,
  encodePoint,
  encodePointShape,
  encodePointerEvent,
  encodePointerEventLog,
} from "./interchange/codec";
export type { DecodeOptions } from "./interchange/codec";
export type { PointRecord, PointShapeRecord, PointerEventRecord, Vec2Record } from "./interchange/schema";

export { PointerReplayPlayer } from "./replay/PointerReplay";
export type { PointerReplayScript } from "./replay/PointerReplay";

export { attachDomWindow } from "./adapters/dom";
export type { DomWindowHandle, DomWindowOptions } from "./adapters/dom";
export { PointerSurface } from "./react/PointerSurface";
export type { PointerSurfaceProps } from "./react/PointerSurface";
