import { Point } from "../model/Point";
import { PointShape } from "../model/PointShape";
import { PointerEventArgs } from "../model/PointerEventArgs";
import {
  POINTER_CANCEL,
  POINTER_DOWN,
  POINTER_ENTER,
  POINTER_LEAVE,
  POINTER_MOVE,
  POINTER_SCROLL,
  POINTER_UP,
  TYPE_MOUSE,
  TYPE_TOUCH,
} from "../model/pointerEventTypes";
import { MOUSE_DEVICE_ID, MOUSE_POINTER_ID, touchPointerId } from "./pointerIds";
import type { RawMouseEvent, RawMouseEventType, RawTouchEvent, RawTouchEventType } from "./RawInputTypes";

/** State the converter cannot derive from a single raw event. */
export interface ConversionContext {
  eventSource: unknown;
  timestampMicros: number;
  sequenceIndex: number;
  /** Buttons held after this event. */
  buttons: number;
  isPrimary: boolean;
}

const NO_BUTTON = -1;
const TOUCH_CONTACT_BUTTON = 0;
const TOUCH_CONTACT_BUTTONS = 1;
const DEFAULT_ACTIVE_PRESSURE = 0.5;

const MOUSE_EVENT_TYPES: Record<RawMouseEventType, string> = {
  pressed: POINTER_DOWN,
  released: POINTER_UP,
  moved: POINTER_MOVE,
  dragged: POINTER_MOVE,
  scrolled: POINTER_SCROLL,
  entered: POINTER_ENTER,
  exited: POINTER_LEAVE,
};

const TOUCH_EVENT_TYPES: Record<RawTouchEventType, string | null> = {
  down: POINTER_DOWN,
  up: POINTER_UP,
  move: POINTER_MOVE,
  cancel: POINTER_CANCEL,
  doubleTap: null,
};

/** Bitmask of held mouse buttons after `e`. */
export function nextMouseButtons(buttons: number, e: RawMouseEvent): number {
  if (e.button < 0) return buttons;
  if (e.type === "pressed") return buttons | (1 << e.button);
  if (e.type === "released") return buttons & ~(1 << e.button);
  return buttons;
}

export function nextTouchButtons(e: RawTouchEvent): number {
  return e.type === "down" || e.type === "move" ? TOUCH_CONTACT_BUTTONS : 0;
}

export function mouseToPointerEvent(e: RawMouseEvent, context: ConversionContext): PointerEventArgs {
  const changesButton = e.type === "pressed" || e.type === "released";
  return new PointerEventArgs({
    eventSource: context.eventSource,
    eventType: MOUSE_EVENT_TYPES[e.type],
    timestampMicros: context.timestampMicros,
    point: new Point({
      position: { x: e.x, y: e.y },
      pressure: context.buttons !== 0 ? DEFAULT_ACTIVE_PRESSURE : 0,
    }),
    pointerId: MOUSE_POINTER_ID,
    deviceId: MOUSE_DEVICE_ID,
    pointerIndex: -1,
    sequenceIndex: context.sequenceIndex,
    deviceType: TYPE_MOUSE,
    isPrimary: true,
    button: changesButton ? e.button : NO_BUTTON,
    buttons: context.buttons,
    modifiers: e.modifiers,
  });
}

/** Returns null for touch input with no pointer counterpart (double taps). */
export function touchToPointerEvent(e: RawTouchEvent, context: ConversionContext): PointerEventArgs | null {
  const eventType = TOUCH_EVENT_TYPES[e.type];
  if (eventType === null) return null;

  const width = e.width ?? 1;
  const shape = new PointShape({
    shapeType: "ELLIPSE",
    width,
    height: e.height ?? width,
    angleDeg: e.angleDeg ?? 0,
  });
  const inContact = context.buttons !== 0;

  return new PointerEventArgs({
    eventSource: context.eventSource,
    eventType,
    timestampMicros: context.timestampMicros,
    point: new Point({
      position: { x: e.x, y: e.y },
      shape,
      pressure: e.pressure ?? (inContact ? DEFAULT_ACTIVE_PRESSURE : 0),
    }),
    pointerId: touchPointerId(e.deviceId, e.id),
    deviceId: e.deviceId,
    pointerIndex: e.id,
    sequenceIndex: context.sequenceIndex,
    deviceType: TYPE_TOUCH,
    isPrimary: context.isPrimary,
    button: e.type === "down" || e.type === "up" ? TOUCH_CONTACT_BUTTON : NO_BUTTON,
    buttons: context.buttons,
  });
}
