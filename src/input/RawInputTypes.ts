export type RawMouseEventType = "pressed" | "released" | "moved" | "dragged" | "scrolled" | "entered" | "exited";

export type RawTouchEventType = "down" | "up" | "move" | "cancel" | "doubleTap";

export const MODIFIER_SHIFT = 1 << 0;
export const MODIFIER_CONTROL = 1 << 1;
export const MODIFIER_ALT = 1 << 2;
export const MODIFIER_SUPER = 1 << 3;

export const MOUSE_BUTTON_LEFT = 0;
export const MOUSE_BUTTON_MIDDLE = 1;
export const MOUSE_BUTTON_RIGHT = 2;

export interface RawMouseEvent {
  kind: "mouse";
  type: RawMouseEventType;
  x: number;
  y: number;
  /** Button that changed, for pressed / released. */
  button: number;
  modifiers: number;
  scrollX: number;
  scrollY: number;
  timestampMicros?: number;
}

export interface RawTouchEvent {
  kind: "touch";
  type: RawTouchEventType;
  x: number;
  y: number;
  /** Contact slot on the device. */
  id: number;
  deviceId: number;
  width?: number;
  height?: number;
  angleDeg?: number;
  pressure?: number;
  timestampMicros?: number;
}

export type RawInputEvent = RawMouseEvent | RawTouchEvent;

export function rawMouseEvent(
  type: RawMouseEventType,
  x: number,
  y: number,
  overrides: Partial<Omit<RawMouseEvent, "kind" | "type" | "x" | "y">> = {},
): RawMouseEvent {
  return {
    kind: "mouse",
    type,
    x,
    y,
    button: overrides.button ?? MOUSE_BUTTON_LEFT,
    modifiers: overrides.modifiers ?? 0,
    scrollX: overrides.scrollX ?? 0,
    scrollY: overrides.scrollY ?? 0,
    timestampMicros: overrides.timestampMicros,
  };
}

export function rawTouchEvent(
  type: RawTouchEventType,
  x: number,
  y: number,
  overrides: Partial<Omit<RawTouchEvent, "kind" | "type" | "x" | "y">> = {},
): RawTouchEvent {
  return {
    kind: "touch",
    type,
    x,
    y,
    id: overrides.id ?? 0,
    deviceId: overrides.deviceId ?? 0,
    width: overrides.width,
    height: overrides.height,
    angleDeg: overrides.angleDeg,
    pressure: overrides.pressure,
    timestampMicros: overrides.timestampMicros,
  };
}
