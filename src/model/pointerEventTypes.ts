export const POINTER_OVER = "pointerover";
export const POINTER_ENTER = "pointerenter";
export const POINTER_DOWN = "pointerdown";
export const POINTER_MOVE = "pointermove";
export const POINTER_UP = "pointerup";
export const POINTER_CANCEL = "pointercancel";
/** Carries corrected values for previously estimated properties. */
export const POINTER_UPDATE = "pointerupdate";
export const POINTER_OUT = "pointerout";
export const POINTER_LEAVE = "pointerleave";
// Not part of the W3C event set; mouse wheel input.
export const POINTER_SCROLL = "pointerscroll";
export const GOT_POINTER_CAPTURE = "gotpointercapture";
export const LOST_POINTER_CAPTURE = "lostpointercapture";

export const TYPE_MOUSE = "mouse";
export const TYPE_PEN = "pen";
export const TYPE_TOUCH = "touch";
export const TYPE_UNKNOWN = "unknown";

export type StandardDeviceType = typeof TYPE_MOUSE | typeof TYPE_PEN | typeof TYPE_TOUCH | typeof TYPE_UNKNOWN;

/** Standard device types, or any custom string a platform reports. */
export type DeviceType = StandardDeviceType | (string & {});

export const STANDARD_DEVICE_TYPES: readonly StandardDeviceType[] = [TYPE_MOUSE, TYPE_PEN, TYPE_TOUCH, TYPE_UNKNOWN];

export const PROPERTY_POSITION = "position";
export const PROPERTY_PRESSURE = "pressure";
export const PROPERTY_TILT_X = "tilt_x";
export const PROPERTY_TILT_Y = "tilt_y";

export type EstimatedProperty =
  | typeof PROPERTY_POSITION
  | typeof PROPERTY_PRESSURE
  | typeof PROPERTY_TILT_X
  | typeof PROPERTY_TILT_Y;

export const ESTIMATED_PROPERTIES: readonly EstimatedProperty[] = [
  PROPERTY_POSITION,
  PROPERTY_PRESSURE,
  PROPERTY_TILT_X,
  PROPERTY_TILT_Y,
];

export function isEstimatedProperty(value: string): value is EstimatedProperty {
  return ESTIMATED_PROPERTIES.some((p) => p === value);
}

/** Event types routed to a dedicated channel after the generic one. */
export type RoutedPointerEventType =
  | typeof POINTER_DOWN
  | typeof POINTER_MOVE
  | typeof POINTER_UP
  | typeof POINTER_CANCEL
  | typeof POINTER_UPDATE;

export function isRoutedPointerEventType(eventType: string): eventType is RoutedPointerEventType {
  return (
    eventType === POINTER_DOWN ||
    eventType === POINTER_MOVE ||
    eventType === POINTER_UP ||
    eventType === POINTER_CANCEL ||
    eventType === POINTER_UPDATE
  );
}
