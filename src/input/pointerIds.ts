/** Pointer id reserved for the mouse. */
export const MOUSE_POINTER_ID = 1;
export const MOUSE_DEVICE_ID = 0;

const TOUCH_ID_BIT = 0x80000000;

/** Golden-ratio hash combine on 32-bit unsigned integers. */
export function hashCombine(seed: number, value: number): number {
  const mixed = value + 0x9e3779b9 + ((seed << 6) >>> 0) + (seed >>> 2);
  return (seed ^ mixed) >>> 0;
}

export function pointerIdFor(deviceId: number, pointerIndex: number): number {
  return hashCombine(hashCombine(0, deviceId), pointerIndex);
}

/**
 * Id for a touch contact. The same (device, slot) pair always yields the same
 * id, and touch ids never collide with the mouse id.
 */
export function touchPointerId(deviceId: number, slot: number): number {
  return (pointerIdFor(deviceId, slot) | TOUCH_ID_BIT) >>> 0;
}
