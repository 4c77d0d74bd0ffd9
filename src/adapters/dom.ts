import { HostWindow, type HostWindowOptions } from "../dispatch/HostWindow";
import {
  MODIFIER_ALT,
  MODIFIER_CONTROL,
  MODIFIER_SHIFT,
  MODIFIER_SUPER,
  rawMouseEvent,
  rawTouchEvent,
  type RawMouseEventType,
  type RawTouchEventType,
} from "../input/RawInputTypes";

export interface DomWindowOptions extends HostWindowOptions {
  /** Window id; generated when omitted. */
  id?: string;
  /** Device id reported for touches from this element. */
  touchDeviceId?: number;
  /**
   * Prevents the default action of every touch event the window intercepts,
   * so the browser does not follow a tap with compatibility mouse events.
   * Defaults to true.
   */
  preventTouchDefault?: boolean;
}

export interface DomWindowHandle {
  window: HostWindow;
  /** Removes the DOM listeners. The window stops producing input. */
  detach: () => void;
}

let nextDomWindowId = 1;

function modifiersOf(e: MouseEvent): number {
  let bits = 0;
  if (e.shiftKey) bits |= MODIFIER_SHIFT;
  if (e.ctrlKey) bits |= MODIFIER_CONTROL;
  if (e.altKey) bits |= MODIFIER_ALT;
  if (e.metaKey) bits |= MODIFIER_SUPER;
  return bits;
}

/**
 * Bridges an element's DOM mouse and touch events into a `HostWindow`.
 *
 * Coordinates are relative to the element's bounding box. Each changed touch
 * becomes one raw touch event, with its `identifier` as the slot. Touch events
 * have their default action prevented unless `preventTouchDefault` is false;
 * mouse events only when the dispatcher reports them as consumed.
 */
export function attachDomWindow(element: HTMLElement, options: DomWindowOptions = {}): DomWindowHandle {
  const hostWindow = new HostWindow(options.id ?? `dom-${nextDomWindowId++}`, {
    mouse: options.mouse,
    touch: options.touch,
    logger: options.logger,
    strictListenerErrors: options.strictListenerErrors,
  });
  const touchDeviceId = options.touchDeviceId ?? 0;
  const preventTouchDefault = options.preventTouchDefault ?? true;
  const removers: Array<() => void> = [];

  const listen = <K extends keyof HTMLElementEventMap>(type: K, handler: (e: HTMLElementEventMap[K]) => void) => {
    element.addEventListener(type, handler, { passive: false });
    removers.push(() => element.removeEventListener(type, handler));
  };

  const emitMouse = (type: RawMouseEventType, e: MouseEvent, scrollX = 0, scrollY = 0) => {
    const rect = element.getBoundingClientRect();
    const consumed = hostWindow.emitMouse(
      rawMouseEvent(type, e.clientX - rect.left, e.clientY - rect.top, {
        button: e.button,
        modifiers: modifiersOf(e),
        scrollX,
        scrollY,
      }),
    );
    if (consumed) e.preventDefault();
  };

  const emitTouches = (type: RawTouchEventType, e: TouchEvent) => {
    const rect = element.getBoundingClientRect();
    let consumed = false;
    for (const touch of Array.from(e.changedTouches)) {
      const width = touch.radiusX > 0 ? touch.radiusX * 2 : undefined;
      const height = touch.radiusY > 0 ? touch.radiusY * 2 : undefined;
      const handled = hostWindow.emitTouch(
        rawTouchEvent(type, touch.clientX - rect.left, touch.clientY - rect.top, {
          id: touch.identifier,
          deviceId: touchDeviceId,
          width,
          height,
          angleDeg: touch.rotationAngle,
          pressure: touch.force > 0 ? touch.force : undefined,
        }),
      );
      consumed = consumed || handled;
    }
    if (preventTouchDefault || consumed) e.preventDefault();
  };

  if (hostWindow.mouseEvents) {
    listen("mousedown", (e) => emitMouse("pressed", e));
    listen("mouseup", (e) => emitMouse("released", e));
    listen("mousemove", (e) => emitMouse(e.buttons !== 0 ? "dragged" : "moved", e));
    listen("mouseenter", (e) => emitMouse("entered", e));
    listen("mouseleave", (e) => emitMouse("exited", e));
    listen("wheel", (e) => emitMouse("scrolled", e, e.deltaX, e.deltaY));
  }

  if (hostWindow.touchEvents) {
    listen("touchstart", (e) => emitTouches("down", e));
    listen("touchmove", (e) => emitTouches("move", e));
    listen("touchend", (e) => emitTouches("up", e));
    listen("touchcancel", (e) => emitTouches("cancel", e));
  }

  return {
    window: hostWindow,
    detach: () => {
      for (const remove of removers.splice(0)) remove();
    },
  };
}
