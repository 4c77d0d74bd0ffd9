import { DEFAULT_LISTENER_PRIORITY } from "../config/defaults";
import type { PointerWindow } from "./HostWindow";
import type { PointerEventListener, PointerListener } from "./PointerEvents";
import type { PointerEventsManager } from "./PointerEventsManager";

export interface GenericPointerListener {
  onPointerEvent: PointerEventListener;
}

const genericBindings = new WeakMap<GenericPointerListener, Map<number, PointerEventListener>>();

function boundGenericListener(listener: GenericPointerListener, priority: number): PointerEventListener {
  let byPriority = genericBindings.get(listener);
  if (!byPriority) {
    byPriority = new Map();
    genericBindings.set(listener, byPriority);
  }
  let bound = byPriority.get(priority);
  if (!bound) {
    bound = listener.onPointerEvent.bind(listener);
    byPriority.set(priority, bound);
  }
  return bound;
}

export function registerPointerEventsForWindow(
  manager: PointerEventsManager,
  window: PointerWindow,
  listener: PointerListener,
  priority: number = DEFAULT_LISTENER_PRIORITY,
): void {
  manager.eventsForWindow(window).registerPointerEvents(listener, priority);
}

export function unregisterPointerEventsForWindow(
  manager: PointerEventsManager,
  window: PointerWindow,
  listener: PointerListener,
  priority: number = DEFAULT_LISTENER_PRIORITY,
): boolean {
  return manager.requireEventsForWindow(window).unregisterPointerEvents(listener, priority);
}

/** Subscribes `listener.onPointerEvent` to the window's generic channel. */
export function registerPointerEventForWindow(
  manager: PointerEventsManager,
  window: PointerWindow,
  listener: GenericPointerListener,
  priority: number = DEFAULT_LISTENER_PRIORITY,
): void {
  const channel = manager.eventsForWindow(window).pointerEvent;
  const bound = boundGenericListener(listener, priority);
  if (!channel.has(bound, priority)) channel.subscribe(bound, priority);
}

export function unregisterPointerEventForWindow(
  manager: PointerEventsManager,
  window: PointerWindow,
  listener: GenericPointerListener,
  priority: number = DEFAULT_LISTENER_PRIORITY,
): boolean {
  const channel = manager.requireEventsForWindow(window).pointerEvent;
  return channel.unsubscribe(boundGenericListener(listener, priority), priority);
}

export function registerPointerEvents(
  manager: PointerEventsManager,
  listener: PointerListener,
  priority: number = DEFAULT_LISTENER_PRIORITY,
): void {
  manager.events().registerPointerEvents(listener, priority);
}

export function unregisterPointerEvents(
  manager: PointerEventsManager,
  listener: PointerListener,
  priority: number = DEFAULT_LISTENER_PRIORITY,
): boolean {
  return manager.events().unregisterPointerEvents(listener, priority);
}
