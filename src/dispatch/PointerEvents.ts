import {
  DEFAULT_LISTENER_PRIORITY,
  DEFAULT_POINTER_EVENTS_CONFIG,
  performanceClock,
  type PointerEventsConfig,
} from "../config/defaults";
import { EventChannel, type ChannelListener } from "../core/EventChannel";
import { PointerEventsError } from "../core/errors";
import {
  mouseToPointerEvent,
  nextMouseButtons,
  nextTouchButtons,
  touchToPointerEvent,
} from "../input/convertRawInput";
import { MOUSE_POINTER_ID, touchPointerId } from "../input/pointerIds";
import type { RawMouseEvent, RawTouchEvent } from "../input/RawInputTypes";
import { PointerEventArgs } from "../model/PointerEventArgs";
import {
  POINTER_CANCEL,
  POINTER_DOWN,
  POINTER_MOVE,
  POINTER_UP,
  POINTER_UPDATE,
  isRoutedPointerEventType,
  type RoutedPointerEventType,
} from "../model/pointerEventTypes";
import { NOOP_LOGGER, type Logger, type MicrosClock, type Unsubscribe } from "../types/contracts";
import type { PointerWindow } from "./HostWindow";

export type PointerEventListener = ChannelListener<PointerEventArgs>;

/** Listener bundle registered on all lifecycle channels at once. */
export interface PointerListener {
  onPointerDown: PointerEventListener;
  onPointerUp: PointerEventListener;
  onPointerMove: PointerEventListener;
  onPointerCancel: PointerEventListener;
  onPointerUpdate?: PointerEventListener;
}

export interface PointerEventsOptions {
  config?: Partial<PointerEventsConfig>;
  logger?: Logger;
  nowMicros?: MicrosClock;
}

interface TouchDeviceState {
  primaryPointerId: number | null;
  readonly active: Set<number>;
}

/**
 * Converts one window's raw mouse and touch input into pointer events and
 * redistributes them.
 *
 * Every event goes to `pointerEvent` first. If no listener consumed it, it
 * goes to exactly one of `pointerDown`, `pointerMove`, `pointerUp`,
 * `pointerCancel` or `pointerUpdate`. Other event types (enter, leave,
 * scroll) only reach `pointerEvent`.
 *
 * Dispatch is synchronous. Listeners must not feed input back into the same
 * dispatcher while it is dispatching; doing so throws.
 */
export class PointerEvents {
  readonly window: PointerWindow;
  readonly pointerEvent: EventChannel<PointerEventArgs>;
  readonly pointerDown: EventChannel<PointerEventArgs>;
  readonly pointerUp: EventChannel<PointerEventArgs>;
  readonly pointerMove: EventChannel<PointerEventArgs>;
  readonly pointerCancel: EventChannel<PointerEventArgs>;
  /** Corrections for estimated properties, matched by sequence index. */
  readonly pointerUpdate: EventChannel<PointerEventArgs>;

  private readonly config: PointerEventsConfig;
  private readonly logger: Logger;
  private readonly nowMicros: MicrosClock;
  private readonly routes: Record<RoutedPointerEventType, EventChannel<PointerEventArgs>>;
  private readonly registrations = new Map<PointerListener, Map<number, Unsubscribe>>();
  private readonly sequenceByPointer = new Map<number, number>();
  private readonly touchDevices = new Map<number, TouchDeviceState>();
  private readonly sourceSubscriptions: Unsubscribe[] = [];
  private mouseButtons = 0;
  private dispatching = false;

  constructor(window: PointerWindow, options: PointerEventsOptions = {}) {
    this.window = window;
    this.config = { ...DEFAULT_POINTER_EVENTS_CONFIG, ...options.config };
    this.logger = options.logger ?? NOOP_LOGGER;
    this.nowMicros = options.nowMicros ?? performanceClock;

    const channel = (name: string) =>
      new EventChannel<PointerEventArgs>(`${window.id}:${name}`, {
        logger: this.logger,
        strictListenerErrors: this.config.strictListenerErrors,
      });
    this.pointerEvent = channel("pointerEvent");
    this.pointerDown = channel("pointerDown");
    this.pointerUp = channel("pointerUp");
    this.pointerMove = channel("pointerMove");
    this.pointerCancel = channel("pointerCancel");
    this.pointerUpdate = channel("pointerUpdate");
    this.routes = {
      [POINTER_DOWN]: this.pointerDown,
      [POINTER_MOVE]: this.pointerMove,
      [POINTER_UP]: this.pointerUp,
      [POINTER_CANCEL]: this.pointerCancel,
      [POINTER_UPDATE]: this.pointerUpdate,
    };

    if (this.config.interceptLegacyEvents) {
      if (window.mouseEvents) {
        this.sourceSubscriptions.push(window.mouseEvents.subscribe((e) => this.onMouseEvent(window, e)));
      }
      if (window.touchEvents) {
        this.sourceSubscriptions.push(window.touchEvents.subscribe((e) => this.onTouchEvent(window, e)));
      }
    }
  }

  /** @returns true if the raw event should be treated as consumed by the host. */
  onMouseEvent(source: unknown, e: RawMouseEvent): boolean {
    this.mouseButtons = nextMouseButtons(this.mouseButtons, e);
    const event = mouseToPointerEvent(e, {
      eventSource: source,
      timestampMicros: e.timestampMicros ?? this.nowMicros(),
      sequenceIndex: this.nextSequenceIndex(MOUSE_POINTER_ID),
      buttons: this.mouseButtons,
      isPrimary: true,
    });
    return this.dispatchPointerEvent(event) || this.config.consumeLegacyEvents;
  }

  /** @returns true if the raw event should be treated as consumed by the host. */
  onTouchEvent(source: unknown, e: RawTouchEvent): boolean {
    if (e.type === "doubleTap") {
      return this.config.consumeLegacyEvents;
    }
    const pointerId = touchPointerId(e.deviceId, e.id);
    const isPrimary = this.trackTouchPrimary(e, pointerId);
    const event = touchToPointerEvent(e, {
      eventSource: source,
      timestampMicros: e.timestampMicros ?? this.nowMicros(),
      sequenceIndex: this.nextSequenceIndex(pointerId),
      buttons: nextTouchButtons(e),
      isPrimary,
    });
    if (event === null) return this.config.consumeLegacyEvents;
    return this.dispatchPointerEvent(event) || this.config.consumeLegacyEvents;
  }

  /**
   * Entry point for pointer events produced outside the mouse / touch
   * conversion, e.g. pen APIs or replay. Events without a source are
   * re-issued with `source` as their source.
   */
  onPointerEvent(source: unknown, e: PointerEventArgs): boolean {
    const event = e.eventSource === null ? new PointerEventArgs({ ...e.toInit(), eventSource: source }) : e;
    return this.dispatchPointerEvent(event);
  }

  dispatchPointerEvent(e: PointerEventArgs): boolean {
    if (this.dispatching) {
      throw new PointerEventsError(
        "REENTRANT_DISPATCH",
        `Pointer event ${e.eventType} dispatched on window ${this.window.id} while another dispatch is running`,
      );
    }
    this.dispatching = true;
    try {
      if (this.pointerEvent.notify(e)) return true;
      return isRoutedPointerEventType(e.eventType) ? this.routes[e.eventType].notify(e) : false;
    } finally {
      this.dispatching = false;
    }
  }

  registerPointerEvents(listener: PointerListener, priority: number = DEFAULT_LISTENER_PRIORITY): void {
    let byPriority = this.registrations.get(listener);
    if (byPriority?.has(priority)) return;

    const unsubscribers = [
      this.pointerDown.subscribe(listener.onPointerDown.bind(listener), priority),
      this.pointerUp.subscribe(listener.onPointerUp.bind(listener), priority),
      this.pointerMove.subscribe(listener.onPointerMove.bind(listener), priority),
      this.pointerCancel.subscribe(listener.onPointerCancel.bind(listener), priority),
    ];
    if (listener.onPointerUpdate) {
      unsubscribers.push(this.pointerUpdate.subscribe(listener.onPointerUpdate.bind(listener), priority));
    }

    if (!byPriority) {
      byPriority = new Map();
      this.registrations.set(listener, byPriority);
    }
    byPriority.set(priority, () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    });
  }

  unregisterPointerEvents(listener: PointerListener, priority: number = DEFAULT_LISTENER_PRIORITY): boolean {
    const byPriority = this.registrations.get(listener);
    const unsubscribe = byPriority?.get(priority);
    if (!byPriority || !unsubscribe) return false;
    unsubscribe();
    byPriority.delete(priority);
    if (byPriority.size === 0) this.registrations.delete(listener);
    return true;
  }

  /** Stops listening to the window's raw input. Registered listeners are kept. */
  dispose(): void {
    for (const unsubscribe of this.sourceSubscriptions.splice(0)) unsubscribe();
  }

  /** Sequence indices are monotonic per pointer id and survive id reuse. */
  private nextSequenceIndex(pointerId: number): number {
    const next = (this.sequenceByPointer.get(pointerId) ?? 0) + 1;
    this.sequenceByPointer.set(pointerId, next);
    return next;
  }

  /**
   * The first touch to go down on a device while none of its touches are
   * active becomes primary and stays primary until it lifts.
   */
  private trackTouchPrimary(e: RawTouchEvent, pointerId: number): boolean {
    let state = this.touchDevices.get(e.deviceId);
    if (!state) {
      state = { primaryPointerId: null, active: new Set() };
      this.touchDevices.set(e.deviceId, state);
    }

    if (e.type === "down") {
      if (state.active.size === 0) state.primaryPointerId = pointerId;
      state.active.add(pointerId);
    }

    const isPrimary = state.primaryPointerId === pointerId;

    if (e.type === "up" || e.type === "cancel") {
      state.active.delete(pointerId);
      if (isPrimary) state.primaryPointerId = null;
    }
    return isPrimary;
  }
}
