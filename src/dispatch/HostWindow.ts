import { EventChannel, type ChannelListener } from "../core/EventChannel";
import type { RawMouseEvent, RawTouchEvent } from "../input/RawInputTypes";
import type { Logger, Unsubscribe } from "../types/contracts";

/** A host-side stream of raw input; listeners return true to consume. */
export interface RawInputSource<T> {
  subscribe(listener: ChannelListener<T>, priority?: number): Unsubscribe;
}

/**
 * The host window a dispatcher binds to. A source is absent when the platform
 * has no such input, e.g. no mouse on a touch-only device.
 */
export interface PointerWindow {
  readonly id: string;
  readonly mouseEvents?: RawInputSource<RawMouseEvent>;
  readonly touchEvents?: RawInputSource<RawTouchEvent>;
}

export interface HostWindowOptions {
  mouse?: boolean;
  touch?: boolean;
  logger?: Logger;
  strictListenerErrors?: boolean;
}

/** In-process window: the embedding runtime pushes raw input with `emitMouse` / `emitTouch`. */
export class HostWindow implements PointerWindow {
  readonly id: string;
  readonly mouseEvents?: EventChannel<RawMouseEvent>;
  readonly touchEvents?: EventChannel<RawTouchEvent>;

  constructor(id: string, options: HostWindowOptions = {}) {
    this.id = id;
    const channelOptions = { logger: options.logger, strictListenerErrors: options.strictListenerErrors };
    if (options.mouse ?? true) {
      this.mouseEvents = new EventChannel<RawMouseEvent>(`${id}:mouse`, channelOptions);
    }
    if (options.touch ?? true) {
      this.touchEvents = new EventChannel<RawTouchEvent>(`${id}:touch`, channelOptions);
    }
  }

  /** @returns true if a listener consumed the event. */
  emitMouse(e: RawMouseEvent): boolean {
    return this.mouseEvents?.notify(e) ?? false;
  }

  /** @returns true if a listener consumed the event. */
  emitTouch(e: RawTouchEvent): boolean {
    return this.touchEvents?.notify(e) ?? false;
  }
}
