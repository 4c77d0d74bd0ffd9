export const EVENT_TYPE_UNKNOWN = "unknown";

export interface EventArgsInit {
  /** Opaque reference to whatever produced the event, e.g. a window. */
  eventSource?: unknown;
  eventType?: string;
  /** Rounded to whole microseconds. */
  timestampMicros?: number;
  detail?: number;
}

/**
 * Basic event envelope, loosely modelled on DOM events.
 *
 * @see https://dom.spec.whatwg.org/
 */
export class EventArgs {
  readonly eventSource: unknown;
  readonly eventType: string;
  readonly timestampMicros: number;
  readonly detail: number;

  constructor(init: EventArgsInit = {}) {
    this.eventSource = init.eventSource ?? null;
    this.eventType = init.eventType ?? EVENT_TYPE_UNKNOWN;
    this.timestampMicros = Math.round(init.timestampMicros ?? 0);
    this.detail = init.detail ?? 0;
  }

  get timestampMillis(): number {
    return Math.floor(this.timestampMicros / 1000);
  }
}
