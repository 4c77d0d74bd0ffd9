import type { MicrosClock } from "../types/contracts";

export const EVENT_ORDER = {
  BEFORE_APP: 0,
  APP: 100,
  AFTER_APP: 200,
} as const;

export const DEFAULT_LISTENER_PRIORITY: number = EVENT_ORDER.AFTER_APP;

export interface PointerEventsConfig {
  /** Subscribe to the window's raw mouse and touch sources. */
  interceptLegacyEvents: boolean;
  /** Report raw mouse and touch events as consumed even if no pointer listener consumed them. */
  consumeLegacyEvents: boolean;
  strictListenerErrors: boolean;
}

export const DEFAULT_POINTER_EVENTS_CONFIG: PointerEventsConfig = {
  interceptLegacyEvents: true,
  consumeLegacyEvents: false,
  strictListenerErrors: true,
};

export interface StrokeTrackerConfig {
  timeoutMillis: number;
}

export const DEFAULT_STROKE_TRACKER_CONFIG: StrokeTrackerConfig = {
  timeoutMillis: 5000,
};

export const performanceClock: MicrosClock = () => Math.round(performance.now() * 1000);
