import type { PointerEvents } from "../dispatch/PointerEvents";
import { decodePointerEvent, type DecodeOptions } from "../interchange/codec";
import type { PointerEventRecord } from "../interchange/schema";
import type { PointerEventArgs } from "../model/PointerEventArgs";

export interface PointerReplayScript {
  version: 1;
  name: string;
  /** Recorded events, ordered by `timestamp_micros`. */
  events: PointerEventRecord[];
}

/**
 * Plays a recorded script back against elapsed time. Event times are taken
 * relative to the first event of the script.
 */
export class PointerReplayPlayer {
  private index = 0;
  private readonly decodeOptions: DecodeOptions;

  constructor(decodeOptions: DecodeOptions = {}) {
    this.decodeOptions = decodeOptions;
  }

  reset(): void {
    this.index = 0;
  }

  drainUntil(script: PointerReplayScript, elapsedMicros: number): PointerEventArgs[] {
    const out: PointerEventArgs[] = [];
    if (script.events.length === 0) return out;
    const origin = script.events[0].timestamp_micros;
    while (
      this.index < script.events.length &&
      script.events[this.index].timestamp_micros - origin <= elapsedMicros
    ) {
      out.push(decodePointerEvent(script.events[this.index], this.decodeOptions));
      this.index += 1;
    }
    return out;
  }

  /**
   * Drains due events into a dispatcher.
   *
   * @returns the number of drained events a listener consumed.
   */
  dispatchUntil(events: PointerEvents, script: PointerReplayScript, elapsedMicros: number): number {
    let consumed = 0;
    for (const e of this.drainUntil(script, elapsedMicros)) {
      if (events.onPointerEvent(events.window, e)) consumed += 1;
    }
    return consumed;
  }

  isFinished(script: PointerReplayScript): boolean {
    return this.index >= script.events.length;
  }
}
