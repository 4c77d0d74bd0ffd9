import { DEFAULT_STROKE_TRACKER_CONFIG, type StrokeTrackerConfig } from "../config/defaults";
import type { PointerListener } from "../dispatch/PointerEvents";
import type { PointerEventArgs } from "../model/PointerEventArgs";
import { POINTER_DOWN, POINTER_UPDATE } from "../model/pointerEventTypes";
import { NOOP_LOGGER, type Logger } from "../types/contracts";
import { PointerStroke } from "./PointerStroke";

export interface StrokeTrackerOptions {
  config?: Partial<StrokeTrackerConfig>;
  logger?: Logger;
}

/**
 * Keeps the recent strokes of every pointer, e.g. for a debug overlay.
 *
 * A pointerdown starts a new stroke; other events extend the pointer's latest
 * stroke. Finished strokes are dropped by `update` once they are older than
 * `timeoutMillis`.
 */
export class StrokeTracker implements PointerListener {
  private readonly config: StrokeTrackerConfig;
  private readonly logger: Logger;
  private readonly byPointerId = new Map<number, PointerStroke[]>();

  constructor(options: StrokeTrackerOptions = {}) {
    this.config = { ...DEFAULT_STROKE_TRACKER_CONFIG, ...options.config };
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  onPointerDown(e: PointerEventArgs): void {
    this.add(e);
  }

  onPointerMove(e: PointerEventArgs): void {
    this.add(e);
  }

  onPointerUp(e: PointerEventArgs): void {
    this.add(e);
  }

  onPointerCancel(e: PointerEventArgs): void {
    this.add(e);
  }

  onPointerUpdate(e: PointerEventArgs): void {
    this.add(e);
  }

  /** @returns true if the event was stored or applied to a stroke. */
  add(e: PointerEventArgs): boolean {
    if (e.eventType === POINTER_UPDATE) {
      const strokes = this.byPointerId.get(e.pointerId) ?? [];
      return strokes.some((stroke) => stroke.applyUpdate(e));
    }

    let strokes = this.byPointerId.get(e.pointerId);
    if (!strokes) {
      strokes = [];
      this.byPointerId.set(e.pointerId, strokes);
    }

    if (e.eventType === POINTER_DOWN) {
      const stroke = new PointerStroke();
      stroke.add(e);
      strokes.push(stroke);
      return true;
    }

    const latest = strokes[strokes.length - 1];
    if (!latest || !latest.add(e)) {
      this.logger.debug("Dropped pointer event without an open stroke", {
        pointerId: e.pointerId,
        eventType: e.eventType,
      });
      if (strokes.length === 0) this.byPointerId.delete(e.pointerId);
      return false;
    }
    return true;
  }

  /** Drops finished strokes whose last event is older than the timeout. */
  update(nowMicros: number): void {
    const cutoff = nowMicros - this.config.timeoutMillis * 1000;
    for (const [pointerId, strokes] of this.byPointerId) {
      const kept = strokes.filter((stroke) => !stroke.isFinished() || stroke.maxTimestampMicros >= cutoff);
      if (kept.length === 0) {
        this.byPointerId.delete(pointerId);
      } else {
        this.byPointerId.set(pointerId, kept);
      }
    }
  }

  clear(): void {
    this.byPointerId.clear();
  }

  strokesForPointerId(pointerId: number): readonly PointerStroke[] {
    return this.byPointerId.get(pointerId)?.slice() ?? [];
  }

  /** Snapshot of the tracked strokes; later adds and updates do not show up in it. */
  get strokes(): ReadonlyMap<number, readonly PointerStroke[]> {
    const snapshot = new Map<number, readonly PointerStroke[]>();
    for (const [pointerId, strokes] of this.byPointerId) snapshot.set(pointerId, strokes.slice());
    return snapshot;
  }
}
