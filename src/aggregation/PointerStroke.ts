import type { PointerEventArgs } from "../model/PointerEventArgs";
import { POINTER_CANCEL, POINTER_LEAVE, POINTER_UP } from "../model/pointerEventTypes";

/**
 * The events of one pointer from pointerdown to pointerup or pointercancel.
 *
 * The first added event fixes the pointer id. Once a terminal event has been
 * added only pointerleave events are still accepted.
 */
export class PointerStroke {
  private id: number | undefined;
  private readonly list: PointerEventArgs[] = [];
  private terminalEventType: string | null = null;
  private minSequence = Number.MAX_SAFE_INTEGER;
  private maxSequence = 0;
  private minTimestamp = Number.MAX_SAFE_INTEGER;
  private maxTimestamp = 0;

  add(e: PointerEventArgs): boolean {
    if (this.terminalEventType !== null && e.eventType !== POINTER_LEAVE) return false;
    if (this.id !== undefined && e.pointerId !== this.id) return false;

    this.id = e.pointerId;
    this.list.push(e);
    this.minSequence = Math.min(this.minSequence, e.sequenceIndex);
    this.maxSequence = Math.max(this.maxSequence, e.sequenceIndex);
    this.minTimestamp = Math.min(this.minTimestamp, e.timestampMicros);
    this.maxTimestamp = Math.max(this.maxTimestamp, e.timestampMicros);
    if (e.eventType === POINTER_UP || e.eventType === POINTER_CANCEL) {
      this.terminalEventType = e.eventType;
    }
    return true;
  }

  /**
   * Forwards a correction to the event with the same sequence index.
   *
   * @returns true if an event in this stroke was corrected.
   */
  applyUpdate(update: PointerEventArgs): boolean {
    if (update.pointerId !== this.id) return false;
    const target = this.list.find((e) => e.sequenceIndex === update.sequenceIndex);
    return target ? target.updateEstimatedPropertiesWithEvent(update) : false;
  }

  /** Undefined until the first event is added. */
  get pointerId(): number | undefined {
    return this.id;
  }

  get minSequenceIndex(): number {
    return this.minSequence;
  }

  get maxSequenceIndex(): number {
    return this.maxSequence;
  }

  get minTimestampMicros(): number {
    return this.minTimestamp;
  }

  get maxTimestampMicros(): number {
    return this.maxTimestamp;
  }

  isFinished(): boolean {
    return this.terminalEventType !== null;
  }

  isCancelled(): boolean {
    return this.terminalEventType === POINTER_CANCEL;
  }

  isExpectingUpdates(): boolean {
    return this.list.some((e) => e.estimatedPropertiesExpectingUpdates.size > 0);
  }

  get size(): number {
    return this.list.length;
  }

  get empty(): boolean {
    return this.list.length === 0;
  }

  get events(): readonly PointerEventArgs[] {
    return this.list;
  }
}
