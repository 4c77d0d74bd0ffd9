import type { Vec2 } from "../types/contracts";
import { EventArgs, type EventArgsInit } from "./EventArgs";
import { Point, type PointInit } from "./Point";
import {
  PROPERTY_POSITION,
  PROPERTY_PRESSURE,
  PROPERTY_TILT_X,
  PROPERTY_TILT_Y,
  TYPE_UNKNOWN,
  type DeviceType,
  type EstimatedProperty,
} from "./pointerEventTypes";

export interface PointerEventInit extends EventArgsInit {
  point?: Point;
  pointerId?: number;
  deviceId?: number;
  pointerIndex?: number;
  sequenceIndex?: number;
  deviceType?: DeviceType;
  isCoalesced?: boolean;
  isPredicted?: boolean;
  isPrimary?: boolean;
  button?: number;
  buttons?: number;
  modifiers?: number;
  coalescedPointerEvents?: readonly PointerEventArgs[];
  predictedPointerEvents?: readonly PointerEventArgs[];
  estimatedProperties?: Iterable<EstimatedProperty>;
  estimatedPropertiesExpectingUpdates?: Iterable<EstimatedProperty>;
}

function formatBits(value: number): string {
  return value.toString(2).padStart(16, "0");
}

/**
 * A unified pointer event for mouse, touch and pen input.
 *
 * Everything except the estimated values is fixed at construction. Estimated
 * values can be corrected once through `updateEstimatedPropertiesWithEvent`.
 *
 * @see https://w3c.github.io/pointerevents/
 * @see https://w3c.github.io/pointerevents/extension.html
 */
export class PointerEventArgs extends EventArgs {
  /**
   * Unique among pointers that are active at the same time. Ids are reused
   * once a pointer is released.
   */
  readonly pointerId: number;
  readonly deviceId: number;
  /** Contact slot on a multi-touch device, -1 if not applicable. */
  readonly pointerIndex: number;
  /** Monotonic per pointer stream, 0 if the source does not support it. */
  readonly sequenceIndex: number;
  readonly deviceType: DeviceType;
  readonly isCoalesced: boolean;
  readonly isPredicted: boolean;
  /**
   * Only the primary pointer produces single-pointer compatible semantics.
   *
   * @see https://w3c.github.io/pointerevents/#the-primary-pointer
   */
  readonly isPrimary: boolean;
  /** Button that changed with this event, -1 if none did. */
  readonly button: number;
  readonly buttons: number;
  readonly modifiers: number;
  /** Events not delivered since the previous frame, including a copy of this one. */
  readonly coalescedPointerEvents: readonly PointerEventArgs[];
  /** Samples predicted to arrive before the next frame. */
  readonly predictedPointerEvents: readonly PointerEventArgs[];
  private currentPoint: Point;
  private readonly estimated: ReadonlySet<EstimatedProperty>;
  private readonly expectingUpdates: Set<EstimatedProperty>;

  constructor(init: PointerEventInit = {}) {
    super(init);
    this.currentPoint = init.point ?? new Point();
    this.pointerId = init.pointerId ?? 0;
    this.deviceId = init.deviceId ?? 0;
    this.pointerIndex = init.pointerIndex ?? -1;
    this.sequenceIndex = init.sequenceIndex ?? 0;
    this.deviceType = init.deviceType ?? TYPE_UNKNOWN;
    this.isCoalesced = init.isCoalesced ?? false;
    this.isPredicted = init.isPredicted ?? false;
    this.isPrimary = init.isPrimary ?? false;
    this.button = init.button ?? 0;
    this.buttons = init.buttons ?? 0;
    this.modifiers = init.modifiers ?? 0;
    this.coalescedPointerEvents = [...(init.coalescedPointerEvents ?? [])];
    this.predictedPointerEvents = [...(init.predictedPointerEvents ?? [])];
    this.estimated = new Set(init.estimatedProperties ?? []);
    this.expectingUpdates = new Set(init.estimatedPropertiesExpectingUpdates ?? []);
  }

  get point(): Point {
    return this.currentPoint;
  }

  get position(): Vec2 {
    return this.currentPoint.position;
  }

  get estimatedProperties(): ReadonlySet<EstimatedProperty> {
    return this.estimated;
  }

  get estimatedPropertiesExpectingUpdates(): ReadonlySet<EstimatedProperty> {
    return this.expectingUpdates;
  }

  get isEstimated(): boolean {
    return this.estimated.size > 0;
  }

  toInit(): PointerEventInit {
    return {
      eventSource: this.eventSource,
      eventType: this.eventType,
      timestampMicros: this.timestampMicros,
      detail: this.detail,
      point: this.currentPoint,
      pointerId: this.pointerId,
      deviceId: this.deviceId,
      pointerIndex: this.pointerIndex,
      sequenceIndex: this.sequenceIndex,
      deviceType: this.deviceType,
      isCoalesced: this.isCoalesced,
      isPredicted: this.isPredicted,
      isPrimary: this.isPrimary,
      button: this.button,
      buttons: this.buttons,
      modifiers: this.modifiers,
      coalescedPointerEvents: this.coalescedPointerEvents,
      predictedPointerEvents: this.predictedPointerEvents,
      estimatedProperties: this.estimated,
      estimatedPropertiesExpectingUpdates: this.expectingUpdates,
    };
  }

  /** Copy of this event under a different event type. */
  withEventType(eventType: string): PointerEventArgs {
    return new PointerEventArgs({ ...this.toInit(), eventType });
  }

  /**
   * Applies corrected values carried by a follow-up event.
   *
   * A property is corrected when both events share a sequence index, the
   * property is estimated and expecting an update here, and `other` no longer
   * expects an update for it. Corrected properties stay in
   * `estimatedProperties`.
   *
   * @returns true if at least one property was corrected.
   */
  updateEstimatedPropertiesWithEvent(other: PointerEventArgs): boolean {
    if (other.sequenceIndex !== this.sequenceIndex) return false;

    const corrected = [...this.expectingUpdates].filter(
      (property) => this.estimated.has(property) && !other.estimatedPropertiesExpectingUpdates.has(property),
    );
    if (corrected.length === 0) return false;

    const patch: PointInit = {};
    for (const property of corrected) {
      switch (property) {
        case PROPERTY_POSITION:
          patch.position = other.point.position;
          patch.precisePosition = other.point.precisePosition;
          break;
        case PROPERTY_PRESSURE:
          patch.pressure = other.point.pressure;
          break;
        case PROPERTY_TILT_X:
          patch.tiltXDeg = other.point.tiltXDeg;
          break;
        case PROPERTY_TILT_Y:
          patch.tiltYDeg = other.point.tiltYDeg;
          break;
      }
      this.expectingUpdates.delete(property);
    }
    this.currentPoint = this.currentPoint.with(patch);
    return true;
  }

  toString(): string {
    return [
      `     Source: ${String(this.eventSource)}`,
      `      Event: ${this.eventType}`,
      `  Timestamp: ${this.timestampMillis}`,
      ` Pointer Id: ${this.pointerId}`,
      `  Device Id: ${this.deviceId}`,
      `Device Type: ${this.deviceType}`,
      `     Button: ${this.button}`,
      `    Buttons: ${formatBits(this.buttons)}`,
      `  Modifiers: ${formatBits(this.modifiers)}`,
      `Touch Index: ${this.pointerIndex}`,
      `Sequence Id: ${this.sequenceIndex}`,
    ].join("\n");
  }
}
