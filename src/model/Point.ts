import type { Vec2 } from "../types/contracts";
import { DEFAULT_POINT_SHAPE, PointShape } from "./PointShape";

export interface PointInit {
  position?: Vec2;
  /** Sub-pixel position when the device reports one; defaults to `position`. */
  precisePosition?: Vec2;
  shape?: PointShape;
  pressure?: number;
  tangentialPressure?: number;
  twistDeg?: number;
  tiltXDeg?: number;
  tiltYDeg?: number;
}

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;
const ORIGIN: Vec2 = { x: 0, y: 0 };

function clamp(v: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, v));
}

function wrapDegrees(deg: number): number {
  const wrapped = deg % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/**
 * Converts tilt angles to azimuth / altitude in radians.
 *
 * @see https://w3c.github.io/pointerevents/#converting-between-tiltx-tilty-and-altitudeangle-azimuthangle
 */
export function tiltToSpherical(tiltXDeg: number, tiltYDeg: number): { azimuthRad: number; altitudeRad: number } {
  const tiltXRad = tiltXDeg * DEG_TO_RAD;
  const tiltYRad = tiltYDeg * DEG_TO_RAD;
  const vertical = Math.abs(tiltXDeg) === 90 || Math.abs(tiltYDeg) === 90;

  let azimuthRad = 0;
  if (tiltXDeg === 0) {
    if (tiltYDeg > 0) azimuthRad = Math.PI / 2;
    else if (tiltYDeg < 0) azimuthRad = (3 * Math.PI) / 2;
  } else if (tiltYDeg === 0) {
    if (tiltXDeg < 0) azimuthRad = Math.PI;
  } else if (!vertical) {
    azimuthRad = Math.atan2(Math.tan(tiltYRad), Math.tan(tiltXRad));
    if (azimuthRad < 0) azimuthRad += 2 * Math.PI;
  }

  let altitudeRad: number;
  if (vertical) {
    altitudeRad = 0;
  } else if (tiltXDeg === 0) {
    altitudeRad = Math.PI / 2 - Math.abs(tiltYRad);
  } else if (tiltYDeg === 0) {
    altitudeRad = Math.PI / 2 - Math.abs(tiltXRad);
  } else {
    altitudeRad = Math.atan(1 / Math.hypot(Math.tan(tiltXRad), Math.tan(tiltYRad)));
  }

  return { azimuthRad, altitudeRad };
}

/** Position, shape, pressure and orientation of a pointer at one instant. */
export class Point {
  readonly position: Vec2;
  readonly precisePosition: Vec2;
  readonly shape: PointShape;
  /** Normalized pressure in [0, 1]. */
  readonly pressure: number;
  /** Normalized barrel pressure in [0, 1], 0 when unsupported. */
  readonly tangentialPressure: number;
  /** Clockwise rotation of the transducer around its own axis, [0, 360). */
  readonly twistDeg: number;
  readonly tiltXDeg: number;
  readonly tiltYDeg: number;
  /** 0 points along +x, 90 along +y. */
  readonly azimuthDeg: number;
  /** 0 is parallel to the surface, 90 is perpendicular. */
  readonly altitudeDeg: number;

  constructor(init: PointInit = {}) {
    this.position = { ...(init.position ?? ORIGIN) };
    this.precisePosition = { ...(init.precisePosition ?? this.position) };
    this.shape = init.shape ?? DEFAULT_POINT_SHAPE;
    this.pressure = clamp(init.pressure ?? 0, 0, 1);
    this.tangentialPressure = clamp(init.tangentialPressure ?? 0, 0, 1);
    this.twistDeg = wrapDegrees(init.twistDeg ?? 0);
    this.tiltXDeg = clamp(init.tiltXDeg ?? 0, -90, 90);
    this.tiltYDeg = clamp(init.tiltYDeg ?? 0, -90, 90);

    const { azimuthRad, altitudeRad } = tiltToSpherical(this.tiltXDeg, this.tiltYDeg);
    this.azimuthDeg = azimuthRad * RAD_TO_DEG;
    this.altitudeDeg = altitudeRad * RAD_TO_DEG;
  }

  get twistRad(): number {
    return this.twistDeg * DEG_TO_RAD;
  }

  get tiltXRad(): number {
    return this.tiltXDeg * DEG_TO_RAD;
  }

  get tiltYRad(): number {
    return this.tiltYDeg * DEG_TO_RAD;
  }

  get azimuthRad(): number {
    return this.azimuthDeg * DEG_TO_RAD;
  }

  get altitudeRad(): number {
    return this.altitudeDeg * DEG_TO_RAD;
  }

  /** Returns a copy with the given fields replaced. */
  with(patch: PointInit): Point {
    return new Point({
      position: this.position,
      precisePosition: this.precisePosition,
      shape: this.shape,
      pressure: this.pressure,
      tangentialPressure: this.tangentialPressure,
      twistDeg: this.twistDeg,
      tiltXDeg: this.tiltXDeg,
      tiltYDeg: this.tiltYDeg,
      ...patch,
    });
  }

  toString(): string {
    return [
      `        Position: ${this.position.x},${this.position.y}`,
      `Precise Position: ${this.precisePosition.x},${this.precisePosition.y}`,
      `        Pressure: ${this.pressure}`,
      `   Tan. Pressure: ${this.tangentialPressure}`,
      `           Twist: ${this.twistDeg}`,
      `           TiltX: ${this.tiltXDeg}`,
      `           TiltY: ${this.tiltYDeg}`,
    ].join("\n");
  }
}
