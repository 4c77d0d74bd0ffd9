export type ShapeType = "ELLIPSE" | "RECTANGLE";

export const SHAPE_TYPES: readonly ShapeType[] = ["ELLIPSE", "RECTANGLE"];

export interface PointShapeInit {
  shapeType?: ShapeType;
  width?: number;
  height?: number;
  widthTolerance?: number;
  heightTolerance?: number;
  angleDeg?: number;
}

const DEG_TO_RAD = Math.PI / 180;

function nonNegative(v: number): number {
  return Number.isFinite(v) && v > 0 ? v : 0;
}

/**
 * Contact geometry of a pointer.
 *
 * Mice and pens report a 1x1 shape. Touch contacts may report the size and
 * angle of the finger tip. Tolerances give the +/- range of width and height.
 */
export class PointShape {
  readonly shapeType: ShapeType;
  readonly width: number;
  readonly height: number;
  readonly widthTolerance: number;
  readonly heightTolerance: number;
  readonly angleDeg: number;
  /** Width of the bounding box of the rotated shape. */
  readonly axisAlignedWidth: number;
  /** Height of the bounding box of the rotated shape. */
  readonly axisAlignedHeight: number;

  constructor(init: PointShapeInit = {}) {
    this.shapeType = init.shapeType ?? "ELLIPSE";
    this.width = nonNegative(init.width ?? 1);
    this.height = nonNegative(init.height ?? 1);
    this.widthTolerance = init.widthTolerance ?? 0;
    this.heightTolerance = init.heightTolerance ?? 0;
    this.angleDeg = init.angleDeg ?? 0;

    const cos = Math.abs(Math.cos(this.angleRad));
    const sin = Math.abs(Math.sin(this.angleRad));
    if (this.shapeType === "RECTANGLE") {
      this.axisAlignedWidth = this.width * cos + this.height * sin;
      this.axisAlignedHeight = this.width * sin + this.height * cos;
    } else {
      this.axisAlignedWidth = Math.hypot(this.width * cos, this.height * sin);
      this.axisAlignedHeight = Math.hypot(this.width * sin, this.height * cos);
    }
  }

  static square(shapeType: ShapeType, size: number, sizeTolerance = 0): PointShape {
    return new PointShape({
      shapeType,
      width: size,
      height: size,
      widthTolerance: sizeTolerance,
      heightTolerance: sizeTolerance,
    });
  }

  get angleRad(): number {
    return this.angleDeg * DEG_TO_RAD;
  }

  toString(): string {
    return `${this.shapeType} ${this.width}x${this.height} @${this.angleDeg}deg`;
  }
}

export const DEFAULT_POINT_SHAPE = new PointShape();
