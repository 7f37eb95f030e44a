/**
 * Outline collector
 *
 * Receives outline drawing events for one glyph and accumulates the flat
 * polygon rings plus one curve triangle per quadratic segment. Cubic segments
 * are approximated by two quadratics meeting at the midpoint of the two
 * control points.
 */

import { equals, midpoint, type Vec2 } from "../math/vec2";
import { isConcaveCurve } from "../geometry/winding";
import type { Ring } from "../geometry/types";
import type { CurveTriangle, OutlineCommand } from "./types";

export class OutlineCollector {
  readonly reverseWind: boolean;

  private finished: Ring[] = [];
  private current: Ring | null = null;
  private currentPoint: Vec2 = [0, 0];
  private curveTriangles: CurveTriangle[] = [];

  constructor(reverseWind: boolean) {
    this.reverseWind = reverseWind;
  }

  /** Rings collected so far, including the one still open */
  get rings(): Ring[] {
    if (this.current && isUsableRing(this.current)) {
      return [...this.finished, trimClosingPoint(this.current)];
    }
    return [...this.finished];
  }

  get curves(): CurveTriangle[] {
    return [...this.curveTriangles];
  }

  /** Start a new ring */
  moveTo(x: number, y: number): void {
    this.finishRing();
    this.current = [[x, y]];
    this.currentPoint = [x, y];
  }

  lineTo(x: number, y: number): void {
    this.openRing().push([x, y]);
    this.currentPoint = [x, y];
  }

  quadTo(x1: number, y1: number, x: number, y: number): void {
    const ring = this.openRing();
    this.addCurve(ring, [x1, y1], [x, y]);
    ring.push([x, y]);
  }

  cubicTo(
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    x: number,
    y: number
  ): void {
    const ring = this.openRing();
    const implied = midpoint([x1, y1], [x2, y2]);

    this.addCurve(ring, [x1, y1], implied);
    ring.push(implied);

    this.addCurve(ring, [x2, y2], [x, y]);
    ring.push([x, y]);
  }

  /** Close the current ring */
  close(): void {
    const start = this.current?.[0];
    this.finishRing();
    if (start) {
      this.currentPoint = start;
    }
  }

  /** Feed a single command */
  apply(command: OutlineCommand): void {
    switch (command.type) {
      case "M":
        this.moveTo(command.x, command.y);
        break;
      case "L":
        this.lineTo(command.x, command.y);
        break;
      case "Q":
        this.quadTo(command.x1, command.y1, command.x, command.y);
        break;
      case "C":
        this.cubicTo(command.x1, command.y1, command.x2, command.y2, command.x, command.y);
        break;
      case "Z":
        this.close();
        break;
    }
  }

  /**
   * Record the curve from the current point through `control` to `end`.
   * Concave curves also put their control point on the ring.
   */
  private addCurve(ring: Ring, control: Vec2, end: Vec2): void {
    const points: [Vec2, Vec2, Vec2] = [this.currentPoint, control, end];
    const concave = isConcaveCurve(points, this.reverseWind);
    this.curveTriangles.push({ points, concave });
    if (concave) {
      ring.push(control);
    }
    this.currentPoint = end;
  }

  // Events without an open ring continue from the current point
  private openRing(): Ring {
    if (this.current) {
      return this.current;
    }
    const ring: Ring = [[this.currentPoint[0], this.currentPoint[1]]];
    this.current = ring;
    return ring;
  }

  private finishRing(): void {
    if (this.current && isUsableRing(this.current)) {
      this.finished.push(trimClosingPoint(this.current));
    }
    this.current = null;
  }
}

/**
 * Fold a materialized command list through a collector.
 */
export function collectOutline(
  commands: readonly OutlineCommand[],
  reverseWind: boolean
): OutlineCollector {
  const collector = new OutlineCollector(reverseWind);
  for (const command of commands) {
    collector.apply(command);
  }
  collector.close();
  return collector;
}

function trimClosingPoint(ring: Ring): Ring {
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (ring.length > 1 && first && last && equals(first, last)) {
    return ring.slice(0, -1);
  }
  return ring;
}

// Fewer than three points cannot enclose any fill
function isUsableRing(ring: Ring): boolean {
  return trimClosingPoint(ring).length >= 3;
}
