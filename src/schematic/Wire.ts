import { InvalidArgumentError } from "@sch/errors";
import { type Point, pointsEqual } from "@sch/kicad/Geometry";
import { type SList, atom, list } from "@sch/kicad/SExpression";
import { SchematicItem, uuidNode } from "./SchematicItem";

export type WireKind = "wire" | "bus";

/**
 * Drops repeated consecutive points; a wire needs two distinct points left.
 */
export function cleanWirePoints(points: readonly Point[]): Point[] {
  const result: Point[] = [];
  for (const p of points) {
    const last = result[result.length - 1];
    if (!last || !pointsEqual(last, p)) result.push({ x: p.x, y: p.y });
  }
  if (result.length < 2) {
    throw new InvalidArgumentError(`A wire needs at least two distinct points, got ${result.length}`, {
      points: result.length,
    });
  }
  return result;
}

/** `(wire (pts (xy ..) (xy ..)) (stroke ..) (uuid ..))`, or the same with `bus`. */
export class Wire extends SchematicItem {
  readonly kind = "wire";

  static create(points: readonly Point[], uuid: string, kind: WireKind = "wire"): Wire {
    const cleaned = cleanWirePoints(points);
    const node = list(
      kind,
      list("pts", ...cleaned.map((p) => list("xy", p.x, p.y))),
      list("stroke", list("width", 0), list("type", atom("default"))),
      uuidNode(uuid),
    );
    return new Wire(node);
  }

  get wireKind(): WireKind {
    return this.node.keyword === "bus" ? "bus" : "wire";
  }

  get points(): Point[] {
    return (this.node.child("pts")?.children("xy") ?? []).map((xy) => ({ x: xy.number(1) ?? 0, y: xy.number(2) ?? 0 }));
  }

  set points(value: readonly Point[]) {
    const cleaned = cleanWirePoints(value);
    const pts = this.node.child("pts");
    const fresh = cleaned.map((p) => list("xy", p.x, p.y));
    if (pts) {
      pts.items = [pts.items[0], ...fresh];
    } else {
      this.node.insert(1, list("pts", ...fresh));
    }
    this.changed();
  }

  get start(): Point | undefined {
    return this.points[0];
  }

  get end(): Point | undefined {
    const points = this.points;
    return points[points.length - 1];
  }

  segments(): Array<[Point, Point]> {
    const points = this.points;
    const result: Array<[Point, Point]> = [];
    for (let i = 0; i + 1 < points.length; i++) result.push([points[i], points[i + 1]]);
    return result;
  }

  /** Zero-length segments or fewer than two points. */
  get isDegenerate(): boolean {
    const points = this.points;
    return points.length < 2 || this.segments().some(([a, b]) => pointsEqual(a, b));
  }
}

export function isWireNode(node: SList): boolean {
  return node.keyword === "wire" || node.keyword === "bus";
}
