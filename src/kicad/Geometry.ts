import { InvalidArgumentError } from "@sch/errors";

export interface Point {
  x: number;
  y: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type Rotation = 0 | 90 | 180 | 270;

/** KiCad's `(mirror x)` flips across the X axis (y negated), `(mirror y)` across the Y axis. */
export type Mirror = "x" | "y";

export interface Placement {
  position: Point;
  rotation: number;
  mirror?: Mirror;
}

/** Standard KiCad schematic grid, 50 mil. */
export const DEFAULT_GRID = 1.27;

const PRECISION = 4;

// Exact sin/cos for right angles; Math.sin(Math.PI) is not 0.
const TRIG: Record<Rotation, { cos: number; sin: number }> = {
  0: { cos: 1, sin: 0 },
  90: { cos: 0, sin: 1 },
  180: { cos: -1, sin: 0 },
  270: { cos: 0, sin: -1 },
};

export function point(x: number, y: number): Point {
  return { x, y };
}

/** Rounds to the file format's 4 decimals and folds -0 into 0. */
export function round(value: number): number {
  const rounded = Number(value.toFixed(PRECISION));
  return rounded === 0 ? 0 : rounded;
}

export function roundPoint(p: Point): Point {
  return { x: round(p.x), y: round(p.y) };
}

export function snapValue(value: number, grid: number = DEFAULT_GRID): number {
  assertGrid(grid);
  return round(Math.round(value / grid) * grid);
}

/** Nearest grid point. Idempotent: snapping a snapped point returns it unchanged. */
export function snapToGrid(p: Point, grid: number = DEFAULT_GRID): Point {
  return { x: snapValue(p.x, grid), y: snapValue(p.y, grid) };
}

export function isOnGrid(p: Point, grid: number = DEFAULT_GRID): boolean {
  const snapped = snapToGrid(p, grid);
  return snapped.x === p.x && snapped.y === p.y;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Exact-coordinate key, used wherever points are compared by identity. */
export function pointKey(p: Point): string {
  return `${p.x},${p.y}`;
}

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/** Folds any multiple of 90 into 0..270; anything else is rejected. */
export function normalizeRotation(degrees: number): Rotation {
  const folded = ((degrees % 360) + 360) % 360;
  if (folded === 0 || folded === 90 || folded === 180 || folded === 270) return folded;
  throw new InvalidArgumentError(`Rotation must be a multiple of 90 degrees, got ${degrees}`, { rotation: degrees });
}

/**
 * Rotates a sheet-frame offset counter-clockwise as seen on screen (Y down).
 */
export function rotate(p: Point, rotation: number): Point {
  const { cos, sin } = TRIG[normalizeRotation(rotation)];
  return { x: p.x * cos + p.y * sin, y: -p.x * sin + p.y * cos };
}

export function mirror(p: Point, axis?: Mirror): Point {
  if (axis === "x") return { x: p.x, y: -p.y };
  if (axis === "y") return { x: -p.x, y: p.y };
  return p;
}

/**
 * Absolute sheet position of a pin given its library offset (Y up).
 * The offset is flipped into the sheet frame, rotated, mirrored, then moved to
 * the component position.
 */
export function pinPosition(placement: Placement, libraryOffset: Point): Point {
  const local = rotate({ x: libraryOffset.x, y: -libraryOffset.y }, placement.rotation);
  const mirrored = mirror(local, placement.mirror);
  return roundPoint({ x: placement.position.x + mirrored.x, y: placement.position.y + mirrored.y });
}

/** Absolute direction of a pin, in degrees, after rotation and mirroring. */
export function pinOrientation(placement: Placement, libraryAngle: number): Rotation {
  let angle: number = normalizeRotation(libraryAngle + placement.rotation);
  if (placement.mirror === "x") angle = 360 - angle;
  if (placement.mirror === "y") angle = 180 - angle;
  return normalizeRotation(angle);
}

export function boundingBox(points: readonly Point[], padding = 0): Box {
  if (points.length === 0) throw new InvalidArgumentError("Cannot bound an empty point set");
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  return {
    x: round(minX - padding),
    y: round(minY - padding),
    width: round(maxX - minX + 2 * padding),
    height: round(maxY - minY + 2 * padding),
  };
}

export function expandBox(box: Box, margin: number): Box {
  return { x: box.x - margin, y: box.y - margin, width: box.width + 2 * margin, height: box.height + 2 * margin };
}

/** Closed-rectangle containment: points on the border are inside. */
export function boxContains(box: Box, p: Point): boolean {
  return p.x >= box.x && p.x <= box.x + box.width && p.y >= box.y && p.y <= box.y + box.height;
}

/**
 * Whether segment a-b touches the closed rectangle (Liang-Barsky clipping).
 */
export function segmentIntersectsBox(a: Point, b: Point, box: Box): boolean {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  let t0 = 0;
  let t1 = 1;
  const checks: Array<[number, number]> = [
    [-dx, a.x - box.x],
    [dx, box.x + box.width - a.x],
    [-dy, a.y - box.y],
    [dy, box.y + box.height - a.y],
  ];
  for (const [p, q] of checks) {
    if (p === 0) {
      if (q < 0) return false;
      continue;
    }
    const t = q / p;
    if (p < 0) {
      if (t > t1) return false;
      t0 = Math.max(t0, t);
    } else {
      if (t < t0) return false;
      t1 = Math.min(t1, t);
    }
  }
  return t0 <= t1;
}

/** Whether `p` lies on segment a-b, end points included. Exact, no tolerance. */
export function pointOnSegment(p: Point, a: Point, b: Point): boolean {
  const cross = (b.x - a.x) * (p.y - a.y) - (b.y - a.y) * (p.x - a.x);
  if (cross !== 0) return false;
  return (
    p.x >= Math.min(a.x, b.x) && p.x <= Math.max(a.x, b.x) && p.y >= Math.min(a.y, b.y) && p.y <= Math.max(a.y, b.y)
  );
}

/** Drops consecutive duplicates and interior points of straight runs. */
export function simplifyPath(path: readonly Point[]): Point[] {
  const deduped: Point[] = [];
  for (const p of path) {
    const last = deduped[deduped.length - 1];
    if (!last || !pointsEqual(last, p)) deduped.push(p);
  }
  if (deduped.length < 3) return deduped;

  const simplified: Point[] = [deduped[0]];
  for (let i = 1; i < deduped.length - 1; i++) {
    const prev = simplified[simplified.length - 1];
    const curr = deduped[i];
    const next = deduped[i + 1];
    const cross = (curr.x - prev.x) * (next.y - curr.y) - (curr.y - prev.y) * (next.x - curr.x);
    if (cross !== 0) simplified.push(curr);
  }
  simplified.push(deduped[deduped.length - 1]);
  return simplified;
}

function assertGrid(grid: number): void {
  if (!(grid > 0) || !Number.isFinite(grid)) {
    throw new InvalidArgumentError(`Grid spacing must be a positive number, got ${grid}`, { grid });
  }
}
