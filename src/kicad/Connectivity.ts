import { type Point, pointKey, pointOnSegment, pointsEqual } from "./Geometry";

export interface Net {
  /** Stable within one graph: nets are numbered in discovery order. */
  id: number;
  points: Point[];
}

export interface ConnectivityInput {
  /** Wire polylines, each with at least two points. */
  wires: ReadonlyArray<readonly Point[]>;
  junctions?: readonly Point[];
}

/**
 * Undirected graph of electrically joined points.
 *
 * Nodes are exact coordinates. Every wire segment is an edge; a junction lying
 * inside a segment splits it so the junction joins both halves. Points are
 * never merged by proximity.
 */
export class ConnectivityGraph {
  private adjacency = new Map<string, Set<string>>();
  private points = new Map<string, Point>();

  static build(input: ConnectivityInput): ConnectivityGraph {
    const graph = new ConnectivityGraph();
    const junctions = input.junctions ?? [];
    for (const junction of junctions) graph.addNode(junction);

    for (const wire of input.wires) {
      for (let i = 0; i + 1 < wire.length; i++) {
        const a = wire[i];
        const b = wire[i + 1];
        if (pointsEqual(a, b)) continue;
        const splits = junctions
          .filter((j) => !pointsEqual(j, a) && !pointsEqual(j, b) && pointOnSegment(j, a, b))
          .sort((p, q) => distance2(a, p) - distance2(a, q));
        const chain = [a, ...splits, b];
        for (let k = 0; k + 1 < chain.length; k++) graph.addEdge(chain[k], chain[k + 1]);
      }
    }
    return graph;
  }

  get nodeCount(): number {
    return this.points.size;
  }

  get edgeCount(): number {
    let total = 0;
    for (const neighbors of this.adjacency.values()) total += neighbors.size;
    return total / 2;
  }

  hasNode(p: Point): boolean {
    return this.points.has(pointKey(p));
  }

  neighbors(p: Point): Point[] {
    return [...(this.adjacency.get(pointKey(p)) ?? [])].map((k) => this.resolve(k));
  }

  /** True only when a single segment joins the two points. */
  isDirectlyConnected(a: Point, b: Point): boolean {
    return this.adjacency.get(pointKey(a))?.has(pointKey(b)) ?? false;
  }

  /** Reachability through any chain of segments and junctions. Symmetric. */
  isConnected(a: Point, b: Point): boolean {
    if (pointsEqual(a, b)) return true;
    const target = pointKey(b);
    return this.component(pointKey(a)).has(target);
  }

  /** Every point reachable from `p`, including `p` itself. */
  reachable(p: Point): Point[] {
    return [...this.component(pointKey(p))].map((k) => this.resolve(k));
  }

  /** Partition of all graph nodes into connected groups. */
  traceNets(): Net[] {
    const seen = new Set<string>();
    const nets: Net[] = [];
    for (const start of this.points.keys()) {
      if (seen.has(start)) continue;
      const members = this.component(start);
      members.forEach((k) => seen.add(k));
      nets.push({ id: nets.length + 1, points: [...members].map((k) => this.resolve(k)) });
    }
    return nets;
  }

  private component(start: string): Set<string> {
    const visited = new Set<string>([start]);
    const queue = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.adjacency.get(current) ?? []) {
        if (!visited.has(next)) {
          visited.add(next);
          queue.push(next);
        }
      }
    }
    return visited;
  }

  private addNode(p: Point): string {
    const k = pointKey(p);
    if (!this.points.has(k)) {
      this.points.set(k, { x: p.x, y: p.y });
      this.adjacency.set(k, new Set());
    }
    return k;
  }

  private addEdge(a: Point, b: Point): void {
    const ka = this.addNode(a);
    const kb = this.addNode(b);
    this.adjacency.get(ka)?.add(kb);
    this.adjacency.get(kb)?.add(ka);
  }

  private resolve(k: string): Point {
    const p = this.points.get(k);
    if (p) return p;
    const [x, y] = k.split(",").map(Number);
    return { x, y };
  }
}

function distance2(a: Point, b: Point): number {
  return (a.x - b.x) ** 2 + (a.y - b.y) ** 2;
}
