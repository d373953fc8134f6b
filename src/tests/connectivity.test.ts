import { describe, it, expect } from "vitest";
import { ConnectivityGraph } from "../kicad/Connectivity";

const a = { x: 0, y: 0 };
const b = { x: 10, y: 0 };
const c = { x: 10, y: 10 };
const d = { x: 30, y: 30 };
const e = { x: 40, y: 30 };

describe("ConnectivityGraph", () => {
  const graph = ConnectivityGraph.build({
    wires: [
      [a, b],
      [b, c],
      [d, e],
    ],
  });

  it("creates one node per distinct end point", () => {
    expect(graph.nodeCount).toBe(5);
    expect(graph.edgeCount).toBe(3);
  });

  it("follows chains of wires", () => {
    expect(graph.isConnected(a, c)).toBe(true);
    expect(graph.isConnected(a, d)).toBe(false);
  });

  it("is symmetric", () => {
    for (const p of [a, b, c, d, e]) {
      for (const q of [a, b, c, d, e]) {
        expect(graph.isConnected(p, q)).toBe(graph.isConnected(q, p));
      }
    }
  });

  it("separates direct from indirect connections", () => {
    expect(graph.isDirectlyConnected(a, b)).toBe(true);
    expect(graph.isDirectlyConnected(a, c)).toBe(false);
  });

  it("compares coordinates exactly", () => {
    expect(graph.isConnected(a, { x: 10.0001, y: 10 })).toBe(false);
    expect(graph.hasNode({ x: 10, y: 0 })).toBe(true);
  });

  it("treats an isolated point as reachable only from itself", () => {
    const lonely = { x: 99, y: 99 };
    expect(graph.isConnected(lonely, lonely)).toBe(true);
    expect(graph.isConnected(lonely, a)).toBe(false);
    expect(graph.reachable(lonely)).toEqual([lonely]);
  });

  it("groups points into nets in discovery order", () => {
    expect(graph.traceNets()).toEqual([
      { id: 1, points: [a, b, c] },
      { id: 2, points: [d, e] },
    ]);
  });

  it("lists neighbours", () => {
    expect(graph.neighbors(b)).toEqual([a, c]);
  });
});

describe("ConnectivityGraph junctions", () => {
  const trunk = [
    { x: 0, y: 0 },
    { x: 20, y: 0 },
  ];
  const branch = [
    { x: 10, y: 0 },
    { x: 10, y: 10 },
  ];

  it("does not join a wire that only ends on another wire's middle", () => {
    const graph = ConnectivityGraph.build({ wires: [trunk, branch] });
    expect(graph.isConnected({ x: 0, y: 0 }, { x: 10, y: 10 })).toBe(false);
  });

  it("joins them through a junction on the crossing point", () => {
    const graph = ConnectivityGraph.build({ wires: [trunk, branch], junctions: [{ x: 10, y: 0 }] });
    expect(graph.isConnected({ x: 0, y: 0 }, { x: 10, y: 10 })).toBe(true);
    expect(graph.isDirectlyConnected({ x: 0, y: 0 }, { x: 10, y: 0 })).toBe(true);
    expect(graph.isDirectlyConnected({ x: 0, y: 0 }, { x: 20, y: 0 })).toBe(false);
  });

  it("keeps a junction that touches nothing as a lone node", () => {
    const graph = ConnectivityGraph.build({ wires: [trunk], junctions: [{ x: 5, y: 5 }] });
    expect(graph.nodeCount).toBe(3);
    expect(graph.traceNets()).toEqual([
      { id: 1, points: [{ x: 5, y: 5 }] },
      {
        id: 2,
        points: [
          { x: 0, y: 0 },
          { x: 20, y: 0 },
        ],
      },
    ]);
  });

  it("walks polylines segment by segment", () => {
    const graph = ConnectivityGraph.build({
      wires: [
        [
          { x: 0, y: 0 },
          { x: 5, y: 0 },
          { x: 5, y: 5 },
        ],
      ],
    });
    expect(graph.edgeCount).toBe(2);
    expect(graph.isConnected({ x: 0, y: 0 }, { x: 5, y: 5 })).toBe(true);
  });
});
