import { InvalidArgumentError, NoPathError } from "@sch/errors";
import {
    type Box,
    type Point,
    boxContains,
    expandBox,
    pointsEqual,
    roundPoint,
    segmentIntersectsBox,
    simplifyPath,
    snapToGrid,
} from "./Geometry";

export type { Box, Point } from "./Geometry";

export type BendPreference = "horizontal-first" | "vertical-first";

export interface RouterOptions {
    /** Document grid; every returned vertex lies on it. */
    grid: number;
    /** Search lattice spacing, an integer multiple of `grid`. Defaults to `grid`. */
    cellSize?: number;
    /** Obstacles are grown by this distance before routing. */
    clearance?: number;
    /** Cells of free space around start, end and obstacles that the search may use. */
    margin?: number;
    maxIterations?: number;
}

// Below one step, so turns only break ties between equally short paths.
const TURN_PENALTY = 0.001;

const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
    [1, 0],
    [-1, 0],
    [0, 1],
    [0, -1],
];

/**
 * Orthogonal wire router.
 *
 * `route` runs A* over a bounded lattice anchored at the start point, with a
 * Manhattan heuristic. An edge is unusable when it touches any obstacle
 * rectangle (grown by the clearance). `direct` makes an L-shaped connection
 * and ignores obstacles.
 */
export class Router {
    readonly grid: number;
    readonly cellSize: number;
    readonly clearance: number;
    readonly margin: number;
    readonly maxIterations: number;

    constructor(options: RouterOptions) {
        const { grid, cellSize = grid, clearance = 0, margin = 10, maxIterations = 200000 } = options;
        if (!(grid > 0)) throw new InvalidArgumentError(`Router grid must be positive, got ${grid}`, { grid });
        const ratio = cellSize / grid;
        if (!(cellSize > 0) || Math.abs(ratio - Math.round(ratio)) > 1e-9) {
            throw new InvalidArgumentError(`Cell size ${cellSize} is not a multiple of grid ${grid}`, { grid, cellSize });
        }
        if (clearance < 0) throw new InvalidArgumentError(`Clearance cannot be negative, got ${clearance}`, { clearance });
        this.grid = grid;
        this.cellSize = cellSize;
        this.clearance = clearance;
        this.margin = Math.max(0, Math.floor(margin));
        this.maxIterations = maxIterations;
    }

    /**
     * Shortest obstacle-free orthogonal path, as the list of its corner points
     * (start and end included). Throws `NoPathError` when start or end lie in an
     * obstacle or the search space is exhausted.
     */
    route(start: Point, end: Point, obstacles: readonly Box[] = []): Point[] {
        const s = snapToGrid(start, this.grid);
        const e = snapToGrid(end, this.grid);
        const blocked = obstacles.map((box) => expandBox(box, this.clearance));

        if (blocked.some((box) => boxContains(box, s))) {
            throw new NoPathError("start point lies inside an obstacle", { x: s.x, y: s.y });
        }
        if (blocked.some((box) => boxContains(box, e))) {
            throw new NoPathError("end point lies inside an obstacle", { x: e.x, y: e.y });
        }
        if (pointsEqual(s, e)) return [s];

        const lattice = new Lattice(s, this.cellSize, e, blocked, this.margin);
        const goal = lattice.cellOf(e);
        const cells = this.search(lattice, goal);

        const path = cells.map((cell) => lattice.point(cell));
        const landing = path[path.length - 1];
        if (!pointsEqual(landing, e)) path.push(...this.finalLeg(landing, e, blocked));
        return simplifyPath(path);
    }

    /** L-shaped connection with at most one bend. Obstacles are not considered. */
    direct(start: Point, end: Point, bend: BendPreference = "horizontal-first"): Point[] {
        const s = snapToGrid(start, this.grid);
        const e = snapToGrid(end, this.grid);
        const corner = bend === "horizontal-first" ? { x: e.x, y: s.y } : { x: s.x, y: e.y };
        return simplifyPath([s, corner, e]);
    }

    private search(lattice: Lattice, goal: Cell): Cell[] {
        const openSet = new PriorityQueue<Node>((node) => node.f);
        const startNode = new Node(0, 0, -1, 0, lattice.heuristic({ i: 0, j: 0 }, goal));
        openSet.enqueue(startNode);

        // States are cell plus heading, so a cheaper-turning arrival is never shadowed.
        const gScore = new Map<string, number>([[key(startNode), 0]]);
        const closedSet = new Set<string>();
        let iterations = 0;

        for (let current = openSet.dequeue(); current; current = openSet.dequeue()) {
            if (++iterations > this.maxIterations) {
                throw new NoPathError(`search limit of ${this.maxIterations} iterations reached`, { iterations });
            }

            const currentKey = key(current);
            if (closedSet.has(currentKey)) continue;
            if (current.i === goal.i && current.j === goal.j) return reconstructPath(current);
            closedSet.add(currentKey);

            for (let dir = 0; dir < DIRECTIONS.length; dir++) {
                const [di, dj] = DIRECTIONS[dir];
                const neighbor = new Node(current.i + di, current.j + dj, dir, 0, 0);
                const neighborKey = key(neighbor);
                if (closedSet.has(neighborKey) || !lattice.canStep(current, neighbor)) continue;

                const turnCost = current.dir !== -1 && current.dir !== dir ? TURN_PENALTY : 0;
                const tentativeG = current.g + 1 + turnCost;
                const existingG = gScore.get(neighborKey);
                if (existingG === undefined || tentativeG < existingG) {
                    neighbor.parent = current;
                    neighbor.g = tentativeG;
                    neighbor.f = tentativeG + lattice.heuristic(neighbor, goal);
                    gScore.set(neighborKey, tentativeG);
                    openSet.enqueue(neighbor);
                }
            }
        }

        throw new NoPathError("search space exhausted", { iterations });
    }

    /** Joins a lattice point to an off-lattice end point. */
    private finalLeg(from: Point, to: Point, blocked: readonly Box[]): Point[] {
        for (const corner of [{ x: to.x, y: from.y }, { x: from.x, y: to.y }]) {
            const clear = [
                [from, corner],
                [corner, to],
            ].every(([a, b]) => pointsEqual(a, b) || !blocked.some((box) => segmentIntersectsBox(a, b, box)));
            if (clear) return [corner, to];
        }
        throw new NoPathError("end point is not reachable from the routing lattice", { x: to.x, y: to.y });
    }
}

interface Cell {
    i: number;
    j: number;
}

/** Bounded integer lattice; cell (0, 0) is the start point. */
class Lattice {
    private readonly minI: number;
    private readonly maxI: number;
    private readonly minJ: number;
    private readonly maxJ: number;

    constructor(
        private readonly origin: Point,
        private readonly cellSize: number,
        end: Point,
        private readonly blocked: readonly Box[],
        margin: number,
    ) {
        const xs = [origin.x, end.x];
        const ys = [origin.y, end.y];
        for (const box of blocked) {
            xs.push(box.x, box.x + box.width);
            ys.push(box.y, box.y + box.height);
        }
        this.minI = Math.floor((Math.min(...xs) - origin.x) / cellSize) - margin;
        this.maxI = Math.ceil((Math.max(...xs) - origin.x) / cellSize) + margin;
        this.minJ = Math.floor((Math.min(...ys) - origin.y) / cellSize) - margin;
        this.maxJ = Math.ceil((Math.max(...ys) - origin.y) / cellSize) + margin;
    }

    point(cell: Cell): Point {
        return roundPoint({ x: this.origin.x + cell.i * this.cellSize, y: this.origin.y + cell.j * this.cellSize });
    }

    cellOf(p: Point): Cell {
        return {
            i: Math.round((p.x - this.origin.x) / this.cellSize),
            j: Math.round((p.y - this.origin.y) / this.cellSize),
        };
    }

    heuristic(a: Cell, b: Cell): number {
        return Math.abs(a.i - b.i) + Math.abs(a.j - b.j);
    }

    canStep(from: Cell, to: Cell): boolean {
        if (to.i < this.minI || to.i > this.maxI || to.j < this.minJ || to.j > this.maxJ) return false;
        const a = this.point(from);
        const b = this.point(to);
        return !this.blocked.some((box) => segmentIntersectsBox(a, b, box));
    }
}

class Node implements Cell {
    i: number;
    j: number;
    /** Index into DIRECTIONS of the step that led here; -1 at the start. */
    dir: number;
    g: number;
    f: number;
    parent?: Node;

    constructor(i: number, j: number, dir: number, g: number, f: number) {
        this.i = i;
        this.j = j;
        this.dir = dir;
        this.g = g;
        this.f = f;
    }
}

function key(node: Node): string {
    return `${node.i},${node.j},${node.dir}`;
}

function reconstructPath(node: Node): Cell[] {
    const path: Cell[] = [];
    let curr: Node | undefined = node;
    while (curr) {
        path.push({ i: curr.i, j: curr.j });
        curr = curr.parent;
    }
    return path.reverse();
}

class PriorityQueue<T> {
    private elements: T[] = [];
    private priority: (element: T) => number;

    constructor(priority: (element: T) => number) {
        this.priority = priority;
    }

    enqueue(element: T) {
        this.elements.push(element);
        this.bubbleUp(this.elements.length - 1);
    }

    dequeue(): T | undefined {
        const top = this.elements[0];
        const bottom = this.elements.pop();
        if (this.elements.length > 0 && bottom !== undefined) {
            this.elements[0] = bottom;
            this.sinkDown(0);
        }
        return top;
    }

    private bubbleUp(n: number) {
        const element = this.elements[n];
        const elemPriority = this.priority(element);
        while (n > 0) {
            const parentN = Math.floor((n + 1) / 2) - 1;
            const parent = this.elements[parentN];
            if (elemPriority >= this.priority(parent)) break;
            this.elements[parentN] = element;
            this.elements[n] = parent;
            n = parentN;
        }
    }

    private sinkDown(n: number) {
        const length = this.elements.length;
        const element = this.elements[n];
        const elemPriority = this.priority(element);

        while (true) {
            const child2N = (n + 1) * 2;
            const child1N = child2N - 1;
            let swap: number | null = null;
            let child1Priority = 0;

            if (child1N < length) {
                child1Priority = this.priority(this.elements[child1N]);
                if (child1Priority < elemPriority) swap = child1N;
            }

            if (child2N < length) {
                const child2Priority = this.priority(this.elements[child2N]);
                if (child2Priority < (swap === null ? elemPriority : child1Priority)) swap = child2N;
            }

            if (swap === null) break;
            this.elements[n] = this.elements[swap];
            this.elements[swap] = element;
            n = swap;
        }
    }
}
