// ---------------------------------------------------------------------------
// Cost-aware 8-connected path planning.
// A*, Dijkstra and Energy-Efficient A* are one best-first search; the variant
// only picks how a step is priced and how the frontier is ordered.
// ---------------------------------------------------------------------------

import { OutOfBoundsError, UnknownAlgorithmError } from '../errors';
import { createLogger } from '../logger';
import { CELL_OBSTACLE, type Coordinate, type PathAlgorithm, type PathResult } from '../types';
import { MinHeap } from './minHeap';
import { costOf } from './terrainCosts';
import { NEIGHBOUR_OFFSETS, type TerrainView } from './terrainGrid';

const log = createLogger('planner');

export const PATH_ALGORITHMS: readonly PathAlgorithm[] = ['A*', 'Dijkstra', 'EnergyEfficient'];

const ALGORITHM_ALIASES = new Map<string, PathAlgorithm>([
    ['A*', 'A*'],
    ['Dijkstra', 'Dijkstra'],
    ['EnergyEfficient', 'EnergyEfficient'],
    ['Energy Efficient', 'EnergyEfficient'],
]);

/** Maps an external algorithm label onto the closed variant type. */
export function parseAlgorithm(name: string): PathAlgorithm {
    const algorithm = ALGORITHM_ALIASES.get(name.trim());
    if (!algorithm) throw new UnknownAlgorithmError(name);
    return algorithm;
}

export const CARDINAL_STEP = 1.0;
export const DIAGONAL_STEP = Math.SQRT2;

interface CostModel {
    /** Accumulated cost of entering a cell. */
    stepCost: (baseStep: number, terrainCost: number) => number;
    /** Frontier priority of a cell reached at cost `g`. */
    priority: (g: number, distanceToGoal: number, terrainCost: number) => number;
}

function costModel(algorithm: PathAlgorithm): CostModel {
    switch (algorithm) {
        case 'A*':
            return {
                stepCost: (base, terrain) => base * terrain,
                priority: (g, distance) => g + distance,
            };
        case 'Dijkstra':
            return {
                stepCost: (base, terrain) => base * terrain,
                priority: (g) => g,
            };
        case 'EnergyEfficient':
            return {
                stepCost: (base, terrain) => base * terrain * terrain,
                priority: (g, distance, terrain) => g + distance * terrain,
            };
        default: {
            // Only reachable when an unchecked string sneaks past the type
            const unknown: never = algorithm;
            throw new UnknownAlgorithmError(String(unknown));
        }
    }
}

export function euclidean(a: Coordinate, b: Coordinate): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Minimum-cost path from `start` to `goal` under the given variant.
 * Returns `plan: null` (never throws) when the goal is blocked or unreachable.
 */
export function findPath(
    view: TerrainView,
    start: Coordinate,
    goal: Coordinate,
    algorithm: PathAlgorithm
): PathResult {
    const model = costModel(algorithm);
    if (!view.inBounds(start)) throw new OutOfBoundsError(start, view.size);
    if (!view.inBounds(goal)) throw new OutOfBoundsError(goal, view.size);

    const startedAt = performance.now();
    const elapsed = () => performance.now() - startedAt;

    if (view.at(goal) === CELL_OBSTACLE) {
        log.debug(`goal (${goal.x}, ${goal.y}) is an obstacle`);
        return { plan: null, totalCost: Infinity, elapsedMs: elapsed() };
    }

    const size = view.size;
    const key = (c: Coordinate) => c.y * size + c.x;
    const goalKey = key(goal);

    const frontier = new MinHeap<Coordinate>();
    const costSoFar = new Map<number, number>([[key(start), 0]]);
    const cameFrom = new Map<number, Coordinate>();
    frontier.push(start, 0);

    while (frontier.size > 0) {
        const entry = frontier.pop();
        if (!entry) break;
        const current = entry.value;
        const currentKey = key(current);
        if (currentKey === goalKey) break;

        const g = costSoFar.get(currentKey) ?? Infinity;

        for (const [dx, dy] of NEIGHBOUR_OFFSETS) {
            const next = { x: current.x + dx, y: current.y + dy };
            if (!view.inBounds(next)) continue;

            const cell = view.at(next);
            if (cell === CELL_OBSTACLE) continue;

            const terrainCost = costOf(cell);
            const baseStep = dx !== 0 && dy !== 0 ? DIAGONAL_STEP : CARDINAL_STEP;
            const newCost = g + model.stepCost(baseStep, terrainCost);
            const nextKey = key(next);
            const known = costSoFar.get(nextKey);

            if (known === undefined || newCost < known) {
                costSoFar.set(nextKey, newCost);
                cameFrom.set(nextKey, current);
                frontier.push(next, model.priority(newCost, euclidean(next, goal), terrainCost));
            }
        }
    }

    const totalCost = costSoFar.get(goalKey);
    if (totalCost === undefined) {
        log.debug(`no path from (${start.x}, ${start.y}) to (${goal.x}, ${goal.y}) with ${algorithm}`);
        return { plan: null, totalCost: Infinity, elapsedMs: elapsed() };
    }

    const path = reconstructPath(cameFrom, start, goal, key);
    const elapsedMs = elapsed();
    return {
        plan: { path, totalCost, elapsedMs, algorithm },
        totalCost,
        elapsedMs,
    };
}

function reconstructPath(
    cameFrom: Map<number, Coordinate>,
    start: Coordinate,
    goal: Coordinate,
    key: (c: Coordinate) => number
): Coordinate[] {
    const startKey = key(start);
    const path: Coordinate[] = [];
    let current = goal;

    while (key(current) !== startKey) {
        path.push({ x: current.x, y: current.y });
        const previous = cameFrom.get(key(current));
        if (!previous) throw new Error(`Broken predecessor chain at (${current.x}, ${current.y})`);
        current = previous;
    }
    path.push({ x: start.x, y: start.y });

    return path.reverse();
}

/**
 * Prices an existing path under a variant's step model. Returns Infinity if
 * the path now crosses an obstacle.
 */
export function pathCost(view: TerrainView, path: readonly Coordinate[], algorithm: PathAlgorithm): number {
    const model = costModel(algorithm);
    let total = 0;
    for (let i = 1; i < path.length; i++) {
        const from = path[i - 1];
        const to = path[i];
        const cell = view.at(to);
        if (cell === CELL_OBSTACLE) return Infinity;
        const diagonal = from.x !== to.x && from.y !== to.y;
        total += model.stepCost(diagonal ? DIAGONAL_STEP : CARDINAL_STEP, costOf(cell));
    }
    return total;
}
