import { OutOfBoundsError } from '../errors';
import {
    CELL_CLEAR,
    CELL_GOAL,
    CELL_OBSTACLE,
    CELL_ROVER,
    type Coordinate,
    type GridData,
    type MarkerKind,
    type TerrainCell,
} from '../types';
import { costOf, toTerrainCell } from './terrainCosts';

/**
 * Read-only access to a terrain snapshot. The planner only ever sees this;
 * the rover holds the mutable TerrainGrid.
 */
export interface TerrainView {
    readonly size: number;
    inBounds(coord: Coordinate): boolean;
    at(coord: Coordinate): TerrainCell;
    costAt(coord: Coordinate): number;
}

interface Overlay {
    index: number;
    underlying: TerrainCell;
}

const MARKER_CELLS: Record<MarkerKind, TerrainCell> = {
    rover: CELL_ROVER,
    goal: CELL_GOAL,
};

export class TerrainGrid implements TerrainView {
    readonly size: number;
    private readonly cells: GridData;
    private readonly overlays = new Map<MarkerKind, Overlay>();

    private constructor(size: number, cells: GridData) {
        this.size = size;
        this.cells = cells;
    }

    static filled(size: number, cell: TerrainCell = CELL_CLEAR): TerrainGrid {
        assertValidSize(size);
        return new TerrainGrid(size, new Int8Array(size * size).fill(cell));
    }

    /** Builds a grid from a flat row-major list of cell codes, validating every value. */
    static fromCells(size: number, cells: ArrayLike<number>): TerrainGrid {
        assertValidSize(size);
        if (cells.length !== size * size) {
            throw new Error(`Expected ${size * size} cells for a ${size}x${size} grid, got ${cells.length}`);
        }
        const data = new Int8Array(size * size);
        for (let i = 0; i < data.length; i++) {
            data[i] = toTerrainCell(cells[i]);
        }
        return new TerrainGrid(size, data);
    }

    inBounds(coord: Coordinate): boolean {
        return Number.isInteger(coord.x) && Number.isInteger(coord.y)
            && coord.x >= 0 && coord.x < this.size
            && coord.y >= 0 && coord.y < this.size;
    }

    assertInBounds(coord: Coordinate): void {
        if (!this.inBounds(coord)) throw new OutOfBoundsError(coord, this.size);
    }

    indexOf(coord: Coordinate): number {
        this.assertInBounds(coord);
        return coord.y * this.size + coord.x;
    }

    at(coord: Coordinate): TerrainCell {
        return toTerrainCell(this.cells[this.indexOf(coord)]);
    }

    costAt(coord: Coordinate): number {
        return costOf(this.at(coord));
    }

    set(coord: Coordinate, cell: TerrainCell): void {
        this.cells[this.indexOf(coord)] = cell;
    }

    /** Terrain class underneath any marker placed at `coord`. */
    baseAt(coord: Coordinate): TerrainCell {
        const index = this.indexOf(coord);
        for (const overlay of this.overlays.values()) {
            if (overlay.index === index) return overlay.underlying;
        }
        return toTerrainCell(this.cells[index]);
    }

    /**
     * Moves the marker of the given kind to `coord`, restoring whatever it
     * covered at its previous position.
     */
    overlay(kind: MarkerKind, coord: Coordinate): void {
        const index = this.indexOf(coord);
        this.clearOverlay(kind);
        this.overlays.set(kind, { index, underlying: toTerrainCell(this.cells[index]) });
        this.cells[index] = MARKER_CELLS[kind];
    }

    clearOverlay(kind: MarkerKind): void {
        const previous = this.overlays.get(kind);
        if (!previous) return;
        this.cells[previous.index] = previous.underlying;
        this.overlays.delete(kind);
    }

    /** Independent copy with markers baked in as plain cells. */
    clone(): TerrainGrid {
        return new TerrainGrid(this.size, new Int8Array(this.cells));
    }

    view(): TerrainView {
        return this.clone();
    }

    toArray(): TerrainCell[] {
        return Array.from(this.cells, toTerrainCell);
    }

    count(cell: TerrainCell): number {
        let total = 0;
        for (const value of this.cells) {
            if (value === cell) total++;
        }
        return total;
    }
}

export const NEIGHBOUR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
    [0, 1], [1, 0], [0, -1], [-1, 0],    // cardinal
    [1, 1], [-1, -1], [1, -1], [-1, 1],  // diagonal
];

export function sameCoordinate(a: Coordinate, b: Coordinate): boolean {
    return a.x === b.x && a.y === b.y;
}

/** 8-connected reachability over non-obstacle cells. */
export function isConnected(view: TerrainView, from: Coordinate, to: Coordinate): boolean {
    if (view.at(from) === CELL_OBSTACLE || view.at(to) === CELL_OBSTACLE) return false;

    const visited = new Uint8Array(view.size * view.size);
    const stack: Coordinate[] = [from];
    visited[from.y * view.size + from.x] = 1;

    while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;
        if (sameCoordinate(current, to)) return true;

        for (const [dx, dy] of NEIGHBOUR_OFFSETS) {
            const next = { x: current.x + dx, y: current.y + dy };
            if (!view.inBounds(next)) continue;
            const index = next.y * view.size + next.x;
            if (visited[index] || view.at(next) === CELL_OBSTACLE) continue;
            visited[index] = 1;
            stack.push(next);
        }
    }
    return false;
}

function assertValidSize(size: number): void {
    if (!Number.isInteger(size) || size < 2) {
        throw new RangeError(`Grid size must be an integer >= 2, got ${size}`);
    }
}
