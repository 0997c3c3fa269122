import {
    CELL_CLEAR,
    CELL_GOAL,
    CELL_OBSTACLE,
    CELL_ROCKS,
    CELL_ROVER,
    CELL_SAND,
    type TerrainCell,
    type TerrainDistribution,
    type TerrainName,
} from '../types';

/**
 * Single cost table shared by the generator, the planner and the rover.
 * - Clear -> 1
 * - Sand -> 2
 * - Rocks -> 3
 * - Obstacle -> Infinity (impassable)
 * - Rover / Goal markers -> 1 (they sit on cleared ground)
 */
const TERRAIN_COSTS: Record<TerrainCell, number> = {
    [CELL_CLEAR]: 1,
    [CELL_OBSTACLE]: Infinity,
    [CELL_ROVER]: 1,
    [CELL_GOAL]: 1,
    [CELL_SAND]: 2,
    [CELL_ROCKS]: 3,
};

const SPEED_FACTORS: Partial<Record<TerrainCell, number>> = {
    [CELL_CLEAR]: 1.0,
    [CELL_SAND]: 0.7,
    [CELL_ROCKS]: 0.5,
};

const TERRAIN_NAMES: Record<TerrainCell, TerrainName> = {
    [CELL_CLEAR]: 'Clear',
    [CELL_OBSTACLE]: 'Obstacle',
    [CELL_ROVER]: 'RoverMarker',
    [CELL_GOAL]: 'GoalMarker',
    [CELL_SAND]: 'Sand',
    [CELL_ROCKS]: 'Rocks',
};

export function costOf(cell: TerrainCell): number {
    return TERRAIN_COSTS[cell];
}

export function speedFactorOf(cell: TerrainCell): number {
    return SPEED_FACTORS[cell] ?? 1.0;
}

export function terrainName(cell: TerrainCell): TerrainName {
    return TERRAIN_NAMES[cell];
}

export function isPassable(cell: TerrainCell): boolean {
    return cell !== CELL_OBSTACLE;
}

export function isTerrainCell(value: number): value is TerrainCell {
    return value in TERRAIN_COSTS;
}

export function toTerrainCell(value: number): TerrainCell {
    if (!isTerrainCell(value)) {
        throw new Error(`Invalid terrain value: ${value}`);
    }
    return value;
}

/** Fraction of entries per terrain name; empty input gives an empty record. */
export function terrainDistribution(cells: readonly TerrainCell[]): TerrainDistribution {
    const counts = new Map<TerrainName, number>();
    for (const cell of cells) {
        const name = terrainName(cell);
        counts.set(name, (counts.get(name) ?? 0) + 1);
    }

    const distribution: TerrainDistribution = {};
    for (const [name, count] of counts) {
        distribution[name] = count / cells.length;
    }
    return distribution;
}
