import type { Coordinate, MissionRecord } from '../types';
import type { TerrainGrid } from './terrainGrid';

export interface TerrainEndpoints {
    start?: Coordinate;
    goal?: Coordinate;
}

/**
 * Terrain snapshot as CSV, one row per grid row, cell codes as integers.
 * Start and goal, when given, go first as comment lines:
 *   # start,x,y
 *   # goal,x,y
 */
export const generateTerrainCSV = (grid: TerrainGrid, endpoints: TerrainEndpoints = {}): string => {
    let csv = '';

    if (endpoints.start) {
        csv += `# start,${endpoints.start.x},${endpoints.start.y}\n`;
    }
    if (endpoints.goal) {
        csv += `# goal,${endpoints.goal.x},${endpoints.goal.y}\n`;
    }

    const cells = grid.toArray();
    for (let y = 0; y < grid.size; y++) {
        csv += cells.slice(y * grid.size, (y + 1) * grid.size).join(',') + '\n';
    }
    return csv;
};

export const generateTerrainJSON = (grid: TerrainGrid, endpoints: TerrainEndpoints = {}): string => {
    const serializable = {
        size: grid.size,
        cells: grid.toArray(),
        ...endpoints,
    };
    return JSON.stringify(serializable, null, 2);
};

/** Mission history as a JSON array, field names as in MissionRecord. */
export const generateMissionJSON = (records: readonly MissionRecord[]): string => {
    return JSON.stringify(records, null, 4);
};
