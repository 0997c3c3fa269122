import type { Coordinate } from '../types';
import { TerrainGrid } from './terrainGrid';
import { TerrainImportSchema } from './validators';

export interface ParsedTerrain {
    grid: TerrainGrid;
    start?: Coordinate;
    goal?: Coordinate;
}

/**
 * Parses a CSV file containing a terrain snapshot
 * Format:
 *   # start,x,y (optional)
 *   # goal,x,y (optional)
 *   cell,cell,cell,...
 *   ...
 * The grid must be square; cell values are terrain codes.
 */
export function parseTerrainCSV(csvText: string): ParsedTerrain {
    const lines = csvText.trim().split('\n');
    const dataRows: string[] = [];
    let start: Coordinate | undefined;
    let goal: Coordinate | undefined;

    for (const line of lines) {
        const trimmed = line.trim();
        if (!trimmed) continue;

        if (!trimmed.startsWith('#')) {
            dataRows.push(trimmed);
            continue;
        }
        const endpoint = readEndpoint(trimmed);
        if (endpoint?.kind === 'start') start = endpoint.coord;
        if (endpoint?.kind === 'goal') goal = endpoint.coord;
    }

    if (dataRows.length === 0) {
        throw new Error('CSV file contains no data rows');
    }

    const size = dataRows.length;
    const cells: number[] = [];
    for (let y = 0; y < size; y++) {
        const row = dataRows[y].split(',');
        if (row.length !== size) {
            throw new Error(`Row ${y + 1} has ${row.length} columns, expected ${size}`);
        }

        for (let x = 0; x < size; x++) {
            const val = parseInt(row[x].trim(), 10);
            if (isNaN(val)) {
                throw new Error(`Invalid value at row ${y + 1}, column ${x + 1}: "${row[x]}"`);
            }
            cells.push(val);
        }
    }

    const grid = TerrainGrid.fromCells(size, cells);
    if (start) grid.assertInBounds(start);
    if (goal) grid.assertInBounds(goal);

    return { grid, start, goal };
}

export function parseTerrainJSON(jsonText: string): ParsedTerrain {
    const parsed = TerrainImportSchema.parse(JSON.parse(jsonText));
    const grid = TerrainGrid.fromCells(parsed.size, parsed.cells);
    if (parsed.start) grid.assertInBounds(parsed.start);
    if (parsed.goal) grid.assertInBounds(parsed.goal);

    return { grid, start: parsed.start, goal: parsed.goal };
}

// "# start,3,4" -> start at (3, 4); any other comment is ignored
const ENDPOINT_COMMENT = /^#\s*(start|goal)\s*,\s*(\d+)\s*,\s*(\d+)\s*$/;

function readEndpoint(comment: string): { kind: 'start' | 'goal'; coord: Coordinate } | null {
    const match = ENDPOINT_COMMENT.exec(comment);
    if (!match) return null;
    const kind = match[1] === 'start' ? 'start' : 'goal';
    return { kind, coord: { x: Number(match[2]), y: Number(match[3]) } };
}
