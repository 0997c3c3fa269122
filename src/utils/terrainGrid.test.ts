import { describe, it, expect } from 'vitest';
import { TerrainGrid, isConnected } from './terrainGrid';
import { costOf, speedFactorOf, terrainDistribution, terrainName } from './terrainCosts';
import { OutOfBoundsError } from '../errors';
import {
    CELL_CLEAR,
    CELL_GOAL,
    CELL_OBSTACLE,
    CELL_ROCKS,
    CELL_ROVER,
    CELL_SAND,
} from '../types';

describe('TerrainGrid', () => {
    it('starts fully clear', () => {
        const grid = TerrainGrid.filled(4);

        expect(grid.size).toBe(4);
        expect(grid.count(CELL_CLEAR)).toBe(16);
    });

    it('rejects coordinates outside the grid', () => {
        const grid = TerrainGrid.filled(10);

        expect(() => grid.at({ x: 10, y: 0 })).toThrow(OutOfBoundsError);
        expect(() => grid.set({ x: -1, y: 0 }, CELL_SAND)).toThrow(OutOfBoundsError);
        expect(() => grid.at({ x: 0.5, y: 0 })).toThrow(OutOfBoundsError);
        expect(grid.inBounds({ x: 9, y: 9 })).toBe(true);
    });

    it('rejects grids smaller than two cells a side', () => {
        expect(() => TerrainGrid.filled(1)).toThrow(RangeError);
    });

    it('builds from flat cell codes', () => {
        const grid = TerrainGrid.fromCells(2, [0, 1, 4, 5]);

        expect(grid.at({ x: 1, y: 0 })).toBe(CELL_OBSTACLE);
        expect(grid.at({ x: 0, y: 1 })).toBe(CELL_SAND);
        expect(grid.at({ x: 1, y: 1 })).toBe(CELL_ROCKS);
    });

    it('rejects unknown cell codes and wrong lengths', () => {
        expect(() => TerrainGrid.fromCells(2, [0, 0, 0, 9])).toThrow('Invalid terrain value: 9');
        expect(() => TerrainGrid.fromCells(2, [0, 0, 0])).toThrow('Expected 4 cells for a 2x2 grid, got 3');
    });

    it('restores the covered terrain when a marker moves', () => {
        const grid = TerrainGrid.filled(5);
        grid.set({ x: 1, y: 1 }, CELL_SAND);

        grid.overlay('rover', { x: 1, y: 1 });
        expect(grid.at({ x: 1, y: 1 })).toBe(CELL_ROVER);
        expect(grid.baseAt({ x: 1, y: 1 })).toBe(CELL_SAND);

        grid.overlay('rover', { x: 2, y: 2 });
        expect(grid.at({ x: 1, y: 1 })).toBe(CELL_SAND);
        expect(grid.at({ x: 2, y: 2 })).toBe(CELL_ROVER);
    });

    it('keeps rover and goal markers independent', () => {
        const grid = TerrainGrid.filled(5);
        grid.overlay('goal', { x: 4, y: 4 });
        grid.overlay('rover', { x: 0, y: 0 });

        grid.clearOverlay('rover');

        expect(grid.at({ x: 0, y: 0 })).toBe(CELL_CLEAR);
        expect(grid.at({ x: 4, y: 4 })).toBe(CELL_GOAL);
    });

    it('hands out independent snapshots', () => {
        const grid = TerrainGrid.filled(3);
        const view = grid.view();

        grid.set({ x: 0, y: 0 }, CELL_OBSTACLE);

        expect(view.at({ x: 0, y: 0 })).toBe(CELL_CLEAR);
        expect(grid.costAt({ x: 0, y: 0 })).toBe(Infinity);
    });
});

describe('isConnected', () => {
    it('follows diagonal gaps', () => {
        const grid = TerrainGrid.fromCells(3, [
            0, 1, 1,
            1, 0, 1,
            1, 1, 0,
        ]);

        expect(isConnected(grid, { x: 0, y: 0 }, { x: 2, y: 2 })).toBe(true);
    });

    it('stops at a full wall', () => {
        const grid = TerrainGrid.fromCells(3, [
            0, 0, 0,
            1, 1, 1,
            0, 0, 0,
        ]);

        expect(isConnected(grid, { x: 0, y: 0 }, { x: 2, y: 2 })).toBe(false);
    });
});

describe('terrain costs', () => {
    it('prices every class', () => {
        expect(costOf(CELL_CLEAR)).toBe(1);
        expect(costOf(CELL_SAND)).toBe(2);
        expect(costOf(CELL_ROCKS)).toBe(3);
        expect(costOf(CELL_OBSTACLE)).toBe(Infinity);
        expect(costOf(CELL_ROVER)).toBe(1);
        expect(costOf(CELL_GOAL)).toBe(1);
    });

    it('slows the rover on rough ground', () => {
        expect(speedFactorOf(CELL_CLEAR)).toBe(1.0);
        expect(speedFactorOf(CELL_SAND)).toBe(0.7);
        expect(speedFactorOf(CELL_ROCKS)).toBe(0.5);
        expect(speedFactorOf(CELL_GOAL)).toBe(1.0);
    });

    it('summarises visited terrain by name', () => {
        expect(terrainName(CELL_ROVER)).toBe('RoverMarker');
        expect(terrainDistribution([CELL_CLEAR, CELL_CLEAR, CELL_SAND, CELL_ROCKS])).toEqual({
            Clear: 0.5,
            Sand: 0.25,
            Rocks: 0.25,
        });
        expect(terrainDistribution([])).toEqual({});
    });
});
