import { GenerationInvariantError } from '../errors';
import { createLogger } from '../logger';
import {
    CELL_CLEAR,
    CELL_OBSTACLE,
    CELL_ROCKS,
    CELL_SAND,
    type Coordinate,
    type TerrainCell,
} from '../types';
import { DEFAULT_NOISE, fractalNoise, type NoiseOptions } from './noise';
import { Prng, randomSeed } from './prng';
import { TerrainGrid, isConnected } from './terrainGrid';

const log = createLogger('generator');

export interface TerrainThresholds {
    clear: number;    // value < clear -> Clear
    sand: number;     // value < sand -> Sand
    rocks: number;    // value < rocks -> Rocks, otherwise Obstacle
}

export interface GeneratorOptions {
    seed?: number;
    thresholds: TerrainThresholds;
    noise: NoiseOptions;
    clearRadius: number;
    pathwaySandRatio: number;     // share of carved obstacles that become Sand
    obstacleThinning: number;     // share of remaining obstacles turned Clear
    guaranteeConnectivity: boolean;
}

export const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = {
    thresholds: { clear: 0.4, sand: 0.6, rocks: 0.85 },
    noise: DEFAULT_NOISE,
    clearRadius: 2,
    pathwaySandRatio: 0.3,
    obstacleThinning: 0.15,
    guaranteeConnectivity: true,
};

export interface GeneratedTerrain {
    grid: TerrainGrid;
    seed: number;
    start: Coordinate;
    goal: Coordinate;
    patched: boolean; // true when the connectivity fallback had to carve a corridor
}

export function generateTerrain(size: number, options: Partial<GeneratorOptions> = {}): GeneratedTerrain {
    const opts: GeneratorOptions = { ...DEFAULT_GENERATOR_OPTIONS, ...options };
    const seed = opts.seed ?? randomSeed();
    const rng = new Prng(seed);

    const grid = TerrainGrid.filled(size, CELL_CLEAR);
    const start: Coordinate = { x: 0, y: 0 };
    const goal: Coordinate = { x: size - 1, y: size - 1 };

    const field = fractalNoise(size, rng, opts.noise);
    for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
            grid.set({ x, y }, classify(field[y * size + x], opts.thresholds));
        }
    }

    carveCentralPathway(grid, rng, opts.pathwaySandRatio);
    clearArea(grid, start, opts.clearRadius);
    clearArea(grid, goal, opts.clearRadius);
    thinObstacles(grid, rng, opts.obstacleThinning);

    assertAccessible(grid, start, opts.clearRadius);
    assertAccessible(grid, goal, opts.clearRadius);

    let patched = false;
    if (opts.guaranteeConnectivity && !isConnected(grid, start, goal)) {
        carveDiagonal(grid);
        patched = true;
        log.info(`seed ${seed}: start and goal were disconnected, carved diagonal corridor`);
        if (!isConnected(grid, start, goal)) {
            throw new GenerationInvariantError(`seed ${seed}: goal unreachable after carving corridor`);
        }
    }

    log.debug(`generated ${size}x${size} terrain`, {
        seed,
        obstacles: grid.count(CELL_OBSTACLE),
        patched,
    });

    return { grid, seed, start, goal, patched };
}

export function classify(value: number, thresholds: TerrainThresholds): TerrainCell {
    if (value < thresholds.clear) return CELL_CLEAR;
    if (value < thresholds.sand) return CELL_SAND;
    if (value < thresholds.rocks) return CELL_ROCKS;
    return CELL_OBSTACLE;
}

/** Cross of rows and columns through the centre with obstacles turned into Clear (or Sand). */
export function pathwayBand(size: number): { from: number; to: number } {
    const width = Math.max(2, Math.floor(size / 8));
    const from = Math.max(0, Math.floor(size / 2) - Math.floor(width / 2));
    return { from, to: Math.min(size, from + width) };
}

function carveCentralPathway(grid: TerrainGrid, rng: Prng, sandRatio: number): void {
    const { from, to } = pathwayBand(grid.size);

    // Horizontal arm
    for (let y = from; y < to; y++) {
        for (let x = 0; x < grid.size; x++) {
            softenObstacle(grid, { x, y }, rng, sandRatio);
        }
    }
    // Vertical arm
    for (let x = from; x < to; x++) {
        for (let y = 0; y < grid.size; y++) {
            softenObstacle(grid, { x, y }, rng, sandRatio);
        }
    }
}

function softenObstacle(grid: TerrainGrid, coord: Coordinate, rng: Prng, sandRatio: number): void {
    if (grid.at(coord) !== CELL_OBSTACLE) return;
    grid.set(coord, rng.chance(sandRatio) ? CELL_SAND : CELL_CLEAR);
}

function clearArea(grid: TerrainGrid, center: Coordinate, radius: number): void {
    for (let y = center.y - radius; y <= center.y + radius; y++) {
        for (let x = center.x - radius; x <= center.x + radius; x++) {
            if (grid.inBounds({ x, y })) grid.set({ x, y }, CELL_CLEAR);
        }
    }
}

function thinObstacles(grid: TerrainGrid, rng: Prng, ratio: number): void {
    for (let y = 0; y < grid.size; y++) {
        for (let x = 0; x < grid.size; x++) {
            // Draw for every cell so the sequence does not depend on the terrain mix
            const roll = rng.next();
            if (roll < ratio && grid.at({ x, y }) === CELL_OBSTACLE) {
                grid.set({ x, y }, CELL_CLEAR);
            }
        }
    }
}

// Diagonal neighbours are adjacent under 8-connectivity, so this always links the corners
function carveDiagonal(grid: TerrainGrid): void {
    for (let i = 0; i < grid.size; i++) {
        if (grid.at({ x: i, y: i }) === CELL_OBSTACLE) grid.set({ x: i, y: i }, CELL_CLEAR);
    }
}

function assertAccessible(grid: TerrainGrid, center: Coordinate, radius: number): void {
    for (let y = center.y - radius; y <= center.y + radius; y++) {
        for (let x = center.x - radius; x <= center.x + radius; x++) {
            if (grid.inBounds({ x, y }) && grid.at({ x, y }) === CELL_OBSTACLE) {
                throw new GenerationInvariantError(`Obstacle left at (${x}, ${y}) near (${center.x}, ${center.y})`);
            }
        }
    }
}
