export const CELL_CLEAR = 0;
export const CELL_OBSTACLE = 1;
export const CELL_ROVER = 2;
export const CELL_GOAL = 3;
export const CELL_SAND = 4;
export const CELL_ROCKS = 5;

export type TerrainCell =
    | typeof CELL_CLEAR
    | typeof CELL_OBSTACLE
    | typeof CELL_ROVER
    | typeof CELL_GOAL
    | typeof CELL_SAND
    | typeof CELL_ROCKS;

export type TerrainName = 'Clear' | 'Obstacle' | 'RoverMarker' | 'GoalMarker' | 'Sand' | 'Rocks';

export type GridData = Int8Array; // Flattened 1D array, index = y * size + x

export interface Coordinate {
    x: number;
    y: number;
}

export type MarkerKind = 'rover' | 'goal';

export type PathAlgorithm = 'A*' | 'Dijkstra' | 'EnergyEfficient';

export interface PathPlan {
    path: Coordinate[]; // start..goal inclusive
    totalCost: number;
    elapsedMs: number;
    algorithm: PathAlgorithm;
}

export interface PathResult {
    plan: PathPlan | null;
    totalCost: number; // Infinity when no path
    elapsedMs: number;
}

export type RoverStatus = 'Idle' | 'Moving' | 'ReachedGoal' | 'OutOfEnergy' | 'Stuck';

export type StepRefusal = 'terminal' | 'no-plan' | 'obstructed' | 'insufficient-energy';

export type StepOutcome =
    | { moved: true; position: Coordinate; cost: number; terrain: TerrainCell; speed: number }
    | { moved: false; reason: StepRefusal };

export interface RoverSnapshot {
    position: Coordinate;
    energy: number;
    status: RoverStatus;
    progress: number; // percent
    distance: number;
    speed: number;
}

export type TerrainDistribution = Partial<Record<TerrainName, number>>;

export interface MissionRecord {
    readonly mission_id: string;
    readonly start_time: string;
    readonly end_time: string;
    readonly success: boolean;
    readonly total_distance: number;
    readonly energy_consumed: number;
    readonly terrain_distribution: TerrainDistribution;
    readonly average_speed: number;
    readonly path: readonly Coordinate[];
}

export interface PerformanceMetrics {
    success_rate: number;
    avg_energy_per_step: number;
    avg_mission_distance: number;
    total_missions: number;
    longest_mission: number;
    most_efficient_mission?: string;
}
