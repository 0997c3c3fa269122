import { RoverStateError } from './errors';
import { createLogger } from './logger';
import type {
    Coordinate,
    PathAlgorithm,
    PathPlan,
    PathResult,
    PerformanceMetrics,
    RoverSnapshot,
    StepOutcome,
} from './types';
import { generateTerrain, type GeneratedTerrain } from './utils/generatorUtils';
import { findPath, parseAlgorithm } from './utils/pathPlanner';
import { Rover, isTerminal } from './utils/rover';
import { MissionTelemetry } from './utils/telemetry';
import type { TerrainGrid, TerrainView } from './utils/terrainGrid';
import { parseSimulationConfig, type SimulationConfig } from './utils/validators';

const log = createLogger('simulation');

/** Read-only pull model for renderers and shells. */
export interface SimulationView {
    terrain: TerrainView;
    seed: number;
    start: Coordinate;
    goal: Coordinate;
    plan: PathPlan | null;
    rover: RoverSnapshot;
    running: boolean;
    missionId: string | null;
    metrics: PerformanceMetrics;
}

export type TickResult =
    | { kind: 'idle' }
    | { kind: 'step'; outcome: StepOutcome }
    | { kind: 'mission-ended'; outcome: StepOutcome; success: boolean };

/**
 * Wires terrain, planner, rover and telemetry together. The caller owns the
 * cadence: it calls tick() on whatever timer it runs (`config.tickIntervalMs`
 * is the suggested period).
 */
export class RoverSimulation {
    readonly config: SimulationConfig;
    readonly algorithm: PathAlgorithm;
    readonly telemetry: MissionTelemetry;

    private grid: TerrainGrid;
    private seed: number;
    private start: Coordinate;
    private goal: Coordinate;
    private readonly rover: Rover;
    private plan: PathPlan | null = null;
    private running = false;
    private missionCount = 0;

    constructor(config: unknown = {}, telemetry: MissionTelemetry = new MissionTelemetry()) {
        this.config = parseSimulationConfig(config);
        this.algorithm = parseAlgorithm(this.config.algorithm);
        this.telemetry = telemetry;
        this.rover = new Rover(this.config.initialEnergy);

        const terrain = this.generate(this.config.seed);
        this.grid = terrain.grid;
        this.seed = terrain.seed;
        this.start = terrain.start;
        this.goal = terrain.goal;
        this.planRoute();
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Plans from the rover's position to the goal. Only possible while the
     * rover is Idle; a moving or finished rover needs reset() first.
     */
    planRoute(): PathResult {
        if (this.rover.status !== 'Idle') {
            throw new RoverStateError(`Cannot replan while the rover is ${this.rover.status}`);
        }
        const result = findPath(this.grid.view(), this.rover.position, this.goal, this.algorithm);
        this.plan = result.plan;
        if (result.plan) {
            this.rover.assignPath(result.plan);
            log.info(`path found with ${this.algorithm}`, {
                cost: result.totalCost,
                length: result.plan.path.length,
                ms: result.elapsedMs,
            });
        } else {
            this.rover.clearPath();
            log.warn(`no path found with ${this.algorithm} (seed ${this.seed})`);
        }
        return result;
    }

    /** Toggles the running flag. Returns the new state. */
    startStop(): boolean {
        if (this.running) {
            this.running = false;
            return false;
        }
        if (!this.plan || isTerminal(this.rover.status)) {
            log.warn('cannot start: no valid path to follow');
            return false;
        }
        if (this.rover.status === 'Idle' && this.telemetry.activeMissionId === null) {
            this.missionCount++;
            this.telemetry.startMission(`mission-${this.missionCount}`, this.rover.initialEnergy);
        }
        this.running = true;
        return true;
    }

    tick(): TickResult {
        if (!this.running) return { kind: 'idle' };

        const outcome = this.rover.step(this.grid);
        if (outcome.moved) {
            this.telemetry.recordStep(outcome.position, this.rover.energy, outcome.terrain, outcome.speed);
        }

        if (isTerminal(this.rover.status)) {
            const success = this.rover.status === 'ReachedGoal';
            this.running = false;
            this.telemetry.endMission(success);
            return { kind: 'mission-ended', outcome, success };
        }
        return { kind: 'step', outcome };
    }

    /** Fresh terrain (random unless a seed is given), fresh rover, new plan. */
    reset(seed?: number): void {
        this.running = false;
        if (this.telemetry.activeMissionId !== null) {
            this.telemetry.endMission(false);
        }
        this.rover.reset();

        const terrain = this.generate(seed);
        this.grid = terrain.grid;
        this.seed = terrain.seed;
        this.start = terrain.start;
        this.goal = terrain.goal;
        this.planRoute();
    }

    view(): SimulationView {
        return {
            terrain: this.grid.view(),
            seed: this.seed,
            start: { ...this.start },
            goal: { ...this.goal },
            plan: this.plan && { ...this.plan, path: this.plan.path.map((c) => ({ ...c })) },
            rover: this.rover.snapshot(),
            running: this.running,
            missionId: this.telemetry.activeMissionId,
            metrics: this.telemetry.performanceMetrics(),
        };
    }

    private generate(seed: number | undefined): GeneratedTerrain {
        const terrain = generateTerrain(this.config.gridSize, {
            seed,
            guaranteeConnectivity: this.config.guaranteeConnectivity,
        });
        terrain.grid.overlay('goal', terrain.goal);
        terrain.grid.overlay('rover', this.rover.position);
        return terrain;
    }
}
