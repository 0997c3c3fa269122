import { RoverStateError } from '../errors';
import { createLogger } from '../logger';
import {
    CELL_OBSTACLE,
    type Coordinate,
    type PathPlan,
    type RoverSnapshot,
    type RoverStatus,
    type StepOutcome,
    type TerrainCell,
    type TerrainDistribution,
} from '../types';
import { costOf, speedFactorOf, terrainDistribution } from './terrainCosts';
import type { TerrainGrid, TerrainView } from './terrainGrid';

const log = createLogger('rover');

const TERMINAL_STATUSES: ReadonlySet<RoverStatus> = new Set<RoverStatus>(['ReachedGoal', 'OutOfEnergy', 'Stuck']);

export function isTerminal(status: RoverStatus): boolean {
    return TERMINAL_STATUSES.has(status);
}

export interface EfficiencyMetrics {
    energyPerStep: number;
    progressRate: number;     // 0..1
    averageSpeed: number;
    terrainDistribution: TerrainDistribution;
}

export interface PathStats {
    totalLength: number;
    completed: number;
    remaining: number;
    estimatedTime: number;
}

export interface EmergencyStopReport {
    position: Coordinate;
    energyRemaining: number;
    pathProgress: number;     // 0..1
    finalStatus: RoverStatus;
}

export interface RoverOptions {
    home?: Coordinate;
    movementSpeed?: number;
}

export class Rover {
    readonly initialEnergy: number;
    readonly home: Coordinate;
    private readonly baseSpeed: number;

    private _energy: number;
    private _position: Coordinate;
    private _status: RoverStatus = 'Idle';
    private _speed: number;
    private plan: PathPlan | null = null;
    private pathIndex = 0;
    private distance = 0;
    private visited: TerrainCell[] = [];

    constructor(initialEnergy: number, options: RoverOptions = {}) {
        if (!Number.isFinite(initialEnergy) || initialEnergy <= 0) {
            throw new RangeError(`Initial energy must be a positive number, got ${initialEnergy}`);
        }
        this.initialEnergy = initialEnergy;
        this.home = { ...(options.home ?? { x: 0, y: 0 }) };
        this.baseSpeed = options.movementSpeed ?? 1.0;

        this._energy = initialEnergy;
        this._position = { ...this.home };
        this._speed = this.baseSpeed;
    }

    get energy(): number {
        return this._energy;
    }

    get position(): Coordinate {
        return { ...this._position };
    }

    get status(): RoverStatus {
        return this._status;
    }

    get speed(): number {
        return this._speed;
    }

    get currentPlan(): PathPlan | null {
        return this.plan;
    }

    get progressIndex(): number {
        return this.pathIndex;
    }

    /** Terrain classes entered so far, oldest first. */
    get history(): readonly TerrainCell[] {
        return this.visited;
    }

    /**
     * Hands the rover a new plan and rewinds to its first waypoint. Plans
     * start at the rover's own cell, so the first step stays in place and
     * pays for that cell.
     */
    assignPath(plan: PathPlan): void {
        this.assertIdle('assign a path');
        this.plan = plan;
        this.pathIndex = 0;
    }

    /** Drops the current plan, e.g. after replanning found no route. */
    clearPath(): void {
        this.assertIdle('clear the path');
        this.plan = null;
        this.pathIndex = 0;
    }

    /** Advances one cell along the plan, reading costs from the live grid. */
    step(grid: TerrainGrid): StepOutcome {
        if (isTerminal(this._status)) return { moved: false, reason: 'terminal' };
        if (!this.plan || this.pathIndex >= this.plan.path.length) return { moved: false, reason: 'no-plan' };

        const next = this.plan.path[this.pathIndex];
        const terrain = grid.at(next);

        if (terrain === CELL_OBSTACLE) {
            this.transition('Stuck', `obstacle at (${next.x}, ${next.y})`);
            return { moved: false, reason: 'obstructed' };
        }

        const cost = costOf(terrain);
        if (this._energy < cost) {
            this.transition('OutOfEnergy', `needs ${cost}, has ${this._energy}`);
            return { moved: false, reason: 'insufficient-energy' };
        }

        grid.overlay('rover', next);
        this._position = { x: next.x, y: next.y };
        this._energy -= cost;
        this.pathIndex++;
        this.visited.push(terrain);
        this.distance++;
        this._speed = speedFactorOf(terrain);
        this._status = 'Moving';

        if (this.pathIndex >= this.plan.path.length) {
            this.transition('ReachedGoal', `at (${next.x}, ${next.y})`);
        }

        return { moved: true, position: this.position, cost, terrain, speed: this._speed };
    }

    reset(): void {
        this._energy = this.initialEnergy;
        this._position = { ...this.home };
        this._status = 'Idle';
        this._speed = this.baseSpeed;
        this.plan = null;
        this.pathIndex = 0;
        this.distance = 0;
        this.visited = [];
    }

    /** Halts a moving rover; it can be stepped again afterwards. */
    emergencyStop(): EmergencyStopReport {
        if (this._status === 'Moving') this._status = 'Idle';
        return {
            position: this.position,
            energyRemaining: this._energy,
            pathProgress: this.plan && this.plan.path.length > 0 ? this.pathIndex / this.plan.path.length : 0,
            finalStatus: this._status,
        };
    }

    snapshot(): RoverSnapshot {
        return {
            position: this.position,
            energy: this._energy,
            status: this._status,
            progress: this.plan && this.plan.path.length > 0 ? (this.pathIndex / this.plan.path.length) * 100 : 0,
            distance: this.distance,
            speed: this._speed,
        };
    }

    efficiencyMetrics(): EfficiencyMetrics | null {
        if (!this.plan) return null;

        const steps = this.visited.length;
        const speedSum = this.visited.reduce<number>((sum, cell) => sum + speedFactorOf(cell), 0);
        return {
            energyPerStep: (this.initialEnergy - this._energy) / Math.max(1, steps),
            progressRate: this.plan.path.length > 0 ? this.pathIndex / this.plan.path.length : 0,
            averageSpeed: steps > 0 ? speedSum / steps : 0,
            terrainDistribution: terrainDistribution(this.visited),
        };
    }

    /** Energy check against current terrain; terrain can still change afterwards. */
    canCompletePath(view: TerrainView): boolean {
        const remaining = this.remainingPath();
        if (remaining.length === 0) return true;

        const required = remaining.reduce((sum, coord) => sum + view.costAt(coord), 0);
        return this._energy >= required;
    }

    estimatedRemainingSteps(): number {
        return this.remainingPath().length;
    }

    estimateCompletionTime(): number {
        const remaining = this.estimatedRemainingSteps();
        return remaining === 0 ? 0 : remaining / this._speed;
    }

    pathStats(): PathStats | null {
        if (!this.plan) return null;
        return {
            totalLength: this.plan.path.length,
            completed: this.pathIndex,
            remaining: this.plan.path.length - this.pathIndex,
            estimatedTime: this.estimateCompletionTime(),
        };
    }

    isNearObstacle(view: TerrainView): boolean {
        for (let dy = -1; dy <= 1; dy++) {
            for (let dx = -1; dx <= 1; dx++) {
                const coord = { x: this._position.x + dx, y: this._position.y + dy };
                if (view.inBounds(coord) && view.at(coord) === CELL_OBSTACLE) return true;
            }
        }
        return false;
    }

    private remainingPath(): Coordinate[] {
        if (!this.plan) return [];
        return this.plan.path.slice(this.pathIndex);
    }

    private assertIdle(action: string): void {
        if (this._status !== 'Idle') {
            throw new RoverStateError(`Cannot ${action} while ${this._status}`);
        }
    }

    private transition(status: RoverStatus, detail: string): void {
        this._status = status;
        log.info(`${status}: ${detail}`);
    }
}
