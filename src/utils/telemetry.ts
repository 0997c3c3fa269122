import { RoverStateError } from '../errors';
import { createLogger } from '../logger';
import type {
    Coordinate,
    MissionRecord,
    PerformanceMetrics,
    TerrainCell,
} from '../types';
import { generateMissionJSON } from './exportUtils';
import { terrainDistribution } from './terrainCosts';
import { MissionExportSchema } from './validators';

const log = createLogger('telemetry');

export const DEFAULT_INITIAL_ENERGY = 100;

interface StepObservation {
    position: Coordinate;
    energy: number;
    terrain: TerrainCell;
    speed: number;
}

interface ActiveMission {
    id: string;
    initialEnergy: number;
    startedAt: Date;
    steps: StepObservation[];
}

export interface MissionReport {
    total_missions: number;
    success_rate: number;
    average_energy_consumption: number;
    average_distance: number;
    mission_history: readonly MissionRecord[];
}

export interface TelemetryOptions {
    clock?: () => Date;
}

/**
 * Per-step log of the active mission plus the session's append-only mission
 * history. One instance per session, passed to whoever records or reports.
 */
export class MissionTelemetry {
    private readonly clock: () => Date;
    private active: ActiveMission | null = null;
    private records: MissionRecord[] = [];

    constructor(options: TelemetryOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
    }

    get activeMissionId(): string | null {
        return this.active?.id ?? null;
    }

    get history(): readonly MissionRecord[] {
        return this.records;
    }

    /** Opens a new mission, discarding any unfinished one. */
    startMission(id: string, initialEnergy: number = DEFAULT_INITIAL_ENERGY): void {
        if (this.active) {
            log.warn(`mission ${this.active.id} replaced before it ended`);
        }
        this.active = { id, initialEnergy, startedAt: this.clock(), steps: [] };
        log.debug(`mission ${id} started`);
    }

    /** Call exactly once for every rover step that actually moved. */
    recordStep(position: Coordinate, energy: number, terrain: TerrainCell, speed: number): void {
        if (!this.active) {
            throw new RoverStateError('recordStep called with no mission in progress');
        }
        this.active.steps.push({
            position: { x: position.x, y: position.y },
            energy,
            terrain,
            speed,
        });
    }

    /** Energy after each recorded step of the active mission. */
    energyTrace(): number[] {
        return this.active ? this.active.steps.map((s) => s.energy) : [];
    }

    endMission(success: boolean): MissionRecord | null {
        const mission = this.active;
        this.active = null;
        if (!mission || mission.steps.length === 0) return null;

        const steps = mission.steps;
        const lowestEnergy = Math.min(...steps.map((s) => s.energy));
        const record: MissionRecord = Object.freeze({
            mission_id: mission.id,
            start_time: mission.startedAt.toISOString(),
            end_time: this.clock().toISOString(),
            success,
            total_distance: steps.length,
            energy_consumed: Math.max(0, mission.initialEnergy - lowestEnergy),
            terrain_distribution: terrainDistribution(steps.map((s) => s.terrain)),
            average_speed: steps.reduce((sum, s) => sum + s.speed, 0) / steps.length,
            path: steps.map((s) => s.position),
        });

        this.records.push(record);
        log.info(`mission ${record.mission_id} ended`, { success, distance: record.total_distance });
        return record;
    }

    performanceMetrics(): PerformanceMetrics {
        if (this.records.length === 0) {
            return {
                success_rate: 0,
                avg_energy_per_step: 0,
                avg_mission_distance: 0,
                total_missions: 0,
                longest_mission: 0,
            };
        }

        const count = this.records.length;
        // Zero-distance missions count as one step so they do not divide by zero
        const energyPerStep = this.records.map((r) => r.energy_consumed / (r.total_distance === 0 ? 1 : r.total_distance));

        let mostEfficient = 0;
        for (let i = 1; i < energyPerStep.length; i++) {
            if (energyPerStep[i] < energyPerStep[mostEfficient]) mostEfficient = i;
        }

        return {
            success_rate: (this.records.filter((r) => r.success).length / count) * 100,
            avg_energy_per_step: mean(energyPerStep),
            avg_mission_distance: mean(this.records.map((r) => r.total_distance)),
            total_missions: count,
            longest_mission: Math.max(...this.records.map((r) => r.total_distance)),
            most_efficient_mission: this.records[mostEfficient].mission_id,
        };
    }

    missionReport(): MissionReport | null {
        if (this.records.length === 0) return null;

        return {
            total_missions: this.records.length,
            success_rate: (this.records.filter((r) => r.success).length / this.records.length) * 100,
            average_energy_consumption: mean(this.records.map((r) => r.energy_consumed)),
            average_distance: mean(this.records.map((r) => r.total_distance)),
            mission_history: this.records,
        };
    }

    exportMissions(): string {
        return generateMissionJSON(this.records);
    }

    /** Replaces the history with the records in `json`. */
    importMissions(json: string): readonly MissionRecord[] {
        const parsed = MissionExportSchema.parse(JSON.parse(json));
        this.records = parsed.map((record) => Object.freeze(record));
        log.debug(`loaded ${this.records.length} missions`);
        return this.records;
    }
}

function mean(values: number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}
