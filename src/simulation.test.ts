import { describe, it, expect } from 'vitest';
import { RoverSimulation, type TickResult } from './simulation';
import { RoverStateError, UnknownAlgorithmError } from './errors';
import { CELL_GOAL, CELL_ROVER } from './types';

function runToEnd(sim: RoverSimulation): TickResult {
    let result: TickResult = { kind: 'idle' };
    for (let i = 0; i < 1000; i++) {
        result = sim.tick();
        if (result.kind !== 'step') break;
    }
    return result;
}

describe('RoverSimulation', () => {
    it('places markers and plans a route on construction', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 7, initialEnergy: 500 });
        const view = sim.view();

        expect(view.seed).toBe(7);
        expect(view.start).toEqual({ x: 0, y: 0 });
        expect(view.goal).toEqual({ x: 9, y: 9 });
        expect(view.terrain.at(view.goal)).toBe(CELL_GOAL);
        expect(view.terrain.at(view.start)).toBe(CELL_ROVER);
        expect(view.plan).not.toBeNull();
        expect(view.rover.status).toBe('Idle');
        expect(view.running).toBe(false);
    });

    it('drives a mission to the goal and records it', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 7, initialEnergy: 500 });
        const plan = sim.view().plan;

        expect(sim.startStop()).toBe(true);
        expect(sim.view().missionId).toBe('mission-1');

        const result = runToEnd(sim);

        expect(result).toMatchObject({ kind: 'mission-ended', success: true });
        const view = sim.view();
        expect(view.rover.position).toEqual({ x: 9, y: 9 });
        expect(view.running).toBe(false);
        expect(view.missionId).toBeNull();
        expect(view.metrics.total_missions).toBe(1);
        expect(view.metrics.success_rate).toBe(100);

        const [record] = sim.telemetry.history;
        expect(record.mission_id).toBe('mission-1');
        expect(record.total_distance).toBe(plan?.path.length);
        expect(sim.startStop()).toBe(false);
    });

    it('does nothing while paused', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 3, initialEnergy: 500 });

        expect(sim.tick()).toEqual({ kind: 'idle' });

        sim.startStop();
        expect(sim.tick().kind).toBe('step');
        expect(sim.startStop()).toBe(false);
        expect(sim.tick()).toEqual({ kind: 'idle' });
        expect(sim.view().rover.distance).toBe(1);

        expect(sim.startStop()).toBe(true);
        expect(sim.view().missionId).toBe('mission-1');
    });

    it('ends the mission as a failure when energy runs out', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 4, initialEnergy: 1 });
        sim.startStop();

        expect(sim.tick().kind).toBe('step');
        const result = sim.tick();

        expect(result).toEqual({
            kind: 'mission-ended',
            outcome: { moved: false, reason: 'insufficient-energy' },
            success: false,
        });
        expect(sim.view().rover.status).toBe('OutOfEnergy');
        expect(sim.telemetry.history[0]).toMatchObject({
            success: false,
            total_distance: 1,
            energy_consumed: 1,
        });
    });

    it('closes an open mission and starts over on reset', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 3, initialEnergy: 500 });
        sim.startStop();
        sim.tick();

        sim.reset(8);

        const view = sim.view();
        expect(view.seed).toBe(8);
        expect(view.running).toBe(false);
        expect(view.missionId).toBeNull();
        expect(view.rover).toMatchObject({ energy: 500, status: 'Idle', position: { x: 0, y: 0 } });
        expect(view.plan).not.toBeNull();
        expect(sim.telemetry.history).toHaveLength(1);
        expect(sim.telemetry.history[0].success).toBe(false);
    });

    it('only replans while the rover is idle', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 3, initialEnergy: 500 });
        const before = sim.view().plan;
        sim.startStop();
        sim.tick();
        sim.startStop();

        expect(() => sim.planRoute()).toThrow(RoverStateError);
        expect(sim.view().plan).toEqual(before);
    });

    it('hands renderers a copy of the plan', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 7, initialEnergy: 500 });
        const shown = sim.view().plan;
        const length = shown?.path.length ?? 0;

        shown?.path.splice(1);
        if (shown) shown.path[0].x = 5;

        expect(sim.view().plan?.path).toHaveLength(length);
        expect(sim.view().plan?.path[0]).toEqual({ x: 0, y: 0 });
        sim.startStop();
        expect(runToEnd(sim)).toMatchObject({ kind: 'mission-ended', success: true });
    });

    it('accepts the spaced energy-efficient label', () => {
        const sim = new RoverSimulation({ gridSize: 10, seed: 1, algorithm: 'Energy Efficient' });

        expect(sim.algorithm).toBe('EnergyEfficient');
        expect(sim.view().plan?.algorithm).toBe('EnergyEfficient');
    });

    it('rejects unknown algorithms and invalid settings', () => {
        expect(() => new RoverSimulation({ algorithm: 'Greedy' })).toThrow(UnknownAlgorithmError);
        expect(() => new RoverSimulation({ gridSize: 5 })).toThrow();
    });
});
