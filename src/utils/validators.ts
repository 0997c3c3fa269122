import { z } from 'zod';

export const CoordinateSchema = z.object({
    x: z.number().int().nonnegative(),
    y: z.number().int().nonnegative(),
});

const TerrainNameSchema = z.enum(['Clear', 'Obstacle', 'RoverMarker', 'GoalMarker', 'Sand', 'Rocks']);

export const MissionRecordSchema = z.object({
    mission_id: z.string().min(1),
    start_time: z.string(),
    end_time: z.string(),
    success: z.boolean(),
    total_distance: z.number().int().nonnegative(),
    energy_consumed: z.number().nonnegative(),
    terrain_distribution: z.record(TerrainNameSchema, z.number().min(0).max(1)),
    average_speed: z.number().nonnegative(),
    path: z.array(CoordinateSchema),
});

export const MissionExportSchema = z.array(MissionRecordSchema);

export const TerrainImportSchema = z.object({
    size: z.number().int().min(2).max(2000), // Safety cap
    cells: z.array(z.number().int()),
    start: CoordinateSchema.optional(),
    goal: CoordinateSchema.optional(),
});

export const SimulationConfigSchema = z.object({
    gridSize: z.number().int().min(10).max(200).default(20),
    initialEnergy: z.number().positive().finite().default(100),
    algorithm: z.string().default('A*'),
    seed: z.number().int().optional(),
    tickIntervalMs: z.number().int().positive().default(500),
    guaranteeConnectivity: z.boolean().default(true),
});

export type MissionRecordImport = z.infer<typeof MissionRecordSchema>;
export type TerrainImportType = z.infer<typeof TerrainImportSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type SimulationConfig = z.output<typeof SimulationConfigSchema>;

export function parseSimulationConfig(input: unknown = {}): SimulationConfig {
    return SimulationConfigSchema.parse(input);
}
