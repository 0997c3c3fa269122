export * from './types';
export * from './errors';
export { createLogger, resolveLogLevel, type Logger, type LogLevel } from './logger';
export { RoverSimulation, type SimulationView, type TickResult } from './simulation';
export { costOf, speedFactorOf, terrainName, isPassable, terrainDistribution } from './utils/terrainCosts';
export { TerrainGrid, isConnected, sameCoordinate, type TerrainView } from './utils/terrainGrid';
export {
    generateTerrain,
    DEFAULT_GENERATOR_OPTIONS,
    type GeneratorOptions,
    type GeneratedTerrain,
    type TerrainThresholds,
} from './utils/generatorUtils';
export { Prng } from './utils/prng';
export { findPath, parseAlgorithm, pathCost, euclidean, PATH_ALGORITHMS } from './utils/pathPlanner';
export {
    Rover,
    isTerminal,
    type EfficiencyMetrics,
    type EmergencyStopReport,
    type PathStats,
    type RoverOptions,
} from './utils/rover';
export { MissionTelemetry, type MissionReport, type TelemetryOptions } from './utils/telemetry';
export { generateTerrainCSV, generateTerrainJSON, generateMissionJSON, type TerrainEndpoints } from './utils/exportUtils';
export { parseTerrainCSV, parseTerrainJSON, type ParsedTerrain } from './utils/terrainParser';
export {
    parseSimulationConfig,
    SimulationConfigSchema,
    MissionRecordSchema,
    MissionExportSchema,
    TerrainImportSchema,
    type SimulationConfig,
    type SimulationConfigInput,
} from './utils/validators';
