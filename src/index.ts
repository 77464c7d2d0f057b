/**
 * @fileoverview Public entry point of the mission engine.
 *
 * @module mission-engine
 */

export * from './services/mission';
export * from './services/config';
export * from './services/telemetry';

export type * from './types/mission';
export type * from './types/drone';
export type * from './types/telemetry';
export type * from './types/outcome';
export { COMMAND_KINDS } from './types/mission';

export { DEFAULT_TUNING } from './config/simulation';
export type { SimulationTuning } from './config/simulation';
export { SystemClock, VirtualClock } from './utils/clock';
export type { MissionClock } from './utils/clock';
export { formatSnapshot, formatStatusReport } from './utils/format';
export { createLogger, logger } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';
export type { UnitSystem } from './utils/unitConversions';
