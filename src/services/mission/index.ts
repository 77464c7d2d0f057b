export { MissionController } from './MissionController';
export type { MissionControllerOptions } from './MissionController';
export { SafetyGate, BUILT_IN_CHECKS } from './SafetyGate';
export type { SafetyCheck } from './SafetyGate';
export { findCommandOrderIssue, findConfigurationError, runPreflightChecks } from './PreflightCheck';
export type { OperatingEnvironment, PreflightConditions } from './PreflightCheck';
export { canTransition, isTerminalMode } from './flightModes';
export { ConfigInvalidError, MissionEngineError, PreflightFailedError, UnsupportedCommandKindError } from './errors';
export type { MissionErrorKind } from './errors';
export * from './phases';
