/**
 * @fileoverview Result types returned by the safety gate, the phase
 * executors and the mission controller.
 *
 * @module types/outcome
 */

import type { DroneState } from './drone';
import type { ConfigInvalidError, PreflightFailedError, UnsupportedCommandKindError } from '../services/mission/errors';

/**
 * A failed safety check, with the state it was evaluated against.
 *
 * @interface SafetyViolation
 */
export interface SafetyViolation {
  check_name: string;
  reason: string;
  state_snapshot: DroneState;
}

export type SafetyResult = { ok: true } | { ok: false; violation: SafetyViolation };

/**
 * Result of one phase executor run. Phases never throw to abort.
 */
export type PhaseResult = SafetyResult;

/**
 * Summary of a mission run.
 *
 * @interface MissionReport
 */
export interface MissionReport {
  mission_name: string;
  vehicle_model: string;
  total_time_seconds: number;
  final_battery_percent: number;
  final_battery_voltage: number;
  /** Path length accumulated from emitted snapshots, feet */
  distance_flown_feet: number;
  snapshots_emitted: number;
  commands_completed: number;
}

export interface SuccessOutcome {
  status: 'success';
  final_state: DroneState;
  report: MissionReport;
}

export interface AbortedOutcome {
  status: 'aborted';
  /** Name of the failed safety check */
  reason: string;
  violation: SafetyViolation;
  final_state: DroneState;
  report: MissionReport;
}

export interface PreflightFailedOutcome {
  status: 'preflight_failed';
  /** Carries the human-readable failed check items */
  error: PreflightFailedError;
}

export interface ConfigInvalidOutcome {
  status: 'config_invalid';
  error: ConfigInvalidError | UnsupportedCommandKindError;
}

export type MissionOutcome = SuccessOutcome | AbortedOutcome | PreflightFailedOutcome | ConfigInvalidOutcome;

export type MissionProgressEvent =
  | { type: 'mission_started'; mission_name: string; total_commands: number }
  | { type: 'command_started'; command_id: number; index: number; progress_percent: number }
  | { type: 'command_completed'; command_id: number; index: number }
  | { type: 'mission_aborted'; command_id: number; reason: string }
  | { type: 'mission_completed'; total_time_seconds: number };

/**
 * Callback invoked for every mission progress event.
 *
 * @callback MissionProgressCallback
 */
export type MissionProgressCallback = (event: MissionProgressEvent) => void;
