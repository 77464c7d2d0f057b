/**
 * @fileoverview Pre-flight validation, run before any state transition.
 *
 * @module mission/PreflightCheck
 */

import type { DroneState } from '../../types/drone';
import { COMMAND_KINDS, type CommandKind, type CommandSpec, type MissionDefinition, type VehicleProfile } from '../../types/mission';
import { createLogger } from '../../utils/logger';
import { ConfigInvalidError, UnsupportedCommandKindError } from './errors';
import { findIllegalCommand } from './flightModes';
import type { SafetyGate } from './SafetyGate';

const log = createLogger('PreflightCheck');

export type OperatingEnvironment = 'indoor' | 'outdoor';

export interface PreflightConditions {
  /** Measured wind at the site, mph */
  windSpeedMph: number;
  /** Where the mission is about to be flown, when known */
  operatingEnvironment?: OperatingEnvironment;
}

const isCommandKind = (value: string): value is CommandKind =>
  COMMAND_KINDS.some(kind => kind === value);

/**
 * Returns the first id ordering problem, or null. Ids define execution order
 * and must ascend by exactly one.
 */
export const findCommandOrderIssue = (ids: number[]): string | null => {
  for (let index = 0; index < ids.length; index++) {
    const id = ids[index];
    if (!Number.isInteger(id)) {
      return `command id ${id} is not an integer`;
    }
    if (index > 0 && id !== ids[index - 1] + 1) {
      return `command ids must ascend without gaps: ${ids[index - 1]} is followed by ${id}`;
    }
  }
  return null;
};

/**
 * Fail-fast structural validation run before anything else: every command
 * kind must be supported and ids must be ordered. Missions parsed by the
 * config layer already satisfy both; this catches definitions built in code.
 */
export const findConfigurationError = (
  mission: MissionDefinition
): ConfigInvalidError | UnsupportedCommandKindError | null => {
  for (const command of mission.commands) {
    const kind: string = command.kind;
    if (!isCommandKind(kind)) {
      return new UnsupportedCommandKindError(command.id, kind);
    }
  }

  const orderIssue = findCommandOrderIssue(mission.commands.map(command => command.id));
  if (orderIssue) {
    return new ConfigInvalidError(`mission "${mission.mission.name}"`, [orderIssue]);
  }
  return null;
};

const positive = (value: number): boolean => Number.isFinite(value) && value > 0;
const nonNegative = (value: number): boolean => Number.isFinite(value) && value >= 0;

function checkParameters(command: CommandSpec, mission: MissionDefinition): string[] {
  const limits = mission.mission.safety_parameters;
  const label = `Command ${command.id} (${command.kind})`;
  const failures: string[] = [];

  switch (command.kind) {
    case 'Ascend': {
      const p = command.parameters;
      if (!nonNegative(p.target_altitude_feet)) failures.push(`${label}: target altitude must be >= 0`);
      if (!positive(p.climb_rate_fps)) failures.push(`${label}: climb rate must be > 0`);
      if (!nonNegative(p.stabilization_time_seconds)) failures.push(`${label}: stabilization time must be >= 0`);
      if (p.target_altitude_feet > limits.max_altitude_feet) {
        failures.push(`${label}: target altitude ${p.target_altitude_feet}ft exceeds max altitude ${limits.max_altitude_feet}ft`);
      }
      break;
    }
    case 'Hold': {
      const p = command.parameters;
      if (!nonNegative(p.duration_seconds)) failures.push(`${label}: duration must be >= 0`);
      if (!nonNegative(p.altitude_tolerance_feet)) failures.push(`${label}: altitude tolerance must be >= 0`);
      break;
    }
    case 'CircularPath': {
      const p = command.parameters;
      if (!positive(p.radius_feet)) failures.push(`${label}: radius must be > 0`);
      if (!positive(p.speed_fps)) failures.push(`${label}: speed must be > 0`);
      if (!positive(p.num_revolutions)) failures.push(`${label}: revolutions must be > 0`);
      if (p.altitude_feet !== undefined && !nonNegative(p.altitude_feet)) {
        failures.push(`${label}: altitude must be >= 0`);
      }
      if (p.altitude_feet !== undefined && p.altitude_feet > limits.max_altitude_feet) {
        failures.push(`${label}: altitude ${p.altitude_feet}ft exceeds max altitude ${limits.max_altitude_feet}ft`);
      }
      if (p.speed_fps > limits.max_speed_fps) {
        failures.push(`${label}: speed ${p.speed_fps}fps exceeds max speed ${limits.max_speed_fps}fps`);
      }
      break;
    }
    case 'DescendAndLand': {
      const p = command.parameters;
      if (!positive(p.descent_rate_fps)) failures.push(`${label}: descent rate must be > 0`);
      if (!positive(p.touchdown_speed_fps)) failures.push(`${label}: touchdown speed must be > 0`);
      if (!nonNegative(p.final_approach_height_feet)) failures.push(`${label}: final approach height must be >= 0`);
      break;
    }
  }

  return failures;
}

/**
 * Runs every pre-flight item and returns the failures; an empty list means
 * the vehicle is ready. Nothing is mutated.
 */
export const runPreflightChecks = (
  mission: MissionDefinition,
  vehicle: VehicleProfile,
  state: DroneState,
  gate: SafetyGate,
  conditions: PreflightConditions
): string[] => {
  const failures: string[] = [];
  const details = mission.mission;
  const limits = details.safety_parameters;

  // Battery
  if (state.battery_percent <= 0) {
    failures.push('Battery not present or fully depleted');
  } else if (state.battery_percent < limits.emergency_land_battery_percent) {
    failures.push(`Battery ${state.battery_percent}% is below the emergency landing threshold ${limits.emergency_land_battery_percent}%`);
  }

  // Configuration
  if (!positive(mission.telemetry_config.update_rate_hz)) {
    failures.push(`Telemetry update rate must be > 0 (got ${mission.telemetry_config.update_rate_hz})`);
  }
  if (!positive(limits.max_altitude_feet)) failures.push('Max altitude must be > 0');
  if (!positive(limits.max_speed_fps)) failures.push('Max speed must be > 0');
  if (!positive(limits.geofence_radius_feet)) failures.push('Geofence radius must be > 0');
  if (!nonNegative(limits.max_wind_speed_mph)) failures.push('Max wind speed must be >= 0');
  if (!(limits.emergency_land_battery_percent >= 0 && limits.emergency_land_battery_percent <= 100)) {
    failures.push('Emergency landing battery threshold must be within 0-100%');
  }

  // Commands
  if (mission.commands.length === 0) {
    failures.push('Mission has no commands');
  }

  mission.commands.forEach(command => {
    command.safety_checks
      .filter(name => !gate.has(name))
      .forEach(name => failures.push(`Command ${command.id}: unknown safety check "${name}"`));

    failures.push(...checkParameters(command, mission));
  });

  const illegal = findIllegalCommand(mission.commands.map(command => command.kind));
  if (illegal >= 0) {
    const command = mission.commands[illegal];
    failures.push(`Command ${command.id} (${command.kind}) cannot follow the previous command`);
  }

  // Environment
  if (conditions.windSpeedMph > limits.max_wind_speed_mph) {
    failures.push(`Wind ${conditions.windSpeedMph}mph exceeds the limit of ${limits.max_wind_speed_mph}mph`);
  }
  if (conditions.operatingEnvironment === 'indoor' && !details.environment.indoor_safe) {
    failures.push('Mission is not rated for indoor flight');
  }
  if (conditions.operatingEnvironment === 'outdoor' && !details.environment.outdoor_capable) {
    failures.push('Mission is not rated for outdoor flight');
  }

  if (vehicle.model !== details.drone_model) {
    log.warn(`Mission "${details.name}" targets ${details.drone_model}, running on ${vehicle.model}`);
  }

  return failures;
};
