/**
 * @fileoverview Type definitions for mission and vehicle configuration.
 * Field names follow the mission/drone JSON files, so the parsed documents
 * can be used directly without a mapping layer.
 *
 * @module types/mission
 */

/**
 * Safety thresholds that apply to the whole mission.
 * Every phase consults these; they never change during a run.
 *
 * @interface SafetyParameters
 */
export interface SafetyParameters {
  /** Altitude ceiling in feet */
  max_altitude_feet: number;
  /** Horizontal speed limit in ft/s */
  max_speed_fps: number;
  /** Battery percentage below which the mission must not continue */
  emergency_land_battery_percent: number;
  /** Nominal operating radius in feet (advisory) */
  geofence_radius_feet: number;
  /** Highest tolerable wind speed in mph */
  max_wind_speed_mph: number;
}

/**
 * Where the mission may be flown.
 *
 * @interface EnvironmentRequirements
 */
export interface EnvironmentRequirements {
  indoor_safe: boolean;
  outdoor_capable: boolean;
  /** Free-form description, e.g. "10ft x 10ft clear area" */
  recommended_space: string;
}

export interface MissionDetails {
  name: string;
  description: string;
  /** Vehicle model this mission was written for */
  drone_model: string;
  /** Informational, never enforced */
  duration_estimate_seconds: number;
  safety_parameters: SafetyParameters;
  environment: EnvironmentRequirements;
}

/**
 * Telemetry output settings.
 *
 * @interface TelemetryConfig
 */
export interface TelemetryConfig {
  /** Tick rate of every phase loop; must be greater than zero */
  update_rate_hz: number;
  /** Data point names the operator is interested in (informational) */
  data_points: string[];
  /** Log every snapshot at debug level */
  logging_enabled: boolean;
  /** Forward snapshots to the telemetry sinks */
  real_time_display: boolean;
}

/**
 * Closed set of command kinds. Dispatch sites switch exhaustively over it.
 */
export type CommandKind = 'Ascend' | 'Hold' | 'CircularPath' | 'DescendAndLand';

export const COMMAND_KINDS: readonly CommandKind[] = ['Ascend', 'Hold', 'CircularPath', 'DescendAndLand'];

export interface AscendParameters {
  target_altitude_feet: number;
  climb_rate_fps: number;
  stabilization_time_seconds: number;
}

export interface HoldParameters {
  duration_seconds: number;
  position_hold: boolean;
  altitude_tolerance_feet: number;
}

export type CircleDirection = 'clockwise' | 'counterclockwise';

export interface CircularPathParameters {
  radius_feet: number;
  speed_fps: number;
  /** Altitude flown on the circle; when absent the current altitude is kept */
  altitude_feet?: number;
  direction: CircleDirection;
  num_revolutions: number;
  smooth_entry: boolean;
}

export interface DescendAndLandParameters {
  descent_rate_fps: number;
  precision_landing: boolean;
  final_approach_height_feet: number;
  touchdown_speed_fps: number;
}

interface CommandBase {
  /** Unique, defines execution order */
  id: number;
  description: string;
  /** Informational, never enforced */
  expected_duration_seconds: number;
  /** Safety check ids evaluated before and during the command */
  safety_checks: string[];
}

export interface AscendCommand extends CommandBase {
  kind: 'Ascend';
  parameters: AscendParameters;
}

export interface HoldCommand extends CommandBase {
  kind: 'Hold';
  parameters: HoldParameters;
}

export interface CircularPathCommand extends CommandBase {
  kind: 'CircularPath';
  parameters: CircularPathParameters;
}

export interface DescendAndLandCommand extends CommandBase {
  kind: 'DescendAndLand';
  parameters: DescendAndLandParameters;
}

export type CommandSpec = AscendCommand | HoldCommand | CircularPathCommand | DescendAndLandCommand;

/**
 * Narrows {@link CommandSpec} to the variant of kind `K`.
 */
export type CommandOf<K extends CommandKind> = Extract<CommandSpec, { kind: K }>;

/**
 * A complete mission document.
 *
 * @interface MissionDefinition
 */
export interface MissionDefinition {
  mission: MissionDetails;
  commands: CommandSpec[];
  telemetry_config: TelemetryConfig;
}

/**
 * Vehicle description. Used for display and context only, never physics.
 *
 * @interface VehicleProfile
 */
export interface VehicleProfile {
  model: string;
  manufacturer: string;
  type: string;
  category: string;
  /** Loosely typed bag: weight_grams, flight_time_minutes, motor_count, ... */
  specifications: Record<string, unknown>;
  /** Feature flags such as `gps` or `obstacle_avoidance` */
  capabilities: Record<string, boolean>;
  video_system?: Record<string, unknown>;
  /** Telemetry streams the airframe offers, e.g. `{ battery: true }` */
  telemetry?: Record<string, boolean>;
  control_characteristics?: Record<string, string>;
  flight_modes?: Array<Record<string, unknown>>;
  performance_limits?: Record<string, unknown>;
  recommended_use?: Record<string, string>;
}
