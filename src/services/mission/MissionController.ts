/**
 * @fileoverview Mission orchestration: pre-flight, sequential phase
 * execution, progress tracking and the terminal outcome.
 *
 * @module mission/MissionController
 */

import type { DroneState } from '../../types/drone';
import type { CommandSpec, MissionDefinition, VehicleProfile } from '../../types/mission';
import type {
  AbortedOutcome,
  MissionOutcome,
  MissionProgressCallback,
  MissionProgressEvent,
  MissionReport,
  PhaseResult,
  SafetyViolation
} from '../../types/outcome';
import type { TelemetrySink } from '../../types/telemetry';
import { DEFAULT_TUNING, type SimulationTuning } from '../../config/simulation';
import { SystemClock, type MissionClock } from '../../utils/clock';
import { SeededJitter } from '../../utils/jitter';
import { createLogger } from '../../utils/logger';
import type { ConfigProvider } from '../config/ConfigProvider';
import { TelemetryEmitter } from '../telemetry/TelemetryEmitter';
import { cloneDroneState, createDroneState } from './droneState';
import { ConfigInvalidError, PreflightFailedError, UnsupportedCommandKindError } from './errors';
import { setMode } from './flightModes';
import { findConfigurationError, runPreflightChecks, type OperatingEnvironment } from './PreflightCheck';
import { SafetyGate } from './SafetyGate';
import {
  AscendExecutor,
  CircularPathExecutor,
  DescendAndLandExecutor,
  HoldExecutor,
  type PhaseContext
} from './phases';

const log = createLogger('MissionController');

/**
 * Configuration for a {@link MissionController}. Passed once at construction;
 * the controller holds no other configuration.
 *
 * @interface MissionControllerOptions
 */
export interface MissionControllerOptions {
  /** Source for `run(missionId, vehicleId)`; `execute()` does not need one */
  configProvider?: ConfigProvider;
  /** Receivers of real-time telemetry (default: none) */
  sinks?: TelemetrySink[];
  /** Time source for tick delays (default: SystemClock) */
  clock?: MissionClock;
  /** Safety check registry (default: built-in checks only) */
  safetyGate?: SafetyGate;
  /** Overrides for the simulation constants */
  tuning?: Partial<SimulationTuning>;
  /** Battery charge at the start of each run (default: 100) */
  initialBatteryPercent?: number;
  /** Wind measured at the site, checked against the mission limit (default: 0) */
  windSpeedMph?: number;
  /** Where the mission is flown, checked against the mission's environment rating */
  operatingEnvironment?: OperatingEnvironment;
  /** Seeded cosmetic noise on signal strength (default: off) */
  jitter?: { seed: number; amplitudePercent: number };
  /** Pause between two commands, no telemetry is emitted during it (default: 500) */
  interCommandPauseMs?: number;
}

const DEFAULT_OPTIONS = {
  initialBatteryPercent: 100,
  windSpeedMph: 0,
  interCommandPauseMs: 500
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
};

/**
 * Runs missions against a simulated vehicle.
 *
 * One run at a time: the controller owns the run's {@link DroneState} and is
 * its only mutator. Every failure is reported in the returned
 * {@link MissionOutcome}; nothing is retried.
 *
 * @class MissionController
 *
 * @example
 * ```typescript
 * const controller = new MissionController({
 *   configProvider: new JsonFileConfigProvider('./config'),
 *   sinks: [new ConsoleTelemetrySink()]
 * });
 *
 * const outcome = await controller.run('cetus-lite-demo', 'cetus-lite');
 * if (outcome.status === 'aborted') {
 *   console.warn(`Aborted by ${outcome.reason}`);
 * }
 * ```
 */
export class MissionController {
  private configProvider: ConfigProvider | undefined;
  private sinks: TelemetrySink[];
  private clock: MissionClock;
  private gate: SafetyGate;
  private tuning: SimulationTuning;
  private initialBatteryPercent: number;
  private windSpeedMph: number;
  private operatingEnvironment: OperatingEnvironment | undefined;
  private jitter: { seed: number; amplitudePercent: number } | undefined;
  private interCommandPauseMs: number;

  private ascend = new AscendExecutor();
  private hold = new HoldExecutor();
  private circularPath = new CircularPathExecutor();
  private descendAndLand = new DescendAndLandExecutor();

  private running = false;
  private state: DroneState | null = null;
  private progressCallbacks: Set<MissionProgressCallback> = new Set();

  constructor(options: MissionControllerOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    this.configProvider = opts.configProvider;
    this.sinks = opts.sinks ? [...opts.sinks] : [];
    this.clock = opts.clock ?? new SystemClock();
    this.gate = opts.safetyGate ?? new SafetyGate();
    this.tuning = { ...DEFAULT_TUNING, ...opts.tuning };
    this.initialBatteryPercent = opts.initialBatteryPercent;
    this.windSpeedMph = opts.windSpeedMph;
    this.operatingEnvironment = opts.operatingEnvironment;
    this.jitter = opts.jitter;
    this.interCommandPauseMs = opts.interCommandPauseMs;
  }

  /**
   * Loads the mission and vehicle through the config provider, then executes.
   * Configuration errors become a `config_invalid` outcome.
   *
   * @throws {Error} If no config provider was configured, or the provider
   *   fails for a reason other than invalid configuration (e.g. I/O)
   */
  async run(missionId: string, vehicleId: string): Promise<MissionOutcome> {
    if (!this.configProvider) {
      throw new Error('No config provider configured; use execute() with loaded definitions');
    }

    let mission: MissionDefinition;
    let vehicle: VehicleProfile;
    try {
      mission = await this.configProvider.loadMission(missionId);
      vehicle = await this.configProvider.loadVehicle(vehicleId);
    } catch (error) {
      if (error instanceof ConfigInvalidError || error instanceof UnsupportedCommandKindError) {
        log.error(error.message);
        return { status: 'config_invalid', error };
      }
      throw error;
    }

    return this.execute(mission, vehicle);
  }

  /**
   * Executes a loaded mission on a fresh simulated vehicle.
   *
   * @throws {Error} If another mission is already running on this controller
   */
  async execute(mission: MissionDefinition, vehicle: VehicleProfile): Promise<MissionOutcome> {
    if (this.running) {
      throw new Error('A mission is already running on this controller');
    }

    this.running = true;
    try {
      return await this.executeMission(mission, vehicle);
    } finally {
      this.running = false;
      this.state = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Copy of the live state of the running mission, or null between runs.
   */
  getCurrentState(): DroneState | null {
    return this.state ? cloneDroneState(this.state) : null;
  }

  onProgress(callback: MissionProgressCallback): void {
    this.progressCallbacks.add(callback);
  }

  removeProgressCallback(callback: MissionProgressCallback): void {
    this.progressCallbacks.delete(callback);
  }

  private async executeMission(mission: MissionDefinition, vehicle: VehicleProfile): Promise<MissionOutcome> {
    const details = mission.mission;
    const safety = details.safety_parameters;

    const configurationError = findConfigurationError(mission);
    if (configurationError) {
      log.error(configurationError.message);
      return { status: 'config_invalid', error: configurationError };
    }

    const state = createDroneState(vehicle, {
      batteryPercent: this.initialBatteryPercent,
      ambientMotorTempC: this.tuning.ambientMotorTempC
    });

    log.info(`Pre-flight checks for "${details.name}" on ${vehicle.model}`);
    const failures = runPreflightChecks(mission, vehicle, state, this.gate, {
      windSpeedMph: this.windSpeedMph,
      operatingEnvironment: this.operatingEnvironment
    });
    if (failures.length > 0) {
      failures.forEach(failure => log.error(`Pre-flight: ${failure}`));
      return { status: 'preflight_failed', error: new PreflightFailedError(failures) };
    }

    this.state = state;
    const emitter = new TelemetryEmitter({
      telemetryConfig: mission.telemetry_config,
      geofenceRadiusFeet: safety.geofence_radius_feet,
      signalLossAtGeofencePercent: this.tuning.signalLossAtGeofencePercent,
      sinks: this.sinks,
      jitter: this.jitter ? new SeededJitter(this.jitter.seed, this.jitter.amplitudePercent) : undefined
    });

    state.armed = true;
    setMode(state, 'Armed');
    const missionStartMs = this.clock.now();
    const total = mission.commands.length;
    let completed = 0;

    const report = (): MissionReport => ({
      mission_name: details.name,
      vehicle_model: vehicle.model,
      total_time_seconds: state.flight_time_seconds,
      final_battery_percent: state.battery_percent,
      final_battery_voltage: state.battery_voltage,
      distance_flown_feet: emitter.getDistanceFlown(),
      snapshots_emitted: emitter.getSnapshotCount(),
      commands_completed: completed
    });

    log.info(`Mission "${details.name}" started: ${total} commands at ${mission.telemetry_config.update_rate_hz}Hz`);
    this.notifyProgress({ type: 'mission_started', mission_name: details.name, total_commands: total });

    for (let index = 0; index < total; index++) {
      const command = mission.commands[index];
      state.current_command_id = command.id;
      state.mission_progress_percent = Math.floor((index / total) * 100);

      log.info(`Command ${command.id}/${total} ${command.kind}: ${command.description}`);
      this.notifyProgress({
        type: 'command_started',
        command_id: command.id,
        index,
        progress_percent: state.mission_progress_percent
      });

      const guard = () => this.gate.check(command.safety_checks, state, safety);

      const preCheck = guard();
      if (!preCheck.ok) {
        return this.abort(state, preCheck.violation, missionStartMs, report);
      }

      const ctx: PhaseContext = {
        state,
        safety,
        telemetry: mission.telemetry_config,
        tuning: this.tuning,
        clock: this.clock,
        emitter,
        missionStartMs,
        guard
      };

      const result = await this.dispatch(command, ctx);
      if (!result.ok) {
        return this.abort(state, result.violation, missionStartMs, report);
      }

      completed++;
      this.notifyProgress({ type: 'command_completed', command_id: command.id, index });

      if (index < total - 1 && this.interCommandPauseMs > 0) {
        await this.clock.sleep(this.interCommandPauseMs);
      }
    }

    state.flight_time_seconds = (this.clock.now() - missionStartMs) / 1000;
    state.mission_progress_percent = 100;
    state.armed = false;
    state.flying = false;
    setMode(state, 'MissionComplete');

    log.info(
      `Mission complete in ${state.flight_time_seconds.toFixed(1)}s, battery ${state.battery_percent}% ` +
      `(${state.battery_voltage.toFixed(2)}V), ${emitter.getDistanceFlown().toFixed(1)}ft flown`
    );
    this.notifyProgress({ type: 'mission_completed', total_time_seconds: state.flight_time_seconds });

    return { status: 'success', final_state: cloneDroneState(state), report: report() };
  }

  private dispatch(command: CommandSpec, ctx: PhaseContext): Promise<PhaseResult> {
    switch (command.kind) {
      case 'Ascend':
        return this.ascend.execute(command, ctx);
      case 'Hold':
        return this.hold.execute(command, ctx);
      case 'CircularPath':
        return this.circularPath.execute(command, ctx);
      case 'DescendAndLand':
        return this.descendAndLand.execute(command, ctx);
      default:
        return assertNever(command);
    }
  }

  private abort(
    state: DroneState,
    violation: SafetyViolation,
    missionStartMs: number,
    report: () => MissionReport
  ): AbortedOutcome {
    state.flight_time_seconds = (this.clock.now() - missionStartMs) / 1000;
    setMode(state, 'Aborted');
    state.armed = false;

    log.error(`SAFETY ABORT on command ${state.current_command_id}: ${violation.reason}`);
    this.notifyProgress({
      type: 'mission_aborted',
      command_id: state.current_command_id,
      reason: violation.check_name
    });

    return {
      status: 'aborted',
      reason: violation.check_name,
      violation,
      final_state: cloneDroneState(state),
      report: report()
    };
  }

  private notifyProgress(event: MissionProgressEvent): void {
    this.progressCallbacks.forEach(callback => {
      try {
        callback(event);
      } catch (e) {
        log.error(`Error in progress callback: ${e instanceof Error ? e.message : String(e)}`);
      }
    });
  }
}
