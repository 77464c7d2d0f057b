/**
 * @fileoverview Telemetry snapshot and sink types.
 *
 * @module types/telemetry
 */

import type { FlightMode } from './drone';

/**
 * A single formatted state report, produced once per tick.
 *
 * @interface TelemetrySnapshot
 */
export interface TelemetrySnapshot {
  /** 1-based emission counter for the mission run */
  sequence: number;
  elapsed_seconds: number;
  /** Phase label, e.g. 'CLIMB' or 'CIRCLE (50%)' */
  phase: string;
  mode: FlightMode;
  command_id: number;
  position: { x: number; y: number; z: number };
  /** Magnitude of the 3D velocity vector, ft/s */
  speed_fps: number;
  battery_percent: number;
  battery_voltage: number;
  signal_strength_percent: number;
  avg_motor_temp_c: number;
  mission_progress_percent: number;
}

/**
 * Side-effecting consumer of snapshots (console, log file, network publisher).
 * Snapshots arrive in non-decreasing elapsed time order.
 *
 * @interface TelemetrySink
 */
export interface TelemetrySink {
  accept(snapshot: TelemetrySnapshot): void;
}
