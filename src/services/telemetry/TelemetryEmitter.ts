/**
 * @fileoverview Snapshot formatter and dispatcher.
 *
 * @module telemetry/TelemetryEmitter
 */

import type { DroneState } from '../../types/drone';
import type { TelemetryConfig } from '../../types/mission';
import type { TelemetrySink, TelemetrySnapshot } from '../../types/telemetry';
import { SeededJitter } from '../../utils/jitter';
import { averageOf, formatSnapshot, speedMagnitude } from '../../utils/format';
import { createLogger } from '../../utils/logger';
import { horizontalDistanceFromHome } from '../mission/droneState';

const log = createLogger('TelemetryEmitter');

export interface TelemetryEmitterOptions {
  telemetryConfig: TelemetryConfig;
  geofenceRadiusFeet: number;
  /** Signal strength lost at the geofence boundary */
  signalLossAtGeofencePercent: number;
  sinks: TelemetrySink[];
  /** Optional cosmetic noise on the signal strength */
  jitter?: SeededJitter;
}

/**
 * Turns the live drone state into {@link TelemetrySnapshot}s.
 *
 * The emitter has no timer of its own: it is called once per tick by the
 * phase executors, which makes the tick loop the only rate limit. Every call
 * is counted and tracked; snapshots reach the sinks only when
 * `real_time_display` is enabled.
 *
 * @class TelemetryEmitter
 */
export class TelemetryEmitter {
  private config: TelemetryConfig;
  private geofenceRadiusFeet: number;
  private signalLossAtGeofencePercent: number;
  private sinks: TelemetrySink[];
  private jitter: SeededJitter | undefined;

  private sequence = 0;
  private forwarded = 0;
  private distanceFlown = 0;
  private lastSnapshot: TelemetrySnapshot | null = null;

  constructor(options: TelemetryEmitterOptions) {
    this.config = options.telemetryConfig;
    this.geofenceRadiusFeet = options.geofenceRadiusFeet;
    this.signalLossAtGeofencePercent = options.signalLossAtGeofencePercent;
    this.sinks = [...options.sinks];
    this.jitter = options.jitter;
  }

  /**
   * Refreshes the derived signal strength, records a snapshot and dispatches it.
   *
   * @param state - Live state; only `signal_strength_percent` is written
   * @param phaseLabel - Short label shown with the snapshot, e.g. 'DESCENT'
   */
  emit(state: DroneState, phaseLabel: string): TelemetrySnapshot {
    state.signal_strength_percent = this.signalStrengthFor(state);

    this.sequence++;
    const snapshot: TelemetrySnapshot = {
      sequence: this.sequence,
      elapsed_seconds: state.flight_time_seconds,
      phase: phaseLabel,
      mode: state.mode,
      command_id: state.current_command_id,
      position: { x: state.x, y: state.y, z: state.z },
      speed_fps: speedMagnitude(state),
      battery_percent: state.battery_percent,
      battery_voltage: state.battery_voltage,
      signal_strength_percent: state.signal_strength_percent,
      avg_motor_temp_c: averageOf(state.motor_temps),
      mission_progress_percent: state.mission_progress_percent
    };

    if (this.lastSnapshot) {
      const previous = this.lastSnapshot.position;
      this.distanceFlown += Math.sqrt(
        (snapshot.position.x - previous.x) ** 2 +
        (snapshot.position.y - previous.y) ** 2 +
        (snapshot.position.z - previous.z) ** 2
      );
    }
    this.lastSnapshot = snapshot;

    if (this.config.logging_enabled) {
      log.debug(formatSnapshot(snapshot));
    }

    if (this.config.real_time_display) {
      this.dispatch(snapshot);
    }

    return snapshot;
  }

  /**
   * Deterministic signal model: full strength at home, dropping linearly to
   * `100 - signalLossAtGeofencePercent` at the geofence radius.
   */
  signalStrengthFor(state: DroneState): number {
    const ratio = this.geofenceRadiusFeet > 0
      ? Math.min(1, horizontalDistanceFromHome(state) / this.geofenceRadiusFeet)
      : 0;
    const base = 100 - Math.round(this.signalLossAtGeofencePercent * ratio);
    const noisy = this.jitter ? Math.round(base + this.jitter.offset()) : base;
    return Math.min(100, Math.max(0, noisy));
  }

  getSnapshotCount(): number {
    return this.sequence;
  }

  /** Snapshots handed to the sinks */
  getForwardedCount(): number {
    return this.forwarded;
  }

  getLastSnapshot(): TelemetrySnapshot | null {
    return this.lastSnapshot;
  }

  /** Path length between consecutive snapshots, feet */
  getDistanceFlown(): number {
    return this.distanceFlown;
  }

  private dispatch(snapshot: TelemetrySnapshot): void {
    this.forwarded++;
    this.sinks.forEach(sink => {
      try {
        sink.accept(snapshot);
      } catch (e) {
        log.error(`Telemetry sink failed on snapshot ${snapshot.sequence}: ${e instanceof Error ? e.message : String(e)}`);
      }
    });
  }
}
