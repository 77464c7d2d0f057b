/**
 * @fileoverview Simulation constants for the phase executors.
 *
 * Rates are either per tick or expressed as an interval in seconds that the
 * executors convert to a tick count for the mission's update rate.
 *
 * @module config/simulation
 */

export interface SimulationTuning {
  /** Battery percent lost on every climb tick */
  climbDrainPerTick: number;
  /** Seconds between 1% battery drops while holding */
  holdDrainIntervalSeconds: number;
  /** Seconds between 1% battery drops while circling */
  circleDrainIntervalSeconds: number;
  /** Seconds between 1% battery drops while descending */
  descentDrainIntervalSeconds: number;

  /** °C added to every motor per climb tick */
  climbHeatPerTick: number;
  /** °C added to every motor per circle tick */
  circleHeatPerTick: number;
  ambientMotorTempC: number;
  /** Motor temperatures never exceed this */
  motorTempCeilingC: number;
  /** °C shed by every motor at touchdown */
  landingCoolingC: number;

  /** Peak horizontal drift while holding without position hold, feet */
  holdDriftFeet: number;
  /** Drift multiplier applied when position hold is on */
  positionHoldFactor: number;

  /** Settling time before a smooth circle entry */
  circleEntrySeconds: number;

  precisionCenteringSteps: number;
  /** Fraction of the x/y offset kept after each centering step */
  precisionCenteringFactor: number;
  precisionCenteringIntervalMs: number;

  /** Signal strength lost at the geofence boundary */
  signalLossAtGeofencePercent: number;
}

export const DEFAULT_TUNING: Readonly<SimulationTuning> = Object.freeze({
  climbDrainPerTick: 1,
  holdDrainIntervalSeconds: 2,
  circleDrainIntervalSeconds: 1.5,
  descentDrainIntervalSeconds: 3,

  climbHeatPerTick: 0.5,
  circleHeatPerTick: 0.1,
  ambientMotorTempC: 25,
  motorTempCeilingC: 65,
  landingCoolingC: 5,

  holdDriftFeet: 1,
  positionHoldFactor: 0.1,

  circleEntrySeconds: 1,

  precisionCenteringSteps: 3,
  precisionCenteringFactor: 0.7,
  precisionCenteringIntervalMs: 1000,

  signalLossAtGeofencePercent: 40
});

// Satellite count reported by vehicles that have the `gps` capability
export const GPS_SATELLITES_WHEN_EQUIPPED = 12;

export const DEFAULT_MOTOR_COUNT = 4;

// Root directory holding missions/ and drones/ for the JSON config provider
export const MISSION_CONFIG_DIR = process.env.MISSION_CONFIG_DIR || './config';
