/**
 * @fileoverview Construction and resource bookkeeping for {@link DroneState}.
 *
 * @module mission/droneState
 */

import type { DroneState } from '../../types/drone';
import type { VehicleProfile } from '../../types/mission';
import { DEFAULT_MOTOR_COUNT, GPS_SATELLITES_WHEN_EQUIPPED } from '../../config/simulation';

export const batteryVoltage = (percent: number): number => 3.0 + (percent / 100) * 1.2;

/**
 * Number of motors declared in the vehicle specifications, or the quadcopter default.
 */
export const motorCountOf = (vehicle: VehicleProfile): number => {
  const declared = vehicle.specifications['motor_count'];
  return typeof declared === 'number' && Number.isInteger(declared) && declared > 0
    ? declared
    : DEFAULT_MOTOR_COUNT;
};

export interface DroneStateInit {
  batteryPercent: number;
  ambientMotorTempC: number;
}

/**
 * Fresh, disarmed state for one mission run.
 */
export const createDroneState = (vehicle: VehicleProfile, init: DroneStateInit): DroneState => {
  const battery = clampBattery(init.batteryPercent);
  return {
    x: 0,
    y: 0,
    z: 0,
    velocity_x: 0,
    velocity_y: 0,
    velocity_z: 0,
    battery_percent: battery,
    battery_voltage: batteryVoltage(battery),
    armed: false,
    flying: false,
    mode: 'Disarmed',
    current_command_id: 0,
    mission_progress_percent: 0,
    flight_time_seconds: 0,
    motor_temps: new Array<number>(motorCountOf(vehicle)).fill(init.ambientMotorTempC),
    signal_strength_percent: 100,
    gps_satellites: vehicle.capabilities['gps'] === true ? GPS_SATELLITES_WHEN_EQUIPPED : 0
  };
};

export const cloneDroneState = (state: DroneState): DroneState => ({
  ...state,
  motor_temps: [...state.motor_temps]
});

function clampBattery(percent: number): number {
  return Math.min(100, Math.max(0, Math.round(percent)));
}

/**
 * Lowers the battery by `amount` percent, never below zero, and refreshes the voltage.
 */
export const drainBattery = (state: DroneState, amount: number): void => {
  state.battery_percent = clampBattery(state.battery_percent - Math.max(0, amount));
  state.battery_voltage = batteryVoltage(state.battery_percent);
};

// Absorbs float error so that e.g. ten drains of 0.1 add up to one percent
const DRAIN_EPSILON = 1e-9;

/**
 * Collects fractional drain amounts and takes whole percents off the
 * battery once they add up.
 *
 * @example
 * ```typescript
 * const drain = new DrainAccumulator();
 * drain.add(state, 0.5); // battery unchanged
 * drain.add(state, 0.5); // battery down 1%
 * ```
 */
export class DrainAccumulator {
  private pending = 0;

  add(state: DroneState, amount: number): void {
    this.pending += Math.max(0, amount);
    const whole = Math.floor(this.pending + DRAIN_EPSILON);
    if (whole > 0) {
      drainBattery(state, whole);
      this.pending = Math.max(0, this.pending - whole);
    }
  }

  getPending(): number {
    return this.pending;
  }
}

export const heatMotors = (state: DroneState, delta: number, ceilingC: number): void => {
  state.motor_temps = state.motor_temps.map(temp => Math.min(ceilingC, temp + delta));
};

/**
 * Motor cooling only happens once the vehicle is on the ground.
 */
export const coolMotors = (state: DroneState, delta: number, ambientC: number): void => {
  if (state.flying) {
    return;
  }
  state.motor_temps = state.motor_temps.map(temp => Math.max(ambientC, temp - delta));
};

export const horizontalDistanceFromHome = (state: DroneState): number =>
  Math.sqrt(state.x ** 2 + state.y ** 2);
