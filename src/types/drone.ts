export type FlightMode =
  | 'Disarmed'
  | 'Armed'
  | 'Ascend'
  | 'Stabilizing'
  | 'Hover'
  | 'Circle'
  | 'Descending'
  | 'FinalApproach'
  | 'Landed'
  | 'MissionComplete'
  | 'Aborted';

/**
 * Simulated vehicle state. Created fresh for every mission run and mutated
 * in place by the controller and the phase executors.
 *
 * @interface DroneState
 */
export interface DroneState {
  // Position (feet, relative to the take-off point)
  x: number;
  y: number;
  /** Height above ground, never negative */
  z: number;

  // Velocity (ft/s)
  velocity_x: number;
  velocity_y: number;
  velocity_z: number;

  /** Integer 0-100 */
  battery_percent: number;
  /** Derived from battery_percent */
  battery_voltage: number;

  armed: boolean;
  flying: boolean;
  mode: FlightMode;

  current_command_id: number;
  /** 0-100, reaches 100 only on a successful mission */
  mission_progress_percent: number;
  flight_time_seconds: number;

  /** One entry per motor, °C */
  motor_temps: number[];
  signal_strength_percent: number;
  /** Zero on vehicles without satellite positioning */
  gps_satellites: number;
}
