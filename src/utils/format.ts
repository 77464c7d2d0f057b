import type { DroneState } from '../types/drone';
import type { TelemetrySnapshot } from '../types/telemetry';
import {
  type UnitSystem,
  convertDistance,
  convertSpeed,
  convertTemperature,
  getDistanceUnit,
  getSpeedUnit,
  getTemperatureUnit
} from './unitConversions';

export const speedMagnitude = (state: Pick<DroneState, 'velocity_x' | 'velocity_y' | 'velocity_z'>): number =>
  Math.sqrt(state.velocity_x ** 2 + state.velocity_y ** 2 + state.velocity_z ** 2);

export const averageOf = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Renders a snapshot as a single console line.
 *
 * @example
 * ```typescript
 * formatSnapshot(snapshot);
 * // [CLIMB] T:0.1s | Pos:(0.00, 0.00, 0.20)ft | Vel:2.0fps | Bat:99% (4.19V) | Sig:100% | Temp:77.9°F
 * ```
 */
export const formatSnapshot = (snapshot: TelemetrySnapshot, system: UnitSystem = 'imperial'): string => {
  const { x, y, z } = snapshot.position;
  const distance = (feet: number) => convertDistance(feet, system).toFixed(2);
  const position = `(${distance(x)}, ${distance(y)}, ${distance(z)})${getDistanceUnit(system)}`;
  const speed = `${convertSpeed(snapshot.speed_fps, system).toFixed(1)}${getSpeedUnit(system)}`;
  const battery = `${snapshot.battery_percent}% (${snapshot.battery_voltage.toFixed(2)}V)`;
  const temperature = `${convertTemperature(snapshot.avg_motor_temp_c, system).toFixed(1)}${getTemperatureUnit(system)}`;

  return `[${snapshot.phase}] T:${snapshot.elapsed_seconds.toFixed(1)}s | Pos:${position} | Vel:${speed} | Bat:${battery} | Sig:${snapshot.signal_strength_percent}% | Temp:${temperature}`;
};

/**
 * Multi-line human readable status block for a drone state.
 */
export const formatStatusReport = (state: DroneState): string => {
  const position = `(${state.x.toFixed(2)}, ${state.y.toFixed(2)}, ${state.z.toFixed(2)})`;
  const temps = state.motor_temps.map(temp => temp.toFixed(1)).join(', ');

  return [
    'DRONE STATUS REPORT',
    `Position: ${position} ft (X, Y, Z)`,
    `Velocity: ${speedMagnitude(state).toFixed(1)} fps`,
    `Battery: ${state.battery_percent}% (${state.battery_voltage.toFixed(2)}V)`,
    `Flight Time: ${state.flight_time_seconds.toFixed(1)}s`,
    `Mode: ${state.mode}`,
    `Command: ${state.current_command_id}`,
    `Progress: ${state.mission_progress_percent}%`,
    `Motor Temps: ${temps}°C`,
    `Signal: ${state.signal_strength_percent}%`,
    `Flying: ${state.flying}`,
    `Armed: ${state.armed}`
  ].join('\n');
};
