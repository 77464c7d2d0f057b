import { describe, expect, it } from 'vitest';
import { BUILT_IN_CHECKS, SafetyGate } from '../../../src/services/mission/SafetyGate';
import { createDroneState } from '../../../src/services/mission/droneState';
import type { DroneState } from '../../../src/types/drone';
import { testSafety, testVehicle } from '../../helpers/builders';

const stateWith = (overrides: Partial<DroneState>): DroneState => ({
  ...createDroneState(testVehicle(), { batteryPercent: 100, ambientMotorTempC: 25 }),
  ...overrides
});

describe('SafetyGate', () => {
  const params = testSafety({ emergency_land_battery_percent: 20, max_altitude_feet: 10, max_speed_fps: 4 });

  it('passes when every requested check passes', () => {
    const gate = new SafetyGate();
    const result = gate.check(['battery_level', 'altitude_hold', 'speed_limit'], stateWith({ z: 5 }), params);
    expect(result).toEqual({ ok: true });
  });

  it('fails battery_level below the emergency threshold', () => {
    const gate = new SafetyGate();
    const result = gate.check(['battery_level'], stateWith({ battery_percent: 15 }), params);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.violation.check_name).toBe('battery_level');
      expect(result.violation.reason).toBe('Battery too low (15% < 20%)');
      expect(result.violation.state_snapshot.battery_percent).toBe(15);
    }
  });

  it('passes battery_level exactly at the threshold', () => {
    const gate = new SafetyGate();
    expect(gate.check(['battery_level'], stateWith({ battery_percent: 20 }), params).ok).toBe(true);
  });

  it('fails altitude_hold above the ceiling', () => {
    const gate = new SafetyGate();
    const result = gate.check(['altitude_hold'], stateWith({ z: 12.5 }), params);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.violation.reason).toBe('Altitude limit exceeded (12.5ft > 10ft)');
    }
  });

  it('measures speed_limit on the horizontal plane only', () => {
    const gate = new SafetyGate();

    const climbing = gate.check(['speed_limit'], stateWith({ velocity_z: 100 }), params);
    expect(climbing.ok).toBe(true);

    const fast = gate.check(['speed_limit'], stateWith({ velocity_x: 3, velocity_y: 4 }), params);
    expect(fast.ok).toBe(false);
    if (!fast.ok) {
      expect(fast.violation.reason).toBe('Horizontal speed limit exceeded (5.00fps > 4fps)');
    }
  });

  it('reports the first failing check in the requested order', () => {
    const gate = new SafetyGate();
    const state = stateWith({ z: 12, battery_percent: 10 });

    const first = gate.check(['altitude_hold', 'battery_level'], state, params);
    const second = gate.check(['battery_level', 'altitude_hold'], state, params);

    expect(first.ok ? null : first.violation.check_name).toBe('altitude_hold');
    expect(second.ok ? null : second.violation.check_name).toBe('battery_level');
  });

  it('always passes the advisory checks', () => {
    const gate = new SafetyGate();
    const state = stateWith({ z: 1000, battery_percent: 0 });
    expect(gate.check(['position_stability', 'path_clear', 'landing_zone_clear'], state, params)).toEqual({ ok: true });
  });

  it('skips names it does not know', () => {
    const gate = new SafetyGate();
    expect(gate.has('obstacle_scan')).toBe(false);
    expect(gate.check(['obstacle_scan'], stateWith({}), params)).toEqual({ ok: true });
  });

  it('snapshots the state at the time of the violation', () => {
    const gate = new SafetyGate();
    const state = stateWith({ battery_percent: 10 });
    const result = gate.check(['battery_level'], state, params);

    state.battery_percent = 0;
    state.motor_temps[0] = 99;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.violation.state_snapshot.battery_percent).toBe(10);
      expect(result.violation.state_snapshot.motor_temps[0]).toBe(25);
    }
  });

  it('accepts extra and registered checks', () => {
    const gate = new SafetyGate({ tethered: state => (state.z > 3 ? 'Tether too short' : null) });
    gate.register('gps_lock', state => (state.gps_satellites < 6 ? 'No GPS lock' : null));

    expect(gate.getCheckNames()).toEqual([...Object.keys(BUILT_IN_CHECKS), 'tethered', 'gps_lock']);

    const result = gate.check(['tethered', 'gps_lock'], stateWith({ z: 1 }), params);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.violation.check_name).toBe('gps_lock');
      expect(result.violation.reason).toBe('No GPS lock');
    }
  });

  it('lets a registered check replace a built-in one', () => {
    const gate = new SafetyGate();
    gate.register('path_clear', () => 'Obstacle ahead');

    const result = gate.check(['path_clear'], stateWith({}), params);
    expect(result.ok ? null : result.violation.reason).toBe('Obstacle ahead');
  });
});
