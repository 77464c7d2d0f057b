/**
 * @fileoverview Named safety checks evaluated before and during each command.
 *
 * @module mission/SafetyGate
 */

import type { DroneState } from '../../types/drone';
import type { SafetyParameters } from '../../types/mission';
import type { SafetyResult } from '../../types/outcome';
import { cloneDroneState } from './droneState';

/**
 * Outcome of a single check: `null` when it passes, otherwise the reason.
 *
 * @callback SafetyCheck
 */
export type SafetyCheck = (state: DroneState, params: SafetyParameters) => string | null;

const advisory: SafetyCheck = () => null;

/**
 * Built-in checks. `position_stability`, `path_clear` and `landing_zone_clear`
 * always pass in simulation; a sensor-backed gate registers real ones.
 */
export const BUILT_IN_CHECKS: Readonly<Record<string, SafetyCheck>> = {
  battery_level: (state, params) =>
    state.battery_percent < params.emergency_land_battery_percent
      ? `Battery too low (${state.battery_percent}% < ${params.emergency_land_battery_percent}%)`
      : null,
  altitude_hold: (state, params) =>
    state.z > params.max_altitude_feet
      ? `Altitude limit exceeded (${state.z.toFixed(1)}ft > ${params.max_altitude_feet}ft)`
      : null,
  speed_limit: (state, params) => {
    const horizontal = Math.sqrt(state.velocity_x ** 2 + state.velocity_y ** 2);
    return horizontal > params.max_speed_fps
      ? `Horizontal speed limit exceeded (${horizontal.toFixed(2)}fps > ${params.max_speed_fps}fps)`
      : null;
  },
  position_stability: advisory,
  path_clear: advisory,
  landing_zone_clear: advisory
};

/**
 * Evaluates named safety checks against the current state.
 *
 * Checks run in the order requested and the first failure wins; there is no
 * retry. Names the gate does not know are skipped here, the pre-flight check
 * rejects them before a mission starts.
 *
 * @class SafetyGate
 *
 * @example
 * ```typescript
 * const gate = new SafetyGate();
 * const result = gate.check(['battery_level', 'altitude_hold'], state, params);
 * if (!result.ok) {
 *   console.warn(result.violation.reason);
 * }
 * ```
 */
export class SafetyGate {
  private checks: Map<string, SafetyCheck>;

  constructor(extraChecks: Record<string, SafetyCheck> = {}) {
    this.checks = new Map(Object.entries({ ...BUILT_IN_CHECKS, ...extraChecks }));
  }

  /**
   * Adds or replaces a named check.
   */
  register(name: string, check: SafetyCheck): void {
    this.checks.set(name, check);
  }

  has(name: string): boolean {
    return this.checks.has(name);
  }

  getCheckNames(): string[] {
    return Array.from(this.checks.keys());
  }

  check(names: string[], state: DroneState, params: SafetyParameters): SafetyResult {
    for (const name of names) {
      const check = this.checks.get(name);
      if (!check) {
        continue;
      }

      const reason = check(state, params);
      if (reason !== null) {
        return {
          ok: false,
          violation: {
            check_name: name,
            reason,
            state_snapshot: cloneDroneState(state)
          }
        };
      }
    }
    return { ok: true };
  }
}
