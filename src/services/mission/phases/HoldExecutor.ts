import type { HoldCommand } from '../../../types/mission';
import type { PhaseResult } from '../../../types/outcome';
import { createLogger } from '../../../utils/logger';
import { drainBattery } from '../droneState';
import { setMode } from '../flightModes';
import { PHASE_OK, type PhaseContext, type PhaseExecutor, completeTick, ticksFor } from './PhaseContext';

const log = createLogger('HoldExecutor');

// Angular rates of the simulated air-current drift, radians per second
const HORIZONTAL_DRIFT_RATE = 1;
const VERTICAL_DRIFT_RATE = 0.5;

/**
 * Holds position for a fixed duration.
 *
 * Air currents are modeled as a bounded sinusoidal drift around the anchor
 * point. Position hold shrinks the drift amplitude rather than removing it.
 * Vertical drift stays within half the altitude tolerance and never carries
 * the vehicle above the altitude ceiling. A vehicle still on the ground does
 * not drift.
 */
export class HoldExecutor implements PhaseExecutor<'Hold'> {
  readonly kind = 'Hold' as const;

  async execute(command: HoldCommand, ctx: PhaseContext): Promise<PhaseResult> {
    const {
      duration_seconds: duration,
      position_hold: positionHold,
      altitude_tolerance_feet: altitudeTolerance
    } = command.parameters;
    const { state, tuning } = ctx;
    const hz = ctx.telemetry.update_rate_hz;

    setMode(state, 'Hover');
    log.info(`Holding for ${duration}s (position hold: ${positionHold})`);

    const steps = Math.round(duration * hz);
    const drainInterval = ticksFor(tuning.holdDrainIntervalSeconds, ctx);
    const correction = positionHold ? tuning.positionHoldFactor : 1;
    const horizontalAmplitude = state.flying ? tuning.holdDriftFeet * correction : 0;
    const verticalAmplitude = state.flying ? altitudeTolerance * 0.5 * correction : 0;
    const anchor = { x: state.x, y: state.y, z: state.z };
    const ceiling = Math.max(anchor.z, ctx.safety.max_altitude_feet);

    for (let tick = 0; tick < steps; tick++) {
      const elapsed = (tick + 1) / hz;
      const x = anchor.x + horizontalAmplitude * Math.sin(elapsed * HORIZONTAL_DRIFT_RATE);
      const y = anchor.y + horizontalAmplitude * (Math.cos(elapsed * HORIZONTAL_DRIFT_RATE) - 1);
      const drifted = anchor.z + verticalAmplitude * Math.sin(elapsed * VERTICAL_DRIFT_RATE);
      const z = Math.min(ceiling, Math.max(0, drifted));

      state.velocity_x = (x - state.x) * hz;
      state.velocity_y = (y - state.y) * hz;
      state.velocity_z = (z - state.z) * hz;
      state.x = x;
      state.y = y;
      state.z = z;

      if (tick % drainInterval === 0) {
        drainBattery(state, 1);
      }

      const result = await completeTick(ctx, 'HOVER');
      if (!result.ok) {
        return result;
      }
    }

    state.velocity_x = 0;
    state.velocity_y = 0;
    state.velocity_z = 0;
    log.info('Hold complete');
    return PHASE_OK;
  }
}
