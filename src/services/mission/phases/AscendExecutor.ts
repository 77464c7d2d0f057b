import type { AscendCommand } from '../../../types/mission';
import type { PhaseResult } from '../../../types/outcome';
import { createLogger } from '../../../utils/logger';
import { DrainAccumulator, heatMotors } from '../droneState';
import { setMode } from '../flightModes';
import { PHASE_OK, type PhaseContext, type PhaseExecutor, completeTick } from './PhaseContext';

const log = createLogger('AscendExecutor');

/**
 * Linear climb to the target altitude followed by a stabilization hold.
 *
 * The ramp takes `ceil(climb / climb_rate * rate_hz)` ticks and lands exactly
 * on the target on its last tick. Battery drains and motors heat on every
 * climb tick; stabilization ticks cost nothing.
 */
export class AscendExecutor implements PhaseExecutor<'Ascend'> {
  readonly kind = 'Ascend' as const;

  async execute(command: AscendCommand, ctx: PhaseContext): Promise<PhaseResult> {
    const {
      target_altitude_feet: target,
      climb_rate_fps: climbRate,
      stabilization_time_seconds: stabilizationTime
    } = command.parameters;
    const { state, tuning } = ctx;

    state.flying = true;
    state.velocity_x = 0;
    state.velocity_y = 0;
    setMode(state, 'Ascend');

    const startZ = state.z;
    const climb = target - startZ;

    if (climb > 0) {
      const steps = Math.max(1, Math.ceil((climb / climbRate) * ctx.telemetry.update_rate_hz));
      const drain = new DrainAccumulator();
      log.info(`Climbing ${startZ.toFixed(1)}ft -> ${target}ft at ${climbRate}fps (${steps} ticks)`);

      for (let step = 1; step <= steps; step++) {
        state.z = step === steps ? target : startZ + (climb * step) / steps;
        state.velocity_z = climbRate;
        drain.add(state, tuning.climbDrainPerTick);
        heatMotors(state, tuning.climbHeatPerTick, tuning.motorTempCeilingC);

        const result = await completeTick(ctx, 'CLIMB');
        if (!result.ok) {
          return result;
        }
      }
    } else {
      log.warn(`Already at ${startZ.toFixed(1)}ft, target ${target}ft needs no climb`);
    }

    state.velocity_z = 0;
    setMode(state, 'Stabilizing');

    const stabilizationTicks = Math.round(stabilizationTime * ctx.telemetry.update_rate_hz);
    for (let tick = 0; tick < stabilizationTicks; tick++) {
      const result = await completeTick(ctx, 'STABILIZING');
      if (!result.ok) {
        return result;
      }
    }

    setMode(state, 'Hover');
    log.info(`Takeoff complete, stable hover at ${state.z.toFixed(1)}ft`);
    return PHASE_OK;
  }
}
