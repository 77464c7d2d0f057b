import type { DescendAndLandCommand } from '../../../types/mission';
import type { PhaseResult } from '../../../types/outcome';
import { createLogger } from '../../../utils/logger';
import { coolMotors, drainBattery } from '../droneState';
import { setMode } from '../flightModes';
import { PHASE_OK, type PhaseContext, type PhaseExecutor, completeTick, tickIntervalMs, ticksFor } from './PhaseContext';

const log = createLogger('DescendAndLandExecutor');

/**
 * Landing sequence: optional precision centering, controlled descent down to
 * the final approach height, slow final approach, touchdown.
 *
 * Touchdown always leaves `z === 0`, zero velocity and `flying === false`.
 * Motors start cooling only after that.
 */
export class DescendAndLandExecutor implements PhaseExecutor<'DescendAndLand'> {
  readonly kind = 'DescendAndLand' as const;

  async execute(command: DescendAndLandCommand, ctx: PhaseContext): Promise<PhaseResult> {
    const {
      descent_rate_fps: descentRate,
      precision_landing: precisionLanding,
      final_approach_height_feet: finalApproachHeight,
      touchdown_speed_fps: touchdownSpeed
    } = command.parameters;
    const { state, tuning } = ctx;
    const hz = ctx.telemetry.update_rate_hz;

    setMode(state, 'Descending');
    state.velocity_x = 0;
    state.velocity_y = 0;
    state.velocity_z = 0;

    if (precisionLanding) {
      log.info('Precision landing, centering over the landing zone');
      // Centering steps are slower than the tick rate, never faster
      const pause = Math.max(tuning.precisionCenteringIntervalMs, tickIntervalMs(ctx));
      for (let step = 0; step < tuning.precisionCenteringSteps; step++) {
        state.x *= tuning.precisionCenteringFactor;
        state.y *= tuning.precisionCenteringFactor;

        const result = await completeTick(ctx, 'POSITION', pause);
        if (!result.ok) {
          return result;
        }
      }
    }

    log.info(`Descending at ${descentRate}fps to ${finalApproachHeight}ft`);
    const drainInterval = ticksFor(tuning.descentDrainIntervalSeconds, ctx);
    let tick = 0;

    while (state.z > finalApproachHeight) {
      state.z = Math.max(finalApproachHeight, state.z - descentRate / hz);
      state.velocity_z = -descentRate;
      if (tick % drainInterval === 0) {
        drainBattery(state, 1);
      }
      tick++;

      const result = await completeTick(ctx, 'DESCENT');
      if (!result.ok) {
        return result;
      }
    }

    setMode(state, 'FinalApproach');
    log.info(`Final approach at ${touchdownSpeed}fps`);

    while (state.z > 0) {
      state.z = Math.max(0, state.z - touchdownSpeed / hz);
      state.velocity_z = -touchdownSpeed;

      const result = await completeTick(ctx, 'FINAL');
      if (!result.ok) {
        return result;
      }
    }

    state.z = 0;
    state.velocity_x = 0;
    state.velocity_y = 0;
    state.velocity_z = 0;
    state.flying = false;
    setMode(state, 'Landed');
    coolMotors(state, tuning.landingCoolingC, tuning.ambientMotorTempC);

    const touchdown = await completeTick(ctx, 'TOUCHDOWN');
    if (!touchdown.ok) {
      return touchdown;
    }

    log.info('Landing complete, motors cooling');
    return PHASE_OK;
  }
}
