import type { CircularPathCommand } from '../../../types/mission';
import type { PhaseResult } from '../../../types/outcome';
import { createLogger } from '../../../utils/logger';
import { drainBattery, heatMotors } from '../droneState';
import { setMode } from '../flightModes';
import { PHASE_OK, type PhaseContext, type PhaseExecutor, completeTick, ticksFor } from './PhaseContext';

const log = createLogger('CircularPathExecutor');

/**
 * Flies `num_revolutions` circles of the given radius at constant speed.
 *
 * The circle is parameterised around the position the command starts at:
 * tick `i` places the vehicle at angle `i * angleStep` and sets the velocity
 * to the analytic derivative. The step count is rounded up, so the flown
 * speed never exceeds the requested one. After the last tick x/y are set
 * back to the start point exactly.
 */
export class CircularPathExecutor implements PhaseExecutor<'CircularPath'> {
  readonly kind = 'CircularPath' as const;

  async execute(command: CircularPathCommand, ctx: PhaseContext): Promise<PhaseResult> {
    const {
      radius_feet: radius,
      speed_fps: speed,
      altitude_feet: altitude,
      direction,
      num_revolutions: revolutions,
      smooth_entry: smoothEntry
    } = command.parameters;
    const { state, tuning } = ctx;
    const hz = ctx.telemetry.update_rate_hz;

    setMode(state, 'Circle');
    if (altitude !== undefined) {
      state.z = altitude;
    }
    state.flying = state.flying || state.z > 0;
    state.velocity_z = 0;

    const circumference = 2 * Math.PI * radius * revolutions;
    const totalTime = circumference / speed;
    const totalSteps = Math.max(1, Math.ceil(totalTime * hz));
    const sign = direction === 'clockwise' ? -1 : 1;
    const angleStep = (sign * 2 * Math.PI * revolutions) / totalSteps;
    const angularVelocity = angleStep * hz;

    log.info(
      `Flying ${(radius * 2).toFixed(1)}ft diameter circle (${direction}) at ${speed}fps, ` +
      `circumference ${circumference.toFixed(1)}ft, ${totalTime.toFixed(1)}s`
    );

    if (smoothEntry) {
      state.velocity_x = 0;
      state.velocity_y = 0;
      const entryTicks = ticksFor(tuning.circleEntrySeconds, ctx);
      for (let tick = 0; tick < entryTicks; tick++) {
        const result = await completeTick(ctx, 'CIRCLE ENTRY');
        if (!result.ok) {
          return result;
        }
      }
    }

    const centerX = state.x;
    const centerY = state.y;
    const drainInterval = ticksFor(tuning.circleDrainIntervalSeconds, ctx);

    for (let step = 0; step < totalSteps; step++) {
      const angle = step * angleStep;
      state.x = centerX + radius * Math.cos(angle);
      state.y = centerY + radius * Math.sin(angle);
      state.velocity_x = -radius * Math.sin(angle) * angularVelocity;
      state.velocity_y = radius * Math.cos(angle) * angularVelocity;

      if (step % drainInterval === 0) {
        drainBattery(state, 1);
      }
      heatMotors(state, tuning.circleHeatPerTick, tuning.motorTempCeilingC);

      const progress = Math.floor(((step + 1) / totalSteps) * 100);
      const result = await completeTick(ctx, `CIRCLE (${progress}%)`);
      if (!result.ok) {
        return result;
      }
    }

    state.x = centerX;
    state.y = centerY;
    state.velocity_x = 0;
    state.velocity_y = 0;

    log.info('Circular path complete, returned to start position');
    return PHASE_OK;
  }
}
