/**
 * @fileoverview Shared context and tick helper for the phase executors.
 *
 * @module mission/phases/PhaseContext
 */

import type { DroneState } from '../../../types/drone';
import type { CommandKind, CommandOf, SafetyParameters, TelemetryConfig } from '../../../types/mission';
import type { PhaseResult, SafetyResult } from '../../../types/outcome';
import type { SimulationTuning } from '../../../config/simulation';
import type { MissionClock } from '../../../utils/clock';
import type { TelemetryEmitter } from '../../telemetry/TelemetryEmitter';

/**
 * Everything a phase needs for one command. Built by the controller; the
 * state is the controller's own object, mutated in place.
 *
 * @interface PhaseContext
 */
export interface PhaseContext {
  state: DroneState;
  safety: SafetyParameters;
  telemetry: TelemetryConfig;
  tuning: SimulationTuning;
  clock: MissionClock;
  emitter: TelemetryEmitter;
  /** Clock time the mission was armed at, ms */
  missionStartMs: number;
  /** Re-evaluates the running command's declared safety checks */
  guard: () => SafetyResult;
}

export interface PhaseExecutor<K extends CommandKind> {
  readonly kind: K;
  execute(command: CommandOf<K>, ctx: PhaseContext): Promise<PhaseResult>;
}

export const PHASE_OK: PhaseResult = { ok: true };

export const tickIntervalMs = (ctx: PhaseContext): number => 1000 / ctx.telemetry.update_rate_hz;

/**
 * Converts a period in seconds into a whole number of ticks, at least one.
 */
export const ticksFor = (seconds: number, ctx: PhaseContext): number =>
  Math.max(1, Math.round(seconds * ctx.telemetry.update_rate_hz));

/**
 * Completes one tick after the executor has updated the state: refreshes the
 * elapsed time, emits a snapshot, re-runs the safety guard and, if the guard
 * passes, waits for the next tick.
 *
 * A failed guard returns at once without sleeping, so the caller can stop
 * its loop with no further ticks.
 *
 * @param pauseMs - Wait after this tick, defaults to one tick interval
 */
export const completeTick = async (ctx: PhaseContext, phaseLabel: string, pauseMs?: number): Promise<PhaseResult> => {
  ctx.state.flight_time_seconds = (ctx.clock.now() - ctx.missionStartMs) / 1000;
  ctx.emitter.emit(ctx.state, phaseLabel);

  const guarded = ctx.guard();
  if (!guarded.ok) {
    return guarded;
  }

  await ctx.clock.sleep(pauseMs ?? tickIntervalMs(ctx));
  return PHASE_OK;
};
