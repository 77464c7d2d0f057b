import { describe, expect, it } from 'vitest';
import { AscendExecutor } from '../../../../src/services/mission/phases';
import { ascend, createPhaseHarness } from '../../../helpers/builders';

describe('AscendExecutor', () => {
  const executor = new AscendExecutor();

  it('ramps linearly to the target, then stabilizes and hovers', async () => {
    const { ctx, state, sink, clock } = createPhaseHarness({ hz: 4 });

    const result = await executor.execute(
      ascend(1, { target_altitude_feet: 4, climb_rate_fps: 2, stabilization_time_seconds: 0.5 }),
      ctx
    );

    expect(result).toEqual({ ok: true });

    const snapshots = sink.getSnapshots();
    expect(snapshots.map(s => s.phase)).toEqual([
      ...new Array<string>(8).fill('CLIMB'),
      'STABILIZING',
      'STABILIZING'
    ]);
    expect(snapshots.slice(0, 8).map(s => s.position.z)).toEqual([0.5, 1, 1.5, 2, 2.5, 3, 3.5, 4]);
    expect(snapshots.slice(0, 8).every(s => s.speed_fps === 2)).toBe(true);
    expect(snapshots.map(s => s.elapsed_seconds)).toEqual([0, 0.25, 0.5, 0.75, 1, 1.25, 1.5, 1.75, 2, 2.25]);

    expect(state.z).toBe(4);
    expect(state.velocity_z).toBe(0);
    expect(state.flying).toBe(true);
    expect(state.mode).toBe('Hover');
    expect(clock.now()).toBe(2500);
  });

  it('drains the battery and heats the motors on climb ticks only', async () => {
    const { ctx, state } = createPhaseHarness({ hz: 4 });

    await executor.execute(ascend(1, { target_altitude_feet: 4, climb_rate_fps: 2, stabilization_time_seconds: 2 }), ctx);

    expect(state.battery_percent).toBe(92);
    expect(state.battery_voltage).toBeCloseTo(4.104);
    expect(state.motor_temps).toEqual([29, 29, 29, 29]);
  });

  it('adds up fractional climb drain into whole percents', async () => {
    const half = createPhaseHarness({ hz: 4, tuning: { climbDrainPerTick: 0.5 } });
    const quarter = createPhaseHarness({ hz: 4, tuning: { climbDrainPerTick: 0.25 } });
    const command = ascend(1, { target_altitude_feet: 4, climb_rate_fps: 2 });

    await executor.execute(command, half.ctx);
    await executor.execute(command, quarter.ctx);

    expect(half.state.battery_percent).toBe(96);
    expect(quarter.state.battery_percent).toBe(98);
  });

  it('never heats the motors past the ceiling', async () => {
    const { ctx, state } = createPhaseHarness({ hz: 4, state: { motor_temps: [64, 64, 64, 64] } });

    await executor.execute(ascend(1, { target_altitude_feet: 4, climb_rate_fps: 2 }), ctx);

    expect(state.motor_temps).toEqual([65, 65, 65, 65]);
  });

  it('rounds the step count up so the climb never outruns the rate', async () => {
    const { ctx, state, sink } = createPhaseHarness({ hz: 4 });

    await executor.execute(ascend(1, { target_altitude_feet: 3, climb_rate_fps: 2 }), ctx);

    expect(sink.getSnapshots()).toHaveLength(6);
    expect(state.z).toBe(3);
  });

  it('skips the ramp when already at or above the target', async () => {
    const { ctx, state, sink } = createPhaseHarness({
      hz: 4,
      state: { mode: 'Hover', z: 5, flying: true }
    });

    const result = await executor.execute(
      ascend(1, { target_altitude_feet: 4, climb_rate_fps: 2, stabilization_time_seconds: 0.5 }),
      ctx
    );

    expect(result.ok).toBe(true);
    expect(sink.getSnapshots().map(s => s.phase)).toEqual(['STABILIZING', 'STABILIZING']);
    expect(state.z).toBe(5);
    expect(state.battery_percent).toBe(100);
  });

  it('stops on the tick a declared check fails, without sleeping', async () => {
    const { ctx, state, sink, clock } = createPhaseHarness({
      hz: 4,
      checks: ['altitude_hold'],
      safety: { max_altitude_feet: 2.2 }
    });

    const result = await executor.execute(ascend(1, { target_altitude_feet: 4, climb_rate_fps: 2 }), ctx);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.violation.check_name).toBe('altitude_hold');
      expect(result.violation.reason).toBe('Altitude limit exceeded (2.5ft > 2.2ft)');
    }
    expect(sink.getSnapshots()).toHaveLength(5);
    expect(clock.now()).toBe(1000);
    expect(state.mode).toBe('Ascend');
  });
});
