import { describe, expect, it } from 'vitest';
import { CircularPathExecutor } from '../../../../src/services/mission/phases';
import { circle, createPhaseHarness } from '../../../helpers/builders';

// Radius 1 at π/2 ft/s takes exactly 4 s: 16 ticks at 4 Hz
const quarterTurnPerSecond = { radius_feet: 1, speed_fps: Math.PI / 2 };

describe('CircularPathExecutor', () => {
  const executor = new CircularPathExecutor();

  it('flies the circle in ceil(time * rate) ticks with progress labels', async () => {
    const { ctx, sink } = createPhaseHarness({ hz: 4, state: { mode: 'Hover', flying: true, z: 5 } });

    const result = await executor.execute(circle(1, quarterTurnPerSecond), ctx);

    expect(result).toEqual({ ok: true });
    const phases = sink.getSnapshots().map(s => s.phase);
    expect(phases).toHaveLength(16);
    expect(phases[0]).toBe('CIRCLE (6%)');
    expect(phases[7]).toBe('CIRCLE (50%)');
    expect(phases[15]).toBe('CIRCLE (100%)');
  });

  it('moves clockwise with negative angle steps', async () => {
    const { ctx, sink } = createPhaseHarness({ hz: 4 });

    await executor.execute(circle(1, quarterTurnPerSecond), ctx);

    const quarter = sink.getSnapshots()[4].position;
    expect(quarter.x).toBeCloseTo(0);
    expect(quarter.y).toBeCloseTo(-1);
  });

  it('moves counterclockwise with positive angle steps', async () => {
    const { ctx, sink } = createPhaseHarness({ hz: 4 });

    await executor.execute(circle(1, { ...quarterTurnPerSecond, direction: 'counterclockwise' }), ctx);

    const quarter = sink.getSnapshots()[4].position;
    expect(quarter.x).toBeCloseTo(0);
    expect(quarter.y).toBeCloseTo(1);
  });

  it('keeps the tangential speed at the requested speed', async () => {
    const { ctx, sink } = createPhaseHarness({ hz: 4 });

    await executor.execute(circle(1, quarterTurnPerSecond), ctx);

    sink.getSnapshots().forEach(s => expect(s.speed_fps).toBeCloseTo(Math.PI / 2));
  });

  it('returns exactly to the start point at rest', async () => {
    const { ctx, state } = createPhaseHarness({ hz: 4, state: { x: 3, y: -2 } });

    await executor.execute(circle(1, { ...quarterTurnPerSecond, num_revolutions: 2 }), ctx);

    expect(state.x).toBe(3);
    expect(state.y).toBe(-2);
    expect(state.velocity_x).toBe(0);
    expect(state.velocity_y).toBe(0);
    expect(state.mode).toBe('Circle');
  });

  it('flies at the requested altitude, or keeps the current one', async () => {
    const withAltitude = createPhaseHarness({ hz: 4 });
    await executor.execute(circle(1, { ...quarterTurnPerSecond, altitude_feet: 8 }), withAltitude.ctx);
    expect(withAltitude.state.z).toBe(8);
    expect(withAltitude.state.flying).toBe(true);

    const keepAltitude = createPhaseHarness({ hz: 4, state: { mode: 'Hover', flying: true, z: 5 } });
    await executor.execute(circle(1, quarterTurnPerSecond), keepAltitude.ctx);
    expect(keepAltitude.state.z).toBe(5);
  });

  it('settles for the entry time before a smooth entry', async () => {
    const { ctx, sink } = createPhaseHarness({ hz: 4 });

    await executor.execute(circle(1, { ...quarterTurnPerSecond, smooth_entry: true }), ctx);

    const phases = sink.getSnapshots().map(s => s.phase);
    expect(phases.slice(0, 4)).toEqual(new Array<string>(4).fill('CIRCLE ENTRY'));
    expect(phases).toHaveLength(20);
  });

  it('drains and heats while maneuvering', async () => {
    const { ctx, state } = createPhaseHarness({ hz: 4 });

    await executor.execute(circle(1, quarterTurnPerSecond), ctx);

    // Steps 0, 6 and 12 with a 1.5 s interval at 4 Hz
    expect(state.battery_percent).toBe(97);
    state.motor_temps.forEach(temp => expect(temp).toBeCloseTo(26.6));
  });
});
