import { describe, expect, it } from 'vitest';
import { InMemoryConfigProvider } from '../../../src/services/config/InMemoryConfigProvider';
import { ConfigInvalidError } from '../../../src/services/mission/errors';

const safetyParameters = {
  max_altitude_feet: 20,
  max_speed_fps: 5,
  emergency_land_battery_percent: 15,
  geofence_radius_feet: 30,
  max_wind_speed_mph: 12
};

const missionWith = (commands: unknown[], extra: Record<string, unknown> = {}) => ({
  mission: { name: 'Inline', drone_model: 'TQ-1', safety_parameters: safetyParameters },
  commands,
  telemetry_config: { update_rate_hz: 5 },
  ...extra
});

const issuesOf = async (provider: InMemoryConfigProvider, id: string): Promise<string[] | null> => {
  const error = await provider.loadMission(id).catch((e: unknown) => e);
  return error instanceof ConfigInvalidError ? error.issues : null;
};

describe('InMemoryConfigProvider', () => {
  it('validates and fills defaults like the file provider', async () => {
    const provider = new InMemoryConfigProvider({
      inline: missionWith([{ id: 1, type: ' takeoff ', parameters: { target_altitude_feet: 5, climb_rate_fps: 1 } }])
    });

    const mission = await provider.loadMission('inline');

    expect(mission.mission.description).toBe('');
    expect(mission.mission.environment).toEqual({ indoor_safe: false, outdoor_capable: true, recommended_space: '' });
    expect(mission.commands).toEqual([
      {
        id: 1,
        kind: 'Ascend',
        description: '',
        expected_duration_seconds: 0,
        safety_checks: [],
        parameters: { target_altitude_feet: 5, climb_rate_fps: 1, stabilization_time_seconds: 0 }
      }
    ]);
    expect(mission.telemetry_config.real_time_display).toBe(true);
  });

  it('accepts the short circle directions', async () => {
    const provider = new InMemoryConfigProvider();
    provider.addMission(
      'circles',
      missionWith([
        { id: 1, type: 'CIRCLE', parameters: { radius_feet: 3, speed_fps: 1, direction: 'CCW' } },
        { id: 2, type: 'circular_path', parameters: { radius_feet: 3, speed_fps: 1, direction: 'cw' } },
        { id: 3, type: 'CircularPath', parameters: { radius_feet: 3, speed_fps: 1 } }
      ])
    );

    const mission = await provider.loadMission('circles');

    expect(mission.commands.map(command => (command.kind === 'CircularPath' ? command.parameters.direction : null))).toEqual([
      'counterclockwise',
      'clockwise',
      'clockwise'
    ]);
  });

  it('lists every schema issue with its path', async () => {
    const provider = new InMemoryConfigProvider({
      bad: {
        mission: { name: 'Bad', drone_model: 'TQ-1' },
        commands: [],
        telemetry_config: { update_rate_hz: 0 }
      }
    });

    expect(await issuesOf(provider, 'bad')).toEqual([
      'mission.safety_parameters: Required',
      'telemetry_config.update_rate_hz: Number must be greater than 0'
    ]);
  });

  it('rejects an unknown circle direction', async () => {
    const provider = new InMemoryConfigProvider({
      sideways: missionWith([{ id: 1, type: 'CIRCLE', parameters: { radius_feet: 3, speed_fps: 1, direction: 'sideways' } }])
    });

    const issues = await issuesOf(provider, 'sideways');

    expect(issues).toHaveLength(1);
    expect(issues?.[0].startsWith('commands.0.parameters.direction: ')).toBe(true);
  });

  it('rejects gaps in the command ids', async () => {
    const provider = new InMemoryConfigProvider({
      gap: missionWith([
        { id: 1, type: 'ASCEND', parameters: { target_altitude_feet: 5, climb_rate_fps: 1 } },
        { id: 3, type: 'LAND', parameters: { descent_rate_fps: 1 } }
      ])
    });

    expect(await issuesOf(provider, 'gap')).toEqual(['commands: command ids must ascend without gaps: 1 is followed by 3']);
  });

  it('rejects a vehicle document without the drone wrapper', async () => {
    const provider = new InMemoryConfigProvider({}, { flat: { model: 'TQ-1' } });

    const error = await provider.loadVehicle('flat').catch((e: unknown) => e);

    expect(error instanceof ConfigInvalidError ? error.issues : null).toEqual(['drone: Required']);
  });

  it('keeps the context sections of a vehicle profile', async () => {
    const provider = new InMemoryConfigProvider(
      {},
      {
        detailed: {
          drone: {
            model: 'TQ-1',
            video_system: { resolution: '720p' },
            telemetry: { battery: true },
            control_characteristics: { responsiveness: 'high' },
            flight_modes: [{ name: 'position', gps_required: false }],
            performance_limits: { max_tilt_degrees: 30 },
            recommended_use: { environment: 'indoor' }
          }
        }
      }
    );

    const vehicle = await provider.loadVehicle('detailed');

    expect(vehicle.video_system).toEqual({ resolution: '720p' });
    expect(vehicle.telemetry).toEqual({ battery: true });
    expect(vehicle.control_characteristics).toEqual({ responsiveness: 'high' });
    expect(vehicle.flight_modes).toEqual([{ name: 'position', gps_required: false }]);
    expect(vehicle.performance_limits).toEqual({ max_tilt_degrees: 30 });
    expect(vehicle.recommended_use).toEqual({ environment: 'indoor' });
    expect(Object.isFrozen(vehicle.flight_modes)).toBe(true);
  });

  it('rejects flight modes that are not objects', async () => {
    const provider = new InMemoryConfigProvider({}, { bad: { drone: { model: 'TQ-1', flight_modes: ['position'] } } });

    const error = await provider.loadVehicle('bad').catch((e: unknown) => e);

    expect(error instanceof ConfigInvalidError ? error.issues : null).toEqual([
      'drone.flight_modes.0: Expected object, received string'
    ]);
  });

  it('reports unknown ids as not found', async () => {
    const provider = new InMemoryConfigProvider();

    expect(await issuesOf(provider, 'ghost')).toEqual(['not found']);
    await expect(provider.loadVehicle('ghost')).rejects.toThrow('Invalid configuration in drone "ghost": not found');
  });
});
