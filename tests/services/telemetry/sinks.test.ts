import ROSLIB from 'roslib';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { CollectingTelemetrySink } from '../../../src/services/telemetry/sinks/CollectingTelemetrySink';
import { ConsoleTelemetrySink } from '../../../src/services/telemetry/sinks/ConsoleTelemetrySink';
import {
  RosTopicTelemetrySink,
  type StringMessage,
  type TopicFactory,
  toRosTelemetryMessage
} from '../../../src/services/telemetry/sinks/RosTopicTelemetrySink';
import type { TelemetrySnapshot } from '../../../src/types/telemetry';

const snapshot = (overrides: Partial<TelemetrySnapshot> = {}): TelemetrySnapshot => ({
  sequence: 1,
  elapsed_seconds: 0.1,
  phase: 'CLIMB',
  mode: 'Ascend',
  command_id: 1,
  position: { x: 0, y: 0, z: 0.2 },
  speed_fps: 2,
  battery_percent: 99,
  battery_voltage: 4.188,
  signal_strength_percent: 100,
  avg_motor_temp_c: 25.5,
  mission_progress_percent: 0,
  ...overrides
});

describe('CollectingTelemetrySink', () => {
  it('keeps snapshots in arrival order until cleared', () => {
    const sink = new CollectingTelemetrySink();
    sink.accept(snapshot({ sequence: 1 }));
    sink.accept(snapshot({ sequence: 2 }));

    expect(sink.getSnapshots().map(s => s.sequence)).toEqual([1, 2]);

    sink.clear();
    expect(sink.getSnapshots()).toEqual([]);
  });
});

describe('ConsoleTelemetrySink', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('logs one formatted line per snapshot', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new ConsoleTelemetrySink().accept(snapshot());

    expect(info).toHaveBeenCalledWith(
      '[Telemetry]',
      '[CLIMB] T:0.1s | Pos:(0.00, 0.00, 0.20)ft | Vel:2.0fps | Bat:99% (4.19V) | Sig:100% | Temp:77.9°F'
    );
  });

  it('logs in metric units on request', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new ConsoleTelemetrySink('metric').accept(snapshot({ position: { x: 0, y: 0, z: 10 } }));

    expect(info).toHaveBeenCalledWith(
      '[Telemetry]',
      '[CLIMB] T:0.1s | Pos:(0.00, 0.00, 3.05)m | Vel:0.6m/s | Bat:99% (4.19V) | Sig:100% | Temp:25.5°C'
    );
  });

  it('stays quiet when info logging is off', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    new ConsoleTelemetrySink().accept(snapshot());

    expect(info).not.toHaveBeenCalled();
  });
});

// A Ros built without a url never opens a socket; tests emit the events
// rosbridge would.
describe('RosTopicTelemetrySink', () => {
  const createHarness = (options: { connected?: boolean } = {}) => {
    const ros = new ROSLIB.Ros({});
    const published: StringMessage[] = [];
    const topics: Array<{ name: string; messageType: string }> = [];
    const createTopic: TopicFactory = (_ros, name, messageType) => {
      topics.push({ name, messageType });
      return { publish: message => published.push(message) };
    };
    const sink = new RosTopicTelemetrySink(ros, { namespace: 'test_drone', createTopic, ...options });

    return { ros, published, topics, sink };
  };

  it('publishes JSON snapshots in SI units on the mission telemetry topic', () => {
    const { ros, published, topics, sink } = createHarness();
    ros.emit('connection');

    sink.accept(snapshot({ position: { x: 10, y: -5, z: 20 }, speed_fps: 10 }));

    expect(sink.getTopicName()).toBe('/test_drone/mission_telemetry');
    expect(topics).toEqual([{ name: '/test_drone/mission_telemetry', messageType: 'std_msgs/String' }]);
    expect(published).toHaveLength(1);

    const message: unknown = JSON.parse(published[0].data);
    expect(message).toEqual(toRosTelemetryMessage(snapshot({ position: { x: 10, y: -5, z: 20 }, speed_fps: 10 })));
    expect(sink.getPublishedCount()).toBe(1);
  });

  it('converts feet to meters', () => {
    const message = toRosTelemetryMessage(snapshot({ position: { x: 10, y: -5, z: 20 }, speed_fps: 10 }));

    expect(message.position_m.x).toBeCloseTo(3.048);
    expect(message.position_m.y).toBeCloseTo(-1.524);
    expect(message.position_m.z).toBeCloseTo(6.096);
    expect(message.speed_mps).toBeCloseTo(3.048);
    expect(message.avg_motor_temp_c).toBe(25.5);
  });

  it('reuses the topic while the connection stays up', () => {
    const { ros, topics, sink } = createHarness();
    ros.emit('connection');

    sink.accept(snapshot({ sequence: 1 }));
    sink.accept(snapshot({ sequence: 2 }));

    expect(topics).toHaveLength(1);
    expect(sink.getPublishedCount()).toBe(2);
  });

  it('drops and counts snapshots while disconnected', () => {
    const { ros, published, sink } = createHarness();

    sink.accept(snapshot());
    ros.emit('connection');
    ros.emit('close');
    sink.accept(snapshot());

    expect(published).toHaveLength(0);
    expect(sink.getDroppedCount()).toBe(2);
    expect(sink.isConnected()).toBe(false);
  });

  it('builds a fresh topic after the connection comes back', () => {
    const { ros, topics, sink } = createHarness();

    ros.emit('connection');
    sink.accept(snapshot());
    ros.emit('close');
    ros.emit('connection');
    sink.accept(snapshot());

    expect(topics).toHaveLength(2);
    expect(sink.getPublishedCount()).toBe(2);
  });

  it('publishes at once over a Ros that is already connected', () => {
    const { published, sink } = createHarness({ connected: true });

    sink.accept(snapshot());

    expect(published).toHaveLength(1);
  });

  it('ignores connection events after detaching', () => {
    const { ros, published, sink } = createHarness();

    sink.detach();
    ros.emit('connection');
    sink.accept(snapshot());

    expect(published).toHaveLength(0);
    expect(sink.getDroppedCount()).toBe(1);
  });
});
