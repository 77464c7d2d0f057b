/**
 * @fileoverview Publishes mission telemetry to ROS through rosbridge.
 *
 * Each snapshot goes out as a JSON string on
 * `/{namespace}/mission_telemetry` (`std_msgs/String`), converted to SI units
 * the way ROS nodes expect them.
 *
 * @module telemetry/sinks/RosTopicTelemetrySink
 */

import ROSLIB from 'roslib';
import { ROS_TELEMETRY_NAMESPACE } from '../../../config/rosbridge';
import type { TelemetrySink, TelemetrySnapshot } from '../../../types/telemetry';
import { createLogger } from '../../../utils/logger';
import { feetToMeters } from '../../../utils/unitConversions';

const log = createLogger('RosTopicTelemetrySink');

const MESSAGE_TYPE = 'std_msgs/String';

/**
 * `std_msgs/String` payload carrying one JSON-encoded snapshot.
 *
 * @interface StringMessage
 */
export interface StringMessage {
  data: string;
}

/**
 * Anything that can publish on a single topic.
 *
 * @interface TopicPublisher
 */
export interface TopicPublisher {
  publish(message: StringMessage): void;
}

export type TopicFactory = (ros: ROSLIB.Ros, name: string, messageType: string) => TopicPublisher;

export interface RosTopicTelemetrySinkOptions {
  /** Topic namespace (default: ROS_TELEMETRY_NAMESPACE) */
  namespace?: string;
  /** Whether `ros` is already connected when the sink is built (default: false) */
  connected?: boolean;
  /** Creates the topic publisher; replaced in tests */
  createTopic?: TopicFactory;
}

/**
 * Wire format published on the telemetry topic. Distances in meters, speed
 * in m/s, temperature in °C.
 */
export interface RosTelemetryMessage {
  sequence: number;
  elapsed_seconds: number;
  phase: string;
  mode: string;
  command_id: number;
  position_m: { x: number; y: number; z: number };
  speed_mps: number;
  battery_percent: number;
  battery_voltage: number;
  signal_strength_percent: number;
  avg_motor_temp_c: number;
  mission_progress_percent: number;
}

const defaultTopicFactory: TopicFactory = (ros, name, messageType) => {
  const topic = new ROSLIB.Topic({ ros, name, messageType });
  return {
    publish: message => topic.publish(new ROSLIB.Message(message))
  };
};

export const toRosTelemetryMessage = (snapshot: TelemetrySnapshot): RosTelemetryMessage => ({
  sequence: snapshot.sequence,
  elapsed_seconds: snapshot.elapsed_seconds,
  phase: snapshot.phase,
  mode: snapshot.mode,
  command_id: snapshot.command_id,
  position_m: {
    x: feetToMeters(snapshot.position.x),
    y: feetToMeters(snapshot.position.y),
    z: feetToMeters(snapshot.position.z)
  },
  speed_mps: feetToMeters(snapshot.speed_fps),
  battery_percent: snapshot.battery_percent,
  battery_voltage: snapshot.battery_voltage,
  signal_strength_percent: snapshot.signal_strength_percent,
  avg_motor_temp_c: snapshot.avg_motor_temp_c,
  mission_progress_percent: snapshot.mission_progress_percent
});

/**
 * Telemetry sink publishing over a caller-owned `ROSLIB.Ros`. The sink
 * follows the connection through its `connection` and `close` events;
 * snapshots that arrive while it is down are dropped and counted, so the
 * mission never waits on the network. Reconnecting is up to the caller.
 *
 * @example
 * ```typescript
 * const ros = new ROSLIB.Ros({});
 * const sink = new RosTopicTelemetrySink(ros);
 * ros.connect('ws://localhost:9090');
 * const controller = new MissionController({ configProvider, sinks: [sink] });
 * ```
 */
export class RosTopicTelemetrySink implements TelemetrySink {
  private ros: ROSLIB.Ros;
  private topicName: string;
  private createTopic: TopicFactory;
  private publisher: TopicPublisher | null = null;
  private connected: boolean;
  private publishedCount = 0;
  private droppedCount = 0;

  private handleConnection = () => {
    this.connected = true;
    log.info(`Publishing telemetry on ${this.topicName}`);
  };

  private handleClose = () => {
    if (this.connected) {
      log.warn(`Connection closed, dropping telemetry for ${this.topicName} until it is back`);
    }
    this.connected = false;
    // Topics advertise once per socket; a new one is built after reconnecting
    this.publisher = null;
  };

  constructor(ros: ROSLIB.Ros, options: RosTopicTelemetrySinkOptions = {}) {
    this.ros = ros;
    this.topicName = `/${options.namespace || ROS_TELEMETRY_NAMESPACE}/mission_telemetry`;
    this.createTopic = options.createTopic || defaultTopicFactory;
    this.connected = options.connected === true;

    ros.on('connection', this.handleConnection);
    ros.on('close', this.handleClose);
  }

  accept(snapshot: TelemetrySnapshot): void {
    if (!this.connected) {
      this.droppedCount++;
      if (this.droppedCount === 1) {
        log.warn(`Not connected to rosbridge, dropping telemetry for ${this.topicName}`);
      }
      return;
    }

    if (!this.publisher) {
      this.publisher = this.createTopic(this.ros, this.topicName, MESSAGE_TYPE);
    }
    this.publisher.publish({ data: JSON.stringify(toRosTelemetryMessage(snapshot)) });
    this.publishedCount++;
  }

  /**
   * Stops following the connection. The Ros instance itself stays open.
   */
  detach(): void {
    this.ros.off('connection', this.handleConnection);
    this.ros.off('close', this.handleClose);
    this.connected = false;
    this.publisher = null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  getTopicName(): string {
    return this.topicName;
  }

  getPublishedCount(): number {
    return this.publishedCount;
  }

  getDroppedCount(): number {
    return this.droppedCount;
  }
}
