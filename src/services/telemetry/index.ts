export { TelemetryEmitter } from './TelemetryEmitter';
export type { TelemetryEmitterOptions } from './TelemetryEmitter';
export { ConsoleTelemetrySink } from './sinks/ConsoleTelemetrySink';
export { CollectingTelemetrySink } from './sinks/CollectingTelemetrySink';
export { RosTopicTelemetrySink, toRosTelemetryMessage } from './sinks/RosTopicTelemetrySink';
export type {
  RosTelemetryMessage,
  RosTopicTelemetrySinkOptions,
  StringMessage,
  TopicFactory,
  TopicPublisher
} from './sinks/RosTopicTelemetrySink';
