// Topic namespace the mission telemetry is published under
export const ROS_TELEMETRY_NAMESPACE = process.env.ROS_TELEMETRY_NAMESPACE || 'drone1';
