/**
 * @fileoverview zod schemas for the mission and drone JSON documents.
 *
 * Schemas check shape and fill defaults. Range checks that depend on other
 * fields (altitudes against the ceiling, speeds against the limit) belong to
 * the pre-flight check.
 *
 * @module config/schemas
 */

import { z } from 'zod';
import type { CircleDirection, CommandKind } from '../../types/mission';

export const safetyParametersSchema = z.object({
  max_altitude_feet: z.number(),
  max_speed_fps: z.number(),
  emergency_land_battery_percent: z.number(),
  geofence_radius_feet: z.number(),
  max_wind_speed_mph: z.number()
});

export const environmentSchema = z.object({
  indoor_safe: z.boolean().default(false),
  outdoor_capable: z.boolean().default(true),
  recommended_space: z.string().default('')
});

export const missionDetailsSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  drone_model: z.string().min(1),
  duration_estimate_seconds: z.number().nonnegative().default(0),
  safety_parameters: safetyParametersSchema,
  environment: environmentSchema.default({})
});

export const telemetryConfigSchema = z.object({
  update_rate_hz: z.number().positive(),
  data_points: z.array(z.string()).default([]),
  logging_enabled: z.boolean().default(false),
  real_time_display: z.boolean().default(true)
});

/**
 * Command as written in the file: the kind is still a free-form `type`
 * string and the parameters an untyped bag.
 */
export const rawCommandSchema = z.object({
  id: z.number().int(),
  type: z.string().min(1),
  description: z.string().default(''),
  parameters: z.record(z.unknown()).default({}),
  expected_duration_seconds: z.number().nonnegative().default(0),
  safety_checks: z.array(z.string()).default([])
});

export type RawCommand = z.infer<typeof rawCommandSchema>;

export const missionDocumentSchema = z.object({
  mission: missionDetailsSchema,
  commands: z.array(rawCommandSchema),
  telemetry_config: telemetryConfigSchema
});

export const vehicleDocumentSchema = z.object({
  drone: z.object({
    model: z.string().min(1),
    manufacturer: z.string().default(''),
    type: z.string().default(''),
    category: z.string().default(''),
    specifications: z.record(z.unknown()).default({}),
    capabilities: z.record(z.boolean()).default({}),
    video_system: z.record(z.unknown()).optional(),
    telemetry: z.record(z.boolean()).optional(),
    control_characteristics: z.record(z.string()).optional(),
    flight_modes: z.array(z.record(z.unknown())).optional(),
    performance_limits: z.record(z.unknown()).optional(),
    recommended_use: z.record(z.string()).optional()
  })
});

// Parameter schemas per command kind

export const ascendParametersSchema = z.object({
  target_altitude_feet: z.number(),
  climb_rate_fps: z.number(),
  stabilization_time_seconds: z.number().default(0)
});

export const holdParametersSchema = z.object({
  duration_seconds: z.number(),
  position_hold: z.boolean().default(false),
  altitude_tolerance_feet: z.number().default(0.5)
});

export const circleDirectionSchema = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.enum(['clockwise', 'cw', 'counterclockwise', 'ccw', 'counter_clockwise', 'anticlockwise']))
  .transform((value): CircleDirection => (value === 'clockwise' || value === 'cw' ? 'clockwise' : 'counterclockwise'));

export const circularPathParametersSchema = z.object({
  radius_feet: z.number(),
  speed_fps: z.number(),
  altitude_feet: z.number().optional(),
  direction: circleDirectionSchema.default('clockwise'),
  num_revolutions: z.number().default(1),
  smooth_entry: z.boolean().default(true)
});

export const descendAndLandParametersSchema = z.object({
  descent_rate_fps: z.number(),
  precision_landing: z.boolean().default(false),
  final_approach_height_feet: z.number().default(1),
  touchdown_speed_fps: z.number().default(0.2)
});

/**
 * Accepted spellings of each command kind in the `type` field (upper-cased).
 */
export const COMMAND_TYPE_ALIASES: Readonly<Record<string, CommandKind>> = {
  ASCEND: 'Ascend',
  TAKEOFF: 'Ascend',
  HOLD: 'Hold',
  HOVER: 'Hold',
  CIRCULAR_PATH: 'CircularPath',
  CIRCULARPATH: 'CircularPath',
  CIRCLE: 'CircularPath',
  DESCEND_AND_LAND: 'DescendAndLand',
  DESCENDANDLAND: 'DescendAndLand',
  LAND: 'DescendAndLand'
};
