/**
 * @fileoverview The configuration source interface and the document parsers
 * every provider shares.
 *
 * @module config/ConfigProvider
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { CommandSpec, MissionDefinition, VehicleProfile } from '../../types/mission';
import { ConfigInvalidError, UnsupportedCommandKindError } from '../mission/errors';
import { findCommandOrderIssue } from '../mission/PreflightCheck';
import {
  COMMAND_TYPE_ALIASES,
  type RawCommand,
  ascendParametersSchema,
  circularPathParametersSchema,
  descendAndLandParametersSchema,
  holdParametersSchema,
  missionDocumentSchema,
  vehicleDocumentSchema
} from './schemas';

/**
 * Where missions and vehicles come from (files, network, embedded).
 * Implementations reject with {@link ConfigInvalidError} or
 * {@link UnsupportedCommandKindError}; the engine treats anything else as
 * an infrastructure failure.
 *
 * @interface ConfigProvider
 */
export interface ConfigProvider {
  loadMission(id: string): Promise<MissionDefinition>;
  loadVehicle(id: string): Promise<VehicleProfile>;
}

const formatIssues = (error: ZodError, prefix = ''): string[] =>
  error.issues.map(issue => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
    return `${path || '(root)'}: ${issue.message}`;
  });

function parseWith<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  raw: unknown,
  source: string,
  prefix?: string
): Output {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigInvalidError(source, formatIssues(result.error, prefix));
  }
  return result.data;
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(child => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

function toCommandSpec(raw: RawCommand, index: number, source: string): CommandSpec {
  const kind = COMMAND_TYPE_ALIASES[raw.type.trim().toUpperCase()];
  if (!kind) {
    throw new UnsupportedCommandKindError(raw.id, raw.type);
  }

  const base = {
    id: raw.id,
    description: raw.description,
    expected_duration_seconds: raw.expected_duration_seconds,
    safety_checks: raw.safety_checks
  };
  const prefix = `commands.${index}.parameters`;

  switch (kind) {
    case 'Ascend':
      return { ...base, kind, parameters: parseWith(ascendParametersSchema, raw.parameters, source, prefix) };
    case 'Hold':
      return { ...base, kind, parameters: parseWith(holdParametersSchema, raw.parameters, source, prefix) };
    case 'CircularPath':
      return { ...base, kind, parameters: parseWith(circularPathParametersSchema, raw.parameters, source, prefix) };
    case 'DescendAndLand':
      return { ...base, kind, parameters: parseWith(descendAndLandParametersSchema, raw.parameters, source, prefix) };
  }
}

/**
 * Validates a raw mission document and returns an immutable definition.
 *
 * @param raw - Parsed JSON
 * @param source - Name used in error messages, e.g. the file path
 * @throws {ConfigInvalidError} On missing or malformed fields, or unordered command ids
 * @throws {UnsupportedCommandKindError} On a command type the engine cannot run
 */
export const parseMissionDefinition = (raw: unknown, source: string): MissionDefinition => {
  const document = parseWith(missionDocumentSchema, raw, source);
  const orderIssue = findCommandOrderIssue(document.commands.map(command => command.id));
  if (orderIssue) {
    throw new ConfigInvalidError(source, [`commands: ${orderIssue}`]);
  }
  const commands = document.commands.map((command, index) => toCommandSpec(command, index, source));

  return deepFreeze({
    mission: document.mission,
    commands,
    telemetry_config: document.telemetry_config
  });
};

/**
 * Validates a raw drone document (`{ "drone": { ... } }`).
 *
 * @throws {ConfigInvalidError} On missing or malformed fields
 */
export const parseVehicleProfile = (raw: unknown, source: string): VehicleProfile =>
  deepFreeze(parseWith(vehicleDocumentSchema, raw, source).drone);
