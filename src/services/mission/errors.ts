/**
 * @fileoverview Error kinds raised by the mission engine.
 * Every error is terminal to the current mission run; none is retried.
 *
 * @module mission/errors
 */

export type MissionErrorKind = 'ConfigInvalid' | 'UnsupportedCommandKind' | 'PreflightFailed';

export class MissionEngineError extends Error {
  readonly kind: MissionErrorKind;

  constructor(kind: MissionErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * Mission or vehicle data is missing or malformed. No mission starts.
 */
export class ConfigInvalidError extends MissionEngineError {
  /** One entry per offending field, e.g. `commands.0.parameters.climb_rate_fps: Required` */
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super('ConfigInvalid', `Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class UnsupportedCommandKindError extends MissionEngineError {
  readonly commandId: number;
  readonly commandType: string;

  constructor(commandId: number, commandType: string) {
    super('UnsupportedCommandKind', `Unsupported command type "${commandType}" (command ${commandId})`);
    this.commandId = commandId;
    this.commandType = commandType;
  }
}

export class PreflightFailedError extends MissionEngineError {
  readonly failures: string[];

  constructor(failures: string[]) {
    super('PreflightFailed', `Pre-flight check failed: ${failures.join('; ')}`);
    this.failures = failures;
  }
}
