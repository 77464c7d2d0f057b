/**
 * @fileoverview ConfigProvider reading JSON documents from a directory tree.
 *
 * Layout:
 * ```
 * <rootDir>/missions/<missionId>.json
 * <rootDir>/drones/<vehicleId>.json
 * ```
 *
 * @module config/JsonFileConfigProvider
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { MissionDefinition, VehicleProfile } from '../../types/mission';
import { MISSION_CONFIG_DIR } from '../../config/simulation';
import { createLogger } from '../../utils/logger';
import { ConfigInvalidError } from '../mission/errors';
import { type ConfigProvider, parseMissionDefinition, parseVehicleProfile } from './ConfigProvider';

const log = createLogger('JsonFileConfigProvider');

// Ids are file stems, never paths
const ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

const isFileNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * @example
 * ```typescript
 * const provider = new JsonFileConfigProvider('./config');
 * const mission = await provider.loadMission('cetus-lite-demo');
 * const vehicle = await provider.loadVehicle('cetus-lite');
 * ```
 */
export class JsonFileConfigProvider implements ConfigProvider {
  private rootDir: string;

  constructor(rootDir: string = MISSION_CONFIG_DIR) {
    this.rootDir = rootDir;
  }

  async loadMission(id: string): Promise<MissionDefinition> {
    const file = this.resolve('missions', id);
    const mission = parseMissionDefinition(await this.readJson(file), file);
    log.info(
      `Mission loaded: ${mission.mission.name} (${mission.commands.length} commands, ` +
      `${mission.mission.duration_estimate_seconds}s estimated, for ${mission.mission.drone_model})`
    );
    return mission;
  }

  async loadVehicle(id: string): Promise<VehicleProfile> {
    const file = this.resolve('drones', id);
    const vehicle = parseVehicleProfile(await this.readJson(file), file);
    log.info(`Drone config loaded: ${vehicle.model} by ${vehicle.manufacturer || 'unknown manufacturer'}`);
    return vehicle;
  }

  private resolve(folder: 'missions' | 'drones', id: string): string {
    const stem = id.endsWith('.json') ? id.slice(0, -'.json'.length) : id;
    if (!ID_PATTERN.test(stem) || stem.startsWith('.')) {
      throw new ConfigInvalidError(`${folder}/${id}`, [`invalid id "${id}"`]);
    }
    return path.join(this.rootDir, folder, `${stem}.json`);
  }

  /**
   * @throws {ConfigInvalidError} If the file is missing or is not valid JSON
   */
  private async readJson(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new ConfigInvalidError(file, ['file not found']);
      }
      throw error;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ConfigInvalidError(file, [`malformed JSON: ${error instanceof Error ? error.message : String(error)}`]);
    }
  }
}
