import type { MissionDefinition, VehicleProfile } from '../../types/mission';
import { ConfigInvalidError } from '../mission/errors';
import { type ConfigProvider, parseMissionDefinition, parseVehicleProfile } from './ConfigProvider';

/**
 * ConfigProvider over raw documents held in memory (embedded missions,
 * documents received over the wire). Documents are validated on every load,
 * exactly like files.
 */
export class InMemoryConfigProvider implements ConfigProvider {
  private missions: Map<string, unknown>;
  private vehicles: Map<string, unknown>;

  constructor(missions: Record<string, unknown> = {}, vehicles: Record<string, unknown> = {}) {
    this.missions = new Map(Object.entries(missions));
    this.vehicles = new Map(Object.entries(vehicles));
  }

  addMission(id: string, document: unknown): void {
    this.missions.set(id, document);
  }

  addVehicle(id: string, document: unknown): void {
    this.vehicles.set(id, document);
  }

  async loadMission(id: string): Promise<MissionDefinition> {
    if (!this.missions.has(id)) {
      throw new ConfigInvalidError(`mission "${id}"`, ['not found']);
    }
    return parseMissionDefinition(this.missions.get(id), `mission "${id}"`);
  }

  async loadVehicle(id: string): Promise<VehicleProfile> {
    if (!this.vehicles.has(id)) {
      throw new ConfigInvalidError(`drone "${id}"`, ['not found']);
    }
    return parseVehicleProfile(this.vehicles.get(id), `drone "${id}"`);
  }
}
