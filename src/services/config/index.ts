export { parseMissionDefinition, parseVehicleProfile } from './ConfigProvider';
export type { ConfigProvider } from './ConfigProvider';
export { JsonFileConfigProvider } from './JsonFileConfigProvider';
export { InMemoryConfigProvider } from './InMemoryConfigProvider';
