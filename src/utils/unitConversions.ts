export type UnitSystem = 'metric' | 'imperial';

// The engine works in feet and ft/s; conversions go from there
const FEET_TO_METERS = 0.3048;
const CELSIUS_TO_FAHRENHEIT_MULTIPLIER = 9 / 5;
const CELSIUS_TO_FAHRENHEIT_OFFSET = 32;

export const feetToMeters = (feet: number): number => feet * FEET_TO_METERS;

// Unit conversion functions
export const convertDistance = (feet: number, system: UnitSystem): number => {
  return system === 'metric' ? feetToMeters(feet) : feet;
};

export const convertSpeed = (fps: number, system: UnitSystem): number => {
  return system === 'metric' ? feetToMeters(fps) : fps;
};

export const convertTemperature = (celsius: number, system: UnitSystem): number => {
  return system === 'imperial'
    ? (celsius * CELSIUS_TO_FAHRENHEIT_MULTIPLIER) + CELSIUS_TO_FAHRENHEIT_OFFSET
    : celsius;
};

// Unit label getters
export const getDistanceUnit = (system: UnitSystem): string => {
  return system === 'imperial' ? 'ft' : 'm';
};

export const getSpeedUnit = (system: UnitSystem): string => {
  return system === 'imperial' ? 'fps' : 'm/s';
};

export const getTemperatureUnit = (system: UnitSystem): string => {
  return system === 'imperial' ? '°F' : '°C';
};
