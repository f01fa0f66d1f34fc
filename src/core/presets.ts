export interface RatePreset {
  label: string;
  value: number;
}

export interface WeatherPreset {
  label: string;
  rainRateMmHr: number;
  evaporationMmHr: number;
  infiltrationMmHr: number;
}

export const RAIN_PRESETS: readonly RatePreset[] = [
  { label: 'Light', value: 2.5 },
  { label: 'Moderate', value: 10 },
  { label: 'Heavy', value: 50 }
];

export const EVAPORATION_PRESETS: readonly RatePreset[] = [
  { label: 'Slow', value: 1 },
  { label: 'Normal', value: 5 },
  { label: 'Fast', value: 20 }
];

// Soil types, by how quickly they soak up standing water.
export const INFILTRATION_PRESETS: readonly RatePreset[] = [
  { label: 'None', value: 0 },
  { label: 'Clay', value: 5 },
  { label: 'Loam', value: 25 }
];

export const WEATHER_PRESETS: readonly WeatherPreset[] = [
  { label: 'Storm', rainRateMmHr: 50, evaporationMmHr: 2, infiltrationMmHr: 5 },
  { label: 'Normal Rain', rainRateMmHr: 10, evaporationMmHr: 5, infiltrationMmHr: 10 },
  { label: 'Drizzle', rainRateMmHr: 2, evaporationMmHr: 10, infiltrationMmHr: 0 },
  { label: 'Dry Out', rainRateMmHr: 0, evaporationMmHr: 20, infiltrationMmHr: 50 }
];
