import type { CropInfo, RegionalInfo, Season, SeasonInfo, ValueRange, WeatherConditions } from '../types';

export const DEFAULT_WEATHER: Required<WeatherConditions> = {
  temperature: 25,
  rainfall: 500,
  humidity: 60
};

const MAJOR_CROP_SCORE = 1.0;
const MINOR_CROP_SCORE = 0.5;

/**
 * 1 inside the range, decaying linearly by distance to the nearer bound outside it.
 */
export function rangeScore(value: number, range: ValueRange, decay: number): number {
  const [min, max] = range;
  if (value >= min && value <= max) {
    return 1.0;
  }

  const diff = Math.min(Math.abs(value - min), Math.abs(value - max));
  return Math.max(0, 1.0 - diff / decay);
}

export interface CropReferenceTables {
  crops: ReadonlyMap<string, CropInfo>;
  regions: ReadonlyMap<string, RegionalInfo>;
  seasons: ReadonlyMap<Season, SeasonInfo>;
}

export class CropSuitabilityService {
  constructor(private readonly tables: CropReferenceTables) {}

  /**
   * Score in [0, 1]: temperature, rainfall, humidity and regional fit weighted
   * equally. Unknown crops score 0; an unknown state contributes nothing to the
   * regional factor.
   */
  getCropSuitability(crop: string, state: string, weather: WeatherConditions = {}): number {
    const cropInfo = this.tables.crops.get(crop);
    if (!cropInfo) {
      return 0.0;
    }

    const temperature = weather.temperature ?? DEFAULT_WEATHER.temperature;
    const rainfall = weather.rainfall ?? DEFAULT_WEATHER.rainfall;
    const humidity = weather.humidity ?? DEFAULT_WEATHER.humidity;

    const factors = [
      rangeScore(temperature, cropInfo.temperatureRange, 10),
      rangeScore(rainfall, cropInfo.rainfallRequirement, 500),
      rangeScore(humidity, cropInfo.humidityRequirement, 20),
      this.regionalScore(crop, state)
    ];

    return factors.reduce((sum, score) => sum + score, 0) / factors.length;
  }

  private regionalScore(crop: string, state: string): number {
    const region = this.tables.regions.get(state);
    if (!region) {
      return 0;
    }
    return region.majorCrops.includes(crop) ? MAJOR_CROP_SCORE : MINOR_CROP_SCORE;
  }

  getCropInfo(crop: string): CropInfo | undefined {
    return this.tables.crops.get(crop);
  }

  getRegionalInfo(state: string): RegionalInfo | undefined {
    return this.tables.regions.get(state);
  }

  getSeasonInfo(season: Season): SeasonInfo | undefined {
    return this.tables.seasons.get(season);
  }

  getSeasonalCrops(season: Season): string[] {
    return [...this.tables.crops.values()]
      .filter(crop => crop.seasons.includes(season))
      .map(crop => crop.name);
  }

  /**
   * Crops ranked by suitability for the state and weather, best first.
   */
  rankCrops(state: string, weather: WeatherConditions = {}): { crop: string; score: number }[] {
    return [...this.tables.crops.keys()]
      .map(crop => ({ crop, score: this.getCropSuitability(crop, state, weather) }))
      .sort((a, b) => b.score - a.score);
  }
}
