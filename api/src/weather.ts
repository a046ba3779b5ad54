import type { Logger } from './logger.js';
import { cryptoRandom, pick, type RandomSource } from './random.js';

export type WeatherInfo = {
  location: string;
  temperatureC: number;
  conditions: string;
  visibilityKm: number;
  windSpeedKph: number;
  windDirection: string;
};

export interface WeatherProvider {
  /** `null` when no reading is available for the airport. */
  getWeather(airportCode: string): Promise<WeatherInfo | null>;
}

const CONDITIONS = ['Clear', 'Partly Cloudy', 'Overcast', 'Light Rain', 'Thunderstorms', 'Snow', 'Fog'] as const;
const WIND_DIRECTIONS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export class SimulatedWeatherProvider implements WeatherProvider {
  constructor(
    private readonly logger: Logger,
    private readonly random: RandomSource = cryptoRandom
  ) {}

  async getWeather(airportCode: string): Promise<WeatherInfo | null> {
    const code = airportCode.trim().toUpperCase();
    if (!/^[A-Z]{3}$/.test(code)) {
      this.logger.warn({ airportCode }, 'Weather requested for malformed airport code');
      return null;
    }
    const conditions = pick(this.random, CONDITIONS);
    return {
      location: code,
      temperatureC: this.random.int(46) - 10,
      conditions,
      visibilityKm: conditions === 'Fog' ? 1 + this.random.int(3) : 5 + this.random.int(11),
      windSpeedKph: this.random.int(60),
      windDirection: pick(this.random, WIND_DIRECTIONS)
    };
  }
}
