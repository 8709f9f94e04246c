import { createLogger } from '../utils/logger';
import { asNumberArray, buildUrl, fetchJson, isRecord } from '../utils/http';
import { Coordinates, Forecast } from '../types';

const logger = createLogger('OpenMeteo');

export interface OpenMeteoConfig {
  geocodingUrl: string;
  forecastUrl: string;
  historicalForecastUrl: string;
  archiveUrl: string;
  requestTimeoutMs: number;
}

export interface DailySeries {
  dates: string[];
  values: Array<number | null>;  // °C, null where the provider has no value
}

function parseDailySeries(raw: unknown, field: string): DailySeries | null {
  if (!isRecord(raw) || !isRecord(raw.daily)) return null;
  const time = raw.daily.time;
  const values = asNumberArray(raw.daily[field]);
  if (!Array.isArray(time) || !values) return null;
  return { dates: time.map(t => String(t)), values };
}

/**
 * Geocoding and daily temperature forecasts from Open-Meteo.
 * All temperatures are °C.
 */
export class OpenMeteoClient {
  constructor(private config: OpenMeteoConfig) {}

  async getCoordinates(city: string): Promise<Coordinates | null> {
    const url = buildUrl(this.config.geocodingUrl, {
      name: city,
      count: 1,
      language: 'en',
      format: 'json',
    });

    try {
      const data = await fetchJson(url, this.config.requestTimeoutMs);
      if (!isRecord(data) || !Array.isArray(data.results) || data.results.length === 0) {
        return null;
      }
      const first: unknown = data.results[0];
      if (!isRecord(first) || typeof first.latitude !== 'number' || typeof first.longitude !== 'number') {
        return null;
      }
      return { latitude: first.latitude, longitude: first.longitude };
    } catch (error) {
      logger.error(`Error fetching coordinates for ${city}`, error);
      return null;
    }
  }

  /**
   * Forecast daily max/min for one date (YYYY-MM-DD). Null when the date is
   * outside the provider's range or the request fails.
   */
  async getDailyForecast(coords: Coordinates, date: string): Promise<Forecast | null> {
    const url = buildUrl(this.config.forecastUrl, {
      latitude: coords.latitude,
      longitude: coords.longitude,
      daily: 'temperature_2m_max,temperature_2m_min',
      timezone: 'auto',
      start_date: date,
      end_date: date,
    });

    try {
      const data = await fetchJson(url, this.config.requestTimeoutMs);
      const max = parseDailySeries(data, 'temperature_2m_max');
      const min = parseDailySeries(data, 'temperature_2m_min');
      const maxTemp = max?.values[0] ?? null;
      const minTemp = min?.values[0] ?? null;
      if (maxTemp === null || minTemp === null) return null;
      return { maxTemp, minTemp };
    } catch (error) {
      logger.error(`Error fetching forecast for ${date}`, error);
      return null;
    }
  }

  /**
   * Daily highs as they were forecast at the time (historical forecast API).
   */
  async getHistoricalForecastMax(coords: Coordinates, startDate: string, endDate: string): Promise<DailySeries | null> {
    return this.getDailyMax(this.config.historicalForecastUrl, coords, startDate, endDate);
  }

  /**
   * Observed daily highs (reanalysis archive).
   */
  async getObservedMax(coords: Coordinates, startDate: string, endDate: string): Promise<DailySeries | null> {
    return this.getDailyMax(this.config.archiveUrl, coords, startDate, endDate);
  }

  private async getDailyMax(
    baseUrl: string,
    coords: Coordinates,
    startDate: string,
    endDate: string
  ): Promise<DailySeries | null> {
    const url = buildUrl(baseUrl, {
      latitude: coords.latitude,
      longitude: coords.longitude,
      start_date: startDate,
      end_date: endDate,
      daily: 'temperature_2m_max',
      timezone: 'auto',
    });

    try {
      const data = await fetchJson(url, this.config.requestTimeoutMs);
      return parseDailySeries(data, 'temperature_2m_max');
    } catch (error) {
      logger.error(`Error fetching daily highs ${startDate}..${endDate}`, error);
      return null;
    }
  }
}
