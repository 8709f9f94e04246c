/**
 * Forecast Benchmark Module
 *
 * Measures how far past forecasts of the daily high landed from the observed
 * high, to check the forecast standard deviation the analyzer assumes.
 */

import { createLogger } from '../utils/logger';
import { Coordinates } from '../types';
import { DailySeries } from '../weather/open-meteo-client';

const logger = createLogger('Benchmark');

export const BENCHMARK_HISTORY_DAYS = 30;
// Reanalysis (observed) data lags by a few days
export const BENCHMARK_SAFETY_DAYS = 5;
// Safety buffer applied to the observed error spread
const RECOMMENDATION_BUFFER = 1.1;

export const BENCHMARK_CITIES: Record<string, Coordinates> = {
  'New York': { latitude: 40.7128, longitude: -74.006 },
  London: { latitude: 51.5074, longitude: -0.1278 },
  Toronto: { latitude: 43.65107, longitude: -79.347015 },
  Seattle: { latitude: 47.6062, longitude: -122.3321 },
  Seoul: { latitude: 37.5665, longitude: 126.978 },
};

export interface HistorySource {
  getHistoricalForecastMax(coords: Coordinates, startDate: string, endDate: string): Promise<DailySeries | null>;
  getObservedMax(coords: Coordinates, startDate: string, endDate: string): Promise<DailySeries | null>;
}

export interface ErrorSummary {
  count: number;
  bias: number;    // Mean of actual - forecast
  stdDev: number;  // Sample standard deviation
}

export interface CityBenchmark {
  city: string;
  summary: ErrorSummary | null;
  underestimatesRisk: boolean;
}

export interface BenchmarkResults {
  startDate: string;
  endDate: string;
  assumedStdDev: number;
  cities: CityBenchmark[];
  overall: ErrorSummary | null;
  recommendedStdDev: number | null;
}

/**
 * actual - forecast for every date both series have a value for.
 */
export function compareSeries(actual: DailySeries, forecast: DailySeries): number[] {
  const forecastByDate = new Map<string, number | null>();
  forecast.dates.forEach((date, i) => forecastByDate.set(date, forecast.values[i] ?? null));

  const errors: number[] = [];
  actual.dates.forEach((date, i) => {
    const act = actual.values[i];
    const fcst = forecastByDate.get(date);
    if (act === null || act === undefined || fcst === null || fcst === undefined) return;
    errors.push(act - fcst);
  });
  return errors;
}

export function summarizeErrors(errors: number[]): ErrorSummary | null {
  if (errors.length < 2) return null;

  const mean = errors.reduce((sum, e) => sum + e, 0) / errors.length;
  const variance = errors.reduce((sum, e) => sum + (e - mean) ** 2, 0) / (errors.length - 1);

  return { count: errors.length, bias: mean, stdDev: Math.sqrt(variance) };
}

function isoDaysBefore(now: Date, days: number): string {
  const d = new Date(now);
  d.setUTCDate(d.getUTCDate() - days);
  return d.toISOString().split('T')[0];
}

export class ForecastBenchmark {
  constructor(
    private source: HistorySource,
    private assumedStdDev: number
  ) {}

  async run(
    cities: Record<string, Coordinates> = BENCHMARK_CITIES,
    now: Date = new Date()
  ): Promise<BenchmarkResults> {
    const startDate = isoDaysBefore(now, BENCHMARK_HISTORY_DAYS + BENCHMARK_SAFETY_DAYS);
    const endDate = isoDaysBefore(now, BENCHMARK_SAFETY_DAYS);

    logger.info(`Running model benchmark ${startDate}..${endDate} (assumed std dev ${this.assumedStdDev}°C)`);

    const results: CityBenchmark[] = [];
    const allErrors: number[] = [];

    for (const [city, coords] of Object.entries(cities)) {
      const actual = await this.source.getObservedMax(coords, startDate, endDate);
      if (!actual) {
        logger.warn(`${city}: failed to get observed highs (archive data likely not available yet)`);
        results.push({ city, summary: null, underestimatesRisk: false });
        continue;
      }

      const forecast = await this.source.getHistoricalForecastMax(coords, startDate, endDate);
      if (!forecast) {
        logger.warn(`${city}: failed to get historical forecasts`);
        results.push({ city, summary: null, underestimatesRisk: false });
        continue;
      }

      const errors = compareSeries(actual, forecast);
      allErrors.push(...errors);

      const summary = summarizeErrors(errors);
      const underestimatesRisk = summary !== null && summary.stdDev > this.assumedStdDev;
      if (summary) {
        logger.info(`${city}: bias ${summary.bias.toFixed(2)}°C, observed std dev ${summary.stdDev.toFixed(2)}°C`);
        if (underestimatesRisk) {
          logger.warn(`${city}: observed volatility ${summary.stdDev.toFixed(2)} > model ${this.assumedStdDev}, model is under-estimating risk`);
        }
      }
      results.push({ city, summary, underestimatesRisk });
    }

    const overall = summarizeErrors(allErrors);
    const recommendedStdDev = overall ? overall.stdDev * RECOMMENDATION_BUFFER : null;

    if (overall && recommendedStdDev !== null) {
      logger.info(`Overall: ${overall.count} days, bias ${overall.bias.toFixed(2)}°C, std dev ${overall.stdDev.toFixed(2)}°C`);
      logger.info(`Recommendation: set FORECAST_STD_DEV_C to ${recommendedStdDev.toFixed(1)}`);
    }

    return {
      startDate,
      endDate,
      assumedStdDev: this.assumedStdDev,
      cities: results,
      overall,
      recommendedStdDev,
    };
  }
}
