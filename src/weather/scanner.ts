import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger';
import { AnalysisConfig } from '../config';
import { errorMessage } from '../errors';
import { Coordinates, EventAnalysis, Forecast, GammaEvent } from '../types';
import { parseEventTitle } from './question-parser';
import { analyzeEvent } from './edge-detector';
import { toFahrenheit } from './probability';

const logger = createLogger('WeatherScanner');

export interface EventSource {
  getWeatherEvents(): Promise<GammaEvent[]>;
}

export interface WeatherSource {
  getCoordinates(city: string): Promise<Coordinates | null>;
  getDailyForecast(coords: Coordinates, date: string): Promise<Forecast | null>;
}

export type ScanEventResult =
  | {
      status: 'analyzed';
      title: string;
      city: string;
      date: string;
      coordinates: Coordinates;
      forecast: Forecast;
      analysis: EventAnalysis;
    }
  | {
      status: 'skipped';
      title: string;
      reason: string;
    };

export interface ScanTotals {
  events: number;
  analyzed: number;
  skipped: number;
  longs: number;
  shorts: number;
  blankets: number;
}

export interface WeatherScanResult {
  scanId: string;
  scannedAt: string;
  events: ScanEventResult[];
  totals: ScanTotals;
}

/**
 * Local calendar date as YYYY-MM-DD.
 */
export function localIsoDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function summarize(events: ScanEventResult[]): ScanTotals {
  const totals: ScanTotals = { events: events.length, analyzed: 0, skipped: 0, longs: 0, shorts: 0, blankets: 0 };
  for (const e of events) {
    if (e.status === 'skipped') {
      totals.skipped++;
      continue;
    }
    totals.analyzed++;
    totals.longs += e.analysis.longs.length;
    totals.shorts += e.analysis.shorts.length;
    if (e.analysis.blanket) totals.blankets++;
  }
  return totals;
}

export class WeatherScanner {
  constructor(
    private events: EventSource,
    private weather: WeatherSource,
    private config: AnalysisConfig
  ) {}

  /**
   * Analyze one event. Anything that stops the analysis yields a skipped
   * result rather than an error.
   */
  async scanEvent(event: GammaEvent, now: Date = new Date()): Promise<ScanEventResult> {
    const title = event.title;
    const skip = (reason: string): ScanEventResult => {
      logger.warn(`[SKIP] ${title}: ${reason}`);
      return { status: 'skipped', title, reason };
    };

    const parsed = parseEventTitle(title, now);
    if (!parsed) return skip('could not parse event title');

    const { city, date } = parsed;

    // Same-day events are already resolving; the forecast may be stale
    if (date <= localIsoDate(now)) {
      return skip(`event date ${date} is today or past`);
    }

    logger.info(`Analyzing Event: ${title} -> ${city}, ${date}`);

    let coordinates: Coordinates | null = null;
    let forecast: Forecast | null = null;
    try {
      coordinates = await this.weather.getCoordinates(city);
      if (coordinates) {
        forecast = await this.weather.getDailyForecast(coordinates, date);
      }
    } catch (error) {
      logger.error(`Weather lookup failed for ${title}`, error);
      return skip(`weather lookup failed: ${errorMessage(error)}`);
    }

    if (!coordinates) return skip(`could not find coordinates for ${city}`);
    if (!forecast) return skip(`no forecast available for ${city} on ${date}`);

    logger.info(`${city}: forecast max ${forecast.maxTemp}°C (${toFahrenheit(forecast.maxTemp).toFixed(1)}°F)`);

    try {
      const analysis = analyzeEvent(event, forecast.maxTemp, this.config);
      return { status: 'analyzed', title, city, date, coordinates, forecast, analysis };
    } catch (error) {
      logger.error(`Analysis failed for ${title}`, error);
      return skip(`analysis failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Main scan function: fetch events, get forecasts, detect opportunities
   */
  async scan(now: Date = new Date()): Promise<WeatherScanResult> {
    const scanId = uuidv4();
    logger.info(`=== WEATHER SCAN ${scanId} ===`);

    const events = await this.events.getWeatherEvents();
    if (events.length === 0) {
      logger.warn('No active weather events found');
    }

    const results: ScanEventResult[] = [];
    for (const event of events) {
      results.push(await this.scanEvent(event, now));
    }

    const totals = summarize(results);
    logger.info(`=== SCAN COMPLETE: ${totals.analyzed}/${totals.events} events analyzed, ${totals.longs} longs, ${totals.shorts} shorts, ${totals.blankets} blankets ===`);

    return {
      scanId,
      scannedAt: now.toISOString(),
      events: results,
      totals,
    };
  }
}
