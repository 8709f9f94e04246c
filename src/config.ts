import dotenv from 'dotenv';
import { InvalidConfigError } from './errors';

// Load environment variables
dotenv.config();

export interface Config {
  port: number;
  nodeEnv: string;
  dashboardPassword: string;
  scanCron: string;
  gammaApiUrl: string;
  geocodingUrl: string;
  forecastUrl: string;
  historicalForecastUrl: string;
  archiveUrl: string;
  weatherTagId: string;
  requestTimeoutMs: number;
}

/**
 * Tunables of the analysis engine. Every engine entry point takes one of these
 * explicitly; nothing in the engine reads the environment.
 */
export interface AnalysisConfig {
  /** Standard deviation of the forecast error, in °C. */
  forecastStdDevC: number;
  evThresholdLong: number;
  evThresholdShort: number;
  evThresholdStrategy: number;
  /** Half-width of the blanket coverage window, in standard deviations. */
  blanketWindowSigmas: number;
  /** Shorts costing more than this have no meaningful YES bid behind them. */
  maxShortPrice: number;
  kellyFraction: number;
  portfolioSamples: number;
  portfolioStdMultiplier: number;
  /** Notional bankroll used to express Kelly stakes as an amount. */
  bankrollUnit: number;
}

// Benchmark (Jan 2026) observed ~1.1°C; 1.5°C leaves headroom.
export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  forecastStdDevC: 1.5,
  evThresholdLong: 0.05,
  evThresholdShort: 0.10,
  evThresholdStrategy: 0.05,
  blanketWindowSigmas: 1.5,
  maxShortPrice: 0.995,
  kellyFraction: 0.25,
  portfolioSamples: 1000,
  portfolioStdMultiplier: 4,
  bankrollUnit: 100,
});

// Common abbreviations used in event titles
export const CITY_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  NYC: 'New York',
  LA: 'Los Angeles',
  SF: 'San Francisco',
  DC: 'Washington',
  CHI: 'Chicago',
});

function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name] || defaultValue;
  if (!value) {
    throw new InvalidConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  const num = parseFloat(value);
  if (isNaN(num)) {
    throw new InvalidConfigError(`Environment variable ${name} must be a number`);
  }
  return num;
}

export function loadConfig(): Config {
  return {
    port: getEnvNumber('PORT', 3000),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    dashboardPassword: getEnvVar('DASHBOARD_PASSWORD', 'changeme'),
    scanCron: getEnvVar('WEATHER_SCAN_CRON', '*/15 * * * *'),
    gammaApiUrl: getEnvVar('GAMMA_API_URL', 'https://gamma-api.polymarket.com'),
    geocodingUrl: getEnvVar('GEOCODING_URL', 'https://geocoding-api.open-meteo.com/v1/search'),
    forecastUrl: getEnvVar('FORECAST_URL', 'https://api.open-meteo.com/v1/forecast'),
    historicalForecastUrl: getEnvVar(
      'HISTORICAL_FORECAST_URL',
      'https://historical-forecast-api.open-meteo.com/v1/forecast'
    ),
    archiveUrl: getEnvVar('ARCHIVE_URL', 'https://archive-api.open-meteo.com/v1/archive'),
    weatherTagId: getEnvVar('WEATHER_TAG_ID', '84'),
    requestTimeoutMs: getEnvNumber('REQUEST_TIMEOUT_MS', 10_000),
  };
}

function requirePositive(name: keyof AnalysisConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(`${name} must be a positive number (got ${value})`);
  }
}

function requireFinite(name: keyof AnalysisConfig, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidConfigError(`${name} must be a finite number (got ${value})`);
  }
}

/**
 * Fails fast on settings the engine cannot run with.
 */
export function validateAnalysisConfig(config: AnalysisConfig): void {
  requirePositive('forecastStdDevC', config.forecastStdDevC);
  requireFinite('evThresholdLong', config.evThresholdLong);
  requireFinite('evThresholdShort', config.evThresholdShort);
  requireFinite('evThresholdStrategy', config.evThresholdStrategy);
  requirePositive('blanketWindowSigmas', config.blanketWindowSigmas);
  requirePositive('portfolioStdMultiplier', config.portfolioStdMultiplier);
  requirePositive('bankrollUnit', config.bankrollUnit);

  if (!(config.maxShortPrice > 0 && config.maxShortPrice <= 1)) {
    throw new InvalidConfigError(`maxShortPrice must be in (0, 1] (got ${config.maxShortPrice})`);
  }
  if (!(config.kellyFraction > 0 && config.kellyFraction <= 1)) {
    throw new InvalidConfigError(`kellyFraction must be in (0, 1] (got ${config.kellyFraction})`);
  }
  if (!Number.isInteger(config.portfolioSamples) || config.portfolioSamples < 2) {
    throw new InvalidConfigError(
      `portfolioSamples must be an integer >= 2 (got ${config.portfolioSamples})`
    );
  }
}

export function createAnalysisConfig(overrides: Partial<AnalysisConfig> = {}): Readonly<AnalysisConfig> {
  const config: AnalysisConfig = { ...DEFAULT_ANALYSIS_CONFIG, ...overrides };
  validateAnalysisConfig(config);
  return Object.freeze(config);
}

export function loadAnalysisConfig(): Readonly<AnalysisConfig> {
  const d = DEFAULT_ANALYSIS_CONFIG;
  return createAnalysisConfig({
    forecastStdDevC: getEnvNumber('FORECAST_STD_DEV_C', d.forecastStdDevC),
    evThresholdLong: getEnvNumber('EV_THRESHOLD_LONG', d.evThresholdLong),
    evThresholdShort: getEnvNumber('EV_THRESHOLD_SHORT', d.evThresholdShort),
    evThresholdStrategy: getEnvNumber('EV_THRESHOLD_STRATEGY', d.evThresholdStrategy),
    blanketWindowSigmas: getEnvNumber('BLANKET_WINDOW_SIGMAS', d.blanketWindowSigmas),
    kellyFraction: getEnvNumber('KELLY_FRACTION', d.kellyFraction),
    portfolioSamples: getEnvNumber('PORTFOLIO_SAMPLES', d.portfolioSamples),
    portfolioStdMultiplier: getEnvNumber('PORTFOLIO_STD_MULTIPLIER', d.portfolioStdMultiplier),
  });
}
