export { OpenMeteoClient } from './open-meteo-client';
export type { OpenMeteoConfig, DailySeries } from './open-meteo-client';
export {
  BUCKET_MATCHERS,
  parseBucketQuestion,
  parseEventTitle,
  bucketLabel,
} from './question-parser';
export type { BucketMatcher, BucketMatch } from './question-parser';
export {
  erf,
  normalCDF,
  toCelsius,
  toFahrenheit,
  probabilityInRange,
  bucketProbability,
} from './probability';
export { resolvePrices, parseQuote } from './pricing';
export {
  analyzeEvent,
  prepareMarkets,
  findLongOpportunities,
  buildBlanketStrategy,
  findShortOpportunities,
} from './edge-detector';
export type { AnalyzedMarket } from './edge-detector';
export { PortfolioAnalyzer, calculateKellyBet } from './portfolio';
export { WeatherScanner } from './scanner';
export type { WeatherScanResult, ScanEventResult, EventSource, WeatherSource } from './scanner';
export { WeatherScheduler } from './scheduler';
export { DemoEventSource, DemoWeatherSource } from './demo';
export { formatScanReport, formatEventReport } from './report';
