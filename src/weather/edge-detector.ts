import { createLogger } from '../utils/logger';
import { AnalysisConfig } from '../config';
import {
  BlanketStrategy,
  CoverageCandidate,
  EventAnalysis,
  GammaEvent,
  GammaMarket,
  LongRecommendation,
  ResolvedPrices,
  ShortRecommendation,
  SkippedMarket,
  TempBucket,
} from '../types';
import { bucketLabel, parseBucketQuestion } from './question-parser';
import { bucketBoundsCelsius, probabilityInRange } from './probability';
import { resolvePrices } from './pricing';
import { PortfolioAnalyzer } from './portfolio';

const logger = createLogger('WeatherEdge');

/**
 * A market whose question parsed, with its model probability and prices.
 */
export interface AnalyzedMarket {
  market: GammaMarket;
  bucket: TempBucket;
  label: string;
  minC: number;
  maxC: number;
  probability: number;  // P(YES) under the forecast model
  prices: ResolvedPrices;
}

export interface PreparedMarkets {
  analyzed: AnalyzedMarket[];
  skipped: SkippedMarket[];
}

/**
 * Parse each market's bucket and evaluate it once against the forecast.
 * Markets whose question does not parse are skipped, never partially analyzed.
 */
export function prepareMarkets(
  markets: GammaMarket[],
  forecastMaxC: number,
  config: AnalysisConfig
): PreparedMarkets {
  const analyzed: AnalyzedMarket[] = [];
  const skipped: SkippedMarket[] = [];

  for (const market of markets) {
    const question = market.question || '';
    const bucket = parseBucketQuestion(question);
    if (!bucket) {
      logger.warn(`Skipping market ${market.id}: unrecognized question "${question}"`);
      skipped.push({ marketId: market.id, question, reason: 'unparseable question' });
      continue;
    }

    const { minC, maxC } = bucketBoundsCelsius(bucket);
    analyzed.push({
      market,
      bucket,
      label: bucketLabel(bucket),
      minC,
      maxC,
      probability: probabilityInRange(forecastMaxC, minC, maxC, config.forecastStdDevC),
      prices: resolvePrices(market),
    });
  }

  return { analyzed, skipped };
}

/**
 * Single-leg YES bets whose model probability beats the ask.
 */
export function findLongOpportunities(
  markets: AnalyzedMarket[],
  config: AnalysisConfig
): LongRecommendation[] {
  const longs: LongRecommendation[] = [];

  for (const m of markets) {
    if (m.prices.source === 'none' || m.prices.priceYes <= 0) continue;

    const ev = m.probability - m.prices.priceYes;
    if (ev > config.evThresholdLong) {
      longs.push({
        type: 'LONG',
        marketId: m.market.id,
        question: m.market.question,
        bucket: m.bucket,
        bucketLabel: m.label,
        price: m.prices.priceYes,
        priceSource: m.prices.source,
        probability: m.probability,
        ev,
      });
    }
  }

  return longs.sort((a, b) => b.ev - a.ev);
}

/**
 * Buy YES on every bucket overlapping forecast ± blanketWindowSigmas·σ.
 * Returns null unless the combined legs clear the strategy threshold.
 */
export function buildBlanketStrategy(
  markets: AnalyzedMarket[],
  forecastMaxC: number,
  config: AnalysisConfig
): BlanketStrategy | null {
  const halfWidth = config.blanketWindowSigmas * config.forecastStdDevC;
  const lowerBound = forecastMaxC - halfWidth;
  const upperBound = forecastMaxC + halfWidth;

  const legs: CoverageCandidate[] = [];
  for (const m of markets) {
    if (!(m.minC < upperBound && m.maxC > lowerBound)) continue;
    if (m.prices.source === 'none' || m.prices.priceYes <= 0) continue;

    legs.push({
      marketId: m.market.id,
      question: m.market.question,
      bucketLabel: m.label,
      minC: m.minC,
      maxC: m.maxC,
      price: m.prices.priceYes,
      priceSource: m.prices.source,
      probability: m.probability,
      ev: m.probability - m.prices.priceYes,
    });
  }

  if (legs.length === 0) return null;

  // Present as a contiguous ladder
  legs.sort((a, b) => a.minC - b.minC);

  const totalCost = legs.reduce((sum, l) => sum + l.price, 0);
  const totalProbability = legs.reduce((sum, l) => sum + l.probability, 0);
  const totalEv = totalProbability - totalCost;

  if (totalEv <= config.evThresholdStrategy) return null;

  const roi = totalCost > 0 ? (totalEv / totalCost) * 100 : null;

  return {
    type: 'BLANKET',
    legs,
    buckets: legs.map(l => l.bucketLabel),
    totalCost,
    totalProbability,
    totalEv,
    expectedProfitIfWin: 1.0 - totalCost,
    roi,
    roiLabel: roi === null ? 'Inf%' : `${roi.toFixed(1)}%`,
  };
}

/**
 * Single-leg NO bets. Only a real YES bid prices the NO side: markets priced
 * from outcomePrices alone are never shorted.
 */
export function findShortOpportunities(
  markets: AnalyzedMarket[],
  config: AnalysisConfig
): ShortRecommendation[] {
  const shorts: ShortRecommendation[] = [];

  for (const m of markets) {
    if (m.prices.source !== 'order_book' || m.prices.bestBid <= 0) continue;

    const priceNo = m.prices.priceNo;
    if (priceNo > config.maxShortPrice) continue;

    const probabilityWin = 1.0 - m.probability;
    const ev = probabilityWin - priceNo;
    if (ev > config.evThresholdShort) {
      shorts.push({
        type: 'SHORT',
        marketId: m.market.id,
        question: m.market.question,
        bucket: m.bucket,
        bucketLabel: m.label,
        price: priceNo,
        impliedYesPrice: m.prices.bestBid,
        probabilityWin,
        probabilityYes: m.probability,
        ev,
        minC: m.minC,
        maxC: m.maxC,
      });
    }
  }

  return shorts.sort((a, b) => b.ev - a.ev);
}

/**
 * Main edge detection: every recommendation for one event, given the forecast
 * daily high in °C.
 */
export function analyzeEvent(
  event: GammaEvent,
  forecastMaxC: number,
  config: AnalysisConfig
): EventAnalysis {
  const { analyzed, skipped } = prepareMarkets(event.markets || [], forecastMaxC, config);

  const longs = findLongOpportunities(analyzed, config);
  const blanket = buildBlanketStrategy(analyzed, forecastMaxC, config);
  const shorts = findShortOpportunities(analyzed, config);

  // Shorts settle on the same draw, so a lone short needs no joint simulation
  const portfolio = shorts.length > 1
    ? PortfolioAnalyzer.fromConfig(forecastMaxC, config)
        .recommendShortPortfolio(shorts, config.kellyFraction, config.bankrollUnit)
    : null;

  const modelCoverage = analyzed.reduce((sum, m) => sum + m.probability, 0);
  if (analyzed.length > 0 && (modelCoverage < 0.9 || modelCoverage > 1.1)) {
    logger.debug(`${event.title}: bucket probabilities sum to ${modelCoverage.toFixed(3)}`);
  }

  for (const rec of longs) {
    logger.info(`🎯 LONG ${rec.bucketLabel} @ ${(rec.price * 100).toFixed(1)}¢ | Model: ${(rec.probability * 100).toFixed(1)}% | EV: ${rec.ev.toFixed(4)}`);
  }
  if (blanket) {
    logger.info(`🎯 BLANKET ${blanket.buckets.join(', ')} | Cost: ${blanket.totalCost.toFixed(3)} | EV: ${blanket.totalEv.toFixed(4)}`);
  }
  for (const rec of shorts) {
    logger.info(`🎯 SHORT ${rec.bucketLabel} @ ${(rec.price * 100).toFixed(1)}¢ | Model NO: ${(rec.probabilityWin * 100).toFixed(1)}% | EV: ${rec.ev.toFixed(4)}`);
  }

  return { longs, blanket, shorts, portfolio, skipped, modelCoverage };
}
