// Gamma API types (market listing)

export interface GammaMarket {
  id: string;
  question: string;
  conditionId?: string;
  slug?: string;
  groupItemTitle?: string;
  outcomes?: string;          // JSON string: '["Yes", "No"]'
  outcomePrices?: string;     // JSON string: '["0.20", "0.80"]'
  bestBid?: string | number | null;
  bestAsk?: string | number | null;
  active?: boolean;
  closed?: boolean;
}

export interface GammaEvent {
  id?: string;
  title: string;
  slug?: string;
  startDate?: string;
  endDate?: string;
  markets: GammaMarket[];
}

// Temperature buckets

export type TempUnit = 'F' | 'C';

export const UNBOUNDED_LOW = -999;
export const UNBOUNDED_HIGH = 999;

export interface TempBucket {
  min: number;
  max: number;
  unit: TempUnit;
}

export interface ParsedEventTitle {
  city: string;
  date: string;  // YYYY-MM-DD
}

// Collaborator results

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface Forecast {
  maxTemp: number;  // °C
  minTemp: number;  // °C
}

// Pricing

export type PriceSource = 'order_book' | 'outcome_prices';

export type ResolvedPrices =
  | {
      source: 'order_book';
      priceYes: number;
      priceNo: number;   // 1 - bestBid
      bestBid: number;
    }
  | {
      source: 'outcome_prices';  // last trade / mid, unreliable in thin books
      priceYes: number;
      priceNo: number;
    }
  | { source: 'none' };

// Recommendations

export interface LongRecommendation {
  type: 'LONG';
  marketId: string;
  question: string;
  bucket: TempBucket;
  bucketLabel: string;
  price: number;
  priceSource: PriceSource;
  probability: number;
  ev: number;
}

export interface ShortRecommendation {
  type: 'SHORT';
  marketId: string;
  question: string;
  bucket: TempBucket;
  bucketLabel: string;
  price: number;             // Cost to buy NO
  impliedYesPrice: number;   // The YES bid we are selling into
  probabilityWin: number;    // P(NO)
  probabilityYes: number;
  ev: number;
  minC: number;
  maxC: number;
}

export interface CoverageCandidate {
  marketId: string;
  question: string;
  bucketLabel: string;
  minC: number;
  maxC: number;
  price: number;
  priceSource: PriceSource;
  probability: number;
  ev: number;
}

export interface BlanketStrategy {
  type: 'BLANKET';
  legs: CoverageCandidate[];
  buckets: string[];
  totalCost: number;
  totalProbability: number;
  totalEv: number;
  expectedProfitIfWin: number;
  roi: number | null;   // Percent; null when the legs cost nothing
  roiLabel: string;
}

// Portfolio

export type BetSide = 'LONG' | 'SHORT';

export interface SimulatedBet {
  side: BetSide;
  minC: number;
  maxC: number;
  price: number;
}

export interface PortfolioSimulation {
  expectedPnl: number;
  probProfit: number;
  minPnl: number;
  maxPnl: number;
}

export interface PortfolioAllocation {
  bucketLabel: string;
  kellyFraction: number;
  kellyPct: number;
  amount: number;
}

export interface ShortPortfolio {
  combinedProbProfit: number;
  expectedTotalReturn: number;
  simulation: PortfolioSimulation;
  allocations: PortfolioAllocation[];
}

// Engine output

export interface SkippedMarket {
  marketId: string;
  question: string;
  reason: string;
}

export interface EventAnalysis {
  longs: LongRecommendation[];
  blanket: BlanketStrategy | null;
  shorts: ShortRecommendation[];
  portfolio: ShortPortfolio | null;
  skipped: SkippedMarket[];
  modelCoverage: number;  // Sum of P(YES) over parsed buckets; ~1 for an exhaustive ladder
}

// API Response Types
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
