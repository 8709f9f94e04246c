import { AnalysisConfig } from '../config';
import { InvalidConfigError } from '../errors';
import {
  PortfolioAllocation,
  PortfolioSimulation,
  ShortPortfolio,
  ShortRecommendation,
  SimulatedBet,
} from '../types';
import { normalPDF } from './probability';

/**
 * Fractional Kelly stake for a binary contract paying 1.
 *
 * Net odds are b = (1 - price) / price, so f* = (p(b + 1) - 1) / b reduces to
 * (p - price) / (1 - price). The result is scaled by `fraction` and capped at
 * the whole bankroll.
 */
export function calculateKellyBet(probability: number, price: number, fraction: number): number {
  if (price <= 0 || price >= 1) return 0;
  if (probability <= 0 || probability >= 1) return 0;

  const kelly = (probability - price) / (1 - price);
  return Math.min(1, Math.max(0, kelly) * fraction);
}

export interface PortfolioAnalyzerOptions {
  samples: number;
  stdMultiplier: number;
}

const DEFAULT_OPTIONS: PortfolioAnalyzerOptions = {
  samples: 1000,
  stdMultiplier: 4,
};

/**
 * Evaluates a book of bets on one temperature outcome by quadrature over the
 * forecast distribution. The grid is fixed, so results are reproducible.
 */
export class PortfolioAnalyzer {
  private options: PortfolioAnalyzerOptions;

  constructor(
    private readonly mean: number,
    private readonly std: number,
    options: Partial<PortfolioAnalyzerOptions> = {}
  ) {
    if (!Number.isFinite(std) || std <= 0) {
      throw new InvalidConfigError(`Portfolio standard deviation must be > 0 (got ${std})`);
    }
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (!Number.isInteger(this.options.samples) || this.options.samples < 2) {
      throw new InvalidConfigError(`Portfolio samples must be an integer >= 2 (got ${this.options.samples})`);
    }
  }

  static fromConfig(mean: number, config: AnalysisConfig): PortfolioAnalyzer {
    return new PortfolioAnalyzer(mean, config.forecastStdDevC, {
      samples: config.portfolioSamples,
      stdMultiplier: config.portfolioStdMultiplier,
    });
  }

  /**
   * Evenly spaced temperatures over mean ± stdMultiplier·std, both ends included.
   */
  grid(): number[] {
    const { samples, stdMultiplier } = this.options;
    const lo = this.mean - stdMultiplier * this.std;
    const hi = this.mean + stdMultiplier * this.std;
    const step = (hi - lo) / (samples - 1);

    const temps: number[] = [];
    for (let i = 0; i < samples; i++) {
      temps.push(i === samples - 1 ? hi : lo + step * i);
    }
    return temps;
  }

  /**
   * P&L of holding one unit of every bet, evaluated at each grid temperature
   * and weighted by the forecast density.
   */
  simulatePortfolio(bets: SimulatedBet[]): PortfolioSimulation {
    const temps = this.grid();

    let weightedPnl = 0;
    let profitWeight = 0;
    let totalWeight = 0;
    let minPnl = Infinity;
    let maxPnl = -Infinity;

    for (const t of temps) {
      let roundPnl = 0;
      for (const bet of bets) {
        const inRange = bet.minC < t && t < bet.maxC;
        const won = bet.side === 'LONG' ? inRange : !inRange;
        roundPnl += won ? 1.0 - bet.price : -bet.price;
      }

      const weight = normalPDF(t, this.mean, this.std);
      totalWeight += weight;
      weightedPnl += roundPnl * weight;
      if (roundPnl > 0) profitWeight += weight;

      minPnl = Math.min(minPnl, roundPnl);
      maxPnl = Math.max(maxPnl, roundPnl);
    }

    return {
      expectedPnl: weightedPnl / totalWeight,
      probProfit: profitWeight / totalWeight,
      minPnl,
      maxPnl,
    };
  }

  /**
   * One unit of each +EV short, simulated together, plus a Kelly stake per leg.
   *
   * Stakes are sized leg by leg. All legs settle on the same temperature, so the
   * combined stake can exceed what a joint optimisation would allow.
   */
  recommendShortPortfolio(
    shorts: ShortRecommendation[],
    kellyFraction: number,
    bankrollUnit = 100
  ): ShortPortfolio | null {
    if (shorts.length === 0) return null;

    const simulation = this.simulatePortfolio(
      shorts.map((s): SimulatedBet => ({ side: 'SHORT', minC: s.minC, maxC: s.maxC, price: s.price }))
    );

    const allocations: PortfolioAllocation[] = shorts.map(s => {
      const stake = calculateKellyBet(s.probabilityWin, s.price, kellyFraction);
      return {
        bucketLabel: s.bucketLabel,
        kellyFraction: stake,
        kellyPct: stake * 100,
        amount: stake * bankrollUnit,
      };
    });

    return {
      combinedProbProfit: simulation.probProfit,
      expectedTotalReturn: simulation.expectedPnl,
      simulation,
      allocations,
    };
  }
}
