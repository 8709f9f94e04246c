import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '../errors';
import { calculateKellyBet, PortfolioAnalyzer } from '../weather/portfolio';
import { ShortRecommendation } from '../types';

function short(label: string, minC: number, maxC: number, price: number, probabilityWin: number): ShortRecommendation {
  return {
    type: 'SHORT',
    marketId: label,
    question: label,
    bucket: { min: minC, max: maxC, unit: 'C' },
    bucketLabel: label,
    price,
    impliedYesPrice: 1 - price,
    probabilityWin,
    probabilityYes: 1 - probabilityWin,
    ev: probabilityWin - price,
    minC,
    maxC,
  };
}

describe('calculateKellyBet', () => {
  it('computes the full Kelly stake', () => {
    expect(calculateKellyBet(0.6, 0.5, 1)).toBeCloseTo(0.2, 10);
    expect(calculateKellyBet(0.99, 0.01, 1)).toBeCloseTo(0.98 / 0.99, 10);
  });

  it('scales by the fraction', () => {
    for (const [p, price] of [[0.6, 0.5], [0.8, 0.3], [0.95, 0.9]]) {
      expect(calculateKellyBet(p, price, 0.25)).toBeCloseTo(calculateKellyBet(p, price, 1) * 0.25, 12);
    }
  });

  it('never stakes on a negative edge', () => {
    expect(calculateKellyBet(0.4, 0.5, 1)).toBe(0);
  });

  it('guards degenerate prices and probabilities', () => {
    expect(calculateKellyBet(0.6, 0, 1)).toBe(0);
    expect(calculateKellyBet(0.6, 1, 1)).toBe(0);
    expect(calculateKellyBet(0, 0.5, 1)).toBe(0);
    expect(calculateKellyBet(1, 0.5, 1)).toBe(0);
  });
});

describe('PortfolioAnalyzer', () => {
  it('spans mean ± stdMultiplier·std', () => {
    const analyzer = new PortfolioAnalyzer(0, 1, { samples: 5 });
    expect(analyzer.grid()).toEqual([-4, -2, 0, 2, 4]);
  });

  it('rejects unusable parameters', () => {
    expect(() => new PortfolioAnalyzer(0, 0)).toThrow(InvalidConfigError);
    expect(() => new PortfolioAnalyzer(0, 1, { samples: 1 })).toThrow(InvalidConfigError);
    expect(() => new PortfolioAnalyzer(0, 1, { samples: 10.5 })).toThrow(InvalidConfigError);
  });

  it('simulates a single short', () => {
    const sim = new PortfolioAnalyzer(10, 2).simulatePortfolio([{ side: 'SHORT', minC: 8, maxC: 12, price: 0.3 }]);

    expect(sim.probProfit).toBeCloseTo(0.3168, 3);
    expect(sim.expectedPnl).toBeCloseTo(0.0168, 3);
    expect(sim.minPnl).toBeCloseTo(-0.3, 10);
    expect(sim.maxPnl).toBeCloseTo(0.7, 10);
  });

  it('simulates a single long', () => {
    const sim = new PortfolioAnalyzer(10, 2).simulatePortfolio([{ side: 'LONG', minC: 8, maxC: 12, price: 0.5 }]);

    expect(sim.probProfit).toBeCloseTo(0.6832, 3);
    expect(sim.expectedPnl).toBeCloseTo(0.1832, 3);
  });

  it('excludes bucket edges from the range', () => {
    // Grid is [-4, -2, 0, 2, 4]; the short loses only strictly inside (0, 2)
    const sim = new PortfolioAnalyzer(0, 1, { samples: 5 }).simulatePortfolio([
      { side: 'SHORT', minC: 0, maxC: 2, price: 0.1 },
    ]);
    expect(sim.probProfit).toBe(1);
    expect(sim.minPnl).toBeCloseTo(0.9, 10);
  });

  it('is deterministic', () => {
    const bets = [{ side: 'SHORT' as const, minC: 8, maxC: 12, price: 0.3 }];
    const a = new PortfolioAnalyzer(10, 2).simulatePortfolio(bets);
    const b = new PortfolioAnalyzer(10, 2).simulatePortfolio(bets);
    expect(a).toEqual(b);
  });

  it('sizes a short portfolio with fractional Kelly', () => {
    const analyzer = new PortfolioAnalyzer(10, 2);
    const portfolio = analyzer.recommendShortPortfolio(
      [short('0 to 5 F', -17.8, -15, 0.2, 0.85), short('50 to 55 F', 10, 12.8, 0.3, 0.75)],
      0.25
    );

    expect(portfolio).not.toBeNull();
    if (!portfolio) return;
    expect(portfolio.allocations.map(a => a.bucketLabel)).toEqual(['0 to 5 F', '50 to 55 F']);
    expect(portfolio.allocations[0].kellyFraction).toBeCloseTo(0.203125, 10);
    expect(portfolio.allocations[0].kellyPct).toBeCloseTo(20.3125, 8);
    expect(portfolio.allocations[0].amount).toBeCloseTo(20.3125, 8);
    expect(portfolio.allocations[1].kellyFraction).toBeCloseTo(0.160714, 5);
    expect(portfolio.combinedProbProfit).toBe(portfolio.simulation.probProfit);
    expect(portfolio.expectedTotalReturn).toBe(portfolio.simulation.expectedPnl);
    expect(portfolio.combinedProbProfit).toBe(1);
    expect(portfolio.expectedTotalReturn).toBeCloseTo(1.0805, 3);
  });

  it('scales amounts by the bankroll unit', () => {
    const portfolio = new PortfolioAnalyzer(10, 2).recommendShortPortfolio(
      [short('a', -17.8, -15, 0.2, 0.85)],
      0.25,
      1000
    );
    expect(portfolio?.allocations[0].amount).toBeCloseTo(203.125, 8);
  });

  it('returns null without shorts', () => {
    expect(new PortfolioAnalyzer(10, 2).recommendShortPortfolio([], 0.25)).toBeNull();
  });
});
