import { GammaMarket, ResolvedPrices } from '../types';

/**
 * Decimal quote from a string or number field. Anything else is absent.
 */
export function parseQuote(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

function parseStringArray(value: unknown): string[] | null {
  if (typeof value !== 'string') return null;
  try {
    const parsed: unknown = JSON.parse(value);
    if (!Array.isArray(parsed)) return null;
    return parsed.map(item => String(item));
  } catch {
    // Malformed JSON counts as missing data
    return null;
  }
}

/**
 * YES price from the `outcomes` / `outcomePrices` pair. Requires exactly a
 * Yes and a No outcome.
 */
function outcomeYesPrice(market: GammaMarket): number | null {
  const outcomes = parseStringArray(market.outcomes);
  const prices = parseStringArray(market.outcomePrices);
  if (!outcomes || !prices || outcomes.length !== 2 || prices.length !== 2) return null;

  const labels = outcomes.map(o => o.trim().toLowerCase());
  const yesIdx = labels.indexOf('yes');
  if (yesIdx === -1 || !labels.includes('no')) return null;

  return parseQuote(prices[yesIdx]);
}

/**
 * Best buy prices for each side of a binary market.
 *
 * 1. bestAsk / bestBid: YES costs the ask, NO costs 1 - bid (buying NO fills a
 *    resting YES bid).
 * 2. outcomePrices: last trade / mid. Poor proxy for executable cost in thin
 *    books, so it is tagged and the short pass refuses it.
 */
export function resolvePrices(market: GammaMarket): ResolvedPrices {
  const bestAsk = parseQuote(market.bestAsk);
  const bestBid = parseQuote(market.bestBid);

  if (bestAsk !== null && bestBid !== null) {
    return {
      source: 'order_book',
      priceYes: bestAsk,
      priceNo: 1.0 - bestBid,
      bestBid,
    };
  }

  const yesPrice = outcomeYesPrice(market);
  if (yesPrice !== null) {
    return {
      source: 'outcome_prices',
      priceYes: yesPrice,
      priceNo: 1.0 - yesPrice,
    };
  }

  return { source: 'none' };
}
