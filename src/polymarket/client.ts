import { createLogger } from '../utils/logger';
import { buildUrl, fetchJson, isRecord } from '../utils/http';
import { errorMessage } from '../errors';
import { GammaEvent, GammaMarket } from '../types';

const logger = createLogger('PolymarketClient');

const TEMPERATURE_TITLE = 'Highest temperature in';

export interface PolymarketClientConfig {
  gammaApiUrl: string;
  weatherTagId: string;
  requestTimeoutMs: number;
}

function quoteField(value: unknown): string | number | null | undefined {
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (value === null) return null;
  return undefined;
}

// Gamma usually sends these as JSON strings, occasionally as arrays
function jsonListField(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return JSON.stringify(value);
  return undefined;
}

/**
 * Narrow a raw Gamma market. Records without an id or question are dropped;
 * other malformed fields are left for the price resolver to treat as absent.
 */
export function toGammaMarket(raw: unknown): GammaMarket | null {
  if (!isRecord(raw)) return null;
  const id = raw.id;
  if ((typeof id !== 'string' && typeof id !== 'number') || typeof raw.question !== 'string') {
    const label = typeof id === 'string' || typeof id === 'number' ? String(id) : 'without id';
    logger.warn(`Skipping market ${label}: missing id or question`);
    return null;
  }

  return {
    id: String(id),
    question: raw.question,
    conditionId: typeof raw.conditionId === 'string' ? raw.conditionId : undefined,
    slug: typeof raw.slug === 'string' ? raw.slug : undefined,
    groupItemTitle: typeof raw.groupItemTitle === 'string' ? raw.groupItemTitle : undefined,
    outcomes: jsonListField(raw.outcomes),
    outcomePrices: jsonListField(raw.outcomePrices),
    bestBid: quoteField(raw.bestBid),
    bestAsk: quoteField(raw.bestAsk),
    active: typeof raw.active === 'boolean' ? raw.active : undefined,
    closed: typeof raw.closed === 'boolean' ? raw.closed : undefined,
  };
}

export function toGammaEvent(raw: unknown): GammaEvent | null {
  if (!isRecord(raw) || typeof raw.title !== 'string') return null;

  const markets = Array.isArray(raw.markets)
    ? raw.markets.map(toGammaMarket).filter((m): m is GammaMarket => m !== null)
    : [];

  return {
    id: typeof raw.id === 'string' || typeof raw.id === 'number' ? String(raw.id) : undefined,
    title: raw.title,
    slug: typeof raw.slug === 'string' ? raw.slug : undefined,
    startDate: typeof raw.startDate === 'string' ? raw.startDate : undefined,
    endDate: typeof raw.endDate === 'string' ? raw.endDate : undefined,
    markets,
  };
}

export class PolymarketClient {
  constructor(private config: PolymarketClientConfig) {}

  /**
   * Active "Highest temperature in ..." events from the weather tag, with each
   * event's markets refreshed so they carry bestBid / bestAsk.
   */
  async getWeatherEvents(): Promise<GammaEvent[]> {
    const url = buildUrl(`${this.config.gammaApiUrl}/events`, {
      tag_id: this.config.weatherTagId,
      active: true,
      closed: false,
      limit: 50,
      order: 'startDate',  // Upcoming first
      ascending: true,
    });

    let raw: unknown;
    try {
      raw = await fetchJson(url, this.config.requestTimeoutMs);
    } catch (error) {
      logger.error('Failed to fetch weather events', error);
      return [];
    }

    if (!Array.isArray(raw)) {
      logger.error('Unexpected events payload from Gamma API');
      return [];
    }

    const events = raw
      .map(toGammaEvent)
      .filter((e): e is GammaEvent => e !== null && e.title.includes(TEMPERATURE_TITLE));

    logger.info(`Found ${events.length} temperature events (of ${raw.length} weather events)`);

    const detailed: GammaEvent[] = [];
    for (const event of events) {
      detailed.push({ ...event, markets: await this.refreshMarkets(event) });
    }
    return detailed;
  }

  /**
   * The markets embedded in /events are simplified; /markets has the quotes.
   * Falls back to the embedded markets when the refresh fails.
   */
  async refreshMarkets(event: GammaEvent): Promise<GammaMarket[]> {
    const ids = event.markets.map(m => m.id);
    if (ids.length === 0) return event.markets;

    const url = buildUrl(`${this.config.gammaApiUrl}/markets`, { id: ids });
    try {
      const raw = await fetchJson(url, this.config.requestTimeoutMs);
      if (!Array.isArray(raw)) {
        logger.warn(`Unexpected markets payload for "${event.title}", keeping event markets`);
        return event.markets;
      }
      return raw.map(toGammaMarket).filter((m): m is GammaMarket => m !== null);
    } catch (error) {
      logger.warn(`Failed to fetch details for event "${event.title}": ${errorMessage(error)}`);
      return event.markets;
    }
  }
}
