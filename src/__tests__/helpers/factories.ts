import { GammaEvent, GammaMarket } from '../../types';

let nextId = 1;

export function createMarket(question: string, overrides: Partial<GammaMarket> = {}): GammaMarket {
  return {
    id: String(nextId++),
    question,
    ...overrides,
  };
}

export function createEvent(title: string, markets: GammaMarket[]): GammaEvent {
  return { id: `event-${nextId++}`, title, markets };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
