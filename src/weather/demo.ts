import { Coordinates, Forecast, GammaEvent } from '../types';
import { EventSource, WeatherSource } from './scanner';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export const DEMO_COORDINATES: Coordinates = { latitude: 40.7128, longitude: -74.006 };
export const DEMO_FORECAST: Forecast = { maxTemp: 5.9, minTemp: 0.0 };  // 42.6°F

/**
 * A two-bucket New York event dated the day after `now`, priced from
 * outcomePrices only.
 */
export function createDemoEvents(now: Date = new Date()): GammaEvent[] {
  const tomorrow = new Date(now);
  tomorrow.setDate(tomorrow.getDate() + 1);
  const day = `${MONTH_NAMES[tomorrow.getMonth()]} ${tomorrow.getDate()}`;

  return [
    {
      id: 'demo',
      title: `Highest temperature in New York on ${day}?`,
      markets: [
        {
          id: '1',
          question: `Will the highest temperature in New York be 41°F or below on ${day}?`,
          outcomes: '["Yes", "No"]',
          outcomePrices: '["0.20", "0.80"]',
        },
        {
          id: '2',
          question: `Will the highest temperature in New York be 44°F or higher on ${day}?`,
          outcomes: '["Yes", "No"]',
          outcomePrices: '["0.30", "0.70"]',
        },
      ],
    },
  ];
}

export class DemoEventSource implements EventSource {
  constructor(private now: () => Date = () => new Date()) {}

  async getWeatherEvents(): Promise<GammaEvent[]> {
    return createDemoEvents(this.now());
  }
}

export class DemoWeatherSource implements WeatherSource {
  async getCoordinates(): Promise<Coordinates | null> {
    return DEMO_COORDINATES;
  }

  async getDailyForecast(): Promise<Forecast | null> {
    return DEMO_FORECAST;
  }
}
