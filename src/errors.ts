/**
 * Error types shared across the analyzer.
 *
 * Only `InvalidConfigError` is fatal. `ApiRequestError` describes a collaborator failure that
 * callers log before skipping the affected event.
 */

export type WeatherBotErrorCode = 'INVALID_CONFIG' | 'API_REQUEST_FAILED';

export class WeatherBotError extends Error {
  readonly code: WeatherBotErrorCode;

  constructor(code: WeatherBotErrorCode, message: string) {
    super(message);
    this.name = 'WeatherBotError';
    this.code = code;
  }
}

export class InvalidConfigError extends WeatherBotError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'InvalidConfigError';
  }
}

export class ApiRequestError extends WeatherBotError {
  readonly status: number | null;
  readonly url: string;

  constructor(message: string, url: string, status: number | null = null) {
    super('API_REQUEST_FAILED', message);
    this.name = 'ApiRequestError';
    this.url = url;
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
