export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_COLORS = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveMinLevel(): LogLevel {
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function renderData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack || `${data.name}: ${data.message}`;
  }
  if (typeof data === 'string') return data;
  return JSON.stringify(data, null, 2);
}

export class Logger {
  private context: string;

  constructor(context: string = 'WeatherBot') {
    this.context = context;
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const color = LOG_COLORS[level];
    const reset = LOG_COLORS.reset;
    const prefix = `${color}[${timestamp}] [${level.toUpperCase()}] [${this.context}]${reset}`;

    let output = `${prefix} ${message}`;
    if (data !== undefined) {
      output += ` ${renderData(data)}`;
    }
    return output;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveMinLevel()];
  }

  debug(message: string, data?: unknown) {
    if (this.enabled('debug')) {
      console.log(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.enabled('info')) {
      console.log(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, data?: unknown) {
    console.error(this.formatMessage('error', message, data));
  }
}

export const createLogger = (context: string) => new Logger(context);
