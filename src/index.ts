import { loadAnalysisConfig, loadConfig } from './config';
import { PolymarketClient } from './polymarket/client';
import {
  DemoEventSource,
  DemoWeatherSource,
  OpenMeteoClient,
  WeatherScanner,
  WeatherScheduler,
  formatScanReport,
} from './weather';
import { ForecastBenchmark } from './backtesting';
import { createServer } from './api/server';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

type RunMode = 'serve' | 'once' | 'demo' | 'benchmark';

function parseMode(argv: string[]): RunMode {
  if (argv.includes('--demo')) return 'demo';
  if (argv.includes('--once')) return 'once';
  if (argv.includes('--benchmark')) return 'benchmark';
  return 'serve';
}

async function main() {
  logger.info('--- Polymarket Weather EV Analyzer ---');

  // Invalid settings are fatal here, before any scan runs
  const config = loadConfig();
  const analysisConfig = loadAnalysisConfig();
  const mode = parseMode(process.argv.slice(2));

  const openMeteo = new OpenMeteoClient(config);

  if (mode === 'benchmark') {
    const benchmark = new ForecastBenchmark(openMeteo, analysisConfig.forecastStdDevC);
    await benchmark.run();
    return;
  }

  if (mode === 'demo' || mode === 'once') {
    const scanner = mode === 'demo'
      ? new WeatherScanner(new DemoEventSource(), new DemoWeatherSource(), analysisConfig)
      : new WeatherScanner(new PolymarketClient(config), openMeteo, analysisConfig);
    if (mode === 'demo') {
      logger.info('[DEMO MODE] Using mock market data and a 5.9°C forecast.');
    }
    const result = await scanner.scan();
    logger.info(`\n${formatScanReport(result)}`);
    return;
  }

  const scanner = new WeatherScanner(new PolymarketClient(config), openMeteo, analysisConfig);
  const scheduler = new WeatherScheduler(scanner, config.scanCron);
  scheduler.start();

  const app = createServer(config, scheduler, analysisConfig);
  const server = app.listen(config.port, () => {
    logger.info(`
╔══════════════════════════════════════════════════════════════╗
║           WEATHER EV ANALYZER STARTED                        ║
╠══════════════════════════════════════════════════════════════╣
║  API: http://localhost:${config.port}/api
║  Scan schedule: ${config.scanCron}
║  Forecast std dev: ${analysisConfig.forecastStdDevC}°C
╚══════════════════════════════════════════════════════════════╝
    `);
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    scheduler.stop();
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
