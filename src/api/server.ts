import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { AnalysisConfig, Config } from '../config';
import { createLogger } from '../utils/logger';
import { isRecord } from '../utils/http';
import { errorMessage } from '../errors';
import { ApiResponse, EventAnalysis } from '../types';
import { toGammaEvent } from '../polymarket/client';
import { analyzeEvent } from '../weather/edge-detector';
import { WeatherScheduler } from '../weather/scheduler';

const logger = createLogger('API');

export function createServer(
  config: Pick<Config, 'dashboardPassword'>,
  scheduler: WeatherScheduler,
  analysisConfig: AnalysisConfig
): express.Application {
  const app = express();
  const startTime = Date.now();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Simple auth middleware for API routes
  const authMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (authHeader) {
      const [type, credentials] = authHeader.split(' ');
      if (type === 'Basic' && credentials) {
        const decoded = Buffer.from(credentials, 'base64').toString();
        const [, password] = decoded.split(':');
        if (password === config.dashboardPassword) {
          return next();
        }
      } else if (type === 'Bearer' && credentials === config.dashboardPassword) {
        return next();
      }
    }

    // Query param for simple auth (supports both 'password' and 'auth')
    if (req.query.password === config.dashboardPassword || req.query.auth === config.dashboardPassword) {
      return next();
    }

    const body: ApiResponse<never> = { success: false, error: 'Unauthorized' };
    res.status(401).json(body);
  };

  // Apply auth to API routes
  app.use('/api', authMiddleware);

  // Health check (no auth required)
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', uptime: Date.now() - startTime });
  });

  app.get('/api/weather/status', (req: Request, res: Response) => {
    res.json({ success: true, data: scheduler.getStatus() });
  });

  app.get('/api/weather/results', (req: Request, res: Response) => {
    res.json({ success: true, data: scheduler.getLastScanResult() });
  });

  app.get('/api/weather/config', (req: Request, res: Response) => {
    res.json({ success: true, data: analysisConfig });
  });

  // Force a scan now
  app.post('/api/weather/scan', async (req: Request, res: Response) => {
    try {
      const result = await scheduler.forceScan();
      res.json({ success: true, data: result });
    } catch (error) {
      logger.error('Manual scan failed', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  app.post('/api/weather/start', (req: Request, res: Response) => {
    scheduler.start();
    res.json({ success: true, data: scheduler.getStatus() });
  });

  app.post('/api/weather/stop', (req: Request, res: Response) => {
    scheduler.stop();
    res.json({ success: true, data: scheduler.getStatus() });
  });

  // Analyze a caller-supplied event against a caller-supplied forecast
  app.post('/api/weather/analyze', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      res.status(400).json({ success: false, error: 'Body must be a JSON object' });
      return;
    }

    const event = toGammaEvent(body.event);
    if (!event) {
      res.status(400).json({ success: false, error: 'event must have a title and a markets list' });
      return;
    }

    const forecastMaxC = body.forecastMaxC;
    if (typeof forecastMaxC !== 'number' || !Number.isFinite(forecastMaxC)) {
      res.status(400).json({ success: false, error: 'forecastMaxC must be a number' });
      return;
    }

    const analysis = analyzeEvent(event, forecastMaxC, analysisConfig);
    const response: ApiResponse<EventAnalysis> = { success: true, data: analysis };
    res.json(response);
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  return app;
}
