import cron from 'node-cron';
import { createLogger } from '../utils/logger';
import { InvalidConfigError } from '../errors';
import { WeatherScanner, WeatherScanResult } from './scanner';

const logger = createLogger('WeatherScheduler');

export interface WeatherSchedulerStatus {
  enabled: boolean;
  isRunning: boolean;
  cronExpression: string;
  lastScanTime: string | null;
  lastScanId: string | null;
  lastError: string | null;
  scanCount: number;
}

export class WeatherScheduler {
  private cronJob: cron.ScheduledTask | null = null;
  private isRunning = false;
  private lastScanTime: Date | null = null;
  private lastScanResult: WeatherScanResult | null = null;
  private lastError: string | null = null;
  private scanCount = 0;

  constructor(
    private scanner: WeatherScanner,
    private cronExpression: string = '*/15 * * * *'
  ) {
    if (!cron.validate(cronExpression)) {
      throw new InvalidConfigError(`Invalid cron expression: ${cronExpression}`);
    }
  }

  /**
   * Start the weather scanner (every 15 minutes by default)
   */
  start(): void {
    if (this.cronJob) {
      logger.warn('Weather scheduler already running');
      return;
    }

    logger.info(`Starting weather scheduler with cron: ${this.cronExpression}`);

    this.cronJob = cron.schedule(this.cronExpression, async () => {
      await this.runScan();
    });

    // Run an initial scan
    void this.runScan();
  }

  /**
   * Stop the scheduler
   */
  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      logger.info('Weather scheduler stopped');
    }
  }

  /**
   * Run a weather scan. Overlapping calls return the previous result.
   */
  async runScan(): Promise<WeatherScanResult | null> {
    if (this.isRunning) {
      logger.warn('Weather scan already in progress');
      return this.lastScanResult;
    }

    this.isRunning = true;
    this.lastScanTime = new Date();

    try {
      const result = await this.scanner.scan(this.lastScanTime);
      this.lastScanResult = result;
      this.lastError = null;
      this.scanCount++;
      return result;
    } catch (error) {
      logger.error('Weather scan failed:', error);
      this.lastError = error instanceof Error ? error.message : String(error);
      return null;
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Force a manual scan
   */
  async forceScan(): Promise<WeatherScanResult> {
    const result = await this.runScan();
    if (!result) {
      throw new Error(this.lastError ? `Weather scan failed: ${this.lastError}` : 'Weather scan failed');
    }
    return result;
  }

  getStatus(): WeatherSchedulerStatus {
    return {
      enabled: this.cronJob !== null,
      isRunning: this.isRunning,
      cronExpression: this.cronExpression,
      lastScanTime: this.lastScanTime?.toISOString() || null,
      lastScanId: this.lastScanResult?.scanId || null,
      lastError: this.lastError,
      scanCount: this.scanCount,
    };
  }

  /**
   * Get last scan result
   */
  getLastScanResult(): WeatherScanResult | null {
    return this.lastScanResult;
  }
}
