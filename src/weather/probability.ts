import { InvalidConfigError } from '../errors';
import { TempBucket, TempUnit } from '../types';

/**
 * Error function, Abramowitz and Stegun 7.1.26 (max error 1.5e-7)
 */
export function erf(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);

  const t = 1.0 / (1.0 + p * ax);
  const y = 1.0 - (((((a5 * t + a4) * t) + a3) * t + a2) * t + a1) * t * Math.exp(-ax * ax);

  return sign * y;
}

/**
 * Standard normal CDF
 */
export function normalCDF(z: number): number {
  return 0.5 * (1.0 + erf(z / Math.SQRT2));
}

export function normalPDF(x: number, mean: number, stdDev: number): number {
  const z = (x - mean) / stdDev;
  return Math.exp(-0.5 * z * z) / (stdDev * Math.sqrt(2 * Math.PI));
}

export function toCelsius(value: number, unit: TempUnit): number {
  if (unit === 'C') return value;
  return (value - 32) * 5 / 9;
}

export function toFahrenheit(celsius: number): number {
  return celsius * 9 / 5 + 32;
}

function assertStdDev(stdDev: number): void {
  if (!Number.isFinite(stdDev) || stdDev <= 0) {
    throw new InvalidConfigError(`Forecast standard deviation must be > 0 (got ${stdDev})`);
  }
}

/**
 * P(min <= X <= max) for X ~ N(mean, stdDev²).
 * The ±999 sentinels need no special case: the CDF saturates long before them.
 */
export function probabilityInRange(
  mean: number,
  min: number,
  max: number,
  stdDev: number
): number {
  assertStdDev(stdDev);

  const zLow = (min - mean) / stdDev;
  const zHigh = (max - mean) / stdDev;

  const prob = normalCDF(zHigh) - normalCDF(zLow);

  return Math.max(0, Math.min(1, prob));  // Clamp to [0, 1]
}

/**
 * Bucket bounds in °C, whatever unit the market quotes.
 */
export function bucketBoundsCelsius(bucket: TempBucket): { minC: number; maxC: number } {
  return {
    minC: toCelsius(bucket.min, bucket.unit),
    maxC: toCelsius(bucket.max, bucket.unit),
  };
}

/**
 * Probability that the day's high lands in the bucket, given a °C forecast.
 */
export function bucketProbability(forecastC: number, bucket: TempBucket, stdDevC: number): number {
  const { minC, maxC } = bucketBoundsCelsius(bucket);
  return probabilityInRange(forecastC, minC, maxC, stdDevC);
}
