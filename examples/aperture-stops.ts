/**
 * Aperture Stops Example
 *
 * Converts a list of f-numbers to rational stops and back, then
 * approximates a few constants with the configured tolerance.
 *
 * Optional environment variables (see .env.example):
 * - EXPOSURE_STOP_PRECISION   tolerance used when snapping stops (default 0.1)
 * - EXPOSURE_TOLERANCE        tolerance for plain approximations (default 1e-6)
 * - EXPOSURE_FSTOPS           comma separated f-numbers to convert
 */

import 'dotenv/config';
import { ExposureClient } from '../src/client';
import { FractionError } from '../src/errors';
import { Logger } from '../src/types/common';

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.error(`❌ ${name} must be a number, got "${raw}"`);
    process.exit(1);
  }
  return value;
}

const consoleLogger: Logger = {
  debug: (msg, data) => console.debug(`[debug] ${msg}`, data ?? ''),
  info: (msg, data) => console.info(`[info] ${msg}`, data ?? ''),
  error: (msg, err) => console.error(`[error] ${msg}`, err ?? ''),
};

function main(): void {
  const fstops = (process.env.EXPOSURE_FSTOPS ?? '1.4,2,2.8,4,5.6,8,11,16,22')
    .split(',')
    .map((s) => Number(s.trim()));

  const client = new ExposureClient({
    stopPrecision: readNumber('EXPOSURE_STOP_PRECISION'),
    tolerance: readNumber('EXPOSURE_TOLERANCE'),
    logger: process.env.EXPOSURE_VERBOSE ? consoleLogger : undefined,
  });

  console.log('🔧 Aperture stops:');
  for (const fstop of fstops) {
    try {
      const aperture = client.aperture.fromFstop(fstop);
      console.log(`  f/${fstop} -> stop ${aperture.stop} -> ${client.aperture.format(aperture)}`);
    } catch (err) {
      if (err instanceof FractionError) {
        console.error(`  ❌ f/${fstop}: ${err.message}`);
        continue;
      }
      throw err;
    }
  }

  console.log('');
  console.log('📐 Approximations:');
  for (const [label, value] of [['π', Math.PI], ['e', Math.E], ['√2', Math.SQRT2]] as const) {
    console.log(`  ${label} ≈ ${client.approximate(value)}`);
  }
}

main();
