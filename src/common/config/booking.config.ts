import { registerAs } from '@nestjs/config';

export const BOOKING_CONFIG = Symbol('BOOKING_CONFIG');

export interface BookingConfig {
  archiveAfterDays: number;
  storeTimeoutMs: number;
  reconcileIntervalMs: number;
  sweepIntervalMs: number;
  fieldMappingsPath: string;
  sourceUrl?: string;
}

const DEFAULT_ARCHIVE_AFTER_DAYS = 90;
const DEFAULT_STORE_TIMEOUT_MS = 5_000;
const DEFAULT_RECONCILE_INTERVAL_MS = 5 * 60_000;
const DEFAULT_SWEEP_INTERVAL_MS = 60 * 60_000;
const DEFAULT_FIELD_MAPPINGS_PATH = 'config/field-mappings.json';

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  options: { allowZero: boolean },
): number {
  const raw = env[key];
  const value = raw === undefined || raw === '' ? fallback : Number(raw);

  if (!Number.isFinite(value) || value < 0 || (!options.allowZero && value === 0)) {
    const expectation = options.allowZero ? 'a non-negative number' : 'a positive number';
    throw new Error(`${key} must be ${expectation}`);
  }

  return value;
}

export function loadBookingConfig(env: NodeJS.ProcessEnv = process.env): BookingConfig {
  return {
    archiveAfterDays: readNumber(env, 'BOOKING_ARCHIVE_AFTER_DAYS', DEFAULT_ARCHIVE_AFTER_DAYS, { allowZero: false }),
    storeTimeoutMs: readNumber(env, 'BOOKING_STORE_TIMEOUT_MS', DEFAULT_STORE_TIMEOUT_MS, { allowZero: false }),
    // 0 disables the timer
    reconcileIntervalMs: readNumber(env, 'BOOKING_RECONCILE_INTERVAL_MS', DEFAULT_RECONCILE_INTERVAL_MS, { allowZero: true }),
    sweepIntervalMs: readNumber(env, 'BOOKING_SWEEP_INTERVAL_MS', DEFAULT_SWEEP_INTERVAL_MS, { allowZero: true }),
    fieldMappingsPath: env.BOOKING_FIELD_MAPPINGS_PATH || DEFAULT_FIELD_MAPPINGS_PATH,
    sourceUrl: env.BOOKING_SOURCE_URL || undefined,
  };
}

export default registerAs('booking', (): BookingConfig => loadBookingConfig());
