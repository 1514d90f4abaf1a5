/**
 * @quotapass/core: Shared Constants
 */

/** Free downloads per quota day when no override is configured */
export const DEFAULT_FREE_DAILY_LIMIT = 3;

/** IANA zone whose midnight is the quota boundary */
export const DEFAULT_RESET_TIMEZONE = 'UTC';

/** Cron expression for the reset job, evaluated in the reference timezone */
export const DEFAULT_RESET_CRON = '0 0 * * *';

/** Store call deadline before the call fails as transient */
export const DEFAULT_STORE_TIMEOUT_MS = 2_000;

export const DAY_MS = 86_400_000;

// ─── File Size Caps ────────────────────────────────────────────────

/** Largest file a free user may fetch (1 GiB) */
export const MAX_FREE_FILE_SIZE = 1024 * 1024 * 1024;

/** Largest file a subscriber may fetch (10 GiB) */
export const MAX_PREMIUM_FILE_SIZE = 10 * 1024 * 1024 * 1024;

// ─── Rate Limiting ─────────────────────────────────────────────────

export const DEFAULT_RATE_LIMIT_PERIOD_SECONDS = 60;
export const DEFAULT_RATE_LIMIT_MAX_CALLS = 5;
