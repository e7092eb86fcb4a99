import { z } from 'zod';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

// Engine tunables. Every key has a default so the engine can be built without
// a process environment (tests, scripts).
export const engineEnvSchema = z.object({
  CAMPAIGN_TTL_HOURS: z.coerce.number().positive().default(168),
  DEFAULT_CAMPAIGN_DURATION_HOURS: z.coerce.number().positive().default(1),
  POSTING_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  POSTING_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(2000),
  POSTING_BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(60_000),
  POSTING_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  CONFIRMATION_CHECK_ATTEMPTS: z.coerce.number().int().positive().default(3),
  CONFIRMATION_RESCHEDULE_MINUTES: z.coerce.number().positive().default(10),
  CONFIRMATION_MAX_RESCHEDULES: z.coerce.number().int().nonnegative().default(3),
  MONITOR_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
  VERIFICATION_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
  VERIFICATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MIN_SUBSCRIBERS: z.coerce.number().int().nonnegative().default(100),
  EXPIRY_SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
  NOTIFICATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TRUST_INITIAL: z.coerce.number().int().min(0).max(100).default(50),
  TRUST_MIN_TO_ACCEPT: z.coerce.number().int().min(0).max(100).default(10),
  TRUST_SUCCESS_REWARD: z.coerce.number().int().nonnegative().default(5),
  TRUST_POSTING_PENALTY: z.coerce.number().int().nonnegative().default(10),
  TRUST_WITHDRAW_PENALTY: z.coerce.number().int().nonnegative().default(10),
  TRUST_REVOCATION_PENALTY: z.coerce.number().int().nonnegative().default(20),
  TRUST_EARLY_DELETION_PENALTY: z.coerce.number().int().nonnegative().default(15),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(30),
});

export type EngineEnv = z.infer<typeof engineEnvSchema>;

export interface EngineConfig {
  campaignTtlMs: number;
  defaultDurationHours: number;
  posting: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
  };
  confirmation: {
    checkAttempts: number;
    rescheduleDelayMs: number;
    maxReschedules: number;
  };
  monitorIntervalMs: number;
  verification: {
    intervalMs: number;
    timeoutMs: number;
    minSubscribers: number;
  };
  expirySweepIntervalMs: number;
  notificationTimeoutMs: number;
  trust: {
    initial: number;
    min: number;
    max: number;
    minToAccept: number;
    successReward: number;
    postingPenalty: number;
    withdrawPenalty: number;
    revocationPenalty: number;
    earlyDeletionPenalty: number;
  };
  sessionTtlMs: number;
}

export function toEngineConfig(env: EngineEnv): EngineConfig {
  return {
    campaignTtlMs: env.CAMPAIGN_TTL_HOURS * HOUR_MS,
    defaultDurationHours: env.DEFAULT_CAMPAIGN_DURATION_HOURS,
    posting: {
      maxAttempts: env.POSTING_MAX_ATTEMPTS,
      baseDelayMs: env.POSTING_BACKOFF_BASE_MS,
      maxDelayMs: env.POSTING_BACKOFF_MAX_MS,
      timeoutMs: env.POSTING_TIMEOUT_MS,
    },
    confirmation: {
      checkAttempts: env.CONFIRMATION_CHECK_ATTEMPTS,
      rescheduleDelayMs: env.CONFIRMATION_RESCHEDULE_MINUTES * MINUTE_MS,
      maxReschedules: env.CONFIRMATION_MAX_RESCHEDULES,
    },
    monitorIntervalMs: env.MONITOR_INTERVAL_MINUTES * MINUTE_MS,
    verification: {
      intervalMs: env.VERIFICATION_INTERVAL_MINUTES * MINUTE_MS,
      timeoutMs: env.VERIFICATION_TIMEOUT_MS,
      minSubscribers: env.MIN_SUBSCRIBERS,
    },
    expirySweepIntervalMs: env.EXPIRY_SWEEP_INTERVAL_MINUTES * MINUTE_MS,
    notificationTimeoutMs: env.NOTIFICATION_TIMEOUT_MS,
    trust: {
      initial: env.TRUST_INITIAL,
      min: 0,
      max: 100,
      minToAccept: env.TRUST_MIN_TO_ACCEPT,
      successReward: env.TRUST_SUCCESS_REWARD,
      postingPenalty: env.TRUST_POSTING_PENALTY,
      withdrawPenalty: env.TRUST_WITHDRAW_PENALTY,
      revocationPenalty: env.TRUST_REVOCATION_PENALTY,
      earlyDeletionPenalty: env.TRUST_EARLY_DELETION_PENALTY,
    },
    sessionTtlMs: env.SESSION_TTL_MINUTES * MINUTE_MS,
  };
}

/** Build an engine config from string settings, falling back to the documented defaults. */
export function parseEngineConfig(source: Record<string, string | undefined> = {}): EngineConfig {
  return toEngineConfig(engineEnvSchema.parse(source));
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig();
