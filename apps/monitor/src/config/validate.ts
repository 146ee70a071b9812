import { z } from 'zod';
import { envFlag } from '../utils/envFlag';

// ---------------------------------------------------------------------------
// Zod schema
// ---------------------------------------------------------------------------

const intSchema = (fallback: string, min: number, max: number) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(min).max(max));

const timeZoneSchema = z
  .string()
  .default('UTC')
  .refine(
    (zone) => {
      try {
        new Intl.DateTimeFormat('en-US', { timeZone: zone });
        return true;
      } catch {
        return false;
      }
    },
    { message: 'MONITOR_TIMEZONE must be a valid IANA time zone (e.g. Asia/Jakarta)' }
  );

const chatIdListSchema = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? '')
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  );

const envSchema = z
  .object({
    // -- Storage and devices ---------------------------------------------------
    DATA_DIR: z.string().min(1).default('./data'),
    DEVICES_FILE: z.string().min(1).default('./devices.json'),

    // -- Polling ---------------------------------------------------------------
    POLL_INTERVAL_SECONDS: intSchema('60', 5, 86_400),
    POLL_CONCURRENCY: intSchema('10', 1, 500),
    DEVICE_TIMEOUT_MS: intSchema('20000', 100, 300_000),
    MONITOR_TIMEZONE: timeZoneSchema,
    // 10 Gbit/s; faster links need a higher ceiling
    MAX_LINK_BYTES_PER_SECOND: intSchema('1250000000', 1, Number.MAX_SAFE_INTEGER),

    // -- Transport -------------------------------------------------------------
    SNMP_GATEWAY_URL: z.string().url('SNMP_GATEWAY_URL must be a valid URL').optional(),
    SNMP_GATEWAY_TOKEN: z.string().optional(),

    // -- Notifications ---------------------------------------------------------
    TELEGRAM_BOT_TOKEN: z.string().optional(),
    TELEGRAM_CHAT_IDS: chatIdListSchema,
    NOTIFY_WEBHOOK_URL: z.string().url('NOTIFY_WEBHOOK_URL must be a valid URL').optional(),
    THRESHOLD_ALERT_COOLDOWN_MINUTES: intSchema('0', 0, 10_080),

    // -- Runtime ---------------------------------------------------------------
    REDIS_URL: z.string().default('redis://localhost:6379'),
    API_PORT: intSchema('3001', 1, 65535),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    ENABLE_POLLER: z.boolean(),
    ENABLE_QUERY_API: z.boolean()
  })
  .superRefine((data, ctx) => {
    if (data.ENABLE_POLLER && !data.SNMP_GATEWAY_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SNMP_GATEWAY_URL'],
        message: 'SNMP_GATEWAY_URL is required when the poller is enabled.'
      });
    }

    if (data.TELEGRAM_BOT_TOKEN && data.TELEGRAM_CHAT_IDS.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TELEGRAM_CHAT_IDS'],
        message: 'TELEGRAM_CHAT_IDS must list at least one chat id when TELEGRAM_BOT_TOKEN is set.'
      });
    }

    if (data.NODE_ENV === 'production' && data.ENABLE_POLLER && !hasNotifier(data)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TELEGRAM_BOT_TOKEN'],
        message: 'Configure TELEGRAM_BOT_TOKEN or NOTIFY_WEBHOOK_URL in production; alerts would be dropped.'
      });
    }
  });

// Inferred config type from the schema
export type AppConfig = z.infer<typeof envSchema>;

function hasNotifier(data: { TELEGRAM_BOT_TOKEN?: string; NOTIFY_WEBHOOK_URL?: string }): boolean {
  return Boolean(data.TELEGRAM_BOT_TOKEN || data.NOTIFY_WEBHOOK_URL);
}

// ---------------------------------------------------------------------------
// Warnings (non-fatal)
// ---------------------------------------------------------------------------

interface ConfigWarning {
  key: string;
  message: string;
}

function collectWarnings(config: AppConfig): ConfigWarning[] {
  const warnings: ConfigWarning[] = [];

  if (config.ENABLE_POLLER && !hasNotifier(config)) {
    warnings.push({
      key: 'TELEGRAM_BOT_TOKEN',
      message: 'No notifier configured. State changes and monthly reports will only be logged.'
    });
  }

  if (config.DEVICE_TIMEOUT_MS >= config.POLL_INTERVAL_SECONDS * 1000) {
    warnings.push({
      key: 'DEVICE_TIMEOUT_MS',
      message: 'Device timeout is not shorter than the poll interval; slow devices will delay every pass.'
    });
  }

  if (config.SNMP_GATEWAY_URL?.startsWith('http://') && config.SNMP_GATEWAY_TOKEN) {
    warnings.push({
      key: 'SNMP_GATEWAY_URL',
      message: 'Gateway token is sent over plain HTTP.'
    });
  }

  return warnings;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validates environment variables on startup.
 *
 * Stores the typed config as a singleton, logs non-fatal warnings and throws
 * one formatted error listing every problem when validation fails.
 */
export function validateConfig(): AppConfig {
  const env = process.env;

  const result = envSchema.safeParse({
    DATA_DIR: env.DATA_DIR,
    DEVICES_FILE: env.DEVICES_FILE,
    POLL_INTERVAL_SECONDS: env.POLL_INTERVAL_SECONDS,
    POLL_CONCURRENCY: env.POLL_CONCURRENCY,
    DEVICE_TIMEOUT_MS: env.DEVICE_TIMEOUT_MS,
    MONITOR_TIMEZONE: env.MONITOR_TIMEZONE,
    MAX_LINK_BYTES_PER_SECOND: env.MAX_LINK_BYTES_PER_SECOND,
    SNMP_GATEWAY_URL: env.SNMP_GATEWAY_URL || undefined,
    SNMP_GATEWAY_TOKEN: env.SNMP_GATEWAY_TOKEN || undefined,
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN || undefined,
    TELEGRAM_CHAT_IDS: env.TELEGRAM_CHAT_IDS,
    NOTIFY_WEBHOOK_URL: env.NOTIFY_WEBHOOK_URL || undefined,
    THRESHOLD_ALERT_COOLDOWN_MINUTES: env.THRESHOLD_ALERT_COOLDOWN_MINUTES,
    REDIS_URL: env.REDIS_URL,
    API_PORT: env.API_PORT,
    NODE_ENV: env.NODE_ENV,
    ENABLE_POLLER: envFlag('ENABLE_POLLER', true),
    ENABLE_QUERY_API: envFlag('ENABLE_QUERY_API', true)
  });

  if (!result.success) {
    const issues = result.error.issues;
    const lines = issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );

    const message = [
      '',
      'CONFIGURATION VALIDATION FAILED',
      'The monitor cannot start due to missing or invalid config.',
      '',
      `Found ${issues.length} configuration error(s):`,
      '',
      ...lines,
      '',
      'Hint: Copy .env.example to .env and update the values.',
      ''
    ].join('\n');

    throw new Error(message);
  }

  for (const w of collectWarnings(result.data)) {
    console.warn(`[config] WARNING: ${w.key}: ${w.message}`);
  }

  return result.data;
}
