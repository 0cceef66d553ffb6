// This module parses process environment into one immutable runtime configuration at startup.

import { z } from 'zod';
import { DEFAULT_DATASET_COLUMNS, type DatasetColumns } from '../dataset/source.js';
import type { ExemptScope } from '../types/domain.js';
import { isValidTimeZone, resolveDefaultTimeZone } from '../utils/dates.js';
import { AppError } from '../utils/errors.js';

export type TelegramMode = 'polling' | 'webhook';

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  telegram: {
    botToken: string;
    apiBaseUrl: string;
    mode: TelegramMode;
    webhookSecret?: string;
    webhookUrl?: string;
    skipPending: boolean;
    pollTimeoutSeconds: number;
    requestTimeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    buttonsPerRow: number;
  };
  navigation: {
    pageSize: number;
  };
  admin: {
    adminIds: ReadonlySet<string>;
    notifyChatId?: string;
  };
  quota: {
    monthlyCap: number;
    exemptUserIds: ReadonlySet<string>;
    exemptScope: ExemptScope;
    timeZone: string;
  };
  debounceWindowMs: number;
  dataset: {
    path: string;
    columns: DatasetColumns;
  };
  referenceDocumentPath: string;
  ledger: {
    dbPath: string;
    busyTimeoutMs: number;
  };
  export: {
    includeBom: boolean;
  };
}

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const idList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TELEGRAM_BOT_TOKEN: z.string().trim().min(1, 'TELEGRAM_BOT_TOKEN is not set'),
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_MODE: z.enum(['polling', 'webhook']).default('polling'),
  TELEGRAM_WEBHOOK_SECRET: optionalText,
  TELEGRAM_WEBHOOK_URL: optionalText,
  TELEGRAM_SKIP_PENDING: booleanFlag(true),
  TELEGRAM_POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(300).default(50),
  TELEGRAM_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(70_000),
  TELEGRAM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  TELEGRAM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(350),
  TELEGRAM_BUTTONS_PER_ROW: z.coerce.number().int().min(1).max(8).default(2),
  NAV_PAGE_SIZE: z.coerce.number().int().min(1).max(90).default(16),
  ADMIN_IDS: idList,
  ADMIN_ID: optionalText,
  ADMIN_NOTIFY_CHAT_ID: optionalText,
  QUOTA_MONTHLY_CAP: z.coerce.number().int().min(0).default(10),
  QUOTA_EXEMPT_USER_IDS: idList,
  QUOTA_EXEMPT_ADMINS: booleanFlag(true),
  QUOTA_EXEMPT_SCOPE: z.enum(['all', 'daily']).default('all'),
  QUOTA_TIME_ZONE: optionalText.refine((value) => value === undefined || isValidTimeZone(value), {
    message: 'QUOTA_TIME_ZONE must be a valid IANA timezone'
  }),
  DEBOUNCE_WINDOW_MS: z.coerce.number().int().min(0).default(1500),
  DATA_PATH: z.string().default('data/stations.parquet'),
  DATASET_REGION_ID_COLUMN: z.string().default(DEFAULT_DATASET_COLUMNS.regionId),
  DATASET_REGION_NAME_COLUMN: z.string().default(DEFAULT_DATASET_COLUMNS.regionName),
  DATASET_STATION_ID_COLUMN: z.string().default(DEFAULT_DATASET_COLUMNS.stationId),
  DATASET_STATION_NAME_COLUMN: z.string().default(DEFAULT_DATASET_COLUMNS.stationName),
  DATASET_TIME_COLUMN: z.string().default(DEFAULT_DATASET_COLUMNS.time),
  GUIDE_PATH: z.string().default('data/guide.pdf'),
  DB_PATH: z.string().default('data/downloads.db'),
  LEDGER_BUSY_TIMEOUT_MS: z.coerce.number().int().min(1).max(60_000).default(5000),
  CSV_INCLUDE_BOM: booleanFlag(true)
});

// This function validates the environment once; invalid values stop startup with every issue listed.
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_config', 'Invalid environment configuration.', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }

  const values = parsed.data;
  const adminIds = new Set([...values.ADMIN_IDS, ...(values.ADMIN_ID ? [values.ADMIN_ID] : [])]);
  const exemptUserIds = new Set([...values.QUOTA_EXEMPT_USER_IDS, ...(values.QUOTA_EXEMPT_ADMINS ? adminIds : [])]);

  if (values.TELEGRAM_MODE === 'webhook' && !values.TELEGRAM_WEBHOOK_SECRET) {
    throw new AppError(500, 'invalid_config', 'TELEGRAM_WEBHOOK_SECRET is required in webhook mode.');
  }

  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    telegram: {
      botToken: values.TELEGRAM_BOT_TOKEN,
      apiBaseUrl: values.TELEGRAM_API_BASE_URL,
      mode: values.TELEGRAM_MODE,
      webhookSecret: values.TELEGRAM_WEBHOOK_SECRET,
      webhookUrl: values.TELEGRAM_WEBHOOK_URL,
      skipPending: values.TELEGRAM_SKIP_PENDING,
      pollTimeoutSeconds: values.TELEGRAM_POLL_TIMEOUT_SECONDS,
      requestTimeoutMs: values.TELEGRAM_REQUEST_TIMEOUT_MS,
      maxRetries: values.TELEGRAM_MAX_RETRIES,
      retryBaseDelayMs: values.TELEGRAM_RETRY_BASE_DELAY_MS,
      buttonsPerRow: values.TELEGRAM_BUTTONS_PER_ROW
    },
    navigation: {
      pageSize: values.NAV_PAGE_SIZE
    },
    admin: {
      adminIds,
      notifyChatId: values.ADMIN_NOTIFY_CHAT_ID
    },
    quota: {
      monthlyCap: values.QUOTA_MONTHLY_CAP,
      exemptUserIds,
      exemptScope: values.QUOTA_EXEMPT_SCOPE,
      timeZone: values.QUOTA_TIME_ZONE ?? resolveDefaultTimeZone()
    },
    debounceWindowMs: values.DEBOUNCE_WINDOW_MS,
    dataset: {
      path: values.DATA_PATH,
      columns: {
        regionId: values.DATASET_REGION_ID_COLUMN,
        regionName: values.DATASET_REGION_NAME_COLUMN,
        stationId: values.DATASET_STATION_ID_COLUMN,
        stationName: values.DATASET_STATION_NAME_COLUMN,
        time: values.DATASET_TIME_COLUMN
      }
    },
    referenceDocumentPath: values.GUIDE_PATH,
    ledger: {
      dbPath: values.DB_PATH,
      busyTimeoutMs: values.LEDGER_BUSY_TIMEOUT_MS
    },
    export: {
      includeBom: values.CSV_INCLUDE_BOM
    }
  };
}
