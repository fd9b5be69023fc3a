/**
 * Environment Configuration
 *
 * Reads and validates the archiver's settings from environment variables.
 * Validation happens once, before any chat is processed.
 *
 * @module config/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/error-handler';

/**
 * Service name reported by the health check when SERVICE_NAME is unset
 */
export const DEFAULT_SERVICE_NAME = 'Telegram Message Downloader';

/**
 * Zone that defines "yesterday" for the scheduled run
 */
export const DEFAULT_SCHEDULE_TIMEZONE = 'America/Los_Angeles';

/**
 * Treats empty strings like unset variables
 */
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const requiredString = z.string({ required_error: 'is not set' }).trim().min(1, 'is not set');

const telegramSchema = z.object({
  API_ID: z.coerce
    .number({ required_error: 'is not set', invalid_type_error: 'must be a number' })
    .int('must be an integer')
    .positive('must be positive'),
  API_HASH: requiredString,
  TELEGRAM_SESSION: optionalString,
  PHONENUMBER: optionalString,
  TELEGRAM_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
});

const storageSchema = z.object({
  AWS_REGION: requiredString,
  S3_BUCKET_NAME: requiredString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  S3_ENDPOINT: optionalString.pipe(z.string().url('must be a URL').optional()),
  ARCHIVE_KEY_PREFIX: optionalString,
});

/**
 * Settings for the Telegram session
 */
export interface TelegramConfig {
  apiId: number;
  apiHash: string;
  /** Saved StringSession; absent when the CLI has to log in */
  session?: string;
  phoneNumber?: string;
  pageSize: number;
}

/**
 * Settings for the S3 archive bucket
 */
export interface StorageConfig {
  region: string;
  bucketName: string;
  /** Only set when both key ID and secret are provided */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  endpoint?: string;
  keyPrefix?: string;
}

/**
 * Settings for the scheduled daily run
 */
export interface ScheduleConfig {
  identifiersFile: string;
  timeZone: string;
}

/**
 * Parse env with a schema, raising ConfigurationError on the first problem
 */
function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = String(issue.path[0] ?? 'environment');
    throw new ConfigurationError(`${key} ${issue.message}`, key);
  }
  return result.data;
}

/**
 * Load Telegram settings
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError if API_ID or API_HASH is missing or invalid
 */
export function loadTelegramConfig(env: NodeJS.ProcessEnv = process.env): TelegramConfig {
  const parsed = parseEnv(telegramSchema, env);
  return {
    apiId: parsed.API_ID,
    apiHash: parsed.API_HASH,
    session: parsed.TELEGRAM_SESSION,
    phoneNumber: parsed.PHONENUMBER,
    pageSize: parsed.TELEGRAM_PAGE_SIZE,
  };
}

/**
 * Load S3 settings
 *
 * Explicit credentials are used only as a pair. Otherwise the AWS SDK's
 * default provider chain applies (Lambda role, shared profile, ...).
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError if AWS_REGION or S3_BUCKET_NAME is missing
 */
export function loadStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const parsed = parseEnv(storageSchema, env);

  const config: StorageConfig = {
    region: parsed.AWS_REGION,
    bucketName: parsed.S3_BUCKET_NAME,
  };
  if (parsed.AWS_ACCESS_KEY_ID && parsed.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: parsed.AWS_ACCESS_KEY_ID,
      secretAccessKey: parsed.AWS_SECRET_ACCESS_KEY,
    };
  }
  if (parsed.S3_ENDPOINT) {
    config.endpoint = parsed.S3_ENDPOINT;
  }
  if (parsed.ARCHIVE_KEY_PREFIX) {
    config.keyPrefix = parsed.ARCHIVE_KEY_PREFIX;
  }
  return config;
}

/**
 * Load the scheduled run's settings
 *
 * @throws ConfigurationError if IDENTIFIERS_FILE is missing
 */
export function loadScheduleConfig(env: NodeJS.ProcessEnv = process.env): ScheduleConfig {
  const identifiersFile = env.IDENTIFIERS_FILE?.trim();
  if (!identifiersFile) {
    throw new ConfigurationError('IDENTIFIERS_FILE is not set', 'IDENTIFIERS_FILE');
  }
  return {
    identifiersFile,
    timeZone: env.SCHEDULE_TIMEZONE?.trim() || DEFAULT_SCHEDULE_TIMEZONE,
  };
}

/**
 * Name reported by the health check
 */
export function getServiceName(env: NodeJS.ProcessEnv = process.env): string {
  return env.SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;
}
