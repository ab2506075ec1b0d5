// src/config/index.ts
import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import defaults from './default.json';
import { ConfigurationError } from '../utils/error';
import { deepMerge, isPlainObject } from '../utils/object';

const ApiConfigSchema = z.object({
  baseUrl: z.string().url(),
  loginPath: z.string().min(1),
  articlesPath: z.string().min(1),
  pricesPath: z.string().min(1),
  requestTimeoutSeconds: z.number().positive().default(60),
  rateLimitDelaySeconds: z.number().nonnegative().default(1),
  maxRetries: z.number().int().positive().default(5),
  maxPages: z.number().int().positive().default(10000)
}).readonly();

const ExtractionConfigSchema = z.object({
  priceLists: z.array(z.number().int().positive())
    .min(1, 'at least one price list is required')
    .refine((ids) => new Set(ids).size === ids.length, 'price list IDs must be unique')
    .readonly(),
  skipInactiveArticles: z.boolean().default(true),
  includeTaxInPrice: z.boolean().default(false)
}).readonly();

const SheetsConfigSchema = z.object({
  spreadsheetId: z.string(),
  sheetName: z.string().min(1),
  writeMode: z.enum(['direct', 'staged']).default('direct'),
  applyFormats: z.boolean().default(true)
}).readonly();

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  consoleOutput: z.boolean().default(true),
  fileOutput: z.boolean().default(true),
  logDir: z.string().min(1)
}).readonly();

const JobConfigSchema = z.object({
  lockFile: z.string().min(1),
  lockStaleAfterSeconds: z.number().int().positive().default(3600)
}).readonly();

const CredentialsSchema = z.object({
  username: z.string({ required_error: 'set CADDIS_USERNAME' }).min(1, 'set CADDIS_USERNAME'),
  password: z.string({ required_error: 'set CADDIS_PASSWORD' }).min(1, 'set CADDIS_PASSWORD')
}).readonly();

const AppConfigSchema = z.object({
  api: ApiConfigSchema,
  extraction: ExtractionConfigSchema,
  priceListNames: z.record(z.string().min(1)).readonly(),
  sheets: SheetsConfigSchema,
  logging: LoggingConfigSchema,
  job: JobConfigSchema,
  credentials: CredentialsSchema
}).readonly();

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ApiConfig = AppConfig['api'];
export type Credentials = AppConfig['credentials'];
export type SheetWriteMode = AppConfig['sheets']['writeMode'];
export type PriceListCatalog = AppConfig['priceListNames'];

export type Environment = Record<string, string | undefined>;

export interface ConfigOptions {
  configPath?: string;
  env?: Environment;
}

/**
 * Read an optional JSON override file
 */
export function loadConfigFile(configPath: string): Record<string, unknown> {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Configuration file not found: ${resolved}`);
  }

  const raw: unknown = fs.readJsonSync(resolved);
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Configuration file must contain a JSON object: ${resolved}`);
  }
  return raw;
}

function parseNumber(value: string): number {
  // Number('') is 0, so blank strings become NaN and fail validation instead
  return value.trim() === '' ? NaN : Number(value);
}

export function parsePriceLists(value: string): number[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map(parseNumber);
}

/**
 * Build the override layer from environment variables.
 * Credentials are only ever read from here.
 */
export function environmentOverrides(env: Environment): Record<string, unknown> {
  const api: Record<string, unknown> = {};
  const extraction: Record<string, unknown> = {};
  const sheets: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};
  const job: Record<string, unknown> = {};

  if (env.CADDIS_API_URL) api.baseUrl = env.CADDIS_API_URL;
  if (env.REQUEST_TIMEOUT) api.requestTimeoutSeconds = parseNumber(env.REQUEST_TIMEOUT);
  if (env.RATE_LIMIT_DELAY) api.rateLimitDelaySeconds = parseNumber(env.RATE_LIMIT_DELAY);
  if (env.MAX_RETRIES) api.maxRetries = parseNumber(env.MAX_RETRIES);
  if (env.MAX_PAGES) api.maxPages = parseNumber(env.MAX_PAGES);

  if (env.PRICE_LISTS) extraction.priceLists = parsePriceLists(env.PRICE_LISTS);

  if (env.GOOGLE_SHEETS_ID) sheets.spreadsheetId = env.GOOGLE_SHEETS_ID;
  if (env.SHEET_NAME) sheets.sheetName = env.SHEET_NAME;
  if (env.SHEET_WRITE_MODE) sheets.writeMode = env.SHEET_WRITE_MODE.toLowerCase();

  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL.toLowerCase();
  if (env.LOG_DIR) logging.logDir = env.LOG_DIR;

  if (env.JOB_LOCK_FILE) job.lockFile = env.JOB_LOCK_FILE;

  return {
    api,
    extraction,
    sheets,
    logging,
    job,
    credentials: {
      username: env.CADDIS_USERNAME,
      password: env.CADDIS_PASSWORD
    }
  };
}

/**
 * Create the immutable application configuration:
 * defaults, then the optional JSON file, then environment variables.
 */
export function createConfig(options: ConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.PRICE_SYNC_CONFIG;

  let raw: Record<string, unknown> = { ...defaults };
  if (configPath) {
    const fileLayer = loadConfigFile(configPath);
    // Credentials never come from a committed file
    delete fileLayer.credentials;
    raw = deepMerge(raw, fileLayer);
  }
  raw = deepMerge(raw, environmentOverrides(env));

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const validationErrors = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('\n');

    throw new ConfigurationError(`Configuration validation failed:\n${validationErrors}`, {
      issues: result.error.errors.map((e) => e.path.join('.'))
    });
  }

  return result.data;
}

/**
 * Ensure directories the job writes into exist
 */
export async function ensureConfigDirectories(config: AppConfig): Promise<void> {
  await Promise.all([
    config.logging.fileOutput ? fs.ensureDir(config.logging.logDir) : Promise.resolve(),
    fs.ensureDir(path.dirname(config.job.lockFile))
  ]);
}

/**
 * Configuration summary safe to log: no credentials, spreadsheet ID masked
 */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    apiUrl: config.api.baseUrl,
    spreadsheetId: config.sheets.spreadsheetId ? 'SET' : 'NOT_SET',
    sheetName: config.sheets.sheetName,
    writeMode: config.sheets.writeMode,
    priceLists: [...config.extraction.priceLists],
    rateLimitDelaySeconds: config.api.rateLimitDelaySeconds,
    requestTimeoutSeconds: config.api.requestTimeoutSeconds,
    maxRetries: config.api.maxRetries,
    maxPages: config.api.maxPages,
    username: config.credentials.username ? 'SET' : 'NOT_SET'
  };
}
