/**
 * Configuration System for daily-brief
 *
 * Provides centralized, type-safe configuration with:
 * - YAML file-based configuration (config.yaml)
 * - Environment-specific overrides (config.{env}.yaml)
 * - Environment variable overrides (highest priority)
 *
 * Priority (highest to lowest):
 * 1. Environment variables
 * 2. Environment-specific config file (config.dev.yaml, config.prod.yaml)
 * 3. Default config file (config.yaml)
 * 4. Built-in defaults
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import YAML from 'yaml';
import { CronExpressionParser } from 'cron-parser';
import { ConfigurationError, toErrorMessage } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('config');

/** E.164: a plus sign followed by 8 to 15 digits */
export const PHONE_NUMBER_PATTERN = /^\+\d{8,15}$/;

function isValidCron(expression: string): boolean {
  try {
    CronExpressionParser.parse(expression);
    return true;
  } catch {
    return false;
  }
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// ============ Configuration Schema ============

const ServerConfigSchema = z.object({
  /** HTTP server port */
  port: z.number().int().positive().default(2900),
});

const InngestConfigSchema = z.object({
  /** Inngest dashboard/API URL */
  baseUrl: z.string().default('http://localhost:8288'),
  /** Event key for authentication */
  eventKey: z.string().optional(),
  /** Signing key for webhooks */
  signingKey: z.string().optional(),
});

const ScheduleConfigSchema = z.object({
  /** Five-field cron expression, evaluated in `timezone` */
  cron: z.string().refine(isValidCron, 'Invalid cron expression').default('0 20 * * *'),
  /** IANA time zone used for the cron and for picking the brief date */
  timezone: z.string().refine(isValidTimeZone, 'Unknown time zone').default('UTC'),
});

const SourceConfigSchema = z.object({
  /** Current-events portal; the date segment is appended */
  baseUrl: z.string().url().default('https://en.wikipedia.org/wiki/Portal:Current_events'),
  /** Timeout for the portal request in milliseconds */
  timeout: z.number().int().positive().default(30000),
  /** User agent for HTTP requests */
  userAgent: z.string().default('daily-brief/0.1.0 (current events digest)'),
});

const AIConfigSchema = z.object({
  /** Groq API key */
  apiKey: z.string().min(1).optional(),
  /** Chat model used for summaries and facts */
  model: z.string().default('llama-3.1-8b-instant'),
  /** Sampling temperature for the interesting-fact prompt */
  factTemperature: z.number().min(0).max(2).default(1.5),
  /** Sampling temperature for event summaries (provider default when unset) */
  summaryTemperature: z.number().min(0).max(2).optional(),
  /** Use canned responses instead of the real API */
  useMock: z.boolean().default(false),
});

const MessagingConfigSchema = z.object({
  /** Twilio account SID */
  accountSid: z.string().min(1).optional(),
  /** Twilio auth token */
  authToken: z.string().min(1).optional(),
  /** WhatsApp sender, including the whatsapp: prefix */
  from: z.string().default('whatsapp:+14155238886'),
  /** Recipient phone numbers in E.164 form */
  recipients: z
    .array(z.string().regex(PHONE_NUMBER_PATTERN, 'Expected an E.164 phone number'))
    .default([]),
  /** Wait before fetching the delivery status of a sent message */
  statusCheckDelayMs: z.number().int().min(0).default(0),
  /** Log messages instead of sending them */
  dryRun: z.boolean().default(false),
});

const PathsConfigSchema = z.object({
  /** Data directory for run folders */
  data: z.string().default('./data'),
});

const LoggingConfigSchema = z.object({
  /** Log level: debug, info, warn, error */
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Include timestamps in logs */
  timestamps: z.boolean().default(true),
  /** Use colors in console output */
  colors: z.boolean().default(true),
  /** Also append plain log lines to this file */
  file: z.string().optional(),
});

const ConfigSchema = z.object({
  /** Environment name */
  env: z.enum(['development', 'staging', 'production']).default('development'),
  server: ServerConfigSchema.default({}),
  inngest: InngestConfigSchema.default({}),
  schedule: ScheduleConfigSchema.default({}),
  source: SourceConfigSchema.default({}),
  ai: AIConfigSchema.default({}),
  messaging: MessagingConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type InngestConfig = z.infer<typeof InngestConfigSchema>;
export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type AIConfig = z.infer<typeof AIConfigSchema>;
export type MessagingConfig = z.infer<typeof MessagingConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export interface LoadConfigOptions {
  /** Directory holding config.yaml; found by walking up to package.json when omitted */
  projectRoot?: string;
  /** Environment to read overrides from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

// ============ Configuration Loading ============

let cachedConfig: Config | null = null;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Find the project root by looking for package.json
 */
function findProjectRoot(): string {
  let dir = process.cwd();
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}

/**
 * Load and parse a YAML config file
 */
function loadYamlFile(filePath: string): PlainObject | null {
  if (!existsSync(filePath)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Could not parse ${filePath}`, [toErrorMessage(err)]);
  }
  if (parsed == null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

const parseBoolean = (v: string): boolean => v === 'true' || v === '1';
const parseInteger = (v: string): number => parseInt(v, 10);
const parseList = (v: string): string[] =>
  v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

/**
 * Apply environment variable overrides
 * Maps env vars to config paths:
 * - PORT -> server.port
 * - GROQ_API_KEY -> ai.apiKey
 * - TWILIO_ACCOUNT_SID -> messaging.accountSid
 * - etc.
 */
function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  const envMappings: Array<[string, string[], (v: string) => unknown]> = [
    // Environment
    ['NODE_ENV', ['env'], (v) => (v === 'production' ? 'production' : v === 'staging' ? 'staging' : 'development')],
    ['BRIEF_ENV', ['env'], (v) => v],

    // Server
    ['PORT', ['server', 'port'], parseInteger],

    // Inngest
    ['INNGEST_BASE_URL', ['inngest', 'baseUrl'], (v) => v],
    ['INNGEST_EVENT_KEY', ['inngest', 'eventKey'], (v) => v],
    ['INNGEST_SIGNING_KEY', ['inngest', 'signingKey'], (v) => v],

    // Schedule
    ['BRIEF_CRON', ['schedule', 'cron'], (v) => v],
    ['BRIEF_TIMEZONE', ['schedule', 'timezone'], (v) => v],

    // Source
    ['CURRENT_EVENTS_URL', ['source', 'baseUrl'], (v) => v],

    // AI
    ['GROQ_API_KEY', ['ai', 'apiKey'], (v) => v],
    ['GROQ_MODEL', ['ai', 'model'], (v) => v],
    ['USE_MOCK_AI', ['ai', 'useMock'], parseBoolean],

    // Messaging
    ['TWILIO_ACCOUNT_SID', ['messaging', 'accountSid'], (v) => v],
    ['TWILIO_AUTH_TOKEN', ['messaging', 'authToken'], (v) => v],
    ['TWILIO_WHATSAPP_FROM', ['messaging', 'from'], (v) => v],
    ['BRIEF_RECIPIENTS', ['messaging', 'recipients'], parseList],
    ['BRIEF_DRY_RUN', ['messaging', 'dryRun'], parseBoolean],

    // Paths
    ['BRIEF_DATA_PATH', ['paths', 'data'], (v) => v],

    // Logging
    ['LOG_LEVEL', ['logging', 'level'], (v) => v],
    ['LOG_FILE', ['logging', 'file'], (v) => v],
  ];

  let result = config;
  for (const [envKey, path, transform] of envMappings) {
    const envValue = env[envKey];
    // Unset CI secrets arrive as empty strings
    if (envValue === undefined || envValue === '') {
      continue;
    }
    const override: PlainObject = {};
    let current = override;
    path.forEach((key, index) => {
      if (index === path.length - 1) {
        current[key] = transform(envValue);
      } else {
        const next: PlainObject = {};
        current[key] = next;
        current = next;
      }
    });
    result = deepMerge(result, override);
  }

  return result;
}

/**
 * Load configuration with proper layering
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const projectRoot = options.projectRoot ?? findProjectRoot();

  // 1. Start with empty config (defaults come from schema)
  let config: PlainObject = {};

  // 2. Load base config.yaml
  const baseConfig = loadYamlFile(join(projectRoot, 'config.yaml'));
  if (baseConfig) {
    config = deepMerge(config, baseConfig);
    log.debug('Loaded config.yaml');
  }

  // 3. Load environment-specific config
  const envName = env.NODE_ENV || env.BRIEF_ENV || 'development';
  const envShort = envName === 'production' ? 'prod' : envName === 'staging' ? 'staging' : 'dev';
  const envConfig = loadYamlFile(join(projectRoot, `config.${envShort}.yaml`));
  if (envConfig) {
    config = deepMerge(config, envConfig);
    log.debug(`Loaded config.${envShort}.yaml`);
  }

  // 4. Apply environment variable overrides
  config = applyEnvOverrides(config, env);

  // 5. Validate and apply defaults
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Get the current configuration
 */
export function getConfig(): Config {
  return cachedConfig ?? loadConfig();
}

/**
 * Reload configuration from files
 */
export function reloadConfig(options?: LoadConfigOptions): Config {
  cachedConfig = null;
  return loadConfig(options);
}

/**
 * Reset configuration cache (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// ============ Convenience Accessors ============

/** Get Inngest configuration */
export function getInngestConfig(): InngestConfig {
  return getConfig().inngest;
}

/** Get schedule configuration */
export function getScheduleConfig(): ScheduleConfig {
  return getConfig().schedule;
}

/** Get messaging configuration */
export function getMessagingConfig(): MessagingConfig {
  return getConfig().messaging;
}

/**
 * Recipients with duplicates removed, in configured order
 */
export function getRecipients(): string[] {
  return [...new Set(getMessagingConfig().recipients)];
}
