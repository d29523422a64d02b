import { readFile } from 'fs/promises';
import { ConfigError } from '../errors.js';
import type {
  FailedSummaryPolicy,
  RunConfig,
  RunSettings,
  YouTubeAuth,
} from '../../types/index.js';

export type Env = Record<string, string | undefined>;

const DEFAULTS = {
  smtpServer: 'smtp.gmail.com',
  smtpPort: 587,
  geminiModel: 'gemini-2.5-flash',
  daysBack: 1,
  maxChannels: 20,
  maxVideosPerChannel: 3,
  outputDir: 'reports',
  language: 'ko',
  scheduleTime: '08:00',
  summaryConcurrency: 5,
  failedSummaryPolicy: 'placeholder',
  requestTimeoutMs: 60_000,
  retryMaxAttempts: 3,
  retryBaseDelayMs: 2000,
} as const;

const SCHEDULE_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const PROXY_KEYS = ['HTTPS_PROXY', 'https_proxy', 'HTTP_PROXY', 'http_proxy'];
const CJK_LANGUAGES = new Set(['ko', 'ja', 'zh']);

function value(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

class ConfigReader {
  readonly missing: string[] = [];
  readonly invalid: string[] = [];

  constructor(private env: Env) {}

  required(key: string): string {
    const raw = value(this.env, key);
    if (!raw) {
      this.missing.push(key);
      return '';
    }
    return raw;
  }

  optional(key: string): string | undefined {
    return value(this.env, key);
  }

  integer(key: string, fallback: number, min = 0): number {
    const raw = value(this.env, key);
    if (raw === undefined) return this.checkInteger(key, fallback, min);
    return this.checkInteger(key, Number(raw), min);
  }

  checkInteger(key: string, candidate: number, min: number): number {
    if (!Number.isInteger(candidate) || candidate < min) {
      this.invalid.push(`${key} must be an integer >= ${min}`);
      return min;
    }
    return candidate;
  }

  boolean(key: string): boolean {
    return value(this.env, key)?.toLowerCase() === 'true';
  }
}

function resolveYouTubeAuth(reader: ConfigReader): YouTubeAuth {
  const clientId = reader.optional('YOUTUBE_CLIENT_ID');
  const clientSecret = reader.optional('YOUTUBE_CLIENT_SECRET');
  const refreshToken = reader.optional('YOUTUBE_REFRESH_TOKEN');
  const apiKey = reader.optional('YOUTUBE_API_KEY');

  if (apiKey && !clientId && !clientSecret && !refreshToken) {
    return { kind: 'apiKey', apiKey, channelId: reader.required('YOUTUBE_CHANNEL_ID') };
  }

  return {
    kind: 'oauth',
    clientId: reader.required('YOUTUBE_CLIENT_ID'),
    clientSecret: reader.required('YOUTUBE_CLIENT_SECRET'),
    refreshToken: reader.required('YOUTUBE_REFRESH_TOKEN'),
  };
}

function isHttpUrl(raw: string): boolean {
  try {
    const { protocol } = new URL(raw);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

// Every outbound call is HTTPS, so one proxy serves them all
function resolveProxy(reader: ConfigReader): string | undefined {
  for (const key of PROXY_KEYS) {
    const raw = reader.optional(key);
    if (!raw) continue;
    if (!isHttpUrl(raw)) {
      reader.invalid.push(`${key} must be an http:// or https:// URL`);
      return undefined;
    }
    return raw;
  }
  return undefined;
}

function resolvePolicy(reader: ConfigReader, fallback: FailedSummaryPolicy): FailedSummaryPolicy {
  const raw = reader.optional('FAILED_SUMMARY_POLICY') ?? fallback;
  if (raw === 'placeholder' || raw === 'drop') return raw;
  reader.invalid.push(`FAILED_SUMMARY_POLICY must be "placeholder" or "drop" (got "${raw}")`);
  return DEFAULTS.failedSummaryPolicy;
}

function deepFreeze<T extends object>(target: T): Readonly<T> {
  for (const nested of Object.values(target)) {
    if (typeof nested === 'object' && nested !== null) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(target);
}

/**
 * Resolves the run configuration once. Precedence: environment, then the
 * settings file, then defaults. Every missing or invalid key is reported in a
 * single ConfigError.
 */
export function loadRunConfig(env: Env, settings: RunSettings = {}): Readonly<RunConfig> {
  const reader = new ConfigReader(env);

  const youtube = resolveYouTubeAuth(reader);
  const geminiApiKey = reader.required('GEMINI_API_KEY');
  const username = reader.required('EMAIL_USERNAME');
  const password = reader.required('EMAIL_PASSWORD');
  const to = reader.required('EMAIL_TO');

  const scheduleTime = reader.optional('SCHEDULE_TIME') ?? settings.scheduleTime ?? DEFAULTS.scheduleTime;
  if (!SCHEDULE_TIME_PATTERN.test(scheduleTime)) {
    reader.invalid.push(`SCHEDULE_TIME must be HH:MM (got "${scheduleTime}")`);
  }

  const config: RunConfig = {
    youtube,
    gemini: {
      apiKey: geminiApiKey,
      model: reader.optional('GEMINI_MODEL') ?? DEFAULTS.geminiModel,
    },
    mail: {
      host: reader.optional('EMAIL_SMTP_SERVER') ?? DEFAULTS.smtpServer,
      port: reader.integer('EMAIL_SMTP_PORT', DEFAULTS.smtpPort, 1),
      username,
      password,
      from: reader.optional('EMAIL_FROM') ?? username,
      to,
    },
    daysBack: reader.integer('DAYS_BACK_TO_FETCH', settings.daysBack ?? DEFAULTS.daysBack, 1),
    maxChannels: reader.integer('MAX_CHANNELS', settings.maxChannels ?? DEFAULTS.maxChannels),
    maxVideosPerChannel: reader.integer(
      'MAX_VIDEOS_PER_CHANNEL',
      settings.maxVideosPerChannel ?? DEFAULTS.maxVideosPerChannel
    ),
    outputDir: reader.optional('REPORT_OUTPUT_DIR') ?? settings.outputDir ?? DEFAULTS.outputDir,
    language: reader.optional('SUMMARY_LANGUAGE') ?? settings.language ?? DEFAULTS.language,
    scheduleTime,
    summaryConcurrency: reader.integer(
      'SUMMARY_CONCURRENCY',
      settings.summaryConcurrency ?? DEFAULTS.summaryConcurrency,
      1
    ),
    failedSummaryPolicy: resolvePolicy(reader, settings.failedSummaryPolicy ?? DEFAULTS.failedSummaryPolicy),
    fontPath: reader.optional('REPORT_FONT_PATH'),
    proxyUrl: resolveProxy(reader),
    requestTimeoutMs: reader.integer('REQUEST_TIMEOUT_MS', DEFAULTS.requestTimeoutMs, 1),
    retry: {
      maxAttempts: reader.integer('RETRY_MAX_ATTEMPTS', DEFAULTS.retryMaxAttempts, 1),
      baseDelayMs: reader.integer('RETRY_BASE_DELAY_MS', DEFAULTS.retryBaseDelayMs),
    },
    debug: reader.boolean('DEBUG'),
  };

  if (reader.missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${reader.missing.join(', ')}`,
      reader.missing
    );
  }
  if (reader.invalid.length > 0) {
    throw new ConfigError(`Invalid configuration: ${reader.invalid.join('; ')}`);
  }

  return deepFreeze(config);
}

/** Problems that do not stop a run but degrade the report. */
export function configWarnings(config: RunConfig): string[] {
  const warnings: string[] = [];
  const language = config.language.toLowerCase().split(/[-_]/)[0];
  if (CJK_LANGUAGES.has(language) && !config.fontPath) {
    warnings.push(
      `REPORT_FONT_PATH가 설정되지 않아 기본 PDF 글꼴로는 "${config.language}" 요약을 표시할 수 없습니다. CJK 글꼴(TTF/OTF) 경로를 지정하세요.`
    );
  }
  return warnings;
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

export function parseSettings(input: unknown): RunSettings {
  if (!isRecord(input)) {
    throw new ConfigError('Settings file must contain a JSON object');
  }

  const settings: RunSettings = {};
  const numberKeys = ['daysBack', 'maxChannels', 'maxVideosPerChannel', 'summaryConcurrency'] as const;
  const stringKeys = ['outputDir', 'language', 'scheduleTime'] as const;

  for (const key of numberKeys) {
    const entry = input[key];
    if (entry === undefined) continue;
    if (typeof entry !== 'number') {
      throw new ConfigError(`Settings "${key}" must be a number`);
    }
    settings[key] = entry;
  }

  for (const key of stringKeys) {
    const entry = input[key];
    if (entry === undefined) continue;
    if (typeof entry !== 'string') {
      throw new ConfigError(`Settings "${key}" must be a string`);
    }
    settings[key] = entry;
  }

  const policy = input.failedSummaryPolicy;
  if (policy !== undefined) {
    if (policy !== 'placeholder' && policy !== 'drop') {
      throw new ConfigError('Settings "failedSummaryPolicy" must be "placeholder" or "drop"');
    }
    settings.failedSummaryPolicy = policy;
  }

  return settings;
}

export async function loadSettingsFile(path: string): Promise<RunSettings> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read settings file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return parseSettings(JSON.parse(content));
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Settings file ${path} is not valid JSON`);
  }
}
