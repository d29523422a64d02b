import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { configWarnings, loadRunConfig, loadSettingsFile, parseSettings, type Env } from './loader.js';
import { ConfigError } from '../errors.js';

const baseEnv: Env = {
  GEMINI_API_KEY: 'test-gemini-key',
  EMAIL_USERNAME: 'digest@example.com',
  EMAIL_PASSWORD: 'test-password',
  EMAIL_TO: 'reader@example.com',
  YOUTUBE_CLIENT_ID: 'test-client-id',
  YOUTUBE_CLIENT_SECRET: 'test-client-secret',
  YOUTUBE_REFRESH_TOKEN: 'test-refresh-token',
};

function catchConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadRunConfig', () => {
  it('should apply defaults', () => {
    const config = loadRunConfig(baseEnv);

    expect(config.youtube).toEqual({
      kind: 'oauth',
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      refreshToken: 'test-refresh-token',
    });
    expect(config.mail).toEqual({
      host: 'smtp.gmail.com',
      port: 587,
      username: 'digest@example.com',
      password: 'test-password',
      from: 'digest@example.com',
      to: 'reader@example.com',
    });
    expect(config.gemini.model).toBe('gemini-2.5-flash');
    expect(config.daysBack).toBe(1);
    expect(config.maxChannels).toBe(20);
    expect(config.maxVideosPerChannel).toBe(3);
    expect(config.outputDir).toBe('reports');
    expect(config.language).toBe('ko');
    expect(config.scheduleTime).toBe('08:00');
    expect(config.summaryConcurrency).toBe(5);
    expect(config.failedSummaryPolicy).toBe('placeholder');
    expect(config.fontPath).toBeUndefined();
    expect(config.proxyUrl).toBeUndefined();
    expect(config.requestTimeoutMs).toBe(60_000);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 2000 });
    expect(config.debug).toBe(false);
  });

  it('should return a deeply frozen config', () => {
    const config = loadRunConfig(baseEnv);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.mail)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });

  it('should report every missing key at once', () => {
    const error = catchConfigError(() => loadRunConfig({ YOUTUBE_CLIENT_ID: 'id' }));

    expect(error.missing).toEqual([
      'YOUTUBE_CLIENT_SECRET',
      'YOUTUBE_REFRESH_TOKEN',
      'GEMINI_API_KEY',
      'EMAIL_USERNAME',
      'EMAIL_PASSWORD',
      'EMAIL_TO',
    ]);
    expect(error.message).toBe(
      'Missing required environment variables: YOUTUBE_CLIENT_SECRET, YOUTUBE_REFRESH_TOKEN, GEMINI_API_KEY, EMAIL_USERNAME, EMAIL_PASSWORD, EMAIL_TO'
    );
  });

  it('should use API key auth when only an API key is given', () => {
    const config = loadRunConfig({
      ...baseEnv,
      YOUTUBE_CLIENT_ID: undefined,
      YOUTUBE_CLIENT_SECRET: undefined,
      YOUTUBE_REFRESH_TOKEN: '',
      YOUTUBE_API_KEY: 'test-api-key',
      YOUTUBE_CHANNEL_ID: 'UCme',
    });

    expect(config.youtube).toEqual({ kind: 'apiKey', apiKey: 'test-api-key', channelId: 'UCme' });
  });

  it('should require a channel id for API key auth', () => {
    const error = catchConfigError(() =>
      loadRunConfig({
        GEMINI_API_KEY: 'k',
        EMAIL_USERNAME: 'u',
        EMAIL_PASSWORD: 'p',
        EMAIL_TO: 't',
        YOUTUBE_API_KEY: 'test-api-key',
      })
    );
    expect(error.missing).toEqual(['YOUTUBE_CHANNEL_ID']);
  });

  it('should prefer the environment over settings over defaults', () => {
    const config = loadRunConfig(
      { ...baseEnv, MAX_CHANNELS: '7', DEBUG: 'true' },
      { maxChannels: 2, maxVideosPerChannel: 1, language: 'en' }
    );

    expect(config.maxChannels).toBe(7);
    expect(config.maxVideosPerChannel).toBe(1);
    expect(config.language).toBe('en');
    expect(config.debug).toBe(true);
  });

  it('should accept zero caps', () => {
    const config = loadRunConfig({ ...baseEnv, MAX_CHANNELS: '0', MAX_VIDEOS_PER_CHANNEL: '0' });
    expect(config.maxChannels).toBe(0);
    expect(config.maxVideosPerChannel).toBe(0);
  });

  it('should reject invalid values', () => {
    const error = catchConfigError(() =>
      loadRunConfig({ ...baseEnv, SCHEDULE_TIME: '25:00', EMAIL_SMTP_PORT: 'abc', FAILED_SUMMARY_POLICY: 'skip' })
    );

    expect(error.message).toBe(
      'Invalid configuration: SCHEDULE_TIME must be HH:MM (got "25:00"); EMAIL_SMTP_PORT must be an integer >= 1; FAILED_SUMMARY_POLICY must be "placeholder" or "drop" (got "skip")'
    );
  });
});

describe('proxy resolution', () => {
  it('should prefer HTTPS_PROXY over HTTP_PROXY', () => {
    const config = loadRunConfig({
      ...baseEnv,
      HTTP_PROXY: 'http://proxy.internal:3128',
      HTTPS_PROXY: 'http://secure-proxy.internal:8080',
    });
    expect(config.proxyUrl).toBe('http://secure-proxy.internal:8080');
  });

  it('should fall back to a lowercase http_proxy', () => {
    const config = loadRunConfig({ ...baseEnv, http_proxy: 'http://proxy.internal:3128' });
    expect(config.proxyUrl).toBe('http://proxy.internal:3128');
  });

  it('should reject a proxy that is not an http(s) URL', () => {
    const error = catchConfigError(() => loadRunConfig({ ...baseEnv, HTTPS_PROXY: 'socks5://proxy.internal:1080' }));
    expect(error.message).toBe('Invalid configuration: HTTPS_PROXY must be an http:// or https:// URL');
  });
});

describe('configWarnings', () => {
  it('should warn when a CJK report has no font', () => {
    expect(configWarnings(loadRunConfig(baseEnv))).toEqual([
      'REPORT_FONT_PATH가 설정되지 않아 기본 PDF 글꼴로는 "ko" 요약을 표시할 수 없습니다. CJK 글꼴(TTF/OTF) 경로를 지정하세요.',
    ]);
    expect(configWarnings(loadRunConfig({ ...baseEnv, SUMMARY_LANGUAGE: 'zh-CN' }))).toHaveLength(1);
  });

  it('should stay quiet with a font or a Latin-script language', () => {
    expect(configWarnings(loadRunConfig({ ...baseEnv, REPORT_FONT_PATH: '/fonts/NotoSansKR.ttf' }))).toEqual([]);
    expect(configWarnings(loadRunConfig({ ...baseEnv, SUMMARY_LANGUAGE: 'en' }))).toEqual([]);
  });
});

describe('parseSettings', () => {
  it('should keep known keys', () => {
    expect(parseSettings({ daysBack: 2, language: 'ja', failedSummaryPolicy: 'drop', extra: true })).toEqual({
      daysBack: 2,
      language: 'ja',
      failedSummaryPolicy: 'drop',
    });
  });

  it('should reject wrong types', () => {
    expect(() => parseSettings([])).toThrow('Settings file must contain a JSON object');
    expect(() => parseSettings({ maxChannels: '3' })).toThrow('Settings "maxChannels" must be a number');
    expect(() => parseSettings({ failedSummaryPolicy: 'skip' })).toThrow(ConfigError);
  });
});

describe('loadSettingsFile', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should read settings from JSON', async () => {
    dir = await mkdtemp(join(tmpdir(), 'digest-settings-'));
    const path = join(dir, 'settings.json');
    await writeFile(path, JSON.stringify({ maxChannels: 4 }));

    expect(await loadSettingsFile(path)).toEqual({ maxChannels: 4 });
  });

  it('should reject malformed JSON', async () => {
    dir = await mkdtemp(join(tmpdir(), 'digest-settings-'));
    const path = join(dir, 'settings.json');
    await writeFile(path, '{ nope');

    await expect(loadSettingsFile(path)).rejects.toThrow(`Settings file ${path} is not valid JSON`);
  });
});
