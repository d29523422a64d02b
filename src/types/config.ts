import type { YouTubeAuth } from './youtube.js';
import type { MailConfig } from './mail.js';
import type { FailedSummaryPolicy } from './report.js';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface RunConfig {
  youtube: YouTubeAuth;
  gemini: {
    apiKey: string;
    model: string;
  };
  mail: MailConfig;
  daysBack: number;
  maxChannels: number;
  maxVideosPerChannel: number;
  outputDir: string;
  language: string;
  scheduleTime: string; // HH:MM, local time
  summaryConcurrency: number;
  failedSummaryPolicy: FailedSummaryPolicy;
  fontPath?: string;
  proxyUrl?: string; // from HTTPS_PROXY or HTTP_PROXY
  requestTimeoutMs: number;
  retry: RetryConfig;
  debug: boolean;
}

// Non-secret values that may come from a JSON settings file
export interface RunSettings {
  daysBack?: number;
  maxChannels?: number;
  maxVideosPerChannel?: number;
  outputDir?: string;
  language?: string;
  scheduleTime?: string;
  summaryConcurrency?: number;
  failedSummaryPolicy?: FailedSummaryPolicy;
}
