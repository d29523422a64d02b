import {
  CatalogAuthError,
  getErrorDetail,
  getErrorReasons,
  getHttpStatus,
  isTransientError,
  toError,
} from '../errors.js';
import { withRetry } from '../retry.js';
import type { ChannelRef, RunConfig, VideoItem } from '../../types/index.js';

export interface CatalogProvider {
  listSubscriptions(maxChannels: number): Promise<ChannelRef[]>;
  listRecentUploads(channel: ChannelRef, publishedAfter: Date, maxVideos: number): Promise<VideoItem[]>;
}

export interface ListerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarning?: (message: string) => void;
}

export type ListerConfig = Pick<RunConfig, 'daysBack' | 'maxChannels' | 'maxVideosPerChannel' | 'retry'>;

const DAY_MS = 24 * 60 * 60 * 1000;
const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded', 'rateLimitExceeded', 'userRateLimitExceeded']);

export function isQuotaError(error: unknown): boolean {
  const status = getHttpStatus(error);
  if (status === 429) return true;
  return status === 403 && getErrorReasons(error).some((reason) => QUOTA_REASONS.has(reason));
}

export function isAuthError(error: unknown): boolean {
  const status = getHttpStatus(error);
  return status === 401 || (status === 403 && !isQuotaError(error));
}

function isRetryableCatalogError(error: unknown): boolean {
  return !isQuotaError(error) && !isAuthError(error) && isTransientError(error);
}

export class SourceLister {
  private now: () => Date;

  constructor(
    private catalog: CatalogProvider,
    private callbacks: ListerCallbacks = {},
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private retry<T>(fn: () => Promise<T>, config: ListerConfig, context: string): Promise<T> {
    return withRetry(fn, {
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      isRetryable: isRetryableCatalogError,
      onRetry: (attempt, maxAttempts, error, delayMs) =>
        this.callbacks.onWarning?.(
          `YouTube API 재시도 (${attempt}/${maxAttempts}, ${context}): ${error.message}. ${delayMs / 1000}초 후 재시도...`
        ),
    });
  }

  /**
   * Videos published inside the recency window, in subscription order and
   * newest first per channel. Only an auth failure on the subscription list
   * aborts; quota exhaustion and per-channel failures yield a partial result.
   */
  async listRecentVideos(config: ListerConfig): Promise<VideoItem[]> {
    const { onProgress, onDebug, onWarning } = this.callbacks;

    if (config.maxChannels <= 0 || config.maxVideosPerChannel <= 0) {
      onDebug?.('채널 또는 영상 상한이 0이므로 목록 조회를 건너뜁니다.');
      return [];
    }

    let channels: ChannelRef[];
    try {
      channels = await this.retry(() => this.catalog.listSubscriptions(config.maxChannels), config, 'subscriptions');
    } catch (error) {
      if (isAuthError(error)) {
        throw new CatalogAuthError('YouTube authentication failed while listing subscriptions', { cause: error });
      }
      if (isQuotaError(error)) {
        onWarning?.(`YouTube API 할당량 초과: 구독 목록을 가져오지 못했습니다. (${getErrorDetail(toError(error))})`);
        return [];
      }
      throw error;
    }

    onProgress?.(`구독 채널 ${channels.length}개`);

    const publishedAfter = new Date(this.now().getTime() - config.daysBack * DAY_MS);
    const videos: VideoItem[] = [];

    for (const channel of channels.slice(0, config.maxChannels)) {
      try {
        const uploads = await this.retry(
          () => this.catalog.listRecentUploads(channel, publishedAfter, config.maxVideosPerChannel),
          config,
          channel.title
        );
        const recent = uploads
          .filter((video) => new Date(video.publishedAt).getTime() >= publishedAfter.getTime())
          .slice(0, config.maxVideosPerChannel);

        onDebug?.(`${channel.title}: 최근 영상 ${recent.length}개`);
        videos.push(...recent);
      } catch (error) {
        const detail = getErrorDetail(toError(error));
        if (isQuotaError(error)) {
          onWarning?.(`YouTube API 할당량 초과: ${channel.title} 이후 채널은 건너뜁니다. (${detail})`);
          break;
        }
        onWarning?.(`채널 목록 조회 실패 (${channel.title}): ${detail}`);
      }
    }

    onProgress?.(`최근 ${config.daysBack}일 영상 ${videos.length}개 발견`);
    return videos;
  }
}
