import { SummaryError, getErrorDetail, toError } from './errors.js';
import { SUMMARY_MAX_LENGTH, SUMMARY_MIN_LENGTH } from './gemini/prompts.js';
import type { Summary, SummaryOutcome, SummaryResponse, VideoItem } from '../types/index.js';

export interface SummaryProvider {
  summarizeVideo(video: VideoItem, locale: string): Promise<SummaryResponse>;
}

export interface SummarizerCallbacks {
  onProgress?: (message: string) => void;
  onDebug?: (message: string) => void;
  onVideoStart?: (video: VideoItem, index: number, total: number) => void;
  onVideoComplete?: (video: VideoItem, index: number, total: number) => void;
  onVideoError?: (video: VideoItem, error: Error) => void;
}

export class Summarizer {
  constructor(
    private provider: SummaryProvider,
    private callbacks: SummarizerCallbacks = {}
  ) {}

  /** Never rejects: provider failures come back as `{ ok: false }` for this video. */
  async summarize(video: VideoItem, language: string): Promise<SummaryOutcome> {
    try {
      const response = await this.provider.summarizeVideo(video, language);
      const length = [...response.summary].length;
      if (length < SUMMARY_MIN_LENGTH || length > SUMMARY_MAX_LENGTH) {
        this.callbacks.onDebug?.(
          `요약 길이 ${length}자 (권장 ${SUMMARY_MIN_LENGTH}-${SUMMARY_MAX_LENGTH}자): ${video.title}`
        );
      }

      const translatedTitle = response.translatedTitle.trim();
      const summary: Summary =
        translatedTitle && translatedTitle !== video.title
          ? { video, text: response.summary, translatedTitle }
          : { video, text: response.summary };
      return { ok: true, summary: Object.freeze(summary) };
    } catch (error) {
      const cause = toError(error);
      return {
        ok: false,
        video,
        error: new SummaryError(`Summarization failed for "${video.title}": ${getErrorDetail(cause)}`, { cause }),
      };
    }
  }

  /**
   * Summarizes every video with at most `concurrency` calls in flight.
   * Outcomes keep the input order.
   */
  async summarizeAll(
    videos: readonly VideoItem[],
    language: string,
    options: { concurrency?: number } = {}
  ): Promise<SummaryOutcome[]> {
    const { onProgress, onVideoStart, onVideoComplete, onVideoError } = this.callbacks;
    const outcomes: SummaryOutcome[] = new Array(videos.length);
    const concurrency = Math.max(1, options.concurrency ?? 1);
    let completedCount = 0;

    const processVideo = async (video: VideoItem, index: number): Promise<void> => {
      onVideoStart?.(video, index + 1, videos.length);
      const outcome = await this.summarize(video, language);
      outcomes[index] = outcome;

      completedCount++;
      if (outcome.ok) {
        onVideoComplete?.(video, completedCount, videos.length);
      } else {
        onVideoError?.(video, outcome.error);
      }
    };

    if (concurrency <= 1) {
      for (let i = 0; i < videos.length; i++) {
        await processVideo(videos[i], i);
      }
    } else {
      const pool: Promise<void>[] = [];
      let nextIndex = 0;

      const runNext = async (): Promise<void> => {
        while (nextIndex < videos.length) {
          const currentIndex = nextIndex++;
          await processVideo(videos[currentIndex], currentIndex);
        }
      };

      for (let i = 0; i < Math.min(concurrency, videos.length); i++) {
        pool.push(runNext());
      }

      await Promise.all(pool);
    }

    const succeeded = outcomes.filter((outcome) => outcome.ok).length;
    onProgress?.(`요약 완료! 성공: ${succeeded}, 실패: ${outcomes.length - succeeded}`);

    return outcomes;
  }
}
