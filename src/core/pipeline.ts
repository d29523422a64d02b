import type { ListerConfig } from './youtube/lister.js';
import type { RenderedReport } from './output/store.js';
import type {
  DispatchResult,
  ReportDocument,
  ReportFiles,
  ReportMetadata,
  RunConfig,
  SummaryOutcome,
  VideoItem,
} from '../types/index.js';

export interface PipelineStages {
  lister: { listRecentVideos(config: ListerConfig): Promise<VideoItem[]> };
  summarizer: {
    summarizeAll(
      videos: readonly VideoItem[],
      language: string,
      options?: { concurrency?: number }
    ): Promise<SummaryOutcome[]>;
  };
  composer: { compose(outcomes: readonly SummaryOutcome[], metadata: ReportMetadata): ReportDocument };
  markdown: { generate(document: ReportDocument): string };
  renderer: { render(document: ReportDocument): Promise<Buffer> };
  store: { save(document: ReportDocument, rendered: RenderedReport): Promise<ReportFiles> };
  dispatcher: { send(report: ReportFiles, recipient?: string): Promise<DispatchResult> };
}

export interface PipelineCallbacks {
  onProgress?: (message: string) => void;
  onStage?: (stage: 'list' | 'summarize' | 'compose' | 'dispatch') => void;
}

export interface PipelineOptions {
  skipEmail?: boolean;
  now?: () => Date;
}

export type RunStatus = 'empty' | 'stored' | 'sent';

export interface RunResult {
  status: RunStatus;
  listed: number;
  summarized: number;
  failed: number;
  included: number;
  files?: ReportFiles;
  messageId?: string;
}

export async function runPipeline(
  stages: PipelineStages,
  config: RunConfig,
  callbacks: PipelineCallbacks = {},
  options: PipelineOptions = {}
): Promise<RunResult> {
  const { onProgress, onStage } = callbacks;
  const now = options.now ?? (() => new Date());

  onStage?.('list');
  const videos = await stages.lister.listRecentVideos(config);
  if (videos.length === 0) {
    onProgress?.('새 영상이 없습니다. 리포트를 만들지 않습니다.');
    return { status: 'empty', listed: 0, summarized: 0, failed: 0, included: 0 };
  }

  onStage?.('summarize');
  const outcomes = await stages.summarizer.summarizeAll(videos, config.language, {
    concurrency: config.summaryConcurrency,
  });
  const summarized = outcomes.filter((outcome) => outcome.ok).length;
  const counts = { listed: videos.length, summarized, failed: outcomes.length - summarized };

  onStage?.('compose');
  const document = stages.composer.compose(outcomes, {
    generatedAt: now(),
    language: config.language,
    failedSummaryPolicy: config.failedSummaryPolicy,
  });
  const markdown = stages.markdown.generate(document);
  const pdf = await stages.renderer.render(document);
  const files = await stages.store.save(document, { markdown, pdf });
  onProgress?.(`리포트 저장: ${files.pdfPath}`);

  if (options.skipEmail) {
    return { status: 'stored', ...counts, included: document.videoCount, files };
  }

  onStage?.('dispatch');
  const dispatch = await stages.dispatcher.send(files, config.mail.to);
  onProgress?.(`메일 발송 완료: ${dispatch.recipient}`);

  return { status: 'sent', ...counts, included: document.videoCount, files, messageId: dispatch.messageId };
}
