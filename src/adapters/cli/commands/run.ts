import { Command, Option } from 'commander';
import { config as loadEnv } from 'dotenv';
import { ProxyAgent, setGlobalDispatcher } from 'undici';
import {
  DailyScheduler,
  DigestError,
  GeminiClient,
  MailDispatcher,
  MarkdownGenerator,
  PdfRenderer,
  ReportComposer,
  ReportStore,
  SourceLister,
  Summarizer,
  YouTubeClient,
  configWarnings,
  getErrorDetail,
  loadRunConfig,
  loadSettingsFile,
  runPipeline,
  toError,
  type PipelineStages,
  type RunResult,
} from '../../../core/index.js';
import type { RunConfig, RunSettings } from '../../../types/index.js';

interface RunOptions {
  once?: boolean;
  schedule?: boolean;
  skipEmail?: boolean;
  settings?: string;
  verbose?: boolean;
}

function buildStages(config: RunConfig, log: ConsoleLog): PipelineStages {
  const onRetry = (service: string) => (attempt: number, maxAttempts: number, error: Error, delayMs: number) =>
    log.warn(`${service} 재시도 (${attempt}/${maxAttempts}): ${error.message}. ${delayMs / 1000}초 후 재시도...`);

  // The Gemini SDK calls the global fetch, which ignores proxy variables
  if (config.proxyUrl) {
    setGlobalDispatcher(new ProxyAgent(config.proxyUrl));
  }

  const youtube = new YouTubeClient(config.youtube, {
    timeoutMs: config.requestTimeoutMs,
    proxyUrl: config.proxyUrl,
  });
  const gemini = new GeminiClient({
    apiKey: config.gemini.apiKey,
    model: config.gemini.model,
    maxAttempts: config.retry.maxAttempts,
    retryDelayMs: config.retry.baseDelayMs,
    timeoutMs: config.requestTimeoutMs,
    onRetry: onRetry('Gemini API'),
  });

  return {
    lister: new SourceLister(youtube, {
      onProgress: log.info,
      onDebug: log.debug,
      onWarning: log.warn,
    }),
    summarizer: new Summarizer(gemini, {
      onProgress: log.info,
      onDebug: log.debug,
      onVideoStart: (video, index, total) => log.debug?.(`[${index}/${total}] 요약 시작: ${video.title}`),
      onVideoComplete: (video, index, total) => console.log(`✅ [${index}/${total}] 완료: ${video.title}`),
      onVideoError: (video, error) => {
        console.error(`❌ 오류 (${video.title}): ${getErrorDetail(error)}`);
        if (log.debug && error.stack) {
          console.error(`📋 Stack trace:\n${error.stack}`);
        }
      },
    }),
    composer: new ReportComposer(),
    markdown: new MarkdownGenerator(),
    renderer: new PdfRenderer({ fontPath: config.fontPath }),
    store: new ReportStore(config.outputDir),
    dispatcher: new MailDispatcher(config.mail, {
      language: config.language,
      retry: config.retry,
      timeoutMs: config.requestTimeoutMs,
      proxyUrl: config.proxyUrl,
      onRetry: onRetry('SMTP'),
    }),
  };
}

interface ConsoleLog {
  info: (message: string) => void;
  warn: (message: string) => void;
  debug?: (message: string) => void;
}

function createLog(verbose: boolean): ConsoleLog {
  return {
    info: (message) => console.log(`ℹ️  ${message}`),
    warn: (message) => console.warn(`⚠️  ${message}`),
    debug: verbose ? (message) => console.log(`🔍 ${message}`) : undefined,
  };
}

export function reportError(error: unknown, verbose: boolean): void {
  const err = toError(error);
  const label = err instanceof DigestError ? err.name : 'Error';
  console.error(`❌ ${label}: ${getErrorDetail(err)}`);
  if (verbose && err.stack) {
    console.error(`📋 Stack trace:\n${err.stack}`);
  }
}

function printResult(result: RunResult): void {
  console.log('');
  console.log(`📊 조회 ${result.listed} · 요약 성공 ${result.summarized} · 실패 ${result.failed}`);
  if (result.files) {
    console.log(`📄 PDF: ${result.files.pdfPath}`);
    console.log(`📝 Markdown: ${result.files.markdownPath}`);
  }
  if (result.messageId) {
    console.log(`📧 Message-ID: ${result.messageId}`);
  }
}

async function resolveConfig(options: RunOptions): Promise<Readonly<RunConfig>> {
  const settings: RunSettings = options.settings ? await loadSettingsFile(options.settings) : {};
  return loadRunConfig(process.env, settings);
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('구독 채널의 새 영상을 요약하여 PDF 리포트를 메일로 발송합니다')
    .addOption(new Option('--once', '한 번 실행하고 종료 (기본값)').conflicts('schedule'))
    .option('--schedule', '매일 SCHEDULE_TIME에 실행하며 상주')
    .option('--skip-email', '리포트만 저장하고 메일은 보내지 않음')
    .option('-s, --settings <file>', 'JSON 설정 파일 (비밀 값 제외)')
    .option('--verbose', '상세 로그 출력')
    .action(async (options: RunOptions) => {
      loadEnv();

      let config: Readonly<RunConfig>;
      try {
        config = await resolveConfig(options);
      } catch (error) {
        reportError(error, Boolean(options.verbose));
        process.exitCode = 1;
        return;
      }

      const verbose = Boolean(options.verbose) || config.debug;
      const log = createLog(verbose);
      configWarnings(config).forEach((warning) => log.warn(warning));
      const stages = buildStages(config, log);

      const runOnce = async (): Promise<void> => {
        console.log(`🚀 리포트 생성 시작 (최근 ${config.daysBack}일, 언어: ${config.language})`);
        log.debug?.(`🤖 Gemini 모델: ${config.gemini.model}`);
        const result = await runPipeline(
          stages,
          config,
          { onProgress: log.info, onStage: (stage) => log.debug?.(`단계: ${stage}`) },
          { skipEmail: options.skipEmail }
        );
        printResult(result);
      };

      if (!options.schedule) {
        try {
          await runOnce();
        } catch (error) {
          reportError(error, verbose);
          process.exitCode = 1;
        }
        return;
      }

      const scheduler = new DailyScheduler(config.scheduleTime, runOnce, {
        onScheduled: (next) => console.log(`⏰ 다음 실행: ${next.toLocaleString()}`),
        onSkipped: () => log.warn('이전 실행이 아직 진행 중이어서 이번 실행은 건너뜁니다.'),
        onRunError: (error) => reportError(error, verbose),
      });
      const shutdown = (): void => {
        console.log('\n👋 스케줄러를 종료합니다.');
        scheduler.stop();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
      scheduler.start();
    });

  return command;
}
