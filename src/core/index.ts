export * from './errors.js';
export { withRetry, backoffDelay, type RetryPolicy } from './retry.js';
export { configWarnings, loadRunConfig, loadSettingsFile, parseSettings, type Env } from './config/loader.js';
export { YouTubeClient } from './youtube/client.js';
export {
  SourceLister,
  isAuthError,
  isQuotaError,
  type CatalogProvider,
  type ListerCallbacks,
  type ListerConfig,
} from './youtube/lister.js';
export { GeminiClient } from './gemini/client.js';
export { Summarizer, type SummarizerCallbacks, type SummaryProvider } from './summarizer.js';
export { ReportComposer, formatDate } from './output/composer.js';
export { MarkdownGenerator } from './output/markdown.js';
export { PdfRenderer } from './output/pdf.js';
export { ReportStore, type RenderedReport } from './output/store.js';
export { getLabels, type ReportLabels } from './output/labels.js';
export { MailDispatcher, createSmtpTransport, isTransientMailError, smtpOptions, type MailTransport } from './mail/dispatcher.js';
export { runPipeline, type PipelineStages, type PipelineCallbacks, type RunResult } from './pipeline.js';
export { DailyScheduler, msUntilNextRun } from './scheduler.js';
