import type { VideoItem } from './youtube.js';

export type FailedSummaryPolicy = 'placeholder' | 'drop';

export interface ReportEntry {
  readonly video: VideoItem;
  readonly summary: string;
  readonly translatedTitle?: string;
  readonly failed: boolean;
}

export interface ReportMetadata {
  generatedAt: Date;
  language: string;
  failedSummaryPolicy: FailedSummaryPolicy;
}

export interface ReportDocument {
  readonly generatedAt: Date;
  readonly date: string; // YYYY-MM-DD
  readonly language: string;
  readonly videoCount: number;
  readonly entries: readonly ReportEntry[];
}

export interface ReportFiles {
  readonly date: string;
  readonly pdfPath: string;
  readonly markdownPath: string;
  readonly videoCount: number;
}
