import { getLabels } from './labels.js';
import type { ReportDocument, ReportEntry, ReportMetadata, SummaryOutcome } from '../../types/index.js';

export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export class ReportComposer {
  /**
   * Builds the report from this run's outcomes. Failed outcomes become
   * placeholder entries or are dropped, according to the policy.
   */
  compose(outcomes: readonly SummaryOutcome[], metadata: ReportMetadata): ReportDocument {
    const labels = getLabels(metadata.language);
    const entries: ReportEntry[] = [];

    for (const outcome of outcomes) {
      if (outcome.ok) {
        const { video, text, translatedTitle } = outcome.summary;
        const entry: ReportEntry = translatedTitle
          ? { video, summary: text, translatedTitle, failed: false }
          : { video, summary: text, failed: false };
        entries.push(Object.freeze(entry));
      } else if (metadata.failedSummaryPolicy === 'placeholder') {
        entries.push(Object.freeze({ video: outcome.video, summary: labels.unavailable, failed: true }));
      }
    }

    return Object.freeze({
      generatedAt: metadata.generatedAt,
      date: formatDate(metadata.generatedAt),
      language: metadata.language,
      videoCount: entries.length,
      entries: Object.freeze(entries),
    });
  }
}
