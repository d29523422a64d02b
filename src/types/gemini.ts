import type { VideoItem } from './youtube.js';

export interface Summary {
  readonly video: VideoItem;
  readonly text: string;
  readonly translatedTitle?: string;
}

export type SummaryOutcome =
  | { readonly ok: true; readonly summary: Summary }
  | { readonly ok: false; readonly video: VideoItem; readonly error: Error };

// Raw JSON shape requested from the model
export interface SummaryResponse {
  translatedTitle: string;
  summary: string;
}
