import type { VideoItem } from '../../types/index.js';

export const MAX_DESCRIPTION_LENGTH = 4000;
export const SUMMARY_MIN_LENGTH = 300;
export const SUMMARY_MAX_LENGTH = 500;

const LOCALE_NAMES: Record<string, string> = {
  ko: '한국어 (Korean)',
  en: 'English',
  ja: '日本語 (Japanese)',
  zh: '简体中文 (Simplified Chinese)',
};

export function localeName(locale: string): string {
  return LOCALE_NAMES[locale] || LOCALE_NAMES.en;
}

export function truncateDescription(description: string, maxLength: number = MAX_DESCRIPTION_LENGTH): string {
  const trimmed = description.trim();
  if (trimmed.length <= maxLength) return trimmed;
  return `${trimmed.slice(0, maxLength).trimEnd()}…`;
}

export function createSystemPrompt(): string {
  return `You summarize YouTube videos for a daily email digest.

## CRITICAL RULES (MUST FOLLOW)

### 1. Valid JSON Only
- Return ONLY valid JSON. No markdown code blocks, no extra text.
- ESCAPE quotes inside strings: "value with \\"quoted\\" text"
- Use \\n\\n between paragraphs inside strings, NOT actual line breaks.

### 2. Exact JSON Schema
{
  "translatedTitle": "string - the video title translated to the output language",
  "summary": "string - ${SUMMARY_MIN_LENGTH}-${SUMMARY_MAX_LENGTH} characters, two short paragraphs"
}

## Content Guidelines
- Base the summary on the title, channel and description you are given.
- First paragraph: what the video is about. Second paragraph: the key points.
- Do not invent facts that the metadata does not support.
- If the title is already in the output language, repeat it unchanged as translatedTitle.`;
}

export function createUserPrompt(video: VideoItem, locale: string): string {
  const name = localeName(locale);
  const description = truncateDescription(video.description) || '(no description)';

  return `Summarize this video.

OUTPUT LANGUAGE: Write translatedTitle and summary in **${name}**.
- If the metadata is in another language, TRANSLATE to ${name}
- Do NOT mix languages
- Summary length: ${SUMMARY_MIN_LENGTH}-${SUMMARY_MAX_LENGTH} characters

TITLE: ${video.title}
CHANNEL: ${video.channel.title}
URL: ${video.url}
DESCRIPTION:
${description}`;
}
