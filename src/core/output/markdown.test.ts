import { describe, it, expect } from 'vitest';
import { marked } from 'marked';
import { MarkdownGenerator } from './markdown.js';
import { ReportComposer } from './composer.js';
import type { ReportDocument, SummaryOutcome, VideoItem } from '../../types/index.js';

const generatedAt = new Date(2024, 4, 2, 9, 30);

const rust: VideoItem = {
  id: 'r1',
  title: 'Intro to *Rust*',
  description: '',
  publishedAt: '2024-05-02T01:00:00Z',
  channel: { id: 'UCr', title: 'Rustaceans' },
  url: 'https://www.youtube.com/watch?v=r1',
};

const recap: VideoItem = {
  id: 'y1',
  title: '2024 recap',
  description: '',
  publishedAt: '2024-05-02T02:00:00Z',
  channel: { id: 'UCy', title: 'Yearly' },
  url: 'https://www.youtube.com/watch?v=y1',
};

function documentOf(entries: ReportDocument['entries']): ReportDocument {
  return { generatedAt, date: '2024-05-02', language: 'en', videoCount: entries.length, entries };
}

describe('MarkdownGenerator', () => {
  const generator = new MarkdownGenerator();

  it('should render one block per entry', () => {
    const markdown = generator.generate(
      documentOf([
        { video: rust, summary: 'First paragraph\nwraps here.\n\nSecond paragraph.', failed: false },
        { video: recap, summary: '- not a list', translatedTitle: 'Rückblick 2024', failed: false },
      ])
    );

    expect(markdown).toBe(
      [
        '# YouTube Daily Digest',
        '',
        '**2024-05-02** · 2 videos',
        '',
        '---',
        '',
        '## 1. Intro to \\*Rust\\*',
        '',
        '- **Channel**: Rustaceans',
        '- **Watch**: [https://www.youtube.com/watch?v=r1](https://www.youtube.com/watch?v=r1)',
        '',
        'First paragraph wraps here.',
        '',
        'Second paragraph.',
        '',
        '---',
        '',
        '## 2. 2024 recap',
        '',
        '*Rückblick 2024*',
        '',
        '- **Channel**: Yearly',
        '- **Watch**: [https://www.youtube.com/watch?v=y1](https://www.youtube.com/watch?v=y1)',
        '',
        '\\- not a list',
        '',
      ].join('\n')
    );
  });

  it('should render the empty notice without entries', () => {
    expect(generator.generate(documentOf([]))).toBe(
      '# YouTube Daily Digest\n\n**2024-05-02** · 0 videos\n\nNo new videos today.\n'
    );
  });

  it('should use the report language for labels', () => {
    const markdown = generator.generate({ ...documentOf([{ video: rust, summary: '요약', failed: false }]), language: 'ko' });
    expect(markdown).toContain('- **채널**: Rustaceans');
    expect(markdown.split('\n')[2]).toBe('**2024-05-02** · 영상 1개');
  });

  it('should produce identical output for identical input', () => {
    const outcomes: SummaryOutcome[] = [
      { ok: true, summary: { video: rust, text: 'Summary one.' } },
      { ok: false, video: recap, error: new Error('failed') },
    ];
    const metadata = { generatedAt, language: 'en', failedSummaryPolicy: 'placeholder' } as const;
    const composer = new ReportComposer();

    const first = generator.generate(composer.compose(outcomes, metadata));
    const second = generator.generate(composer.compose(outcomes, metadata));

    expect(first).toBe(second);
  });

  it('should keep a fence-like opening from swallowing the summary', () => {
    const markdown = generator.generate(
      documentOf([{ video: rust, summary: '~~~ intro\n\nSecond para\n\n| not | a table', failed: false }])
    );

    expect(markdown.endsWith('\\~~~ intro\n\nSecond para\n\n\\| not | a table\n')).toBe(true);
    const types = marked.lexer(markdown).map((token) => token.type);
    expect(types).not.toContain('code');
    expect(types.filter((type) => type === 'paragraph')).toHaveLength(4);
  });

  it('should escape emphasis markers in the link text of a video url', () => {
    const video: VideoItem = { ...rust, id: '_abcdefghi_', url: 'https://www.youtube.com/watch?v=_abcdefghi_' };
    const markdown = generator.generate(documentOf([{ video, summary: 'Summary.', failed: false }]));

    const watchLine = markdown.split('\n').find((line) => line.startsWith('- **Watch**'));
    expect(watchLine).toBe(
      '- **Watch**: [https://www.youtube.com/watch?v=\\_abcdefghi\\_](https://www.youtube.com/watch?v=_abcdefghi_)'
    );
    expect(marked.parseInline('[https://www.youtube.com/watch?v=\\_abcdefghi\\_](https://www.youtube.com/watch?v=_abcdefghi_)')).toBe(
      '<a href="https://www.youtube.com/watch?v=_abcdefghi_">https://www.youtube.com/watch?v=_abcdefghi_</a>'
    );
  });
});
