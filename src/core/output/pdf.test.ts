import { describe, it, expect, vi, afterEach } from 'vitest';
import PDFDocument from 'pdfkit';
import { PdfRenderer } from './pdf.js';
import type { ReportDocument } from '../../types/index.js';

const report: ReportDocument = {
  generatedAt: new Date(2024, 4, 2, 9, 30),
  date: '2024-05-02',
  language: 'en',
  videoCount: 1,
  entries: [
    {
      video: {
        id: 'r1',
        title: 'Intro to *Rust*',
        description: '',
        publishedAt: '2024-05-02T01:00:00Z',
        channel: { id: 'UCr', title: 'Rustaceans' },
        url: 'https://www.youtube.com/watch?v=r1',
      },
      summary: 'A tour of ownership & borrowing.\n\nThen <generics>.',
      failed: false,
    },
  ],
};

describe('PdfRenderer', () => {
  const renderer = new PdfRenderer();

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should render a PDF document', async () => {
    const pdf = await renderer.render(report);

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdf.toString('latin1')).toContain('YouTube Daily Digest 2024-05-02');
  });

  it('should render an empty report', async () => {
    const pdf = await renderer.render({ ...report, videoCount: 0, entries: [] });
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('should draw every summary paragraph even when one opens like a code fence', async () => {
    const text = vi.spyOn(PDFDocument.prototype, 'text');
    const [entry] = report.entries;

    await renderer.render({ ...report, entries: [{ ...entry, summary: '~~~ intro\n\nSecond para' }] });

    const drawn = text.mock.calls.map(([value]) => value);
    expect(drawn).toContain('Second para');
    expect(drawn.join('')).toContain('~~~ intro');
  });
});
