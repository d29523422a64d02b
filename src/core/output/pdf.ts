import PDFDocument from 'pdfkit';
import { marked, type Token, type Tokens } from 'marked';
import { getLabels } from './labels.js';
import { MarkdownGenerator } from './markdown.js';
import type { ReportDocument } from '../../types/index.js';

export interface PdfRendererOptions {
  // TTF/OTF font used for every style; needed for CJK text
  fontPath?: string;
}

interface FontSet {
  regular: string;
  bold: string;
  italic: string;
}

interface TextRun {
  text: string;
  bold: boolean;
  italic: boolean;
  link?: string;
}

const COLORS = {
  text: '#1f2937',
  muted: '#4b5563',
  link: '#1d4ed8',
  rule: '#d1d5db',
};

export class PdfRenderer {
  private markdown = new MarkdownGenerator();

  constructor(private options: PdfRendererOptions = {}) {}

  /** Renders the Markdown form of the report onto A4 pages. */
  async render(report: ReportDocument): Promise<Buffer> {
    const labels = getLabels(report.language);
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: 50, bottom: 50, left: 60, right: 60 },
      info: {
        Title: `${labels.title} ${report.date}`,
        CreationDate: report.generatedAt,
        ModDate: report.generatedAt,
      },
    });

    const chunks: Buffer[] = [];
    const finished = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    const fonts = this.setupFonts(doc);
    const tokens = marked.lexer(this.markdown.generate(report));
    for (const token of tokens) {
      this.renderToken(doc, token, fonts);
    }

    doc.end();
    return finished;
  }

  private setupFonts(doc: PDFKit.PDFDocument): FontSet {
    if (!this.options.fontPath) {
      return { regular: 'Helvetica', bold: 'Helvetica-Bold', italic: 'Helvetica-Oblique' };
    }
    doc.registerFont('Body', this.options.fontPath);
    return { regular: 'Body', bold: 'Body', italic: 'Body' };
  }

  private renderToken(doc: PDFKit.PDFDocument, token: Token, fonts: FontSet): void {
    switch (token.type) {
      case 'heading':
        this.renderHeading(doc, token as Tokens.Heading, fonts);
        break;
      case 'paragraph':
        this.renderRuns(doc, this.collectRuns((token as Tokens.Paragraph).tokens), fonts, {
          fontSize: 10.5,
          lineGap: 4,
          align: 'justify',
        });
        doc.moveDown(0.6);
        break;
      case 'list':
        this.renderList(doc, token as Tokens.List, fonts);
        break;
      case 'hr':
        this.renderRule(doc);
        break;
      case 'code': {
        const text = (token as Tokens.Code).text.trim();
        this.renderRuns(doc, [{ text, bold: false, italic: false }], fonts, { fontSize: 10.5, lineGap: 4 });
        doc.moveDown(0.6);
        break;
      }
      default:
        break;
    }
  }

  private renderHeading(doc: PDFKit.PDFDocument, token: Tokens.Heading, fonts: FontSet): void {
    const fontSize = token.depth === 1 ? 20 : 13;
    if (token.depth > 1) doc.moveDown(0.4);
    const runs = this.collectRuns(token.tokens).map((run) => ({ ...run, bold: true }));
    this.renderRuns(doc, runs, fonts, { fontSize, lineGap: 2 });
    doc.moveDown(token.depth === 1 ? 0.5 : 0.3);
  }

  private renderList(doc: PDFKit.PDFDocument, token: Tokens.List, fonts: FontSet): void {
    for (const item of token.items) {
      const runs = [{ text: '•  ', bold: false, italic: false }, ...this.collectRuns(item.tokens)];
      this.renderRuns(doc, runs, fonts, { fontSize: 9.5, lineGap: 2, color: COLORS.muted });
    }
    doc.moveDown(0.6);
  }

  private renderRule(doc: PDFKit.PDFDocument): void {
    const y = doc.y + 4;
    doc
      .moveTo(doc.page.margins.left, y)
      .lineTo(doc.page.width - doc.page.margins.right, y)
      .lineWidth(0.5)
      .strokeColor(COLORS.rule)
      .stroke();
    doc.y = y + 12;
  }

  private collectRuns(
    tokens: Token[] | undefined,
    style: Omit<TextRun, 'text'> = { bold: false, italic: false }
  ): TextRun[] {
    const runs: TextRun[] = [];

    for (const token of tokens || []) {
      switch (token.type) {
        case 'strong':
          runs.push(...this.collectRuns((token as Tokens.Strong).tokens, { ...style, bold: true }));
          break;
        case 'em':
          runs.push(...this.collectRuns((token as Tokens.Em).tokens, { ...style, italic: true }));
          break;
        case 'link': {
          const link = token as Tokens.Link;
          runs.push(...this.collectRuns(link.tokens, { ...style, link: link.href }));
          break;
        }
        case 'br':
          runs.push({ ...style, text: '\n' });
          break;
        case 'text':
          if ('tokens' in token && Array.isArray(token.tokens) && token.tokens.length > 0) {
            runs.push(...this.collectRuns(token.tokens, style));
          } else {
            runs.push({ ...style, text: this.decodeEntities((token as Tokens.Text).text) });
          }
          break;
        case 'escape':
        case 'codespan':
          runs.push({ ...style, text: this.decodeEntities((token as Tokens.Escape | Tokens.Codespan).text) });
          break;
        default:
          if ('text' in token && typeof token.text === 'string') {
            runs.push({ ...style, text: token.text });
          }
          break;
      }
    }

    return runs;
  }

  private renderRuns(
    doc: PDFKit.PDFDocument,
    runs: TextRun[],
    fonts: FontSet,
    options: { fontSize: number; lineGap: number; align?: 'left' | 'justify'; color?: string }
  ): void {
    const visible = runs.filter((run) => run.text.length > 0);
    if (visible.length === 0) return;

    doc.fontSize(options.fontSize);
    visible.forEach((run, index) => {
      const font = run.bold ? fonts.bold : run.italic ? fonts.italic : fonts.regular;
      doc
        .font(font)
        .fillColor(run.link ? COLORS.link : options.color ?? COLORS.text)
        .text(run.text, {
          continued: index < visible.length - 1,
          lineGap: options.lineGap,
          align: options.align ?? 'left',
          link: run.link,
          underline: Boolean(run.link),
        });
    });
    doc.fillColor(COLORS.text);
  }

  // marked keeps HTML entities escaped in text tokens
  private decodeEntities(text: string): string {
    return text
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>')
      .replace(/&quot;/g, '"')
      .replace(/&#39;/g, "'")
      .replace(/&amp;/g, '&');
  }
}
