import { mkdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ReportDocument, ReportFiles } from '../../types/index.js';

export interface RenderedReport {
  markdown: string;
  pdf: Buffer;
}

export class ReportStore {
  constructor(
    private outputDir: string,
    private prefix: string = 'youtube-digest'
  ) {}

  pathsFor(date: string): { pdfPath: string; markdownPath: string } {
    const base = join(this.outputDir, `${this.prefix}-${date}`);
    return { pdfPath: `${base}.pdf`, markdownPath: `${base}.md` };
  }

  async save(document: ReportDocument, rendered: RenderedReport): Promise<ReportFiles> {
    await mkdir(this.outputDir, { recursive: true });
    const { pdfPath, markdownPath } = this.pathsFor(document.date);

    await this.writeAtomic(markdownPath, rendered.markdown);
    await this.writeAtomic(pdfPath, rendered.pdf);

    return {
      date: document.date,
      pdfPath,
      markdownPath,
      videoCount: document.videoCount,
    };
  }

  // A reader never sees a half-written report: write beside, then rename over
  private async writeAtomic(path: string, content: string | Buffer): Promise<void> {
    const tempPath = `${path}.${process.pid}.tmp`;
    await writeFile(tempPath, content);
    await rename(tempPath, path);
  }
}
