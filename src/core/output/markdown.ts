import { getLabels } from './labels.js';
import type { ReportDocument, ReportEntry } from '../../types/index.js';

export class MarkdownGenerator {
  generate(document: ReportDocument): string {
    const labels = getLabels(document.language);
    const header = `# ${labels.title}

**${document.date}** · ${labels.videoCount(document.videoCount)}`;

    if (document.entries.length === 0) {
      return `${header}

${labels.empty}
`;
    }

    const blocks = document.entries.map((entry, index) => this.generateEntry(entry, index + 1, document.language));

    return `${header}

---

${blocks.join('\n\n---\n\n')}
`;
  }

  private generateEntry(entry: ReportEntry, position: number, language: string): string {
    const labels = getLabels(language);
    const lines = [`## ${position}. ${this.escapeInline(entry.video.title)}`];

    if (entry.translatedTitle && entry.translatedTitle !== entry.video.title) {
      lines.push(`*${this.escapeInline(entry.translatedTitle)}*`);
    }

    lines.push(`- **${labels.channel}**: ${this.escapeInline(entry.video.channel.title)}
- **${labels.watch}**: [${this.escapeInline(entry.video.url)}](${entry.video.url})`);

    lines.push(this.generateSummary(entry.summary));

    return lines.join('\n\n');
  }

  private generateSummary(summary: string): string {
    return summary
      .split(/\n\s*\n/)
      .map((paragraph) => paragraph.replace(/\s*\n\s*/g, ' ').trim())
      .filter((paragraph) => paragraph.length > 0)
      .map((paragraph) => this.escapeBlockStart(this.escapeInline(paragraph)))
      .join('\n\n');
  }

  private escapeInline(text: string): string {
    return text.replace(/[\\`*_[\]<>]/g, '\\$&').replace(/\s*\n\s*/g, ' ');
  }

  // Keep model text from turning into headings, lists, quotes, fences or tables
  private escapeBlockStart(paragraph: string): string {
    return paragraph.replace(/^(\d+)([.)])/, '$1\\$2').replace(/^([#>+~=|-])/, '\\$1');
  }
}
