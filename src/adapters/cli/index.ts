import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createConfigCommand } from './commands/config.js';

export function createCLI(): Command {
  const program = new Command()
    .name('yt-digest')
    .description('구독 채널의 새 YouTube 영상을 Gemini로 요약하여 매일 PDF 리포트로 발송')
    .version('1.0.0');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createConfigCommand());

  return program;
}
