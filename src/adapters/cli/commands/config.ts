import { Command } from 'commander';
import { config as loadEnv } from 'dotenv';
import { loadRunConfig, loadSettingsFile } from '../../../core/index.js';
import { reportError } from './run.js';
import type { RunConfig } from '../../../types/index.js';

export function maskSecret(value: string): string {
  if (value.length <= 4) return '****';
  return `${value.slice(0, 2)}${'*'.repeat(Math.min(value.length - 4, 8))}${value.slice(-2)}`;
}

export function describeConfig(config: RunConfig): Array<[string, string]> {
  const youtube: Array<[string, string]> =
    config.youtube.kind === 'oauth'
      ? [
          ['YouTube 인증', 'OAuth (refresh token)'],
          ['Client ID', maskSecret(config.youtube.clientId)],
        ]
      : [
          ['YouTube 인증', 'API key'],
          ['API key', maskSecret(config.youtube.apiKey)],
          ['Channel ID', config.youtube.channelId],
        ];

  return [
    ...youtube,
    ['Gemini 모델', config.gemini.model],
    ['Gemini API key', maskSecret(config.gemini.apiKey)],
    ['SMTP', `${config.mail.host}:${config.mail.port}`],
    ['SMTP 계정', config.mail.username],
    ['SMTP 비밀번호', maskSecret(config.mail.password)],
    ['보내는 주소', config.mail.from],
    ['받는 주소', config.mail.to],
    ['조회 기간', `${config.daysBack}일`],
    ['채널 / 영상 상한', `${config.maxChannels} / ${config.maxVideosPerChannel}`],
    ['요약 언어', config.language],
    ['동시 요약 수', String(config.summaryConcurrency)],
    ['요약 실패 처리', config.failedSummaryPolicy],
    ['출력 디렉토리', config.outputDir],
    ['폰트', config.fontPath ?? '(기본)'],
    // Proxy URLs may carry credentials
    ['프록시', config.proxyUrl ? new URL(config.proxyUrl).host : '(없음)'],
    ['실행 시각', config.scheduleTime],
    ['요청 타임아웃', `${config.requestTimeoutMs}ms`],
    ['재시도', `${config.retry.maxAttempts}회, ${config.retry.baseDelayMs}ms부터`],
  ];
}

export function createConfigCommand(): Command {
  const command = new Command('config')
    .description('적용될 설정을 확인합니다 (비밀 값은 가려서 표시)')
    .option('-s, --settings <file>', 'JSON 설정 파일')
    .option('--verbose', '상세 로그 출력')
    .action(async (options: { settings?: string; verbose?: boolean }) => {
      loadEnv();

      let config: Readonly<RunConfig>;
      try {
        const settings = options.settings ? await loadSettingsFile(options.settings) : {};
        config = loadRunConfig(process.env, settings);
      } catch (error) {
        reportError(error, Boolean(options.verbose));
        process.exitCode = 1;
        return;
      }

      const rows = describeConfig(config);
      const labelWidth = Math.max(...rows.map(([label]) => label.length));

      console.log('');
      console.log('┌─────────────────────────────────────────────────────┐');
      console.log('│ ✅ 설정이 올바르게 구성되었습니다                     │');
      console.log('└─────────────────────────────────────────────────────┘');
      for (const [label, value] of rows) {
        console.log(`  ${label.padEnd(labelWidth)}  ${value}`);
      }
    });

  return command;
}
