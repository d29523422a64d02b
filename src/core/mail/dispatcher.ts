import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { basename } from 'path';
import { MailAuthError, MailRejectedError, DispatchError, getErrorCode, getErrorDetail, toError } from '../errors.js';
import { withRetry } from '../retry.js';
import { getLabels } from '../output/labels.js';
import type { DispatchResult, MailConfig, ReportFiles, RetryConfig } from '../../types/index.js';

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string }>;
}

export interface DispatcherOptions {
  language: string;
  retry: RetryConfig;
  timeoutMs?: number;
  proxyUrl?: string;
  onRetry?: (attempt: number, maxAttempts: number, error: Error, delayMs: number) => void;
}

const TRANSIENT_CODES = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS', 'ECONNRESET', 'ECONNREFUSED']);

function responseCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('responseCode' in error)) return undefined;
  return typeof error.responseCode === 'number' ? error.responseCode : undefined;
}

export function isTransientMailError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code === 'EAUTH' || code === 'EENVELOPE' || code === 'EMESSAGE') return false;
  const status = responseCode(error);
  if (status !== undefined) return status >= 400 && status < 500;
  return code !== undefined && TRANSIENT_CODES.has(code);
}

export function smtpOptions(config: MailConfig, timeoutMs: number = 60_000, proxyUrl?: string) {
  return {
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: { user: config.username, pass: config.password },
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
    // nodemailer tunnels SMTP through an HTTP proxy with CONNECT
    ...(proxyUrl ? { proxy: proxyUrl } : {}),
  };
}

export function createSmtpTransport(config: MailConfig, timeoutMs?: number, proxyUrl?: string): MailTransport {
  return nodemailer.createTransport(smtpOptions(config, timeoutMs, proxyUrl));
}

export class MailDispatcher {
  private transport: MailTransport;

  constructor(
    private config: MailConfig,
    private options: DispatcherOptions,
    transport?: MailTransport
  ) {
    this.transport = transport ?? createSmtpTransport(config, options.timeoutMs, options.proxyUrl);
  }

  buildMessage(report: ReportFiles, recipient: string): SendMailOptions {
    const labels = getLabels(this.options.language);
    return {
      from: this.config.from,
      to: recipient,
      subject: labels.emailSubject(report.date, report.videoCount),
      text: labels.emailBody(report.date, report.videoCount),
      attachments: [
        {
          filename: basename(report.pdfPath),
          path: report.pdfPath,
          contentType: 'application/pdf',
        },
      ],
    };
  }

  /**
   * Sends the rendered report as an attachment. Auth and rejection errors are
   * not retried; the report files are left in place either way.
   */
  async send(report: ReportFiles, recipient: string = this.config.to): Promise<DispatchResult> {
    const message = this.buildMessage(report, recipient);

    try {
      const info = await withRetry(() => this.transport.sendMail(message), {
        maxAttempts: this.options.retry.maxAttempts,
        baseDelayMs: this.options.retry.baseDelayMs,
        isRetryable: isTransientMailError,
        onRetry: this.options.onRetry,
      });
      return { messageId: info.messageId || '', recipient };
    } catch (error) {
      const cause = toError(error);
      const detail = getErrorDetail(cause);
      const code = getErrorCode(error);

      if (code === 'EAUTH') {
        throw new MailAuthError(`SMTP authentication failed for ${this.config.username}: ${detail}`, { cause });
      }
      if (code === 'EENVELOPE' || code === 'EMESSAGE' || (responseCode(error) ?? 0) >= 500) {
        throw new MailRejectedError(`Message to ${recipient} was rejected: ${detail}`, { cause });
      }
      throw new DispatchError(`Failed to send report to ${recipient}: ${detail}`, { cause });
    }
  }
}
