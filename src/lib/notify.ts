/**
 * Alert e-mails.
 *
 * Alerting is best effort: by the time an alert is composed the restart has
 * already been issued, so delivery failures are reported, not thrown.
 */

import * as nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport/index.js';
import type { EmailConfig } from '../types/config.js';
import type { DiagnosticEntry, NotificationResult, RestartSummary } from '../types/report.js';

/**
 * Anything that can send a message; nodemailer transporters qualify.
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<unknown>;
}

/**
 * Facts embedded in an alert.
 */
export interface AlertContext {
  hostname: string;
  service: string;
  timestamp: string;
  condition: string;
  restart: RestartSummary;
  diagnostics: DiagnosticEntry[];
}

export interface AlertMessage {
  subject: string;
  text: string;
}

/**
 * Maps the configured security mode onto nodemailer SMTP options.
 *
 * Credentials are included only when a username is configured.
 */
export function buildTransportOptions(email: EmailConfig): SMTPTransport.Options {
  const options: SMTPTransport.Options = {
    host: email.smtp_host,
    port: email.smtp_port,
    secure: email.security === 'tls',
    ignoreTLS: email.security === 'none',
  };
  if (email.username !== undefined) {
    options.auth = { user: email.username, pass: email.password ?? '' };
  }
  return options;
}

/**
 * Creates the SMTP transporter for the configured server.
 */
export function createMailTransport(email: EmailConfig): MailTransport {
  return nodemailer.createTransport(buildTransportOptions(email));
}

/**
 * Composes the alert subject and body.
 */
export function buildAlertMessage(context: AlertContext): AlertMessage {
  const outcome = context.restart.exit_code === 0 ? 'restarted' : 'restart failed';
  const subject = `[ovpn-watchdog] ${context.service} ${outcome} on ${context.hostname}`;

  const lines: string[] = [
    `Host: ${context.hostname}`,
    `Service: ${context.service}`,
    `Timestamp: ${context.timestamp}`,
    `Condition: ${context.condition}`,
    `Action: ${context.restart.command}`,
    `Restart return code: ${context.restart.exit_code}`,
  ];
  if (context.restart.stderr.trim()) {
    lines.push('Restart STDERR:', context.restart.stderr.trimEnd());
  }

  lines.push('', 'Diagnostics', '-----------');
  for (const entry of context.diagnostics) {
    lines.push('', `[${entry.label}] ${entry.command}`, `Return code: ${entry.exit_code}`);
    if (entry.stderr.trim()) {
      lines.push('STDERR:', entry.stderr.trimEnd());
    }
    lines.push('STDOUT:', entry.stdout.trimEnd());
  }

  return { subject, text: lines.join('\n') + '\n' };
}

/**
 * Sends an alert to every configured recipient.
 *
 * @param transport - Defaults to an SMTP transport built from `email`
 */
export async function sendAlert(
  email: EmailConfig,
  message: AlertMessage,
  transport?: MailTransport
): Promise<NotificationResult> {
  if (!email.enabled) {
    return { status: 'disabled' };
  }
  if (email.recipients.length === 0) {
    return { status: 'skipped', reason: 'no recipients configured' };
  }

  const recipients = [...email.recipients];
  try {
    const mailer = transport ?? createMailTransport(email);
    const info = await mailer.sendMail({
      from: email.from,
      to: recipients.join(', '),
      subject: message.subject,
      text: message.text,
    });
    return { status: 'sent', recipients, message_id: messageIdOf(info) };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Alert delivery failed: ${reason}`);
    return { status: 'failed', error: reason };
  }
}

function messageIdOf(info: unknown): string {
  if (info !== null && typeof info === 'object' && 'messageId' in info && typeof info.messageId === 'string') {
    return info.messageId;
  }
  return '';
}
