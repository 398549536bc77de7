import { createTransport } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { MailMessage, MailSettings, MailTransport } from '../mail.types';

/**
 * The part of a nodemailer transporter this transport uses.
 */
export interface SmtpTransporter {
  sendMail(mail: { from: string; to: string; subject: string; html: string }): Promise<unknown>;
  close(): void;
}

export type SmtpMailTransportDependencies = {
  createTransporter?: (options: SMTPTransport.Options) => SmtpTransporter;
  logger?: Logger;
};

export function toTransportOptions(settings: MailSettings): SMTPTransport.Options {
  const options: SMTPTransport.Options = {
    host: settings.host,
    port: settings.port,
    secure: settings.secure,
    requireTLS: !settings.secure,
    connectionTimeout: settings.timeoutMs,
    greetingTimeout: settings.timeoutMs,
    socketTimeout: settings.timeoutMs,
  };
  if (settings.username) {
    options.auth = { user: settings.username, pass: settings.password ?? '' };
  }
  return options;
}

/**
 * Sends mail through an authenticated SMTP relay with nodemailer.
 */
export class SmtpMailTransport implements MailTransport {
  private readonly transporter: SmtpTransporter;
  private readonly sender: string;
  private readonly logger: Logger;

  constructor(settings: MailSettings, dependencies: SmtpMailTransportDependencies = {}) {
    const factory = dependencies.createTransporter ?? ((options: SMTPTransport.Options) => createTransport(options));
    this.transporter = factory(toTransportOptions(settings));
    this.sender = settings.sender;
    this.logger = dependencies.logger ?? createLogger('[SmtpMail] ');
  }

  async send(message: MailMessage): Promise<void> {
    await this.transporter.sendMail({
      from: this.sender,
      to: message.to,
      subject: message.subject,
      html: message.html,
    });
    this.logger.debug(`Mail sent to ${message.to}: ${message.subject}`);
  }

  async close(): Promise<void> {
    this.transporter.close();
  }
}
