/**
 * SMTP mail transport (nodemailer)
 */

export { SmtpMailTransport, toTransportOptions } from './mail/smtp';
export type { SmtpMailTransportDependencies, SmtpTransporter } from './mail/smtp';
