export { SmtpMailTransport, toTransportOptions } from './smtp_mail_transport';
export type { SmtpMailTransportDependencies, SmtpTransporter } from './smtp_mail_transport';
