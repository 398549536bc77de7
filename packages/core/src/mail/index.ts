export type { MailMessage, MailSettings, MailTransport } from './mail.types';
