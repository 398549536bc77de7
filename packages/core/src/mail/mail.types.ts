export type MailMessage = {
  to: string;
  subject: string;
  /** HTML body */
  html: string;
};

/**
 * Outbound mail. `send` resolves once the relay accepted the message
 * and rejects on any delivery failure.
 */
export interface MailTransport {
  send(message: MailMessage): Promise<void>;
  close(): Promise<void>;
}

/**
 * Relay settings. Without a host or sender, mail is disabled.
 */
export type MailSettings = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  /** From address */
  sender: string;
  /** true: implicit TLS (port 465); false: STARTTLS is required */
  secure: boolean;
  timeoutMs: number;
};
