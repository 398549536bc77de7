import type { MailMessage, MailTransport } from '../mail.types';

/**
 * Records outgoing mail instead of sending it.
 *
 * @example
 * const transport = new MemoryMailTransport();
 * transport.failWith(new Error('relay down'));
 */
export class MemoryMailTransport implements MailTransport {
  private readonly sent: MailMessage[] = [];
  private failure: Error | null = null;
  private closed = false;

  async send(message: MailMessage): Promise<void> {
    if (this.closed) {
      throw new Error('Mail transport is closed');
    }
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push({ ...message });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Makes every following send reject with `error`; null restores delivery */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  getSent(): MailMessage[] {
    return this.sent.map((message) => ({ ...message }));
  }

  clear(): void {
    this.sent.length = 0;
  }
}
