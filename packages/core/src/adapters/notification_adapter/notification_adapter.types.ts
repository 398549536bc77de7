import type { NotificationCategory, NotificationRecord } from '../../record_types';
import type { PersistenceGateway } from '../../persistence';
import type { IEventStream } from '../../event_bus';
import type { MailTransport } from '../../mail';
import type { NotificationsConfig } from '../../config_manager';
import type { Logger } from '../../logger';
import type { Principal } from '../identity_adapter';

export type DeliveryFailureReason =
  | 'no-transport'
  | 'recipient-not-found'
  | 'recipient-lookup-failed'
  | 'no-email'
  | 'email-disabled'
  | 'transport-error';

/**
 * Outcome of a best-effort email. Never an exception.
 */
export type DeliveryResult =
  | { delivered: true }
  | { delivered: false; reason: DeliveryFailureReason };

export type NotificationListOptions = {
  /** Defaults to the configured list limit */
  limit?: number;
  onlyUnread?: boolean;
};

/**
 * NotificationAdapter Interface - in-app notifications and email side channel
 */
export interface INotificationAdapter {
  notify(recipientId: string, message: string, category: NotificationCategory, relatedId?: string | null): Promise<string | null>;
  deliverEmail(recipientId: string, subject: string, html: string): Promise<DeliveryResult>;
  listNotifications(principal: Principal | null, options?: NotificationListOptions): Promise<NotificationRecord[]>;
  markRead(principal: Principal | null, notificationId: string): Promise<boolean>;
  markAllRead(principal: Principal | null): Promise<boolean>;
  countUnread(principal: Principal | null): Promise<number>;
  waitForIdle(options?: { timeout?: number }): Promise<void>;
  dispose(): void;
}

/**
 * NotificationAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type NotificationAdapterDependencies = {
  gateway: PersistenceGateway;
  /** Task events are consumed from here; notification.created is published to it */
  eventBus: IEventStream;
  /** null disables email */
  mailTransport: MailTransport | null;
  notifications?: NotificationsConfig;
  logger?: Logger;
  clock?: () => Date;
};
