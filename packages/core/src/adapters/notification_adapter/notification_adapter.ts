import { DEFAULT_ENGINE_CONFIG } from '../../config_manager';
import type { NotificationsConfig } from '../../config_manager';
import {
  NotificationDeliveryError,
  PermissionDeniedError,
  ValidationError,
  toPersistenceFailure,
} from '../../errors';
import type {
  EventSubscription,
  IEventStream,
  TaskAssignedEvent,
  TaskCommentAddedEvent,
  TaskStatusChangedEvent,
} from '../../event_bus';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { MailTransport } from '../../mail';
import type { PersistenceGateway } from '../../persistence';
import { createNotificationRecord } from '../../record_factories';
import type { NotificationCategory, NotificationRecord, UserRecord } from '../../record_types';
import { requirePrincipal } from '../identity_adapter';
import type { Principal } from '../identity_adapter';
import { assignmentRecipients, commentRecipients, statusChangeRecipients } from './notification_recipients';
import { assignmentContent, commentContent, statusChangeContent } from './notification_templates';
import type { NotificationContent } from './notification_templates';
import type {
  DeliveryResult,
  INotificationAdapter,
  NotificationAdapterDependencies,
  NotificationListOptions,
} from './notification_adapter.types';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * NotificationAdapter - fans task events out to the affected users.
 *
 * Subscribes to task events on construction. For every recipient it stores
 * an unread notification and then hands the email to the transport without
 * waiting for it. Neither step can fail the task operation that caused the
 * event: failures are logged here and go no further.
 */
export class NotificationAdapter implements INotificationAdapter {
  private gateway: PersistenceGateway;
  private eventBus: IEventStream;
  private mailTransport: MailTransport | null;
  private config: NotificationsConfig;
  private logger: Logger;
  private clock: () => Date;
  private subscriptions: EventSubscription[] = [];
  private pendingDeliveries = new Set<Promise<DeliveryResult>>();

  constructor(dependencies: NotificationAdapterDependencies) {
    this.gateway = dependencies.gateway;
    this.eventBus = dependencies.eventBus;
    this.mailTransport = dependencies.mailTransport;
    this.config = dependencies.notifications ?? DEFAULT_ENGINE_CONFIG.notifications;
    this.logger = dependencies.logger ?? createLogger('[Notifications] ');
    this.clock = dependencies.clock ?? (() => new Date());

    this.setupEventSubscriptions();
  }

  private setupEventSubscriptions(): void {
    this.subscriptions.push(
      this.eventBus.subscribe('task.assigned', (event) => this.handleTaskAssigned(event)),
      this.eventBus.subscribe('task.status.changed', (event) => this.handleStatusChanged(event)),
      this.eventBus.subscribe('task.comment.added', (event) => this.handleCommentAdded(event))
    );
  }

  async handleTaskAssigned(event: TaskAssignedEvent): Promise<void> {
    const { task, assigneeId } = event.payload;
    const creatorName = await this.displayNameOf(task.creatorId);
    await this.fanOut(assignmentRecipients(assigneeId), 'task-assignment', task.id, assignmentContent(task.title, creatorName));
  }

  async handleStatusChanged(event: TaskStatusChangedEvent): Promise<void> {
    const { task, newStatus } = event.payload;
    await this.fanOut(statusChangeRecipients(task), 'status-change', task.id, statusChangeContent(task.title, newStatus));
  }

  async handleCommentAdded(event: TaskCommentAddedEvent): Promise<void> {
    const { task, comment, actor } = event.payload;
    await this.fanOut(
      commentRecipients(task, comment.authorId),
      'new-comment',
      task.id,
      commentContent(task.title, actor.displayName, comment.text)
    );
  }

  /**
   * Stores an unread notification and announces it.
   * @returns the notification id, or null when it could not be stored
   */
  async notify(
    recipientId: string,
    message: string,
    category: NotificationCategory,
    relatedId: string | null = null
  ): Promise<string | null> {
    try {
      const notification = await createNotificationRecord({
        recipientId,
        message,
        category,
        relatedId,
        createdAt: this.clock().toISOString(),
      });
      await this.gateway.stores.notifications.create(notification);

      this.eventBus.publish({
        type: 'notification.created',
        timestamp: Date.now(),
        source: 'notification_adapter',
        payload: { notificationId: notification.id, recipientId, category, relatedId },
      });
      return notification.id;
    } catch (error) {
      this.logger.error(`Failed to store ${category} notification for ${recipientId}: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Best-effort email to a user. Resolves with the reason instead of
   * throwing when there is no transport, no address, email is switched off
   * or the transport fails.
   */
  async deliverEmail(recipientId: string, subject: string, html: string): Promise<DeliveryResult> {
    if (!this.mailTransport) {
      return { delivered: false, reason: 'no-transport' };
    }

    let recipient: UserRecord | null;
    try {
      recipient = await this.gateway.stores.users.get(recipientId);
    } catch (error) {
      this.logger.warn(`Could not look up email recipient ${recipientId}: ${errorMessage(error)}`);
      return { delivered: false, reason: 'recipient-lookup-failed' };
    }

    if (!recipient) {
      return { delivered: false, reason: 'recipient-not-found' };
    }
    if (!recipient.email) {
      return { delivered: false, reason: 'no-email' };
    }
    if (!recipient.notificationPreferences.email) {
      return { delivered: false, reason: 'email-disabled' };
    }

    try {
      await this.mailTransport.send({ to: recipient.email, subject, html });
      this.logger.debug(`Email "${subject}" sent to ${recipientId}`);
      return { delivered: true };
    } catch (error) {
      const failure = new NotificationDeliveryError(recipientId, errorMessage(error));
      this.logger.warn(failure.message);
      return { delivered: false, reason: 'transport-error' };
    }
  }

  /** The principal's notifications, newest first */
  async listNotifications(principal: Principal | null, options: NotificationListOptions = {}): Promise<NotificationRecord[]> {
    const actor = requirePrincipal(principal);
    const limit = options.limit ?? this.config.defaultListLimit;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('limit', 'must be a positive integer');
    }

    try {
      return await this.gateway.stores.notifications.listForUser(actor.userId, {
        limit,
        onlyUnread: options.onlyUnread ?? false,
      });
    } catch (error) {
      throw toPersistenceFailure('listNotifications', error);
    }
  }

  /**
   * Marks one of the principal's notifications read. Marking a read
   * notification again succeeds.
   * @returns false when the notification does not exist
   */
  async markRead(principal: Principal | null, notificationId: string): Promise<boolean> {
    const actor = requirePrincipal(principal);

    try {
      const notification = await this.gateway.stores.notifications.get(notificationId);
      if (!notification) {
        return false;
      }
      if (notification.recipientId !== actor.userId) {
        throw new PermissionDeniedError(
          'notification.mark_read',
          `notification:${notificationId}`,
          'only the recipient can mark a notification read'
        );
      }
      if (notification.read) {
        return true;
      }
      return await this.gateway.stores.notifications.markRead(notificationId);
    } catch (error) {
      throw toPersistenceFailure('markRead', error);
    }
  }

  async markAllRead(principal: Principal | null): Promise<boolean> {
    const actor = requirePrincipal(principal);

    try {
      const flipped = await this.gateway.stores.notifications.markAllRead(actor.userId);
      this.logger.debug(`Marked ${flipped} notification(s) read for ${actor.userId}`);
      return true;
    } catch (error) {
      throw toPersistenceFailure('markAllRead', error);
    }
  }

  async countUnread(principal: Principal | null): Promise<number> {
    const actor = requirePrincipal(principal);

    try {
      return await this.gateway.stores.notifications.countUnread(actor.userId);
    } catch (error) {
      throw toPersistenceFailure('countUnread', error);
    }
  }

  /**
   * Resolves once every email handed to the transport has settled, or
   * after `timeout` ms (default 5000) with a warning.
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const deadline = Date.now() + timeout;

    while (this.pendingDeliveries.size > 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn(
          `waitForIdle() timeout after ${timeout}ms with ${this.pendingDeliveries.size} email deliveries still pending`
        );
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, remaining);
      });
      try {
        await Promise.race([Promise.all(Array.from(this.pendingDeliveries)), expired]);
      } finally {
        clearTimeout(timer);
      }
    }
  }

  /** Stops consuming task events */
  dispose(): void {
    for (const subscription of this.subscriptions) {
      this.eventBus.unsubscribe(subscription.id);
    }
    this.subscriptions = [];
  }

  private async fanOut(
    recipientIds: string[],
    category: NotificationCategory,
    relatedId: string,
    content: NotificationContent
  ): Promise<void> {
    for (const recipientId of recipientIds) {
      await this.notify(recipientId, content.message, category, relatedId);
      this.dispatchEmail(recipientId, content.subject, content.html);
    }
  }

  private dispatchEmail(recipientId: string, subject: string, html: string): void {
    const delivery = this.deliverEmail(recipientId, subject, html);
    this.pendingDeliveries.add(delivery);
    void delivery.finally(() => {
      this.pendingDeliveries.delete(delivery);
    });
  }

  private async displayNameOf(userId: string): Promise<string> {
    try {
      const user = await this.gateway.stores.users.get(userId);
      return user ? user.displayName : userId;
    } catch (error) {
      this.logger.warn(`Could not look up user ${userId}: ${errorMessage(error)}`);
      return userId;
    }
  }
}
