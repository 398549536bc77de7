import { EventEmitter } from 'events';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

import type {
  EventHandler,
  EventOfType,
  EventSubscription,
  TaskDeskEvent,
  TaskDeskEventType,
} from './types';

function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

function isEventOfType<K extends TaskDeskEventType>(event: TaskDeskEvent, type: K): event is EventOfType<K> {
  return event.type === type;
}

function assertWellFormed(event: TaskDeskEvent): void {
  const checks: Array<[field: string, value: unknown, expected: 'string' | 'number']> = [
    ['type', event.type, 'string'],
    ['timestamp', event.timestamp, 'number'],
    ['source', event.source, 'string'],
  ];
  for (const [field, value, expected] of checks) {
    if (!value || typeof value !== expected) {
      throw new Error(`Event must have a valid ${field} ${expected}`);
    }
  }
}

/**
 * Event Stream interface - contract for bus implementations
 */
export interface IEventStream {
  publish(event: TaskDeskEvent): void;

  subscribe<K extends TaskDeskEventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  getSubscriptions(): EventSubscription[];

  /**
   * Clear all subscriptions (for testing/cleanup)
   */
  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

export type EventBusDependencies = {
  logger?: Logger;
};

/**
 * In-process EventBus on Node.js EventEmitter.
 *
 * Handlers run detached from `publish()`: a failing or slow handler never
 * reaches the publisher. Errors are logged; `waitForIdle()` lets callers
 * observe completion.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;
  private pendingHandlers: Set<Promise<void>>;
  private logger: Logger;

  constructor(dependencies: EventBusDependencies = {}) {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.pendingHandlers = new Set();
    this.logger = dependencies.logger ?? createLogger('[EventBus] ');

    this.emitter.setMaxListeners(100);
  }

  /**
   * Publish an event to all subscribers of its type and to wildcard subscribers.
   */
  publish(event: TaskDeskEvent): void {
    assertWellFormed(event);

    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  subscribe<K extends TaskDeskEventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): EventSubscription {
    return this.register(eventType, async (event) => {
      if (isEventOfType(event, eventType)) {
        await handler(event);
      }
    });
  }

  /**
   * Subscribe to all events (wildcard subscription)
   */
  subscribeToAll(handler: EventHandler<TaskDeskEvent>): EventSubscription {
    return this.register('*', handler);
  }

  private register(eventType: TaskDeskEventType | '*', handler: EventHandler<TaskDeskEvent>): EventSubscription {
    const subscriptionId = generateSubscriptionId();

    const listener = (event: TaskDeskEvent): void => {
      const handlerPromise = (async () => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Error in event handler for ${event.type}:`, error);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    const subscription: EventSubscription = {
      id: subscriptionId,
      eventType,
      listener,
      metadata: {
        createdAt: Date.now(),
      },
    };

    this.emitter.on(eventType, listener);
    this.subscriptions.set(subscriptionId, subscription);

    return subscription;
  }

  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, subscription.listener);
    this.subscriptions.delete(subscriptionId);

    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values());
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  getSubscriptionCount(eventType: TaskDeskEventType | '*'): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Number of handler invocations still running.
   */
  getPendingCount(): number {
    return this.pendingHandlers.size;
  }

  /**
   * Wait for all pending event handlers to complete, including handlers
   * started by events that pending handlers publish.
   *
   * @example
   * ```typescript
   * await lifecycle.assignTask(principal, taskId, userId); // publishes task.assigned
   * await eventBus.waitForIdle();                          // dispatcher has stored notifications
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        this.logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise((resolve) => setTimeout(resolve, 10)),
      ]);
    }
  }
}
