/**
 * src/shared/messaging/inmem-queue.ts
 *
 * WHY:
 * - Tests need to inspect what messages the service enqueued without running
 *   real email infrastructure.
 * - drain() is the test contract: call it after the operation completes
 *   to get all enqueued messages, then assert on their contents.
 *
 * RULES:
 * - drain() is only used by test helpers; production code never calls it.
 */

import type { Queue, QueueMessage } from './queue';

export class InMemQueue implements Queue {
  private readonly messages: QueueMessage[] = [];

  enqueue(message: QueueMessage): Promise<void> {
    this.messages.push(message);
    return Promise.resolve();
  }

  /**
   * Returns all enqueued messages and clears the queue.
   */
  drain(): QueueMessage[] {
    return this.messages.splice(0, this.messages.length);
  }
}
