/**
 * src/shared/messaging/logging-queue.ts
 *
 * WHY:
 * - Default transport until a real mail adapter is plugged in at di.ts.
 * - Outside production the reset link is written to the log so a developer
 *   can follow the flow without a mail catcher (same convenience as printing
 *   seed credentials in dev).
 *
 * RULES:
 * - In production the link (which embeds the raw token) is NEVER logged.
 */

import type { Logger } from '../logger/logger';
import type { Queue, QueueMessage } from './queue';

export class LoggingQueue implements Queue {
  constructor(
    private readonly logger: Logger,
    private readonly opts: { exposeLinks: boolean },
  ) {}

  enqueue(message: QueueMessage): Promise<void> {
    this.logger.info('queue.message', {
      flow: 'messaging',
      type: message.type,
      subjectId: message.subjectId,
      expiresAt: message.expiresAt,
      ...(this.opts.exposeLinks ? { resetLink: message.resetLink } : {}),
    });

    return Promise.resolve();
  }
}
