/**
 * FILE PURPOSE: Notification gateway: hand computed boosts back to the upstream system
 *
 * WHY: The upstream indexer consumes boost updates from its own BullMQ queue.
 *      Notification is best effort: a failed send never touches the row the
 *      store stage already wrote.
 * HOW: One job per record on the output queue carrying the snake_case
 *      response message. Transport errors surface as RetryableError so the
 *      send stage is retried with backoff.
 */

import { Queue } from 'bullmq';
import type { BoostFactors, BoostResponseMessage } from '@boost-pipeline/shared-types';
import {
  RetryableError,
  errorMessage,
  parseRedisConnection,
  recordLabel,
  toBoostResponseMessage,
} from '@boost-pipeline/boost-core';

export interface BoostNotifier {
  send(factors: BoostFactors): Promise<void>;
  close(): Promise<void>;
}

export const RESPONSE_JOB_NAME = 'boost-response';

export class QueueBoostNotifier implements BoostNotifier {
  constructor(private readonly queue: Queue<BoostResponseMessage>) {}

  static create(redisUrl: string, queueName: string): QueueBoostNotifier {
    return new QueueBoostNotifier(
      new Queue<BoostResponseMessage>(queueName, {
        connection: parseRedisConnection(redisUrl),
        defaultJobOptions: { removeOnComplete: { count: 1000 }, removeOnFail: { count: 5000 } },
      }),
    );
  }

  async send(factors: BoostFactors): Promise<void> {
    try {
      await this.queue.add(RESPONSE_JOB_NAME, toBoostResponseMessage(factors));
    } catch (err) {
      throw new RetryableError(`send ${recordLabel(factors)}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
