/**
 * FILE PURPOSE: ChainDispatcher over BullMQ: one flow per record
 *
 * WHY: Each stage is its own durable job, so a crash between store and send
 *      resumes at send instead of recomputing, and every stage retries on
 *      its own schedule.
 * HOW: A flow with send as the parent, store as its child and compute as the
 *      grandchild. BullMQ runs children first, so the stages execute as
 *      compute → store → send, each parent reading its child's return value.
 *      failParentOnFailure propagates a terminal child failure upwards.
 *      dispatch() waits for the send job through QueueEvents and, on failure,
 *      walks the flow from compute upwards to find the stage that broke.
 */

import { FlowProducer, Job, Queue, QueueEvents } from 'bullmq';
import type { FlowJob, JobNode } from 'bullmq';
import type { BoostFactors, BoostRequest, RecordKey, RecordOutcome } from '@boost-pipeline/shared-types';
import {
  DEFAULT_STAGE_RETRY,
  STAGE_QUEUES,
  errorMessage,
  parseQueueFailure,
  parseRedisConnection,
  stageJobOptions,
} from '@boost-pipeline/boost-core';
import type { ChainDispatcher, ChainStage, StageJobData, StageRetryOptions } from '@boost-pipeline/boost-core';

export interface QueueChainDispatcherOptions {
  redisUrl: string;
  retry?: StageRetryOptions;
}

const CHAIN_ORDER: readonly ChainStage[] = ['compute', 'store', 'send'];

/** Build the three-level flow for one record. */
export function buildChainFlow(request: BoostRequest, retry: StageRetryOptions = DEFAULT_STAGE_RETRY): FlowJob {
  const key: RecordKey = { bibcode: request.bibcode, scixId: request.scixId };
  const opts = stageJobOptions(retry);
  const childOpts = { ...opts, failParentOnFailure: true };

  return {
    name: 'send',
    queueName: STAGE_QUEUES.send,
    data: { key },
    opts,
    children: [
      {
        name: 'store',
        queueName: STAGE_QUEUES.store,
        data: { key },
        opts: childOpts,
        children: [
          {
            name: 'compute',
            queueName: STAGE_QUEUES.compute,
            data: { request },
            opts: childOpts,
          },
        ],
      },
    ],
  };
}

/** Job ids of a flow's stages, keyed by stage. */
function stageJobIds(node: JobNode): Partial<Record<ChainStage, string>> {
  const store = node.children?.[0];
  const compute = store?.children?.[0];
  return { send: node.job.id, store: store?.job.id, compute: compute?.job.id };
}

export class QueueChainDispatcher implements ChainDispatcher {
  private readonly flows: FlowProducer;
  private readonly sendEvents: QueueEvents;
  private readonly queues: Record<ChainStage, Queue<StageJobData, BoostFactors>>;
  private readonly retry: StageRetryOptions;
  private ready: Promise<void> | null = null;

  constructor(options: QueueChainDispatcherOptions) {
    const connection = parseRedisConnection(options.redisUrl);
    this.retry = options.retry ?? DEFAULT_STAGE_RETRY;
    this.flows = new FlowProducer({ connection });
    this.sendEvents = new QueueEvents(STAGE_QUEUES.send, { connection });
    this.queues = {
      compute: new Queue<StageJobData, BoostFactors>(STAGE_QUEUES.compute, { connection }),
      store: new Queue<StageJobData, BoostFactors>(STAGE_QUEUES.store, { connection }),
      send: new Queue<StageJobData, BoostFactors>(STAGE_QUEUES.send, { connection }),
    };
  }

  /** Enqueue the chain for one record without waiting for it. */
  schedule(request: BoostRequest): Promise<JobNode> {
    return this.flows.add(buildChainFlow(request, this.retry));
  }

  async dispatch(request: BoostRequest): Promise<RecordOutcome> {
    const key: RecordKey = { bibcode: request.bibcode, scixId: request.scixId };
    this.ready ??= this.sendEvents.waitUntilReady().then(() => undefined);
    await this.ready;

    const node = await this.schedule(request);
    try {
      await node.job.waitUntilFinished(this.sendEvents);
      return { key, status: 'succeeded' };
    } catch (err) {
      return { key, status: 'failed', ...(await this.locateFailure(node, err)) };
    }
  }

  private async locateFailure(
    node: JobNode,
    err: unknown,
  ): Promise<Pick<Extract<RecordOutcome, { status: 'failed' }>, 'stage' | 'errorKind' | 'message'>> {
    const ids = stageJobIds(node);
    for (const stage of CHAIN_ORDER) {
      const id = ids[stage];
      if (!id) continue;
      const job = await Job.fromId<StageJobData, BoostFactors>(this.queues[stage], id);
      if (job && (await job.isFailed())) {
        return { stage, ...parseQueueFailure(job.failedReason) };
      }
    }
    return { stage: 'send', ...parseQueueFailure(errorMessage(err)) };
  }

  async close(): Promise<void> {
    await Promise.all([
      this.flows.close(),
      this.sendEvents.close(),
      ...CHAIN_ORDER.map((stage) => this.queues[stage].close()),
    ]);
  }
}
