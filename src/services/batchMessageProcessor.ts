import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { BatchQueue } from '../queue/batchQueue.js';
import type { MessageSenderService } from './messageSenderService.js';

export type ProcessOutcome = 'empty' | 'processed' | 'invalid';

export interface BatchMessageProcessorOptions {
  queue: BatchQueue;
  sender: Pick<MessageSenderService, 'sendMessage'>;
  logger: Logger;
  pollIntervalMs?: number;
  delay?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const abortableDelay = async (ms: number, signal: AbortSignal): Promise<void> => {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

/**
 * Drains the batch queue one message at a time, backing off for the poll
 * interval whenever the queue is empty or a receive fails.
 */
export class BatchMessageProcessor {
  private readonly queue: BatchQueue;
  private readonly sender: BatchMessageProcessorOptions['sender'];
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly delay: (ms: number, signal: AbortSignal) => Promise<void>;
  private controller?: AbortController;
  private running?: Promise<void>;
  private initialized?: Promise<void>;

  constructor(options: BatchMessageProcessorOptions) {
    this.queue = options.queue;
    this.sender = options.sender;
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.delay = options.delay ?? abortableDelay;
  }

  get isRunning(): boolean {
    return this.running !== undefined;
  }

  /** Resolves once the queue is ready; a second call joins the first. */
  async start(): Promise<void> {
    if (this.running) {
      await this.initialized;
      return;
    }
    const controller = new AbortController();
    const initialized = this.queue.initialize();
    this.controller = controller;
    this.initialized = initialized;
    this.running = initialized
      .then(() => {
        this.logger.info('Batch message processor starting', { pollIntervalMs: this.pollIntervalMs });
        return this.loop(controller.signal);
      })
      .catch((error: unknown) => {
        this.logger.error('Batch message processor failed', { error: errorMessage(error) });
      })
      .finally(() => {
        this.running = undefined;
        this.initialized = undefined;
        this.logger.info('Batch message processor stopped');
      });
    await initialized;
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.running;
  }

  async processNext(): Promise<ProcessOutcome> {
    const received = await this.queue.dequeue();
    if (!received) {
      return 'empty';
    }
    if (received.invalid) {
      this.logger.warn('Discarding invalid queue message', { messageId: received.messageId, reason: received.reason });
      await this.queue.delete(received);
      return 'invalid';
    }

    const { message } = received;
    const result = await this.sender.sendMessage(message);
    if (result.success) {
      this.logger.info('Processed queue message', { logId: message.messageLogId });
    } else {
      this.logger.warn('Queue message not delivered', { logId: message.messageLogId, reason: result.errorMessage });
    }
    await this.queue.delete(received);
    return 'processed';
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let outcome: ProcessOutcome;
      try {
        outcome = await this.processNext();
      } catch (error) {
        this.logger.error('Error processing batch message', { error: errorMessage(error) });
        outcome = 'empty';
      }
      if (outcome === 'empty' && !signal.aborted) {
        await this.delay(this.pollIntervalMs, signal);
      }
    }
  }
}
