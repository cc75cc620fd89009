import { QueueServiceClient, type QueueClient } from '@azure/storage-queue';
import { z } from 'zod';

export const BATCH_QUEUE_NAME = 'batch-messages';

export const BatchQueueMessageSchema = z.object({
  batchId: z.string().min(1),
  messageLogId: z.string().min(1),
  recipientUpn: z.string(),
  templateId: z.string().min(1)
});

export type BatchQueueMessage = z.infer<typeof BatchQueueMessageSchema>;

export type ReceivedBatchMessage =
  | { invalid: false; messageId: string; receipt: string; message: BatchQueueMessage }
  | { invalid: true; messageId: string; receipt: string; reason: string };

export interface BatchQueue {
  initialize(): Promise<void>;
  enqueue(message: BatchQueueMessage): Promise<void>;
  enqueueMany(messages: BatchQueueMessage[]): Promise<void>;
  /** Receives one message and hides it from other receivers until deleted. */
  dequeue(): Promise<ReceivedBatchMessage | undefined>;
  delete(received: ReceivedBatchMessage): Promise<void>;
  getLength(): Promise<number>;
}

export const encodeBatchMessage = (message: BatchQueueMessage): string =>
  Buffer.from(JSON.stringify(message), 'utf8').toString('base64');

export const parseBatchQueueMessage = (
  text: string
): { ok: true; message: BatchQueueMessage } | { ok: false; reason: string } => {
  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(text, 'base64').toString('utf8'));
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'Invalid JSON' };
  }
  const result = BatchQueueMessageSchema.safeParse(payload);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map((issue) => issue.message).join('; ') };
  }
  return { ok: true, message: result.data };
};

const toReceived = (messageId: string, receipt: string, text: string): ReceivedBatchMessage => {
  const parsed = parseBatchQueueMessage(text);
  return parsed.ok
    ? { invalid: false, messageId, receipt, message: parsed.message }
    : { invalid: true, messageId, receipt, reason: parsed.reason };
};

export class MemoryBatchQueue implements BatchQueue {
  private readonly visible: { id: string; text: string }[] = [];
  private readonly inFlight = new Map<string, string>();
  private nextId = 1;

  async initialize(): Promise<void> {}

  async enqueue(message: BatchQueueMessage): Promise<void> {
    this.pushText(encodeBatchMessage(message));
  }

  async enqueueMany(messages: BatchQueueMessage[]): Promise<void> {
    for (const message of messages) {
      await this.enqueue(message);
    }
  }

  async dequeue(): Promise<ReceivedBatchMessage | undefined> {
    const next = this.visible.shift();
    if (!next) {
      return undefined;
    }
    this.inFlight.set(next.id, next.text);
    return toReceived(next.id, next.id, next.text);
  }

  async delete(received: ReceivedBatchMessage): Promise<void> {
    this.inFlight.delete(received.messageId);
  }

  async getLength(): Promise<number> {
    return this.visible.length + this.inFlight.size;
  }

  protected pushText(text: string): void {
    this.visible.push({ id: String(this.nextId++), text });
  }
}

export interface StorageBatchQueueOptions {
  connectionString: string;
  queueName?: string;
  visibilityTimeoutSeconds?: number;
}

/**
 * Azure Storage queue carrying base64 encoded JSON messages.
 */
export class StorageBatchQueue implements BatchQueue {
  private readonly client: QueueClient;
  private readonly visibilityTimeoutSeconds: number;

  constructor(options: StorageBatchQueueOptions) {
    this.client = QueueServiceClient.fromConnectionString(options.connectionString).getQueueClient(
      options.queueName ?? BATCH_QUEUE_NAME
    );
    this.visibilityTimeoutSeconds = options.visibilityTimeoutSeconds ?? 30;
  }

  async initialize(): Promise<void> {
    await this.client.createIfNotExists();
  }

  async enqueue(message: BatchQueueMessage): Promise<void> {
    await this.client.sendMessage(encodeBatchMessage(message));
  }

  async enqueueMany(messages: BatchQueueMessage[]): Promise<void> {
    await this.initialize();
    for (const message of messages) {
      await this.enqueue(message);
    }
  }

  async dequeue(): Promise<ReceivedBatchMessage | undefined> {
    const response = await this.client.receiveMessages({
      numberOfMessages: 1,
      visibilityTimeout: this.visibilityTimeoutSeconds
    });
    const item = response.receivedMessageItems[0];
    if (!item) {
      return undefined;
    }
    return toReceived(item.messageId, item.popReceipt, item.messageText);
  }

  async delete(received: ReceivedBatchMessage): Promise<void> {
    await this.client.deleteMessage(received.messageId, received.receipt);
  }

  async getLength(): Promise<number> {
    const properties = await this.client.getProperties();
    return properties.approximateMessagesCount ?? 0;
  }
}

export const createBatchQueue = (connectionString?: string): BatchQueue =>
  connectionString ? new StorageBatchQueue({ connectionString }) : new MemoryBatchQueue();
