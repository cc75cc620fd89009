import crypto from 'node:crypto';
import { NotFoundError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { Storage } from './createStorage.js';
import {
  MESSAGE_LOG_STATUS,
  type MessageBatchEntity,
  type MessageLogEntity,
  type MessageTemplateEntity
} from './entities.js';

export interface MessageTemplateStorageManagerOptions {
  storage: Pick<Storage, 'templates' | 'batches' | 'logs' | 'templateBlobs'>;
  logger: Logger;
  now?: () => Date;
  newId?: () => string;
}

const blobNameFor = (templateId: string) => `${templateId}.json`;

/**
 * Templates, batches and message logs. Template metadata is kept in a table
 * row and the card JSON in a blob named after the template id.
 */
export class MessageTemplateStorageManager {
  private readonly storage: MessageTemplateStorageManagerOptions['storage'];
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: MessageTemplateStorageManagerOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  async saveTemplate(templateName: string, jsonPayload: string, createdByUpn: string): Promise<MessageTemplateEntity> {
    const templateId = this.newId();
    const blobUrl = await this.storage.templateBlobs.upload(blobNameFor(templateId), jsonPayload);
    const entity: MessageTemplateEntity = {
      rowKey: templateId,
      templateName,
      blobUrl,
      createdByUpn,
      createdDate: this.now().toISOString()
    };
    await this.storage.templates.create(entity);
    this.logger.info('Saved template', { templateId, templateName });
    return entity;
  }

  async getAllTemplates(): Promise<MessageTemplateEntity[]> {
    return this.storage.templates.list();
  }

  async getTemplate(templateId: string): Promise<MessageTemplateEntity | undefined> {
    return this.storage.templates.get(templateId);
  }

  async getTemplateJson(templateId: string): Promise<string> {
    await this.requireTemplate(templateId);
    return this.storage.templateBlobs.download(blobNameFor(templateId));
  }

  async updateTemplate(templateId: string, templateName: string, jsonPayload: string): Promise<MessageTemplateEntity> {
    const template = await this.requireTemplate(templateId);
    const blobUrl = await this.storage.templateBlobs.upload(blobNameFor(templateId), jsonPayload);
    const updated: MessageTemplateEntity = { ...template, templateName, blobUrl };
    await this.storage.templates.replace(updated);
    this.logger.info('Updated template', { templateId });
    return updated;
  }

  async deleteTemplate(templateId: string): Promise<void> {
    await this.requireTemplate(templateId);
    await this.storage.templateBlobs.deleteIfExists(blobNameFor(templateId));
    await this.storage.templates.delete(templateId);
    this.logger.info('Deleted template', { templateId });
  }

  async createBatch(batchName: string, templateId: string, senderUpn: string): Promise<MessageBatchEntity> {
    const entity: MessageBatchEntity = {
      rowKey: this.newId(),
      batchName,
      templateId,
      senderUpn,
      createdDate: this.now().toISOString()
    };
    await this.storage.batches.create(entity);
    this.logger.info('Created batch', { batchId: entity.rowKey, batchName });
    return entity;
  }

  async getAllBatches(): Promise<MessageBatchEntity[]> {
    return this.storage.batches.list();
  }

  async getBatch(batchId: string): Promise<MessageBatchEntity | undefined> {
    return this.storage.batches.get(batchId);
  }

  async deleteBatch(batchId: string): Promise<void> {
    const batch = await this.storage.batches.get(batchId);
    if (!batch) {
      throw new NotFoundError(`Batch ${batchId} not found`);
    }
    const logs = await this.getMessageLogsByBatch(batchId);
    for (const log of logs) {
      await this.storage.logs.delete(log.rowKey);
    }
    await this.storage.batches.delete(batchId);
    this.logger.info('Deleted batch and its message logs', { batchId, logCount: logs.length });
  }

  async logMessageSend(
    messageBatchId: string,
    recipientUpn: string | undefined,
    status: string,
    lastError?: string
  ): Promise<MessageLogEntity> {
    const entity: MessageLogEntity = {
      rowKey: this.newId(),
      messageBatchId,
      sentDate: this.now().toISOString(),
      recipientUpn,
      status,
      lastError
    };
    await this.storage.logs.create(entity);
    this.logger.info('Logged message send', { batchId: messageBatchId, status });
    return entity;
  }

  async logBatchMessages(messageBatchId: string, recipientUpns: string[]): Promise<MessageLogEntity[]> {
    const entities: MessageLogEntity[] = [];
    for (const recipientUpn of recipientUpns) {
      const entity: MessageLogEntity = {
        rowKey: this.newId(),
        messageBatchId,
        sentDate: this.now().toISOString(),
        recipientUpn,
        status: MESSAGE_LOG_STATUS.pending
      };
      await this.storage.logs.create(entity);
      entities.push(entity);
    }
    this.logger.info('Created message logs for batch', { batchId: messageBatchId, count: entities.length });
    return entities;
  }

  async updateMessageLogStatus(logId: string, status: string, lastError?: string): Promise<void> {
    const log = await this.storage.logs.get(logId);
    if (!log) {
      this.logger.warn('Message log not found', { logId });
      return;
    }
    await this.storage.logs.replace({ ...log, status, lastError });
    this.logger.info('Updated message log status', { logId, status });
  }

  async getAllMessageLogs(): Promise<MessageLogEntity[]> {
    return this.storage.logs.list();
  }

  async getMessageLogsByBatch(batchId: string): Promise<MessageLogEntity[]> {
    return this.storage.logs.list({ messageBatchId: batchId });
  }

  async getMessageLogsByTemplate(templateId: string): Promise<MessageLogEntity[]> {
    const batches = await this.storage.batches.list({ templateId });
    const logs: MessageLogEntity[] = [];
    for (const batch of batches) {
      logs.push(...(await this.getMessageLogsByBatch(batch.rowKey)));
    }
    return logs;
  }

  async getPendingLogsForRecipient(recipientUpn: string): Promise<MessageLogEntity[]> {
    return this.storage.logs.list({ recipientUpn, status: MESSAGE_LOG_STATUS.pending });
  }

  private async requireTemplate(templateId: string): Promise<MessageTemplateEntity> {
    const template = await this.storage.templates.get(templateId);
    if (!template) {
      throw new NotFoundError(`Template ${templateId} not found`);
    }
    return template;
  }
}
