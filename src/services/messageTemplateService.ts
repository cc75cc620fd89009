import { NotFoundError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import {
  toBatchDto,
  toLogDto,
  toTemplateDto,
  type MessageBatchDto,
  type MessageLogDto,
  type MessageTemplateDto
} from '../models/dtos.js';
import type { BatchQueue, BatchQueueMessage } from '../queue/batchQueue.js';
import type { MessageTemplateStorageManager } from '../storage/messageTemplateStorageManager.js';

export interface MessageTemplateServiceOptions {
  storageManager: MessageTemplateStorageManager;
  batchQueue: BatchQueue;
  logger: Logger;
}

export class MessageTemplateService {
  private readonly storageManager: MessageTemplateStorageManager;
  private readonly batchQueue: BatchQueue;
  private readonly logger: Logger;

  constructor(options: MessageTemplateServiceOptions) {
    this.storageManager = options.storageManager;
    this.batchQueue = options.batchQueue;
    this.logger = options.logger;
  }

  async getAllTemplates(): Promise<MessageTemplateDto[]> {
    const templates = await this.storageManager.getAllTemplates();
    this.logger.debug('Listed templates', { count: templates.length });
    return templates.map(toTemplateDto);
  }

  async getTemplateById(id: string): Promise<MessageTemplateDto | undefined> {
    const template = await this.storageManager.getTemplate(id);
    return template ? toTemplateDto(template) : undefined;
  }

  async getTemplateJson(id: string): Promise<string> {
    return this.storageManager.getTemplateJson(id);
  }

  async createTemplate(templateName: string, jsonPayload: string, createdByUpn: string): Promise<MessageTemplateDto> {
    this.logger.info('Creating template', { templateName });
    return toTemplateDto(await this.storageManager.saveTemplate(templateName, jsonPayload, createdByUpn));
  }

  async updateTemplate(id: string, templateName: string, jsonPayload: string): Promise<MessageTemplateDto> {
    this.logger.info('Updating template', { templateId: id });
    return toTemplateDto(await this.storageManager.updateTemplate(id, templateName, jsonPayload));
  }

  async deleteTemplate(id: string): Promise<void> {
    this.logger.info('Deleting template', { templateId: id });
    await this.storageManager.deleteTemplate(id);
  }

  async getAllBatches(): Promise<MessageBatchDto[]> {
    return (await this.storageManager.getAllBatches()).map(toBatchDto);
  }

  async getBatchById(id: string): Promise<MessageBatchDto | undefined> {
    const batch = await this.storageManager.getBatch(id);
    return batch ? toBatchDto(batch) : undefined;
  }

  async createBatch(batchName: string, templateId: string, senderUpn: string): Promise<MessageBatchDto> {
    return toBatchDto(await this.storageManager.createBatch(batchName, templateId, senderUpn));
  }

  async deleteBatch(id: string): Promise<void> {
    this.logger.info('Deleting batch', { batchId: id });
    await this.storageManager.deleteBatch(id);
  }

  async getAllLogs(): Promise<MessageLogDto[]> {
    return (await this.storageManager.getAllMessageLogs()).map(toLogDto);
  }

  async getMessageLogsByBatch(batchId: string): Promise<MessageLogDto[]> {
    return (await this.storageManager.getMessageLogsByBatch(batchId)).map(toLogDto);
  }

  async getMessageLogsByTemplate(templateId: string): Promise<MessageLogDto[]> {
    return (await this.storageManager.getMessageLogsByTemplate(templateId)).map(toLogDto);
  }

  async logMessageSend(
    batchId: string,
    recipientUpn: string | undefined,
    status: string,
    lastError?: string
  ): Promise<MessageLogDto> {
    return toLogDto(await this.storageManager.logMessageSend(batchId, recipientUpn, status, lastError));
  }

  async updateMessageLogStatus(logId: string, status: string, lastError?: string): Promise<void> {
    await this.storageManager.updateMessageLogStatus(logId, status, lastError);
  }

  /**
   * Creates a pending log per recipient and queues one delivery message for each.
   */
  async logBatchMessages(batchId: string, recipientUpns: string[]): Promise<MessageLogDto[]> {
    const logs = await this.storageManager.logBatchMessages(batchId, recipientUpns);
    const batch = await this.storageManager.getBatch(batchId);
    if (!batch) {
      throw new NotFoundError(`Batch ${batchId} not found`);
    }

    const messages: BatchQueueMessage[] = logs.map((log) => ({
      batchId,
      messageLogId: log.rowKey,
      recipientUpn: log.recipientUpn ?? '',
      templateId: batch.templateId
    }));
    await this.batchQueue.enqueueMany(messages);
    this.logger.info('Queued batch messages', { batchId, count: messages.length });
    return logs.map(toLogDto);
  }
}
