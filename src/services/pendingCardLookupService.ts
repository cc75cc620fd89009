import type { Attachment } from 'botframework-schema';
import { errorMessage } from '../errors/index.js';
import { hashId, type Logger } from '../logging/logger.js';
import type { MessageLogEntity } from '../storage/entities.js';
import type { MessageTemplateStorageManager } from '../storage/messageTemplateStorageManager.js';

export const ADAPTIVE_CARD_CONTENT_TYPE = 'application/vnd.microsoft.card.adaptive';

export interface PendingCardInfo {
  messageLogId: string;
  batchId: string;
  templateId: string;
  templateName: string;
  cardJson: string;
  cardAttachment: Attachment;
  sentDate: string;
  recipientUpn: string;
}

export interface PendingCardLookupServiceOptions {
  storageManager: MessageTemplateStorageManager;
  logger: Logger;
}

export const createCardAttachment = (cardJson: string): Attachment => {
  const content: unknown = JSON.parse(cardJson);
  return { contentType: ADAPTIVE_CARD_CONTENT_TYPE, content };
};

const newestFirst = (logs: MessageLogEntity[]): MessageLogEntity[] =>
  [...logs].sort((a, b) => Date.parse(b.sentDate) - Date.parse(a.sentDate));

/** Finds queued nudges that have not been delivered to a user yet. */
export class PendingCardLookupService {
  private readonly storageManager: MessageTemplateStorageManager;
  private readonly logger: Logger;

  constructor(options: PendingCardLookupServiceOptions) {
    this.storageManager = options.storageManager;
    this.logger = options.logger;
  }

  async getLatestPendingCardByUpn(upn: string): Promise<PendingCardInfo | undefined> {
    const userHash = hashId(upn);
    try {
      const pending = await this.storageManager.getPendingLogsForRecipient(upn);
      const [latest] = newestFirst(pending);
      if (!latest) {
        this.logger.info('No pending cards for user', { userHash });
        return undefined;
      }
      this.logger.info('Found pending card', { userHash, logId: latest.rowKey, batchId: latest.messageBatchId });
      return await this.toPendingCard(latest, upn);
    } catch (error) {
      this.logger.error('Pending card lookup failed', { userHash, error: errorMessage(error) });
      return undefined;
    }
  }

  async getAllPendingCardsByUpn(upn: string): Promise<PendingCardInfo[]> {
    const userHash = hashId(upn);
    let pending: MessageLogEntity[];
    try {
      pending = await this.storageManager.getPendingLogsForRecipient(upn);
    } catch (error) {
      this.logger.error('Pending card lookup failed', { userHash, error: errorMessage(error) });
      return [];
    }

    const cards: PendingCardInfo[] = [];
    for (const log of newestFirst(pending)) {
      try {
        const card = await this.toPendingCard(log, upn);
        if (card) {
          cards.push(card);
        }
      } catch (error) {
        this.logger.warn('Skipping pending card', { logId: log.rowKey, error: errorMessage(error) });
      }
    }
    this.logger.info('Found pending cards', { userHash, count: cards.length });
    return cards;
  }

  private async toPendingCard(log: MessageLogEntity, upn: string): Promise<PendingCardInfo | undefined> {
    const batch = await this.storageManager.getBatch(log.messageBatchId);
    if (!batch) {
      this.logger.warn('Batch not found for pending card', { batchId: log.messageBatchId });
      return undefined;
    }
    const template = await this.storageManager.getTemplate(batch.templateId);
    if (!template) {
      this.logger.warn('Template not found for pending card', { templateId: batch.templateId });
      return undefined;
    }
    const cardJson = await this.storageManager.getTemplateJson(batch.templateId);
    return {
      messageLogId: log.rowKey,
      batchId: log.messageBatchId,
      templateId: batch.templateId,
      templateName: template.templateName,
      cardJson,
      cardAttachment: createCardAttachment(cardJson),
      sentDate: log.sentDate,
      recipientUpn: log.recipientUpn ?? upn
    };
  }
}
