import type { ConversationResumer } from '../bot/convoResumeManager.js';
import { errorMessage } from '../errors/index.js';
import { hashId, type Logger } from '../logging/logger.js';
import type { BatchQueueMessage } from '../queue/batchQueue.js';
import { MESSAGE_LOG_STATUS } from '../storage/entities.js';
import type { MessageTemplateService } from './messageTemplateService.js';

export interface MessageSendResult {
  success: boolean;
  messageLogId: string;
  recipientUpn: string;
  errorMessage?: string;
}

export interface MessageSenderServiceOptions {
  resumer: ConversationResumer;
  templateService: Pick<MessageTemplateService, 'updateMessageLogStatus'>;
  logger: Logger;
}

export class MessageSenderService {
  private readonly resumer: ConversationResumer;
  private readonly templateService: MessageSenderServiceOptions['templateService'];
  private readonly logger: Logger;

  constructor(options: MessageSenderServiceOptions) {
    this.resumer = options.resumer;
    this.templateService = options.templateService;
    this.logger = options.logger;
  }

  async sendMessage(queueMessage: BatchQueueMessage): Promise<MessageSendResult> {
    const { messageLogId, recipientUpn } = queueMessage;
    const userHash = hashId(recipientUpn);
    try {
      const result = await this.resumer.resumeConversation(recipientUpn);
      switch (result.status) {
        case 'MessageSent':
          await this.templateService.updateMessageLogStatus(messageLogId, MESSAGE_LOG_STATUS.success);
          this.logger.info('Message delivered', { logId: messageLogId, userHash });
          return { success: true, messageLogId, recipientUpn };
        case 'AppInstalledPending':
          // The log stays Pending; the card goes out when the user's conversation arrives.
          this.logger.info('Bot installed; delivery pending', { logId: messageLogId, userHash });
          return { success: true, messageLogId, recipientUpn };
        case 'Failed':
          await this.templateService.updateMessageLogStatus(messageLogId, MESSAGE_LOG_STATUS.failed, result.message);
          this.logger.warn('Message delivery failed', { logId: messageLogId, userHash, reason: result.message });
          return { success: false, messageLogId, recipientUpn, errorMessage: result.message };
      }
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Error sending message', { logId: messageLogId, userHash, error: message });
      await this.templateService.updateMessageLogStatus(messageLogId, MESSAGE_LOG_STATUS.failed, message);
      return { success: false, messageLogId, recipientUpn, errorMessage: message };
    }
  }
}
