import { CardFactory } from 'botbuilder';
import type { Attachment } from 'botframework-schema';
import { hashId, type Logger } from '../logging/logger.js';
import type { PendingCardInfo, PendingCardLookupService } from '../services/pendingCardLookupService.js';
import { MESSAGE_LOG_STATUS } from '../storage/entities.js';

export interface ResumeResult<T> {
  data?: T;
  attachment: Attachment;
}

/** Decides what to send when a conversation with a user is resumed. */
export interface ConversationResumeHandler<T> {
  loadDataAndResumeConversation(upn: string): Promise<ResumeResult<T>>;
}

interface MessageLogStatusWriter {
  updateMessageLogStatus(logId: string, status: string, lastError?: string): Promise<void>;
}

export interface PendingCardConversationResumeHandlerOptions {
  lookupService: Pick<PendingCardLookupService, 'getLatestPendingCardByUpn'>;
  messageLogs: MessageLogStatusWriter;
  logger: Logger;
}

/**
 * Delivers the user's most recent undelivered nudge, marking it as sent.
 */
export class PendingCardConversationResumeHandler implements ConversationResumeHandler<PendingCardInfo> {
  private readonly lookupService: PendingCardConversationResumeHandlerOptions['lookupService'];
  private readonly messageLogs: MessageLogStatusWriter;
  private readonly logger: Logger;

  constructor(options: PendingCardConversationResumeHandlerOptions) {
    this.lookupService = options.lookupService;
    this.messageLogs = options.messageLogs;
    this.logger = options.logger;
  }

  async loadDataAndResumeConversation(upn: string): Promise<ResumeResult<PendingCardInfo>> {
    const pendingCard = await this.lookupService.getLatestPendingCardByUpn(upn);
    if (!pendingCard) {
      this.logger.info('No pending card; sending welcome card', { userHash: hashId(upn) });
      return {
        attachment: CardFactory.heroCard('Welcome!', `Hello ${upn}, you have no pending messages at this time.`)
      };
    }

    await this.messageLogs.updateMessageLogStatus(pendingCard.messageLogId, MESSAGE_LOG_STATUS.success);
    this.logger.info('Resuming with pending card', {
      userHash: hashId(upn),
      templateName: pendingCard.templateName,
      logId: pendingCard.messageLogId
    });
    return { data: pendingCard, attachment: pendingCard.cardAttachment };
  }
}

export class DefaultConversationResumeHandler implements ConversationResumeHandler<string> {
  async loadDataAndResumeConversation(upn: string): Promise<ResumeResult<string>> {
    return {
      data: upn,
      attachment: CardFactory.heroCard('Welcome Back!', `Hello ${upn}, how can I help you today?`)
    };
  }
}
