import { MessageFactory, type TurnContext } from 'botbuilder';
import type { ConversationReference } from 'botframework-schema';
import { errorMessage } from '../errors/index.js';
import type { TeamsAppInstaller } from '../graph/teamsAppInstaller.js';
import type { GraphUserService } from '../graph/userService.js';
import { hashId, type Logger } from '../logging/logger.js';
import type { CachedUserAndConversationData } from '../storage/entities.js';
import type { BotConversationCache } from './conversationCache.js';
import type { ConversationResumeHandler } from './resumeHandlers.js';

export const TEAMS_CHANNEL_ID = 'msteams';
const BOT_ID_PREFIX = '28:';

export type ConversationResumeStatus = 'MessageSent' | 'AppInstalledPending' | 'Failed';

export interface ConversationResumeResult {
  status: ConversationResumeStatus;
  message: string;
  error?: unknown;
}

export interface ConversationResumer {
  resumeConversation(upn: string): Promise<ConversationResumeResult>;
}

/** The part of the bot adapter used to message a user proactively. */
export interface ProactiveAdapter {
  continueConversationAsync(
    botAppId: string,
    reference: Partial<ConversationReference>,
    logic: (context: Pick<TurnContext, 'sendActivity'>) => Promise<void>
  ): Promise<void>;
}

export interface BotConvoResumeManagerOptions<T> {
  adapter: ProactiveAdapter;
  botAppId: string;
  appCatalogTeamsAppId?: string;
  conversationCache: Pick<BotConversationCache, 'populateMemCacheIfEmpty' | 'getCachedUser'>;
  userService: Pick<GraphUserService, 'getUserIdByUpn'>;
  installer: Pick<TeamsAppInstaller, 'installBotForUser'>;
  resumeHandler: ConversationResumeHandler<T>;
  logger: Logger;
}

const failed = (message: string, error?: unknown): ConversationResumeResult => ({
  status: 'Failed',
  message,
  error
});

/**
 * Sends a user the card chosen by the resume handler. Users the bot has never
 * talked to get the Teams app installed instead; the card follows once Teams
 * reports the new conversation.
 */
export class BotConvoResumeManager<T> implements ConversationResumer {
  private readonly options: BotConvoResumeManagerOptions<T>;
  private readonly logger: Logger;

  constructor(options: BotConvoResumeManagerOptions<T>) {
    this.options = options;
    this.logger = options.logger;
  }

  async resumeConversation(upn: string): Promise<ConversationResumeResult> {
    let userId: string | undefined;
    try {
      userId = await this.options.userService.getUserIdByUpn(upn);
    } catch (error) {
      const message = `Couldn't get user by UPN '${upn}' - ${errorMessage(error)}`;
      this.logger.warn('User lookup failed', { userHash: hashId(upn), error: errorMessage(error) });
      return failed(message, error);
    }
    if (!userId) {
      this.logger.warn('User not found or has no id', { userHash: hashId(upn) });
      return failed(`User ${upn} not found or has no ID`);
    }

    await this.options.conversationCache.populateMemCacheIfEmpty();
    const cachedUser = this.options.conversationCache.getCachedUser(userId);
    const result = cachedUser
      ? await this.sendToExistingConversation(cachedUser, upn)
      : await this.installBotForUser(userId, upn);
    this.logger.info('Conversation resume result', { status: result.status, userHash: hashId(upn) });
    return result;
  }

  buildConversationReference(cachedUser: CachedUserAndConversationData): Partial<ConversationReference> {
    return {
      channelId: TEAMS_CHANNEL_ID,
      bot: { id: `${BOT_ID_PREFIX}${this.options.botAppId}`, name: '' },
      serviceUrl: cachedUser.serviceUrl,
      conversation: { id: cachedUser.conversationId, name: '', isGroup: false, conversationType: 'personal' }
    };
  }

  private async sendToExistingConversation(
    cachedUser: CachedUserAndConversationData,
    upn: string
  ): Promise<ConversationResumeResult> {
    try {
      const { attachment } = await this.options.resumeHandler.loadDataAndResumeConversation(upn);
      const activity = MessageFactory.attachment(attachment);
      await this.options.adapter.continueConversationAsync(
        this.options.botAppId,
        this.buildConversationReference(cachedUser),
        async (context) => {
          await context.sendActivity(activity);
        }
      );
      return { status: 'MessageSent', message: `Message sent successfully to ${upn}` };
    } catch (error) {
      this.logger.error('Proactive send failed', { userHash: hashId(upn), error: errorMessage(error) });
      return failed(`Error sending message to ${upn}: ${errorMessage(error)}`, error);
    }
  }

  private async installBotForUser(userId: string, upn: string): Promise<ConversationResumeResult> {
    const teamsAppId = this.options.appCatalogTeamsAppId;
    if (!teamsAppId) {
      this.logger.error('APP_CATALOG_TEAMS_APP_ID is not configured');
      return failed("Can't install Teams app for bot - no AppCatalogTeamAppId found in configuration");
    }

    try {
      await this.options.installer.installBotForUser(userId, teamsAppId);
      return {
        status: 'AppInstalledPending',
        message: `Bot app installed for ${upn}. Message will be sent when user opens the app.`
      };
    } catch (error) {
      this.logger.warn('Teams app install failed', { userHash: hashId(upn), error: errorMessage(error) });
      return failed(
        `Couldn't install Teams app for user '${userId}' - ${errorMessage(error)} - is user licensed for Teams?`,
        error
      );
    }
  }
}
