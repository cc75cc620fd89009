import { MessageFactory, TeamsInfo, type TurnContext } from 'botbuilder';
import type { ChannelAccount } from 'botframework-schema';
import { errorMessage } from '../errors/index.js';
import { hashId } from '../logging/logger.js';
import { parseBotUserInfo } from '../models/botUser.js';
import type { PendingCardInfo } from '../services/pendingCardLookupService.js';
import type { BaseAdaptiveCard } from './cards/adaptiveCard.js';
import type { BotConversationCache } from './conversationCache.js';
import { DialogueBot, type DialogueBotOptions } from './dialogueBot.js';
import type { MainDialog } from './dialogs/mainDialog.js';
import type { ConversationResumeHandler } from './resumeHandlers.js';

export const ANONYMOUS_USER_REPLY = 'Hi, anonymous user. I only work with Azure AD users in Teams normally...';

/** Looks up the sign-in name of a conversation member. */
export type MemberUpnResolver = (context: TurnContext, member: ChannelAccount) => Promise<string | undefined>;

export const teamsRosterUpnResolver: MemberUpnResolver = async (context, member) => {
  const teamsMember = await TeamsInfo.getMember(context, member.id);
  return teamsMember.userPrincipalName || undefined;
};

export interface TeamsBotOptions extends DialogueBotOptions<MainDialog> {
  conversationCache: Pick<
    BotConversationCache,
    'populateMemCacheIfEmpty' | 'getCachedUser' | 'addConversationReferenceToCache'
  >;
  resumeHandler: ConversationResumeHandler<PendingCardInfo>;
  introCard: BaseAdaptiveCard;
  resolveMemberUpn?: MemberUpnResolver;
}

/**
 * Greets users as the bot is added to their chat, remembers how to reach them
 * and delivers any nudge that was waiting for the conversation to exist.
 */
export class TeamsBot extends DialogueBot<MainDialog> {
  private readonly conversationCache: TeamsBotOptions['conversationCache'];
  private readonly resumeHandler: ConversationResumeHandler<PendingCardInfo>;
  private readonly introCard: BaseAdaptiveCard;
  private readonly resolveMemberUpn: MemberUpnResolver;

  constructor(options: TeamsBotOptions) {
    super(options);
    this.conversationCache = options.conversationCache;
    this.resumeHandler = options.resumeHandler;
    this.introCard = options.introCard;
    this.resolveMemberUpn = options.resolveMemberUpn ?? teamsRosterUpnResolver;

    this.onMembersAdded(async (context, next) => {
      for (const member of context.activity.membersAdded ?? []) {
        if (member.id !== context.activity.recipient.id) {
          await this.welcomeMember(context, member);
        }
      }
      await next();
    });
  }

  private async welcomeMember(context: TurnContext, member: ChannelAccount): Promise<void> {
    const botUser = parseBotUserInfo(member);
    const userHash = hashId(botUser.userId);
    if (!botUser.isAzureAdUserId) {
      await context.sendActivity(MessageFactory.text(ANONYMOUS_USER_REPLY));
    }

    await this.conversationCache.populateMemCacheIfEmpty();
    let upn = this.conversationCache.getCachedUser(botUser.userId)?.userPrincipalName;
    if (!upn) {
      await this.conversationCache.addConversationReferenceToCache(
        context.activity,
        botUser,
        await this.lookupMemberUpn(context, member)
      );
      upn = this.conversationCache.getCachedUser(botUser.userId)?.userPrincipalName;
      if (!upn) {
        this.logger.error('Failed to add new user to conversation cache', { userHash });
        return;
      }
      // First conversation with this user, typically right after the app was installed.
      await context.sendActivity(MessageFactory.attachment(await this.introCard.getCardAttachment()));
    } else {
      this.logger.debug('User found in conversation cache', { userHash });
    }

    const { data, attachment } = await this.resumeHandler.loadDataAndResumeConversation(upn);
    if (data) {
      this.logger.info('Resuming conversation with pending card', { userHash, templateName: data.templateName });
      await context.sendActivity(MessageFactory.attachment(attachment));
      await this.dialog.rememberNudgeContext(context, data.templateName);
    } else {
      this.logger.info('No conversation to resume', { userHash });
    }
  }

  private async lookupMemberUpn(context: TurnContext, member: ChannelAccount): Promise<string | undefined> {
    try {
      return await this.resolveMemberUpn(context, member);
    } catch (error) {
      this.logger.warn('Could not resolve member UPN', { userHash: hashId(member.id), error: errorMessage(error) });
      return undefined;
    }
  }
}
