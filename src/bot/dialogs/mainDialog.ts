import crypto from 'node:crypto';
import type { StatePropertyAccessor, TurnContext, UserState } from 'botbuilder';
import { WaterfallDialog, type DialogTurnResult, type WaterfallStepContext } from 'botbuilder-dialogs';
import { errorMessage } from '../../errors/index.js';
import type { FollowUpChatService } from '../../llm/followUpChatService.js';
import type { ChatTurn } from '../../llm/types.js';
import { hashId, type Logger } from '../../logging/logger.js';
import { getBotUser } from '../../models/botUser.js';
import type { BotConversationCache } from '../conversationCache.js';
import { CommonBotDialog } from './commonBotDialog.js';

export const CACHE_NAME_CONVO_STATE = 'CACHE_NAME_CONVO_STATE';
export const MAX_CONVERSATION_HISTORY = 20;
const WATERFALL_DIALOG = 'WaterfallDialog';

export interface MainDialogConvoState {
  randomStateVal: string;
  lastNudgeContext?: string;
  conversationHistory?: ChatTurn[];
}

export interface MainDialogOptions {
  botName: string;
  conversationCache: Pick<BotConversationCache, 'populateMemCacheIfEmpty' | 'getCachedUser'>;
  userState: UserState;
  logger: Logger;
  followUpChat?: Pick<FollowUpChatService, 'handleFollowUpChat'>;
}

export const defaultReply = (botName: string): string =>
  `Hi! I'm the ${botName} bot. I deliver important messages and tips to help you stay productive. ` +
  'If you have questions about a message I sent, feel free to reply!';

/**
 * Entry point for every chat with the bot: answers follow-up questions about
 * the last nudge when AI chat is configured, and introduces the bot otherwise.
 */
export class MainDialog extends CommonBotDialog {
  private readonly botName: string;
  private readonly convoState: StatePropertyAccessor<MainDialogConvoState>;
  private readonly logger: Logger;
  private readonly followUpChat?: MainDialogOptions['followUpChat'];

  constructor(options: MainDialogOptions) {
    super('MainDialog', options.conversationCache);
    this.botName = options.botName;
    this.convoState = options.userState.createProperty<MainDialogConvoState>(CACHE_NAME_CONVO_STATE);
    this.logger = options.logger;
    this.followUpChat = options.followUpChat;

    this.addDialog(new WaterfallDialog(WATERFALL_DIALOG, [async (step) => this.newChat(step)]));
    this.initialDialogId = WATERFALL_DIALOG;
  }

  async getConvoState(context: TurnContext): Promise<MainDialogConvoState> {
    return this.convoState.get(context, { randomStateVal: crypto.randomUUID() });
  }

  /** Records which nudge the user was last sent so follow-up questions have context. */
  async rememberNudgeContext(context: TurnContext, nudgeContext: string): Promise<void> {
    const state = await this.getConvoState(context);
    state.lastNudgeContext = nudgeContext;
    state.conversationHistory = [];
    await this.convoState.set(context, state);
  }

  private async newChat(step: WaterfallStepContext): Promise<DialogTurnResult> {
    const state = await this.getConvoState(step.context);
    const text = step.context.activity.text?.trim() ?? '';

    if (this.followUpChat && text) {
      const botUser = getBotUser(step.context);
      try {
        const cachedUser = await this.getCachedUser(botUser);
        const reply = await this.followUpChat.handleFollowUpChat(
          cachedUser?.userPrincipalName ?? botUser.userId,
          text,
          state.lastNudgeContext,
          state.conversationHistory
        );
        const history: ChatTurn[] = [
          ...(state.conversationHistory ?? []),
          { role: 'user', content: text },
          { role: 'assistant', content: reply.response }
        ];
        state.conversationHistory = reply.shouldEndConversation ? [] : history.slice(-MAX_CONVERSATION_HISTORY);
        await this.convoState.set(step.context, state);
        await this.sendMsg(step.context, reply.response);
        return step.endDialog();
      } catch (error) {
        this.logger.error('Follow-up chat failed; sending default reply', {
          userHash: hashId(botUser.userId),
          error: errorMessage(error)
        });
      }
    }

    await this.sendMsg(step.context, defaultReply(this.botName));
    return step.endDialog();
  }
}
