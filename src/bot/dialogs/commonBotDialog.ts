import { InputHints, MessageFactory, type StatePropertyAccessor, type TurnContext } from 'botbuilder';
import {
  ComponentDialog,
  DialogSet,
  DialogTurnStatus,
  TextPrompt,
  type DialogState,
  type DialogTurnResult,
  type WaterfallStepContext
} from 'botbuilder-dialogs';
import type { Attachment } from 'botframework-schema';
import type { BotUser } from '../../models/botUser.js';
import type { CachedUserAndConversationData } from '../../storage/entities.js';
import type { BaseAdaptiveCard } from '../cards/adaptiveCard.js';
import type { BotConversationCache } from '../conversationCache.js';

export const TEXT_PROMPT = 'TextPrompt';

export abstract class CommonBotDialog extends ComponentDialog {
  protected readonly conversationCache: Pick<BotConversationCache, 'populateMemCacheIfEmpty' | 'getCachedUser'>;

  constructor(dialogId: string, conversationCache: CommonBotDialog['conversationCache']) {
    super(dialogId);
    this.conversationCache = conversationCache;
    this.addDialog(new TextPrompt(TEXT_PROMPT));
  }

  /** Runs the dialog for a turn, starting it when nothing is active. */
  async run(context: TurnContext, accessor: StatePropertyAccessor<DialogState>): Promise<void> {
    const dialogSet = new DialogSet(accessor);
    dialogSet.add(this);
    const dialogContext = await dialogSet.createContext(context);
    const result = await dialogContext.continueDialog();
    if (result.status === DialogTurnStatus.empty) {
      await dialogContext.beginDialog(this.id);
    }
  }

  protected async getCachedUser(botUser: BotUser): Promise<CachedUserAndConversationData | undefined> {
    await this.conversationCache.populateMemCacheIfEmpty();
    return this.conversationCache.getCachedUser(botUser.userId);
  }

  /** Shows the card and waits for the user's next message as the step result. */
  protected async promptWithCard(
    step: WaterfallStepContext,
    card: BaseAdaptiveCard | Attachment
  ): Promise<DialogTurnResult> {
    const attachment = 'getCardAttachment' in card ? await card.getCardAttachment() : card;
    return step.prompt(TEXT_PROMPT, { prompt: MessageFactory.attachment(attachment) });
  }

  protected async sendMsg(context: TurnContext, text: string): Promise<void> {
    await context.sendActivity(MessageFactory.text(text, text, InputHints.ExpectingInput));
  }
}
