import {
  TeamsActivityHandler,
  type ConversationState,
  type StatePropertyAccessor,
  type TurnContext,
  type UserState
} from 'botbuilder';
import type { DialogState } from 'botbuilder-dialogs';
import type { SigninStateVerificationQuery } from 'botframework-schema';
import type { Logger } from '../logging/logger.js';
import type { CommonBotDialog } from './dialogs/commonBotDialog.js';

export interface DialogueBotOptions<D extends CommonBotDialog> {
  conversationState: ConversationState;
  userState: UserState;
  dialog: D;
  logger: Logger;
}

/** Routes messages into a dialog and persists bot state after every turn. */
export class DialogueBot<D extends CommonBotDialog> extends TeamsActivityHandler {
  protected readonly conversationState: ConversationState;
  protected readonly userState: UserState;
  protected readonly dialog: D;
  protected readonly logger: Logger;
  private readonly dialogState: StatePropertyAccessor<DialogState>;

  constructor(options: DialogueBotOptions<D>) {
    super();
    this.conversationState = options.conversationState;
    this.userState = options.userState;
    this.dialog = options.dialog;
    this.logger = options.logger;
    this.dialogState = this.conversationState.createProperty<DialogState>('DialogState');

    this.onMessage(async (context, next) => {
      this.logger.debug('Running dialog for message activity');
      await this.dialog.run(context, this.dialogState);
      await next();
    });
  }

  async run(context: TurnContext): Promise<void> {
    await super.run(context);
    await this.conversationState.saveChanges(context, false);
    await this.userState.saveChanges(context, false);
  }

  protected async handleTeamsSigninVerifyState(
    context: TurnContext,
    _query: SigninStateVerificationQuery
  ): Promise<void> {
    this.logger.info('Running dialog for signin/verifyState invoke');
    await this.dialog.run(context, this.dialogState);
  }
}
