import { CloudAdapter, type ConversationState, type TurnContext } from 'botbuilder';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';

export interface TurnErrorHandlerOptions {
  logger: Logger;
  devMode?: boolean;
  conversationState?: Pick<ConversationState, 'delete'>;
}

export type TurnErrorHandler = (context: TurnContext, error: Error) => Promise<void>;

export const createTurnErrorHandler = (options: TurnErrorHandlerOptions): TurnErrorHandler => {
  const { logger, devMode = false, conversationState } = options;

  return async (context, error) => {
    logger.error('Unhandled turn error', { error: error.message, activityType: context.activity.type });

    try {
      if (devMode) {
        await context.sendActivity(`Oops, something unexpected happened - ${error.message}. Here's some debug info:`);
        await context.sendActivity(error.stack ?? error.message);
      } else {
        await context.sendActivity('Oops, something unexpected happened and I hit a problem.');
        await context.sendActivity('Please check the error logged and try again.');
      }
    } catch (sendError) {
      logger.error('Failed to send turn error message', { error: errorMessage(sendError) });
    }

    if (conversationState) {
      try {
        // Clears dialog state so the next turn starts fresh.
        await conversationState.delete(context);
      } catch (deleteError) {
        logger.error('Failed to delete conversation state', { error: errorMessage(deleteError) });
      }
    }

    try {
      await context.sendTraceActivity(
        'OnTurnError Trace',
        error.message,
        'https://www.botframework.com/schemas/error',
        'TurnError'
      );
    } catch (traceError) {
      logger.error('Failed to send turn error trace', { error: errorMessage(traceError) });
    }
  };
};

export class AdapterWithErrorHandler extends CloudAdapter {
  constructor(auth: ConstructorParameters<typeof CloudAdapter>[0], options: TurnErrorHandlerOptions) {
    super(auth);
    this.onTurnError = createTurnErrorHandler(options);
  }
}
