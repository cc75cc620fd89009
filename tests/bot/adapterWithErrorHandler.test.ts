import { TestAdapter, TurnContext } from 'botbuilder';
import { describe, expect, it, vi } from 'vitest';
import { createTurnErrorHandler } from '../../src/bot/adapterWithErrorHandler.js';
import { createTestLogger } from '../helpers/testLogger.js';

const createContext = () => {
  const adapter = new TestAdapter();
  const context = new TurnContext(adapter, {
    type: 'message',
    text: 'hi',
    channelId: 'test',
    conversation: { id: 'convo-1', name: '', isGroup: false, conversationType: 'personal' },
    from: { id: 'user-1', name: 'User' },
    recipient: { id: 'bot', name: 'Bot' }
  });
  const sent: string[] = [];
  const traces: string[] = [];
  context.onSendActivities(async (_ctx, activities) => {
    for (const activity of activities) {
      if (activity.type === 'trace') {
        traces.push(String(activity.label));
      } else {
        sent.push(String(activity.text));
      }
    }
    return activities.map((_activity, index) => ({ id: String(index) }));
  });
  return { context, sent, traces };
};

describe('createTurnErrorHandler', () => {
  it('apologises, clears conversation state and emits a trace', async () => {
    const { context, sent, traces } = createContext();
    const deleteState = vi.fn(async () => undefined);
    const logger = createTestLogger();
    const handler = createTurnErrorHandler({ logger, conversationState: { delete: deleteState } });

    await handler(context, new Error('kaboom'));

    expect(sent).toEqual([
      'Oops, something unexpected happened and I hit a problem.',
      'Please check the error logged and try again.'
    ]);
    expect(deleteState).toHaveBeenCalledWith(context);
    expect(traces).toEqual(['TurnError']);
    expect(logger.error).toHaveBeenCalledWith('Unhandled turn error', { error: 'kaboom', activityType: 'message' });
  });

  it('includes debug details in dev mode', async () => {
    const { context, sent } = createContext();
    const error = new Error('kaboom');
    const handler = createTurnErrorHandler({ logger: createTestLogger(), devMode: true });

    await handler(context, error);

    expect(sent).toEqual([
      "Oops, something unexpected happened - kaboom. Here's some debug info:",
      String(error.stack)
    ]);
  });

  it('keeps going when clearing state fails', async () => {
    const { context, traces } = createContext();
    const logger = createTestLogger();
    const handler = createTurnErrorHandler({
      logger,
      conversationState: {
        delete: async () => {
          throw new Error('storage offline');
        }
      }
    });

    await handler(context, new Error('kaboom'));

    expect(logger.error).toHaveBeenCalledWith('Failed to delete conversation state', { error: 'storage offline' });
    expect(traces).toEqual(['TurnError']);
  });
});
