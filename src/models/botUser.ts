import type { TurnContext } from 'botbuilder';
import type { ChannelAccount } from 'botframework-schema';

/**
 * A chat participant, identified by Azure AD object id when the channel
 * supplies one and by the channel-native id otherwise.
 */
export interface BotUser {
  userId: string;
  isAzureAdUserId: boolean;
}

export const parseBotUserInfo = (account: Pick<ChannelAccount, 'id' | 'aadObjectId'>): BotUser => {
  if (!account.aadObjectId) {
    return { userId: account.id, isAzureAdUserId: false };
  }
  return { userId: account.aadObjectId, isAzureAdUserId: true };
};

export const getBotUser = (context: TurnContext): BotUser => parseBotUserInfo(context.activity.from);
