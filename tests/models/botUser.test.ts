import { describe, expect, it } from 'vitest';
import { parseBotUserInfo } from '../../src/models/botUser.js';

describe('parseBotUserInfo', () => {
  it('prefers the Azure AD object id', () => {
    expect(parseBotUserInfo({ id: '29:channel-id', aadObjectId: 'aad-1' })).toEqual({
      userId: 'aad-1',
      isAzureAdUserId: true
    });
  });

  it('falls back to the channel id', () => {
    expect(parseBotUserInfo({ id: '29:channel-id' })).toEqual({ userId: '29:channel-id', isAzureAdUserId: false });
  });
});
