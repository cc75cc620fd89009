import { describe, expect, it, vi } from 'vitest';
import { BotConversationCache } from '../../src/bot/conversationCache.js';
import type { CachedUserAndConversationData } from '../../src/storage/entities.js';
import { InMemoryEntityTable } from '../../src/storage/entityTable.js';
import { createTestLogger } from '../helpers/testLogger.js';

const activity = {
  serviceUrl: 'https://smba.trafficmanager.net/emea/',
  conversation: { id: 'a:conversation-1', isGroup: false, conversationType: 'personal', name: '' }
};

describe('BotConversationCache', () => {
  it('loads stored references once', async () => {
    const table = new InMemoryEntityTable<CachedUserAndConversationData>();
    await table.create({ rowKey: 'user-1', serviceUrl: 'https://service', conversationId: 'c1', userPrincipalName: 'a@contoso.test' });
    const listSpy = vi.spyOn(table, 'list');
    const cache = new BotConversationCache({ table, logger: createTestLogger() });

    await Promise.all([cache.populateMemCacheIfEmpty(), cache.populateMemCacheIfEmpty()]);
    await cache.populateMemCacheIfEmpty();

    expect(listSpy).toHaveBeenCalledTimes(1);
    expect(cache.containsUserId('user-1')).toBe(true);
    expect(cache.getCachedUser('user-1')?.userPrincipalName).toBe('a@contoso.test');
  });

  it('retries loading after a failure', async () => {
    const table = new InMemoryEntityTable<CachedUserAndConversationData>();
    vi.spyOn(table, 'list').mockRejectedValueOnce(new Error('storage down'));
    const cache = new BotConversationCache({ table, logger: createTestLogger() });

    await expect(cache.populateMemCacheIfEmpty()).rejects.toThrow('storage down');
    await expect(cache.populateMemCacheIfEmpty()).resolves.toBeUndefined();
  });

  it('stores new conversation references in the table and in memory', async () => {
    const table = new InMemoryEntityTable<CachedUserAndConversationData>();
    const cache = new BotConversationCache({ table, logger: createTestLogger() });

    const entry = await cache.addConversationReferenceToCache(
      activity,
      { userId: 'user-2', isAzureAdUserId: true },
      'b@contoso.test'
    );

    expect(entry).toEqual({
      rowKey: 'user-2',
      serviceUrl: 'https://smba.trafficmanager.net/emea/',
      conversationId: 'a:conversation-1',
      userPrincipalName: 'b@contoso.test'
    });
    expect(await table.get('user-2')).toEqual(entry);
    expect(cache.getCachedUser('user-2')).toEqual(entry);

    await cache.removeFromCache('user-2');
    expect(cache.containsUserId('user-2')).toBe(false);
    expect(await table.get('user-2')).toBeUndefined();
  });
});
