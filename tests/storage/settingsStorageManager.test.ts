import { describe, expect, it } from 'vitest';
import { createInMemoryStorage } from '../../src/storage/createStorage.js';
import { SettingsStorageManager } from '../../src/storage/settingsStorageManager.js';
import { createTestLogger } from '../helpers/testLogger.js';

const createManager = () => {
  const storage = createInMemoryStorage();
  let tick = 0;
  const manager = new SettingsStorageManager({
    storage,
    defaultFollowUpChatSystemPrompt: 'Default prompt.',
    logger: createTestLogger(),
    now: () => new Date(Date.UTC(2024, 5, 1, 12, 0, tick++))
  });
  return { storage, manager };
};

describe('SettingsStorageManager', () => {
  it('returns empty settings and the default prompt before anything is stored', async () => {
    const { manager } = createManager();

    expect(await manager.getSettings()).toEqual({ rowKey: 'Settings' });
    expect(await manager.getEffectiveFollowUpChatSystemPrompt()).toBe('Default prompt.');
  });

  it('stores a trimmed custom prompt with who changed it', async () => {
    const { manager, storage } = createManager();

    const updated = await manager.updateSettings('  Answer in one sentence.  ', 'admin@contoso.test');

    expect(updated).toEqual({
      rowKey: 'Settings',
      followUpChatSystemPrompt: 'Answer in one sentence.',
      lastModifiedDate: '2024-06-01T12:00:00.000Z',
      lastModifiedByUpn: 'admin@contoso.test'
    });
    expect(await storage.settings.get('Settings')).toEqual(updated);
    expect(await manager.getEffectiveFollowUpChatSystemPrompt()).toBe('Answer in one sentence.');
  });

  it('treats a blank prompt as the default', async () => {
    const { manager } = createManager();
    await manager.updateSettings('Custom.', 'admin@contoso.test');

    const updated = await manager.updateSettings('   ', 'other@contoso.test');

    expect(updated.followUpChatSystemPrompt).toBeUndefined();
    expect(updated.lastModifiedByUpn).toBe('other@contoso.test');
    expect(await manager.getEffectiveFollowUpChatSystemPrompt()).toBe('Default prompt.');
  });

  it('resets to defaults', async () => {
    const { manager } = createManager();
    await manager.updateSettings('Custom.', 'admin@contoso.test');

    const reset = await manager.resetToDefaults('admin@contoso.test');

    expect(reset).toEqual({
      rowKey: 'Settings',
      followUpChatSystemPrompt: undefined,
      lastModifiedDate: '2024-06-01T12:00:01.000Z',
      lastModifiedByUpn: 'admin@contoso.test'
    });
    expect(await manager.getEffectiveFollowUpChatSystemPrompt()).toBe('Default prompt.');
  });
});
