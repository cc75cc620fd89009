import { hashId, type Logger } from '../logging/logger.js';
import type { Storage } from './createStorage.js';
import { SETTINGS_ROW_KEY, type AppSettingsEntity } from './entities.js';

export interface SettingsStorageManagerOptions {
  storage: Pick<Storage, 'settings'>;
  /** Prompt used while no custom prompt is stored. */
  defaultFollowUpChatSystemPrompt: string;
  logger: Logger;
  now?: () => Date;
}

/**
 * The runtime settings row. A blank or missing custom prompt means the
 * default prompt applies.
 */
export class SettingsStorageManager {
  readonly defaultFollowUpChatSystemPrompt: string;
  private readonly storage: SettingsStorageManagerOptions['storage'];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SettingsStorageManagerOptions) {
    this.storage = options.storage;
    this.defaultFollowUpChatSystemPrompt = options.defaultFollowUpChatSystemPrompt;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async getSettings(): Promise<AppSettingsEntity> {
    return (await this.storage.settings.get(SETTINGS_ROW_KEY)) ?? { rowKey: SETTINGS_ROW_KEY };
  }

  async updateSettings(followUpChatSystemPrompt: string | undefined, modifiedByUpn: string): Promise<AppSettingsEntity> {
    const prompt = followUpChatSystemPrompt?.trim();
    const entity: AppSettingsEntity = {
      ...(await this.getSettings()),
      followUpChatSystemPrompt: prompt ? prompt : undefined,
      lastModifiedDate: this.now().toISOString(),
      lastModifiedByUpn: modifiedByUpn
    };
    await this.storage.settings.upsert(entity);
    this.logger.info('Updated app settings', {
      modifiedBy: hashId(modifiedByUpn),
      customPrompt: entity.followUpChatSystemPrompt !== undefined
    });
    return entity;
  }

  async resetToDefaults(modifiedByUpn: string): Promise<AppSettingsEntity> {
    return this.updateSettings(undefined, modifiedByUpn);
  }

  async getEffectiveFollowUpChatSystemPrompt(): Promise<string> {
    const { followUpChatSystemPrompt } = await this.getSettings();
    return followUpChatSystemPrompt?.trim() ? followUpChatSystemPrompt : this.defaultFollowUpChatSystemPrompt;
  }
}
