import type { Activity } from 'botframework-schema';
import { hashId, type Logger } from '../logging/logger.js';
import type { BotUser } from '../models/botUser.js';
import type { CachedUserAndConversationData } from '../storage/entities.js';
import type { EntityTable } from '../storage/entityTable.js';

export interface BotConversationCacheOptions {
  table: EntityTable<CachedUserAndConversationData>;
  logger: Logger;
}

/**
 * Conversation references for users the bot can message proactively, keyed
 * by user id. Backed by a table and mirrored in memory.
 */
export class BotConversationCache {
  private readonly table: EntityTable<CachedUserAndConversationData>;
  private readonly logger: Logger;
  private readonly users = new Map<string, CachedUserAndConversationData>();
  private loading?: Promise<void>;

  constructor(options: BotConversationCacheOptions) {
    this.table = options.table;
    this.logger = options.logger;
  }

  populateMemCacheIfEmpty(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  getCachedUser(userId: string): CachedUserAndConversationData | undefined {
    return this.users.get(userId);
  }

  containsUserId(userId: string): boolean {
    return this.users.has(userId);
  }

  async addConversationReferenceToCache(
    activity: Pick<Activity, 'serviceUrl' | 'conversation'>,
    botUser: BotUser,
    userPrincipalName?: string
  ): Promise<CachedUserAndConversationData> {
    const entry: CachedUserAndConversationData = {
      rowKey: botUser.userId,
      serviceUrl: activity.serviceUrl,
      conversationId: activity.conversation.id,
      userPrincipalName
    };
    await this.table.upsert(entry);
    this.users.set(entry.rowKey, entry);
    this.logger.info('Cached conversation reference', { userHash: hashId(botUser.userId) });
    return entry;
  }

  async removeFromCache(userId: string): Promise<void> {
    await this.table.delete(userId);
    this.users.delete(userId);
  }

  private async load(): Promise<void> {
    const rows = await this.table.list();
    for (const row of rows) {
      this.users.set(row.rowKey, row);
    }
    this.logger.info('Loaded conversation cache', { count: rows.length });
  }
}
