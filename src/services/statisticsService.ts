import type { GraphUserService } from '../graph/userService.js';
import type { Logger } from '../logging/logger.js';
import type { MessageTemplateStorageManager } from '../storage/messageTemplateStorageManager.js';

export interface MessageStatusStats {
  sentCount: number;
  failedCount: number;
  pendingCount: number;
  totalCount: number;
}

export interface UserCoverageStats {
  usersMessaged: number;
  totalUsersInTenant: number;
  usersNotMessaged: number;
  coveragePercentage: number;
}

export interface StatisticsServiceOptions {
  storageManager: Pick<MessageTemplateStorageManager, 'getAllMessageLogs'>;
  userService: Pick<GraphUserService, 'getTotalUserCount'>;
  logger: Logger;
}

const SENT_STATUSES = new Set(['sent', 'success']);

export class StatisticsService {
  private readonly storageManager: StatisticsServiceOptions['storageManager'];
  private readonly userService: StatisticsServiceOptions['userService'];
  private readonly logger: Logger;

  constructor(options: StatisticsServiceOptions) {
    this.storageManager = options.storageManager;
    this.userService = options.userService;
    this.logger = options.logger;
  }

  async getMessageStatusStats(): Promise<MessageStatusStats> {
    const logs = await this.storageManager.getAllMessageLogs();
    const stats: MessageStatusStats = { sentCount: 0, failedCount: 0, pendingCount: 0, totalCount: logs.length };
    for (const log of logs) {
      const status = log.status.toLowerCase();
      if (SENT_STATUSES.has(status)) {
        stats.sentCount += 1;
      } else if (status === 'failed') {
        stats.failedCount += 1;
      } else if (status === 'pending') {
        stats.pendingCount += 1;
      }
    }
    this.logger.info('Message status stats', { ...stats });
    return stats;
  }

  async getUserCoverageStats(): Promise<UserCoverageStats> {
    const logs = await this.storageManager.getAllMessageLogs();
    const recipients = new Set(
      logs.flatMap((log) => (log.recipientUpn && log.recipientUpn.trim() ? [log.recipientUpn] : []))
    );
    const usersMessaged = recipients.size;
    const totalUsersInTenant = await this.userService.getTotalUserCount();
    const coveragePercentage =
      totalUsersInTenant > 0 ? Math.round((usersMessaged / totalUsersInTenant) * 100 * 100) / 100 : 0;

    this.logger.info('User coverage stats', { usersMessaged, totalUsersInTenant });
    return {
      usersMessaged,
      totalUsersInTenant,
      usersNotMessaged: totalUsersInTenant - usersMessaged,
      coveragePercentage
    };
  }
}
