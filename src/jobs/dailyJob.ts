import cron from 'node-cron';
import { ConfigError, errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { BatchQueue } from '../queue/batchQueue.js';
import type { StatisticsService } from '../services/statisticsService.js';

export interface DailyJobOptions {
  statistics: Pick<StatisticsService, 'getMessageStatusStats'>;
  queue: Pick<BatchQueue, 'getLength'>;
  logger: Logger;
}

export interface DailyJobHandle {
  stop(): void;
}

/** Logs delivery statistics and the outstanding queue length. Never throws. */
export const runDailyJob = async (options: DailyJobOptions): Promise<void> => {
  const { logger } = options;
  logger.info('Daily job started');
  try {
    const stats = await options.statistics.getMessageStatusStats();
    const queueLength = await options.queue.getLength();
    logger.info('Daily job summary', { ...stats, queueLength });
  } catch (error) {
    logger.error('Daily job failed', { error: errorMessage(error) });
  }
};

export const scheduleDailyJob = (expression: string, options: DailyJobOptions): DailyJobHandle => {
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid DAILY_JOB_CRON expression "${expression}".`);
  }
  const task = cron.schedule(expression, () => runDailyJob(options));
  options.logger.info('Daily job scheduled', { expression });
  return {
    stop: () => {
      task.stop();
    }
  };
};
