import { describe, expect, it } from 'vitest';
import { runDailyJob, scheduleDailyJob } from '../../src/jobs/dailyJob.js';
import { createTestLogger } from '../helpers/testLogger.js';

const stats = { sentCount: 3, failedCount: 1, pendingCount: 2, totalCount: 6 };

describe('daily job', () => {
  it('logs delivery statistics with the queue length', async () => {
    const logger = createTestLogger();

    await runDailyJob({
      statistics: { getMessageStatusStats: async () => stats },
      queue: { getLength: async () => 4 },
      logger
    });

    expect(logger.info).toHaveBeenCalledWith('Daily job summary', { ...stats, queueLength: 4 });
  });

  it('logs failures instead of throwing', async () => {
    const logger = createTestLogger();

    await runDailyJob({
      statistics: {
        getMessageStatusStats: async () => {
          throw new Error('table offline');
        }
      },
      queue: { getLength: async () => 0 },
      logger
    });

    expect(logger.error).toHaveBeenCalledWith('Daily job failed', { error: 'table offline' });
  });

  it('rejects invalid cron expressions', () => {
    expect(() =>
      scheduleDailyJob('every day', {
        statistics: { getMessageStatusStats: async () => stats },
        queue: { getLength: async () => 0 },
        logger: createTestLogger()
      })
    ).toThrow('Invalid DAILY_JOB_CRON expression "every day".');
  });

  it('schedules and stops a valid expression', () => {
    const logger = createTestLogger();
    const handle = scheduleDailyJob('0 0 * * *', {
      statistics: { getMessageStatusStats: async () => stats },
      queue: { getLength: async () => 0 },
      logger
    });

    expect(logger.info).toHaveBeenCalledWith('Daily job scheduled', { expression: '0 0 * * *' });
    handle.stop();
  });
});
