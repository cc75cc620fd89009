import { Router } from 'express';
import type { Logger } from '../logging/logger.js';
import type { DiagnosticsService } from '../services/diagnosticsService.js';
import type { StatisticsService } from '../services/statisticsService.js';
import { asyncRoute } from './middleware.js';

export const createStatisticsRoutes = (statistics: StatisticsService, logger: Logger): Router => {
  const router = Router();

  router.get(
    '/GetMessageStatusStats',
    asyncRoute(logger, 'Error retrieving message status statistics', async (_req, res) => {
      res.json(await statistics.getMessageStatusStats());
    })
  );

  router.get(
    '/GetUserCoverageStats',
    asyncRoute(logger, 'Error retrieving user coverage statistics', async (_req, res) => {
      res.json(await statistics.getUserCoverageStats());
    })
  );

  return router;
};

export const createDiagnosticsRoutes = (diagnostics: DiagnosticsService, logger: Logger): Router => {
  const router = Router();

  router.get(
    '/TestGraphConnection',
    asyncRoute(logger, 'Error testing Graph connection', async (_req, res) => {
      const result = await diagnostics.testGraphConnection();
      res.status(result.success ? 200 : 500).json(result);
    })
  );

  return router;
};
