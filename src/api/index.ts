import express, { Router, type Express } from 'express';
import type { Logger } from '../logging/logger.js';
import type { DiagnosticsService } from '../services/diagnosticsService.js';
import type { MessageTemplateService } from '../services/messageTemplateService.js';
import type { StatisticsService } from '../services/statisticsService.js';
import type { SettingsStorageManager } from '../storage/settingsStorageManager.js';
import { createMessageTemplateRoutes } from './messageTemplateRoutes.js';
import { requireSender, type SenderAuthOptions } from './middleware.js';
import { createDiagnosticsRoutes, createStatisticsRoutes } from './reportingRoutes.js';
import { createSendNudgeRoutes } from './sendNudgeRoutes.js';
import { createSettingsRoutes } from './settingsRoutes.js';

export interface ApiDependencies {
  templateService: MessageTemplateService;
  statistics: StatisticsService;
  diagnostics: DiagnosticsService;
  settings: SettingsStorageManager;
  logger: Logger;
  auth: SenderAuthOptions;
}

export const createApiRouter = (deps: ApiDependencies): Router => {
  const router = Router();
  router.use(requireSender(deps.auth));
  router.use(express.json({ limit: '5mb' }));
  router.use('/MessageTemplate', createMessageTemplateRoutes(deps.templateService, deps.logger));
  router.use('/SendNudge', createSendNudgeRoutes(deps.templateService, deps.logger));
  router.use('/Statistics', createStatisticsRoutes(deps.statistics, deps.logger));
  router.use('/Diagnostics', createDiagnosticsRoutes(deps.diagnostics, deps.logger));
  router.use('/Settings', createSettingsRoutes(deps.settings, deps.logger));
  return router;
};

/**
 * Admin API under /api plus an unauthenticated health probe. The bot
 * endpoint is mounted separately by the host.
 */
export const createAdminApp = (deps: ApiDependencies, configure?: (app: Express) => void): Express => {
  const app = express();
  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });
  configure?.(app);
  app.use('/api', createApiRouter(deps));
  return app;
};
