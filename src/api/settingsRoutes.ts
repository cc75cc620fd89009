import { Router } from 'express';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import { toSettingsDto } from '../models/dtos.js';
import type { SettingsStorageManager } from '../storage/settingsStorageManager.js';
import { asyncRoute, getSenderUpn, parseBody } from './middleware.js';

const UpdateSettingsSchema = z.object({
  followUpChatSystemPrompt: z.string().nullish()
});

export const createSettingsRoutes = (settings: SettingsStorageManager, logger: Logger): Router => {
  const router = Router();

  router.get(
    '/Get',
    asyncRoute(logger, 'Error getting settings', async (_req, res) => {
      res.json(toSettingsDto(await settings.getSettings(), settings.defaultFollowUpChatSystemPrompt));
    })
  );

  router.put(
    '/Update',
    asyncRoute(logger, 'Error updating settings', async (req, res) => {
      const request = parseBody(UpdateSettingsSchema, req.body, 'followUpChatSystemPrompt must be a string');
      // A blank prompt goes back to the default.
      const updated = await settings.updateSettings(request.followUpChatSystemPrompt ?? undefined, getSenderUpn(res));
      res.json(toSettingsDto(updated, settings.defaultFollowUpChatSystemPrompt));
    })
  );

  router.post(
    '/ResetToDefaults',
    asyncRoute(logger, 'Error resetting settings', async (_req, res) => {
      const updated = await settings.resetToDefaults(getSenderUpn(res));
      res.json(toSettingsDto(updated, settings.defaultFollowUpChatSystemPrompt));
    })
  );

  return router;
};
