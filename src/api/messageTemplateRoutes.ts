import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { MessageTemplateService } from '../services/messageTemplateService.js';
import { asyncRoute, getSenderUpn, parseBody } from './middleware.js';

const TemplateRequestSchema = z.object({
  templateName: z.string().trim().min(1),
  jsonPayload: z.string().trim().min(1)
});

const TEMPLATE_REQUIRED = 'templateName and jsonPayload are required';

export const createMessageTemplateRoutes = (templateService: MessageTemplateService, logger: Logger): Router => {
  const router = Router();

  router.get(
    '/GetAll',
    asyncRoute(logger, 'Error getting templates', async (_req, res) => {
      res.json(await templateService.getAllTemplates());
    })
  );

  router.get(
    '/Get/:id',
    asyncRoute(logger, 'Error getting template', async (req, res) => {
      const template = await templateService.getTemplateById(req.params.id);
      if (!template) {
        throw new NotFoundError(`Template ${req.params.id} not found`);
      }
      res.json(template);
    })
  );

  router.get(
    '/GetJson/:id',
    asyncRoute(logger, 'Error getting template JSON', async (req, res) => {
      res.json({ json: await templateService.getTemplateJson(req.params.id) });
    })
  );

  router.post(
    '/Create',
    asyncRoute(logger, 'Error creating template', async (req, res) => {
      const body = parseBody(TemplateRequestSchema, req.body, TEMPLATE_REQUIRED);
      res.json(await templateService.createTemplate(body.templateName, body.jsonPayload, getSenderUpn(res)));
    })
  );

  router.put(
    '/Update/:id',
    asyncRoute(logger, 'Error updating template', async (req, res) => {
      const body = parseBody(TemplateRequestSchema, req.body, TEMPLATE_REQUIRED);
      res.json(await templateService.updateTemplate(req.params.id, body.templateName, body.jsonPayload));
    })
  );

  router.delete(
    '/Delete/:id',
    asyncRoute(logger, 'Error deleting template', async (req, res) => {
      await templateService.deleteTemplate(req.params.id);
      res.status(200).end();
    })
  );

  router.get(
    '/GetLogs',
    asyncRoute(logger, 'Error getting message logs', async (_req, res) => {
      res.json(await templateService.getAllLogs());
    })
  );

  router.get(
    '/GetLogsByTemplate/:templateId',
    asyncRoute(logger, 'Error getting message logs', async (req, res) => {
      res.json(await templateService.getMessageLogsByTemplate(req.params.templateId));
    })
  );

  router.get(
    '/GetBatches',
    asyncRoute(logger, 'Error getting batches', async (_req, res) => {
      res.json(await templateService.getAllBatches());
    })
  );

  router.get(
    '/GetBatch/:id',
    asyncRoute(logger, 'Error getting batch', async (req, res) => {
      const batch = await templateService.getBatchById(req.params.id);
      if (!batch) {
        throw new NotFoundError(`Batch ${req.params.id} not found`);
      }
      res.json(batch);
    })
  );

  router.get(
    '/GetLogsByBatch/:batchId',
    asyncRoute(logger, 'Error getting message logs', async (req, res) => {
      res.json(await templateService.getMessageLogsByBatch(req.params.batchId));
    })
  );

  router.delete(
    '/DeleteBatch/:id',
    asyncRoute(logger, 'Error deleting batch', async (req, res) => {
      await templateService.deleteBatch(req.params.id);
      res.status(200).end();
    })
  );

  return router;
};
