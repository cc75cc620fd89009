import express, { Router } from 'express';
import { z } from 'zod';
import { InvalidRequestError, NotFoundError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { MessageTemplateService } from '../services/messageTemplateService.js';
import { asyncRoute, getSenderUpn, parseBody } from './middleware.js';

const CreateBatchAndSendSchema = z.object({
  batchName: z.string().trim().min(1, 'batchName is required'),
  templateId: z.string().trim().min(1, 'templateId is required'),
  recipientUpns: z.array(z.string()).min(1, 'At least one recipient UPN is required')
});

const UpdateLogStatusSchema = z.object({
  status: z.string().trim().min(1),
  lastError: z.string().optional()
});

/** First comma separated column of every non-blank line. */
export const parseRecipientFile = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.split(',')[0]?.trim() ?? '')
    .filter((upn) => upn.length > 0);

export const createSendNudgeRoutes = (templateService: MessageTemplateService, logger: Logger): Router => {
  const router = Router();

  router.post(
    '/ParseFile',
    express.text({ type: ['text/csv', 'text/plain'], limit: '5mb' }),
    asyncRoute(logger, 'Error parsing file', async (req, res) => {
      const content: unknown = req.body;
      if (typeof content !== 'string' || !content.trim()) {
        throw new InvalidRequestError('No file uploaded');
      }
      const upns = parseRecipientFile(content);
      logger.info('Parsed recipient file', { count: upns.length });
      res.json({ upns });
    })
  );

  router.post(
    '/CreateBatchAndSend',
    asyncRoute(logger, 'Error creating batch and sending messages', async (req, res) => {
      const parsed = CreateBatchAndSendSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new InvalidRequestError(parsed.error.issues[0]?.message ?? 'Invalid request');
      }
      const request = parsed.data;
      const template = await templateService.getTemplateById(request.templateId);
      if (!template) {
        throw new NotFoundError(`Template ${request.templateId} not found`);
      }

      const batch = await templateService.createBatch(request.batchName, request.templateId, getSenderUpn(res));
      const logs = await templateService.logBatchMessages(batch.id, request.recipientUpns);
      logger.info('Created batch and queued messages', { batchId: batch.id, count: logs.length });
      res.json({ batch, messageCount: logs.length, logs });
    })
  );

  router.put(
    '/UpdateLogStatus/:logId',
    asyncRoute(logger, 'Error updating message log status', async (req, res) => {
      const body = parseBody(UpdateLogStatusSchema, req.body, 'status is required');
      await templateService.updateMessageLogStatus(req.params.logId, body.status, body.lastError);
      res.status(200).end();
    })
  );

  return router;
};
