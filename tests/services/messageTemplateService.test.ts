import { describe, expect, it } from 'vitest';
import { createStorageFixture } from '../helpers/storageFixture.js';

describe('MessageTemplateService', () => {
  it('returns DTOs keyed by id', async () => {
    const { templateService } = createStorageFixture();

    const created = await templateService.createTemplate('Tips', '{}', 'admin@contoso.test');

    expect(created).toEqual({
      id: 'id-1',
      templateName: 'Tips',
      blobUrl: 'memory://message-templates/id-1.json',
      createdByUpn: 'admin@contoso.test',
      createdDate: '2024-05-01T09:00:00.000Z'
    });
    expect(await templateService.getTemplateById('id-1')).toEqual(created);
    expect(await templateService.getTemplateById('missing')).toBeUndefined();
  });

  it('creates pending logs and queues one message per recipient', async () => {
    const { templateService, queue } = createStorageFixture();
    const batch = await templateService.createBatch('May tips', 'template-9', 'admin@contoso.test');

    const logs = await templateService.logBatchMessages(batch.id, ['a@contoso.test', 'b@contoso.test']);

    expect(logs.map((log) => [log.id, log.status])).toEqual([
      ['id-2', 'Pending'],
      ['id-3', 'Pending']
    ]);
    expect(await queue.getLength()).toBe(2);
    expect(await queue.dequeue()).toEqual({
      invalid: false,
      messageId: '1',
      receipt: '1',
      message: { batchId: 'id-1', messageLogId: 'id-2', recipientUpn: 'a@contoso.test', templateId: 'template-9' }
    });
  });

  it('refuses to queue messages for an unknown batch', async () => {
    const { templateService, queue } = createStorageFixture();

    await expect(templateService.logBatchMessages('missing', ['a@contoso.test'])).rejects.toThrow(
      'Batch missing not found'
    );
    expect(await queue.getLength()).toBe(0);
  });

  it('reports logs by batch and by template', async () => {
    const { templateService } = createStorageFixture();
    const batch = await templateService.createBatch('May tips', 'template-9', 'admin@contoso.test');
    await templateService.logBatchMessages(batch.id, ['a@contoso.test']);
    await templateService.logMessageSend('other', 'b@contoso.test', 'Sent');

    expect((await templateService.getMessageLogsByBatch(batch.id)).map((log) => log.recipientUpn)).toEqual([
      'a@contoso.test'
    ]);
    expect((await templateService.getMessageLogsByTemplate('template-9')).map((log) => log.id)).toEqual(['id-2']);
    expect(await templateService.getAllLogs()).toHaveLength(2);
  });

  it('updates templates and log status', async () => {
    const { templateService } = createStorageFixture();
    await templateService.createTemplate('Tips', '{}', 'admin@contoso.test');
    const log = await templateService.logMessageSend('batch-1', 'a@contoso.test', 'Pending');

    const updated = await templateService.updateTemplate('id-1', 'New tips', '{"v":1}');
    await templateService.updateMessageLogStatus(log.id, 'Failed', 'boom');

    expect(updated.templateName).toBe('New tips');
    expect(await templateService.getTemplateJson('id-1')).toBe('{"v":1}');
    const [stored] = await templateService.getAllLogs();
    expect([stored.status, stored.lastError]).toEqual(['Failed', 'boom']);
  });

  it('deletes templates and batches', async () => {
    const { templateService } = createStorageFixture();
    await templateService.createTemplate('Tips', '{}', 'admin@contoso.test');
    const batch = await templateService.createBatch('May tips', 'id-1', 'admin@contoso.test');

    await templateService.deleteBatch(batch.id);
    await templateService.deleteTemplate('id-1');

    expect(await templateService.getAllBatches()).toEqual([]);
    expect(await templateService.getAllTemplates()).toEqual([]);
  });
});
