import { describe, expect, it } from 'vitest';
import { NotFoundError } from '../../src/errors/index.js';
import { InMemoryBlobStore } from '../../src/storage/blobStore.js';
import type { MessageLogEntity } from '../../src/storage/entities.js';
import { InMemoryEntityTable, buildODataFilter } from '../../src/storage/entityTable.js';

const log = (rowKey: string, overrides: Partial<MessageLogEntity> = {}): MessageLogEntity => ({
  rowKey,
  messageBatchId: 'batch-1',
  sentDate: '2024-05-01T00:00:00.000Z',
  recipientUpn: 'a@contoso.test',
  status: 'Pending',
  ...overrides
});

describe('InMemoryEntityTable', () => {
  it('filters rows on every given field', async () => {
    const table = new InMemoryEntityTable<MessageLogEntity>();
    await table.create(log('1'));
    await table.create(log('2', { status: 'Success' }));
    await table.create(log('3', { messageBatchId: 'batch-2' }));

    const rows = await table.list({ messageBatchId: 'batch-1', status: 'Pending' });

    expect(rows.map((row) => row.rowKey)).toEqual(['1']);
    expect(await table.list()).toHaveLength(3);
  });

  it('returns copies so callers cannot mutate stored rows', async () => {
    const table = new InMemoryEntityTable<MessageLogEntity>();
    await table.create(log('1'));

    const row = await table.get('1');
    if (row) {
      row.status = 'Failed';
    }

    expect((await table.get('1'))?.status).toBe('Pending');
  });

  it('rejects duplicate creates and replaces of missing rows', async () => {
    const table = new InMemoryEntityTable<MessageLogEntity>();
    await table.create(log('1'));

    await expect(table.create(log('1'))).rejects.toThrow('Entity 1 already exists');
    await expect(table.replace(log('2'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('upserts and deletes rows', async () => {
    const table = new InMemoryEntityTable<MessageLogEntity>();
    await table.upsert(log('1'));
    await table.upsert(log('1', { status: 'Sent' }));
    expect((await table.get('1'))?.status).toBe('Sent');

    await table.delete('1');
    await table.delete('missing');
    expect(await table.get('1')).toBeUndefined();
  });
});

describe('buildODataFilter', () => {
  it('scopes to the partition and escapes quotes', () => {
    expect(buildODataFilter('MessageLogs', { recipientUpn: "o'neil@contoso.test", status: 'Pending' })).toBe(
      "PartitionKey eq 'MessageLogs' and recipientUpn eq 'o''neil@contoso.test' and status eq 'Pending'"
    );
    expect(buildODataFilter('Users')).toBe("PartitionKey eq 'Users'");
  });
});

describe('InMemoryBlobStore', () => {
  it('stores, overwrites and deletes blobs', async () => {
    const store = new InMemoryBlobStore('message-templates');

    expect(await store.upload('t1.json', '{}')).toBe('memory://message-templates/t1.json');
    await store.upload('t1.json', '{"a":1}');
    expect(await store.download('t1.json')).toBe('{"a":1}');

    await store.deleteIfExists('t1.json');
    await expect(store.download('t1.json')).rejects.toThrow('Blob t1.json not found');
  });
});
