import { AzureBlobStore, InMemoryBlobStore, type BlobStore } from './blobStore.js';
import { AzureEntityTable, InMemoryEntityTable, type EntityTable } from './entityTable.js';
import {
  TABLES,
  TEMPLATE_BLOB_CONTAINER,
  type AppSettingsEntity,
  type CachedUserAndConversationData,
  type MessageBatchEntity,
  type MessageLogEntity,
  type MessageTemplateEntity
} from './entities.js';

export interface Storage {
  templates: EntityTable<MessageTemplateEntity>;
  batches: EntityTable<MessageBatchEntity>;
  logs: EntityTable<MessageLogEntity>;
  conversations: EntityTable<CachedUserAndConversationData>;
  settings: EntityTable<AppSettingsEntity>;
  templateBlobs: BlobStore;
}

export const createInMemoryStorage = (): Storage => ({
  templates: new InMemoryEntityTable<MessageTemplateEntity>(),
  batches: new InMemoryEntityTable<MessageBatchEntity>(),
  logs: new InMemoryEntityTable<MessageLogEntity>(),
  conversations: new InMemoryEntityTable<CachedUserAndConversationData>(),
  settings: new InMemoryEntityTable<AppSettingsEntity>(),
  templateBlobs: new InMemoryBlobStore(TEMPLATE_BLOB_CONTAINER)
});

export const createStorage = (connectionString?: string): Storage => {
  if (!connectionString) {
    return createInMemoryStorage();
  }
  return {
    templates: new AzureEntityTable<MessageTemplateEntity>(
      connectionString,
      TABLES.templates.name,
      TABLES.templates.partitionKey
    ),
    batches: new AzureEntityTable<MessageBatchEntity>(connectionString, TABLES.batches.name, TABLES.batches.partitionKey),
    logs: new AzureEntityTable<MessageLogEntity>(connectionString, TABLES.logs.name, TABLES.logs.partitionKey),
    conversations: new AzureEntityTable<CachedUserAndConversationData>(
      connectionString,
      TABLES.conversations.name,
      TABLES.conversations.partitionKey
    ),
    settings: new AzureEntityTable<AppSettingsEntity>(connectionString, TABLES.settings.name, TABLES.settings.partitionKey),
    templateBlobs: new AzureBlobStore(connectionString, TEMPLATE_BLOB_CONTAINER)
  };
};
