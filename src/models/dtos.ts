import type {
  AppSettingsEntity,
  MessageBatchEntity,
  MessageLogEntity,
  MessageTemplateEntity
} from '../storage/entities.js';

export interface MessageTemplateDto {
  id: string;
  templateName: string;
  blobUrl: string;
  createdByUpn: string;
  createdDate: string;
}

export interface MessageBatchDto {
  id: string;
  batchName: string;
  templateId: string;
  senderUpn: string;
  createdDate: string;
}

export interface MessageLogDto {
  id: string;
  messageBatchId: string;
  sentDate: string;
  recipientUpn?: string;
  status: string;
  lastError?: string;
}

/** Custom prompt is absent when the default applies. */
export interface AppSettingsDto {
  followUpChatSystemPrompt?: string;
  defaultFollowUpChatSystemPrompt: string;
  lastModifiedDate?: string;
  lastModifiedByUpn?: string;
}

export const toTemplateDto = (entity: MessageTemplateEntity): MessageTemplateDto => ({
  id: entity.rowKey,
  templateName: entity.templateName,
  blobUrl: entity.blobUrl,
  createdByUpn: entity.createdByUpn,
  createdDate: entity.createdDate
});

export const toBatchDto = (entity: MessageBatchEntity): MessageBatchDto => ({
  id: entity.rowKey,
  batchName: entity.batchName,
  templateId: entity.templateId,
  senderUpn: entity.senderUpn,
  createdDate: entity.createdDate
});

export const toLogDto = (entity: MessageLogEntity): MessageLogDto => ({
  id: entity.rowKey,
  messageBatchId: entity.messageBatchId,
  sentDate: entity.sentDate,
  recipientUpn: entity.recipientUpn,
  status: entity.status,
  lastError: entity.lastError
});

export const toSettingsDto = (entity: AppSettingsEntity, defaultPrompt: string): AppSettingsDto => ({
  followUpChatSystemPrompt: entity.followUpChatSystemPrompt,
  defaultFollowUpChatSystemPrompt: defaultPrompt,
  lastModifiedDate: entity.lastModifiedDate,
  lastModifiedByUpn: entity.lastModifiedByUpn
});
