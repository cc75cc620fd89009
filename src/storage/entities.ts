export const MESSAGE_LOG_STATUS = {
  pending: 'Pending',
  success: 'Success',
  sent: 'Sent',
  failed: 'Failed'
} as const;

export type MessageLogStatus = (typeof MESSAGE_LOG_STATUS)[keyof typeof MESSAGE_LOG_STATUS];

export const TABLES = {
  templates: { name: 'messagetemplates', partitionKey: 'MessageTemplates' },
  batches: { name: 'messagebatches', partitionKey: 'MessageBatches' },
  logs: { name: 'messagelogs', partitionKey: 'MessageLogs' },
  conversations: { name: 'conversationcache', partitionKey: 'Users' },
  settings: { name: 'appsettings', partitionKey: 'AppSettings' }
} as const;

export const SETTINGS_ROW_KEY = 'Settings';

export const TEMPLATE_BLOB_CONTAINER = 'message-templates';

/** Template metadata; the card JSON itself lives in blob storage. */
export interface MessageTemplateEntity {
  rowKey: string;
  templateName: string;
  blobUrl: string;
  createdByUpn: string;
  createdDate: string;
}

/** A group of messages sent together from one template. */
export interface MessageBatchEntity {
  rowKey: string;
  batchName: string;
  templateId: string;
  senderUpn: string;
  createdDate: string;
}

/** One recipient's delivery record within a batch. */
export interface MessageLogEntity {
  rowKey: string;
  messageBatchId: string;
  sentDate: string;
  recipientUpn?: string;
  status: string;
  lastError?: string;
}

/** Where to reach a user proactively; keyed by user id. */
export interface CachedUserAndConversationData {
  rowKey: string;
  serviceUrl: string;
  conversationId: string;
  userPrincipalName?: string;
}

/** Settings an administrator can change while the bot runs; a single row. */
export interface AppSettingsEntity {
  rowKey: string;
  followUpChatSystemPrompt?: string;
  lastModifiedDate?: string;
  lastModifiedByUpn?: string;
}
