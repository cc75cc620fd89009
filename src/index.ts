export * from './errors/index.js';
export * from './logging/logger.js';
export * from './config/appConfig.js';
export * from './auth/authService.js';
export * from './auth/tokenCache.js';
export * from './auth/types.js';
export * from './graph/graphClient.js';
export * from './graph/userService.js';
export * from './graph/teamsAppInstaller.js';
export * from './models/botUser.js';
export * from './models/dtos.js';
export * from './storage/entities.js';
export * from './storage/entityTable.js';
export * from './storage/blobStore.js';
export * from './storage/createStorage.js';
export * from './storage/messageTemplateStorageManager.js';
export * from './storage/settingsStorageManager.js';
export * from './queue/batchQueue.js';
export * from './services/messageTemplateService.js';
export * from './services/pendingCardLookupService.js';
export * from './services/messageSenderService.js';
export * from './services/batchMessageProcessor.js';
export * from './services/statisticsService.js';
export * from './services/diagnosticsService.js';
export * from './services/defaultTemplateInitializer.js';
export * from './bot/cards/adaptiveCard.js';
export * from './bot/conversationCache.js';
export * from './bot/resumeHandlers.js';
export * from './bot/convoResumeManager.js';
export * from './bot/adapterWithErrorHandler.js';
export * from './bot/dialogs/commonBotDialog.js';
export * from './bot/dialogs/mainDialog.js';
export * from './bot/dialogueBot.js';
export * from './bot/teamsBot.js';
export * from './llm/types.js';
export * from './llm/azureOpenAiClient.js';
export * from './llm/followUpChatService.js';
export * from './api/index.js';
export * from './api/middleware.js';
export * from './api/messageTemplateRoutes.js';
export * from './api/sendNudgeRoutes.js';
export * from './api/reportingRoutes.js';
export * from './api/settingsRoutes.js';
export * from './jobs/dailyJob.js';
