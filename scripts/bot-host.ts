import 'dotenv/config';
import express, { type Request, type Response } from 'express';
import { ConfigurationBotFrameworkAuthentication, ConversationState, MemoryStorage, UserState } from 'botbuilder';
import {
  AdapterWithErrorHandler,
  AuthService,
  AzureOpenAiClient,
  BotConversationCache,
  BotConvoResumeManager,
  BatchMessageProcessor,
  DefaultTemplateInitializer,
  DiagnosticsService,
  FollowUpChatService,
  GraphClient,
  GraphUserService,
  InMemoryTokenCache,
  MainDialog,
  MessageSenderService,
  MessageTemplateService,
  MessageTemplateStorageManager,
  PendingCardConversationResumeHandler,
  PendingCardLookupService,
  SettingsStorageManager,
  StatisticsService,
  TeamsAppInstaller,
  TeamsBot,
  botFirstIntroCard,
  createAdminApp,
  createBatchQueue,
  createLogger,
  createStorage,
  defaultFollowUpSystemPrompt,
  errorMessage,
  loadAppConfig,
  scheduleDailyJob
} from '../src/index.js';

const config = loadAppConfig();
const logger = createLogger('bot-host', { level: config.logLevel, hashSalt: config.logHashSalt });

const authService = new AuthService({ config: config.graph, cache: new InMemoryTokenCache() });
const graphClient = new GraphClient({
  baseUrl: config.graph.baseUrl,
  tokenProvider: authService.tokenProvider(),
  retry: { maxAttempts: 3, baseDelayMs: 500 }
});
const userService = new GraphUserService({ graphClient });
const installer = new TeamsAppInstaller({
  graphClient,
  graphBaseUrl: config.graph.baseUrl,
  logger: logger.child('teams-app-installer')
});

if (!config.storageConnectionString) {
  logger.warn('STORAGE_CONNECTION_STRING not set; using in-memory storage and queue');
}
const storage = createStorage(config.storageConnectionString);
const batchQueue = createBatchQueue(config.storageConnectionString);
const storageManager = new MessageTemplateStorageManager({ storage, logger: logger.child('storage') });
const templateService = new MessageTemplateService({
  storageManager,
  batchQueue,
  logger: logger.child('message-templates')
});
const lookupService = new PendingCardLookupService({ storageManager, logger: logger.child('pending-cards') });
const resumeHandler = new PendingCardConversationResumeHandler({
  lookupService,
  messageLogs: templateService,
  logger: logger.child('resume-handler')
});
const conversationCache = new BotConversationCache({
  table: storage.conversations,
  logger: logger.child('conversation-cache')
});

// Bot state lives in memory; delivery records and conversation references are in storage.
const memoryStorage = new MemoryStorage();
const conversationState = new ConversationState(memoryStorage);
const userState = new UserState(memoryStorage);

const adapter = new AdapterWithErrorHandler(
  new ConfigurationBotFrameworkAuthentication({
    MicrosoftAppId: config.bot.appId,
    MicrosoftAppPassword: config.bot.appPassword,
    MicrosoftAppType: config.bot.appType,
    MicrosoftAppTenantId: config.bot.appTenantId
  }),
  { logger: logger.child('adapter'), devMode: config.devMode, conversationState }
);

const settings = new SettingsStorageManager({
  storage,
  defaultFollowUpChatSystemPrompt:
    config.followUpChat?.systemPrompt ?? defaultFollowUpSystemPrompt(config.bot.botName),
  logger: logger.child('settings')
});

const followUpChat = config.followUpChat
  ? new FollowUpChatService({
      llmClient: AzureOpenAiClient.fromConfig(config.followUpChat),
      systemPrompt: settings.defaultFollowUpChatSystemPrompt,
      settings,
      maxTokens: config.followUpChat.maxTokens,
      temperature: config.followUpChat.temperature,
      logger: logger.child('follow-up-chat')
    })
  : undefined;

const dialog = new MainDialog({
  botName: config.bot.botName,
  conversationCache,
  userState,
  followUpChat,
  logger: logger.child('main-dialog')
});
const bot = new TeamsBot({
  conversationState,
  userState,
  dialog,
  conversationCache,
  resumeHandler,
  introCard: botFirstIntroCard(config.templatesDir, config.bot.botName),
  logger: logger.child('teams-bot')
});

const resumeManager = new BotConvoResumeManager({
  adapter,
  botAppId: config.bot.appId,
  appCatalogTeamsAppId: config.appCatalogTeamsAppId,
  conversationCache,
  userService,
  installer,
  resumeHandler,
  logger: logger.child('resume-manager')
});
const processor = new BatchMessageProcessor({
  queue: batchQueue,
  sender: new MessageSenderService({
    resumer: resumeManager,
    templateService,
    logger: logger.child('message-sender')
  }),
  pollIntervalMs: config.queuePollIntervalMs,
  logger: logger.child('batch-processor')
});
const statistics = new StatisticsService({ storageManager, userService, logger: logger.child('statistics') });

const app = createAdminApp(
  {
    templateService,
    statistics,
    diagnostics: new DiagnosticsService({ userService, logger: logger.child('diagnostics') }),
    settings,
    logger: logger.child('api'),
    auth: { devMode: config.devMode, testUpn: config.testUpn }
  },
  (host) => {
    host.post(config.bot.endpointPath, express.json(), (req: Request, res: Response) => {
      adapter
        .process(req, res, async (context) => {
          await bot.run(context);
        })
        .catch((error: unknown) => {
          logger.error('Bot request failed', { error: errorMessage(error) });
        });
    });
  }
);

const main = async (): Promise<void> => {
  if (!config.appCatalogTeamsAppId) {
    logger.warn('APP_CATALOG_TEAMS_APP_ID not set; new users cannot be reached proactively');
  }

  await new DefaultTemplateInitializer({
    templateService,
    templatesDir: config.templatesDir,
    logger: logger.child('default-templates')
  }).initialize();
  await processor.start();
  const dailyJob = scheduleDailyJob(config.dailyJobCron, {
    statistics,
    queue: batchQueue,
    logger: logger.child('daily-job')
  });

  const server = app.listen(config.bot.port, () => {
    logger.info('Bot host listening', { port: config.bot.port, endpointPath: config.bot.endpointPath });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    dailyJob.stop();
    processor
      .stop()
      .catch((error: unknown) => {
        logger.error('Processor stop failed', { error: errorMessage(error) });
      })
      .finally(() => {
        server.close();
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error: unknown) => {
  logger.error('Bot host failed to start', { error: errorMessage(error) });
  process.exitCode = 1;
});
