import { ConflictError, NotFoundError } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { GraphClient } from './graphClient.js';

export interface TeamsAppInstallerOptions {
  graphClient: GraphClient;
  logger: Logger;
  graphBaseUrl?: string;
}

interface InstalledApp {
  id?: string;
}

interface InstalledAppPage {
  value?: InstalledApp[];
}

/**
 * Installs the bot's Teams app in a user's personal scope. Installing (or
 * touching the chat of an existing installation) makes Teams send the bot a
 * conversationUpdate for that user.
 */
export class TeamsAppInstaller {
  private readonly graphClient: GraphClient;
  private readonly logger: Logger;
  private readonly graphBaseUrl: string;

  constructor(options: TeamsAppInstallerOptions) {
    this.graphClient = options.graphClient;
    this.logger = options.logger;
    this.graphBaseUrl = (options.graphBaseUrl ?? 'https://graph.microsoft.com/v1.0').replace(/\/$/, '');
  }

  async installBotForUser(userId: string, teamsAppId: string): Promise<void> {
    try {
      await this.graphClient.post(`/users/${userId}/teamwork/installedApps`, {
        'teamsApp@odata.bind': `${this.graphBaseUrl}/appCatalogs/teamsApps/${teamsAppId}`
      });
      this.logger.info('Installed Teams app for user', { userId, teamsAppId });
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      this.logger.info('Teams app already installed for user; triggering conversation update', { userId });
      await this.triggerConversationUpdate(userId, teamsAppId);
    }
  }

  async getUserInstalledApp(userId: string, teamsAppId: string): Promise<InstalledApp> {
    const page = await this.graphClient.get<InstalledAppPage>(`/users/${userId}/teamwork/installedApps`, {
      $expand: 'teamsAppDefinition',
      $filter: `teamsApp/id eq '${teamsAppId}'`
    });
    const installed = page.value?.find((app) => Boolean(app.id));
    if (!installed) {
      throw new NotFoundError(`Teams app ${teamsAppId} is not installed for user ${userId}`);
    }
    return installed;
  }

  async triggerConversationUpdate(userId: string, teamsAppId: string): Promise<void> {
    const installed = await this.getUserInstalledApp(userId, teamsAppId);
    try {
      await this.graphClient.get(`/users/${userId}/teamwork/installedApps/${installed.id}/chat`);
    } catch (error) {
      this.logger.warn("Couldn't get chat for user", { userId, error });
    }
  }
}
